/**
 * @module
 * Registry of all tasks of a workflow.
 */
import {
    ConfigurationError,
    CycleError,
    UnknownTaskError,
} from './errors';
import type {
    Task,
    TaskContext,
} from './task';

/**
 * The static task graph: task name -> prerequisite names.
 */
export class TaskRegistry<C = TaskContext> {
    readonly tasks: Map<string, Task<C>>;
    private defaultName?: string;

    constructor(tasks?: Iterable<Task<C>>) {
        this.tasks = new Map();
        for (const task of tasks || [])
            this.addTask(task);
    }

    addTask(task: Task<C>): void {
        if (this.tasks.has(task.name))
            throw new ConfigurationError(`task ${task.name} is already defined`);
        if (task.default) {
            if (this.defaultName)
                throw new ConfigurationError(`tasks ${this.defaultName} and ${task.name} are both marked as default`);
            this.defaultName = task.name;
        }
        this.tasks.set(task.name, task);
    }

    hasTask(name: string): boolean {
        return this.tasks.has(name);
    }

    /**
     * Throws {@link UnknownTaskError} when there is no task `name`.
     */
    getTask(name: string): Task<C> {
        const task = this.tasks.get(name);
        if (!task)
            throw new UnknownTaskError(name);
        return task;
    }

    getDefault(): Task<C> | undefined {
        return this.defaultName === undefined ? undefined : this.tasks.get(this.defaultName);
    }

    /**
     * Checks that every prerequisite exists and that the graph has no cycle.
     */
    validate(): void {
        for (const task of this.tasks.values()) {
            for (const name of task.prerequisites) {
                if (!this.tasks.has(name))
                    throw new UnknownTaskError(name, `prerequisites of ${task.name}`);
            }
            if (task.withoutDeploy !== undefined && !this.tasks.has(task.withoutDeploy))
                throw new UnknownTaskError(task.withoutDeploy, `deploy-free variant of ${task.name}`);
        }

        const done = new Set<string>();
        const visiting: string[] = [];
        const visit = (name: string): void => {
            if (done.has(name))
                return;
            const i = visiting.indexOf(name);
            if (i >= 0)
                throw new CycleError(visiting.slice(i).concat([name]));
            visiting.push(name);
            for (const child of this.getTask(name).prerequisites)
                visit(child);
            visiting.pop();
            done.add(name);
        };
        for (const name of this.tasks.keys())
            visit(name);
    }

    /**
     * Returns `name` and all its transitive prerequisites, in the order in which they run:
     * depth-first, prerequisites left to right, each task once.
     */
    closure(name: string): string[] {
        const order: string[] = [];
        const seen = new Set<string>();
        const stack = new Set<string>();
        const visit = (current: string): void => {
            if (seen.has(current))
                return;
            if (stack.has(current))
                throw new CycleError(Array.from(stack).concat([current]));
            stack.add(current);
            for (const child of this.getTask(current).prerequisites)
                visit(child);
            stack.delete(current);
            seen.add(current);
            order.push(current);
        };
        visit(name);
        return order;
    }

    /**
     * Selects the task to run.
     *
     * @param name requested task; the default task when undefined.
     * @param deployEnabled when false, a default task that would deploy is replaced by its
     *        deploy-free variant.
     */
    selectRoot(name: string | undefined, deployEnabled: boolean): Task<C> {
        if (name !== undefined)
            return this.getTask(name);
        const task = this.getDefault();
        if (!task)
            throw new ConfigurationError('no task requested and there is no default task');
        if (deployEnabled || !this.closure(task.name).some(n => this.getTask(n).deploys))
            return task;
        if (task.withoutDeploy === undefined)
            throw new ConfigurationError(`deployment is disabled and default task ${task.name} has no deploy-free variant`);
        return this.getTask(task.withoutDeploy);
    }

    /**
     * All tasks, prerequisites before dependents and otherwise alphabetical.
     */
    sorted(): Array<Task<C>> {
        const todo = Array.from(this.tasks.keys()).sort();
        const done: string[] = [];
        while (todo.length) {
            const index = todo.findIndex(name => this.getTask(name).prerequisites.every(p => done.includes(p)));
            if (index < 0)
                throw new CycleError(todo);
            done.push(todo.splice(index, 1)[0]);
        }
        return done.map(name => this.getTask(name));
    }
}
