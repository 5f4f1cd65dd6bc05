/**
 * @module
 * Task execution.
 *
 * Tasks run one at a time. Before a task runs, its prerequisites run depth-first in declaration
 * order; a task that already completed in the run is not run again. A failing task aborts the
 * run; work done by completed tasks is kept.
 */
import {
    CycleError,
} from './errors';
import type {
    Progress,
} from './progress';
import type {
    TaskRegistry,
} from './registry';
import type {
    Task,
    TaskContext,
} from './task';

export type TaskState = 'not-started' | 'running' | 'completed';

/**
 * One invocation of the scheduler.
 */
export class ExecutionRun {
    /** Requested task. */
    readonly root: string;
    /** Tasks in the order their functions ran. */
    readonly order: string[];
    private readonly states: Map<string, TaskState>;

    constructor(root: string) {
        this.root = root;
        this.order = [];
        this.states = new Map();
    }

    state(name: string): TaskState {
        return this.states.get(name) || 'not-started';
    }

    /** Marks `name` as running. */
    start(name: string): void {
        this.states.set(name, 'running');
    }

    /** Marks `name` as completed. */
    complete(name: string): void {
        this.states.set(name, 'completed');
        this.order.push(name);
    }

    /** Tasks that started but did not complete, i.e. the chain that was executing on failure. */
    running(): string[] {
        const result: string[] = [];
        for (const [name, state] of this.states) {
            if (state === 'running')
                result.push(name);
        }
        return result;
    }
}

export class Scheduler<C = TaskContext> {
    private readonly registry: TaskRegistry<C>;
    private readonly progress: Progress;

    constructor(registry: TaskRegistry<C>, progress: Progress) {
        this.registry = registry;
        this.progress = progress;
    }

    /**
     * Runs `run.root` and its prerequisites. Rejects with the error of the first failing task.
     */
    async run(run: ExecutionRun, ctx: C): Promise<ExecutionRun> {
        const total = this.registry.closure(run.root).length;
        await this.runTask(run, this.registry.getTask(run.root), ctx, [], total);
        this.progress.unrender();
        return run;
    }

    private async runTask(run: ExecutionRun, task: Task<C>, ctx: C, stack: string[], total: number): Promise<void> {
        const state = run.state(task.name);
        if (state === 'completed')
            return;
        if (state === 'running')
            throw new CycleError(stack.slice(stack.indexOf(task.name)).concat([task.name]));

        run.start(task.name);
        stack.push(task.name);
        for (const name of task.prerequisites)
            await this.runTask(run, this.registry.getTask(name), ctx, stack, total);
        stack.pop();

        this.progress.status = `[${run.order.length + 1}/${total}] ${task.name}`;
        this.progress.render();
        await task.fn(ctx);
        run.complete(task.name);
    }
}

/**
 * Runs the task `root` of `registry`.
 */
export function runTasks<C>(registry: TaskRegistry<C>, root: string, ctx: C, progress: Progress): Promise<ExecutionRun> {
    const scheduler = new Scheduler(registry, progress);
    return scheduler.run(new ExecutionRun(root), ctx);
}
