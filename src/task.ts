import type {
    ProcessRunner,
} from './command';
import type {
    Config,
} from './config';
import type {
    RunEnvironment,
} from './environment';
import type {
    Progress,
} from './progress';
import type {
    TestEnvBackend,
} from './testenv';

/**
 * Context that will be passed to the task function during execution.
 */
export interface TaskContext {
    readonly config: Config;
    /** Environment changes made by earlier tasks of the run. */
    readonly env: RunEnvironment;
    readonly runner: ProcessRunner;
    readonly progress: Progress;
    /** The active environment backend. */
    readonly backend: TestEnvBackend;
}

/**
 * Function that runs a task.
 */
export type TaskFunction<C = TaskContext> = (ctx: C) => (Promise<void> | void);

/**
 * Represents a task.
 */
export interface Task<C = TaskContext> {
    /** Task name. */
    name: string;
    /** Tasks that must complete before this one, run in this order. */
    prerequisites: string[];
    /** Task function. */
    fn: TaskFunction<C>;
    /** Task description. Default: the task name. */
    description?: string;
    /** Run when no task is requested. At most one task is the default. */
    default?: boolean;
    /** The task deploys something, and only makes sense when deployment is enabled. */
    deploys?: boolean;
    /** Task to run instead of this default task when deployment is disabled. */
    withoutDeploy?: string;
}
