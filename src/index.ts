/**
 * @module
 * rondo Public API
 */
import {
    ProcessRunner,
    ShellRunner,
} from './command';
import {
    Config,
    loadConfig,
} from './config';
import {
    RunEnvironment,
} from './environment';
import {
    GitVcs,
    Vcs,
} from './git';
import {
    createProgress,
    Progress,
} from './progress';
import type {
    TaskRegistry,
} from './registry';
import {
    ExecutionRun,
    runTasks,
} from './scheduler';
import type {
    Task,
    TaskContext,
} from './task';
import {
    createWorkflow,
} from './tasks';
import {
    createBackend,
} from './testenv';
import path = require('path');

/**
 * Options for {@link newRunner}.
 */
export interface RunnerOptions {
    /** Project root. Default: the current directory. */
    cwd?: string;
    /** `key=value` configuration overrides. */
    overrides?: string[];
    /** Environment for `RONDO_*` overrides and path expansion. Default: `process.env`. */
    env?: NodeJS.ProcessEnv;
    /** Packaged defaults. Default: `defaults.yaml` of this package. */
    defaultsFile?: string;
    /** Default: console output on stdout. */
    progress?: Progress;
    /** Default: commands run with bash. */
    runner?: ProcessRunner;
    /** Default: git on top of `runner`. */
    vcs?: Vcs;
}

/**
 * A configured project, ready to run tasks.
 */
export interface Runner {
    readonly config: Config;
    readonly registry: TaskRegistry;
    /** All tasks, prerequisites first. */
    list(): Task[];
    /**
     * Run `task` and its prerequisites. Without a task, the default task runs, or its
     * deploy-free variant when deployment is disabled.
     */
    run(task?: string): Promise<ExecutionRun>;
}

class RunnerImpl implements Runner {
    readonly config: Config;
    readonly registry: TaskRegistry;
    private readonly progress: Progress;
    private readonly runner: ProcessRunner;

    constructor(config: Config, registry: TaskRegistry, progress: Progress, runner: ProcessRunner) {
        this.config = config;
        this.registry = registry;
        this.progress = progress;
        this.runner = runner;
    }

    list(): Task[] {
        return this.registry.sorted();
    }

    async run(task?: string): Promise<ExecutionRun> {
        const config = this.config;
        const root = this.registry.selectRoot(task, config.deployNoarch || config.deployBinary);
        const ctx: TaskContext = {
            backend: createBackend(config.testenv.use),
            config,
            env: new RunEnvironment(path.join(config.cwd, config.testenv.fnActivate), this.progress),
            progress: this.progress,
            runner: this.runner,
        };
        return runTasks(this.registry, root.name, ctx, this.progress);
    }
}

/**
 * Loads the configuration of the project and sets up the workflow.
 */
export async function newRunner(options?: RunnerOptions): Promise<Runner> {
    const opts = options || {};
    const progress = opts.progress || createProgress();
    const runner = opts.runner || new ShellRunner(progress);
    const cwd = path.resolve(opts.cwd || '.');
    const vcs = opts.vcs || new GitVcs(runner, cwd);
    const config = await loadConfig(
        {cwd, defaultsFile: opts.defaultsFile, env: opts.env, overrides: opts.overrides},
        {cwd, env: opts.env, progress, runner, vcs},
    );
    return new RunnerImpl(config, createWorkflow(), progress, runner);
}

export type {
    Config,
    Package,
} from './config';
export type {
    ProcessResult,
    ProcessRunner,
    RunOptions,
} from './command';
export type {
    Progress,
} from './progress';
export type {
    Task,
    TaskContext,
} from './task';
export type {
    Vcs,
} from './git';
export {
    ConfigurationError,
    CycleError,
    ExternalProcessFailure,
    NotFoundError,
    RondoError,
    TagError,
    TemplateError,
    UnknownTaskError,
    UnknownToolError,
} from './errors';
export {
    parseGitDescribe,
} from './version';
export {
    formatTemplate,
} from './template';
export {
    ExecutionRun,
} from './scheduler';
export {
    TaskRegistry,
} from './registry';
