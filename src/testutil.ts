/**
 * @module
 * In-process stand-ins for the process runner, git and the console, used by the tests.
 */
import type {
    ProcessResult,
    ProcessRunner,
    RunOptions,
} from './command';
import {
    BUILTIN_DEFAULTS,
    Config,
    finalize,
} from './config';
import {
    RunEnvironment,
} from './environment';
import {
    ExternalProcessFailure,
} from './errors';
import type {
    Vcs,
} from './git';
import {
    createProgress,
    Progress,
} from './progress';
import type {
    TaskContext,
} from './task';
import {
    createBackend,
} from './testenv';
import {
    ConfigNode,
    ConfigTree,
} from './tree';
import fs = require('fs-extra');
import os = require('os');
import path = require('path');
import stream = require('stream');

export interface RunCall {
    command: string;
    options: RunOptions;
}

/** Exit code and output of a faked command. */
export type FakeResponse = Partial<Pick<ProcessResult, 'code' | 'stdout' | 'stderr'>>;

/**
 * Records commands instead of running them. `respond` decides the outcome of each command;
 * by default every command succeeds without output.
 */
export class FakeRunner implements ProcessRunner {
    readonly calls: RunCall[];
    private readonly respond: (command: string) => FakeResponse;

    constructor(respond?: (command: string) => FakeResponse) {
        this.calls = [];
        this.respond = respond || (() => ({}));
    }

    get commands(): string[] {
        return this.calls.map(call => call.command);
    }

    async run(command: string, options?: RunOptions): Promise<ProcessResult> {
        const opts = options || {};
        this.calls.push({command, options: opts});
        const response = this.respond(command);
        const result: ProcessResult = {
            code: response.code || 0,
            command,
            stderr: response.stderr || '',
            stdout: response.stdout || '',
        };
        if (result.code !== 0 && !opts.warn)
            throw new ExternalProcessFailure(command, result.code, result.stdout, result.stderr);
        return result;
    }
}

export class FakeVcs implements Vcs {
    constructor(private readonly describeOutput: string | undefined, private readonly branchName: string) {
    }

    async describe(): Promise<string | undefined> {
        return this.describeOutput;
    }

    async branch(): Promise<string> {
        return this.branchName;
    }
}

/**
 * A non-TTY console reporter whose output is kept in memory.
 */
export function captureProgress(): {progress: Progress; output: () => string} {
    const chunks: string[] = [];
    const sink = new stream.Writable({
        write(chunk: Buffer | string, _encoding: string, callback: () => void): void {
            chunks.push(chunk.toString());
            callback();
        },
    });
    return {output: () => chunks.join(''), progress: createProgress(sink)};
}

export function tmpDir(): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), 'rondo-test-'));
}

export interface TestConfigOptions {
    /** Merged onto the built-in defaults. */
    node: ConfigNode;
    cwd: string;
    describe?: string;
    branch?: string;
    runner?: ProcessRunner;
    progress?: Progress;
}

/**
 * Finalizes a configuration from the built-in defaults and `options.node`, without the
 * packaged tools.
 */
export function testConfig(options: TestConfigOptions): Promise<Config> {
    const tree = new ConfigTree();
    tree.merge(BUILTIN_DEFAULTS);
    tree.merge(options.node);
    return finalize(tree, {
        cwd: options.cwd,
        env: {},
        progress: options.progress || captureProgress().progress,
        runner: options.runner || new FakeRunner(),
        vcs: new FakeVcs(options.describe, options.branch === undefined ? 'master' : options.branch),
    });
}

/**
 * Task context for `config`; the activate script goes to the project root.
 */
export function testContext(config: Config, runner: ProcessRunner, progress: Progress): TaskContext {
    return {
        backend: createBackend(config.testenv.use),
        config,
        env: new RunEnvironment(path.join(config.cwd, config.testenv.fnActivate), progress),
        progress,
        runner,
    };
}
