/**
 * @module
 * Runs external commands.
 */
import {
    ExternalProcessFailure,
} from './errors';
import {
    Progress,
} from './progress';
import childProcess = require('child_process');

/**
 * Options for {@link ProcessRunner#run}.
 */
export interface RunOptions {
    /** Working directory. Default: the current directory. */
    cwd?: string;
    /** Variables added to (or replacing) the process environment. */
    env?: Record<string, string>;
    /** Shell lines executed before the command, e.g. environment activation. */
    prelude?: string[];
    /** Return the result of a failed command instead of throwing. */
    warn?: boolean;
    /** Capture output without printing it. */
    hide?: boolean;
}

/**
 * Outcome of a command.
 */
export interface ProcessResult {
    command: string;
    code: number;
    stdout: string;
    stderr: string;
}

/**
 * Executes shell commands.
 */
export interface ProcessRunner {
    /**
     * Runs `command` in a shell. Throws {@link ExternalProcessFailure} on a non-zero exit
     * code, unless `options.warn` is set.
     */
    run(command: string, options?: RunOptions): Promise<ProcessResult>;
}

/**
 * Runs commands with `bash -c`, echoing them and their output to the console.
 */
export class ShellRunner implements ProcessRunner {
    private readonly progress: Progress;

    constructor(progress: Progress) {
        this.progress = progress;
    }

    run(command: string, options?: RunOptions): Promise<ProcessResult> {
        const opts: RunOptions = options || {};
        const hide = !!opts.hide;
        const script = (opts.prelude || []).concat([command]).join('\n');
        if (!hide)
            this.progress.info(`$ ${command}`);

        return new Promise<ProcessResult>((resolve, reject) => {
            const stdout: Buffer[] = [];
            const stderr: Buffer[] = [];
            const cp = childProcess.spawn('bash', ['-c', script], {
                cwd: opts.cwd,
                env: Object.assign({}, process.env, opts.env),
                stdio: ['ignore', 'pipe', 'pipe'],
            });
            cp.on('error', e => {
                reject(e);
            });
            cp.on('close', (code, signal) => {
                const result: ProcessResult = {
                    code: code === null ? 1 : code,
                    command,
                    stderr: Buffer.concat(stderr).toString('utf-8'),
                    stdout: Buffer.concat(stdout).toString('utf-8'),
                };
                if (result.code === 0 || opts.warn)
                    return resolve(result);
                reject(new ExternalProcessFailure(command, result.code, result.stdout, result.stderr, signal));
            });
            const chunkCallback = (chunks: Buffer[]) => (chunk: string | Buffer) => {
                const buf = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
                chunks.push(buf);
                if (!hide)
                    this.progress.write(buf);
            };
            cp.stdout.on('data', chunkCallback(stdout));
            cp.stderr.on('data', chunkCallback(stderr));
        });
    }
}

/**
 * Return a shell-escaped version of `x`
 */
export function quote(x: string): string {
    if (!x.length)
        return '\'\'';
    else if (!/[^\w@%+=:,./-]/.test(x))
        return x;

    const y = x.replace(/'/g, `'"'"'`);
    return `'${y}'`;
}

/**
 * Shell-escapes and joins `words`.
 */
export function quoteAll(words: Iterable<string>): string {
    return Array.from(words).map(quote).join(' ');
}
