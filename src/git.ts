/**
 * @module
 * Git queries.
 */
import {
    ProcessRunner,
    quote,
} from './command';
import {
    Progress,
} from './progress';

/**
 * Branch name reported when HEAD is neither on a branch, nor on a tag, nor on a commit.
 */
export const DETACHED_BRANCH = 'detached';

/**
 * Version control queries needed to configure a run.
 */
export interface Vcs {
    /** Output of `git describe --tags`, or undefined when it fails (e.g. no tags). */
    describe(): Promise<string | undefined>;
    /** Current branch, with fallbacks for a detached HEAD. */
    branch(): Promise<string>;
}

export class GitVcs implements Vcs {
    private readonly runner: ProcessRunner;
    private readonly cwd?: string;

    constructor(runner: ProcessRunner, cwd?: string) {
        this.runner = runner;
        this.cwd = cwd;
    }

    async describe(): Promise<string | undefined> {
        return this.query('git describe --tags');
    }

    /**
     * The branch name; on a detached HEAD the exact tag, then the short commit id, then
     * {@link DETACHED_BRANCH}.
     */
    async branch(): Promise<string> {
        const branch = await this.query('git rev-parse --abbrev-ref HEAD');
        if (branch && branch !== 'HEAD')
            return branch;
        const tag = await this.query('git describe --tags --exact-match');
        if (tag)
            return tag;
        const commit = await this.query('git rev-parse --short HEAD');
        if (commit)
            return commit;
        return DETACHED_BRANCH;
    }

    private async query(command: string): Promise<string | undefined> {
        const result = await this.runner.run(command, {cwd: this.cwd, hide: true, warn: true});
        if (result.code !== 0)
            return undefined;
        const out = result.stdout.trim();
        return out || undefined;
    }
}

/**
 * Makes sure a local copy of `branch` exists: it is verified, then created from
 * `origin/<branch>`, then fetched from origin.
 */
export async function sanitizeBranch(runner: ProcessRunner, progress: Progress, branch: string, cwd?: string): Promise<void> {
    const b = quote(branch);
    let result = await runner.run(`git rev-parse --verify ${b}`, {cwd, hide: true, warn: true});
    if (result.code === 0)
        return;
    progress.info(`Branch "${branch}" not found.`);

    result = await runner.run(`git branch --track ${b} ${quote(`origin/${branch}`)}`, {cwd, hide: true, warn: true});
    if (result.code === 0)
        return;
    progress.info(`Local copy of remote branch "${branch}" not found.`);

    await runner.run(`git fetch origin ${quote(`${branch}:${branch}`)}`, {cwd});
}
