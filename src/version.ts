/**
 * @module
 * Version information derived from `git describe --tags`.
 */
import {
    TagError,
} from './errors';

/**
 * Deployment label of a release.
 */
export type DeployLabel = 'main' | 'test' | 'dev';

export function isDeployLabel(x: string): x is DeployLabel {
    return x === 'main' || x === 'test' || x === 'dev';
}

/**
 * Output of `git describe` when the repository has no tags yet.
 */
export const NO_TAG_DESCRIBE = '0.0.0-0-notag';

/**
 * Structured version information.
 */
export interface VersionInfo {
    /** The (trimmed) describe string. */
    describe: string;
    /** Tag part of the describe string. */
    tag: string;
    major: number;
    minor: number;
    patch: number;
    /** Everything after the patch number, including `.postN` for untagged commits. */
    suffix: string;
    /** `major.minor.patch` followed by the suffix. */
    tagVersion: string;
    /** `major.minor` */
    tagSoversion: string;
    tagStable: boolean;
    tagTest: boolean;
    tagDev: boolean;
    /** True for stable, test and dev releases. */
    tagRelease: boolean;
    deployLabel: DeployLabel | null;
}

/**
 * Parses the output of `git describe --tags`, e.g. `1.2.3`, `0.18.1b1` or
 * `15.13.11a9-10-g1234abc`.
 */
export function parseGitDescribe(describe: string): VersionInfo {
    describe = describe.trim();
    const words = describe.split('-');
    const tag = words[0];

    const parts = tag.split('.');
    if (parts.length !== 3)
        throw new TagError(tag, 'tag', `should have three dot-separated parts, got ${parts.length}`);
    const major = parseNumeric(tag, 'major', parts[0]);
    const minor = parseNumeric(tag, 'minor', parts[1]);
    const match = /^(\d+)(.*)$/.exec(parts[2]);
    if (!match)
        throw new TagError(tag, 'patch', `'${parts[2]}' does not start with a number`);
    const patch = parseInt(match[1], 10);
    let suffix = match[2];

    if (words.length > 1) {
        const post = words[1];
        if (!/^\d+$/.test(post))
            throw new TagError(describe, 'post', `'${post}' is not a commit count`);
        suffix += `.post${parseInt(post, 10)}`;
    }

    // Full matches only: `a9.post10` is not a dev release.
    const tagStable = suffix === '';
    const tagTest = /^b\d+$/.test(suffix);
    const tagDev = /^a\d+$/.test(suffix);
    let deployLabel: DeployLabel | null = null;
    if (tagStable)
        deployLabel = 'main';
    else if (tagTest)
        deployLabel = 'test';
    else if (tagDev)
        deployLabel = 'dev';

    return {
        deployLabel,
        describe,
        major,
        minor,
        patch,
        suffix,
        tag,
        tagDev,
        tagRelease: deployLabel !== null,
        tagSoversion: `${major}.${minor}`,
        tagStable,
        tagTest,
        tagVersion: `${major}.${minor}.${patch}${suffix}`,
    };
}

function parseNumeric(tag: string, field: string, value: string): number {
    if (!/^\d+$/.test(value))
        throw new TagError(tag, field, `'${value}' is not a number`);
    return parseInt(value, 10);
}
