/**
 * @module
 * Deployment: the policy deciding whether anything is published, and the two tools that
 * publish, `deploy` (package assets) and `upload-docs-git` (documentation on a git branch).
 */
import {
    quote,
    quoteAll,
} from './command';
import type {
    Config,
    Package,
} from './config';
import {
    ExternalProcessFailure,
    RondoError,
} from './errors';
import {
    sanitizeBranch,
} from './git';
import type {
    Progress,
} from './progress';
import type {
    TaskContext,
} from './task';
import {
    formatTemplate,
    formatTemplates,
    TemplateContext,
} from './template';
import type {
    DeployTool,
    UploadDocsGitTool,
} from './tools';
import type {
    DeployLabel,
} from './version';
import crypto = require('crypto');
import fg = require('fast-glob');
import fs = require('fs-extra');
import path = require('path');

/**
 * Decides whether `descr` may be published: the matching deploy flag (`deploy_binary` for
 * binary assets, `deploy_noarch` otherwise) must be set and the deploy label of the current
 * version must be one of `labels`. Every refusal is reported with its reason.
 */
export function needDeployment(config: Config, descr: string, binary: boolean, labels: DeployLabel[],
                               progress: Progress): boolean {
    const flag = binary ? 'deploy_binary' : 'deploy_noarch';
    if (!(binary ? config.deployBinary : config.deployNoarch)) {
        progress.info(`Skipping ${descr}: ${flag} is not set.`);
        return false;
    }
    const label = config.git.deployLabel;
    if (label === null) {
        progress.info(`Skipping ${descr}: version ${config.git.tagVersion} is not a release.`);
        return false;
    }
    if (!labels.includes(label)) {
        progress.info(`Skipping ${descr}: deploy label ${label} is not one of [${labels.join(', ')}].`);
        return false;
    }
    return true;
}

/**
 * Describes whether the variable `name` is set, without revealing its value.
 */
export function checkEnvVar(name: string, env: NodeJS.ProcessEnv = process.env): string {
    const value = env[name];
    if (value === undefined)
        return `The environment variable ${name} is not set.`;
    if (value === '')
        return `The environment variable ${name} is empty.`;
    return `The environment variable ${name} is not empty.`;
}

/**
 * Writes `<asset>.sha256` in the format of `sha256sum` and returns its name.
 */
export async function writeSha256Sum(asset: string): Promise<string> {
    const hash = crypto.createHash('sha256');
    hash.update(await fs.readFile(asset));
    const fnHash = `${asset}.sha256`;
    await fs.writeFile(fnHash, `${hash.digest('hex')}  ${path.basename(asset)}\n`);
    return fnHash;
}

/**
 * Finds the assets matching `patterns` in `cwd`, skipping checksum files written earlier.
 */
export async function findAssets(patterns: string[], cwd: string): Promise<string[]> {
    if (!patterns.length)
        return [];
    const found = await fg(patterns, {cwd, onlyFiles: true});
    return found.filter(asset => !asset.endsWith('.sha256')).sort();
}

/**
 * Runs the `deploy` tool for one package: binary assets first, then noarch ones.
 *
 * A failing upload of one asset group is reported and does not stop the next group.
 */
export async function runDeploy(ctx: TaskContext, pkg: Package, tool: DeployTool, fmt: TemplateContext): Promise<void> {
    const {config, env, runner, progress} = ctx;
    for (const name of tool.deployVars)
        progress.info(checkEnvVar(name));

    const groups: Array<[boolean, string[]]> = [[true, tool.binaryAssetPatterns], [false, tool.noarchAssetPatterns]];
    for (const [binary, rawPatterns] of groups) {
        const patterns = formatTemplates(rawPatterns, fmt);
        const descr = `${tool.name} of ${pkg.distName} (binary=${binary})`;
        progress.info(`Preparing for ${descr}`);
        for (const pattern of patterns)
            progress.info(`  Searching for ${pattern}`);
        const assets = await findAssets(patterns, pkg.absPath);
        if (!assets.length) {
            progress.info('No assets found');
            if (patterns.length && needDeployment(config, descr, binary, tool.deployLabels, progress))
                throw new RondoError(`could not find assets for ${descr}: ${patterns.join(' ')}`);
            continue;
        }
        const hashes: string[] = [];
        for (const asset of assets) {
            await writeSha256Sum(path.resolve(pkg.absPath, asset));
            hashes.push(`${asset}.sha256`);
        }
        const uploads = tool.includeSha256 ? assets.concat(hashes) : assets;
        progress.info(`Assets for upload: ${uploads.join(' ')}`);

        // Checked last, so everything above also runs for builds that do not deploy.
        if (!needDeployment(config, descr, binary, tool.deployLabels, progress))
            continue;
        const commands = formatTemplates(tool.commands, {
            ...fmt,
            assets: quoteAll(uploads),
            deploy_label: config.git.deployLabel,
        });
        try {
            for (const command of commands)
                await runner.run(command, env.runOptions(pkg.absPath));
        } catch (e) {
            if (!(e instanceof ExternalProcessFailure))
                throw e;
            progress.error(`Deployment failed: ${descr}: ${e.message}`);
        }
    }
}

/**
 * Runs the `upload-docs-git` tool for one package: the built documentation replaces the
 * content of the last commit on the documentation branch, which is force-pushed.
 *
 * The documentation branch is expected to be an orphan branch made earlier.
 */
export async function runUploadDocsGit(ctx: TaskContext, pkg: Package, tool: UploadDocsGitTool,
                                       fmt: TemplateContext): Promise<void> {
    const {config, env, runner, progress} = ctx;
    if (!needDeployment(config, `${tool.name} of ${pkg.distName}`, false, tool.deployLabels, progress))
        return;

    const opts = env.runOptions(pkg.absPath);
    const docbranch = quote(tool.docbranch);
    await sanitizeBranch(runner, progress, tool.docbranch, pkg.absPath);
    await runner.run(`git checkout ${docbranch}`, opts);
    await runner.run('git ls-tree HEAD -r --name-only | xargs rm -f', opts);

    const docroot = formatTemplate(tool.docroot, fmt);
    await runner.run(`GLOBIGNORE='.:..'; cp -rv ${quote(docroot)}/* .`, opts);
    const files = await fg('**/*', {cwd: path.resolve(pkg.absPath, docroot), dot: true, onlyFiles: true});
    if (files.length)
        await runner.run(`git add -- ${quoteAll(files.sort())}`, opts);
    await runner.run('git commit -a -m \'Automatic documentation update\' --amend', opts);
    await runner.run(`git checkout ${quote(config.git.branch)}`, opts);

    const token = process.env.GITHUB_TOKEN;
    if (token) {
        const url = (await runner.run('git config --get remote.origin.url', {...opts, hide: true})).stdout.trim();
        // Works for both ssh and https remotes.
        const slug = url.replace(/:/g, '/').split('/').slice(-2).join('/');
        await runner.run(`git remote add origin-pages ${quote(`https://${token}@github.com/${slug}`)}`,
                         {...opts, hide: true, warn: true});
        await runner.run(`git push --quiet -f origin-pages ${docbranch}:${docbranch}`, opts);
    } else {
        await runner.run(`git push -f ${quote(tool.docremote)} ${docbranch}:${docbranch}`, opts);
    }
}
