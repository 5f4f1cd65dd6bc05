/**
 * @module
 * Runs the tools of a phase for every package.
 */
import {
    packageRecord,
} from './config';
import type {
    Config,
    Package,
} from './config';
import {
    runDeploy,
    runUploadDocsGit,
} from './deploy';
import {
    envSeparator,
} from './environment';
import type {
    TaskContext,
} from './task';
import {
    formatTemplate,
    formatTemplates,
    TemplateContext,
} from './template';
import {
    BuildInPlaceTool,
    LintTool,
    Phase,
    Tool,
    WriteVersionTool,
} from './tools';
import fs = require('fs-extra');
import path = require('path');

/**
 * Values available to the command templates of a tool: `{config.*}`, `{package.*}` and
 * `{env.*}`.
 */
export function formatContext(ctx: TaskContext, pkg: Package): TemplateContext {
    return {
        config: ctx.config.tree.root,
        env: ctx.env.toRecord(),
        package: packageRecord(pkg),
    };
}

/**
 * Runs every tool of `phase`: packages in declaration order, and within a package its tools in
 * declaration order. Tools that do not support the active backend are skipped.
 */
export async function runPhase(ctx: TaskContext, phase: Phase): Promise<void> {
    const {config, progress} = ctx;
    for (const pkg of config.packages) {
        for (const tool of config.tools.forPhase(phase, pkg.tools)) {
            progress.heading(`TOOL  ${tool.name} (${pkg.name})`);
            if (!tool.supportedEnvs.includes(config.testenv.use)) {
                progress.warn(`tool ${tool.name} skipped: not supported with ${config.testenv.use}`);
                continue;
            }
            await runTool(ctx, pkg, tool);
        }
    }
}

/**
 * Runs one tool for one package.
 */
export async function runTool(ctx: TaskContext, pkg: Package, tool: Tool): Promise<void> {
    const fmt = formatContext(ctx, pkg);
    switch (tool.kind) {
    case 'write-version':
        return writeVersion(ctx, pkg, tool, fmt);
    case 'lint-static':
    case 'lint-dynamic':
        return runCommands(ctx, pkg, lintCommands(ctx.config, tool), fmt);
    case 'build-inplace':
        return buildInPlace(ctx, pkg, tool, fmt);
    case 'test-inplace':
    case 'upload-coverage':
    case 'build-docs':
    case 'build-packages':
        return runCommands(ctx, pkg, tool.commands, fmt);
    case 'upload-docs-git':
        return runUploadDocsGit(ctx, pkg, tool, fmt);
    case 'deploy':
        return runDeploy(ctx, pkg, tool, fmt);
    }
}

/**
 * Formats `commands` and runs them in the package directory within the run environment.
 */
export async function runCommands(ctx: TaskContext, pkg: Package, commands: string[],
                                  fmt: TemplateContext): Promise<void> {
    // All templates are checked before the first command runs.
    for (const command of formatTemplates(commands, fmt))
        await ctx.runner.run(command, ctx.env.runOptions(pkg.absPath));
}

/**
 * Linters check everything on the merge branch, when `absolute` is set, or when the branch is
 * unknown; on feature branches they may restrict themselves to the changes.
 */
export function lintCommands(config: Config, tool: LintTool): string[] {
    const branch = config.git.branch;
    if (config.absolute || branch === '' || branch === config.git.mergeBranch)
        return tool.commandsMaster;
    return tool.commandsFeature;
}

async function writeVersion(ctx: TaskContext, pkg: Package, tool: WriteVersionTool,
                            fmt: TemplateContext): Promise<void> {
    const destination = formatTemplate(tool.destination, fmt);
    const content = formatTemplate(tool.template, fmt);
    await fs.outputFile(path.join(pkg.absPath, destination), content);
    ctx.progress.info(`Version file written to: ${destination}`);
}

async function buildInPlace(ctx: TaskContext, pkg: Package, tool: BuildInPlaceTool,
                            fmt: TemplateContext): Promise<void> {
    const {env, progress} = ctx;
    if (tool.checkVars.length) {
        progress.info('Existing variables that could affect the in-place build:');
        for (const name of tool.checkVars) {
            const value = env.get(name) || process.env[name];
            if (value !== undefined)
                progress.info(`${name}=${value}`);
        }
    }

    await runCommands(ctx, pkg, tool.commands, fmt);

    for (const [name, raw] of Object.entries(tool.extraVars)) {
        let value = formatTemplate(raw, fmt);
        if (envSeparator(name) === ':')
            value = path.resolve(pkg.absPath, value);
        await env.appendVar(name, value);
    }
}
