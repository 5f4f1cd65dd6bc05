/**
 * @module
 * Environment backends: where the tools of a project get installed and run.
 *
 * Backends keep no state of their own. Everything they derive is in the {@link Config}, and
 * everything they change for later commands goes into the run's {@link RunEnvironment}.
 */
import {
    quote,
    quoteAll,
} from './command';
import {
    condaVariants,
} from './config';
import type {
    Config,
} from './config';
import {
    RondoError,
} from './errors';
import {
    computeReqHash,
    checkInstallRequirements,
    SKIP_FILE,
    writeSkipMarker,
} from './requirements';
import type {
    TaskContext,
} from './task';
import type {
    Backend,
    Requirement,
} from './tools';
import {
    ConfigNode,
    isConfigNode,
    toConfigValue,
} from './tree';
import fs = require('fs-extra');
import os = require('os');
import path = require('path');
import yaml = require('js-yaml');

export interface TestEnvBackend {
    readonly name: Backend;
    /** Creates the environment when needed and activates it for the rest of the run. */
    setup(ctx: TaskContext): Promise<void>;
    /** Installs the requirements of the project and its tools, unless the skip marker says they are current. */
    installRequirements(ctx: TaskContext): Promise<void>;
    /** Removes the environment and untracked ignored files. */
    nuke(ctx: TaskContext): Promise<void>;
}

/**
 * Requirements of the project and of every tool used by a package, skipping tools that do not
 * support the active backend.
 */
export function collectRequirements(config: Config): Requirement[] {
    const result: Requirement[] = config.requirements.slice();
    const seen = new Set<string>();
    for (const pkg of config.packages) {
        for (const toolName of pkg.tools) {
            if (seen.has(toolName))
                continue;
            seen.add(toolName);
            const tool = config.tools.lookup(toolName);
            if (tool.supportedEnvs.includes(config.testenv.use))
                result.push(...tool.requirements);
        }
    }
    return result;
}

function requireEnvPath(config: Config): string {
    const envPath = config.testenv.path;
    if (envPath === null)
        throw new RondoError(`backend ${config.testenv.use} has no environment directory`);
    return envPath;
}

async function isDirectory(p: string): Promise<boolean> {
    try {
        return (await fs.stat(p)).isDirectory();
    } catch (e) {
        return false;
    }
}

class CondaBackend implements TestEnvBackend {
    readonly name: Backend = 'conda';

    async setup(ctx: TaskContext): Promise<void> {
        const {config, env, runner, progress} = ctx;
        const envPath = requireEnvPath(config);
        await this.installConda(ctx);

        await env.addActivation('[[ -n "${CONDA_PREFIX_1}" ]] && conda deactivate &> /dev/null');
        await env.addActivation('[[ -n "${CONDA_PREFIX}" ]] && conda deactivate &> /dev/null');
        await env.addActivation(activateBase(config));

        const result = await runner.run('conda env list --json', {...env.runOptions(), hide: true});
        progress.info(`Required conda env: ${envPath}`);
        if (!listedEnvs(result.stdout).includes(envPath)) {
            const pins = config.conda.pins.map(([name, version]) => `${name}=${version}`);
            await runner.run(`conda create -n ${quote(config.testenv.name)} ${quoteAll(pins)} -y`, env.runOptions());
            const fnPinning = path.join(envPath, 'conda-meta', 'pinning');
            await fs.mkdirp(path.dirname(fnPinning));
            await fs.writeFile(fnPinning, pins.map(pin => `${pin}\n`).join(''));
        }

        await env.addActivation(`conda activate ${quote(config.testenv.name)}`);
        await env.setVar('CONDA_BLD_PATH', config.conda.buildPath);
        await env.setVar('PROJECT_VERSION', config.git.tagVersion);

        // Removing channels fails when there are none.
        await runner.run('conda config --env --remove-key channels', {...env.runOptions(), hide: true, warn: true});
        for (const channel of config.conda.channels)
            await runner.run(`conda config --env --add channels ${quote(channel)}`, env.runOptions());
        await runner.run('conda config --env --set channel_priority strict', env.runOptions());
    }

    async installRequirements(ctx: TaskContext): Promise<void> {
        const {config, env, runner, progress} = ctx;
        // conda-build provides conda render, needed to get requirements from recipes.
        const condaReqs = new Set(['conda', 'conda-build']);
        const pipReqs = new Set<string>();
        for (const [condaReq, pipReq] of collectRequirements(config)) {
            if (condaReq !== null) {
                condaReqs.add(condaReq);
            } else if (pipReq !== null) {
                pipReqs.add(pipReq);
                condaReqs.add('pip');
            }
        }
        const recipeDirs: string[] = [];
        const recipeFiles: string[] = [];
        for (const pkg of config.packages) {
            const recipeDir = path.join(pkg.absPath, 'tools', 'conda.recipe');
            if (!(await isDirectory(recipeDir))) {
                progress.info(`Skipping recipe ${recipeDir}. (directory does not exist)`);
                continue;
            }
            recipeDirs.push(recipeDir);
            for (const name of await fs.readdir(recipeDir))
                recipeFiles.push(path.join(recipeDir, name));
        }
        const reqHash = await computeReqHash(
            Array.from(condaReqs, r => `conda:${r}`).concat(Array.from(pipReqs, r => `pip:${r}`)),
            recipeFiles,
        );

        const fnSkip = path.join(requireEnvPath(config), SKIP_FILE);
        if (!(await checkInstallRequirements(fnSkip, reqHash, progress)))
            return;

        const sorted = Array.from(condaReqs).sort();
        // conda itself is updated in the base environment.
        const baseReqs = sorted.filter(r => r.startsWith('conda'));
        const devReqs = sorted.filter(r => !r.startsWith('conda'));
        await runner.run(`conda install --update-deps -y -n base ${quoteAll(baseReqs)}`, env.runOptions());
        if (devReqs.length)
            await runner.run(`conda install --update-deps -y ${quoteAll(devReqs)}`, env.runOptions());

        progress.info('Rendering conda packages, extracting requirements, which will be installed.');
        const ownPackages = config.packages.map(pkg => pkg.distName);
        for (const recipeDir of recipeDirs) {
            const recipeReqs = await renderRecipeRequirements(ctx, recipeDir);
            const depReqs = recipeReqs.filter(req => !ownPackages.includes(req.split(' ')[0]));
            if (depReqs.length)
                await runner.run(`conda install --update-deps -y ${quoteAll(depReqs)}`, env.runOptions());
        }

        if (pipReqs.size)
            await runner.run(`pip install --upgrade ${quoteAll(Array.from(pipReqs).sort())}`, env.runOptions());

        await writeSkipMarker(fnSkip, reqHash);
    }

    async nuke(ctx: TaskContext): Promise<void> {
        const {config, runner} = ctx;
        await runner.run(`conda uninstall -n ${quote(config.testenv.name)} --all -y`,
                         {prelude: [activateBase(config)]});
        await runner.run('git clean -fdX', {cwd: config.cwd});
    }

    private async installConda(ctx: TaskContext): Promise<void> {
        const {config, runner, progress} = ctx;
        const basePath = config.conda.basePath;
        if (await isDirectory(path.join(basePath, 'bin')))
            return;

        const installer = path.join(config.downloadDir, 'miniconda.sh');
        if (await fs.pathExists(installer)) {
            progress.info(`Conda installer already present: ${installer}`);
        } else {
            let url: string;
            if (os.platform() === 'darwin')
                url = config.conda.osxUrl;
            else if (os.platform() === 'linux')
                url = config.conda.linuxUrl;
            else
                throw new RondoError(`operating system ${os.platform()} is not supported`);
            progress.info(`Downloading latest conda to ${installer}.`);
            await fs.mkdirp(config.downloadDir);
            await runner.run(`curl -sSL -o ${quote(installer)} ${quote(url)}`);
        }
        await fs.chmod(installer, 0o755);

        progress.info(`Installing conda in ${basePath}.`);
        await runner.run(`${quote(installer)} -b -p ${quote(basePath)}`);
    }
}

/**
 * Shell line activating the base conda installation.
 */
export function activateBase(config: Config): string {
    return `source ${quote(path.join(config.conda.basePath, 'bin', 'activate'))}`;
}

function listedEnvs(json: string): string[] {
    let parsed: unknown;
    try {
        parsed = JSON.parse(json);
    } catch (e) {
        throw new RondoError(`cannot parse output of conda env list: ${e instanceof Error ? e.message : String(e)}`);
    }
    if (typeof parsed !== 'object' || parsed === null || !('envs' in parsed) || !Array.isArray(parsed.envs))
        throw new RondoError('unexpected output of conda env list');
    return parsed.envs.filter((x: unknown): x is string => typeof x === 'string');
}

/**
 * Renders a conda recipe and returns its build, host, run and test requirements as
 * `name [version]` strings.
 */
async function renderRecipeRequirements(ctx: TaskContext, recipeDir: string): Promise<string[]> {
    const {config, env, runner} = ctx;
    const tmpdir = await fs.mkdtemp(path.join(os.tmpdir(), 'rondo-render-'));
    let rendered: ConfigNode;
    try {
        const fnRendered = path.join(tmpdir, 'rendered.yml');
        await runner.run(
            `conda render -f ${quote(fnRendered)} ${quote(recipeDir)} --variants ${quote(condaVariants(config.conda.pins))}`,
            env.runOptions());
        const value = toConfigValue(yaml.load(await fs.readFile(fnRendered, 'utf-8')), '');
        rendered = isConfigNode(value) ? value : {};
    } finally {
        await fs.remove(tmpdir);
    }

    const reqs = new Set<string>();
    const sources: Array<[string, string]> = [['requirements', 'build'], ['requirements', 'host'],
                                               ['requirements', 'run'], ['test', 'requires']];
    for (const [section, type] of sources) {
        const node = rendered[section];
        const items = isConfigNode(node) ? node[type] : undefined;
        if (!Array.isArray(items))
            continue;
        for (const item of items) {
            if (typeof item === 'string')
                reqs.add(item.split(/\s+/).slice(0, 2).join(' '));
        }
    }
    return Array.from(reqs).sort();
}

class VenvBackend implements TestEnvBackend {
    readonly name: Backend = 'venv';

    async setup(ctx: TaskContext): Promise<void> {
        const {config, env, runner, progress} = ctx;
        const envPath = requireEnvPath(config);
        if (await isDirectory(envPath))
            progress.info(`Virtual environment already exists: ${envPath}`);
        else
            await runner.run(`${config.venv.pythonBin} -m venv ${quote(envPath)}`);
        await env.addActivation('[[ -n "${VIRTUAL_ENV}" ]] && deactivate &> /dev/null');
        await env.addActivation(`source ${quote(path.join(envPath, 'bin', 'activate'))}`);
        await env.setVar('PROJECT_VERSION', config.git.tagVersion);
    }

    async installRequirements(ctx: TaskContext): Promise<void> {
        const {config, env, runner, progress} = ctx;
        const pipReqs = new Set<string>();
        for (const [, pipReq] of collectRequirements(config)) {
            if (pipReq !== null)
                pipReqs.add(pipReq);
        }
        const reqFiles: string[] = [];
        for (const pkg of config.packages)
            reqFiles.push(path.join(pkg.absPath, 'requirements.txt'), path.join(pkg.absPath, 'setup.py'));
        const reqHash = await computeReqHash(pipReqs, reqFiles);

        const fnSkip = path.join(requireEnvPath(config), SKIP_FILE);
        if (!(await checkInstallRequirements(fnSkip, reqHash, progress)))
            return;

        if (pipReqs.size)
            await runner.run(`pip install -U ${quoteAll(Array.from(pipReqs).sort())}`, env.runOptions());
        for (const pkg of config.packages) {
            if (await fs.pathExists(path.join(pkg.absPath, 'requirements.txt')))
                await runner.run('pip install -U -r requirements.txt', env.runOptions(pkg.absPath));
            await runner.run('pip install -e ./', env.runOptions(pkg.absPath));
        }
        await writeSkipMarker(fnSkip, reqHash);
    }

    async nuke(ctx: TaskContext): Promise<void> {
        const {config, runner} = ctx;
        // Only shows how; the environment may be shared with other projects.
        await runner.run(`echo rm -rv ${quote(requireEnvPath(config))}`);
        await runner.run('git clean -fdX', {cwd: config.cwd});
    }
}

class NoBackend implements TestEnvBackend {
    readonly name: Backend = 'none';

    async setup(): Promise<void> {
        return;
    }

    async installRequirements(): Promise<void> {
        return;
    }

    async nuke(): Promise<void> {
        return;
    }
}

export function createBackend(use: Backend): TestEnvBackend {
    switch (use) {
    case 'conda':
        return new CondaBackend();
    case 'venv':
        return new VenvBackend();
    case 'none':
        return new NoBackend();
    }
}
