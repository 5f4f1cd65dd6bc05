/**
 * @module
 * Configuration of a run.
 *
 * The configuration tree is assembled from layers, each merged onto the previous one:
 *
 * 1. built-in defaults ({@link BUILTIN_DEFAULTS}),
 * 2. the packaged `defaults.yaml` with the standard tools,
 * 3. the project file `.rondo.yaml` in the working directory,
 * 4. environment variables `RONDO_<KEY>`, e.g. `RONDO_TESTENV_USE=venv`,
 * 5. `--set key=value` overrides from the command line.
 *
 * {@link finalize} then validates the tree, derives the environment, package and git fields,
 * writes them back into the tree (so command templates can use them) and returns a typed
 * {@link Config}.
 */
import {
    ProcessRunner,
    quote,
} from './command';
import {
    ConfigurationError,
    UnknownToolError,
} from './errors';
import {
    Vcs,
} from './git';
import {
    Progress,
} from './progress';
import {
    Backend,
    isBackend,
    parseRequirements,
    Requirement,
    ToolRegistry,
} from './tools';
import {
    ConfigNode,
    ConfigScalar,
    ConfigTree,
    ConfigValue,
    describeType,
    expectStringList,
    isConfigNode,
    scalarPaths,
    toConfigValue,
} from './tree';
import {
    NO_TAG_DESCRIBE,
    parseGitDescribe,
    VersionInfo,
} from './version';
import fs = require('fs-extra');
import os = require('os');
import path = require('path');
import yaml = require('js-yaml');

/** Prefix of environment variables that override configuration keys. */
export const ENV_PREFIX = 'RONDO_';

/** Project configuration files, in order of preference. */
export const PROJECT_FILES = ['.rondo.yaml', '.rondo.yml'];

/** The packaged default configuration. */
export const DEFAULTS_FILE = path.join(__dirname, '..', 'defaults.yaml');

/** Fallback Python version used in venv names when the interpreter cannot be queried. */
const UNKNOWN_PYTHON = 'X.Y';

/**
 * Built-in defaults, the first configuration layer.
 */
export const BUILTIN_DEFAULTS: ConfigNode = {
    absolute: false,
    conda: {
        base_path: '~/miniconda3',
        channels: [],
        linux_url: 'https://repo.anaconda.com/miniconda/Miniconda3-latest-Linux-x86_64.sh',
        osx_url: 'https://repo.anaconda.com/miniconda/Miniconda3-latest-MacOSX-x86_64.sh',
        pinning: '',
    },
    deploy_binary: false,
    deploy_noarch: false,
    download_dir: '~/downloads',
    git: {
        merge_branch: 'master',
    },
    project: {
        name: '',
        packages: [],
        requirements: [],
    },
    testenv: {
        use: 'conda',
    },
    tools: {},
    upload_coverage: false,
    venv: {
        base_path: '~/venvs',
        python_bin: 'python3',
    },
};

/**
 * A distributable unit of the project.
 */
export interface Package {
    name: string;
    /** Path as configured, relative to the project root. */
    path: string;
    absPath: string;
    /** Name used by package managers. Default: the package name. */
    distName: string;
    tools: string[];
}

export interface GitSettings extends VersionInfo {
    /** Branch into which feature branches are merged. */
    mergeBranch: string;
    /** Current branch, see {@link Vcs#branch}. */
    branch: string;
}

export interface TestEnvSettings {
    use: Backend;
    name: string;
    /** Directory holding all environments of this backend, null for `none`. */
    basePath: string | null;
    /** The environment itself, null for `none`. */
    path: string | null;
    /** Activate script written in the project root. */
    fnActivate: string;
}

export interface CondaSettings {
    basePath: string;
    linuxUrl: string;
    osxUrl: string;
    channels: string[];
    /** Pinned package versions, as name/version pairs. */
    pins: Array<[string, string]>;
    /** `conda build` output directory. */
    buildPath: string;
}

export interface VenvSettings {
    basePath: string;
    pythonBin: string;
}

/**
 * Finalized configuration.
 */
export interface Config {
    /** The full tree, used as context for command templates. */
    readonly tree: ConfigTree;
    /** Project root. */
    readonly cwd: string;
    readonly projectName: string;
    /** Requirements of the project itself, e.g. for testing. */
    readonly requirements: Requirement[];
    readonly packages: Package[];
    readonly tools: ToolRegistry;
    readonly git: GitSettings;
    readonly testenv: TestEnvSettings;
    readonly conda: CondaSettings;
    readonly venv: VenvSettings;
    readonly downloadDir: string;
    /** Lint everything, as on the merge branch. */
    readonly absolute: boolean;
    readonly uploadCoverage: boolean;
    readonly deployNoarch: boolean;
    readonly deployBinary: boolean;
}

/**
 * Options for {@link buildTree}.
 */
export interface BuildOptions {
    /** Project root. Default: the current directory. */
    cwd?: string;
    /** Environment for the override layer and path expansion. Default: `process.env`. */
    env?: NodeJS.ProcessEnv;
    /** `key=value` overrides. */
    overrides?: string[];
    /** Packaged defaults. Default: {@link DEFAULTS_FILE}. */
    defaultsFile?: string;
}

/**
 * The merged configuration tree, before finalization.
 */
export interface LayeredTree {
    tree: ConfigTree;
    /** The project layer as loaded, or undefined without a project file. */
    project?: ConfigNode;
    /** The project file that was loaded. */
    projectFile?: string;
}

/**
 * Loads a YAML file with a mapping at the top level. An empty file is an empty mapping.
 */
export async function readConfigFile(filename: string): Promise<ConfigNode> {
    const contents = await fs.readFile(filename, 'utf-8');
    let parsed: unknown;
    try {
        parsed = yaml.load(contents, {filename});
    } catch (e) {
        throw new ConfigurationError(e instanceof Error ? e.message : String(e), filename);
    }
    if (parsed === undefined || parsed === null)
        return {};
    const value = toConfigValue(parsed, '');
    if (!isConfigNode(value))
        throw new ConfigurationError(`expected a mapping at the top level, got ${describeType(value)}`, filename);
    return value;
}

/**
 * Returns the project file in `cwd`, or undefined when there is none.
 */
export async function findProjectFile(cwd: string): Promise<string | undefined> {
    for (const name of PROJECT_FILES) {
        const filename = path.join(cwd, name);
        if (await fs.pathExists(filename))
            return filename;
    }
    return undefined;
}

/**
 * Assembles the configuration layers.
 */
export async function buildTree(options?: BuildOptions): Promise<LayeredTree> {
    const opts = options || {};
    const cwd = path.resolve(opts.cwd || '.');
    const env = opts.env || process.env;

    const tree = new ConfigTree();
    tree.merge(BUILTIN_DEFAULTS);
    tree.merge(await readConfigFile(opts.defaultsFile || DEFAULTS_FILE));

    // The project layer is kept on its own so callers can tell what the project configured.
    const projectFile = await findProjectFile(cwd);
    const project = projectFile ? await readConfigFile(projectFile) : undefined;
    if (project)
        tree.merge(project);

    applyEnvOverrides(tree, env);
    for (const override of opts.overrides || [])
        applyOverride(tree, override);

    return {project, projectFile, tree};
}

/**
 * Name of the environment variable overriding `key`, e.g. `RONDO_GIT_MERGE_BRANCH` for
 * `git.merge_branch`.
 */
export function envVarName(key: string): string {
    return ENV_PREFIX + key.toUpperCase().replace(/[.-]/g, '_');
}

/**
 * Applies `RONDO_*` variables to the existing scalar keys of `tree`. Other variables are ignored.
 */
export function applyEnvOverrides(tree: ConfigTree, env: NodeJS.ProcessEnv): void {
    for (const key of scalarPaths(tree.root)) {
        const raw = env[envVarName(key)];
        if (raw !== undefined)
            setScalar(tree, key, raw);
    }
}

/**
 * Applies a `key=value` override to an existing scalar key of `tree`.
 */
export function applyOverride(tree: ConfigTree, override: string): void {
    const i = override.indexOf('=');
    if (i <= 0)
        throw new ConfigurationError(`override '${override}' should have the form key=value`);
    setScalar(tree, override.substring(0, i).trim(), override.substring(i + 1));
}

function setScalar(tree: ConfigTree, key: string, raw: string): void {
    if (!tree.has(key))
        throw new ConfigurationError('is not a configuration key', key);
    const current = tree.get(key);
    if (Array.isArray(current) || isConfigNode(current))
        throw new ConfigurationError(`cannot override ${describeType(current)} with a string`, key);
    tree.set(key, coerceScalar(current, raw, key));
}

/**
 * Converts `raw` to the type of the current value.
 */
export function coerceScalar(current: ConfigScalar, raw: string, key: string): ConfigScalar {
    if (typeof current === 'boolean') {
        const lower = raw.trim().toLowerCase();
        if (['', '0', 'false', 'no', 'off'].includes(lower))
            return false;
        if (['1', 'true', 'yes', 'on'].includes(lower))
            return true;
        throw new ConfigurationError(`'${raw}' is not a boolean`, key);
    }
    if (typeof current === 'number') {
        const value = Number(raw);
        if (raw.trim() === '' || isNaN(value))
            throw new ConfigurationError(`'${raw}' is not a number`, key);
        return value;
    }
    return raw;
}

/**
 * Expands a leading `~` and `$VAR` / `${VAR}` references. Unknown variables are left as they are.
 */
export function expandPath(p: string, env: NodeJS.ProcessEnv = process.env): string {
    p = p.replace(/\$(\w+)|\$\{(\w+)\}/g, (match: string, a?: string, b?: string) => {
        const name = a || b || '';
        const value = env[name];
        return value === undefined ? match : value;
    });
    if (p === '~')
        return os.homedir();
    if (p.startsWith('~/'))
        return path.join(os.homedir(), p.substring(2));
    return p;
}

/**
 * Parses the pinning string, e.g. `python 3.7 numpy 1.16`, into name/version pairs.
 */
export function parsePinning(pinning: string): Array<[string, string]> {
    for (const char of '=<>!*') {
        if (pinning.includes(char))
            throw new ConfigurationError(`character '${char}' should not be used in pinning`, 'conda.pinning');
    }
    const words = pinning.split(/\s+/).filter(w => w.length > 0);
    if (words.length % 2 !== 0)
        throw new ConfigurationError('should be an even number of words, alternating package names and versions',
                                     'conda.pinning');
    const pins: Array<[string, string]> = [];
    for (let i = 0; i < words.length; i += 2)
        pins.push([words[i], words[i + 1]]);
    return pins;
}

/**
 * Name of the development environment: the project name, `-dev` and the pins, so a change of
 * pins gives a new environment.
 */
export function condaEnvName(projectName: string, pins: Array<[string, string]>): string {
    let name = `${projectName}-dev`;
    for (const [pkg, version] of pins)
        name += `-${pkg}-${version}`;
    return name;
}

/**
 * The `--variants` argument of `conda render` and `conda build` for the pinned versions,
 * e.g. `{python: '3.7', numpy: '1.16'}`.
 */
export function condaVariants(pins: Array<[string, string]>): string {
    return `{${pins.map(([name, version]) => `${name}: '${version}'`).join(', ')}}`;
}

/**
 * Collaborators of {@link finalize}.
 */
export interface FinalizeDeps {
    vcs: Vcs;
    runner: ProcessRunner;
    progress: Progress;
    /** Project root. Default: the current directory. */
    cwd?: string;
    /** Default: `process.env`. */
    env?: NodeJS.ProcessEnv;
}

/**
 * Validates the merged tree and derives the computed fields.
 */
export async function finalize(tree: ConfigTree, deps: FinalizeDeps): Promise<Config> {
    const cwd = path.resolve(deps.cwd || '.');
    const env = deps.env || process.env;
    const progress = deps.progress;

    if (!tree.has('project.name') || tree.get('project.name') === null || tree.getString('project.name') === '')
        throw new ConfigurationError('the project name is not set', 'project.name');
    const projectName = tree.getString('project.name');

    for (const key of ['conda.base_path', 'venv.base_path', 'download_dir'])
        tree.set(key, expandPath(tree.getString(key), env));

    const tools = ToolRegistry.fromConfig(tree.getNode('tools'));
    const packages = finalizePackages(tree, projectName, tools, cwd);
    const requirements = parseRequirements(tree.get('project.requirements'), 'project.requirements');
    const pins = parsePinning(tree.getString('conda.pinning'));

    const use = tree.getString('testenv.use');
    if (!isBackend(use))
        throw new ConfigurationError(`unknown environment backend '${use}'`, 'testenv.use');
    const venv: VenvSettings = {
        basePath: tree.getString('venv.base_path'),
        pythonBin: tree.getString('venv.python_bin'),
    };
    const condaBasePath = tree.getString('conda.base_path');
    const testenv = await testenvSettings(use, projectName, pins, condaBasePath, venv, deps.runner);
    tree.set('testenv.name', testenv.name);
    tree.set('testenv.base_path', testenv.basePath);
    tree.set('testenv.path', testenv.path);
    tree.set('testenv.fn_activate', testenv.fnActivate);
    progress.info(`Test environment: ${testenv.name} (${use})`);

    const buildPath = env.CONDA_BLD_PATH || path.join(testenv.path || condaBasePath, 'conda-bld');
    tree.set('conda.build_path', buildPath);
    tree.set('conda.variants', condaVariants(pins));
    const conda: CondaSettings = {
        basePath: condaBasePath,
        buildPath,
        channels: tree.getStringList('conda.channels'),
        linuxUrl: tree.getString('conda.linux_url'),
        osxUrl: tree.getString('conda.osx_url'),
        pins,
    };

    const git = await gitSettings(tree, deps.vcs);
    progress.info(`Version number ${git.tagVersion} derived from \`git describe --tags\` ${git.describe}.`);

    return {
        absolute: tree.getBoolean('absolute'),
        conda,
        cwd,
        deployBinary: tree.getBoolean('deploy_binary'),
        deployNoarch: tree.getBoolean('deploy_noarch'),
        downloadDir: tree.getString('download_dir'),
        git,
        packages,
        projectName,
        requirements,
        testenv,
        tools,
        tree,
        uploadCoverage: tree.getBoolean('upload_coverage'),
        venv,
    };
}

/**
 * Builds and finalizes the configuration.
 */
export async function loadConfig(options: BuildOptions, deps: FinalizeDeps): Promise<Config> {
    const {tree} = await buildTree(options);
    return finalize(tree, {...deps, cwd: deps.cwd || options.cwd, env: deps.env || options.env});
}

function finalizePackages(tree: ConfigTree, projectName: string, tools: ToolRegistry, cwd: string): Package[] {
    const raw = tree.get('project.packages');
    if (!Array.isArray(raw))
        throw new ConfigurationError(`expected a list, got ${describeType(raw)}`, 'project.packages');
    const packages = raw.map((item, i) => finalizePackage(item, `project.packages[${i}]`, projectName, tools, cwd));
    tree.set('project.packages', packages.map(packageRecord));
    return packages;
}

function finalizePackage(item: ConfigValue, key: string, projectName: string, tools: ToolRegistry,
                         cwd: string): Package {
    if (!isConfigNode(item))
        throw new ConfigurationError(`expected a mapping, got ${describeType(item)}`, key);
    const field = (name: string, defaultValue: string): string => {
        const value = item[name];
        if (value === undefined || value === null)
            return defaultValue;
        if (typeof value !== 'string')
            throw new ConfigurationError(`expected a string, got ${describeType(value)}`, `${key}.${name}`);
        return value;
    };
    const name = field('name', projectName);
    const pkgPath = field('path', '.');
    const toolNames = item.tools === undefined || item.tools === null ? [] : expectStringList(item.tools, `${key}.tools`);
    for (const toolName of toolNames) {
        if (!tools.has(toolName))
            throw new UnknownToolError(toolName, `${key}.tools`);
    }
    return {
        absPath: path.resolve(cwd, pkgPath),
        distName: field('dist_name', name),
        name,
        path: pkgPath,
        tools: toolNames,
    };
}

/**
 * The package as it appears to command templates.
 */
export function packageRecord(pkg: Package): ConfigNode {
    return {
        abs_path: pkg.absPath,
        dist_name: pkg.distName,
        name: pkg.name,
        path: pkg.path,
        tools: pkg.tools.slice(),
    };
}

async function testenvSettings(use: Backend, projectName: string, pins: Array<[string, string]>,
                               condaBasePath: string, venv: VenvSettings,
                               runner: ProcessRunner): Promise<TestEnvSettings> {
    switch (use) {
    case 'conda': {
        const name = condaEnvName(projectName, pins);
        return {
            basePath: condaBasePath,
            fnActivate: `activate-conda-${name}.sh`,
            name,
            path: path.join(condaBasePath, 'envs', name),
            use,
        };
    }
    case 'venv': {
        const pyver = await pythonVersion(runner, venv.pythonBin);
        const name = `${projectName}-dev-python-${pyver}`;
        return {
            basePath: venv.basePath,
            fnActivate: `activate-venv-${name}.sh`,
            name,
            path: path.join(venv.basePath, name),
            use,
        };
    }
    case 'none':
        return {
            basePath: null,
            fnActivate: 'activate.sh',
            name: 'noenv',
            path: null,
            use,
        };
    }
}

async function pythonVersion(runner: ProcessRunner, pythonBin: string): Promise<string> {
    const script = 'import sys; print("{}.{}".format(*sys.version_info[:2]))';
    const result = await runner.run(`${pythonBin} -c ${quote(script)}`, {hide: true, warn: true});
    const version = result.stdout.trim();
    return result.code === 0 && /^\d+\.\d+$/.test(version) ? version : UNKNOWN_PYTHON;
}

async function gitSettings(tree: ConfigTree, vcs: Vcs): Promise<GitSettings> {
    // Fresh repositories have no tags; that is not an error.
    const describe = (await vcs.describe()) || NO_TAG_DESCRIBE;
    const info = parseGitDescribe(describe);
    const branch = await vcs.branch();
    const git: GitSettings = {
        ...info,
        branch,
        mergeBranch: tree.getString('git.merge_branch'),
    };
    tree.set('git.describe', git.describe);
    tree.set('git.tag', git.tag);
    tree.set('git.tag_version_major', git.major);
    tree.set('git.tag_version_minor', git.minor);
    tree.set('git.tag_version_patch', git.patch);
    tree.set('git.tag_version_suffix', git.suffix);
    tree.set('git.tag_version', git.tagVersion);
    tree.set('git.tag_soversion', git.tagSoversion);
    tree.set('git.tag_stable', git.tagStable);
    tree.set('git.tag_test', git.tagTest);
    tree.set('git.tag_dev', git.tagDev);
    tree.set('git.tag_release', git.tagRelease);
    tree.set('git.deploy_label', git.deployLabel);
    tree.set('git.branch', branch);
    return git;
}
