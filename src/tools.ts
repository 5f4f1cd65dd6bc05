/**
 * @module
 * Tools: named bundles of command templates that contribute to a phase of the workflow.
 *
 * Tools are declared under `tools` in the configuration, e.g.
 *
 * ```yaml
 * tools:
 *   pytest:
 *     kind: test-inplace
 *     requirements: [[pytest, pytest]]
 *     commands:
 *       - pytest {package.name}
 * ```
 */
import {
    ConfigurationError,
    UnknownToolError,
} from './errors';
import {
    ConfigNode,
    ConfigValue,
    describeType,
    expectStringList,
    isConfigNode,
} from './tree';
import {
    DeployLabel,
    isDeployLabel,
} from './version';

/**
 * Environment backends.
 */
export type Backend = 'conda' | 'venv' | 'none';

export const BACKENDS: readonly Backend[] = ['conda', 'venv', 'none'];

export function isBackend(x: string): x is Backend {
    return BACKENDS.some(b => b === x);
}

/**
 * Phases of the workflow to which tools contribute.
 */
export type Phase =
    | 'write-version'
    | 'lint-static'
    | 'lint-dynamic'
    | 'build-inplace'
    | 'test-inplace'
    | 'upload-coverage'
    | 'build-docs'
    | 'upload-docs'
    | 'build-packages'
    | 'deploy';

/**
 * A requirement as a pair of a conda package and a pip package; either may be null when the
 * requirement is not available through that installer.
 */
export type Requirement = [string | null, string | null];

interface ToolBase {
    name: string;
    /** Backends the tool works with. */
    supportedEnvs: Backend[];
    requirements: Requirement[];
}

export interface WriteVersionTool extends ToolBase {
    kind: 'write-version';
    /** Content of the version file. */
    template: string;
    /** Version file, relative to the package. */
    destination: string;
}

export interface LintTool extends ToolBase {
    kind: 'lint-static' | 'lint-dynamic';
    /** Commands used on the merge branch, or when linting everything. */
    commandsMaster: string[];
    /** Commands used on feature branches. */
    commandsFeature: string[];
}

export interface BuildInPlaceTool extends ToolBase {
    kind: 'build-inplace';
    /** Variables printed before building, because they may affect the build. */
    checkVars: string[];
    commands: string[];
    /** Additions to environment variables needed by later commands. */
    extraVars: Record<string, string>;
}

export interface CommandsTool extends ToolBase {
    kind: 'test-inplace' | 'upload-coverage' | 'build-docs' | 'build-packages';
    commands: string[];
}

export interface UploadDocsGitTool extends ToolBase {
    kind: 'upload-docs-git';
    /** Directory with the built documentation. */
    docroot: string;
    docbranch: string;
    docremote: string;
    deployLabels: DeployLabel[];
}

export interface DeployTool extends ToolBase {
    kind: 'deploy';
    /** Environment variables needed for the upload; only their presence is reported. */
    deployVars: string[];
    /** Upload the `.sha256` files together with the assets. */
    includeSha256: boolean;
    noarchAssetPatterns: string[];
    binaryAssetPatterns: string[];
    deployLabels: DeployLabel[];
    commands: string[];
}

export type Tool = WriteVersionTool | LintTool | BuildInPlaceTool | CommandsTool | UploadDocsGitTool | DeployTool;

export type ToolKind = Tool['kind'];

const PHASES: Record<ToolKind, Phase> = {
    'build-docs': 'build-docs',
    'build-inplace': 'build-inplace',
    'build-packages': 'build-packages',
    'deploy': 'deploy',
    'lint-dynamic': 'lint-dynamic',
    'lint-static': 'lint-static',
    'test-inplace': 'test-inplace',
    'upload-coverage': 'upload-coverage',
    'upload-docs-git': 'upload-docs',
    'write-version': 'write-version',
};

function isToolKind(x: string): x is ToolKind {
    return Object.prototype.hasOwnProperty.call(PHASES, x);
}

/**
 * The phase to which `tool` contributes.
 */
export function phaseOf(tool: Tool): Phase {
    return PHASES[tool.kind];
}

/**
 * Reads the fields of one tool declaration, naming `tools.<tool>.<field>` in errors.
 */
class ToolReader {
    private readonly node: ConfigNode;
    private readonly prefix: string;

    constructor(node: ConfigNode, prefix: string) {
        this.node = node;
        this.prefix = prefix;
    }

    key(field: string): string {
        return `${this.prefix}.${field}`;
    }

    string(field: string, defaultValue?: string): string {
        const value = this.node[field];
        if ((value === undefined || value === null) && defaultValue !== undefined)
            return defaultValue;
        if (typeof value !== 'string')
            throw new ConfigurationError(`expected a string, got ${describeType(value)}`, this.key(field));
        return value;
    }

    boolean(field: string, defaultValue: boolean): boolean {
        const value = this.node[field];
        if (value === undefined || value === null)
            return defaultValue;
        if (typeof value !== 'boolean')
            throw new ConfigurationError(`expected a boolean, got ${describeType(value)}`, this.key(field));
        return value;
    }

    list(field: string, defaultValue?: string[]): string[] {
        const value = this.node[field];
        if ((value === undefined || value === null) && defaultValue !== undefined)
            return defaultValue;
        return expectStringList(value, this.key(field));
    }

    map(field: string): Record<string, string> {
        const value = this.node[field];
        if (value === undefined || value === null)
            return {};
        if (!isConfigNode(value))
            throw new ConfigurationError(`expected a mapping, got ${describeType(value)}`, this.key(field));
        const result: Record<string, string> = {};
        for (const [name, item] of Object.entries(value)) {
            if (typeof item !== 'string')
                throw new ConfigurationError(`expected a string, got ${describeType(item)}`, `${this.key(field)}.${name}`);
            result[name] = item;
        }
        return result;
    }

    backends(field: string): Backend[] {
        return this.list(field, BACKENDS.slice()).map((x, i) => {
            if (!isBackend(x))
                throw new ConfigurationError(`unknown environment backend '${x}'`, `${this.key(field)}[${i}]`);
            return x;
        });
    }

    deployLabels(field: string): DeployLabel[] {
        return this.list(field).map((x, i) => {
            if (!isDeployLabel(x))
                throw new ConfigurationError(`unknown deploy label '${x}'`, `${this.key(field)}[${i}]`);
            return x;
        });
    }
}

/**
 * Validates a list of requirement pairs.
 */
export function parseRequirements(value: ConfigValue | undefined, key: string): Requirement[] {
    if (value === undefined || value === null)
        return [];
    if (!Array.isArray(value))
        throw new ConfigurationError(`expected a list, got ${describeType(value)}`, key);
    return value.map((item, i): Requirement => {
        if (!Array.isArray(item) || item.length !== 2)
            throw new ConfigurationError('expected a pair [conda requirement, pip requirement]', `${key}[${i}]`);
        const condaReq = requirementItem(item[0], `${key}[${i}][0]`);
        const pipReq = requirementItem(item[1], `${key}[${i}][1]`);
        if (condaReq === null && pipReq === null)
            throw new ConfigurationError('at least one of the two requirements must be set', `${key}[${i}]`);
        return [condaReq, pipReq];
    });
}

function requirementItem(value: ConfigValue, key: string): string | null {
    if (value !== null && typeof value !== 'string')
        throw new ConfigurationError(`expected a string or null, got ${describeType(value)}`, key);
    return value;
}

/**
 * Parses the declaration of the tool `name`.
 */
export function parseTool(name: string, raw: ConfigValue): Tool {
    const prefix = `tools.${name}`;
    if (!isConfigNode(raw))
        throw new ConfigurationError(`expected a mapping, got ${describeType(raw)}`, prefix);
    const r = new ToolReader(raw, prefix);
    const kind = r.string('kind');
    if (!isToolKind(kind))
        throw new ConfigurationError(`unknown tool kind '${kind}'`, r.key('kind'));
    const base: ToolBase = {
        name,
        requirements: parseRequirements(raw.requirements, r.key('requirements')),
        supportedEnvs: r.backends('supported_envs'),
    };

    switch (kind) {
    case 'write-version':
        return {...base, destination: r.string('destination'), kind, template: r.string('template')};
    case 'lint-static':
    case 'lint-dynamic':
        return {
            ...base,
            commandsFeature: r.list('commands_feature'),
            commandsMaster: r.list('commands_master'),
            kind,
        };
    case 'build-inplace':
        return {
            ...base,
            checkVars: r.list('check_vars', []),
            commands: r.list('commands'),
            extraVars: r.map('extra_vars'),
            kind,
        };
    case 'test-inplace':
    case 'upload-coverage':
    case 'build-docs':
    case 'build-packages':
        return {...base, commands: r.list('commands'), kind};
    case 'upload-docs-git':
        return {
            ...base,
            deployLabels: r.deployLabels('deploy_labels'),
            docbranch: r.string('docbranch', 'gh-pages'),
            docremote: r.string('docremote', 'origin'),
            docroot: r.string('docroot'),
            kind,
        };
    case 'deploy':
        return {
            ...base,
            binaryAssetPatterns: r.list('binary_asset_patterns', []),
            commands: r.list('commands'),
            deployLabels: r.deployLabels('deploy_labels'),
            deployVars: r.list('deploy_vars', []),
            includeSha256: r.boolean('include_sha256', false),
            kind,
            noarchAssetPatterns: r.list('noarch_asset_patterns', []),
        };
    }
}

/**
 * Catalog of the tools available in a run.
 */
export class ToolRegistry {
    private readonly tools: Map<string, Tool>;

    constructor() {
        this.tools = new Map();
    }

    /**
     * Builds a registry from the `tools` section of the configuration.
     */
    static fromConfig(section: ConfigNode): ToolRegistry {
        const registry = new ToolRegistry();
        for (const [name, raw] of Object.entries(section))
            registry.register(name, raw);
        return registry;
    }

    /**
     * Validates and adds a tool declaration. A later declaration of the same name replaces the
     * earlier one.
     */
    register(name: string, raw: ConfigValue): Tool {
        const tool = parseTool(name, raw);
        this.tools.set(name, tool);
        return tool;
    }

    has(name: string): boolean {
        return this.tools.has(name);
    }

    /**
     * Throws {@link UnknownToolError} when there is no tool `name`.
     */
    lookup(name: string): Tool {
        const tool = this.tools.get(name);
        if (!tool)
            throw new UnknownToolError(name);
        return tool;
    }

    names(): string[] {
        return Array.from(this.tools.keys());
    }

    /**
     * The tools among `names` that contribute to `phase`, in the order of `names`.
     */
    forPhase(phase: Phase, names: string[]): Tool[] {
        return names.map(name => this.lookup(name)).filter(tool => phaseOf(tool) === phase);
    }
}
