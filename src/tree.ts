/**
 * @module
 * Dot-addressable configuration tree.
 */
import {
    ConfigurationError,
    NotFoundError,
} from './errors';

/**
 * A value stored in the configuration tree.
 */
export type ConfigValue = string | number | boolean | null | ConfigValue[] | ConfigNode;

/**
 * A nested mapping in the configuration tree.
 */
export interface ConfigNode {
    [key: string]: ConfigValue;
}

/**
 * Scalar configuration value.
 */
export type ConfigScalar = string | number | boolean | null;

export function isConfigNode(value: unknown): value is ConfigNode {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isConfigScalar(value: unknown): value is ConfigScalar {
    return value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

/**
 * Converts parsed YAML (or any plain data) into a {@link ConfigValue}.
 *
 * @param where dotted key used in error messages.
 */
export function toConfigValue(value: unknown, where: string): ConfigValue {
    if (value === undefined)
        return null;
    if (isConfigScalar(value))
        return value;
    if (Array.isArray(value))
        return value.map((item, i) => toConfigValue(item, `${where}[${i}]`));
    if (isConfigNode(value)) {
        const node: ConfigNode = {};
        for (const [key, item] of Object.entries(value))
            node[key] = toConfigValue(item, where ? `${where}.${key}` : key);
        return node;
    }
    throw new ConfigurationError(`unsupported value of type ${typeof value}`, where);
}

/**
 * Merges `override` onto `base` and returns the result; neither argument is modified.
 *
 * Scalars are replaced, nested nodes are merged recursively and lists are concatenated,
 * skipping items of `override` that `base` already contains.
 */
export function mergeNodes(base: ConfigNode, override: ConfigNode): ConfigNode {
    const result: ConfigNode = cloneNode(base);
    for (const [key, value] of Object.entries(override)) {
        const current = result[key];
        if (isConfigNode(current) && isConfigNode(value))
            result[key] = mergeNodes(current, value);
        else if (Array.isArray(current) && Array.isArray(value))
            result[key] = mergeLists(current, value);
        else
            result[key] = cloneValue(value);
    }
    return result;
}

function mergeLists(base: ConfigValue[], override: ConfigValue[]): ConfigValue[] {
    const seen = new Set(base.map(item => JSON.stringify(item)));
    const result = base.map(cloneValue);
    for (const item of override) {
        const key = JSON.stringify(item);
        if (seen.has(key))
            continue;
        seen.add(key);
        result.push(cloneValue(item));
    }
    return result;
}

function cloneValue(value: ConfigValue): ConfigValue {
    if (Array.isArray(value))
        return value.map(cloneValue);
    if (isConfigNode(value))
        return cloneNode(value);
    return value;
}

function cloneNode(node: ConfigNode): ConfigNode {
    const result: ConfigNode = {};
    for (const [key, value] of Object.entries(node))
        result[key] = cloneValue(value);
    return result;
}

/**
 * Lists the dotted paths of all scalar leaves below `node`. Lists are not descended into.
 */
export function scalarPaths(node: ConfigNode, prefix: string = ''): string[] {
    const paths: string[] = [];
    for (const [key, value] of Object.entries(node)) {
        const path = prefix ? `${prefix}.${key}` : key;
        if (isConfigNode(value))
            paths.push(...scalarPaths(value, path));
        else if (isConfigScalar(value))
            paths.push(path);
    }
    return paths;
}

/**
 * Mutable configuration tree addressed by dotted paths such as `git.merge_branch`.
 */
export class ConfigTree {
    readonly root: ConfigNode;

    constructor(root?: ConfigNode) {
        this.root = root || {};
    }

    has(path: string): boolean {
        return this.lookup(path) !== undefined;
    }

    /**
     * Returns the value at `path`. Throws {@link NotFoundError} when it is not set.
     */
    get(path: string): ConfigValue {
        const value = this.lookup(path);
        if (value === undefined)
            throw new NotFoundError(path);
        return value;
    }

    /**
     * Sets the value at `path`, creating intermediate nodes.
     */
    set(path: string, value: ConfigValue): void {
        const keys = path.split('.');
        const last = keys.pop();
        if (!last)
            throw new ConfigurationError('empty configuration key');
        let node = this.root;
        const seen: string[] = [];
        for (const key of keys) {
            seen.push(key);
            const child = node[key];
            if (child === undefined || child === null) {
                const created: ConfigNode = {};
                node[key] = created;
                node = created;
            } else if (isConfigNode(child)) {
                node = child;
            } else {
                throw new ConfigurationError('is not a mapping', seen.join('.'));
            }
        }
        node[last] = value;
    }

    /**
     * Merges `override` into this tree with the rules of {@link mergeNodes}.
     */
    merge(override: ConfigNode): void {
        const merged = mergeNodes(this.root, override);
        for (const key of Object.keys(this.root))
            delete this.root[key];
        Object.assign(this.root, merged);
    }

    getString(path: string): string {
        const value = this.get(path);
        if (typeof value === 'number')
            return String(value);
        if (typeof value !== 'string')
            throw new ConfigurationError(`expected a string, got ${describeType(value)}`, path);
        return value;
    }

    getBoolean(path: string): boolean {
        const value = this.get(path);
        if (typeof value !== 'boolean')
            throw new ConfigurationError(`expected a boolean, got ${describeType(value)}`, path);
        return value;
    }

    getNumber(path: string): number {
        const value = this.get(path);
        if (typeof value !== 'number')
            throw new ConfigurationError(`expected a number, got ${describeType(value)}`, path);
        return value;
    }

    getStringList(path: string): string[] {
        const value = this.get(path);
        return expectStringList(value, path);
    }

    getNode(path: string): ConfigNode {
        const value = this.get(path);
        if (!isConfigNode(value))
            throw new ConfigurationError(`expected a mapping, got ${describeType(value)}`, path);
        return value;
    }

    private lookup(path: string): ConfigValue | undefined {
        let value: ConfigValue | undefined = this.root;
        for (const key of path.split('.')) {
            if (!isConfigNode(value) || !Object.prototype.hasOwnProperty.call(value, key))
                return undefined;
            value = value[key];
        }
        return value;
    }
}

/**
 * Checks that `value` is a list of strings.
 */
export function expectStringList(value: ConfigValue | undefined, path: string): string[] {
    if (!Array.isArray(value))
        throw new ConfigurationError(`expected a list, got ${describeType(value)}`, path);
    return value.map((item, i) => {
        if (typeof item === 'number')
            return String(item);
        if (typeof item !== 'string')
            throw new ConfigurationError(`expected a string, got ${describeType(item)}`, `${path}[${i}]`);
        return item;
    });
}

export function describeType(value: ConfigValue | undefined): string {
    if (value === undefined)
        return 'nothing';
    if (value === null)
        return 'null';
    if (Array.isArray(value))
        return 'a list';
    if (isConfigNode(value))
        return 'a mapping';
    return `a ${typeof value}`;
}
