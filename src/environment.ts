/**
 * @module
 * Run-scoped environment.
 *
 * Environment changes made by tasks (activating the test environment, paths exported by an
 * in-place build) are kept in a {@link RunEnvironment} and applied to every later command.
 * The same changes are mirrored in an activate script, so the environment can be recreated
 * in a shell with `source activate-<backend>-<name>.sh`.
 */
import {
    quote,
    RunOptions,
} from './command';
import {
    Progress,
} from './progress';
import fs = require('fs-extra');
import path = require('path');

interface EnvVar {
    value: string;
    /** Separator used to append to an inherited value; undefined for variables that replace it. */
    separator?: string;
}

/**
 * Separator for accumulating values of the variable `name`: `:` for path-like variables,
 * a space for flags.
 */
export function envSeparator(name: string): string {
    return name.includes('PATH') ? ':' : ' ';
}

export class RunEnvironment {
    /** The activate script. */
    readonly fnActivate: string;
    private readonly progress: Progress;
    private readonly activation: string[];
    private readonly vars: Map<string, EnvVar>;
    private written: boolean;

    constructor(fnActivate: string, progress: Progress) {
        this.fnActivate = path.resolve(fnActivate);
        this.progress = progress;
        this.activation = [];
        this.vars = new Map();
        this.written = false;
    }

    /**
     * Shell lines that activate the test environment, run before every command.
     */
    get prelude(): string[] {
        return this.activation.slice();
    }

    /**
     * Adds a line that activates (part of) the test environment.
     */
    async addActivation(line: string): Promise<void> {
        this.activation.push(line);
        await this.writeLine(line);
    }

    /**
     * Sets `name` to `value`, replacing any inherited value.
     */
    async setVar(name: string, value: string): Promise<void> {
        this.vars.set(name, {value});
        await this.writeLine(`export ${name}=${quote(value)}`);
    }

    /**
     * Appends `value` to `name`, after the inherited value and after earlier appends.
     */
    async appendVar(name: string, value: string): Promise<void> {
        const separator = envSeparator(name);
        const current = this.vars.get(name);
        if (current)
            current.value = `${current.value}${current.separator || separator}${value}`;
        else
            this.vars.set(name, {separator, value});
        await this.writeLine(`export ${name}="\${${name}:+\${${name}}${separator}}"${quote(value)}`);
    }

    /**
     * Returns the value `name` will have in commands, or undefined when this run does not set it.
     */
    get(name: string, base: NodeJS.ProcessEnv = process.env): string | undefined {
        const v = this.vars.get(name);
        if (!v)
            return undefined;
        const inherited = base[name];
        if (v.separator !== undefined && inherited)
            return `${inherited}${v.separator}${v.value}`;
        return v.value;
    }

    /**
     * Variables to pass to a command, relative to the environment `base`.
     */
    overlay(base: NodeJS.ProcessEnv = process.env): Record<string, string> {
        const result: Record<string, string> = {};
        for (const name of this.vars.keys()) {
            const value = this.get(name, base);
            if (value !== undefined)
                result[name] = value;
        }
        return result;
    }

    /**
     * Options that run a command in `cwd` within this environment.
     */
    runOptions(cwd?: string): RunOptions {
        return {
            cwd,
            env: this.overlay(),
            prelude: this.prelude,
        };
    }

    /**
     * Plain view of the overlay, for command templates.
     */
    toRecord(): Record<string, string> {
        const result: Record<string, string> = {};
        for (const [name, v] of this.vars)
            result[name] = v.value;
        return result;
    }

    private async writeLine(line: string): Promise<void> {
        if (this.written) {
            await fs.appendFile(this.fnActivate, `${line}\n`);
        } else {
            await fs.writeFile(this.fnActivate, `${line}\n`);
            this.written = true;
        }
        this.progress.env(line);
    }
}
