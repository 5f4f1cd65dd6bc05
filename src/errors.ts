/**
 * @module
 * Error types.
 *
 * Every error rondo raises on purpose extends {@link RondoError}, so the CLI can tell
 * a reported failure from a crash.
 */

/**
 * Base class for all rondo errors.
 */
export class RondoError extends Error {
    constructor(message: string) {
        super(message);
        this.name = this.constructor.name;
    }
}

/**
 * Invalid or incomplete configuration.
 */
export class ConfigurationError extends RondoError {
    constructor(message: string, readonly key?: string) {
        super(key ? `${key}: ${message}` : message);
    }
}

/**
 * Lookup of a configuration key that is not set.
 */
export class NotFoundError extends RondoError {
    constructor(readonly key: string) {
        super(`configuration key ${key} is not set`);
    }
}

/**
 * Malformed version tag.
 */
export class TagError extends RondoError {
    constructor(readonly tag: string, readonly field: string, reason: string) {
        super(`invalid version tag '${tag}': ${field} ${reason}`);
    }
}

/**
 * Command template references a field that cannot be formatted.
 */
export class TemplateError extends RondoError {
    constructor(readonly template: string, readonly field: string, reason: string) {
        super(`cannot format '${template}': ${field} ${reason}`);
    }
}

export class UnknownToolError extends RondoError {
    constructor(readonly tool: string, where?: string) {
        super(where ? `unknown tool '${tool}' in ${where}` : `unknown tool '${tool}'`);
    }
}

export class UnknownTaskError extends RondoError {
    constructor(readonly task: string, where?: string) {
        super(where ? `unknown task '${task}' in ${where}` : `unknown task '${task}'`);
    }
}

/**
 * The task graph contains a cycle. `path` starts and ends with the same task.
 */
export class CycleError extends RondoError {
    constructor(readonly path: string[]) {
        super(`circular dependency detected: ${path.join(' -> ')}`);
    }
}

/**
 * An external command exited with a non-zero code.
 */
export class ExternalProcessFailure extends RondoError {
    constructor(
        readonly command: string,
        readonly code: number,
        readonly stdout: string,
        readonly stderr: string,
        signal?: string | null,
    ) {
        super(`command returned code ${code}${signal ? `, signal ${signal}` : ''}: ${command}`);
    }
}
