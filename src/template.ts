/**
 * @module
 * Command templates.
 *
 * A template is a string with `{dotted.field}` placeholders, e.g.
 * `pytest {package.name} --cov-report=xml:{config.testenv.path}/coverage.xml`.
 * `{{` and `}}` produce literal braces, so shell parameter expansion is written as `${{HOME}}`.
 */
import {
    TemplateError,
} from './errors';

/**
 * Values available to placeholders.
 */
export interface TemplateContext {
    [key: string]: unknown;
}

/**
 * Substitutes all placeholders in `template`.
 *
 * Throws {@link TemplateError} for a field that is absent from `context`, is not a scalar,
 * or for an unbalanced brace.
 */
export function formatTemplate(template: string, context: TemplateContext): string {
    let result = '';
    let i = 0;
    while (i < template.length) {
        const c = template[i];
        if (c === '{') {
            if (template[i + 1] === '{') {
                result += '{';
                i += 2;
                continue;
            }
            const end = template.indexOf('}', i + 1);
            if (end < 0)
                throw new TemplateError(template, `'{' at ${i}`, 'is not closed');
            const field = template.slice(i + 1, end).trim();
            result += formatField(template, field, context);
            i = end + 1;
        } else if (c === '}') {
            if (template[i + 1] !== '}')
                throw new TemplateError(template, `'}' at ${i}`, 'is not escaped');
            result += '}';
            i += 2;
        } else {
            result += c;
            i++;
        }
    }
    return result;
}

/**
 * Formats every template in `templates`.
 */
export function formatTemplates(templates: string[], context: TemplateContext): string[] {
    return templates.map(template => formatTemplate(template, context));
}

function formatField(template: string, field: string, context: TemplateContext): string {
    if (!field || !/^[\w-]+(\.[\w-]+)*$/.test(field))
        throw new TemplateError(template, `'${field}'`, 'is not a valid field name');
    let value: unknown = context;
    for (const key of field.split('.')) {
        if (!isRecord(value) || !Object.prototype.hasOwnProperty.call(value, key))
            throw new TemplateError(template, field, 'is not defined');
        value = value[key];
    }
    if (typeof value === 'string')
        return value;
    if (typeof value === 'number' || typeof value === 'boolean')
        return String(value);
    if (value === null || value === undefined)
        throw new TemplateError(template, field, 'is not set');
    throw new TemplateError(template, field, 'is not a scalar');
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
