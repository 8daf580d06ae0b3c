import { METHOD_NAMES, MethodName, PATTERNS } from './patterns';
import { extractExpressions, Expression } from './extractor';
import { parsePathSegments } from './path-parser';
import { resolvePath, isTemplateHash } from './resolver';
import { coerceToString } from './coercion';
import { InterpolationError } from './errors';
import { InterpolateOptions, InterpolationContext, TemplateHash, TemplateValue } from './types';

function isMethodName(name: string): name is MethodName {
    return (METHOD_NAMES as readonly string[]).includes(name);
}

function resolveVariable(expression: string, context: InterpolationContext): TemplateValue | undefined {
    const name = expression.replace(PATTERNS.TOP_SCOPE, '');
    if (!name) return undefined;

    const [head, ...rest] = parsePathSegments(name);
    const value = context.lookupVariable(head.text);
    return rest.length === 0 ? value : resolvePath(value, rest);
}

function evaluate(
    expr: Expression,
    context: InterpolationContext,
    allowMethods: boolean,
    isWholeString: boolean
): TemplateValue | undefined {
    if (expr.kind === 'VARIABLE') {
        return resolveVariable(expr.expression, context);
    }

    if (!allowMethods) {
        throw new InterpolationError(`Interpolation using method syntax is not allowed in this context: '${expr.raw}'`);
    }

    const method = expr.method ?? '';
    const argument = expr.argument ?? '';
    if (!isMethodName(method)) {
        throw new InterpolationError(`Unknown interpolation method '${method}'`);
    }

    switch (method) {
        case 'literal':
            return argument;
        case 'scope':
            return resolveVariable(argument, context);
        case 'alias':
            if (!isWholeString) {
                throw new InterpolationError(
                    `'alias' interpolation is only permitted if the expression is equal to the entire string: '${expr.raw}'`
                );
            }
            return lookupKey(argument, context);
        case 'lookup':
        case 'hiera':
            return lookupKey(argument, context);
    }
}

function lookupKey(key: string, context: InterpolationContext): TemplateValue | undefined {
    if (!context.lookupKey) {
        throw new InterpolationError(`Key lookup of '${key}' is not available in this context`);
    }
    return context.lookupKey(key);
}

/**
 * Expands every `%{...}` expression in `template`. A template consisting of a single
 * `%{alias('key')}` expression yields the looked up value as is.
 */
export function interpolateString(
    template: string,
    context: InterpolationContext,
    options: InterpolateOptions = {}
): TemplateValue {
    const expressions = extractExpressions(template);
    if (expressions.length === 0) return template;

    const allowMethods = options.allowMethods !== false;
    const isWholeString = expressions.length === 1
        && expressions[0].start === 0
        && expressions[0].end === template.length;

    let result = "";
    let cursor = 0;
    for (const expr of expressions) {
        result += template.slice(cursor, expr.start);
        const value = evaluate(expr, context, allowMethods, isWholeString);
        if (isWholeString && expr.method === 'alias') {
            return value === undefined ? "" : value;
        }
        result += coerceToString(value);
        cursor = expr.end;
    }

    return result + template.slice(cursor);
}

export function interpolate(
    value: TemplateValue,
    context: InterpolationContext,
    options: InterpolateOptions = {}
): TemplateValue {
    if (typeof value === 'string') {
        return interpolateString(value, context, options);
    }

    if (Array.isArray(value)) {
        return value.map(item => interpolate(item, context, options));
    }

    if (isTemplateHash(value)) {
        const result: TemplateHash = {};
        for (const [key, item] of Object.entries(value)) {
            // defineProperty keeps a '__proto__' key as data
            Object.defineProperty(result, coerceToString(interpolateString(key, context, options)), {
                value: interpolate(item, context, options),
                enumerable: true,
                writable: true,
                configurable: true,
            });
        }
        return result;
    }

    return value;
}
