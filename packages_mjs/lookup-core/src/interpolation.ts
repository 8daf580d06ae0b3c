import {
    interpolate as interpolateTemplate,
    interpolateString as interpolateTemplateString,
    coerceToString,
    InterpolationContext,
    InterpolationError,
    SecurityError
} from '@tiered-lookup/template-interpolation';
import { DataValue } from './domain';
import { LookupError } from './errors';
import { Invocation } from './invocation';

function contextFor(invocation: Invocation): InterpolationContext {
    return {
        lookupVariable: (name) => invocation.lookupScopeVariable(name),
        lookupKey: (key) => {
            const adapter = invocation.lookupAdapter;
            if (!adapter) {
                throw new LookupError(`Interpolation of '${key}' requires a lookup adapter`);
            }
            const result = adapter.lookup(key, invocation, undefined);
            return result.found ? result.value : undefined;
        }
    };
}

function rethrow(error: unknown): never {
    if (error instanceof InterpolationError || error instanceof SecurityError) {
        throw new LookupError(error.message);
    }
    throw error;
}

/**
 * Interpolates every string in `value` against the invocation's scope. Method
 * expressions (`lookup`, `alias`, ...) are only evaluated when `allowMethods` is set.
 */
export function interpolate(value: DataValue, invocation: Invocation, allowMethods: boolean): DataValue {
    try {
        return interpolateTemplate(value, contextFor(invocation), { allowMethods });
    } catch (error) {
        return rethrow(error);
    }
}

export function interpolateString(template: string, invocation: Invocation, allowMethods: boolean): string {
    try {
        return coerceToString(interpolateTemplateString(template, contextFor(invocation), { allowMethods }));
    } catch (error) {
        return rethrow(error);
    }
}
