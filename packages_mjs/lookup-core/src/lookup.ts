import { DataHash, DataValue } from './domain';
import { KeyNotFoundError } from './errors';
import { Explainer } from './explainer';
import { Invocation } from './invocation';
import { LookupAdapter } from './lookup-adapter';
import { MergeSpec } from './merge-strategy';
import { Scope } from './scope';

export interface LookupOptions {
    merge?: MergeSpec;
    /** Returned when no name is found anywhere. */
    defaultValue?: DataValue;
    /** Per-name defaults, consulted after all data. */
    defaultValuesHash?: DataHash;
    /** Per-name values that win over all data. */
    overrideValues?: DataHash;
    explainer?: Explainer;
}

function has(hash: DataHash, key: string): boolean {
    return Object.prototype.hasOwnProperty.call(hash, key);
}

/**
 * Looks up the first of `names` that has a value. Override values win over
 * data, per-name defaults come after data, and `defaultValue` comes last.
 *
 * @throws KeyNotFoundError when nothing produced a value
 */
export function lookup(adapter: LookupAdapter, names: string | string[], scope: Scope, options: LookupOptions = {}): DataValue {
    const keys = Array.isArray(names) ? names : [names];
    const invocation = new Invocation(scope, {
        overrideValues: options.overrideValues,
        defaultValues: options.defaultValuesHash,
        explainer: options.explainer,
    });
    invocation.lookupAdapter = adapter;

    for (const key of keys) {
        if (has(invocation.overrideValues, key)) {
            return invocation.overrideValues[key];
        }
        const result = adapter.lookup(key, invocation, options.merge);
        if (result.found) {
            return result.value;
        }
    }

    for (const key of keys) {
        if (has(invocation.defaultValues, key)) {
            return invocation.defaultValues[key];
        }
    }

    if (options.defaultValue !== undefined) {
        return options.defaultValue;
    }
    throw new KeyNotFoundError(keys);
}
