/**
 * Shared data shapes for the lookup engine.
 */

import type { TemplateValue, TemplateHash } from '@tiered-lookup/template-interpolation';

export type DataValue = TemplateValue;
export type DataHash = TemplateHash;

/** The reserved root key holding per-key lookup options. */
export const LOOKUP_OPTIONS = 'lookup_options';

/**
 * Outcome of one lookup attempt. Not-found is a value, never an exception.
 */
export type LookupResult<T = DataValue> =
    | { readonly found: true; readonly value: T }
    | { readonly found: false };

export const NOT_FOUND: { readonly found: false } = Object.freeze({ found: false });

export function found<T>(value: T): LookupResult<T> {
    return { found: true, value };
}

export function isHash(value: unknown): value is DataHash {
    return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Sets `key` as an own entry of `hash`, including a key named `__proto__`. */
export function setEntry(hash: DataHash, key: string, value: DataValue): void {
    Object.defineProperty(hash, key, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * Memo cell distinguishing "not yet resolved" from "resolved to nothing".
 */
export type Memo<T> =
    | { readonly resolved: false }
    | { readonly resolved: true; readonly value: T | undefined };

export const UNRESOLVED: Memo<never> = Object.freeze({ resolved: false });

export function memo<T>(value: T | undefined): Memo<T> {
    return { resolved: true, value };
}

/** True when `value` is a string, number, boolean, null, or an array or hash of those. */
export function isData(value: unknown): value is DataValue {
    if (value === null || typeof value === 'string' || typeof value === 'boolean') {
        return true;
    }
    if (typeof value === 'number') {
        return Number.isFinite(value);
    }
    if (Array.isArray(value)) {
        return value.every(isData);
    }
    return isHash(value) && Object.values(value).every(isData);
}

export function describeType(value: unknown): string {
    if (value === null) return 'null';
    if (value === undefined) return 'undefined';
    if (Array.isArray(value)) return 'Array';
    return typeof value === 'object' ? 'Hash' : typeof value;
}
