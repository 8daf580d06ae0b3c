/**
 * Merge strategies combine the values found in an ordered list of sources.
 *
 * Earlier sources have higher priority for every strategy except `reverse_deep`.
 */
import { isDeepStrictEqual } from 'util';
import { z } from 'zod';
import { DataHash, DataValue, LookupResult, NOT_FOUND, found, isHash, setEntry } from './domain';
import { LookupError, MergeTypeError, UnrecognizedMergeError } from './errors';
import type { Invocation } from './invocation';
import { getLogger, Logger } from './logger';

export type MergeKind = 'first' | 'unique' | 'hash' | 'deep' | 'reverse_deep';

export const MERGE_KINDS: readonly MergeKind[] = ['first', 'unique', 'hash', 'deep', 'reverse_deep'];

export const DeepMergeOptionsSchema = z.object({
    knockout_prefix: z.string().min(1).optional(),
    merge_debug: z.boolean().optional(),
    merge_hash_arrays: z.boolean().optional(),
    sort_merge_arrays: z.boolean().optional(),
}).strict();

export type MergeOptions = z.infer<typeof DeepMergeOptionsSchema>;

const NoOptionsSchema = z.object({}).strict();

/** Anything a caller may pass as `merge`. */
export type MergeSpec = MergeStrategy | DataValue | undefined;

function isMergeKind(value: string): value is MergeKind {
    return (MERGE_KINDS as readonly string[]).includes(value);
}

export abstract class MergeStrategy {
    abstract readonly kind: MergeKind;

    protected constructor(readonly options: MergeOptions = {}) { }

    /**
     * Creates a strategy from nil (first found), a tag, or a hash with a `strategy` entry.
     */
    static strategy(spec: MergeSpec): MergeStrategy {
        if (spec instanceof MergeStrategy) {
            return spec;
        }
        if (spec === undefined || spec === null) {
            return FIRST_FOUND;
        }
        if (typeof spec === 'string') {
            return MergeStrategy.create(spec, {});
        }
        if (isHash(spec)) {
            const { strategy, ...options } = spec;
            if (typeof strategy !== 'string') {
                throw new UnrecognizedMergeError(`The merge options hash must contain a 'strategy' string, got ${JSON.stringify(spec)}`);
            }
            return MergeStrategy.create(strategy, options);
        }
        throw new UnrecognizedMergeError(`Unrecognized value for request 'merge' parameter: '${JSON.stringify(spec)}'`);
    }

    private static create(tag: string, options: DataHash): MergeStrategy {
        if (!isMergeKind(tag)) {
            throw new UnrecognizedMergeError(`Unknown merge strategy: '${tag}'`);
        }

        const schema = tag === 'deep' || tag === 'reverse_deep' ? DeepMergeOptionsSchema : NoOptionsSchema;
        const parsed = schema.safeParse(options);
        if (!parsed.success) {
            throw new UnrecognizedMergeError(
                `Invalid options for merge strategy '${tag}': ${parsed.error.issues.map(i => i.message).join('; ')}`
            );
        }

        switch (tag) {
            case 'first':
                return FIRST_FOUND;
            case 'unique':
                return UNIQUE;
            case 'hash':
                return HASH;
            case 'deep':
                return new DeepMergeStrategy(parsed.data);
            case 'reverse_deep':
                return new ReverseDeepMergeStrategy(parsed.data);
        }
    }

    /** The tag or hash this strategy was created from. */
    get configuration(): string | DataHash {
        const entries = Object.entries(this.options).filter(([, value]) => value !== undefined);
        if (entries.length === 0) {
            return this.kind;
        }
        const configuration: DataHash = { strategy: this.kind };
        for (const [key, value] of entries) {
            if (value !== undefined) configuration[key] = value;
        }
        return configuration;
    }

    /**
     * Calls `attempt` for each source in order and merges what was found.
     * Not-found is returned only when no source produced a value.
     */
    lookup<S>(sources: readonly S[], invocation: Invocation, attempt: (source: S) => LookupResult): LookupResult {
        let result: LookupResult = NOT_FOUND;
        for (const source of sources) {
            const outcome = attempt(source);
            if (!outcome.found) {
                continue;
            }
            const value = this.convertValue(outcome.value);
            result = found(result.found ? this.mergeSingle(result.value, value) : value);
        }
        return result.found ? found(invocation.reportMerged(result.value)) : result;
    }

    /** Merges two values where `e1` comes from the higher priority source. */
    merge(e1: DataValue, e2: DataValue): DataValue {
        return this.mergeSingle(this.convertValue(e1), this.convertValue(e2));
    }

    protected convertValue(value: DataValue): DataValue {
        return value;
    }

    protected abstract mergeSingle(e1: DataValue, e2: DataValue): DataValue;
}

export class FirstFoundStrategy extends MergeStrategy {
    readonly kind = 'first';

    constructor() {
        super();
    }

    lookup<S>(sources: readonly S[], _invocation: Invocation, attempt: (source: S) => LookupResult): LookupResult {
        for (const source of sources) {
            const outcome = attempt(source);
            if (outcome.found) {
                return outcome;
            }
        }
        return NOT_FOUND;
    }

    protected mergeSingle(e1: DataValue): DataValue {
        return e1;
    }
}

export class UniqueMergeStrategy extends MergeStrategy {
    readonly kind = 'unique';

    constructor() {
        super();
    }

    protected convertValue(value: DataValue): DataValue {
        return uniqueValues(Array.isArray(value) ? flatten(value) : [value]);
    }

    protected mergeSingle(e1: DataValue, e2: DataValue): DataValue {
        return uniqueValues([...asArray(e1), ...asArray(e2)]);
    }
}

export class HashMergeStrategy extends MergeStrategy {
    readonly kind = 'hash';

    constructor() {
        super();
    }

    protected convertValue(value: DataValue): DataValue {
        if (!isHash(value)) {
            throw new MergeTypeError(`The merge strategy 'hash' requires Hash values, got ${describe(value)}`);
        }
        return value;
    }

    protected mergeSingle(e1: DataValue, e2: DataValue): DataValue {
        return { ...asHash(e2), ...asHash(e1) };
    }
}

export class DeepMergeStrategy extends MergeStrategy {
    readonly kind: MergeKind = 'deep';
    protected readonly logger: Logger = getLogger();

    constructor(options: MergeOptions = {}) {
        super(options);
    }

    protected mergeSingle(e1: DataValue, e2: DataValue): DataValue {
        return deepMerge(e1, e2, this.options, this.logger);
    }
}

export class ReverseDeepMergeStrategy extends DeepMergeStrategy {
    readonly kind: MergeKind = 'reverse_deep';

    protected mergeSingle(e1: DataValue, e2: DataValue): DataValue {
        return deepMerge(e2, e1, this.options, this.logger);
    }
}

const FIRST_FOUND = new FirstFoundStrategy();
const UNIQUE = new UniqueMergeStrategy();
const HASH = new HashMergeStrategy();

// ========== Helpers ==========

function describe(value: DataValue): string {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'Array';
    return typeof value === 'object' ? 'Hash' : typeof value;
}

function asArray(value: DataValue): DataValue[] {
    return Array.isArray(value) ? value : [value];
}

function asHash(value: DataValue): DataHash {
    if (!isHash(value)) {
        throw new LookupError(`Expected a Hash, got ${describe(value)}`);
    }
    return value;
}

function flatten(values: DataValue[]): DataValue[] {
    const result: DataValue[] = [];
    for (const value of values) {
        if (Array.isArray(value)) {
            result.push(...flatten(value));
        } else {
            result.push(value);
        }
    }
    return result;
}

/** Removes duplicates, keeping the first occurrence of each value. */
export function uniqueValues(values: DataValue[]): DataValue[] {
    const result: DataValue[] = [];
    for (const value of values) {
        if (!result.some(existing => isDeepStrictEqual(existing, value))) {
            result.push(value);
        }
    }
    return result;
}

function isKnockout(value: DataValue, prefix: string | undefined): value is string {
    return prefix !== undefined && typeof value === 'string' && value.startsWith(prefix);
}

function compareValues(a: DataValue, b: DataValue): number {
    if (typeof a === 'number' && typeof b === 'number') {
        return a - b;
    }
    const left = typeof a === 'string' ? a : JSON.stringify(a);
    const right = typeof b === 'string' ? b : JSON.stringify(b);
    return left < right ? -1 : left > right ? 1 : 0;
}

function mergeArrays(high: DataValue[], low: DataValue[], options: MergeOptions, logger: Logger): DataValue[] {
    const prefix = options.knockout_prefix;
    let base = low;

    if (prefix !== undefined) {
        // A bare prefix clears everything of lower priority
        if (high.includes(prefix)) {
            base = [];
        }
        const knockedOut = high
            .filter((value): value is string => isKnockout(value, prefix) && value !== prefix)
            .map(value => value.slice(prefix.length));
        base = base.filter(value => !knockedOut.some(ko => isDeepStrictEqual(ko, value)));
        high = high.filter(value => !isKnockout(value, prefix));
    }

    let merged: DataValue[];
    if (options.merge_hash_arrays && high.length > 0 && base.length > 0 && high.every(isHash) && base.every(isHash)) {
        merged = [];
        const length = Math.max(high.length, base.length);
        for (let i = 0; i < length; i++) {
            if (i < high.length && i < base.length) {
                merged.push(deepMerge(high[i], base[i], options, logger));
            } else {
                merged.push(i < high.length ? high[i] : base[i]);
            }
        }
    } else {
        merged = uniqueValues([...high, ...base]);
    }

    if (options.sort_merge_arrays) {
        merged.sort(compareValues);
    }
    return merged;
}

/**
 * Recursively merges `high` over `low`. Hashes merge per key, arrays are
 * combined with `high` elements first, anything else is replaced by `high`.
 */
export function deepMerge(high: DataValue, low: DataValue, options: MergeOptions = {}, logger: Logger = getLogger()): DataValue {
    const prefix = options.knockout_prefix;

    if (isHash(high) && isHash(low)) {
        const result: DataHash = { ...low };
        for (const [key, value] of Object.entries(high)) {
            if (isKnockout(value, prefix)) {
                delete result[key];
            } else if (Object.prototype.hasOwnProperty.call(result, key)) {
                setEntry(result, key, deepMerge(value, result[key], options, logger));
            } else {
                setEntry(result, key, value);
            }
        }
        return result;
    }

    if (Array.isArray(high) && Array.isArray(low)) {
        return mergeArrays(high, low, options, logger);
    }

    if (options.merge_debug && !isDeepStrictEqual(high, low)) {
        logger.debug(`deep merge: ${JSON.stringify(high)} overrides ${JSON.stringify(low)}`);
    }
    return high;
}
