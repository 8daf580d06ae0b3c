import { parsePathSegments, PathSyntaxError, PathSegment } from '@tiered-lookup/template-interpolation';
import { DataValue, LookupResult, LOOKUP_OPTIONS, found, isHash } from './domain';
import { InvalidKeyError } from './errors';
import type { Invocation } from './invocation';

export type KeySegment = string | number;

const INDEX_PATTERN = /^\d+$/;
const MODULE_SEPARATOR = '::';

/**
 * A parsed lookup key: the root key used to query providers, the module that
 * qualifies it, and the sub key segments applied to the value found.
 */
export class LookupKey {
    static readonly LOOKUP_OPTIONS = new LookupKey(LOOKUP_OPTIONS, LOOKUP_OPTIONS, undefined, []);

    private constructor(
        readonly key: string,
        readonly rootKey: string,
        readonly moduleName: string | undefined,
        readonly segments: readonly KeySegment[]
    ) { }

    static isReserved(key: string): boolean {
        return key === LOOKUP_OPTIONS || key.startsWith(`${LOOKUP_OPTIONS}.`);
    }

    static parse(raw: string): LookupKey {
        let parsed: PathSegment[];
        try {
            parsed = parsePathSegments(raw);
        } catch (error) {
            if (error instanceof PathSyntaxError) {
                throw new InvalidKeyError(raw, error.problem);
            }
            throw error;
        }
        if (parsed.length === 0) {
            throw new InvalidKeyError(raw, 'Empty key');
        }

        const [root, ...rest] = parsed;
        const qualifier = root.text.indexOf(MODULE_SEPARATOR);
        const moduleName = qualifier > 0 ? root.text.slice(0, qualifier) : undefined;
        const segments = rest.map(segment =>
            !segment.quoted && INDEX_PATTERN.test(segment.text) ? Number(segment.text) : segment.text
        );

        return new LookupKey(raw, root.text, moduleName, Object.freeze(segments));
    }

    /**
     * Applies the sub key segments to `value`. A segment that cannot be followed
     * makes the whole lookup not-found.
     */
    dig(invocation: Invocation, value: DataValue): LookupResult {
        if (this.segments.length === 0) {
            return found(value);
        }

        return invocation.with('sub_lookup', this.segments.join('.'), () => {
            let current: DataValue = value;
            for (const segment of this.segments) {
                const next = LookupKey.step(current, segment);
                if (next === undefined) {
                    return invocation.reportNotFound(String(segment));
                }
                current = next;
                invocation.reportFound(String(segment), current);
            }
            return found(current);
        });
    }

    toString(): string {
        return this.key;
    }

    private static step(value: DataValue, segment: KeySegment): DataValue | undefined {
        if (Array.isArray(value)) {
            return typeof segment === 'number' && segment < value.length ? value[segment] : undefined;
        }
        if (isHash(value)) {
            const name = String(segment);
            return Object.prototype.hasOwnProperty.call(value, name) ? value[name] : undefined;
        }
        return undefined;
    }
}
