import { parsePathSegments, PathSegment } from './path-parser';
import { SecurityError } from './errors';
import { TemplateValue } from './types';

const UNSAFE_SEGMENTS = new Set(['__proto__', 'constructor', 'prototype']);

const INDEX_PATTERN = /^\d+$/;

export function isTemplateHash(value: unknown): value is { [key: string]: TemplateValue } {
    return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Walks `path` into `obj`. Returns undefined as soon as a segment cannot be followed.
 */
export function resolvePath(obj: TemplateValue | undefined, path: string | PathSegment[]): TemplateValue | undefined {
    const segments = typeof path === 'string' ? parsePathSegments(path) : path;
    let current: TemplateValue | undefined = obj;

    for (const segment of segments) {
        if (current === null || current === undefined) {
            return undefined;
        }

        // Prevent prototype pollution / unsafe access
        if (UNSAFE_SEGMENTS.has(segment.text)) {
            throw new SecurityError(`Unsafe path segment: ${segment.text}`);
        }

        if (Array.isArray(current)) {
            if (segment.quoted || !INDEX_PATTERN.test(segment.text)) {
                return undefined;
            }
            current = current[Number(segment.text)];
        } else if (isTemplateHash(current)) {
            current = Object.prototype.hasOwnProperty.call(current, segment.text)
                ? current[segment.text]
                : undefined;
        } else {
            return undefined;
        }
    }

    return current;
}
