import { PathSyntaxError } from './errors';

export interface PathSegment {
    text: string;
    /** True when the segment was written in quotes and must not be read as an index. */
    quoted: boolean;
}

/**
 * Splits a dotted path such as `a."b.c"[0].d` into its segments.
 * Throws PathSyntaxError on empty segments and unterminated quotes or brackets.
 */
export function parsePathSegments(path: string): PathSegment[] {
    if (!path) return [];

    const segments: PathSegment[] = [];
    let current = "";
    let quoted = false;
    let pending = false;
    let inBracket = false;
    let afterBracket = false;
    let quoteChar: string | null = null;

    const fail = (problem: string): never => {
        throw new PathSyntaxError(problem, path);
    };

    const flush = (): void => {
        if (!pending) fail('Empty segment');
        segments.push({ text: current, quoted });
        current = "";
        quoted = false;
        pending = false;
    };

    for (const char of path) {
        if (quoteChar !== null) {
            if (char === quoteChar) {
                quoteChar = null;
            } else {
                current += char;
            }
            continue;
        }

        if (inBracket) {
            if (char === '"' || char === "'") {
                if (pending) fail('Syntax error');
                quoteChar = char;
                quoted = true;
                pending = true;
            } else if (char === ']') {
                inBracket = false;
                flush();
                afterBracket = true;
            } else {
                if (quoted) fail('Syntax error');
                current += char;
                pending = true;
            }
            continue;
        }

        if (char === '.') {
            if (afterBracket) {
                afterBracket = false;
            } else {
                flush();
            }
        } else if (char === '[') {
            if (pending) flush();
            afterBracket = false;
            inBracket = true;
        } else if (char === '"' || char === "'") {
            if (pending || afterBracket) fail('Syntax error');
            quoteChar = char;
            quoted = true;
            pending = true;
        } else {
            if (quoted || afterBracket) fail('Syntax error');
            current += char;
            pending = true;
        }
    }

    if (quoteChar !== null) fail('Unterminated quote');
    if (inBracket) fail('Unterminated bracket');
    if (pending) {
        flush();
    } else if (!afterBracket) {
        fail('Empty segment');
    }

    return segments;
}

export function parsePath(path: string): string[] {
    return parsePathSegments(path).map(segment => segment.text);
}
