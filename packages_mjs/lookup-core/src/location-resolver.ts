/**
 * Turns declared path, glob and uri locations into concrete ordered locations.
 */
import * as fs from 'fs';
import * as path from 'path';
import { glob } from 'glob';
import { interpolateString } from './interpolation';
import { Invocation } from './invocation';

export type LocationKind = 'path' | 'uri';

export class ResolvedLocation {
    private existsMemo?: boolean;

    constructor(
        readonly original: string,
        readonly location: string,
        readonly kind: LocationKind = 'path'
    ) { }

    /** Existence is checked on first use and then remembered. */
    exists(): boolean {
        if (this.kind === 'uri') {
            return true;
        }
        if (this.existsMemo === undefined) {
            this.existsMemo = fs.existsSync(this.location);
        }
        return this.existsMemo;
    }

    toString(): string {
        return this.location;
    }
}

/**
 * Resolves each declared path against `datadir`. For a synthesized (default)
 * configuration, paths that do not exist are left out.
 */
export function resolvePaths(
    datadir: string,
    declaredPaths: readonly string[],
    invocation: Invocation,
    isDefaultConfig: boolean,
    extension?: string
): ResolvedLocation[] {
    const resolved: ResolvedLocation[] = [];
    for (const original of declaredPaths) {
        let interpolated = interpolateString(original, invocation, false);
        if (extension !== undefined && !interpolated.endsWith(extension)) {
            interpolated += extension;
        }
        const location = new ResolvedLocation(original, path.resolve(datadir, interpolated));
        if (isDefaultConfig && !location.exists()) {
            continue;
        }
        resolved.push(location);
    }
    return resolved;
}

/**
 * Expands each glob relative to `datadir`. Matches of one glob are sorted; a file
 * matched by more than one glob is kept at its first position.
 */
export function expandGlobs(
    datadir: string,
    declaredGlobs: readonly string[],
    invocation: Invocation
): ResolvedLocation[] {
    const seen = new Set<string>();
    const resolved: ResolvedLocation[] = [];
    for (const original of declaredGlobs) {
        const pattern = path.resolve(datadir, interpolateString(original, invocation, false));
        const matches = glob.sync(pattern.split(path.sep).join('/'), { nodir: true, absolute: true }).sort();
        for (const match of matches) {
            if (!seen.has(match)) {
                seen.add(match);
                resolved.push(new ResolvedLocation(original, match));
            }
        }
    }
    return resolved;
}

export function expandUris(declaredUris: readonly string[], invocation: Invocation): ResolvedLocation[] {
    return declaredUris.map(original =>
        new ResolvedLocation(original, interpolateString(original, invocation, false), 'uri')
    );
}
