/**
 * Built-in data_hash functions reading one YAML or JSON file per location.
 */
import * as fs from 'fs';
import * as yaml from 'js-yaml';
import { DataHash, isHash } from '../domain';
import { LookupError } from '../errors';
import { ProviderContext } from './context';

function locationOf(options: DataHash, fn: string): string {
    const location = options.path;
    if (typeof location !== 'string') {
        throw new LookupError(`The '${fn}' function requires a 'path' option`);
    }
    return location;
}

function asDataHash(parsed: unknown, location: string, format: string): DataHash {
    if (parsed === undefined || parsed === null) {
        return {};
    }
    if (!isHash(parsed)) {
        throw new LookupError(`${location}: file does not contain a valid ${format} hash`);
    }
    return parsed;
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export function yamlData(options: DataHash, _context: ProviderContext): DataHash {
    const location = locationOf(options, 'yaml_data');
    let parsed: unknown;
    try {
        parsed = yaml.load(fs.readFileSync(location, 'utf-8'), { schema: yaml.CORE_SCHEMA, filename: location });
    } catch (error) {
        throw new LookupError(`Unable to parse ${location}: ${errorMessage(error)}`);
    }
    return asDataHash(parsed, location, 'yaml');
}

export function jsonData(options: DataHash, _context: ProviderContext): DataHash {
    const location = locationOf(options, 'json_data');
    let parsed: unknown;
    try {
        parsed = JSON.parse(fs.readFileSync(location, 'utf-8'));
    } catch (error) {
        throw new LookupError(`Unable to parse ${location}: ${errorMessage(error)}`);
    }
    return asDataHash(parsed, location, 'json');
}
