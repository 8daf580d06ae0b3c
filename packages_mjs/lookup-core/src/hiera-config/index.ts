import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { DataHash, isHash } from '../domain';
import { ConfigurationError } from '../errors';
import { LookupServices, deprecate } from '../services';
import { CONFIG_FILE_NAME } from './constants';
import { HieraConfig, HieraConfigVersion } from './hiera-config';
import { HieraConfigV3 } from './v3';
import { HieraConfigV4 } from './v4';
import { DEFAULT_CONFIG, HieraConfigV5 } from './v5';

export { HieraConfig, withDefaults } from './hiera-config';
export type { HieraConfigVersion } from './hiera-config';
export { HieraConfigV3 } from './v3';
export { HieraConfigV4 } from './v4';
export { DEFAULT_CONFIG, HieraConfigV5 } from './v5';

type HieraConfigConstructor = new (
    configRoot: string,
    configPath: string | undefined,
    document: DataHash,
    services: LookupServices
) => HieraConfig;

const CONFIG_VERSIONS: Record<HieraConfigVersion, HieraConfigConstructor> = {
    3: HieraConfigV3,
    4: HieraConfigV4,
    5: HieraConfigV5,
};

function isSupportedVersion(version: number): version is HieraConfigVersion {
    return version === 3 || version === 4 || version === 5;
}

/**
 * Creates a configuration from a parsed document. A document without
 * `version` is a version 3 document.
 */
export function createHieraConfig(
    configRoot: string,
    configPath: string | undefined,
    document: DataHash,
    services: LookupServices
): HieraConfig {
    const declared = document.version;
    const version = declared === undefined || declared === null ? 3 : Number(declared);
    if (!isSupportedVersion(version)) {
        throw new ConfigurationError(
            `This runtime does not support ${CONFIG_FILE_NAME} version '${String(declared)}'`,
            configPath ?? configRoot
        );
    }
    return new CONFIG_VERSIONS[version](configRoot, configPath, { ...document, version }, services);
}

/**
 * Loads the configuration at `configPath`. When the file does not exist, the
 * default version 5 configuration is used with the file's directory as root.
 */
export function loadHieraConfig(configPath: string, services: LookupServices): HieraConfig {
    const configRoot = path.dirname(configPath);
    if (!fs.existsSync(configPath)) {
        services.logger.debug(`${configPath} not found, using default configuration`);
        return createHieraConfig(configRoot, undefined, DEFAULT_CONFIG, services);
    }

    let loaded: unknown;
    try {
        loaded = yaml.load(fs.readFileSync(configPath, 'utf-8'), { schema: yaml.CORE_SCHEMA, filename: configPath });
    } catch (error) {
        throw new ConfigurationError(
            `Unable to parse configuration: ${error instanceof Error ? error.message : String(error)}`,
            configPath
        );
    }
    if (loaded === undefined || loaded === null) {
        loaded = {};
    }
    if (!isHash(loaded)) {
        throw new ConfigurationError('The Lookup Configuration must be a Hash', configPath);
    }
    return createHieraConfig(configRoot, configPath, loaded, services);
}

/**
 * A one-entry configuration that serves all data from a legacy provider function.
 */
export function v4FunctionConfig(configRoot: string, functionName: string, services: LookupServices): HieraConfigV5 {
    deprecate(services, 'legacy_provider_function',
        `Using of legacy data provider function '${functionName}'. Please convert to a 'data_hash' function`);
    return new HieraConfigV5(configRoot, undefined, {
        version: 5,
        hierarchy: [{ name: `Legacy function '${functionName}'`, v4_data_hash: functionName }],
    }, services);
}
