import { DataHash, isHash } from '../domain';
import { interpolate } from '../interpolation';
import { Invocation } from '../invocation';
import { ResolvedLocation, expandGlobs, expandUris, resolvePaths } from '../location-resolver';
import { DataDigFunctionProvider } from '../providers/data-dig-provider';
import { DataHashFunctionProvider } from '../providers/data-hash-provider';
import { DataProvider, ParentDataProvider } from '../providers/data-provider';
import { FunctionProvider, FunctionProviderInit } from '../providers/function-provider';
import { LookupKeyFunctionProvider } from '../providers/lookup-key-provider';
import { V4DataHashFunctionProvider } from '../providers/v4-data-hash-provider';
import {
    ALL_FUNCTION_KEYS,
    ConfiguredFunctionKind,
    FUNCTION_KEYS,
    LOCATION_KEYS,
    RESERVED_OPTION_KEYS,
} from './constants';
import { HieraConfig, withDefaults } from './hiera-config';
import { DefaultsV5, HieraConfigV5Document, HieraConfigV5Schema, HierarchyEntryV5 } from './schemas';

/** The configuration used where no hiera.yaml exists. */
export const DEFAULT_CONFIG: DataHash = Object.freeze({
    version: 5,
    defaults: { datadir: 'data', data_hash: 'yaml_data' },
    hierarchy: [{ name: 'Common', path: 'common.yaml' }],
});

const FUNCTION_PROVIDERS: Record<ConfiguredFunctionKind, new (init: FunctionProviderInit) => FunctionProvider> = {
    data_hash: DataHashFunctionProvider,
    data_dig: DataDigFunctionProvider,
    lookup_key: LookupKeyFunctionProvider,
    v4_data_hash: V4DataHashFunctionProvider,
};

function quoted(keys: readonly string[]): string {
    return keys.map(key => `'${key}'`).join(', ');
}

/**
 * Named hierarchy entries, each naming one data function and at most one kind
 * of location.
 */
export class HieraConfigV5 extends HieraConfig<HieraConfigV5Document> {
    get version(): 5 {
        return 5;
    }

    protected validateConfig(config: DataHash): HieraConfigV5Document {
        const document = this.assertSchema(HieraConfigV5Schema, withDefaults(config, {
            defaults: DEFAULT_CONFIG.defaults,
            hierarchy: DEFAULT_CONFIG.hierarchy,
        }));

        const defaults = document.defaults;
        if (defaults && FUNCTION_KEYS.filter(key => defaults[key] !== undefined).length > 1) {
            throw this.error(`Only one of ${quoted(FUNCTION_KEYS)} can be defined in defaults`);
        }

        for (const entry of document.hierarchy) {
            const functionCount = ALL_FUNCTION_KEYS.filter(key => entry[key] !== undefined).length;
            if (functionCount === 0 && this.defaultFunctionKind(defaults) === undefined) {
                throw this.error(`One of ${quoted(FUNCTION_KEYS)} must be defined in hierarchy '${entry.name}'`);
            }
            if (functionCount > 1) {
                throw this.error(`Only one of ${quoted(FUNCTION_KEYS)} can be defined in hierarchy '${entry.name}'`);
            }
            if (LOCATION_KEYS.filter(key => entry[key] !== undefined).length > 1) {
                throw this.error(`Only one of ${quoted(LOCATION_KEYS)} can be defined in hierarchy '${entry.name}'`);
            }
            for (const reserved of RESERVED_OPTION_KEYS) {
                if (entry.options?.[reserved] !== undefined) {
                    throw this.error(`Option key '${reserved}' used in hierarchy '${entry.name}' is reserved`);
                }
            }
        }
        return document;
    }

    protected createConfiguredDataProviders(invocation: Invocation, parent: ParentDataProvider): DataProvider[] {
        const defaults: DefaultsV5 = this.config.defaults ?? {};
        const defaultDatadir = defaults.datadir ?? 'data';
        const providers = new Map<string, DataProvider>();

        for (const entry of this.config.hierarchy) {
            this.assertUniqueName(providers, entry.name);

            let functionKind: ConfiguredFunctionKind | undefined = ALL_FUNCTION_KEYS.find(key => entry[key] !== undefined);
            let functionName = functionKind ? entry[functionKind] : undefined;
            if (!functionKind) {
                functionKind = this.defaultFunctionKind(defaults);
                functionName = functionKind ? defaults[functionKind] : undefined;
            }
            if (!functionKind || !functionName) {
                throw this.error(`One of ${quoted(FUNCTION_KEYS)} must be defined in hierarchy '${entry.name}'`);
            }

            const datadir = this.resolveDatadir(entry.datadir ?? defaultDatadir, invocation);
            const locations = this.resolveLocations(entry, datadir, invocation);
            if (this.isDefaultConfig && locations !== undefined && locations.length === 0) {
                continue;
            }

            const options = entry.options ? interpolate(entry.options, invocation, false) : {};
            const Provider = FUNCTION_PROVIDERS[functionKind];
            providers.set(entry.name, new Provider({
                name: entry.name,
                parent,
                functionName,
                options: isHash(options) ? options : {},
                locations,
                services: this.services,
            }));
        }
        return [...providers.values()];
    }

    private defaultFunctionKind(defaults: DefaultsV5 | undefined): typeof FUNCTION_KEYS[number] | undefined {
        return defaults ? FUNCTION_KEYS.find(key => defaults[key] !== undefined) : undefined;
    }

    private resolveLocations(entry: HierarchyEntryV5, datadir: string, invocation: Invocation): ResolvedLocation[] | undefined {
        if (entry.paths) return resolvePaths(datadir, entry.paths, invocation, this.isDefaultConfig);
        if (entry.path) return resolvePaths(datadir, [entry.path], invocation, this.isDefaultConfig);
        if (entry.globs) return expandGlobs(datadir, entry.globs, invocation);
        if (entry.glob) return expandGlobs(datadir, [entry.glob], invocation);
        if (entry.uris) return expandUris(entry.uris, invocation);
        if (entry.uri) return expandUris([entry.uri], invocation);
        return undefined;
    }
}
