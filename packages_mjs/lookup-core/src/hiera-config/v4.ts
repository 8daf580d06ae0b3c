import { DataHash } from '../domain';
import { ProviderNotFoundError } from '../errors';
import { interpolateString } from '../interpolation';
import { Invocation } from '../invocation';
import { resolvePaths } from '../location-resolver';
import { DataHashFunctionProvider } from '../providers/data-hash-provider';
import { DataProvider, ParentDataProvider } from '../providers/data-provider';
import { deprecate } from '../services';
import { HieraConfig, withDefaults } from './hiera-config';
import { HieraConfigV4Document, HieraConfigV4Schema } from './schemas';

const DEFAULTS: DataHash = {
    datadir: 'data',
    hierarchy: [{ name: 'common', backend: 'yaml' }],
};

/**
 * Named hierarchy entries, each served by a backend. Backends other than
 * `json` and `yaml` come from registered path based provider factories.
 */
export class HieraConfigV4 extends HieraConfig<HieraConfigV4Document> {
    get version(): 4 {
        return 4;
    }

    protected validateConfig(config: DataHash): HieraConfigV4Document {
        const location = this.configPath ?? this.configRoot;
        deprecate(this.services, `hiera.yaml:${location}`,
            `${location}: Use of 'hiera.yaml' version 4 is deprecated. It should be converted to version 5`);
        return this.assertSchema(HieraConfigV4Schema, withDefaults(config, DEFAULTS));
    }

    protected createConfiguredDataProviders(invocation: Invocation, parent: ParentDataProvider): DataProvider[] {
        const providers = new Map<string, DataProvider>();

        for (const entry of this.config.hierarchy) {
            this.assertUniqueName(providers, entry.name);
            const declaredPaths = entry.paths ?? [entry.path ?? entry.name];
            const datadir = this.resolveDatadir(entry.datadir ?? this.config.datadir, invocation);

            if (entry.backend === 'json' || entry.backend === 'yaml') {
                providers.set(entry.name, new DataHashFunctionProvider({
                    name: entry.name,
                    parent,
                    functionName: `${entry.backend}_data`,
                    locations: resolvePaths(datadir, declaredPaths, invocation, this.isDefaultConfig, `.${entry.backend}`),
                    services: this.services,
                }));
            } else {
                providers.set(entry.name, this.factoryCreateDataProvider(invocation, entry.name, parent, entry.backend, datadir, declaredPaths));
            }
        }
        return [...providers.values()];
    }

    private factoryCreateDataProvider(
        invocation: Invocation,
        name: string,
        parent: ParentDataProvider,
        backend: string,
        datadir: string,
        declaredPaths: string[]
    ): DataProvider {
        const factory = this.services.providers.pathBasedProviderFactory(backend);
        if (!factory) {
            throw new ProviderNotFoundError(`No data provider is registered for backend '${backend}'`, this.configPath);
        }

        const paths = declaredPaths.map(declared => interpolateString(declared, invocation, false));
        const locations = factory.resolvePaths(datadir, declaredPaths, paths, invocation);
        return factory.version === 2 ? factory.create(name, locations, parent) : factory.create(name, locations);
    }
}
