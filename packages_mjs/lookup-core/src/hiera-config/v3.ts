import * as path from 'path';
import { DataHash } from '../domain';
import { Invocation } from '../invocation';
import { resolvePaths } from '../location-resolver';
import { MergeStrategy } from '../merge-strategy';
import { DataHashFunctionProvider } from '../providers/data-hash-provider';
import { DataProvider, ParentDataProvider } from '../providers/data-provider';
import { V3BackendFunctionProvider } from '../providers/v3-backend-provider';
import { deprecate } from '../services';
import { HieraConfig, withDefaults } from './hiera-config';
import { BackendSection, BackendSectionSchema, HieraConfigV3Schema, V3_KEYS } from './schemas';

const DEEP_MERGE_OPTION_KEYS = ['knockout_prefix', 'merge_debug', 'merge_hash_arrays', 'sort_merge_arrays'];

const DEFAULTS: DataHash = {
    version: 3,
    backends: 'yaml',
    hierarchy: ['nodes/%{::trusted.certname}', 'common'],
    logger: 'console',
    merge_behavior: 'native',
    deep_merge_options: {},
};

interface V3Config {
    backends: string[];
    hierarchy: string[];
    mergeBehavior: 'native' | 'array' | 'deep' | 'deeper';
    deepMergeOptions: Record<string, string | boolean>;
    backendSections: Map<string, BackendSection>;
}

/**
 * Legacy configuration: one provider per backend, all sharing one hierarchy of
 * path templates.
 */
export class HieraConfigV3 extends HieraConfig<V3Config> {
    private mergeStrategyMemo?: MergeStrategy;

    get version(): 3 {
        return 3;
    }

    get mergeStrategy(): MergeStrategy {
        if (!this.mergeStrategyMemo) {
            this.mergeStrategyMemo = this.createMergeStrategy();
        }
        return this.mergeStrategyMemo;
    }

    protected validateConfig(config: DataHash): V3Config {
        const location = this.configPath ?? this.configRoot;
        deprecate(this.services, `hiera.yaml:${location}`,
            `${location}: Use of 'hiera.yaml' version 3 is deprecated. It should be converted to version 5`);

        const document = withDefaults(config, DEFAULTS);
        const parsed = this.assertSchema(HieraConfigV3Schema.passthrough(), document);
        const backends = typeof parsed.backends === 'string' ? [parsed.backends] : parsed.backends;

        for (const key of Object.keys(document)) {
            if (!V3_KEYS.includes(key) && !backends.includes(key)) {
                throw this.error(`The Lookup Configuration has wrong type: unrecognized key '${key}'`);
            }
        }

        const backendSections = new Map<string, BackendSection>();
        for (const backend of backends) {
            backendSections.set(backend, this.assertSchema(BackendSectionSchema, document[backend] ?? {}));
        }

        return {
            backends,
            hierarchy: typeof parsed.hierarchy === 'string' ? [parsed.hierarchy] : parsed.hierarchy,
            mergeBehavior: parsed.merge_behavior,
            deepMergeOptions: parsed.deep_merge_options,
            backendSections,
        };
    }

    protected createConfiguredDataProviders(invocation: Invocation, parent: ParentDataProvider): DataProvider[] {
        const defaultDatadir = path.join(this.services.settings.codedir, 'environments', '%{::environment}', 'hieradata');
        const providers = new Map<string, DataProvider>();

        for (const backend of this.config.backends) {
            this.assertUniqueName(providers, backend, 'Backend');
            const section = this.config.backendSections.get(backend);
            const datadir = this.resolveDatadir(section?.datadir ?? defaultDatadir, invocation);
            const locations = resolvePaths(datadir, this.config.hierarchy, invocation, this.isDefaultConfig, `.${backend}`);

            if (backend === 'json' || backend === 'yaml') {
                providers.set(backend, new DataHashFunctionProvider({
                    name: backend,
                    parent,
                    functionName: `${backend}_data`,
                    locations,
                    services: this.services,
                }));
            } else {
                providers.set(backend, new V3BackendFunctionProvider({
                    name: backend,
                    parent,
                    functionName: 'hiera_v3_data',
                    locations: locations.length === 0 ? undefined : locations,
                    services: this.services,
                    loadedConfig: this.loadedConfig,
                }));
            }
        }
        return [...providers.values()];
    }

    private createMergeStrategy(): MergeStrategy {
        switch (this.config.mergeBehavior) {
            case 'native':
                return MergeStrategy.strategy('first');
            case 'array':
                return MergeStrategy.strategy('unique');
            case 'deep':
            case 'deeper': {
                // 'deep' lets later hierarchy levels win, 'deeper' earlier ones
                const merge: DataHash = { strategy: this.config.mergeBehavior === 'deep' ? 'reverse_deep' : 'deep' };
                for (const [key, value] of Object.entries(this.config.deepMergeOptions)) {
                    if (DEEP_MERGE_OPTION_KEYS.includes(key)) {
                        merge[key] = value;
                    } else {
                        this.services.logger.warn(
                            `${this.configPath ?? this.configRoot}: merge_option '${key}' is not recognized. Option is ignored`
                        );
                    }
                }
                return MergeStrategy.strategy(merge);
            }
        }
    }
}
