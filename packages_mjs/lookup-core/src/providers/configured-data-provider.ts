/**
 * The three tiers whose data comes from a hierarchy configuration.
 */
import * as path from 'path';
import { DataHash, LOOKUP_OPTIONS, LookupResult } from '../domain';
import { ExplainKind } from '../explainer';
import { HieraConfig, loadHieraConfig } from '../hiera-config';
import { CONFIG_FILE_NAME } from '../hiera-config/constants';
import { Invocation } from '../invocation';
import { warnOnce } from '../logger';
import { LookupKey } from '../lookup-key';
import { MergeStrategy } from '../merge-strategy';
import { LookupServices } from '../services';
import { DataProvider, ParentDataProvider } from './data-provider';

export abstract class ConfiguredDataProvider implements ParentDataProvider {
    abstract readonly name: string;
    protected abstract readonly tier: ExplainKind;
    private hieraConfig?: HieraConfig;

    constructor(protected readonly services: LookupServices, config?: HieraConfig) {
        this.hieraConfig = config;
    }

    /** The configuration, loaded on first use. */
    config(): HieraConfig {
        if (!this.hieraConfig) {
            this.hieraConfig = loadHieraConfig(this.configPath(), this.services);
        }
        return this.hieraConfig;
    }

    keyLookup(key: LookupKey, invocation: Invocation, merge: MergeStrategy): LookupResult {
        const config = this.config();
        return invocation.with(this.tier, `(${config.configPath ?? config.name})`, () => {
            const providers = config.configuredDataProviders(invocation, this);
            if (providers.length === 0) {
                return invocation.reportNotFound(key.rootKey);
            }
            const strategy = this.effectiveMerge(config, merge);
            return strategy.lookup(providers, invocation, (provider: DataProvider) => provider.keyLookup(key, invocation, strategy));
        });
    }

    protected effectiveMerge(_config: HieraConfig, merge: MergeStrategy): MergeStrategy {
        return merge;
    }

    protected abstract configPath(): string;
}

/**
 * Global tier, configured by the hiera.yaml named in the settings.
 */
export class GlobalDataProvider extends ConfiguredDataProvider {
    readonly name = 'Global Data Provider';
    protected readonly tier = 'global';

    constructor(services: LookupServices, private readonly globalConfigPath: string, config?: HieraConfig) {
        super(services, config);
    }

    protected configPath(): string {
        return this.globalConfigPath;
    }

    /** A version 3 configuration applies its merge_behavior to hash lookups. */
    protected effectiveMerge(config: HieraConfig, merge: MergeStrategy): MergeStrategy {
        const configured = config.mergeStrategy;
        return merge.kind === 'hash' && configured && configured.kind !== 'first' ? configured : merge;
    }
}

/**
 * Environment tier, configured by `<environment>/hiera.yaml`.
 */
export class EnvironmentDataProvider extends ConfiguredDataProvider {
    readonly name = 'Environment Data Provider';
    protected readonly tier = 'environment';

    constructor(services: LookupServices, private readonly environmentPath: string, config?: HieraConfig) {
        super(services, config);
    }

    protected configPath(): string {
        return path.join(this.environmentPath, CONFIG_FILE_NAME);
    }
}

/**
 * Module tier, configured by `<module>/hiera.yaml`. Only keys qualified with
 * the module name (and lookup_options) are taken from its data.
 */
export class ModuleDataProvider extends ConfiguredDataProvider {
    readonly name: string;
    protected readonly tier = 'module';

    constructor(
        services: LookupServices,
        readonly moduleName: string,
        private readonly modulePath: string,
        config?: HieraConfig
    ) {
        super(services, config);
        this.name = `Module "${moduleName}" Data Provider`;
    }

    protected configPath(): string {
        return path.join(this.modulePath, CONFIG_FILE_NAME);
    }

    validateDataHash(hash: DataHash, invocation: Invocation): DataHash {
        const prefix = `${this.moduleName}::`;
        const result: DataHash = {};
        for (const [key, value] of Object.entries(hash)) {
            if (key === LOOKUP_OPTIONS || key.startsWith(prefix)) {
                result[key] = value;
                continue;
            }
            const message = `Module data for module '${this.moduleName}' must use keys qualified with the name of the module; key '${key}' is ignored`;
            invocation.reportText(message);
            warnOnce(this.services.logger, 'module_data', `${this.moduleName}:${key}`, message);
        }
        return result;
    }
}
