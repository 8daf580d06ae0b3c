/**
 * Runs lookups against the global, environment and module tiers of one session
 * and caches providers and lookup options for the session's lifetime.
 */
import * as fs from 'fs';
import * as path from 'path';
import { DataHash, DataValue, LOOKUP_OPTIONS, LookupResult, Memo, NOT_FOUND, UNRESOLVED, isHash, memo } from './domain';
import { DataBindingError, InvalidKeyError, LookupError, LookupFailedError, ProviderNotFoundError } from './errors';
import { FunctionRegistry } from './functions/registry';
import { v4FunctionConfig } from './hiera-config';
import { CONFIG_FILE_NAME } from './hiera-config/constants';
import { Invocation, KeyLookupService } from './invocation';
import { Logger, createLogger } from './logger';
import { LookupKey } from './lookup-key';
import { MergeSpec, MergeStrategy } from './merge-strategy';
import { EnvironmentDataProvider, GlobalDataProvider, ModuleDataProvider } from './providers/configured-data-provider';
import { DataProvider } from './providers/data-provider';
import { InMemoryProviderRegistry, ProviderRegistry } from './registry';
import { LookupServices, deprecate } from './services';
import { Environment } from './environment';
import { LookupSettingsInput, loadSettings } from './settings';

type Tier = 'global' | 'environment' | 'module';

const TIERS: readonly Tier[] = ['global', 'environment', 'module'];

const GLOBAL_ENV_MERGE = 'Global and Environment';

export interface LookupAdapterOptions {
    environment: Environment;
    settings?: LookupSettingsInput;
    providers?: ProviderRegistry;
    functions?: FunctionRegistry;
    logger?: Logger;
}

export class LookupAdapter implements KeyLookupService {
    private readonly lookupOptions = new Map<string | undefined, DataHash | undefined>();
    // Set while lookup options are computed. Lookups made by interpolating
    // them use first found without options.
    private computingOptions = false;
    private envLookupOptions: Memo<DataValue> = UNRESOLVED;
    private globalProviderMemo: Memo<DataProvider> = UNRESOLVED;
    private envProviderMemo: Memo<DataProvider> = UNRESOLVED;
    private readonly moduleProviders = new Map<string, DataProvider | undefined>();

    constructor(readonly services: LookupServices) { }

    static create(options: LookupAdapterOptions): LookupAdapter {
        const settings = loadSettings(options.settings);
        return new LookupAdapter({
            settings,
            environment: options.environment,
            providers: options.providers ?? new InMemoryProviderRegistry(),
            functions: options.functions ?? FunctionRegistry.withBuiltins(),
            logger: options.logger ?? createLogger(settings.logLevel),
        });
    }

    /**
     * Looks up `key` in all tiers. Without an explicit `merge`, the merge given
     * for the key in lookup_options applies, else first found.
     */
    lookup(key: string, invocation: Invocation, merge?: MergeSpec): LookupResult {
        if (LookupKey.isReserved(key)) {
            invocation.with('invalid_key', LOOKUP_OPTIONS, () => invocation.reportNotFound(key));
            throw new InvalidKeyError(key, `The root key '${LOOKUP_OPTIONS}' is reserved`);
        }

        const lookupKey = LookupKey.parse(key);
        if (!invocation.lookupAdapter) {
            invocation.lookupAdapter = this;
        }

        return invocation.lookup(lookupKey, lookupKey.moduleName, () => {
            if (invocation.onlyExplainOptions) {
                this.doLookup(LookupKey.LOOKUP_OPTIONS, invocation, 'hash');
                return NOT_FOUND;
            }

            let effective = merge;
            if (effective === undefined || effective === null) {
                effective = this.lookupMergeOptions(lookupKey, invocation);
                if (effective !== undefined) {
                    invocation.reportMergeSource(LOOKUP_OPTIONS);
                }
            }
            const strategy = effective;
            return invocation.with('data', lookupKey.toString(), () => this.doLookup(lookupKey, invocation, strategy));
        });
    }

    /** The `merge` entry of the lookup options for `key`, if any. */
    lookupMergeOptions(key: LookupKey, invocation: Invocation): DataValue | undefined {
        return this.lookupLookupOptions(key, invocation)?.merge;
    }

    /** The lookup options for `key`. Options are computed once per module. */
    lookupLookupOptions(key: LookupKey, invocation: Invocation): DataHash | undefined {
        const moduleName = key.moduleName;
        let options: DataHash | undefined;
        if (this.lookupOptions.has(moduleName)) {
            options = this.lookupOptions.get(moduleName);
        } else if (this.computingOptions) {
            return undefined;
        } else {
            this.computingOptions = true;
            let retrieved: DataValue | undefined;
            try {
                retrieved = this.retrieveLookupOptions(moduleName, invocation, MergeStrategy.strategy('hash'));
            } finally {
                this.computingOptions = false;
            }
            if (retrieved !== undefined && !isHash(retrieved)) {
                throw new LookupError(`value of ${LOOKUP_OPTIONS} must be a hash`);
            }
            options = retrieved;
            this.lookupOptions.set(moduleName, options);
        }
        const entry = options?.[key.rootKey];
        return isHash(entry) ? entry : undefined;
    }

    private doLookup(key: LookupKey, invocation: Invocation, merge: MergeSpec): LookupResult {
        const strategy = MergeStrategy.strategy(merge);
        const result = strategy.lookup(TIERS, invocation, tier => this.lookupInTier(tier, key, invocation, strategy));
        return result.found ? key.dig(invocation, result.value) : result;
    }

    private lookupInTier(tier: Tier, key: LookupKey, invocation: Invocation, merge: MergeStrategy): LookupResult {
        switch (tier) {
            case 'global':
                return this.lookupGlobal(key, invocation, merge);
            case 'environment':
                return this.lookupInEnvironment(key, invocation, merge);
            case 'module':
                return this.lookupInModule(key, invocation, merge);
        }
    }

    private lookupGlobal(key: LookupKey, invocation: Invocation, merge: MergeStrategy): LookupResult {
        const terminus = this.services.settings.dataBindingTerminus;
        if (terminus === 'none' || terminus === '') {
            return invocation.reportNotFound(key.rootKey);
        }

        if (terminus === 'hiera') {
            const provider = this.globalProvider();
            return provider ? provider.keyLookup(key, invocation, merge) : NOT_FOUND;
        }

        const binding = this.services.providers.dataBindingTerminus(terminus);
        if (!binding) {
            throw new ProviderNotFoundError(`No data binding terminus named '${terminus}' is registered`);
        }
        return invocation.with('global', `using terminus '${terminus}'`, () => {
            let outcome: LookupResult;
            try {
                outcome = binding.find(key.rootKey, {
                    environment: this.services.environment.name,
                    variables: invocation.scope,
                    merge,
                });
            } catch (error) {
                if (error instanceof DataBindingError) {
                    throw new LookupFailedError(invocation.topKey, error);
                }
                throw error;
            }
            return outcome.found ? invocation.reportFound(key.rootKey, outcome.value) : invocation.reportNotFound(key.rootKey);
        });
    }

    private lookupInEnvironment(key: LookupKey, invocation: Invocation, merge: MergeStrategy): LookupResult {
        const provider = this.envProvider(invocation);
        return provider ? provider.keyLookup(key, invocation, merge) : NOT_FOUND;
    }

    private lookupInModule(key: LookupKey, invocation: Invocation, merge: MergeStrategy): LookupResult {
        const moduleName = invocation.moduleName;
        if (moduleName === undefined) {
            return NOT_FOUND;
        }

        const provider = this.moduleProvider(moduleName);
        if (!provider) {
            if (this.services.environment.module(moduleName) === undefined) {
                invocation.reportModuleNotFound(moduleName);
            } else {
                invocation.reportModuleProviderNotFound(moduleName);
            }
            return NOT_FOUND;
        }
        return provider.keyLookup(key, invocation, merge);
    }

    /**
     * Lookup options that apply to a module: those of the global and environment
     * tiers combined with the module's own.
     */
    private retrieveLookupOptions(moduleName: string | undefined, invocation: Invocation, merge: MergeStrategy): DataValue | undefined {
        const meta = new Invocation(invocation.scope, { explainer: invocation.explainer });
        meta.lookupAdapter = this;

        return meta.lookup(LookupKey.LOOKUP_OPTIONS, moduleName, () =>
            meta.with('meta', LOOKUP_OPTIONS, () => {
                const envOptions = this.environmentLookupOptions(meta, merge);
                const moduleOptions = this.lookupInModule(LookupKey.LOOKUP_OPTIONS, meta, merge);
                if (!moduleOptions.found) {
                    return envOptions;
                }
                const moduleValue = moduleOptions.value;
                if (envOptions === undefined) {
                    return moduleValue;
                }
                const merged = merge.lookup([GLOBAL_ENV_MERGE, `Module ${moduleName}`], meta, source =>
                    meta.with('scope', source, () =>
                        meta.reportFound(LOOKUP_OPTIONS, source === GLOBAL_ENV_MERGE ? envOptions : moduleValue)
                    )
                );
                return merged.found ? merged.value : undefined;
            })
        );
    }

    /** Global and environment lookup options, computed once. */
    private environmentLookupOptions(invocation: Invocation, merge: MergeStrategy): DataValue | undefined {
        const cached = this.envLookupOptions;
        if (cached.resolved) {
            return cached.value;
        }

        const global = this.lookupGlobal(LookupKey.LOOKUP_OPTIONS, invocation, merge);
        const environment = this.lookupInEnvironment(LookupKey.LOOKUP_OPTIONS, invocation, merge);
        let value: DataValue | undefined;
        if (!global.found) {
            value = environment.found ? environment.value : undefined;
        } else if (!environment.found) {
            value = global.value;
        } else {
            value = merge.merge(global.value, environment.value);
        }
        this.envLookupOptions = memo(value);
        return value;
    }

    private globalProvider(): DataProvider | undefined {
        const cached = this.globalProviderMemo;
        if (cached.resolved) {
            return cached.value;
        }
        const configPath = this.services.settings.hieraConfig;
        const provider = configPath === null ? undefined : new GlobalDataProvider(this.services, configPath);
        this.globalProviderMemo = memo(provider);
        return provider;
    }

    private envProvider(invocation: Invocation): DataProvider | undefined {
        const cached = this.envProviderMemo;
        if (cached.resolved) {
            return cached.value;
        }
        const provider = this.initializeEnvProvider(invocation);
        this.envProviderMemo = memo(provider);
        return provider;
    }

    private moduleProvider(moduleName: string): DataProvider | undefined {
        if (!this.moduleProviders.has(moduleName)) {
            this.moduleProviders.set(moduleName, this.initializeModuleProvider(moduleName));
        }
        return this.moduleProviders.get(moduleName);
    }

    private initializeEnvProvider(invocation: Invocation): DataProvider | undefined {
        const environment = this.services.environment;
        const envPath = environment.configuration?.pathToEnv;
        if (envPath === undefined) {
            return undefined;
        }

        let providerName = environment.configuration?.environmentDataProvider;
        const configPath = path.join(envPath, CONFIG_FILE_NAME);
        const envConf = path.join(envPath, 'environment.conf');

        let ep: EnvironmentDataProvider | undefined;
        if (fs.existsSync(configPath)) {
            ep = new EnvironmentDataProvider(this.services, envPath);
            // A version 5 hiera.yaml wins over the environment's provider setting
            if (ep.config().version >= 5) {
                if (providerName !== undefined) {
                    deprecate(this.services, 'environment.conf#data_provider',
                        `Defining environment_data_provider='${providerName}' in environment.conf is deprecated`, envConf);
                    if (providerName !== 'hiera') {
                        deprecate(this.services, 'environment.conf#data_provider_overridden',
                            `The environment_data_provider='${providerName}' setting is ignored since '${configPath}' version >= 5`, envConf);
                    }
                }
                providerName = undefined;
            }
        }

        if (providerName === undefined) {
            return ep;
        }

        const suffix = ep ? '' : `. A '${CONFIG_FILE_NAME}' file should be used instead`;
        deprecate(this.services, 'environment.conf#data_provider',
            `Defining environment_data_provider='${providerName}' in environment.conf is deprecated${suffix}`, envConf);

        switch (providerName) {
            case 'none':
                return undefined;
            case 'hiera':
                return ep ?? new EnvironmentDataProvider(this.services, envPath);
            case 'function':
                return new EnvironmentDataProvider(this.services, envPath,
                    v4FunctionConfig(envPath, 'environment::data', this.services));
            default: {
                const factory = this.services.providers.environmentDataProvider(providerName);
                if (!factory) {
                    throw new ProviderNotFoundError(
                        `Environment '${environment.name}', cannot find environment_data_provider '${providerName}'`
                    );
                }
                invocation.reportText(`Using environment data provider '${providerName}'`);
                return factory();
            }
        }
    }

    private initializeModuleProvider(moduleName: string): DataProvider | undefined {
        const environment = this.services.environment;
        const mod = environment.module(moduleName);
        if (!mod) {
            return undefined;
        }

        let providerName = mod.metadata?.data_provider ?? undefined;
        let binding = false;
        if (providerName === undefined) {
            providerName = this.services.providers.boundModuleProviderName(moduleName);
            binding = providerName !== undefined;
        }

        const warn = (message: string): void => binding
            ? deprecate(this.services, `ModuleBinding#data_provider-${moduleName}`, message)
            : deprecate(this.services, `metadata.json#data_provider-${moduleName}`, message, mod.metadataFile);
        const setting = binding
            ? `Defining data_provider '${providerName}' as a module binding is deprecated`
            : `Defining "data_provider": "${providerName}" in metadata.json is deprecated`;

        let mp: ModuleDataProvider | undefined;
        if (mod.hasHieraConf()) {
            mp = new ModuleDataProvider(this.services, moduleName, mod.path);
            // A version 5 hiera.yaml wins over metadata and bindings
            if (mp.config().version >= 5) {
                if (providerName !== undefined) {
                    warn(`${setting}. It is ignored since a '${CONFIG_FILE_NAME}' with version >= 5 is present`);
                }
                providerName = undefined;
            }
        }

        if (providerName === undefined) {
            return mp;
        }
        warn(mp ? setting : `${setting}. A '${CONFIG_FILE_NAME}' file should be used instead`);

        switch (providerName) {
            case 'none':
                return undefined;
            case 'hiera':
                return mp ?? new ModuleDataProvider(this.services, moduleName, mod.path);
            case 'function':
                return new ModuleDataProvider(this.services, moduleName, mod.path,
                    v4FunctionConfig(mod.path, `${moduleName}::data`, this.services));
            default: {
                const factory = this.services.providers.moduleDataProvider(providerName);
                if (!factory) {
                    throw new ProviderNotFoundError(
                        `Environment '${environment.name}', cannot find module_data_provider '${providerName}'`
                    );
                }
                return factory(moduleName);
            }
        }
    }
}
