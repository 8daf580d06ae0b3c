/**
 * Registry of pluggable providers, backends and termini, keyed by name.
 */
import { LookupResult } from './domain';
import { Invocation } from './invocation';
import { ResolvedLocation } from './location-resolver';
import { MergeStrategy } from './merge-strategy';
import { DataProvider, ParentDataProvider } from './providers/data-provider';
import type { LegacyBackendFactory } from './providers/v3-backend-provider';
import { Scope } from './scope';

interface PathResolvingFactory {
    /**
     * Turns the interpolated `paths` into locations below `datadir`.
     * `declaredPaths` are the paths as written in the configuration.
     */
    resolvePaths(datadir: string, declaredPaths: string[], paths: string[], invocation: Invocation): ResolvedLocation[];
}

/** Factories of the first generation know nothing of the owning provider. */
export interface PathBasedProviderFactoryV1 extends PathResolvingFactory {
    readonly version?: 1;
    create(name: string, locations: ResolvedLocation[]): DataProvider;
}

export interface PathBasedProviderFactoryV2 extends PathResolvingFactory {
    readonly version: 2;
    create(name: string, locations: ResolvedLocation[], parent: ParentDataProvider): DataProvider;
}

export type PathBasedProviderFactory = PathBasedProviderFactoryV1 | PathBasedProviderFactoryV2;

export type ModuleDataProviderFactory = (moduleName: string) => DataProvider;

export type EnvironmentDataProviderFactory = () => DataProvider;

export interface DataBindingRequest {
    readonly environment: string;
    readonly variables: Scope;
    readonly merge: MergeStrategy;
}

/**
 * An alternative global data source. Failures are signalled with DataBindingError.
 */
export interface DataBindingTerminus {
    find(rootKey: string, request: DataBindingRequest): LookupResult;
}

export interface ProviderRegistry {
    pathBasedProviderFactory(backend: string): PathBasedProviderFactory | undefined;
    moduleDataProvider(name: string): ModuleDataProviderFactory | undefined;
    environmentDataProvider(name: string): EnvironmentDataProviderFactory | undefined;
    /** The provider name bound to a module outside of its metadata, if any. */
    boundModuleProviderName(moduleName: string): string | undefined;
    legacyBackend(name: string): LegacyBackendFactory | undefined;
    dataBindingTerminus(name: string): DataBindingTerminus | undefined;
}

export class InMemoryProviderRegistry implements ProviderRegistry {
    private readonly pathBasedFactories = new Map<string, PathBasedProviderFactory>();
    private readonly moduleProviders = new Map<string, ModuleDataProviderFactory>();
    private readonly environmentProviders = new Map<string, EnvironmentDataProviderFactory>();
    private readonly moduleBindings = new Map<string, string>();
    private readonly legacyBackends = new Map<string, LegacyBackendFactory>();
    private readonly termini = new Map<string, DataBindingTerminus>();

    registerPathBasedProviderFactory(backend: string, factory: PathBasedProviderFactory): this {
        this.pathBasedFactories.set(backend, factory);
        return this;
    }

    registerModuleDataProvider(name: string, factory: ModuleDataProviderFactory): this {
        this.moduleProviders.set(name, factory);
        return this;
    }

    registerEnvironmentDataProvider(name: string, factory: EnvironmentDataProviderFactory): this {
        this.environmentProviders.set(name, factory);
        return this;
    }

    bindModuleProvider(moduleName: string, providerName: string): this {
        this.moduleBindings.set(moduleName, providerName);
        return this;
    }

    registerLegacyBackend(name: string, factory: LegacyBackendFactory): this {
        this.legacyBackends.set(name, factory);
        return this;
    }

    registerDataBindingTerminus(name: string, terminus: DataBindingTerminus): this {
        this.termini.set(name, terminus);
        return this;
    }

    pathBasedProviderFactory(backend: string): PathBasedProviderFactory | undefined {
        return this.pathBasedFactories.get(backend);
    }

    moduleDataProvider(name: string): ModuleDataProviderFactory | undefined {
        return this.moduleProviders.get(name);
    }

    environmentDataProvider(name: string): EnvironmentDataProviderFactory | undefined {
        return this.environmentProviders.get(name);
    }

    boundModuleProviderName(moduleName: string): string | undefined {
        return this.moduleBindings.get(moduleName);
    }

    legacyBackend(name: string): LegacyBackendFactory | undefined {
        return this.legacyBackends.get(name);
    }

    dataBindingTerminus(name: string): DataBindingTerminus | undefined {
        return this.termini.get(name);
    }
}
