/**
 * Adapts backends written for version 3 configurations to the provider model.
 */
import { DataHash, DataValue, LookupResult, NOT_FOUND, found } from '../domain';
import { Invocation } from '../invocation';
import { ResolvedLocation } from '../location-resolver';
import { LookupKey } from '../lookup-key';
import { MergeStrategy } from '../merge-strategy';
import { Scope } from '../scope';
import { FunctionProviderInit } from './function-provider';
import { LookupKeyFunctionProvider } from './lookup-key-provider';

export type LegacyBehavior = 'native' | 'deep' | 'deeper';

/** How a legacy backend is asked to combine its hierarchy levels. */
export type LegacyResolutionType =
    | undefined
    | 'array'
    | {
        behavior: LegacyBehavior;
        knockout_prefix?: string;
        merge_debug?: boolean;
        merge_hash_arrays?: boolean;
        sort_merge_arrays?: boolean;
    };

export interface LegacyBackend {
    readonly apiVersion?: 2;
    lookup(key: string, scope: Scope, orderOverride: string | undefined, resolutionType: LegacyResolutionType): LookupResult;
}

/** First generation backends answer null when they have nothing. */
export interface LegacyBackendV1 {
    readonly apiVersion: 1;
    lookup(key: string, scope: Scope, orderOverride: string | undefined, resolutionType: LegacyResolutionType): DataValue | undefined;
}

export type LegacyBackendFactory = (loadedConfig: DataHash) => LegacyBackend | LegacyBackendV1;

class LegacyBackendV1Wrapper implements LegacyBackend {
    constructor(private readonly backend: LegacyBackendV1) { }

    lookup(key: string, scope: Scope, orderOverride: string | undefined, resolutionType: LegacyResolutionType): LookupResult {
        const value = this.backend.lookup(key, scope, orderOverride, resolutionType);
        return value === undefined || value === null ? NOT_FOUND : found(value);
    }
}

/**
 * Maps a merge strategy to the legacy resolution vocabulary. Legacy `deep` is
 * this engine's `reverse_deep` and legacy `deeper` is `deep`.
 */
export function convertMerge(merge: MergeStrategy): LegacyResolutionType {
    switch (merge.kind) {
        case 'first':
            return undefined;
        case 'unique':
            return 'array';
        case 'hash':
            return { behavior: 'native' };
        case 'deep':
            return { behavior: 'deeper', ...merge.options };
        case 'reverse_deep':
            return { behavior: 'deep', ...merge.options };
    }
}

export interface V3BackendProviderInit extends FunctionProviderInit {
    /** The whole configuration document, handed to the backend factory. */
    loadedConfig: DataHash;
}

export class V3BackendFunctionProvider extends LookupKeyFunctionProvider {
    readonly functionKind = 'v3_backend';

    private readonly loadedConfig: DataHash;
    private backend?: LegacyBackend;

    constructor(init: V3BackendProviderInit) {
        super(init);
        this.loadedConfig = init.loadedConfig;
    }

    protected lookupAt(
        key: LookupKey,
        invocation: Invocation,
        _location: ResolvedLocation | undefined,
        merge: MergeStrategy
    ): LookupResult {
        const backend = this.backend ?? this.instantiateBackend(invocation);
        if (!backend) {
            return invocation.reportNotFound(key.rootKey);
        }
        this.backend = backend;

        const outcome = backend.lookup(key.rootKey, invocation.scope, undefined, convertMerge(merge));
        return outcome.found
            ? this.foundValue(key.rootKey, outcome.value, invocation)
            : invocation.reportNotFound(key.rootKey);
    }

    private instantiateBackend(invocation: Invocation): LegacyBackend | undefined {
        const factory = this.services.providers.legacyBackend(this.name);
        if (!factory) {
            invocation.reportText(`Unable to load backend '${this.name}': no backend with that name is registered`);
            this.services.logger.debug(`backend '${this.name}' is not registered`);
            return undefined;
        }
        try {
            const backend = factory(this.loadedConfig);
            return backend.apiVersion === 1 ? new LegacyBackendV1Wrapper(backend) : backend;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            invocation.reportText(`Unable to load backend '${this.name}': ${message}`);
            this.services.logger.warn(`Unable to load backend '${this.name}': ${message}`);
            return undefined;
        }
    }
}
