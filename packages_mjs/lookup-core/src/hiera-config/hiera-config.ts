import * as path from 'path';
import { isDeepStrictEqual } from 'util';
import { z } from 'zod';
import { DataHash, DataValue } from '../domain';
import { ConfigurationError } from '../errors';
import { interpolateString } from '../interpolation';
import { Invocation, ScopeLookupCollectingInvocation } from '../invocation';
import { MergeStrategy } from '../merge-strategy';
import { DataProvider, ParentDataProvider } from '../providers/data-provider';
import { Scope } from '../scope';
import { LookupServices } from '../services';
import { formatIssues } from './schemas';

export type HieraConfigVersion = 3 | 4 | 5;

/**
 * A parsed hierarchy configuration. Builds the ordered list of data providers
 * and rebuilds it when a scope variable used while building it has changed.
 */
export abstract class HieraConfig<TConfig = unknown> {
    protected readonly config: TConfig;
    private dataProviders?: DataProvider[];
    private scopeInterpolations = new Map<string, DataValue | undefined>();

    constructor(
        readonly configRoot: string,
        readonly configPath: string | undefined,
        protected readonly loadedConfig: DataHash,
        protected readonly services: LookupServices
    ) {
        this.config = this.validateConfig({ ...loadedConfig });
    }

    abstract get version(): HieraConfigVersion;

    get name(): string {
        return `hiera configuration version ${this.version}`;
    }

    /** Merge strategy the configuration imposes on hash lookups, if any. */
    get mergeStrategy(): MergeStrategy | undefined {
        return undefined;
    }

    configuredDataProviders(invocation: Invocation, parent: ParentDataProvider): DataProvider[] {
        if (this.dataProviders && this.scopeInterpolationsStable(invocation.scope)) {
            return this.dataProviders;
        }
        if (this.dataProviders) {
            invocation.reportText('Hiera configuration recreated due to change of scope variables used in interpolation expressions');
            this.services.logger.debug(`${this.configPath ?? this.configRoot}: hierarchy rebuilt after scope change`);
        }
        const collecting = new ScopeLookupCollectingInvocation(invocation);
        const providers = this.createConfiguredDataProviders(collecting, parent);
        this.dataProviders = providers;
        this.scopeInterpolations = collecting.scopeInterpolations;
        return providers;
    }

    protected abstract validateConfig(config: DataHash): TConfig;

    protected abstract createConfiguredDataProviders(invocation: Invocation, parent: ParentDataProvider): DataProvider[];

    protected get isDefaultConfig(): boolean {
        return this.configPath === undefined;
    }

    protected error(message: string): ConfigurationError {
        return new ConfigurationError(message, this.configPath);
    }

    protected assertSchema<S extends z.ZodTypeAny>(schema: S, config: unknown): z.output<S> {
        const result = schema.safeParse(config);
        if (!result.success) {
            throw this.error(`The Lookup Configuration has wrong type: ${formatIssues(result.error)}`);
        }
        return result.data;
    }

    protected assertUniqueName(providers: Map<string, DataProvider>, name: string, what = 'Name'): void {
        if (providers.has(name)) {
            throw this.error(`${what} '${name}' defined more than once`);
        }
    }

    protected resolveDatadir(datadir: string, invocation: Invocation): string {
        return path.resolve(this.configRoot, interpolateString(datadir, invocation, false));
    }

    private scopeInterpolationsStable(scope: Scope): boolean {
        for (const [name, value] of this.scopeInterpolations) {
            if (!isDeepStrictEqual(scope.lookupVariable(name), value)) {
                return false;
            }
        }
        return true;
    }
}

/** Fills keys that are missing or null with the given defaults. */
export function withDefaults(config: DataHash, defaults: DataHash): DataHash {
    const result: DataHash = { ...config };
    for (const [key, value] of Object.entries(defaults)) {
        if (result[key] === undefined || result[key] === null) {
            result[key] = value;
        }
    }
    return result;
}
