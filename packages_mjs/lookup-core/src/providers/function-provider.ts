import { DataHash, DataValue, LookupResult, describeType, isData } from '../domain';
import { LookupError } from '../errors';
import { FunctionContext, ProviderContext } from '../functions/context';
import { Invocation } from '../invocation';
import { ResolvedLocation } from '../location-resolver';
import { LookupKey } from '../lookup-key';
import { MergeStrategy } from '../merge-strategy';
import { LookupServices } from '../services';
import { DataProvider, ParentDataProvider } from './data-provider';

export type FunctionKind = 'data_hash' | 'data_dig' | 'lookup_key' | 'v3_backend' | 'v4_data_hash';

export interface FunctionProviderInit {
    name: string;
    functionName: string;
    services: LookupServices;
    parent?: ParentDataProvider;
    options?: DataHash;
    /** Undefined means the function is called once without a location. */
    locations?: ResolvedLocation[];
}

/**
 * One hierarchy entry backed by a named data function.
 */
export abstract class FunctionProvider implements DataProvider {
    abstract readonly functionKind: FunctionKind;

    readonly name: string;
    readonly functionName: string;
    readonly options: DataHash;
    readonly locations?: readonly ResolvedLocation[];
    protected readonly parent?: ParentDataProvider;
    protected readonly services: LookupServices;

    private readonly contexts = new Map<string, FunctionContext>();

    constructor(init: FunctionProviderInit) {
        this.name = init.name;
        this.functionName = init.functionName;
        this.options = init.options ?? {};
        this.locations = init.locations;
        this.parent = init.parent;
        this.services = init.services;
    }

    get fullName(): string {
        return `Hierarchy entry "${this.name}"`;
    }

    keyLookup(key: LookupKey, invocation: Invocation, merge: MergeStrategy): LookupResult {
        return invocation.with('data_provider', this.fullName, () => {
            const sources: ReadonlyArray<ResolvedLocation | undefined> = this.locations ?? [undefined];
            return merge.lookup(sources, invocation, location => {
                if (location === undefined) {
                    return this.lookupAt(key, invocation, undefined, merge);
                }
                return invocation.with('location', location.location, () =>
                    location.exists() ? this.lookupAt(key, invocation, location, merge) : invocation.reportLocationNotFound()
                );
            });
        });
    }

    protected abstract lookupAt(
        key: LookupKey,
        invocation: Invocation,
        location: ResolvedLocation | undefined,
        merge: MergeStrategy
    ): LookupResult;

    protected functionContext(location: ResolvedLocation | undefined): FunctionContext {
        const id = location?.location ?? '';
        let context = this.contexts.get(id);
        if (!context) {
            context = new FunctionContext(this.services.environment.name, this.parent?.moduleName);
            this.contexts.set(id, context);
        }
        return context;
    }

    protected providerContext(location: ResolvedLocation | undefined, invocation: Invocation): ProviderContext {
        return new ProviderContext(this.functionContext(location), invocation);
    }

    /** The entry options plus `path` or `uri` of the location. */
    protected optionsFor(location: ResolvedLocation | undefined): DataHash {
        return location ? { ...this.options, [location.kind]: location.location } : this.options;
    }

    protected describeLocation(location: ResolvedLocation | undefined): string {
        return location ? `, when using location '${location.location}',` : '';
    }

    /** Validates a found value and reports it. */
    protected foundValue(rootKey: string, value: unknown, invocation: Invocation, location?: ResolvedLocation): LookupResult {
        if (!isData(value)) {
            throw new LookupError(
                `Value for key '${rootKey}', returned from ${this.fullName}${this.describeLocation(location)} has wrong type: ${describeType(value)}`
            );
        }
        return invocation.reportFound(rootKey, this.interpolateValue(value, invocation));
    }

    // Values are reported as the function returned them. Functions interpolate
    // through their ProviderContext.
    protected interpolateValue(value: DataValue, _invocation: Invocation): DataValue {
        return value;
    }
}
