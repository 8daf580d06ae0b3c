import { DataHash, DataValue, LookupResult, NOT_FOUND, found } from '../domain';
import { interpolate } from '../interpolation';
import { Invocation } from '../invocation';

/**
 * State kept for one provider and location across lookups of a session.
 */
export class FunctionContext {
    readonly cache = new Map<string, DataValue>();
    readonly keyResults = new Map<string, LookupResult>();
    dataHash?: DataHash;

    constructor(
        readonly environmentName: string,
        readonly moduleName: string | undefined
    ) { }
}

/**
 * The view of a session handed to data functions.
 */
export class ProviderContext {
    constructor(
        private readonly functionContext: FunctionContext,
        private readonly invocation: Invocation
    ) { }

    get environmentName(): string {
        return this.functionContext.environmentName;
    }

    get moduleName(): string | undefined {
        return this.functionContext.moduleName;
    }

    cache(key: string, value: DataValue): DataValue {
        this.functionContext.cache.set(key, value);
        return value;
    }

    cacheAll(hash: DataHash): void {
        for (const [key, value] of Object.entries(hash)) {
            this.functionContext.cache.set(key, value);
        }
    }

    cachedValue(key: string): DataValue | undefined {
        return this.functionContext.cache.get(key);
    }

    cacheHasKey(key: string): boolean {
        return this.functionContext.cache.has(key);
    }

    cachedEntries(): Array<[string, DataValue]> {
        return [...this.functionContext.cache.entries()];
    }

    explain(message: () => string): void {
        this.invocation.reportText(message);
    }

    interpolate(value: DataValue): DataValue {
        return interpolate(value, this.invocation, true);
    }

    notFound(): LookupResult {
        return NOT_FOUND;
    }

    found(value: DataValue): LookupResult {
        return found(value);
    }
}
