import { DataHash, DataValue, LookupResult } from '../domain';
import { ConfigurationError } from '../errors';
import { jsonData, yamlData } from './builtin';
import { ProviderContext } from './context';

/** Returns the whole data hash for one location. */
export type DataHashFunction = (options: DataHash, context: ProviderContext) => DataValue;

/** Returns the value of one root key, or not-found. */
export type DataDigFunction = (key: string, options: DataHash, context: ProviderContext) => LookupResult;

export type LookupKeyFunction = (key: string, options: DataHash, context: ProviderContext) => LookupResult;

/** Legacy functions take no options and return the whole data hash. */
export type V4DataHashFunction = (context: ProviderContext) => DataValue;

/**
 * Named data functions referenced from hierarchy entries.
 */
export class FunctionRegistry {
    private readonly dataHashFunctions = new Map<string, DataHashFunction>();
    private readonly dataDigFunctions = new Map<string, DataDigFunction>();
    private readonly lookupKeyFunctions = new Map<string, LookupKeyFunction>();
    private readonly v4DataHashFunctions = new Map<string, V4DataHashFunction>();

    /** Creates a registry holding the built-in `yaml_data` and `json_data` functions. */
    static withBuiltins(): FunctionRegistry {
        return new FunctionRegistry()
            .registerDataHash('yaml_data', yamlData)
            .registerDataHash('json_data', jsonData);
    }

    registerDataHash(name: string, fn: DataHashFunction): this {
        this.dataHashFunctions.set(name, fn);
        return this;
    }

    registerDataDig(name: string, fn: DataDigFunction): this {
        this.dataDigFunctions.set(name, fn);
        return this;
    }

    registerLookupKey(name: string, fn: LookupKeyFunction): this {
        this.lookupKeyFunctions.set(name, fn);
        return this;
    }

    registerV4DataHash(name: string, fn: V4DataHashFunction): this {
        this.v4DataHashFunctions.set(name, fn);
        return this;
    }

    dataHash(name: string): DataHashFunction {
        return FunctionRegistry.resolve(this.dataHashFunctions, 'data_hash', name);
    }

    dataDig(name: string): DataDigFunction {
        return FunctionRegistry.resolve(this.dataDigFunctions, 'data_dig', name);
    }

    lookupKey(name: string): LookupKeyFunction {
        return FunctionRegistry.resolve(this.lookupKeyFunctions, 'lookup_key', name);
    }

    v4DataHash(name: string): V4DataHashFunction {
        return FunctionRegistry.resolve(this.v4DataHashFunctions, 'v4_data_hash', name);
    }

    private static resolve<F>(functions: Map<string, F>, kind: string, name: string): F {
        const fn = functions.get(name);
        if (!fn) {
            throw new ConfigurationError(`Unable to find '${kind}' function named '${name}'`);
        }
        return fn;
    }
}
