import { DataHash, DataValue, LookupResult, describeType, isData, isHash } from '../domain';
import { LookupError } from '../errors';
import { interpolate } from '../interpolation';
import { Invocation } from '../invocation';
import { ResolvedLocation } from '../location-resolver';
import { LookupKey } from '../lookup-key';
import { FunctionProvider } from './function-provider';

/**
 * Calls a function that returns the whole data hash of a location and keeps
 * that hash for the rest of the session.
 */
export class DataHashFunctionProvider extends FunctionProvider {
    readonly functionKind: 'data_hash' | 'v4_data_hash' = 'data_hash';

    protected lookupAt(key: LookupKey, invocation: Invocation, location: ResolvedLocation | undefined): LookupResult {
        const hash = this.dataHash(invocation, location);
        if (!Object.prototype.hasOwnProperty.call(hash, key.rootKey)) {
            return invocation.reportNotFound(key.rootKey);
        }
        return this.foundValue(key.rootKey, hash[key.rootKey], invocation, location);
    }

    protected interpolateValue(value: DataValue, invocation: Invocation): DataValue {
        return interpolate(value, invocation, true);
    }

    protected dataHash(invocation: Invocation, location: ResolvedLocation | undefined): DataHash {
        const context = this.functionContext(location);
        if (context.dataHash === undefined) {
            const value: unknown = this.callFunction(invocation, location);
            if (!isHash(value) || !isData(value)) {
                throw new LookupError(
                    `Value returned from ${this.functionKind} function '${this.functionName}'${this.describeLocation(location)} has wrong type: expected a Hash of data, got ${describeType(value)}`
                );
            }
            context.dataHash = this.parent?.validateDataHash ? this.parent.validateDataHash(value, invocation) : value;
        }
        return context.dataHash;
    }

    protected callFunction(invocation: Invocation, location: ResolvedLocation | undefined): DataValue {
        const fn = this.services.functions.dataHash(this.functionName);
        return fn(this.optionsFor(location), this.providerContext(location, invocation));
    }
}
