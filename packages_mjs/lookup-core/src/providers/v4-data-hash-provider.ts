import { DataValue } from '../domain';
import { Invocation } from '../invocation';
import { ResolvedLocation } from '../location-resolver';
import { DataHashFunctionProvider } from './data-hash-provider';

/**
 * Legacy provider function that takes no options and returns the whole data hash.
 */
export class V4DataHashFunctionProvider extends DataHashFunctionProvider {
    readonly functionKind = 'v4_data_hash';

    protected callFunction(invocation: Invocation, location: ResolvedLocation | undefined): DataValue {
        const fn = this.services.functions.v4DataHash(this.functionName);
        return fn(this.providerContext(location, invocation));
    }
}
