import { LookupResult } from '../domain';
import { Invocation } from '../invocation';
import { ResolvedLocation } from '../location-resolver';
import { LookupKey } from '../lookup-key';
import { MergeStrategy } from '../merge-strategy';
import { FunctionProvider } from './function-provider';

/**
 * Calls a function with the root key. Found values are remembered per
 * location; not-found is asked again on the next lookup.
 */
export class LookupKeyFunctionProvider extends FunctionProvider {
    readonly functionKind: 'lookup_key' | 'v3_backend' = 'lookup_key';

    protected lookupAt(
        key: LookupKey,
        invocation: Invocation,
        location: ResolvedLocation | undefined,
        _merge: MergeStrategy
    ): LookupResult {
        const context = this.functionContext(location);
        let outcome = context.keyResults.get(key.rootKey);
        if (!outcome) {
            const fn = this.services.functions.lookupKey(this.functionName);
            outcome = fn(key.rootKey, this.optionsFor(location), this.providerContext(location, invocation));
            if (!outcome.found) {
                return invocation.reportNotFound(key.rootKey);
            }
            context.keyResults.set(key.rootKey, outcome);
        }
        return outcome.found
            ? this.foundValue(key.rootKey, outcome.value, invocation, location)
            : invocation.reportNotFound(key.rootKey);
    }
}
