import { LookupResult } from '../domain';
import { Invocation } from '../invocation';
import { ResolvedLocation } from '../location-resolver';
import { LookupKey } from '../lookup-key';
import { FunctionProvider } from './function-provider';

/**
 * Calls a function with the root key. Both found and not-found outcomes are
 * remembered per location.
 */
export class DataDigFunctionProvider extends FunctionProvider {
    readonly functionKind = 'data_dig';

    protected lookupAt(key: LookupKey, invocation: Invocation, location: ResolvedLocation | undefined): LookupResult {
        const context = this.functionContext(location);
        let outcome = context.keyResults.get(key.rootKey);
        if (!outcome) {
            const fn = this.services.functions.dataDig(this.functionName);
            outcome = fn(key.rootKey, this.optionsFor(location), this.providerContext(location, invocation));
            context.keyResults.set(key.rootKey, outcome);
        }
        return outcome.found
            ? this.foundValue(key.rootKey, outcome.value, invocation, location)
            : invocation.reportNotFound(key.rootKey);
    }
}
