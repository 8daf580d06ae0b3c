import { DataHash, LookupResult } from '../domain';
import { Invocation } from '../invocation';
import { LookupKey } from '../lookup-key';
import { MergeStrategy } from '../merge-strategy';

/**
 * Anything that can answer a key lookup: a tier or one hierarchy entry.
 */
export interface DataProvider {
    readonly name: string;
    keyLookup(key: LookupKey, invocation: Invocation, merge: MergeStrategy): LookupResult;
}

/**
 * A provider that owns a hierarchy and may filter the data its entries return.
 */
export interface ParentDataProvider extends DataProvider {
    readonly moduleName?: string;
    validateDataHash?(hash: DataHash, invocation: Invocation): DataHash;
}
