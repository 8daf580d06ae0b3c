import type { Environment } from './environment';
import type { FunctionRegistry } from './functions/registry';
import { Logger, warnOnce } from './logger';
import type { ProviderRegistry } from './registry';
import { LookupSettings } from './settings';

/**
 * Everything a lookup session needs from its host. Passed to the adapter at
 * construction so nothing reads process state at lookup time.
 */
export interface LookupServices {
    readonly settings: LookupSettings;
    readonly environment: Environment;
    readonly providers: ProviderRegistry;
    readonly functions: FunctionRegistry;
    readonly logger: Logger;
}

/**
 * Reports a deprecation once per `key`, unless `strict` is off. A deprecation
 * is a warning in every other mode and never stops the lookup.
 */
export function deprecate(services: LookupServices, key: string, message: string, file?: string): void {
    if (services.settings.strict === 'off') {
        return;
    }
    warnOnce(services.logger, 'deprecation', key, file ? `${message} (file: ${file})` : message);
}
