/**
 * Error taxonomy of the lookup engine. Not-found is not an error.
 */

export class LookupError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'LookupError';
    }
}

export class InvalidKeyError extends LookupError {
    constructor(public key: string, problem: string) {
        super(`${problem} in key: '${key}'`);
        this.name = 'InvalidKeyError';
    }
}

export class CyclicLookupError extends LookupError {
    constructor(public chain: string[]) {
        super(`Recursive lookup detected in [${chain.join(', ')}]`);
        this.name = 'CyclicLookupError';
    }
}

export class ConfigurationError extends LookupError {
    constructor(message: string, public configPath?: string) {
        super(configPath ? `${configPath}: ${message}` : message);
        this.name = 'ConfigurationError';
    }
}

export class ProviderNotFoundError extends ConfigurationError {
    constructor(message: string, configPath?: string) {
        super(message, configPath);
        this.name = 'ProviderNotFoundError';
    }
}

export class UnrecognizedMergeError extends LookupError {
    constructor(message: string) {
        super(message);
        this.name = 'UnrecognizedMergeError';
    }
}

export class MergeTypeError extends LookupError {
    constructor(message: string) {
        super(message);
        this.name = 'MergeTypeError';
    }
}

export class LookupFailedError extends LookupError {
    constructor(
        public key: string,
        public cause: Error
    ) {
        super(`Lookup of key '${key}' failed: ${cause.message}`);
        this.name = 'LookupFailedError';
    }
}

export class KeyNotFoundError extends LookupError {
    constructor(public names: string[]) {
        super(names.length === 1
            ? `Function lookup() did not find a value for the name '${names[0]}'`
            : `Function lookup() did not find a value for any of the names [${names.map(n => `'${n}'`).join(', ')}]`);
        this.name = 'KeyNotFoundError';
    }
}

/**
 * Raised by a data binding terminus. Re-raised by the global tier as LookupFailedError.
 */
export class DataBindingError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'DataBindingError';
    }
}
