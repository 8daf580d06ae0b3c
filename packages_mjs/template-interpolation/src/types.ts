/**
 * Data shapes understood by the interpolation engine.
 */

export type TemplateValue =
    | string
    | number
    | boolean
    | null
    | TemplateValue[]
    | { [key: string]: TemplateValue };

export type TemplateHash = { [key: string]: TemplateValue };

export interface InterpolationContext {
    /** Value of a scope variable, or undefined when the variable is not set. */
    lookupVariable(name: string): TemplateValue | undefined;

    /**
     * Performs a data lookup for `lookup`, `hiera` and `alias` expressions.
     * Returns undefined when the key is not found.
     */
    lookupKey?(key: string): TemplateValue | undefined;
}

export interface InterpolateOptions {
    /** Permit method expressions such as `%{lookup('key')}`. Defaults to true. */
    allowMethods?: boolean;
}

export type ExpressionKind = 'VARIABLE' | 'METHOD';
