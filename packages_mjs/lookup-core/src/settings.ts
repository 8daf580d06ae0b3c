/**
 * Runtime settings for a lookup session.
 */
import { z } from 'zod';
import { LOG_LEVELS } from './logger';

export const StrictModeSchema = z.enum(['off', 'warning', 'error']);

export type StrictMode = z.infer<typeof StrictModeSchema>;

export const LookupSettingsSchema = z.object({
    strict: StrictModeSchema.default('warning'),
    // 'hiera' uses the global hiera.yaml, 'none' or '' disables the global tier,
    // any other name selects a registered data binding terminus
    dataBindingTerminus: z.string().default('hiera'),
    hieraConfig: z.string().min(1).nullable().default(null),
    codedir: z.string().min(1).default('/etc/tiered-lookup/code'),
    logLevel: z.enum(LOG_LEVELS).default('info'),
}).strict();

export type LookupSettings = z.infer<typeof LookupSettingsSchema>;

export type LookupSettingsInput = z.input<typeof LookupSettingsSchema>;

const ENV_KEYS: Record<keyof LookupSettings, string> = {
    strict: 'TIERED_LOOKUP_STRICT',
    dataBindingTerminus: 'TIERED_LOOKUP_DATA_BINDING_TERMINUS',
    hieraConfig: 'TIERED_LOOKUP_HIERA_CONFIG',
    codedir: 'TIERED_LOOKUP_CODEDIR',
    logLevel: 'TIERED_LOOKUP_LOG_LEVEL',
};

/**
 * Builds settings from explicit overrides, then environment variables, then defaults.
 */
export function loadSettings(
    overrides: LookupSettingsInput = {},
    env: Record<string, string | undefined> = process.env
): LookupSettings {
    const fromEnv: Record<string, string> = {};
    for (const [setting, envVar] of Object.entries(ENV_KEYS)) {
        const value = env[envVar];
        if (value !== undefined) {
            fromEnv[setting] = value;
        }
    }

    return LookupSettingsSchema.parse({ ...fromEnv, ...overrides });
}

export function validateSettings(settings: unknown): boolean {
    return LookupSettingsSchema.safeParse(settings).success;
}
