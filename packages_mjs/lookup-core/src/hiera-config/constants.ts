export const CONFIG_FILE_NAME = 'hiera.yaml';

export const KEY_VERSION = 'version';
export const KEY_NAME = 'name';
export const KEY_DATADIR = 'datadir';
export const KEY_HIERARCHY = 'hierarchy';
export const KEY_DEFAULTS = 'defaults';
export const KEY_OPTIONS = 'options';

export const FUNCTION_KEYS = ['data_hash', 'lookup_key', 'data_dig'] as const;
export const ALL_FUNCTION_KEYS = [...FUNCTION_KEYS, 'v4_data_hash'] as const;
export const LOCATION_KEYS = ['path', 'paths', 'glob', 'globs', 'uri', 'uris'] as const;

/** Option keys set by the provider for each location. */
export const RESERVED_OPTION_KEYS = ['path', 'uri'] as const;

export type ConfiguredFunctionKind = typeof ALL_FUNCTION_KEYS[number];
export type LocationKey = typeof LOCATION_KEYS[number];
