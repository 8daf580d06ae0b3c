export * from './domain';
export * from './errors';
export * from './logger';
export * from './settings';
export * from './scope';
export * from './explainer';
export * from './invocation';
export * from './lookup-key';
export * from './merge-strategy';
export * from './interpolation';
export * from './location-resolver';
export * from './environment';
export * from './registry';
export * from './services';
export * from './functions/context';
export * from './functions/registry';
export * from './functions/builtin';
export * from './hiera-config';
export * from './hiera-config/constants';
export * from './providers/data-provider';
export * from './providers/function-provider';
export * from './providers/data-hash-provider';
export * from './providers/data-dig-provider';
export * from './providers/lookup-key-provider';
export * from './providers/v3-backend-provider';
export * from './providers/v4-data-hash-provider';
export * from './providers/configured-data-provider';
export * from './lookup-adapter';
export * from './lookup';
