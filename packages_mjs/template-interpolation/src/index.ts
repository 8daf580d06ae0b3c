export * from './types';
export * from './errors';
export * from './patterns';
export * from './path-parser';
export * from './resolver';
export * from './extractor';
export * from './coercion';
export * from './interpolate';
