export * from './module-name';
export * from './types';
export * from './forms';
export * from './alias-resolver';
export * from './module-extractor';
