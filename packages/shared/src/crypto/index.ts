export * from './utils';
export * from './key-derivation';
export * from './encryption';
