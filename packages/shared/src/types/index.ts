export * from './crypto';
export * from './content';
