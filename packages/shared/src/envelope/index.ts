export * from './codec';
export * from './canonical-json';
export * from './manifest';
