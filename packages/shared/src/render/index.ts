export * from './safe-url';
export * from './render-tree';
