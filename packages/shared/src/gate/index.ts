export * from './lockout';
export * from './session';
export * from './transitions';
export * from './content-gate';
export * from './registry';
