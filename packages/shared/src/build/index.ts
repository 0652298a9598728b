export * from './encryptor';
export * from './one-time-code';
export * from './leak-check';
