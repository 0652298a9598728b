export { loadConfig } from './config';
export type { BuilderConfig } from './config';
export { runBuild } from './build';
export type { RunOptions } from './build';
export { createBuildPlan, parseSecretsFile } from './inputs';
export type { SecretsFile, TierSecrets } from './inputs';
