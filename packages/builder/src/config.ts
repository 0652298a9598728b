/**
 * Builder configuration, read from the environment
 */

import * as path from 'path';
import { BuildError, GATE_DEFAULTS, isValidIterationCount } from '@content-gate/shared';

export interface BuilderConfig {
  secretsFile: string;
  contentFile: string;
  outputFile: string;
  iterations: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): BuilderConfig {
  const iterations = parseInt(env.GATE_PBKDF2_ITERATIONS || String(GATE_DEFAULTS.iterations), 10);
  if (!isValidIterationCount(iterations)) {
    throw new BuildError(`GATE_PBKDF2_ITERATIONS must be between ${GATE_DEFAULTS.minIterations} and ${GATE_DEFAULTS.maxIterations}`);
  }

  return {
    secretsFile: path.resolve(cwd, env.GATE_SECRETS_FILE || '.secret.json'),
    contentFile: path.resolve(cwd, env.GATE_CONTENT_FILE || 'content.json'),
    outputFile: path.resolve(cwd, env.GATE_OUTPUT_FILE || 'dist/gate-manifest.json'),
    iterations,
  };
}
