/**
 * Build step: read inputs, encrypt, verify, write the manifest
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  BuildError,
  buildGateManifest,
  findPlaintextLeaks,
  serializeGateManifest,
} from '@content-gate/shared';
import type { BuildResult } from '@content-gate/shared';
import type { BuilderConfig } from './config';
import { createBuildPlan, parseSecretsFile } from './inputs';

export interface RunOptions {
  now?: () => number;
  log?: (message: string) => void;
}

function readJsonFile(filePath: string, label: string): unknown {
  if (!fs.existsSync(filePath)) {
    throw new BuildError(`${label} not found: ${filePath}`);
  }
  try {
    return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new BuildError(`${label} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Produce the gate manifest. Nothing is written unless every tier
 * encrypted and no plaintext turned up in the output.
 */
export async function runBuild(config: BuilderConfig, options: RunOptions = {}): Promise<BuildResult> {
  const log = options.log ?? console.log;

  const secrets = parseSecretsFile(readJsonFile(config.secretsFile, 'Secrets file'));
  const content = readJsonFile(config.contentFile, 'Content file');
  const plan = createBuildPlan(secrets, content);

  log(`[gate] Encrypting ${plan.length} tier(s) with ${config.iterations} PBKDF2 iterations`);
  const result = await buildGateManifest(plan, { iterations: config.iterations, now: options.now });

  const artifact = serializeGateManifest(result.manifest);
  const leaks = findPlaintextLeaks(artifact, plan, result.oneTimeCodes);
  if (leaks.length > 0) {
    const tiers = [...new Set(leaks.map((leak) => leak.tier))].join(', ');
    throw new BuildError(`Plaintext found in built artifact for tier(s): ${tiers}`);
  }

  fs.mkdirSync(path.dirname(config.outputFile), { recursive: true });
  fs.writeFileSync(config.outputFile, artifact, 'utf-8');
  log(`[gate] Written to ${config.outputFile}`);

  for (const issued of result.oneTimeCodes) {
    log(`[gate] One-time code for ${issued.tier}: ${issued.code} (expires ${new Date(issued.expiresAt).toISOString()})`);
  }

  return result;
}
