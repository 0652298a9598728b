/**
 * Gate build entry
 *
 * GATE_SECRETS_FILE=.secret.json GATE_CONTENT_FILE=content.json npm run gate:build
 */

import { GateError } from '@content-gate/shared';
import { loadConfig } from './config';
import { runBuild } from './build';

async function main(): Promise<void> {
  await runBuild(loadConfig());
}

main().catch((error: unknown) => {
  if (error instanceof GateError) {
    console.error(`[gate] Build failed: ${error.message}`);
  } else {
    console.error('[gate] Unexpected error:', error);
  }
  process.exitCode = 1;
});
