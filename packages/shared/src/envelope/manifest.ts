/**
 * Gate manifest embedded in the published page
 */

import type { EmbeddedTier, GateManifest } from '../types';
import { FormatError } from '../errors';

export function serializeGateManifest(manifest: GateManifest): string {
  return JSON.stringify(manifest);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse the embedded manifest text
 * @throws FormatError when the text is not a version 1 manifest
 */
export function parseGateManifest(text: string): GateManifest {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    throw new FormatError('Gate manifest is not JSON');
  }

  if (!isRecord(data) || data.version !== 1 || !isRecord(data.tiers)) {
    throw new FormatError('Unsupported gate manifest');
  }

  const tiers: [string, EmbeddedTier][] = [];
  for (const [tier, value] of Object.entries(data.tiers)) {
    if (!isRecord(value) || !Array.isArray(value.envelopes)) {
      throw new FormatError(`Tier "${tier}" has no envelopes`);
    }
    const envelopes = value.envelopes.filter((item): item is string => typeof item === 'string');
    if (envelopes.length === 0 || envelopes.length !== value.envelopes.length) {
      throw new FormatError(`Tier "${tier}" has invalid envelopes`);
    }
    tiers.push([tier, { envelopes }]);
  }

  return { version: 1, tiers: Object.fromEntries(tiers) };
}
