/**
 * Plaintext leak detection for built artifacts
 */

import type { EmbeddedTier, JsonValue } from '../types';
import type { IssuedOneTimeCode, TierBuildInput } from './encryptor';
import { isJsonValue } from '../envelope/canonical-json';
import { serializeGateManifest } from '../envelope/manifest';

/** Shorter strings collide with base64 text by chance */
const MIN_LEAK_LENGTH = 8;

export interface PlaintextLeak {
  tier: string;
  kind: 'content' | 'password';
}

function collectStrings(value: JsonValue, into: string[]): void {
  if (typeof value === 'string') {
    into.push(value);
  } else if (Array.isArray(value)) {
    value.forEach((item) => collectStrings(item, into));
  } else if (value !== null && typeof value === 'object') {
    Object.entries(value).forEach(([key, item]) => {
      into.push(key);
      collectStrings(item, into);
    });
  }
}

/**
 * List every content string or credential of the given tiers that appears
 * verbatim in the artifact text. Tier names and the manifest's own keys are
 * public, so strings found in a manifest without envelopes are not reported.
 * @param artifact the exact text that gets published
 * @param oneTimeCodes issued codes, including generated ones
 */
export function findPlaintextLeaks(
  artifact: string,
  tiers: TierBuildInput[],
  oneTimeCodes: IssuedOneTimeCode[] = []
): PlaintextLeak[] {
  const skeleton = serializeGateManifest({
    version: 1,
    tiers: Object.fromEntries(tiers.map((input): [string, EmbeddedTier] => [input.tier, { envelopes: [] }])),
  });
  const leaked = (value: string) =>
    value.length >= MIN_LEAK_LENGTH && !skeleton.includes(value) && artifact.includes(value);

  const leaks: PlaintextLeak[] = [];
  for (const input of tiers) {
    const strings: string[] = [];
    if (isJsonValue(input.content)) {
      collectStrings(input.content, strings);
    }
    if (strings.some(leaked)) {
      leaks.push({ tier: input.tier, kind: 'content' });
    }

    const credentials = input.methods.flatMap((method) => {
      if (method.method === 'master') return [method.password];
      return method.code ? [method.code] : [];
    });
    oneTimeCodes.filter((issued) => issued.tier === input.tier).forEach((issued) => credentials.push(issued.code));
    if (credentials.some(leaked)) {
      leaks.push({ tier: input.tier, kind: 'password' });
    }
  }

  return leaks;
}
