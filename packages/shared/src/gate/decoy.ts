/**
 * Stand-in envelopes for tiers the page does not have
 *
 * Each one copies the header of a real envelope and carries random
 * ciphertext, so an attempt against it derives a key and fails
 * authentication the same way a wrong password does.
 */

import type { EncryptedEnvelope, GateManifest } from '../types';
import { GATE_DEFAULTS } from '../config';
import { FormatError } from '../errors';
import { ENVELOPE_SCHEMA_VERSION, decodeEnvelope, encodeEnvelope } from '../envelope/codec';
import { generateSalt } from '../crypto/key-derivation';
import { TAG_BYTES, generateNonce } from '../crypto/encryption';
import { generateRandomBytes } from '../crypto/utils';

function decoyFrom(template: Pick<EncryptedEnvelope, 'iterations' | 'expiresAt'>, length: number): string {
  return encodeEnvelope({
    schemaVersion: ENVELOPE_SCHEMA_VERSION,
    iterations: template.iterations,
    expiresAt: template.expiresAt,
    salt: generateSalt(),
    nonce: generateNonce(),
    ciphertext: generateRandomBytes(length),
  });
}

function tryDecode(encoded: string): EncryptedEnvelope | null {
  try {
    return decodeEnvelope(encoded);
  } catch (error) {
    if (error instanceof FormatError) return null;
    throw error;
  }
}

/**
 * Envelopes shaped like the first well-formed tier of the manifest
 */
export function createDecoyEnvelopes(manifest: GateManifest): string[] {
  for (const { envelopes } of Object.values(manifest.tiers)) {
    const decoded = envelopes.map(tryDecode);
    if (decoded.length > 0 && decoded.every((envelope) => envelope !== null)) {
      return decoded.flatMap((envelope) => (envelope ? [decoyFrom(envelope, envelope.ciphertext.length)] : []));
    }
  }
  return [decoyFrom({ iterations: GATE_DEFAULTS.iterations, expiresAt: null }, TAG_BYTES + 64)];
}
