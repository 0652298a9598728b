/**
 * Envelope codec
 *
 * Layout (standard base64 of):
 *   version(1) | iterations(u32 BE) | flags(1) | [expiresAt(u64 BE, ms)] | salt(16) | nonce(12) | ciphertext+tag
 *
 * Everything before the salt is the header; it is bound to the ciphertext
 * as associated data.
 */

import type { EncryptedEnvelope } from '../types';
import { FormatError } from '../errors';
import { SALT_LENGTH, isValidIterationCount } from '../crypto/key-derivation';
import { NONCE_LENGTH, TAG_BYTES } from '../crypto/encryption';
import { base64ToBytes, bytesToBase64, concatBytes } from '../crypto/utils';

export const ENVELOPE_SCHEMA_VERSION = 1;

const FLAG_HAS_EXPIRY = 0x01;
const KNOWN_FLAGS = FLAG_HAS_EXPIRY;

const BASE_HEADER_LENGTH = 6;
const EXPIRY_LENGTH = 8;

/** Expiries are whole milliseconds that survive the u64 round trip */
export function isValidExpiry(expiresAt: number): boolean {
  return Number.isSafeInteger(expiresAt) && expiresAt >= 0;
}

/**
 * Serialize the authenticated header of an envelope
 * @throws FormatError when the expiry cannot be stored exactly
 */
export function envelopeHeader(
  envelope: Pick<EncryptedEnvelope, 'schemaVersion' | 'iterations' | 'expiresAt'>
): Uint8Array {
  const hasExpiry = envelope.expiresAt !== null;
  if (envelope.expiresAt !== null && !isValidExpiry(envelope.expiresAt)) {
    throw new FormatError(`Envelope expiry ${envelope.expiresAt} is out of range`);
  }
  const header = new Uint8Array(BASE_HEADER_LENGTH + (hasExpiry ? EXPIRY_LENGTH : 0));
  const view = new DataView(header.buffer);

  view.setUint8(0, envelope.schemaVersion);
  view.setUint32(1, envelope.iterations);
  view.setUint8(5, hasExpiry ? FLAG_HAS_EXPIRY : 0);
  if (envelope.expiresAt !== null) {
    view.setBigUint64(BASE_HEADER_LENGTH, BigInt(envelope.expiresAt));
  }

  return header;
}

export function encodeEnvelope(envelope: EncryptedEnvelope): string {
  return bytesToBase64(
    concatBytes(envelopeHeader(envelope), envelope.salt, envelope.nonce, envelope.ciphertext)
  );
}

/**
 * Parse an encoded envelope
 * @throws FormatError when the input is not a well-formed envelope
 */
export function decodeEnvelope(encoded: string): EncryptedEnvelope {
  const raw = base64ToBytes(encoded.trim());
  if (!raw) {
    throw new FormatError('Envelope is not valid base64');
  }
  if (raw.length < BASE_HEADER_LENGTH) {
    throw new FormatError('Envelope header is truncated');
  }

  const view = new DataView(raw.buffer, raw.byteOffset, raw.byteLength);
  const version = view.getUint8(0);
  if (version !== ENVELOPE_SCHEMA_VERSION) {
    throw new FormatError(`Unsupported envelope version ${version}`);
  }

  const iterations = view.getUint32(1);
  if (!isValidIterationCount(iterations)) {
    throw new FormatError(`Iteration count ${iterations} is out of range`);
  }

  const flags = view.getUint8(5);
  if ((flags & ~KNOWN_FLAGS) !== 0) {
    throw new FormatError('Envelope has unknown flags');
  }

  let offset = BASE_HEADER_LENGTH;
  let expiresAt: number | null = null;
  if (flags & FLAG_HAS_EXPIRY) {
    if (raw.length < offset + EXPIRY_LENGTH) {
      throw new FormatError('Envelope expiry is truncated');
    }
    const value = view.getBigUint64(offset);
    if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new FormatError('Envelope expiry is out of range');
    }
    expiresAt = Number(value);
    offset += EXPIRY_LENGTH;
  }

  if (raw.length < offset + SALT_LENGTH + NONCE_LENGTH + TAG_BYTES) {
    throw new FormatError('Envelope is truncated');
  }

  const salt = raw.slice(offset, offset + SALT_LENGTH);
  offset += SALT_LENGTH;
  const nonce = raw.slice(offset, offset + NONCE_LENGTH);
  offset += NONCE_LENGTH;

  return {
    schemaVersion: ENVELOPE_SCHEMA_VERSION,
    iterations,
    expiresAt,
    salt,
    nonce,
    ciphertext: raw.slice(offset),
  };
}
