import { describe, it, expect } from 'vitest';
import { decodeEnvelope, encodeEnvelope, envelopeHeader } from '../codec';
import type { EncryptedEnvelope } from '../../types';
import { FormatError } from '../../errors';
import { bytesToBase64 } from '../../crypto/utils';

function sampleEnvelope(overrides: Partial<EncryptedEnvelope> = {}): EncryptedEnvelope {
  return {
    schemaVersion: 1,
    iterations: 100000,
    expiresAt: null,
    salt: new Uint8Array(16).fill(1),
    nonce: new Uint8Array(12).fill(2),
    ciphertext: new Uint8Array(20).fill(3),
    ...overrides,
  };
}

describe('Envelope codec', () => {
  it('should round-trip every field', () => {
    const envelope = sampleEnvelope();
    const decoded = decodeEnvelope(encodeEnvelope(envelope));

    expect(decoded.schemaVersion).toBe(1);
    expect(decoded.iterations).toBe(100000);
    expect(decoded.expiresAt).toBeNull();
    expect(Array.from(decoded.salt)).toEqual(Array.from(envelope.salt));
    expect(Array.from(decoded.nonce)).toEqual(Array.from(envelope.nonce));
    expect(Array.from(decoded.ciphertext)).toEqual(Array.from(envelope.ciphertext));
  });

  it('should keep a one-time code expiry', () => {
    const expiresAt = Date.UTC(2026, 9, 21, 12, 0, 0);
    const decoded = decodeEnvelope(encodeEnvelope(sampleEnvelope({ expiresAt })));

    expect(decoded.expiresAt).toBe(expiresAt);
  });

  it('should lay out the header as version, iterations and flags', () => {
    expect(Array.from(envelopeHeader(sampleEnvelope()))).toEqual([1, 0, 1, 134, 160, 0]);
    expect(envelopeHeader(sampleEnvelope({ expiresAt: 1 })).length).toBe(14);
  });

  it('should refuse to encode an expiry that is not a whole safe timestamp', () => {
    expect(() => envelopeHeader(sampleEnvelope({ expiresAt: 1000.5 }))).toThrow('Envelope expiry 1000.5 is out of range');
    expect(() => encodeEnvelope(sampleEnvelope({ expiresAt: Number.MAX_SAFE_INTEGER + 2 }))).toThrow(FormatError);
    expect(() => encodeEnvelope(sampleEnvelope({ expiresAt: -1 }))).toThrow(FormatError);
  });

  it('should reject invalid base64', () => {
    expect(() => decodeEnvelope('not base64!')).toThrow(FormatError);
  });

  it('should reject an unknown schema version', () => {
    const raw = new Uint8Array(6 + 16 + 12 + 16);
    raw.set([2, 0, 1, 134, 160, 0]);

    expect(() => decodeEnvelope(bytesToBase64(raw))).toThrow('Unsupported envelope version 2');
  });

  it('should reject iteration counts out of range', () => {
    const raw = new Uint8Array(6 + 16 + 12 + 16);
    raw.set([1, 0, 0, 0, 10, 0]);

    expect(() => decodeEnvelope(bytesToBase64(raw))).toThrow('Iteration count 10 is out of range');
  });

  it('should reject unknown flags', () => {
    const raw = new Uint8Array(6 + 16 + 12 + 16);
    raw.set([1, 0, 1, 134, 160, 4]);

    expect(() => decodeEnvelope(bytesToBase64(raw))).toThrow('Envelope has unknown flags');
  });

  it('should reject truncated salt, nonce or tag', () => {
    const full = encodeEnvelope(sampleEnvelope({ ciphertext: new Uint8Array(16) }));
    const raw = Uint8Array.from(atob(full), (c) => c.charCodeAt(0));

    expect(() => decodeEnvelope(bytesToBase64(raw.slice(0, raw.length - 1)))).toThrow('Envelope is truncated');
    expect(() => decodeEnvelope(bytesToBase64(raw.slice(0, 10)))).toThrow('Envelope is truncated');
    expect(() => decodeEnvelope(bytesToBase64(raw.slice(0, 3)))).toThrow('Envelope header is truncated');
  });

  it('should reject a truncated expiry', () => {
    const raw = new Uint8Array([1, 0, 1, 134, 160, 1, 0, 0]);

    expect(() => decodeEnvelope(bytesToBase64(raw))).toThrow('Envelope expiry is truncated');
  });
});
