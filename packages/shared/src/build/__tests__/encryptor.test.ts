import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { buildGateManifest, openContent, openEnvelope, sealContent } from '../encryptor';
import type { TierBuildInput } from '../encryptor';
import { decodeEnvelope, encodeEnvelope } from '../../envelope/codec';
import { AuthenticationFailure, BuildError } from '../../errors';
import { base64ToBytes, bytesToBase64 } from '../../crypto/utils';

const ITERATIONS = 1000;

describe('Build-time encryptor', () => {
  it('should encrypt {"rate":150} so only "abc123" opens it', async () => {
    const encoded = await sealContent({ rate: 150 }, 'abc123', { iterations: 100000 });
    const envelope = decodeEnvelope(encodeEnvelope(decodeEnvelope(encoded)));

    expect(envelope.iterations).toBe(100000);
    expect(await openEnvelope(envelope, 'abc123')).toEqual({ rate: 150 });
    await expect(openEnvelope(envelope, 'wrong')).rejects.toBeInstanceOf(AuthenticationFailure);
  }, 30000);

  it('Property: decrypting with the sealing password reproduces the bundle', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.jsonValue({ maxDepth: 3 }),
        fc.string({ minLength: 1, maxLength: 30 }),
        async (value, password) => {
          const bundle = JSON.parse(JSON.stringify(value ?? null));
          const encoded = await sealContent(bundle, password, { iterations: ITERATIONS });

          expect(await openContent(encoded, password)).toEqual(bundle);
        }
      ),
      { numRuns: 20 }
    );
  }, 60000);

  it('should produce different envelopes for the same bundle and password', async () => {
    const first = await sealContent({ rate: 150 }, 'abc123', { iterations: ITERATIONS });
    const second = await sealContent({ rate: 150 }, 'abc123', { iterations: ITERATIONS });

    expect(first).not.toBe(second);
    expect(Array.from(decodeEnvelope(first).salt)).not.toEqual(Array.from(decodeEnvelope(second).salt));
    expect(Array.from(decodeEnvelope(first).nonce)).not.toEqual(Array.from(decodeEnvelope(second).nonce));
  });

  it('should reject an envelope whose expiry was edited', async () => {
    const encoded = await sealContent({ rate: 150 }, 'k7m2p9qx', {
      iterations: ITERATIONS,
      expiresAt: 1_800_000_000_000,
    });
    const raw = base64ToBytes(encoded);
    if (!raw) throw new Error('expected base64');
    raw[13] ^= 0x01;

    await expect(openContent(bytesToBase64(raw), 'k7m2p9qx')).rejects.toBeInstanceOf(AuthenticationFailure);
  });

  describe('buildGateManifest', () => {
    const tiers = (): TierBuildInput[] => [
      {
        tier: 'client',
        content: { rate: 150 },
        methods: [
          { method: 'one-time-code', code: 'k7m2p9qx', validForMs: 60_000 },
          { method: 'master', password: 'client-master' },
        ],
      },
      {
        tier: 'internal',
        content: { checklist: ['cull', 'edit', 'deliver'] },
        methods: [{ method: 'master', password: 'internal-pass' }],
      },
    ];

    it('should emit one envelope per tier and method, master first', async () => {
      const { manifest, oneTimeCodes } = await buildGateManifest(tiers(), {
        iterations: ITERATIONS,
        now: () => 1_000_000,
      });

      expect(Object.keys(manifest.tiers)).toEqual(['client', 'internal']);
      expect(manifest.tiers.client.envelopes).toHaveLength(2);
      expect(manifest.tiers.internal.envelopes).toHaveLength(1);
      expect(decodeEnvelope(manifest.tiers.client.envelopes[0]).expiresAt).toBeNull();
      expect(decodeEnvelope(manifest.tiers.client.envelopes[1]).expiresAt).toBe(1_060_000);
      expect(oneTimeCodes).toEqual([{ tier: 'client', code: 'k7m2p9qx', expiresAt: 1_060_000 }]);

      expect(await openContent(manifest.tiers.client.envelopes[0], 'client-master')).toEqual({ rate: 150 });
      expect(await openContent(manifest.tiers.client.envelopes[1], 'k7m2p9qx')).toEqual({ rate: 150 });
      expect(await openContent(manifest.tiers.internal.envelopes[0], 'internal-pass')).toEqual({
        checklist: ['cull', 'edit', 'deliver'],
      });
    });

    it('should keep tiers isolated from each other', async () => {
      const { manifest } = await buildGateManifest(tiers(), { iterations: ITERATIONS });

      await expect(openContent(manifest.tiers.internal.envelopes[0], 'client-master')).rejects.toBeInstanceOf(
        AuthenticationFailure
      );
      await expect(openContent(manifest.tiers.client.envelopes[0], 'internal-pass')).rejects.toBeInstanceOf(
        AuthenticationFailure
      );
    });

    it('should generate a one-time code when none is given', async () => {
      const { manifest, oneTimeCodes } = await buildGateManifest(
        [{ tier: 'client', content: { rate: 150 }, methods: [{ method: 'one-time-code' }] }],
        { iterations: ITERATIONS, now: () => 0 }
      );

      expect(oneTimeCodes).toHaveLength(1);
      expect(oneTimeCodes[0].code).toMatch(/^[a-hj-km-np-z2-9]{8}$/);
      expect(oneTimeCodes[0].expiresAt).toBe(48 * 60 * 60 * 1000);
      expect(await openContent(manifest.tiers.client.envelopes[0], oneTimeCodes[0].code)).toEqual({ rate: 150 });
    });

    it('should fail the build when a password or content is missing', async () => {
      await expect(buildGateManifest([], { iterations: ITERATIONS })).rejects.toThrow('No tiers to build');
      await expect(
        buildGateManifest([{ tier: 'client', content: { rate: 150 }, methods: [{ method: 'master', password: '' }] }], {
          iterations: ITERATIONS,
        })
      ).rejects.toThrow('Tier "client" is missing its master password');
      await expect(
        buildGateManifest([{ tier: 'client', content: undefined, methods: [{ method: 'master', password: 'x' }] }], {
          iterations: ITERATIONS,
        })
      ).rejects.toThrow('Tier "client" has no content');
      await expect(
        buildGateManifest([{ tier: 'client', content: { rate: 150 }, methods: [] }], { iterations: ITERATIONS })
      ).rejects.toThrow('Tier "client" has no unlock method');
    });

    it('should reject invalid inputs with BuildError', async () => {
      await expect(buildGateManifest(tiers(), { iterations: 10 })).rejects.toBeInstanceOf(BuildError);
      await expect(
        buildGateManifest([{ tier: 'client', content: { at: Number.NaN }, methods: [{ method: 'master', password: 'x' }] }], {
          iterations: ITERATIONS,
        })
      ).rejects.toThrow('Tier "client" content is not JSON-compatible');
      await expect(
        buildGateManifest([...tiers(), ...tiers()], { iterations: ITERATIONS })
      ).rejects.toThrow('Tier "client" is defined twice');
      await expect(
        buildGateManifest(
          [
            {
              tier: 'client',
              content: { rate: 150 },
              methods: [
                { method: 'master', password: 'a' },
                { method: 'master', password: 'b' },
              ],
            },
          ],
          { iterations: ITERATIONS }
        )
      ).rejects.toThrow('Tier "client" defines master twice');
    });

    it('should keep a tier named like an Object.prototype member', async () => {
      const { manifest } = await buildGateManifest(
        [...tiers(), { tier: '__proto__', content: { rate: 90 }, methods: [{ method: 'master', password: 'proto-pass' }] }],
        { iterations: ITERATIONS }
      );

      expect(Object.keys(manifest.tiers)).toEqual(['client', 'internal', '__proto__']);
      const proto = Object.entries(manifest.tiers).find(([tier]) => tier === '__proto__');
      if (!proto) throw new Error('tier missing');
      expect(await openContent(proto[1].envelopes[0], 'proto-pass')).toEqual({ rate: 90 });
    });

    it('should round a fractional validity down to whole milliseconds', async () => {
      const { manifest, oneTimeCodes } = await buildGateManifest(
        [{ tier: 'client', content: { rate: 150 }, methods: [{ method: 'one-time-code', code: 'k7m2p9qx', validForMs: 1000.5 }] }],
        { iterations: ITERATIONS, now: () => 1_760_000_000_000 }
      );

      expect(oneTimeCodes[0].expiresAt).toBe(1_760_000_001_000);
      expect(decodeEnvelope(manifest.tiers.client.envelopes[0]).expiresAt).toBe(1_760_000_001_000);
    });

    it('should reject a validity that cannot be stored as an expiry', async () => {
      const withValidity = (validForMs: number): TierBuildInput[] => [
        { tier: 'client', content: { rate: 150 }, methods: [{ method: 'one-time-code', validForMs }] },
      ];

      await expect(
        buildGateManifest(withValidity(Number.MAX_SAFE_INTEGER), { iterations: ITERATIONS, now: () => 1_000 })
      ).rejects.toThrow('Tier "client" one-time code validity is too long');
      await expect(
        buildGateManifest(withValidity(Number.POSITIVE_INFINITY), { iterations: ITERATIONS })
      ).rejects.toThrow('Tier "client" one-time code validity must be positive');
      await expect(
        buildGateManifest(withValidity(Number.NaN), { iterations: ITERATIONS })
      ).rejects.toBeInstanceOf(BuildError);
      await expect(sealContent({ rate: 150 }, 'abc123', { iterations: ITERATIONS, expiresAt: 1.5 })).rejects.toThrow(
        'Expiry 1.5 is not a valid timestamp'
      );
    });
  });
});
