import { describe, it, expect } from 'vitest';
import { findPlaintextLeaks } from '../leak-check';
import { buildGateManifest } from '../encryptor';
import type { TierBuildInput } from '../encryptor';
import { serializeGateManifest } from '../../envelope/manifest';

const tiers: TierBuildInput[] = [
  {
    tier: 'client',
    content: { sections: [{ kind: 'text', body: 'Wedding package pricing' }] },
    methods: [{ method: 'master', password: 'client-master' }, { method: 'one-time-code' }],
  },
];

describe('Plaintext leak check', () => {
  it('should find nothing in a built manifest', async () => {
    const { manifest, oneTimeCodes } = await buildGateManifest(tiers, { iterations: 1000 });

    expect(findPlaintextLeaks(serializeGateManifest(manifest), tiers, oneTimeCodes)).toEqual([]);
  });

  it('should report content and passwords found anywhere in the published text', () => {
    const artifact = serializeGateManifest({
      version: 1,
      tiers: { client: { envelopes: ['AAAA', 'AAAA'] } },
    }).replace('"version":1', '"version":1,"note":"Wedding package pricing","hint":"client-master"');

    expect(findPlaintextLeaks(artifact, tiers)).toEqual([
      { tier: 'client', kind: 'content' },
      { tier: 'client', kind: 'password' },
    ]);
  });

  it('should check generated one-time codes', () => {
    const artifact = '{"version":1,"tiers":{"client":{"envelopes":["xxk7m2p9qxxx"]}}}';

    expect(findPlaintextLeaks(artifact, tiers)).toEqual([]);
    expect(findPlaintextLeaks(artifact, tiers, [{ tier: 'client', code: 'k7m2p9qx', expiresAt: 0 }])).toEqual([
      { tier: 'client', kind: 'password' },
    ]);
  });

  it('should not report strings that are part of the public manifest structure', () => {
    const internal: TierBuildInput[] = [
      {
        tier: 'internal',
        content: { envelopes: 'internal' },
        methods: [{ method: 'master', password: 'internal-pass' }],
      },
    ];
    const artifact = '{"version":1,"tiers":{"internal":{"envelopes":["AAAA"]}}}';

    expect(findPlaintextLeaks(artifact, internal)).toEqual([]);
  });

  it('should ignore short strings that base64 text can contain by chance', () => {
    expect(findPlaintextLeaks('{"tiers":{"client":{"envelopes":["kind"]}}}', tiers)).toEqual([]);
  });
});
