import { describe, it, expect } from 'vitest';
import { createBuildPlan, parseSecretsFile } from '../inputs';

describe('Build inputs', () => {
  it('should turn secrets and content into one input per tier', () => {
    const secrets = parseSecretsFile({
      tiers: {
        client: { master: 'client-master', oneTimeCode: { validForHours: 2 } },
        internal: { master: 'internal-pass' },
      },
    });

    expect(createBuildPlan(secrets, { client: { rate: 150 }, internal: { notes: [] } })).toEqual([
      {
        tier: 'client',
        content: { rate: 150 },
        methods: [
          { method: 'master', password: 'client-master' },
          { method: 'one-time-code', validForMs: 2 * 60 * 60 * 1000 },
        ],
      },
      { tier: 'internal', content: { notes: [] }, methods: [{ method: 'master', password: 'internal-pass' }] },
    ]);
  });

  it('should keep a fixed one-time code', () => {
    const secrets = parseSecretsFile({ tiers: { client: { oneTimeCode: { code: 'k7m2p9qx' } } } });

    expect(createBuildPlan(secrets, { client: {} })[0].methods).toEqual([
      { method: 'one-time-code', code: 'k7m2p9qx' },
    ]);
  });

  it('should fail when a tier is missing on either side', () => {
    const secrets = parseSecretsFile({ tiers: { client: { master: 'client-master' } } });

    expect(() => createBuildPlan(secrets, {})).toThrow('Tier "client" has no content');
    expect(() => createBuildPlan(secrets, { client: {}, vip: {} })).toThrow('Tier "vip" has content but no password');
  });

  it('should reject malformed secrets', () => {
    expect(() => parseSecretsFile({})).toThrow('Secrets file must contain a "tiers" object');
    expect(() => parseSecretsFile({ tiers: { client: 'pw' } })).toThrow('Secrets for tier "client" must be an object');
    expect(() => parseSecretsFile({ tiers: { client: { master: 42 } } })).toThrow(
      'Master password for tier "client" must be a string'
    );
  });

  it('should not treat inherited object members as tiers', () => {
    const secrets = parseSecretsFile(JSON.parse('{"tiers":{"client":{"master":"client-master"}}}'));

    expect(() => createBuildPlan(secrets, JSON.parse('{"client":{},"constructor":{}}'))).toThrow(
      'Tier "constructor" has content but no password'
    );
    expect(() => createBuildPlan(secrets, JSON.parse('{"client":{},"toString":{}}'))).toThrow(
      'Tier "toString" has content but no password'
    );
  });

  it('should keep a tier named __proto__', () => {
    const secrets = parseSecretsFile(JSON.parse('{"tiers":{"__proto__":{"master":"proto-pass"}}}'));

    expect(Object.keys(secrets.tiers)).toEqual(['__proto__']);
    expect(createBuildPlan(secrets, JSON.parse('{"__proto__":{"rate":90}}'))).toEqual([
      { tier: '__proto__', content: { rate: 90 }, methods: [{ method: 'master', password: 'proto-pass' }] },
    ]);
    expect(() => createBuildPlan(secrets, {})).toThrow('Tier "__proto__" has no content');
  });
});
