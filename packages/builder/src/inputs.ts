/**
 * Secrets and content files -> encryptor input
 */

import { BuildError } from '@content-gate/shared';
import type { MethodInput, TierBuildInput } from '@content-gate/shared';

const HOUR_MS = 60 * 60 * 1000;

export interface TierSecrets {
  master?: string;
  oneTimeCode?: {
    code?: string;
    validForHours?: number;
  };
}

export interface SecretsFile {
  tiers: Record<string, TierSecrets>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseTierSecrets(tier: string, value: unknown): TierSecrets {
  if (!isRecord(value)) {
    throw new BuildError(`Secrets for tier "${tier}" must be an object`);
  }

  const secrets: TierSecrets = {};
  if (value.master !== undefined) {
    if (typeof value.master !== 'string') {
      throw new BuildError(`Master password for tier "${tier}" must be a string`);
    }
    secrets.master = value.master;
  }

  const otp = value.oneTimeCode;
  if (otp !== undefined) {
    if (!isRecord(otp)) {
      throw new BuildError(`oneTimeCode for tier "${tier}" must be an object`);
    }
    if (otp.code !== undefined && typeof otp.code !== 'string') {
      throw new BuildError(`oneTimeCode.code for tier "${tier}" must be a string`);
    }
    if (otp.validForHours !== undefined && typeof otp.validForHours !== 'number') {
      throw new BuildError(`oneTimeCode.validForHours for tier "${tier}" must be a number`);
    }
    secrets.oneTimeCode = {
      ...(typeof otp.code === 'string' ? { code: otp.code } : {}),
      ...(typeof otp.validForHours === 'number' ? { validForHours: otp.validForHours } : {}),
    };
  }

  return secrets;
}

export function parseSecretsFile(data: unknown): SecretsFile {
  if (!isRecord(data) || !isRecord(data.tiers)) {
    throw new BuildError('Secrets file must contain a "tiers" object');
  }

  const tiers = Object.entries(data.tiers).map(([tier, value]): [string, TierSecrets] => [
    tier,
    parseTierSecrets(tier, value),
  ]);
  return { tiers: Object.fromEntries(tiers) };
}

/**
 * Pair every tier's content with its secrets. A tier present in only one
 * of the two files fails the build.
 */
export function createBuildPlan(secrets: SecretsFile, content: unknown): TierBuildInput[] {
  if (!isRecord(content)) {
    throw new BuildError('Content file must map tier names to content');
  }

  const contentByTier: Record<string, unknown> = content;
  for (const tier of Object.keys(contentByTier)) {
    if (!Object.hasOwn(secrets.tiers, tier)) {
      throw new BuildError(`Tier "${tier}" has content but no password`);
    }
  }

  return Object.entries(secrets.tiers).map(([tier, tierSecrets]) => {
    if (!Object.hasOwn(contentByTier, tier)) {
      throw new BuildError(`Tier "${tier}" has no content`);
    }

    const methods: MethodInput[] = [];
    if (tierSecrets.master !== undefined) {
      methods.push({ method: 'master', password: tierSecrets.master });
    }
    if (tierSecrets.oneTimeCode) {
      const { code, validForHours } = tierSecrets.oneTimeCode;
      methods.push({
        method: 'one-time-code',
        ...(code !== undefined ? { code } : {}),
        ...(validForHours !== undefined ? { validForMs: validForHours * HOUR_MS } : {}),
      });
    }

    return { tier, content: contentByTier[tier], methods };
  });
}
