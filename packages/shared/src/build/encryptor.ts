/**
 * Build-time encryptor
 * Turns plaintext content bundles into the embeddable gate manifest.
 */

import type { EmbeddedTier, EncryptedEnvelope, GateManifest, JsonValue, UnlockMethod } from '../types';
import { GATE_DEFAULTS } from '../config';
import { BuildError, FormatError } from '../errors';
import { deriveKeyFromPassword, generateSalt, isValidIterationCount } from '../crypto/key-derivation';
import { decryptBytes, encryptBytes, generateNonce } from '../crypto/encryption';
import { bytesToString, stringToBytes } from '../crypto/utils';
import {
  ENVELOPE_SCHEMA_VERSION,
  decodeEnvelope,
  encodeEnvelope,
  envelopeHeader,
  isValidExpiry,
} from '../envelope/codec';
import { canonicalJson, isJsonValue } from '../envelope/canonical-json';
import { generateOneTimeCode } from './one-time-code';

export interface SealOptions {
  iterations: number;
  /** Millisecond timestamp after which the envelope must not be opened */
  expiresAt?: number | null;
}

export interface MasterMethodInput {
  method: 'master';
  password: string;
}

export interface OneTimeCodeMethodInput {
  method: 'one-time-code';
  /** Generated when omitted */
  code?: string;
  validForMs?: number;
}

export type MethodInput = MasterMethodInput | OneTimeCodeMethodInput;

export interface TierBuildInput {
  tier: string;
  content: unknown;
  methods: MethodInput[];
}

export interface BuildOptions {
  iterations?: number;
  now?: () => number;
}

export interface IssuedOneTimeCode {
  tier: string;
  code: string;
  expiresAt: number;
}

export interface BuildResult {
  manifest: GateManifest;
  /** Delivered out of band, never embedded */
  oneTimeCodes: IssuedOneTimeCode[];
}

/** Master envelopes are tried first at runtime */
const METHOD_ORDER: Record<UnlockMethod, number> = {
  master: 0,
  'one-time-code': 1,
};

/**
 * Encrypt one content bundle under one password
 * @returns encoded envelope
 */
export async function sealContent(
  content: JsonValue,
  password: string,
  options: SealOptions
): Promise<string> {
  const expiresAt = options.expiresAt ?? null;
  if (expiresAt !== null && !isValidExpiry(expiresAt)) {
    throw new BuildError(`Expiry ${expiresAt} is not a valid timestamp`);
  }
  const header: Pick<EncryptedEnvelope, 'schemaVersion' | 'iterations' | 'expiresAt'> = {
    schemaVersion: ENVELOPE_SCHEMA_VERSION,
    iterations: options.iterations,
    expiresAt,
  };

  const salt = generateSalt();
  const nonce = generateNonce();
  const key = await deriveKeyFromPassword(password, salt, header.iterations);
  const ciphertext = await encryptBytes(
    key,
    nonce,
    stringToBytes(canonicalJson(content)),
    envelopeHeader(header)
  );

  const envelope: EncryptedEnvelope = { ...header, salt, nonce, ciphertext };
  return encodeEnvelope(envelope);
}

/**
 * Decrypt an already decoded envelope
 * @throws AuthenticationFailure on a wrong password or tampered data
 * @throws FormatError when the plaintext is not JSON
 */
export async function openEnvelope(
  envelope: EncryptedEnvelope,
  password: string
): Promise<JsonValue> {
  const key = await deriveKeyFromPassword(password, envelope.salt, envelope.iterations);
  const plaintext = await decryptBytes(key, envelope.nonce, envelope.ciphertext, envelopeHeader(envelope));

  let parsed: unknown;
  try {
    parsed = JSON.parse(bytesToString(plaintext));
  } catch {
    throw new FormatError('Decrypted payload is not JSON');
  }
  if (!isJsonValue(parsed)) {
    throw new FormatError('Decrypted payload is not JSON');
  }
  return parsed;
}

/**
 * Decode and decrypt an encoded envelope.
 * Does not check the envelope expiry; the runtime gate does.
 */
export async function openContent(encoded: string, password: string): Promise<JsonValue> {
  return openEnvelope(decodeEnvelope(encoded), password);
}

type ResolvedMethod =
  | MasterMethodInput
  | { method: 'one-time-code'; code: string | undefined; expiresAt: number };

interface ValidatedTier {
  tier: string;
  content: JsonValue;
  methods: ResolvedMethod[];
}

function resolveMethod(tier: string, method: MethodInput, builtAt: number): ResolvedMethod {
  if (method.method === 'master') {
    if (!method.password) {
      throw new BuildError(`Tier "${tier}" is missing its master password`);
    }
    return method;
  }

  if (method.code !== undefined && !method.code) {
    throw new BuildError(`Tier "${tier}" has an empty one-time code`);
  }
  const validForMs = method.validForMs ?? GATE_DEFAULTS.oneTimeCodeTtlMs;
  if (!Number.isFinite(validForMs) || !(validForMs > 0)) {
    throw new BuildError(`Tier "${tier}" one-time code validity must be positive`);
  }
  const expiresAt = Math.floor(builtAt + validForMs);
  if (!isValidExpiry(expiresAt)) {
    throw new BuildError(`Tier "${tier}" one-time code validity is too long`);
  }
  return { method: 'one-time-code', code: method.code, expiresAt };
}

function validateTierInput(input: TierBuildInput, seen: Set<string>, builtAt: number): ValidatedTier {
  if (!input.tier || !input.tier.trim()) {
    throw new BuildError('Tier name is required');
  }
  if (seen.has(input.tier)) {
    throw new BuildError(`Tier "${input.tier}" is defined twice`);
  }
  if (input.content === undefined || input.content === null) {
    throw new BuildError(`Tier "${input.tier}" has no content`);
  }
  const content = input.content;
  if (!isJsonValue(content)) {
    throw new BuildError(`Tier "${input.tier}" content is not JSON-compatible`);
  }
  if (input.methods.length === 0) {
    throw new BuildError(`Tier "${input.tier}" has no unlock method`);
  }

  const seenMethods = new Set<UnlockMethod>();
  const methods: ResolvedMethod[] = [];
  for (const method of input.methods) {
    if (seenMethods.has(method.method)) {
      throw new BuildError(`Tier "${input.tier}" defines ${method.method} twice`);
    }
    seenMethods.add(method.method);
    methods.push(resolveMethod(input.tier, method, builtAt));
  }

  return { tier: input.tier, content, methods };
}

/**
 * Encrypt every (tier, method) pair into the gate manifest.
 * Each envelope gets its own salt and nonce, so each pair has its own key.
 * @throws BuildError on any missing or invalid input; nothing is produced
 */
export async function buildGateManifest(
  tiers: TierBuildInput[],
  options: BuildOptions = {}
): Promise<BuildResult> {
  const iterations = options.iterations ?? GATE_DEFAULTS.iterations;
  const builtAt = (options.now ?? Date.now)();

  if (tiers.length === 0) {
    throw new BuildError('No tiers to build');
  }
  if (!isValidIterationCount(iterations)) {
    throw new BuildError(
      `Iterations must be an integer between ${GATE_DEFAULTS.minIterations} and ${GATE_DEFAULTS.maxIterations}`
    );
  }

  // Validate everything before encrypting anything
  const seen = new Set<string>();
  const validated: ValidatedTier[] = [];
  for (const input of tiers) {
    validated.push(validateTierInput(input, seen, builtAt));
    seen.add(input.tier);
  }

  const tierEntries: [string, EmbeddedTier][] = [];
  const oneTimeCodes: IssuedOneTimeCode[] = [];

  for (const { tier, content, methods: tierMethods } of validated) {
    const methods = [...tierMethods].sort((a, b) => METHOD_ORDER[a.method] - METHOD_ORDER[b.method]);
    const envelopes: string[] = [];

    for (const method of methods) {
      if (method.method === 'master') {
        envelopes.push(await sealContent(content, method.password, { iterations }));
        continue;
      }

      const code = method.code ?? generateOneTimeCode();
      envelopes.push(await sealContent(content, code, { iterations, expiresAt: method.expiresAt }));
      oneTimeCodes.push({ tier, code, expiresAt: method.expiresAt });
    }

    tierEntries.push([tier, { envelopes }]);
  }

  // Own properties only: a tier may be named like an Object.prototype member
  const manifest: GateManifest = { version: 1, tiers: Object.fromEntries(tierEntries) };
  return { manifest, oneTimeCodes };
}
