/**
 * One-time code generation
 */

import { GATE_DEFAULTS } from '../config';
import { generateRandomBytes } from '../crypto/utils';

/**
 * Generate a readable random code.
 * Bytes above the largest multiple of the alphabet size are discarded so
 * every character is equally likely.
 */
export function generateOneTimeCode(
  length: number = GATE_DEFAULTS.oneTimeCodeLength,
  alphabet: string = GATE_DEFAULTS.oneTimeCodeAlphabet
): string {
  const limit = 256 - (256 % alphabet.length);
  let code = '';

  while (code.length < length) {
    for (const byte of generateRandomBytes(length * 2)) {
      if (byte < limit && code.length < length) {
        code += alphabet[byte % alphabet.length];
      }
    }
  }

  return code;
}
