/**
 * 密钥派生函数
 * PBKDF2-HMAC-SHA-256，迭代次数随信封保存
 */

import { generateRandomBytes, stringToBytes } from './utils';
import { GATE_DEFAULTS } from '../config';

/** 盐值长度（字节） */
export const SALT_LENGTH = 16;

/** 派生密钥长度（256位） */
const KEY_LENGTH = 256;

/**
 * 生成随机盐值
 */
export function generateSalt(): Uint8Array {
  return generateRandomBytes(SALT_LENGTH);
}

/** 迭代次数是否在允许范围内 */
export function isValidIterationCount(iterations: number): boolean {
  return (
    Number.isInteger(iterations) &&
    iterations >= GATE_DEFAULTS.minIterations &&
    iterations <= GATE_DEFAULTS.maxIterations
  );
}

/**
 * 从密码派生 AES-GCM 密钥
 * @param password 用户密码
 * @param salt 盐值
 * @param iterations 信封记录的迭代次数
 * @param extractable 是否允许导出原始字节（仅测试使用）
 */
export async function deriveKeyFromPassword(
  password: string,
  salt: Uint8Array,
  iterations: number,
  extractable: boolean = false
): Promise<CryptoKey> {
  const keyMaterial = await crypto.subtle.importKey(
    'raw',
    new Uint8Array(stringToBytes(password)),
    'PBKDF2',
    false,
    ['deriveKey']
  );

  return crypto.subtle.deriveKey(
    {
      name: 'PBKDF2',
      salt: new Uint8Array(salt),
      iterations,
      hash: 'SHA-256',
    },
    keyMaterial,
    { name: 'AES-GCM', length: KEY_LENGTH },
    extractable,
    ['encrypt', 'decrypt']
  );
}
