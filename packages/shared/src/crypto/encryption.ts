/**
 * AES-256-GCM 加密/解密实现
 */

import { generateRandomBytes } from './utils';
import { AuthenticationFailure } from '../errors';

/** Nonce长度（12字节，GCM推荐） */
export const NONCE_LENGTH = 12;

/** 认证标签长度（128位） */
const TAG_LENGTH = 128;

/** 认证标签字节数 */
export const TAG_BYTES = TAG_LENGTH / 8;

/**
 * 生成随机 nonce
 * 每次加密都必须使用新的 nonce
 */
export function generateNonce(): Uint8Array {
  return generateRandomBytes(NONCE_LENGTH);
}

/**
 * 加密字节数据
 * @param key AES-GCM 密钥
 * @param nonce 12字节 nonce
 * @param plaintext 明文
 * @param aad 附加认证数据
 * @returns 密文（认证标签附加在末尾）
 */
export async function encryptBytes(
  key: CryptoKey,
  nonce: Uint8Array,
  plaintext: Uint8Array,
  aad?: Uint8Array
): Promise<Uint8Array> {
  const ciphertextWithTag = await crypto.subtle.encrypt(
    {
      name: 'AES-GCM',
      iv: new Uint8Array(nonce),
      tagLength: TAG_LENGTH,
      ...(aad ? { additionalData: new Uint8Array(aad) } : {}),
    },
    key,
    new Uint8Array(plaintext)
  );

  return new Uint8Array(ciphertextWithTag);
}

/**
 * 解密字节数据
 * 任何失败（密钥错误、密文/标签/nonce/附加数据被篡改）都统一抛出 AuthenticationFailure
 */
export async function decryptBytes(
  key: CryptoKey,
  nonce: Uint8Array,
  ciphertextWithTag: Uint8Array,
  aad?: Uint8Array
): Promise<Uint8Array> {
  try {
    const plaintext = await crypto.subtle.decrypt(
      {
        name: 'AES-GCM',
        iv: new Uint8Array(nonce),
        tagLength: TAG_LENGTH,
        ...(aad ? { additionalData: new Uint8Array(aad) } : {}),
      },
      key,
      new Uint8Array(ciphertextWithTag)
    );
    return new Uint8Array(plaintext);
  } catch {
    throw new AuthenticationFailure();
  }
}
