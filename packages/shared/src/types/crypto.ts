/**
 * 加密相关类型定义
 */

/** 信封格式版本 */
export type EnvelopeSchemaVersion = 1;

/** 解锁方式 */
export type UnlockMethod = 'master' | 'one-time-code';

/** 加密信封 */
export interface EncryptedEnvelope {
  /** 格式版本 */
  schemaVersion: EnvelopeSchemaVersion;
  /** PBKDF2 迭代次数（每个信封独立记录） */
  iterations: number;
  /** 过期时间（毫秒时间戳），仅一次性密码使用 */
  expiresAt: number | null;
  /** 盐值（16字节） */
  salt: Uint8Array;
  /** GCM nonce（12字节） */
  nonce: Uint8Array;
  /** 密文，认证标签附加在末尾 */
  ciphertext: Uint8Array;
}

/** 嵌入页面的清单 */
export interface GateManifest {
  version: 1;
  tiers: Record<string, EmbeddedTier>;
}

export interface EmbeddedTier {
  /** 编码后的信封，主密码在前 */
  envelopes: string[];
}
