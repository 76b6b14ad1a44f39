/**
 * Authenticated encryption for table snapshots (AES-256-GCM)
 *
 * Wire layout produced by `encrypt`:
 *   [12-byte random nonce][ciphertext][16-byte GCM tag]
 *
 * A fresh nonce is drawn for every call; the same cipher instance is shared
 * by all tables of a store.
 */

import { createCipheriv, createDecipheriv, randomBytes } from "node:crypto";
import { EncryptionError } from "./errors.js";

export const KEY_LENGTH = 32;
export const NONCE_LENGTH = 12;
export const TAG_LENGTH = 16;

const ALGORITHM = "aes-256-gcm";

export class SnapshotCipher {
  readonly #key: Buffer;

  /**
   * @param key - 256-bit key
   * @throws EncryptionError if the key is not exactly 32 bytes
   */
  constructor(key: Uint8Array) {
    if (key.length !== KEY_LENGTH) {
      throw new EncryptionError(`key must be ${KEY_LENGTH} bytes, got ${key.length}`);
    }
    this.#key = Buffer.from(key);
  }

  /**
   * Generate a random 256-bit key
   */
  static generateKey(): Uint8Array {
    return new Uint8Array(randomBytes(KEY_LENGTH));
  }

  encrypt(plaintext: Uint8Array): Uint8Array {
    const nonce = randomBytes(NONCE_LENGTH);

    try {
      const cipher = createCipheriv(ALGORITHM, this.#key, nonce, { authTagLength: TAG_LENGTH });
      const body = Buffer.concat([cipher.update(plaintext), cipher.final()]);
      const tag = cipher.getAuthTag();
      return new Uint8Array(Buffer.concat([nonce, body, tag]));
    } catch (err) {
      throw new EncryptionError("encryption failed", { cause: err });
    }
  }

  /**
   * @throws EncryptionError if the buffer is truncated, tampered with, or
   * was sealed under a different key
   */
  decrypt(sealed: Uint8Array): Uint8Array {
    if (sealed.length < NONCE_LENGTH) {
      throw new EncryptionError(
        `ciphertext too short: need at least ${NONCE_LENGTH} bytes, got ${sealed.length}`
      );
    }
    if (sealed.length < NONCE_LENGTH + TAG_LENGTH) {
      throw new EncryptionError("ciphertext is missing its authentication tag");
    }

    const nonce = sealed.subarray(0, NONCE_LENGTH);
    const body = sealed.subarray(NONCE_LENGTH, sealed.length - TAG_LENGTH);
    const tag = sealed.subarray(sealed.length - TAG_LENGTH);

    try {
      const decipher = createDecipheriv(ALGORITHM, this.#key, nonce, { authTagLength: TAG_LENGTH });
      decipher.setAuthTag(tag);
      return new Uint8Array(Buffer.concat([decipher.update(body), decipher.final()]));
    } catch (err) {
      throw new EncryptionError("authentication failed (wrong key or corrupted data)", {
        cause: err,
      });
    }
  }
}
