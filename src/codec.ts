import { createCipheriv, createDecipheriv, randomBytes, createHash } from "crypto";
import { CacheError, EncryptionError, InvalidArgumentError, describeError } from "./errors";

/* =========================================================================================
 * Payload codec: JSON, optionally AES-256-GCM
 * =======================================================================================*/

/**
 * Derive a 256-bit key from a string by SHA-256.
 * @param key - Input passphrase/secret.
 * @returns 32-byte Buffer.
 */
export function deriveKey(key: string): Buffer {
  return createHash("sha256").update(key).digest();
}

/**
 * Encrypt bytes with AES-256-GCM.
 * Layout of output: [IV(12) | TAG(16) | CIPHERTEXT].
 * @param data - Plain bytes to encrypt.
 * @param key - 32-byte key (e.g., from `deriveKey`).
 */
export function encrypt(data: Buffer, key: Buffer): Buffer {
  try {
    const iv = randomBytes(12);
    const cipher = createCipheriv("aes-256-gcm", key, iv);
    const enc = Buffer.concat([cipher.update(data), cipher.final()]);
    const tag = cipher.getAuthTag();
    return Buffer.concat([iv, tag, enc]);
  } catch (e: unknown) {
    throw new EncryptionError(`Encryption failed: ${describeError(e)}`);
  }
}

/**
 * Decrypt bytes produced by `encrypt`.
 * @param data - Encrypted payload [IV | TAG | CIPHERTEXT].
 * @param key - 32-byte key.
 */
export function decrypt(data: Buffer, key: Buffer): Buffer {
  try {
    const iv = data.subarray(0, 12);
    const tag = data.subarray(12, 28);
    const ct = data.subarray(28);
    const decipher = createDecipheriv("aes-256-gcm", key, iv);
    decipher.setAuthTag(tag);
    return Buffer.concat([decipher.update(ct), decipher.final()]);
  } catch (e: unknown) {
    throw new EncryptionError(`Decryption failed (wrong key or corrupted data): ${describeError(e)}`);
  }
}

/**
 * Turns caller values into the strings a backing store holds and back.
 * Every `decode` yields a fresh object graph, so nothing a caller holds aliases stored data.
 */
export class PayloadCodec {
  private readonly key: Buffer | null;

  constructor(secretKey?: string) {
    this.key = secretKey ? deriveKey(secretKey) : null;
  }

  get encrypted(): boolean {
    return this.key !== null;
  }

  encode(value: unknown): string {
    let json: string | undefined;
    try {
      json = JSON.stringify(value);
    } catch (e: unknown) {
      throw new InvalidArgumentError(`Value is not JSON-serializable: ${describeError(e)}`);
    }
    // JSON.stringify returns undefined for undefined, functions and symbols
    if (json === undefined) {
      throw new InvalidArgumentError(`Value of type "${typeof value}" cannot be cached`);
    }
    if (!this.key) return json;
    return encrypt(Buffer.from(json, "utf8"), this.key).toString("base64");
  }

  decode<T = unknown>(payload: string): T {
    const json = this.key ? decrypt(Buffer.from(payload, "base64"), this.key).toString("utf8") : payload;
    try {
      return JSON.parse(json);
    } catch (e: unknown) {
      throw new CacheError(`Stored payload is not valid JSON: ${describeError(e)}`);
    }
  }
}
