import { createCipheriv, createDecipheriv, createHmac, randomBytes, timingSafeEqual } from "node:crypto";
import {
  InvalidArgumentError,
  InvalidCredentialsError,
  UninitializedError
} from "../../core/src/index";
import { RECORD_KEY_LENGTH } from "./master-key";

// ─── Token Format ───────────────────────────────────────────────────────────
// Fernet: [version(1)] [timestamp(8)] [iv(16)] [ciphertext(n*16)] [hmac(32)]
// Key: first 16 bytes sign (HMAC-SHA256), last 16 bytes encrypt (AES-128-CBC).

const TOKEN_VERSION = 0x80;
const TIMESTAMP_LENGTH = 8;
const IV_LENGTH = 16;
const BLOCK_LENGTH = 16;
const HMAC_LENGTH = 32;
const HEADER_LENGTH = 1 + TIMESTAMP_LENGTH + IV_LENGTH;
const ALGORITHM = "aes-128-cbc";
const TOKEN_PATTERN = /^[A-Za-z0-9_-]+={0,2}$/;

const splitKey = (key: Buffer): { signingKey: Buffer; encryptionKey: Buffer } => {
  if (key.length !== RECORD_KEY_LENGTH) {
    throw new InvalidArgumentError(`Record key must be ${RECORD_KEY_LENGTH} bytes, got ${key.length}.`);
  }
  return {
    signingKey: key.subarray(0, 16),
    encryptionKey: key.subarray(16, 32)
  };
};

const toUrlSafeBase64 = (data: Buffer): string => {
  return data.toString("base64").replace(/\+/g, "-").replace(/\//g, "_");
};

export const encryptToken = (plaintext: string, key: Buffer, now: Date = new Date()): string => {
  const { signingKey, encryptionKey } = splitKey(key);
  const iv = randomBytes(IV_LENGTH);

  const header = Buffer.alloc(1 + TIMESTAMP_LENGTH);
  header.writeUInt8(TOKEN_VERSION, 0);
  header.writeBigUInt64BE(BigInt(Math.floor(now.getTime() / 1000)), 1);

  const cipher = createCipheriv(ALGORITHM, encryptionKey, iv);
  const ciphertext = Buffer.concat([cipher.update(plaintext, "utf8"), cipher.final()]);

  const signed = Buffer.concat([header, iv, ciphertext]);
  const hmac = createHmac("sha256", signingKey).update(signed).digest();
  return toUrlSafeBase64(Buffer.concat([signed, hmac]));
};

export const decryptToken = (token: string, key: Buffer): string => {
  const { signingKey, encryptionKey } = splitKey(key);

  if (!TOKEN_PATTERN.test(token)) {
    throw new InvalidCredentialsError();
  }

  const data = Buffer.from(token, "base64url");
  const ciphertextLength = data.length - HEADER_LENGTH - HMAC_LENGTH;
  if (ciphertextLength < BLOCK_LENGTH || ciphertextLength % BLOCK_LENGTH !== 0 || data[0] !== TOKEN_VERSION) {
    throw new InvalidCredentialsError();
  }

  const signed = data.subarray(0, data.length - HMAC_LENGTH);
  const expected = createHmac("sha256", signingKey).update(signed).digest();
  if (!timingSafeEqual(expected, data.subarray(data.length - HMAC_LENGTH))) {
    throw new InvalidCredentialsError();
  }

  const iv = data.subarray(1 + TIMESTAMP_LENGTH, HEADER_LENGTH);
  const decipher = createDecipheriv(ALGORITHM, encryptionKey, iv);
  try {
    const decrypted = Buffer.concat([decipher.update(signed.subarray(HEADER_LENGTH)), decipher.final()]);
    return decrypted.toString("utf8");
  } catch (error) {
    throw new InvalidCredentialsError(undefined, { cause: error });
  }
};

// ─── RecordCipher ───────────────────────────────────────────────────────────

export class RecordCipher {
  private key: Buffer | undefined;

  initialize(key: Buffer): void {
    if (this.key) {
      throw new InvalidArgumentError("Record cipher is already initialized.");
    }
    splitKey(key);
    this.key = Buffer.from(key);
  }

  isInitialized(): boolean {
    return this.key !== undefined;
  }

  private requireKey(): Buffer {
    if (!this.key) {
      throw new UninitializedError();
    }
    return this.key;
  }

  encrypt(plaintext: string): string {
    return encryptToken(plaintext, this.requireKey());
  }

  decrypt(token: string): string {
    return decryptToken(token, this.requireKey());
  }
}
