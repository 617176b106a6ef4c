import { createHash, timingSafeEqual } from "node:crypto";
import { InvalidArgumentError, MIN_MASTER_PASSWORD_LENGTH } from "../../core/src/index";

export const RECORD_KEY_LENGTH = 32;

/**
 * Legacy derivation: the password is repeated until it covers the key length and
 * then cut to exactly 32 characters. Short passwords repeat, long ones are truncated.
 * Existing vault files were written with keys built this way, so the construction
 * must not change without a migration of every stored token.
 */
export const deriveMasterKey = (masterPassword: string): Buffer => {
  if (masterPassword.length === 0) {
    throw new InvalidArgumentError("Master password must not be empty.");
  }

  const repeats = Math.ceil(RECORD_KEY_LENGTH / masterPassword.length);
  const key = Buffer.from(masterPassword.repeat(repeats).slice(0, RECORD_KEY_LENGTH), "utf8");
  if (key.length !== RECORD_KEY_LENGTH) {
    throw new InvalidArgumentError("The first 32 characters of the master password must be ASCII.");
  }
  return key;
};

export const hashMasterPassword = (password: string): string => {
  return createHash("sha256").update(password, "utf8").digest("hex");
};

export const verifyMasterPasswordHash = (candidate: string, storedHash: string): boolean => {
  const computed = Buffer.from(hashMasterPassword(candidate), "hex");
  const expected = Buffer.from(storedHash, "hex");
  if (computed.length !== expected.length) {
    return false;
  }
  return timingSafeEqual(computed, expected);
};

/** Returns a message for the operator when the password cannot become a master password. */
export const validateMasterPassword = (password: string): string | undefined => {
  if (password.length < MIN_MASTER_PASSWORD_LENGTH) {
    return `Master password must be at least ${MIN_MASTER_PASSWORD_LENGTH} characters.`;
  }

  try {
    deriveMasterKey(password);
  } catch (error) {
    if (error instanceof InvalidArgumentError) {
      return error.message;
    }
    throw error;
  }
  return undefined;
};
