export type VaultErrorCode =
  | "invalid_argument"
  | "duplicate_entry"
  | "not_found"
  | "invalid_credentials"
  | "uninitialized"
  | "locked";

export abstract class VaultError extends Error {
  abstract readonly code: VaultErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidArgumentError extends VaultError {
  readonly code = "invalid_argument";
}

export class DuplicateEntryError extends VaultError {
  readonly code = "duplicate_entry";
}

export class NotFoundError extends VaultError {
  readonly code = "not_found";
}

/** Decryption failed authentication: wrong master password or corrupted data. */
export class InvalidCredentialsError extends VaultError {
  readonly code = "invalid_credentials";

  constructor(message = "Invalid credentials. Set main password correctly.", options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class UninitializedError extends VaultError {
  readonly code = "uninitialized";

  constructor(message = "Record cipher used before the master password was verified.") {
    super(message);
  }
}

/** Master password verification exhausted. Fatal to startup. */
export class LockedError extends VaultError {
  readonly code = "locked";

  constructor(readonly attempts: number) {
    super(`Master password rejected after ${attempts} attempts.`);
  }
}

export const isVaultError = (error: unknown): error is VaultError => error instanceof VaultError;

export const normalizeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }

  return "Unknown vault error";
};
