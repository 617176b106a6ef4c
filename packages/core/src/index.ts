export * from "./errors";

/** Stored row. `password` is always a cipher token, never plaintext. */
export interface CredentialRecord {
  id: number;
  title: string;
  username: string;
  url: string;
  password: string;
  createdAt: string;
  updatedAt: string;
}

/** Decrypted view handed to callers of the vault service. */
export interface CredentialEntry {
  title: string;
  username: string;
  url: string;
  password: string;
}

export interface MasterPasswordRecord {
  hash: string;
  createdAt: string;
}

export interface MigrationRecord {
  version: number;
  name: string;
  appliedAt: string;
}

export interface CredentialCreateInput {
  title: string;
  username: string;
  url?: string;
  password?: string;
  /** When true a generated password replaces `password`. */
  generate?: boolean;
}

export interface CredentialUpdateInput {
  title: string;
  username: string;
  url?: string;
  password?: string;
  generate?: boolean;
}

export type GateState =
  | "uninitialized"
  | "awaiting-setup"
  | "awaiting-verification"
  | "ready"
  | "locked";

export const DEFAULT_CREDENTIAL_URL = "N/A";
export const DEFAULT_PASSWORD_LENGTH = 16;
export const MIN_MASTER_PASSWORD_LENGTH = 4;
export const MAX_UNLOCK_ATTEMPTS = 3;
