import { deriveMasterKey, MasterPasswordGate, RecordCipher, type PasswordPrompt } from "../../../../packages/security/src/index";
import type { VaultRepository } from "../../../../packages/storage/src/index";
import { logger } from "../logger";
import { VaultService } from "./vault-service";

/** Everything a request needs. Built once by `openVault`, read-only afterwards. */
export interface VaultContext {
  repository: VaultRepository;
  cipher: RecordCipher;
  vault: VaultService;
}

export interface OpenVaultOptions {
  repository: VaultRepository;
  prompt: PasswordPrompt;
  maxAttempts?: number;
}

/**
 * Runs the master-password gate and, once it is passed, initializes the record
 * cipher. Rejects with LockedError when every verification attempt fails; the
 * repository stays open and belongs to the caller.
 */
export const openVault = async (options: OpenVaultOptions): Promise<VaultContext> => {
  const gate = new MasterPasswordGate(options.repository, options.prompt, {
    maxAttempts: options.maxAttempts
  });

  const masterPassword = await gate.open();
  const cipher = new RecordCipher();
  cipher.initialize(deriveMasterKey(masterPassword));

  const migrations = options.repository.listMigrations();
  logger.info("[Startup] vault unlocked", {
    schemaVersion: migrations.at(-1)?.version ?? 0
  });

  return {
    repository: options.repository,
    cipher,
    vault: new VaultService(options.repository, cipher)
  };
};
