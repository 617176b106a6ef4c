import {
  InvalidArgumentError,
  LockedError,
  MAX_UNLOCK_ATTEMPTS,
  type GateState,
  type MasterPasswordRecord
} from "../../core/src/index";
import { hashMasterPassword, validateMasterPassword, verifyMasterPasswordHash } from "./master-key";

export interface PasswordPrompt {
  ask: (question: string) => Promise<string>;
  notify: (message: string) => void;
}

export interface MasterPasswordStoreDB {
  getMasterPassword: () => MasterPasswordRecord | undefined;
  saveMasterPassword: (hash: string) => MasterPasswordRecord;
}

export interface MasterPasswordGateOptions {
  maxAttempts?: number;
}

/**
 * First run: asks for a new master password until a valid, confirmed one is given,
 * then stores its hash. Later runs: allows `maxAttempts` tries against the stored
 * hash and throws LockedError once they are used up.
 *
 * `open()` resolves with the plaintext master password so the caller can derive
 * the record key; the plaintext is never persisted.
 */
export class MasterPasswordGate {
  private currentState: GateState = "uninitialized";
  private readonly maxAttempts: number;

  constructor(
    private readonly store: MasterPasswordStoreDB,
    private readonly prompt: PasswordPrompt,
    options: MasterPasswordGateOptions = {}
  ) {
    this.maxAttempts = options.maxAttempts ?? MAX_UNLOCK_ATTEMPTS;
  }

  get state(): GateState {
    return this.currentState;
  }

  async open(): Promise<string> {
    if (this.currentState !== "uninitialized") {
      throw new InvalidArgumentError(`Master password gate was already opened (state: ${this.currentState}).`);
    }

    const record = this.store.getMasterPassword();
    if (!record) {
      this.currentState = "awaiting-setup";
      return this.setup();
    }

    this.currentState = "awaiting-verification";
    return this.verify(record);
  }

  private async setup(): Promise<string> {
    this.prompt.notify("No master password found. Create one to initialize the vault.");

    for (;;) {
      const password = await this.prompt.ask("New master password: ");
      const confirmation = await this.prompt.ask("Confirm master password: ");

      const problem = validateMasterPassword(password);
      if (problem) {
        this.prompt.notify(problem);
        continue;
      }
      if (password !== confirmation) {
        this.prompt.notify("Passwords do not match. Try again.");
        continue;
      }

      this.store.saveMasterPassword(hashMasterPassword(password));
      this.currentState = "ready";
      return password;
    }
  }

  private async verify(record: MasterPasswordRecord): Promise<string> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      const candidate = await this.prompt.ask("Master password: ");
      if (verifyMasterPasswordHash(candidate, record.hash)) {
        this.currentState = "ready";
        return candidate;
      }

      const remaining = this.maxAttempts - attempt;
      if (remaining > 0) {
        this.prompt.notify(`Wrong master password. ${remaining} attempt(s) left.`);
      }
    }

    this.currentState = "locked";
    throw new LockedError(this.maxAttempts);
  }
}
