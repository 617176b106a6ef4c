import {
  DEFAULT_CREDENTIAL_URL,
  InvalidArgumentError,
  NotFoundError,
  type CredentialCreateInput,
  type CredentialEntry,
  type CredentialRecord,
  type CredentialUpdateInput
} from "../../../../packages/core/src/index";
import { generatePassword, type RecordCipher } from "../../../../packages/security/src/index";
import type { DeleteResponse, VaultApi } from "../../../../packages/shared/src/index";
import type { VaultRepository } from "../../../../packages/storage/src/index";
import { logger } from "../logger";

export type PasswordGenerator = () => string;

/**
 * Plaintext facade over the repository. Passwords are encrypted before they reach
 * storage and decrypted on the way out; a row that fails to decrypt fails the
 * whole call.
 */
export class VaultService implements VaultApi {
  constructor(
    private readonly repository: VaultRepository,
    private readonly cipher: RecordCipher,
    private readonly generate: PasswordGenerator = () => generatePassword()
  ) {}

  create(input: CredentialCreateInput): CredentialEntry {
    const password = input.generate ? this.generate() : input.password;
    if (password === undefined) {
      throw new InvalidArgumentError("A password is required unless generate is true.");
    }

    const record = this.repository.insertCredential({
      title: input.title,
      username: input.username,
      url: input.url ?? DEFAULT_CREDENTIAL_URL,
      password: this.cipher.encrypt(password)
    });
    logger.info("[Vault] credential created", { id: record.id, generated: input.generate === true });

    return { title: record.title, username: record.username, url: record.url, password };
  }

  listByTitle(title: string): CredentialEntry[] {
    const records = this.repository.listCredentialsByTitle(title);
    if (records.length === 0) {
      throw new NotFoundError("title not found.");
    }
    return records.map((record) => this.reveal(record));
  }

  getOne(title: string, username: string): CredentialEntry {
    const record = this.repository.getCredential(title, username);
    if (!record) {
      throw new NotFoundError("Entry not found.");
    }
    return this.reveal(record);
  }

  update(input: CredentialUpdateInput): CredentialEntry {
    const password = input.generate ? this.generate() : input.password;
    const record = this.repository.updateCredential(input.title, input.username, {
      url: input.url,
      password: password === undefined ? undefined : this.cipher.encrypt(password)
    });
    if (!record) {
      throw new NotFoundError("Password entry not found.");
    }
    logger.info("[Vault] credential updated", {
      id: record.id,
      urlChanged: input.url !== undefined,
      passwordChanged: password !== undefined
    });

    return this.reveal(record);
  }

  delete(title: string, username: string): DeleteResponse {
    const removed = this.repository.deleteCredential(title, username);
    if (removed === 0) {
      throw new NotFoundError("Password entry not found.");
    }
    logger.info("[Vault] credential deleted");
    return { message: "Password entry deleted." };
  }

  listDistinctTitles(): string[] {
    return this.repository.listDistinctTitles();
  }

  private reveal(record: CredentialRecord): CredentialEntry {
    return {
      title: record.title,
      username: record.username,
      url: record.url,
      password: this.cipher.decrypt(record.password)
    };
  }
}
