import {
  DuplicateEntryError,
  InvalidArgumentError,
  InvalidCredentialsError,
  NotFoundError,
  UninitializedError
} from "../../../../packages/core/src/index";
import { PASSWORD_ALPHABET, RecordCipher, deriveMasterKey, encryptToken } from "../../../../packages/security/src/index";
import { IN_MEMORY_DB_PATH, SQLiteVaultRepository } from "../../../../packages/storage/src/index";
import { VaultService } from "./vault-service";

const assertEqual = <T>(actual: T, expected: T, message: string): void => {
  if (actual !== expected) {
    throw new Error(`${message}: expected "${String(expected)}", got "${String(actual)}"`);
  }
};

const assertThrows = (fn: () => void, errorType: new (...args: never[]) => Error, message: string): void => {
  try {
    fn();
  } catch (error) {
    if (error instanceof errorType) {
      return;
    }
    throw new Error(`${message}: expected ${errorType.name}, got ${String(error)}`);
  }
  throw new Error(`${message}: expected function to throw`);
};

const createVault = (masterPassword = "abcd") => {
  const repository = new SQLiteVaultRepository(IN_MEMORY_DB_PATH);
  const cipher = new RecordCipher();
  cipher.initialize(deriveMasterKey(masterPassword));
  return { repository, cipher, vault: new VaultService(repository, cipher) };
};

// Lifecycle: generated password survives a url update, delete makes the entry unreachable.
(() => {
  const { repository, vault } = createVault();

  const created = vault.create({ title: "github", username: "alice", url: "https://github.com", generate: true });
  const fetched = vault.getOne("github", "alice");
  assertEqual(fetched.password, created.password, "stored password should match the generated one");
  assertEqual(fetched.password.length, 16, "generated password should have 16 characters");
  for (const char of fetched.password) {
    assertEqual(PASSWORD_ALPHABET.includes(char), true, `"${char}" should come from the generator alphabet`);
  }
  assertEqual(
    repository.getCredential("github", "alice")?.password === created.password,
    false,
    "storage should not hold the plaintext"
  );

  vault.update({ title: "github", username: "alice", url: "https://github.com/alice" });
  const updated = vault.getOne("github", "alice");
  assertEqual(updated.url, "https://github.com/alice", "url should be updated");
  assertEqual(updated.password, created.password, "password should be unchanged");

  assertEqual(vault.delete("github", "alice").message, "Password entry deleted.", "delete should confirm");
  assertThrows(() => vault.getOne("github", "alice"), NotFoundError, "deleted entry should be gone");
  repository.close();
})();

// Uniqueness on (title, username).
(() => {
  const { repository, vault } = createVault();
  vault.create({ title: "mail", username: "alice", password: "pw-1" });
  assertThrows(
    () => vault.create({ title: "mail", username: "alice", password: "pw-2" }),
    DuplicateEntryError,
    "duplicate pair should fail"
  );
  const other = vault.create({ title: "mail", username: "bob", password: "pw-3" });
  assertEqual(other.url, "N/A", "url should default to N/A");

  const listed = vault.listByTitle("mail");
  assertEqual(listed.map((entry) => `${entry.username}=${entry.password}`).join(","), "alice=pw-1,bob=pw-3", "list should decrypt every row");
  repository.close();
})();

// Create and update inputs.
(() => {
  const { repository, vault } = createVault();
  assertThrows(
    () => vault.create({ title: "t", username: "u" }),
    InvalidArgumentError,
    "create without password or generate should fail"
  );

  const created = vault.create({ title: "t", username: "u", password: "given", generate: true });
  assertEqual(created.password === "given", false, "generate should replace a supplied password");
  assertEqual(created.password.length, 16, "replacement should come from the generator");

  const replaced = vault.update({ title: "t", username: "u", password: "manual" });
  assertEqual(replaced.password, "manual", "update should set the supplied password");
  assertEqual(replaced.url, "N/A", "url should stay when not supplied");

  const regenerated = vault.update({ title: "t", username: "u", password: "ignored", generate: true });
  assertEqual(regenerated.password === "ignored", false, "generated password should win on update");
  assertEqual(vault.getOne("t", "u").password, regenerated.password, "regenerated password should be stored");

  assertThrows(() => vault.update({ title: "t", username: "nobody", url: "x" }), NotFoundError, "update needs an existing row");
  assertThrows(() => vault.delete("t", "nobody"), NotFoundError, "delete of a missing row should fail");
  assertThrows(() => vault.listByTitle("missing"), NotFoundError, "unknown title should fail");
  repository.close();
})();

// A row written under another key fails the whole read.
(() => {
  const { repository, vault } = createVault("abcd");
  vault.create({ title: "shared", username: "one", password: "p1" });
  vault.create({ title: "shared", username: "two", password: "p2" });
  repository.insertCredential({
    title: "shared",
    username: "stale",
    url: "N/A",
    password: encryptToken("p3", deriveMasterKey("other-master"))
  });

  assertThrows(() => vault.listByTitle("shared"), InvalidCredentialsError, "one stale row should fail the list");
  assertThrows(() => vault.getOne("shared", "stale"), InvalidCredentialsError, "stale row should fail alone");
  assertEqual(vault.getOne("shared", "one").password, "p1", "good rows stay readable one by one");
  repository.close();
})();

// Wrong master password against existing data.
(() => {
  const { repository, vault } = createVault("abcd");
  vault.create({ title: "site", username: "me", password: "secret" });

  const wrongCipher = new RecordCipher();
  wrongCipher.initialize(deriveMasterKey("abce"));
  const wrongVault = new VaultService(repository, wrongCipher);
  assertThrows(() => wrongVault.getOne("site", "me"), InvalidCredentialsError, "wrong key should be detected on read");
  repository.close();
})();

// Cipher used before the master password was verified.
(() => {
  const repository = new SQLiteVaultRepository(IN_MEMORY_DB_PATH);
  const vault = new VaultService(repository, new RecordCipher());
  assertThrows(() => vault.create({ title: "a", username: "b", password: "c" }), UninitializedError, "create needs a key");
  assertEqual(repository.listDistinctTitles().length, 0, "nothing should be written without a key");
  repository.close();
})();

// Custom generator.
(() => {
  const repository = new SQLiteVaultRepository(IN_MEMORY_DB_PATH);
  const cipher = new RecordCipher();
  cipher.initialize(deriveMasterKey("abcd"));
  const vault = new VaultService(repository, cipher, () => "fixed-generated");
  assertEqual(vault.create({ title: "x", username: "y", generate: true }).password, "fixed-generated", "injected generator should be used");
  assertEqual(vault.listDistinctTitles().join(","), "x", "title should be listed");
  repository.close();
})();
