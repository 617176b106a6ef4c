import path from "node:path";
import { createRequire } from "node:module";
import type Database from "better-sqlite3";

import {
  DEFAULT_CREDENTIAL_URL,
  DuplicateEntryError,
  type CredentialRecord,
  type MasterPasswordRecord,
  type MigrationRecord
} from "../../core/src/index";
import type { MasterPasswordStoreDB } from "../../security/src/index";

const require = createRequire(import.meta.url);

interface BetterSqlite3Module {
  new (filename: string): Database.Database;
}

interface CredentialRow {
  id: number;
  title: string;
  username: string;
  url: string;
  password: string;
  created_at: string;
  updated_at: string;
}

interface MasterPasswordRow {
  hash: string;
  created_at: string;
}

interface MigrationRow {
  version: number;
  name: string;
  applied_at: string;
}

interface MigrationDefinition {
  version: number;
  name: string;
  apply: (db: Database.Database) => void;
}

export interface CredentialInsert {
  title: string;
  username: string;
  url: string;
  /** Cipher token. */
  password: string;
}

/** Fields left undefined keep their stored value. */
export interface CredentialPatch {
  url?: string;
  password?: string;
}

export interface VaultRepository extends MasterPasswordStoreDB {
  insertCredential: (input: CredentialInsert) => CredentialRecord;
  listCredentialsByTitle: (title: string) => CredentialRecord[];
  getCredential: (title: string, username: string) => CredentialRecord | undefined;
  updateCredential: (title: string, username: string, patch: CredentialPatch) => CredentialRecord | undefined;
  deleteCredential: (title: string, username: string) => number;
  listDistinctTitles: () => string[];
  listMigrations: () => MigrationRecord[];
  close: () => void;
}

export const IN_MEMORY_DB_PATH = ":memory:";

const CREDENTIAL_COLUMNS = "id, title, username, url, password, created_at, updated_at";

const loadDatabaseDriver = (): BetterSqlite3Module => {
  return require("better-sqlite3") as BetterSqlite3Module;
};

const isUniqueViolation = (error: unknown): boolean => {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    (error.code === "SQLITE_CONSTRAINT_UNIQUE" || error.code === "SQLITE_CONSTRAINT_PRIMARYKEY")
  );
};

const rowToCredential = (row: CredentialRow): CredentialRecord => ({
  id: row.id,
  title: row.title,
  username: row.username,
  url: row.url,
  password: row.password,
  createdAt: row.created_at,
  updatedAt: row.updated_at
});

const rowToMigration = (row: MigrationRow): MigrationRecord => {
  return {
    version: row.version,
    name: row.name,
    appliedAt: row.applied_at
  };
};

const hasTable = (db: Database.Database, table: string): boolean => {
  const row = db.prepare(
    "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?"
  ).get(table) as { name: string } | undefined;
  return row !== undefined;
};

const migrations: MigrationDefinition[] = [
  {
    version: 1,
    name: "create_credentials_table",
    apply: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS credentials (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          title TEXT NOT NULL,
          username TEXT NOT NULL,
          url TEXT NOT NULL DEFAULT '${DEFAULT_CREDENTIAL_URL}',
          password TEXT NOT NULL,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL,
          UNIQUE (title, username)
        );

        CREATE INDEX IF NOT EXISTS idx_credentials_title ON credentials(title);
      `);
    }
  },
  {
    version: 2,
    name: "create_master_password_table",
    apply: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS master_password (
          id INTEGER PRIMARY KEY CHECK (id = 1),
          hash TEXT NOT NULL,
          created_at TEXT NOT NULL
        );
      `);
    }
  },
  {
    // Vault files from the first release kept their rows in `passwords`.
    // Tokens are the same format, so rows are copied as they are.
    version: 3,
    name: "import_legacy_passwords_table",
    apply: (db) => {
      if (!hasTable(db, "passwords")) {
        return;
      }

      const now = new Date().toISOString();
      db.prepare(
        `
          INSERT OR IGNORE INTO credentials (title, username, url, password, created_at, updated_at)
          SELECT title, username, url, password, @now, @now FROM passwords ORDER BY id ASC
        `
      ).run({ now });
    }
  }
];

export class SQLiteVaultRepository implements VaultRepository {
  private readonly db: Database.Database;
  private readonly resolvedDbPath: string;

  constructor(dbPath: string) {
    const DatabaseCtor = loadDatabaseDriver();
    const resolved = dbPath === IN_MEMORY_DB_PATH ? dbPath : path.resolve(dbPath);
    this.resolvedDbPath = resolved;
    this.db = new DatabaseCtor(resolved);
    this.bootstrap();
  }

  private bootstrap(): void {
    this.db.pragma("journal_mode = WAL");

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT NOT NULL
      );
    `);

    const applied = new Set(
      (
        this.db.prepare("SELECT version FROM schema_migrations ORDER BY version ASC").all() as Array<{
          version: number;
        }>
      ).map((row) => row.version)
    );

    for (const migration of [...migrations].sort((a, b) => a.version - b.version)) {
      if (applied.has(migration.version)) {
        continue;
      }

      const tx = this.db.transaction(() => {
        migration.apply(this.db);
        this.db.prepare(
          `
            INSERT INTO schema_migrations (version, name, applied_at)
            VALUES (@version, @name, @applied_at)
          `
        ).run({
          version: migration.version,
          name: migration.name,
          applied_at: new Date().toISOString()
        });
      });

      tx();
    }
  }

  getDbPath(): string {
    return this.resolvedDbPath;
  }

  // ─── Credentials ──────────────────────────────────────────────────────────

  insertCredential(input: CredentialInsert): CredentialRecord {
    const now = new Date().toISOString();
    try {
      const row = this.db.prepare(
        `
          INSERT INTO credentials (title, username, url, password, created_at, updated_at)
          VALUES (@title, @username, @url, @password, @created_at, @updated_at)
          RETURNING ${CREDENTIAL_COLUMNS}
        `
      ).get({
        title: input.title,
        username: input.username,
        url: input.url,
        password: input.password,
        created_at: now,
        updated_at: now
      }) as CredentialRow;
      return rowToCredential(row);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateEntryError("Username already exists for this title.", { cause: error });
      }
      throw error;
    }
  }

  listCredentialsByTitle(title: string): CredentialRecord[] {
    const rows = this.db.prepare(
      `SELECT ${CREDENTIAL_COLUMNS} FROM credentials WHERE title = ? ORDER BY id ASC`
    ).all(title) as CredentialRow[];
    return rows.map(rowToCredential);
  }

  getCredential(title: string, username: string): CredentialRecord | undefined {
    const row = this.db.prepare(
      `SELECT ${CREDENTIAL_COLUMNS} FROM credentials WHERE title = ? AND username = ?`
    ).get(title, username) as CredentialRow | undefined;
    return row ? rowToCredential(row) : undefined;
  }

  updateCredential(title: string, username: string, patch: CredentialPatch): CredentialRecord | undefined {
    const tx = this.db.transaction((): CredentialRecord | undefined => {
      const current = this.getCredential(title, username);
      if (!current) {
        return undefined;
      }

      const row = this.db.prepare(
        `
          UPDATE credentials
          SET url = @url, password = @password, updated_at = @updated_at
          WHERE id = @id
          RETURNING ${CREDENTIAL_COLUMNS}
        `
      ).get({
        id: current.id,
        url: patch.url ?? current.url,
        password: patch.password ?? current.password,
        updated_at: new Date().toISOString()
      }) as CredentialRow;
      return rowToCredential(row);
    });

    return tx();
  }

  deleteCredential(title: string, username: string): number {
    const result = this.db.prepare(
      "DELETE FROM credentials WHERE title = ? AND username = ?"
    ).run(title, username);
    return result.changes;
  }

  listDistinctTitles(): string[] {
    const rows = this.db.prepare("SELECT DISTINCT title FROM credentials").all() as Array<{ title: string }>;
    return rows.map((row) => row.title);
  }

  // ─── Master Password ──────────────────────────────────────────────────────

  getMasterPassword(): MasterPasswordRecord | undefined {
    const row = this.db.prepare(
      "SELECT hash, created_at FROM master_password WHERE id = 1"
    ).get() as MasterPasswordRow | undefined;

    if (!row) {
      return undefined;
    }
    return { hash: row.hash, createdAt: row.created_at };
  }

  saveMasterPassword(hash: string): MasterPasswordRecord {
    const createdAt = new Date().toISOString();
    try {
      this.db.prepare(
        "INSERT INTO master_password (id, hash, created_at) VALUES (1, @hash, @created_at)"
      ).run({ hash, created_at: createdAt });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateEntryError("A master password is already set for this vault.", { cause: error });
      }
      throw error;
    }
    return { hash, createdAt };
  }

  // ─── Housekeeping ─────────────────────────────────────────────────────────

  listMigrations(): MigrationRecord[] {
    const rows = this.db.prepare(
      "SELECT version, name, applied_at FROM schema_migrations ORDER BY version ASC"
    ).all() as MigrationRow[];
    return rows.map(rowToMigration);
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
