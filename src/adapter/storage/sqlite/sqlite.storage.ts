import fs from "node:fs";
import path from "node:path";
import BetterSqlite3, { type Database as BetterSqliteDatabase } from "better-sqlite3";
import { StorageError, toErrorMessage } from "../../../core/errors/focus.errors";

export type SQLiteParam = string | number | bigint | Buffer | null;

export interface SQLiteRunResult {
  readonly changes: number;
  readonly lastInsertRowid: number | bigint;
}

export interface Storage {
  connect(): void;
  close(): void;
  isOpen(): boolean;
  exec(sql: string, params?: readonly SQLiteParam[]): SQLiteRunResult;
  query<T extends Record<string, unknown>>(
    sql: string,
    params?: readonly SQLiteParam[]
  ): readonly T[];
}

export interface SQLiteStorageOptions {
  readonly dbPath?: string;
  readonly expectedSchemaVersion?: string;
  readonly ["readonly"]?: boolean;
}

export const DEFAULT_SQLITE_DB_REL_PATH = path.join("ops", "runtime", "focus.db");
export const SQLITE_STORAGE_SCHEMA_VERSION = "1";

const CREATE_SCHEMA_VERSION_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS schema_version (
  version TEXT PRIMARY KEY,
  applied_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);
`;

const CREATE_SESSIONS_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS sessions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  start_time TEXT NOT NULL,
  duration_minutes INTEGER NOT NULL CHECK(duration_minutes > 0),
  tag TEXT,
  notes TEXT
);

CREATE INDEX IF NOT EXISTS idx_sessions_start_time
  ON sessions(start_time DESC, id DESC);
`;

function resolveDbPath(explicitPath?: string): string {
  if (explicitPath && explicitPath.trim() !== "") {
    return path.resolve(explicitPath);
  }
  return path.resolve(process.cwd(), DEFAULT_SQLITE_DB_REL_PATH);
}

export class SQLiteStorage implements Storage {
  private readonly dbPath: string;
  private readonly expectedSchemaVersion: string;
  private readonly readOnlyMode: boolean;
  private db: BetterSqliteDatabase | null = null;
  private closed = false;

  constructor(options: SQLiteStorageOptions = {}) {
    this.dbPath = resolveDbPath(options.dbPath);
    this.expectedSchemaVersion = options.expectedSchemaVersion ?? SQLITE_STORAGE_SCHEMA_VERSION;
    this.readOnlyMode = options["readonly"] === true;
  }

  connect(): void {
    if (this.closed) {
      throw new StorageError("SQLITE_STORAGE_ERROR storage has been closed");
    }
    if (this.db !== null) {
      throw new StorageError("SQLITE_STORAGE_ERROR single connection already opened");
    }

    let db: BetterSqliteDatabase;
    try {
      if (!this.readOnlyMode) {
        fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
      }
      db = this.readOnlyMode
        ? new BetterSqlite3(this.dbPath, { readonly: true, fileMustExist: true })
        : new BetterSqlite3(this.dbPath);
    } catch (error) {
      throw new StorageError(
        `SQLITE_STORAGE_OPEN_FAILED ${this.dbPath}: ${toErrorMessage(error)}`,
        { cause: error }
      );
    }

    try {
      if (!this.readOnlyMode) {
        db.exec("PRAGMA journal_mode = WAL;");
        db.exec("PRAGMA synchronous = FULL;");
      }
      this.db = db;
      this.initializeSchema();
    } catch (error) {
      db.close();
      this.db = null;
      if (error instanceof StorageError) {
        throw error;
      }
      throw new StorageError(
        `SQLITE_STORAGE_INIT_FAILED ${this.dbPath}: ${toErrorMessage(error)}`,
        { cause: error }
      );
    }
  }

  close(): void {
    if (this.db === null) {
      this.closed = true;
      return;
    }
    this.db.close();
    this.db = null;
    this.closed = true;
  }

  isOpen(): boolean {
    return this.db !== null;
  }

  exec(sql: string, params: readonly SQLiteParam[] = []): SQLiteRunResult {
    this.assertWritable();
    const db = this.requireDb();
    return db.prepare(sql).run(...params);
  }

  query<T extends Record<string, unknown>>(
    sql: string,
    params: readonly SQLiteParam[] = []
  ): readonly T[] {
    const db = this.requireDb();
    return db.prepare<SQLiteParam[], T>(sql).all(...params);
  }

  private initializeSchema(): void {
    const db = this.requireDb();
    if (!this.readOnlyMode) {
      db.exec(CREATE_SCHEMA_VERSION_TABLE_SQL);
    }

    this.validateSchemaVersionTableShape();

    const versions = this.query<{ version: unknown }>(
      "SELECT version FROM schema_version ORDER BY version ASC"
    );

    if (this.readOnlyMode) {
      this.assertSchemaVersionMatch(versions);
      return;
    }

    if (versions.length === 0) {
      db.exec("BEGIN TRANSACTION;");
      try {
        db.exec(CREATE_SESSIONS_SCHEMA_SQL);
        this.exec("INSERT INTO schema_version(version) VALUES (?)", [
          this.expectedSchemaVersion,
        ]);
        db.exec("COMMIT;");
      } catch (error) {
        db.exec("ROLLBACK;");
        throw error;
      }
      return;
    }

    this.assertSchemaVersionMatch(versions);
    db.exec(CREATE_SESSIONS_SCHEMA_SQL);
  }

  private assertSchemaVersionMatch(versions: readonly { version: unknown }[]): void {
    const storedVersions = versions
      .map((row) => row.version)
      .filter((value): value is string => typeof value === "string");
    const schemaMatches =
      storedVersions.length === 1 && storedVersions[0] === this.expectedSchemaVersion;

    if (!schemaMatches) {
      throw new StorageError(
        `SQLITE_STORAGE_VERSION_MISMATCH expected=${this.expectedSchemaVersion} actual=${storedVersions.join(",")}`
      );
    }
  }

  private validateSchemaVersionTableShape(): void {
    const columns = this.query<{
      name?: unknown;
      type?: unknown;
      pk?: unknown;
    }>("PRAGMA table_info(schema_version)");

    const normalized = columns.map((column) => ({
      name: typeof column.name === "string" ? column.name : "",
      type: typeof column.type === "string" ? column.type.toUpperCase() : "",
      pk: Number(column.pk ?? 0),
    }));

    const isExactShape =
      normalized.length === 2 &&
      normalized[0]?.name === "version" &&
      normalized[0]?.type === "TEXT" &&
      normalized[0]?.pk === 1 &&
      normalized[1]?.name === "applied_at" &&
      normalized[1]?.type === "TIMESTAMP" &&
      normalized[1]?.pk === 0;

    if (!isExactShape) {
      throw new StorageError("SQLITE_STORAGE_SCHEMA_CORRUPTED schema_version shape mismatch");
    }
  }

  private assertWritable(): void {
    if (this.readOnlyMode) {
      throw new StorageError("SQLITE_STORAGE_READONLY_WRITE_BLOCKED");
    }
  }

  private requireDb(): BetterSqliteDatabase {
    if (this.db === null) {
      if (this.closed) {
        throw new StorageError("SQLITE_STORAGE_ERROR connection is closed");
      }
      throw new StorageError("SQLITE_STORAGE_ERROR connection is not open");
    }
    return this.db;
  }
}
