import { InvalidLimitError, StorageError, toErrorMessage } from "../../../core/errors/focus.errors";
import { assertValidDuration } from "../../../timer/countdown.timer";
import type {
  NewSessionRecord,
  SessionRecord,
  SessionRecordStore,
} from "../../../session/session.types";
import { SQLiteStorage, type SQLiteStorageOptions, type Storage } from "./sqlite.storage";

const ISO_TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/;

function fromSessionRow(row: Record<string, unknown>): SessionRecord {
  return {
    id: Number(row.id),
    startTime: String(row.start_time),
    durationMinutes: Number(row.duration_minutes),
    tag: typeof row.tag === "string" ? row.tag : null,
    notes: typeof row.notes === "string" ? row.notes : null,
  };
}

function toStorageError(action: string, error: unknown): StorageError {
  if (error instanceof StorageError) {
    return error;
  }
  return new StorageError(`SESSION_STORE_ERROR ${action}: ${toErrorMessage(error)}`, {
    cause: error,
  });
}

export class SQLiteSessionRecordStore implements SessionRecordStore {
  constructor(private readonly storage: Storage) {}

  insert(record: NewSessionRecord): number {
    assertValidDuration(record.durationMinutes);
    if (!ISO_TIMESTAMP_PATTERN.test(record.startTime)) {
      throw new StorageError(
        `SESSION_STORE_ERROR startTime must be an ISO-8601 UTC timestamp, got ${record.startTime}`
      );
    }

    try {
      this.ensureConnected();
      const result = this.storage.exec(
        `
        INSERT INTO sessions (start_time, duration_minutes, tag, notes)
        VALUES (?, ?, ?, ?)
        `,
        [record.startTime, record.durationMinutes, record.tag, record.notes]
      );
      return Number(result.lastInsertRowid);
    } catch (error) {
      throw toStorageError("insert failed", error);
    }
  }

  recent(limit: number): readonly SessionRecord[] {
    if (!Number.isSafeInteger(limit) || limit <= 0) {
      throw new InvalidLimitError(limit);
    }

    try {
      this.ensureConnected();
      const rows = this.storage.query<Record<string, unknown>>(
        `
        SELECT id, start_time, duration_minutes, tag, notes
        FROM sessions
        ORDER BY start_time DESC, id DESC
        LIMIT ?
        `,
        [limit]
      );
      return rows.map((row) => fromSessionRow(row));
    } catch (error) {
      throw toStorageError("recent failed", error);
    }
  }

  count(): number {
    try {
      this.ensureConnected();
      const row = this.storage.query<{ total: unknown }>(
        "SELECT COUNT(*) AS total FROM sessions"
      )[0];
      return Number(row?.total ?? 0);
    } catch (error) {
      throw toStorageError("count failed", error);
    }
  }

  private ensureConnected(): void {
    if (!this.storage.isOpen()) {
      this.storage.connect();
    }
  }
}

export interface SessionStorageLayer {
  readonly storage: SQLiteStorage;
  readonly sessionStore: SQLiteSessionRecordStore;
}

export function createSessionStorageLayer(
  options: SQLiteStorageOptions = {}
): SessionStorageLayer {
  const storage = new SQLiteStorage(options);
  return {
    storage,
    sessionStore: new SQLiteSessionRecordStore(storage),
  };
}
