export type SessionStateName =
  | "configuring"
  | "running"
  | "awaiting_note"
  | "completed"
  | "cancelled";

export interface SessionRecord {
  readonly id: number;
  /** ISO-8601 UTC, stored and returned verbatim. */
  readonly startTime: string;
  readonly durationMinutes: number;
  readonly tag: string | null;
  readonly notes: string | null;
}

export type NewSessionRecord = Omit<SessionRecord, "id">;

/** Append-only: no update or delete. */
export interface SessionRecordStore {
  insert(record: NewSessionRecord): number;
  recent(limit: number): readonly SessionRecord[];
}

export interface SessionSnapshot {
  readonly state: SessionStateName;
  readonly durationMinutes: number | null;
  readonly tag: string | null;
  readonly startTime: string | null;
  readonly remainingMs: number;
}
