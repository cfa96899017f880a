export {
  DEFAULT_SQLITE_DB_REL_PATH,
  SQLITE_STORAGE_SCHEMA_VERSION,
  SQLiteStorage,
  type SQLiteParam,
  type SQLiteRunResult,
  type SQLiteStorageOptions,
  type Storage,
} from "./sqlite.storage";

export {
  SQLiteSessionRecordStore,
  createSessionStorageLayer,
  type SessionStorageLayer,
} from "./session_record.store";
