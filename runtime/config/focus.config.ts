import os from "node:os";
import path from "node:path";
import { ConfigurationError } from "../../src/core/errors/focus.errors";
import { DEFAULT_SQLITE_DB_REL_PATH } from "../../src/adapter/storage/sqlite";
import { DEFAULT_SOUND_FILENAME } from "../../src/notify/sound_file.notifier";
import { DEFAULT_TICK_INTERVAL_MS } from "../../src/timer/countdown.timer";

export interface FocusConfigInput {
  readonly dbPath?: string;
  readonly soundPath?: string;
  readonly tickIntervalMs?: number;
}

export interface FocusConfig {
  readonly dbPath: string;
  readonly soundPath: string;
  readonly tickIntervalMs: number;
}

function toTrimmedString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

function expandHome(pathname: string): string {
  if (pathname === "~") {
    return os.homedir();
  }
  if (pathname.startsWith("~/") || pathname.startsWith("~\\")) {
    return path.join(os.homedir(), pathname.slice(2));
  }
  return pathname;
}

function parseTickInterval(value: number | undefined): number {
  if (typeof value === "undefined") {
    return DEFAULT_TICK_INTERVAL_MS;
  }
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(
      `CONFIGURATION_ERROR tickIntervalMs must be a positive integer, got ${String(value)}`
    );
  }
  return value;
}

export function resolveFocusConfig(
  input: FocusConfigInput = {},
  cwd: string = process.cwd()
): FocusConfig {
  const dbPath = toTrimmedString(input.dbPath) ?? DEFAULT_SQLITE_DB_REL_PATH;
  const soundPath = toTrimmedString(input.soundPath) ?? DEFAULT_SOUND_FILENAME;
  return {
    dbPath: path.resolve(cwd, expandHome(dbPath)),
    soundPath: path.resolve(cwd, expandHome(soundPath)),
    tickIntervalMs: parseTickInterval(input.tickIntervalMs),
  };
}
