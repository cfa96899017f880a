import fs from "node:fs";
import { createInterface } from "node:readline/promises";
import { pathToFileURL } from "node:url";
import {
  ConfigurationError,
  InvalidStateError,
  StorageError,
  isFocusError,
  toErrorMessage,
} from "../../src/core/errors/focus.errors";
import { scopedLog, type FocusLog } from "../../src/core/logging/focus.log";
import { createSessionStorageLayer } from "../../src/adapter/storage/sqlite";
import { SilentNotifier, type Notifier } from "../../src/notify/notifier.types";
import { SoundFileNotifier } from "../../src/notify/sound_file.notifier";
import { FocusSessionController } from "../../src/session/session.lifecycle";
import type { SessionRecord, SessionRecordStore } from "../../src/session/session.types";
import { CountdownTimer, MS_PER_MINUTE } from "../../src/timer/countdown.timer";
import type { MonotonicClock, Scheduler, WallClock } from "../../src/timer/monotonic.clock";
import { resolveFocusConfig, type FocusConfig } from "../config/focus.config";
import {
  focusUsage,
  parseFocusArgs,
  type LogCommandArgs,
  type StartCommandArgs,
} from "./focus.args";

export interface FocusCliIo extends FocusLog {
  /** Resolves to null when input ends or the prompt is interrupted. */
  readonly prompt: (question: string) => Promise<string | null>;
  /** Registers a Ctrl+C handler; returns the unregister function. */
  readonly onInterrupt: (handler: () => void) => () => void;
}

export interface OpenedSessionStore {
  readonly store: SessionRecordStore;
  readonly close: () => void;
}

export interface FocusCliDeps {
  readonly openStore: (config: FocusConfig) => OpenedSessionStore;
  readonly createNotifier: (config: FocusConfig) => Notifier;
  readonly soundAssetExists: (soundPath: string) => boolean;
  readonly clock?: MonotonicClock;
  readonly scheduler?: Scheduler;
  readonly wallClock?: WallClock;
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatLocalMinute(value: Date): string {
  const year = String(value.getFullYear()).padStart(4, "0");
  return `${year}-${pad2(value.getMonth() + 1)}-${pad2(value.getDate())} ${pad2(value.getHours())}:${pad2(value.getMinutes())}`;
}

export function formatLocalClock(value: Date): string {
  return `${pad2(value.getHours())}:${pad2(value.getMinutes())}:${pad2(value.getSeconds())}`;
}

export function formatHistoryLine(record: SessionRecord): string {
  const when = formatLocalMinute(new Date(record.startTime));
  const duration = String(record.durationMinutes).padStart(3, " ");
  const tag = record.tag === null ? "-" : `[${record.tag}]`;
  return `${when} | ${duration} min | ${tag} | ${record.notes ?? ""}`;
}

async function promptLine(question: string): Promise<string | null> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  const abort = new AbortController();
  rl.once("SIGINT", () => abort.abort());
  rl.once("close", () => abort.abort());
  try {
    return await rl.question(question, { signal: abort.signal });
  } catch (error) {
    if (abort.signal.aborted) {
      return null;
    }
    throw error;
  } finally {
    rl.close();
  }
}

export const PROCESS_CLI_IO: FocusCliIo = {
  log: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
  prompt: promptLine,
  onInterrupt: (handler) => {
    process.on("SIGINT", handler);
    return () => {
      process.off("SIGINT", handler);
    };
  },
};

export const DEFAULT_FOCUS_CLI_DEPS: FocusCliDeps = {
  openStore: (config) => {
    const layer = createSessionStorageLayer({ dbPath: config.dbPath });
    layer.storage.connect();
    return {
      store: layer.sessionStore,
      close: () => layer.storage.close(),
    };
  },
  createNotifier: (config) => new SoundFileNotifier({ soundPath: config.soundPath }),
  soundAssetExists: (soundPath) => fs.existsSync(soundPath),
};

async function collectAndSubmitNote(
  controller: FocusSessionController,
  durationMinutes: number,
  io: FocusCliIo
): Promise<number> {
  io.log(`\n${durationMinutes}-minute block finished! What did you get done?`);
  const note = await io.prompt("> ");
  if (note === null) {
    io.log("No note entered, session discarded.");
    return 0;
  }

  while (true) {
    try {
      const record = controller.submitNote(note);
      io.log(`Saved session #${record.id}. Keep it up!`);
      return 0;
    } catch (error) {
      if (!(error instanceof StorageError)) {
        throw error;
      }
      io.error(`could not save session: ${error.message}`);
      const answer = await io.prompt("Retry saving? [r]etry / [q]uit: ");
      if (answer === null || answer.trim().toLowerCase() !== "r") {
        io.log("Session discarded.");
        return 1;
      }
    }
  }
}

async function runStart(
  args: StartCommandArgs,
  io: FocusCliIo,
  deps: FocusCliDeps
): Promise<number> {
  const config = resolveFocusConfig({ dbPath: args.dbPath, soundPath: args.soundPath });
  if (!args.silent && !deps.soundAssetExists(config.soundPath)) {
    io.warn(`[warn] sound file ${config.soundPath} not found - will use terminal bell.`);
  }

  const opened = deps.openStore(config);
  try {
    const controller = new FocusSessionController({
      store: opened.store,
      timer: new CountdownTimer({
        clock: deps.clock,
        scheduler: deps.scheduler,
        tickIntervalMs: config.tickIntervalMs,
      }),
      notifier: args.silent ? new SilentNotifier() : deps.createNotifier(config),
      wallClock: deps.wallClock,
      log: io,
      listeners: {
        onWarning: (warning) => io.warn(`[sound-error] ${warning.message}`),
      },
    });

    const snapshot = controller.start(args.minutes, args.tag);
    const startedAt = new Date(snapshot.startTime ?? Date.now());
    const endsAt = new Date(startedAt.getTime() + args.minutes * MS_PER_MINUTE);
    const tagInfo = snapshot.tag === null ? "" : ` [tag: ${snapshot.tag}]`;
    io.log(`${args.minutes}-min focus started${tagInfo} - ends ~ ${formatLocalClock(endsAt)}`);

    const unregister = io.onInterrupt(() => {
      if (controller.state === "running") {
        controller.cancel();
        io.log("\nSession cancelled.");
      }
    });
    try {
      await controller.whenAwaitingNote();
    } catch (error) {
      if (error instanceof InvalidStateError && controller.state === "cancelled") {
        return 0;
      }
      throw error;
    } finally {
      unregister();
    }

    return await collectAndSubmitNote(controller, args.minutes, io);
  } finally {
    opened.close();
  }
}

function runLog(args: LogCommandArgs, io: FocusCliIo, deps: FocusCliDeps): number {
  const config = resolveFocusConfig({ dbPath: args.dbPath });
  const opened = deps.openStore(config);
  try {
    const records = opened.store.recent(args.last);
    if (records.length === 0) {
      io.log("No sessions recorded yet.");
      return 0;
    }
    for (const record of records) {
      io.log(formatHistoryLine(record));
    }
    return 0;
  } finally {
    opened.close();
  }
}

export async function runFocusCli(
  argv: readonly string[],
  io: FocusCliIo = PROCESS_CLI_IO,
  deps: FocusCliDeps = DEFAULT_FOCUS_CLI_DEPS
): Promise<number> {
  try {
    const args = parseFocusArgs(argv);
    if (args.command === "start") {
      return await runStart(args, io, deps);
    }
    return runLog(args, io, deps);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      io.error(`${error.message}\n${focusUsage()}`);
      return 1;
    }
    if (isFocusError(error)) {
      scopedLog(io, error.kind).error(error.message);
      return 1;
    }
    throw error;
  }
}

async function main(): Promise<void> {
  try {
    process.exitCode = await runFocusCli(process.argv.slice(2));
  } catch (error) {
    console.error(`focus failed: ${toErrorMessage(error)}`);
    process.exitCode = 1;
  }
}

function isEntrypoint(): boolean {
  const scriptPath = process.argv[1];
  if (typeof scriptPath !== "string" || scriptPath.trim() === "") {
    return false;
  }
  return import.meta.url === pathToFileURL(scriptPath).href;
}

if (isEntrypoint()) {
  await main();
}
