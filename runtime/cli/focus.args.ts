import { ConfigurationError } from "../../src/core/errors/focus.errors";

export const DEFAULT_LOG_LAST = 10;

export interface StartCommandArgs {
  readonly command: "start";
  readonly minutes: number;
  readonly tag?: string;
  readonly soundPath?: string;
  readonly dbPath?: string;
  readonly silent: boolean;
}

export interface LogCommandArgs {
  readonly command: "log";
  readonly last: number;
  readonly dbPath?: string;
}

export type FocusCliArgs = StartCommandArgs | LogCommandArgs;

export function focusUsage(): string {
  return [
    "Usage:",
    "  focus start <minutes> [--tag <tag>] [--sound-path <file>] [--db <file>] [--silent]",
    "  focus log [--last <n>] [--db <file>]",
  ].join("\n");
}

interface ScannedArgs {
  readonly positional: readonly string[];
  readonly flags: ReadonlyMap<string, string>;
  readonly switches: ReadonlySet<string>;
}

const VALUE_FLAGS = new Set(["--tag", "--sound-path", "--db", "--last"]);
const SWITCH_FLAGS = new Set(["--silent"]);

function scanArgs(argv: readonly string[]): ScannedArgs {
  const positional: string[] = [];
  const flags = new Map<string, string>();
  const switches = new Set<string>();

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (typeof token !== "string" || token === "--") {
      continue;
    }
    if (VALUE_FLAGS.has(token)) {
      const next = argv[i + 1];
      if (typeof next !== "string" || next.trim() === "" || next.startsWith("--")) {
        throw new ConfigurationError(`CONFIGURATION_ERROR ${token} requires a value`);
      }
      flags.set(token, next.trim());
      i += 1;
      continue;
    }
    if (SWITCH_FLAGS.has(token)) {
      switches.add(token);
      continue;
    }
    if (token.startsWith("--")) {
      throw new ConfigurationError(`CONFIGURATION_ERROR unknown option ${token}`);
    }
    positional.push(token);
  }

  return { positional, flags, switches };
}

function parseLast(raw: string | undefined): number {
  if (typeof raw === "undefined") {
    return DEFAULT_LOG_LAST;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(`CONFIGURATION_ERROR --last must be a positive integer, got ${raw}`);
  }
  return parsed;
}

/**
 * Syntax only. Minutes are passed through as a number so the session
 * controller owns duration validation.
 */
export function parseFocusArgs(argv: readonly string[]): FocusCliArgs {
  const { positional, flags, switches } = scanArgs(argv);
  const [command, ...rest] = positional;

  if (command === "start") {
    const rawMinutes = rest[0];
    if (typeof rawMinutes !== "string") {
      throw new ConfigurationError("CONFIGURATION_ERROR start requires <minutes>");
    }
    if (rest.length > 1) {
      throw new ConfigurationError(`CONFIGURATION_ERROR unexpected argument ${rest[1] ?? ""}`);
    }
    return {
      command: "start",
      minutes: Number(rawMinutes),
      tag: flags.get("--tag"),
      soundPath: flags.get("--sound-path"),
      dbPath: flags.get("--db"),
      silent: switches.has("--silent"),
    };
  }

  if (command === "log") {
    if (rest.length > 0) {
      throw new ConfigurationError(`CONFIGURATION_ERROR unexpected argument ${rest[0] ?? ""}`);
    }
    return {
      command: "log",
      last: parseLast(flags.get("--last")),
      dbPath: flags.get("--db"),
    };
  }

  throw new ConfigurationError(
    `CONFIGURATION_ERROR unknown command "${command ?? ""}". Available commands: start, log`
  );
}
