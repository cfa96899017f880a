import fs from "node:fs";
import path from "node:path";
import { spawn } from "node:child_process";
import { NotificationWarning, toErrorMessage } from "../core/errors/focus.errors";
import type { Notifier } from "./notifier.types";

export const DEFAULT_SOUND_FILENAME = "alarm.wav";
export const TERMINAL_BELL = "\u0007";

export interface PlayerCommand {
  readonly command: string;
  readonly args: readonly string[];
}

export type PlayerRunner = (player: PlayerCommand) => Promise<void>;

export interface SoundFileNotifierOptions {
  readonly soundPath: string;
  readonly platform?: NodeJS.Platform;
  readonly runPlayer?: PlayerRunner;
  readonly fileExists?: (pathname: string) => boolean;
  readonly bell?: (sequence: string) => void;
}

export function resolvePlayerCommands(
  soundPath: string,
  platform: NodeJS.Platform
): readonly PlayerCommand[] {
  if (platform === "darwin") {
    return [{ command: "afplay", args: [soundPath] }];
  }
  if (platform === "win32") {
    const escaped = soundPath.replace(/'/g, "''");
    return [
      {
        command: "powershell",
        args: [
          "-NoProfile",
          "-NonInteractive",
          "-Command",
          `(New-Object Media.SoundPlayer '${escaped}').PlaySync();`,
        ],
      },
    ];
  }
  return [
    { command: "paplay", args: [soundPath] },
    { command: "aplay", args: ["-q", soundPath] },
  ];
}

export const spawnPlayer: PlayerRunner = (player) =>
  new Promise<void>((resolve, reject) => {
    const child = spawn(player.command, [...player.args], { stdio: "ignore" });
    child.once("error", reject);
    child.once("exit", (code, signal) => {
      if (code === 0) {
        resolve();
        return;
      }
      reject(
        new Error(`${player.command} exited with ${signal ?? `code ${String(code)}`}`)
      );
    });
  });

/**
 * Plays a local audio file through the platform's command-line player and
 * falls back to the terminal bell when that is not possible.
 */
export class SoundFileNotifier implements Notifier {
  private readonly soundPath: string;
  private readonly platform: NodeJS.Platform;
  private readonly runPlayer: PlayerRunner;
  private readonly fileExists: (pathname: string) => boolean;
  private readonly bell: (sequence: string) => void;

  constructor(options: SoundFileNotifierOptions) {
    this.soundPath = path.resolve(options.soundPath);
    this.platform = options.platform ?? process.platform;
    this.runPlayer = options.runPlayer ?? spawnPlayer;
    this.fileExists = options.fileExists ?? ((pathname) => fs.existsSync(pathname));
    this.bell = options.bell ?? ((sequence) => process.stdout.write(sequence));
  }

  hasSoundAsset(): boolean {
    return this.fileExists(this.soundPath);
  }

  async play(): Promise<void> {
    if (!this.hasSoundAsset()) {
      this.bell(TERMINAL_BELL);
      throw new NotificationWarning(
        `NOTIFICATION_ASSET_MISSING ${this.soundPath} not found, used terminal bell`
      );
    }

    const failures: string[] = [];
    for (const player of resolvePlayerCommands(this.soundPath, this.platform)) {
      try {
        await this.runPlayer(player);
        return;
      } catch (error) {
        failures.push(`${player.command}: ${toErrorMessage(error)}`);
      }
    }

    this.bell(TERMINAL_BELL);
    throw new NotificationWarning(
      `NOTIFICATION_PLAYBACK_FAILED ${failures.join("; ")}, used terminal bell`
    );
  }
}
