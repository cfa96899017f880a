import {
  InvalidStateError,
  NotificationWarning,
  StorageError,
  toErrorMessage,
} from "../core/errors/focus.errors";
import { SILENT_FOCUS_LOG, scopedLog, type FocusLog } from "../core/logging/focus.log";
import { SilentNotifier, type Notifier } from "../notify/notifier.types";
import { assertValidDuration, CountdownTimer, type TimerHandle } from "../timer/countdown.timer";
import { SYSTEM_WALL_CLOCK, type WallClock } from "../timer/monotonic.clock";
import type {
  NewSessionRecord,
  SessionRecord,
  SessionRecordStore,
  SessionSnapshot,
  SessionStateName,
} from "./session.types";

interface ActiveSession {
  readonly durationMinutes: number;
  readonly tag: string | null;
  readonly startTime: string;
  readonly handle: TimerHandle;
}

export interface FocusSessionListeners {
  readonly onStateChange?: (snapshot: SessionSnapshot) => void;
  readonly onTick?: (remainingMs: number) => void;
  readonly onWarning?: (warning: NotificationWarning) => void;
}

export interface FocusSessionControllerDeps {
  readonly store: SessionRecordStore;
  readonly timer?: CountdownTimer;
  readonly notifier?: Notifier;
  readonly wallClock?: WallClock;
  readonly log?: FocusLog;
  readonly listeners?: FocusSessionListeners;
}

interface ExpiryWaiter {
  readonly resolve: () => void;
  readonly reject: (error: unknown) => void;
}

function normalizeOptionalText(value: string | null | undefined): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  return trimmed === "" ? null : trimmed;
}

function toNotificationWarning(error: unknown): NotificationWarning {
  if (error instanceof NotificationWarning) {
    return error;
  }
  return new NotificationWarning(`NOTIFICATION_FAILED ${toErrorMessage(error)}`, {
    cause: error,
  });
}

/**
 * Owns one focus session from configuration to its terminal state.
 *
 * configuring -> running -> awaiting_note -> completed
 *                running -> cancelled
 *
 * Terminal controllers reject every lifecycle call; create a new controller
 * for the next session.
 */
export class FocusSessionController {
  private readonly store: SessionRecordStore;
  private readonly timer: CountdownTimer;
  private readonly notifier: Notifier;
  private readonly wallClock: WallClock;
  private readonly log: FocusLog;
  private readonly listeners: FocusSessionListeners;
  private currentState: SessionStateName = "configuring";
  private session: ActiveSession | null = null;
  private expiryWaiters: ExpiryWaiter[] = [];

  constructor(deps: FocusSessionControllerDeps) {
    this.store = deps.store;
    this.timer = deps.timer ?? new CountdownTimer();
    this.notifier = deps.notifier ?? new SilentNotifier();
    this.wallClock = deps.wallClock ?? SYSTEM_WALL_CLOCK;
    this.log = scopedLog(deps.log ?? SILENT_FOCUS_LOG, "session");
    this.listeners = deps.listeners ?? {};
  }

  get state(): SessionStateName {
    return this.currentState;
  }

  snapshot(): SessionSnapshot {
    const remainingMs = this.peekRemaining();
    const session = this.session;
    return {
      state: this.currentState,
      durationMinutes: session?.durationMinutes ?? null,
      tag: session?.tag ?? null,
      startTime: session?.startTime ?? null,
      remainingMs,
    };
  }

  start(durationMinutes: number, tag?: string | null): SessionSnapshot {
    if (this.currentState !== "configuring") {
      throw new InvalidStateError("start", this.currentState);
    }
    assertValidDuration(durationMinutes);

    const startTime = this.wallClock.nowIso();
    const handle = this.timer.start(durationMinutes, {
      onTick: (remainingMs) => this.emit("onTick", () => this.listeners.onTick?.(remainingMs)),
      onExpire: () => this.handleExpiry(),
    });
    this.session = {
      durationMinutes,
      tag: normalizeOptionalText(tag),
      startTime,
      handle,
    };
    this.log.log(
      `started duration=${durationMinutes}min tag=${this.session.tag ?? "-"} at=${startTime}`
    );
    this.transition("running");
    return this.snapshot();
  }

  cancel(): SessionSnapshot {
    const session = this.session;
    if (this.currentState !== "running" || session === null) {
      throw new InvalidStateError("cancel", this.currentState);
    }

    this.timer.cancel(session.handle);
    this.log.log("cancelled, nothing recorded");
    this.transition("cancelled");
    this.rejectExpiryWaiters(new InvalidStateError("awaitExpiry", "cancelled"));
    return this.snapshot();
  }

  remaining(): number {
    if (this.currentState === "awaiting_note") {
      return 0;
    }
    const session = this.session;
    if (this.currentState !== "running" || session === null) {
      throw new InvalidStateError("remaining", this.currentState);
    }
    // Polling may itself observe the deadline and deliver expiry.
    return this.timer.remaining(session.handle);
  }

  /**
   * Commits the session. On `StorageError` the controller stays in
   * `awaiting_note` and the same call can be retried.
   */
  submitNote(note?: string | null): SessionRecord {
    const session = this.session;
    if (this.currentState !== "awaiting_note" || session === null) {
      throw new InvalidStateError("submitNote", this.currentState);
    }

    const record: NewSessionRecord = {
      startTime: session.startTime,
      durationMinutes: session.durationMinutes,
      tag: session.tag,
      notes: normalizeOptionalText(note),
    };

    let id: number;
    try {
      id = this.store.insert(record);
    } catch (error) {
      const storageError =
        error instanceof StorageError
          ? error
          : new StorageError(`SESSION_COMMIT_FAILED ${toErrorMessage(error)}`, { cause: error });
      this.log.error(`record not saved, still awaiting note: ${storageError.message}`);
      throw storageError;
    }

    this.log.log(`recorded id=${id}`);
    this.transition("completed");
    return { id, ...record };
  }

  history(limit: number): readonly SessionRecord[] {
    return this.store.recent(limit);
  }

  /** Resolves once the session reaches `awaiting_note`. */
  whenAwaitingNote(): Promise<void> {
    if (this.currentState === "awaiting_note") {
      return Promise.resolve();
    }
    if (this.currentState !== "running") {
      return Promise.reject(new InvalidStateError("awaitExpiry", this.currentState));
    }
    return new Promise<void>((resolve, reject) => {
      this.expiryWaiters.push({ resolve, reject });
    });
  }

  private handleExpiry(): void {
    if (this.currentState !== "running") {
      return;
    }
    this.log.log("timer expired, awaiting note");
    this.transition("awaiting_note");
    void this.notify();

    const waiters = this.expiryWaiters;
    this.expiryWaiters = [];
    for (const waiter of waiters) {
      waiter.resolve();
    }
  }

  private async notify(): Promise<void> {
    try {
      await this.notifier.play();
    } catch (error) {
      const warning = toNotificationWarning(error);
      this.log.warn(warning.message);
      this.emit("onWarning", () => this.listeners.onWarning?.(warning));
    }
  }

  /** Listener failures are logged and never interrupt the lifecycle. */
  private emit(listener: keyof FocusSessionListeners, call: () => void): void {
    try {
      call();
    } catch (error) {
      this.log.error(`${listener} listener failed: ${toErrorMessage(error)}`);
    }
  }

  private rejectExpiryWaiters(error: InvalidStateError): void {
    const waiters = this.expiryWaiters;
    this.expiryWaiters = [];
    for (const waiter of waiters) {
      waiter.reject(error);
    }
  }

  private transition(next: SessionStateName): void {
    this.currentState = next;
    const snapshot = this.snapshot();
    this.emit("onStateChange", () => this.listeners.onStateChange?.(snapshot));
  }

  private peekRemaining(): number {
    const session = this.session;
    if (this.currentState !== "running" || session === null) {
      return 0;
    }
    return this.timer.peek(session.handle);
  }
}
