import { InvalidDurationError } from "../core/errors/focus.errors";
import {
  PERFORMANCE_CLOCK,
  TIMEOUT_SCHEDULER,
  type CancelScheduled,
  type MonotonicClock,
  type Scheduler,
} from "./monotonic.clock";

export const MS_PER_MINUTE = 60_000;
export const DEFAULT_TICK_INTERVAL_MS = 1000;

export type TimerStatus = "running" | "expired" | "cancelled";

export interface TimerListeners {
  readonly onTick?: (remainingMs: number) => void;
  readonly onExpire?: () => void;
}

export interface TimerHandle {
  readonly id: number;
  readonly durationMs: number;
  readonly status: TimerStatus;
}

interface ActiveTimer {
  readonly id: number;
  readonly durationMs: number;
  readonly startedAt: number;
  readonly listeners: TimerListeners;
  status: TimerStatus;
  cancelWake: CancelScheduled | null;
}

export interface CountdownTimerOptions {
  readonly clock?: MonotonicClock;
  readonly scheduler?: Scheduler;
  readonly tickIntervalMs?: number;
}

export function assertValidDuration(durationMinutes: unknown): asserts durationMinutes is number {
  if (
    typeof durationMinutes !== "number" ||
    !Number.isSafeInteger(durationMinutes) ||
    durationMinutes <= 0
  ) {
    throw new InvalidDurationError(durationMinutes);
  }
}

/**
 * Countdown engine driven by a monotonic clock.
 *
 * Remaining time is always recomputed as `duration - (now - startedAt)`, so
 * late wake-ups never accumulate drift. Expiry is delivered at most once per
 * handle: either by the scheduled wake-up at the deadline or by a
 * `remaining()` poll that observes zero first, whichever comes first.
 */
export class CountdownTimer {
  private readonly clock: MonotonicClock;
  private readonly scheduler: Scheduler;
  private readonly tickIntervalMs: number;
  private readonly timers = new Map<number, ActiveTimer>();
  private nextId = 1;

  constructor(options: CountdownTimerOptions = {}) {
    this.clock = options.clock ?? PERFORMANCE_CLOCK;
    this.scheduler = options.scheduler ?? TIMEOUT_SCHEDULER;
    this.tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
  }

  start(durationMinutes: number, listeners: TimerListeners = {}): TimerHandle {
    assertValidDuration(durationMinutes);

    const timer: ActiveTimer = {
      id: this.nextId,
      durationMs: durationMinutes * MS_PER_MINUTE,
      startedAt: this.clock.now(),
      listeners,
      status: "running",
      cancelWake: null,
    };
    this.nextId += 1;
    this.timers.set(timer.id, timer);
    this.armWake(timer);
    return this.toHandle(timer);
  }

  remaining(handle: TimerHandle): number {
    const timer = this.timers.get(handle.id);
    if (!timer || timer.status !== "running") {
      return 0;
    }
    const remainingMs = this.computeRemaining(timer);
    if (remainingMs === 0) {
      this.expire(timer);
    }
    return remainingMs;
  }

  /** Remaining milliseconds without delivering expiry. */
  peek(handle: TimerHandle): number {
    const timer = this.timers.get(handle.id);
    if (!timer || timer.status !== "running") {
      return 0;
    }
    return this.computeRemaining(timer);
  }

  cancel(handle: TimerHandle): void {
    const timer = this.timers.get(handle.id);
    if (!timer) {
      return;
    }
    timer.cancelWake?.();
    timer.cancelWake = null;
    if (timer.status === "running") {
      timer.status = "cancelled";
    }
    this.timers.delete(timer.id);
  }

  private computeRemaining(timer: ActiveTimer): number {
    const elapsed = this.clock.now() - timer.startedAt;
    return Math.max(0, timer.durationMs - elapsed);
  }

  private armWake(timer: ActiveTimer): void {
    const remainingMs = this.computeRemaining(timer);
    timer.cancelWake = this.scheduler.schedule(
      Math.min(this.tickIntervalMs, remainingMs),
      () => this.wake(timer)
    );
  }

  private wake(timer: ActiveTimer): void {
    timer.cancelWake = null;
    if (timer.status !== "running") {
      return;
    }

    const remainingMs = this.computeRemaining(timer);
    try {
      timer.listeners.onTick?.(remainingMs);
    } finally {
      this.advance(timer, remainingMs);
    }
  }

  private advance(timer: ActiveTimer, remainingMs: number): void {
    // A tick listener may cancel the session.
    if (timer.status !== "running") {
      return;
    }
    if (remainingMs === 0) {
      this.expire(timer);
      return;
    }
    this.armWake(timer);
  }

  private expire(timer: ActiveTimer): void {
    if (timer.status !== "running") {
      return;
    }
    timer.status = "expired";
    timer.cancelWake?.();
    timer.cancelWake = null;
    this.timers.delete(timer.id);
    timer.listeners.onExpire?.();
  }

  private toHandle(timer: ActiveTimer): TimerHandle {
    return {
      id: timer.id,
      durationMs: timer.durationMs,
      get status(): TimerStatus {
        return timer.status;
      },
    };
  }
}
