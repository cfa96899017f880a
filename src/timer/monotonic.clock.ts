import { performance } from "node:perf_hooks";

export interface MonotonicClock {
  /** Milliseconds from an arbitrary origin. Never goes backwards. */
  now(): number;
}

export type CancelScheduled = () => void;

export interface Scheduler {
  schedule(delayMs: number, fn: () => void): CancelScheduled;
}

export const PERFORMANCE_CLOCK: MonotonicClock = {
  now: () => performance.now(),
};

export const TIMEOUT_SCHEDULER: Scheduler = {
  schedule(delayMs, fn) {
    const timer = setTimeout(fn, Math.max(0, delayMs));
    return () => clearTimeout(timer);
  },
};

export interface WallClock {
  nowIso(): string;
}

export const SYSTEM_WALL_CLOCK: WallClock = {
  nowIso: () => new Date().toISOString(),
};
