/**
 * Intent: focus session lifecycle lock — validated start, single active session, notify-then-await-note on expiry,
 * exactly-once persistence with retry after storage failure, and cancelled sessions never persisted.
 * Scope: FocusSessionController with a hand-driven clock, a recording notifier, and a temp SQLite store.
 */
import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { createSessionStorageLayer } from "../../src/adapter/storage/sqlite";
import {
  InvalidDurationError,
  InvalidStateError,
  NotificationWarning,
  StorageError,
} from "../../src/core/errors/focus.errors";
import type { FocusLog } from "../../src/core/logging/focus.log";
import type { Notifier } from "../../src/notify/notifier.types";
import { FocusSessionController } from "../../src/session/session.lifecycle";
import type {
  NewSessionRecord,
  SessionRecord,
  SessionRecordStore,
  SessionStateName,
} from "../../src/session/session.types";
import { CountdownTimer } from "../../src/timer/countdown.timer";
import { FixedWallClock, ManualTime } from "../helpers/manual_time";

const START_ISO = "2026-03-01T09:00:00.000Z";

class RecordingNotifier implements Notifier {
  calls = 0;

  constructor(private readonly failWith?: unknown) {}

  async play(): Promise<void> {
    this.calls += 1;
    if (typeof this.failWith !== "undefined") {
      throw this.failWith;
    }
  }
}

/** Delegates to a real store but fails the next `failures` inserts. */
class FlakyStore implements SessionRecordStore {
  insertAttempts = 0;

  constructor(
    private readonly inner: SessionRecordStore,
    private failures: number
  ) {}

  insert(record: NewSessionRecord): number {
    this.insertAttempts += 1;
    if (this.failures > 0) {
      this.failures -= 1;
      throw new StorageError("SESSION_STORE_ERROR insert failed: SQLITE_FULL: database or disk is full");
    }
    return this.inner.insert(record);
  }

  recent(limit: number): readonly SessionRecord[] {
    return this.inner.recent(limit);
  }
}

function createTempStore(t: test.TestContext) {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "focus-lifecycle-"));
  const layer = createSessionStorageLayer({ dbPath: path.join(dir, "focus.db") });
  t.after(() => {
    layer.storage.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });
  return layer.sessionStore;
}

function captureLog(): { log: FocusLog; lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    log: {
      log: (message) => lines.push(`log ${message}`),
      warn: (message) => lines.push(`warn ${message}`),
      error: (message) => lines.push(`error ${message}`),
    },
  };
}

function setup(
  t: test.TestContext,
  options: { store?: SessionRecordStore; notifier?: RecordingNotifier; log?: FocusLog } = {}
) {
  const time = new ManualTime();
  const store = options.store ?? createTempStore(t);
  const notifier = options.notifier ?? new RecordingNotifier();
  const states: SessionStateName[] = [];
  const warnings: NotificationWarning[] = [];
  const controller = new FocusSessionController({
    store,
    timer: new CountdownTimer({ clock: time, scheduler: time }),
    notifier,
    wallClock: new FixedWallClock(START_ISO),
    log: options.log,
    listeners: {
      onStateChange: (snapshot) => states.push(snapshot.state),
      onWarning: (warning) => warnings.push(warning),
    },
  });
  return { time, store, notifier, controller, states, warnings };
}

async function flushMicrotasks(): Promise<void> {
  await new Promise<void>((resolve) => setImmediate(resolve));
}

test("scenario: deep-work session runs, notifies once, and records the note", async (t) => {
  const { time, store, notifier, controller, states } = setup(t);

  const started = controller.start(25, "deep-work");
  assert.deepEqual(started, {
    state: "running",
    durationMinutes: 25,
    tag: "deep-work",
    startTime: START_ISO,
    remainingMs: 1_500_000,
  });

  time.advance(25 * 60_000);
  assert.equal(controller.state, "awaiting_note");
  assert.equal(notifier.calls, 1);
  assert.equal(controller.remaining(), 0);

  const saved = controller.submitNote("shipped feature");
  assert.equal(controller.state, "completed");
  assert.deepEqual(store.recent(10), [saved]);
  assert.deepEqual(
    { ...saved, id: 0 },
    {
      id: 0,
      startTime: START_ISO,
      durationMinutes: 25,
      tag: "deep-work",
      notes: "shipped feature",
    }
  );
  assert.deepEqual(states, ["running", "awaiting_note", "completed"]);
});

test("start: remaining right after start is the full duration in milliseconds", (t) => {
  const { controller, time } = setup(t);
  controller.start(3);
  assert.equal(controller.remaining(), 180_000);
  time.advance(1_000);
  assert.equal(controller.remaining(), 179_000);
});

test("start: zero and negative durations are rejected and leave the controller configuring", (t) => {
  const { controller, states } = setup(t);

  assert.throws(() => controller.start(0, "x"), InvalidDurationError);
  assert.throws(() => controller.start(-5, "x"), InvalidDurationError);
  assert.throws(() => controller.start(2.5), InvalidDurationError);

  assert.equal(controller.state, "configuring");
  assert.deepEqual(states, []);
  assert.throws(() => controller.remaining(), InvalidStateError);
});

test("start: a second start while running fails and leaves the first timer untouched", (t) => {
  const { controller, time } = setup(t);
  controller.start(10, "first");
  time.advance(60_000);

  assert.throws(() => controller.start(5, "second"), InvalidStateError);
  assert.equal(controller.remaining(), 540_000);
  assert.equal(controller.snapshot().tag, "first");

  time.advance(540_000);
  assert.equal(controller.state, "awaiting_note");
  assert.throws(() => controller.start(5), InvalidStateError);
});

test("start: blank tag is stored as null, surrounding spaces are trimmed", (t) => {
  const { controller, time } = setup(t);
  controller.start(1, "   ");
  time.advance(60_000);
  const saved = controller.submitNote("  wrote tests  ");
  assert.equal(saved.tag, null);
  assert.equal(saved.notes, "wrote tests");
});

test("submitNote: absent note is stored as null", (t) => {
  const { controller, time, store } = setup(t);
  controller.start(1, "reading");
  time.advance(60_000);
  controller.submitNote();
  assert.equal(store.recent(1)[0]?.notes, null);
});

test("cancel: no record is ever written, even after the original deadline", (t) => {
  const { controller, time, store, notifier, states } = setup(t);
  controller.start(5, "meeting-prep");
  time.advance(30_000);

  const snapshot = controller.cancel();
  assert.equal(snapshot.state, "cancelled");
  time.advance(10 * 60_000);

  assert.equal(controller.state, "cancelled");
  assert.equal(notifier.calls, 0);
  assert.deepEqual(store.recent(10), []);
  assert.deepEqual(states, ["running", "cancelled"]);
});

test("terminal states: every lifecycle call fails with InvalidStateError", (t) => {
  const cancelled = setup(t).controller;
  cancelled.start(1);
  cancelled.cancel();

  const completed = setup(t);
  completed.controller.start(1);
  completed.time.advance(60_000);
  completed.controller.submitNote("done");

  for (const controller of [cancelled, completed.controller]) {
    assert.throws(() => controller.start(1), InvalidStateError);
    assert.throws(() => controller.start(0), InvalidStateError);
    assert.throws(() => controller.cancel(), InvalidStateError);
    assert.throws(() => controller.submitNote("again"), InvalidStateError);
    assert.throws(() => controller.remaining(), InvalidStateError);
  }
  assert.equal(completed.store.recent(10).length, 1);
});

test("submitNote/cancel: rejected outside their states", (t) => {
  const { controller, time } = setup(t);
  assert.throws(() => controller.submitNote("early"), InvalidStateError);
  assert.throws(() => controller.cancel(), InvalidStateError);

  controller.start(1);
  assert.throws(() => controller.submitNote("still running"), InvalidStateError);

  time.advance(60_000);
  assert.throws(() => controller.cancel(), InvalidStateError);
  assert.equal(controller.state, "awaiting_note");
});

test("storage failure: stays awaiting_note and a retry writes exactly one record", (t) => {
  const store = new FlakyStore(createTempStore(t), 1);
  const { lines, log } = captureLog();
  const { controller, time } = setup(t, { store, log });
  controller.start(50, "deep-work");
  time.advance(50 * 60_000);

  assert.throws(() => controller.submitNote("did X"), StorageError);
  assert.equal(controller.state, "awaiting_note");
  assert.deepEqual(store.recent(10), []);

  const saved = controller.submitNote("did X");
  assert.equal(controller.state, "completed");
  assert.equal(store.insertAttempts, 2);
  assert.deepEqual(store.recent(10), [saved]);
  assert.equal(saved.durationMinutes, 50);
  assert.equal(saved.startTime, START_ISO);
  assert.equal(
    lines.includes(
      "error [session] record not saved, still awaiting note: SESSION_STORE_ERROR insert failed: SQLITE_FULL: database or disk is full"
    ),
    true
  );
});

test("storage failure: non-storage errors from a store are wrapped as StorageError", (t) => {
  const store: SessionRecordStore = {
    insert: () => {
      throw new Error("EACCES: permission denied");
    },
    recent() {
      return [];
    },
  };
  const { controller, time } = setup(t, { store });
  controller.start(1);
  time.advance(60_000);

  assert.throws(
    () => controller.submitNote("x"),
    (error: unknown) =>
      error instanceof StorageError &&
      error.message === "SESSION_COMMIT_FAILED EACCES: permission denied"
  );
  assert.equal(controller.state, "awaiting_note");
});

test("notifier failure: reported as a warning and never blocks the note or the record", async (t) => {
  const notifier = new RecordingNotifier(new Error("no audio device"));
  const { lines, log } = captureLog();
  const { controller, time, store, warnings } = setup(t, { notifier, log });
  controller.start(1, "focus");
  time.advance(60_000);

  assert.equal(controller.state, "awaiting_note");
  await flushMicrotasks();

  assert.equal(notifier.calls, 1);
  assert.equal(warnings.length, 1);
  assert.ok(warnings[0] instanceof NotificationWarning);
  assert.equal(warnings[0]?.message, "NOTIFICATION_FAILED no audio device");
  assert.equal(lines.includes("warn [session] NOTIFICATION_FAILED no audio device"), true);

  controller.submitNote("still saved");
  assert.equal(store.recent(1)[0]?.notes, "still saved");
});

test("notifier failure: a synchronous throw is isolated too", async (t) => {
  const notifier: Notifier = {
    play: () => {
      throw new NotificationWarning("NOTIFICATION_ASSET_MISSING alarm.wav not found");
    },
  };
  const time = new ManualTime();
  const warnings: string[] = [];
  const controller = new FocusSessionController({
    store: createTempStore(t),
    timer: new CountdownTimer({ clock: time, scheduler: time }),
    notifier,
    listeners: { onWarning: (warning) => warnings.push(warning.message) },
  });
  controller.start(1);
  time.advance(60_000);
  await flushMicrotasks();

  assert.equal(controller.state, "awaiting_note");
  assert.deepEqual(warnings, ["NOTIFICATION_ASSET_MISSING alarm.wav not found"]);
});

test("remaining: a poll past the deadline delivers expiry exactly once", (t) => {
  const { controller, time, notifier, states } = setup(t);
  controller.start(1);

  time.skip(61_000);
  assert.equal(controller.remaining(), 0);
  assert.equal(controller.state, "awaiting_note");
  assert.equal(controller.remaining(), 0);
  time.advance(5_000);

  assert.equal(notifier.calls, 1);
  assert.deepEqual(states, ["running", "awaiting_note"]);
});

test("listeners: a throwing state listener still gets the notifier played and the waiter resolved", async (t) => {
  const time = new ManualTime();
  const notifier = new RecordingNotifier();
  const { lines, log } = captureLog();
  const controller = new FocusSessionController({
    store: createTempStore(t),
    timer: new CountdownTimer({ clock: time, scheduler: time }),
    notifier,
    wallClock: new FixedWallClock(START_ISO),
    log,
    listeners: {
      onStateChange: (snapshot) => {
        if (snapshot.state === "awaiting_note") {
          throw new Error("render failed");
        }
      },
    },
  });
  controller.start(1);
  const expired = controller.whenAwaitingNote();

  time.advance(60_000);
  await expired;

  assert.equal(controller.state, "awaiting_note");
  assert.equal(notifier.calls, 1);
  assert.equal(lines.includes("error [session] onStateChange listener failed: render failed"), true);
  assert.equal(controller.submitNote("kept going").notes, "kept going");
});

test("listeners: a throwing tick listener is logged and expiry is still delivered", (t) => {
  const time = new ManualTime();
  const notifier = new RecordingNotifier();
  const { lines, log } = captureLog();
  let ticks = 0;
  const controller = new FocusSessionController({
    store: createTempStore(t),
    timer: new CountdownTimer({ clock: time, scheduler: time }),
    notifier,
    wallClock: new FixedWallClock(START_ISO),
    log,
    listeners: {
      onTick: () => {
        ticks += 1;
        if (ticks === 1) {
          throw new Error("render failed");
        }
      },
    },
  });
  controller.start(2);

  time.advance(120_000);

  assert.equal(controller.state, "awaiting_note");
  assert.equal(notifier.calls, 1);
  assert.equal(ticks, 120);
  assert.deepEqual(
    lines.filter((line) => line.startsWith("error ")),
    ["error [session] onTick listener failed: render failed"]
  );
});

test("snapshot: reading past the deadline reports zero without delivering expiry", (t) => {
  const { controller, time, notifier, states } = setup(t);
  controller.start(1);

  time.skip(61_000);
  const snapshot = controller.snapshot();

  assert.equal(snapshot.state, "running");
  assert.equal(snapshot.remainingMs, 0);
  assert.equal(notifier.calls, 0);
  assert.deepEqual(states, ["running"]);

  assert.equal(controller.remaining(), 0);
  assert.deepEqual(states, ["running", "awaiting_note"]);
});

test("whenAwaitingNote: resolves on expiry and rejects on cancel", async (t) => {
  const expiring = setup(t);
  expiring.controller.start(1);
  const expired = expiring.controller.whenAwaitingNote();
  expiring.time.advance(60_000);
  await expired;
  await expiring.controller.whenAwaitingNote();

  const cancelling = setup(t);
  cancelling.controller.start(1);
  const waiting = cancelling.controller.whenAwaitingNote();
  cancelling.controller.cancel();
  await assert.rejects(waiting, InvalidStateError);
  await assert.rejects(cancelling.controller.whenAwaitingNote(), InvalidStateError);
});

test("history: most recent first and available in every state", (t) => {
  const store = createTempStore(t);
  for (const [day, notes] of [
    ["01", "T1"],
    ["02", "T2"],
    ["03", "T3"],
    ["04", "T4"],
  ] as const) {
    store.insert({
      startTime: `2026-02-${day}T09:00:00.000Z`,
      durationMinutes: 25,
      tag: null,
      notes,
    });
  }

  const { controller } = setup(t, { store });
  assert.deepEqual(
    controller.history(3).map((row) => row.notes),
    ["T4", "T3", "T2"]
  );
  controller.start(1);
  controller.cancel();
  assert.equal(controller.history(10).length, 4);
});
