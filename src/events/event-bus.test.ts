import { describe, it, expect } from "vitest";

import { EventBus } from "./event-bus.js";
import type { Event } from "./types.js";

const loaded = (runs: number): Event => ({
  type: "ledger.loaded",
  payload: { path: "training_history.json", models: 1, runs, loaded_at: "2026-01-01T00:00:00.000Z" }
});

describe("EventBus", () => {
  it("delivers payloads to subscribers of the matching type only", () => {
    const bus = new EventBus();
    const runs: number[] = [];
    let appended = 0;
    bus.subscribe("ledger.loaded", (payload) => {
      runs.push(payload.runs);
    });
    bus.subscribe("run.appended", () => {
      appended += 1;
    });

    bus.emit(loaded(3));
    bus.emit(loaded(4));

    expect(runs).toEqual([3, 4]);
    expect(appended).toBe(0);
  });

  it("stops delivering after unsubscribe", () => {
    const bus = new EventBus();
    let calls = 0;
    const unsubscribe = bus.subscribe("ledger.loaded", () => {
      calls += 1;
    });

    bus.emit(loaded(1));
    unsubscribe();
    bus.emit(loaded(1));

    expect(calls).toBe(1);
    expect(bus.listenerCount("ledger.loaded")).toBe(0);
  });

  it("routes a throwing safe handler to its error callback", () => {
    const bus = new EventBus();
    const errors: unknown[] = [];
    let laterCalls = 0;
    bus.subscribeSafe(
      "ledger.loaded",
      () => {
        throw new Error("disk full");
      },
      (error) => errors.push(error)
    );
    bus.subscribe("ledger.loaded", () => {
      laterCalls += 1;
    });

    bus.emit(loaded(1));

    expect(errors).toHaveLength(1);
    expect(laterCalls).toBe(1);
  });

  it("surfaces async handler failures from flush", async () => {
    const bus = new EventBus();
    bus.subscribe("ledger.loaded", async () => {
      throw new Error("late failure");
    });

    bus.emit(loaded(1));

    await expect(bus.flush()).rejects.toThrow("EventBus handlers failed");
    await expect(bus.flush()).resolves.toBeUndefined();
  });

  it("waits for pending async handlers", async () => {
    const bus = new EventBus();
    const done: string[] = [];
    bus.subscribe("ledger.loaded", async () => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      done.push("handled");
    });

    bus.emit(loaded(1));
    expect(done).toEqual([]);
    await bus.flush();
    expect(done).toEqual(["handled"]);
  });
});
