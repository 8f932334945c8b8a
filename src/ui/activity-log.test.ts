import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFileSync, rmSync } from "node:fs";
import { join } from "node:path";

import { EventBus } from "../events/event-bus.js";
import { createEventWarningSink } from "../utils/warnings.js";
import { ActivityLogger } from "./activity-log.js";
import { makeTmpDir } from "../test-utils.js";

const TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z /;

const readLines = (path: string): string[] =>
  readFileSync(path, "utf8")
    .split("\n")
    .filter((line) => line.length > 0)
    .map((line) => {
      expect(line).toMatch(TIMESTAMP);
      return line.replace(TIMESTAMP, "");
    });

describe("ActivityLogger", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = makeTmpDir();
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("writes one line per ledger event", async () => {
    const logPath = join(tmpDir, "ledger.log");
    const bus = new EventBus();
    const logger = new ActivityLogger(logPath);
    logger.attach(bus);

    bus.emit({
      type: "ledger.loaded",
      payload: { path: "h.json", models: 2, runs: 3, loaded_at: "2026-01-01T00:00:00.000Z" }
    });
    bus.emit({
      type: "run.appended",
      payload: {
        path: "h.json",
        model: "resnet18",
        version: "v2",
        contributor: "dave",
        validation_accuracy: "0.71",
        new_script: "finetune.py",
        appended_at: "2026-01-01T00:00:00.000Z"
      }
    });
    bus.emit({
      type: "ledger.verified",
      payload: {
        path: "h.json",
        ok: false,
        fail_count: 1,
        warn_count: 2,
        baseline_path: "old.json",
        verified_at: "2026-01-01T00:00:00.000Z"
      }
    });
    createEventWarningSink(bus).warn("Registered new script finetune.py", "append");

    logger.detach();
    await logger.close();

    expect(readLines(logPath)).toEqual([
      "Loaded h.json: 2 model(s), 3 run(s)",
      "Appended resnet18 v2 by dave (accuracy 0.71)",
      "Registered script finetune.py",
      "Verified h.json against old.json: failed (1 fail, 2 warn)",
      "Warning [append]: Registered new script finetune.py"
    ]);
  });

  it("ignores events after detach", async () => {
    const logPath = join(tmpDir, "ledger.log");
    const bus = new EventBus();
    const logger = new ActivityLogger(logPath);
    logger.attach(bus);
    logger.detach();

    bus.emit({
      type: "ledger.loaded",
      payload: { path: "h.json", models: 0, runs: 0, loaded_at: "2026-01-01T00:00:00.000Z" }
    });
    await logger.close();

    expect(bus.listenerCount("ledger.loaded")).toBe(0);
    expect(readFileSync(logPath, "utf8")).toBe("");
  });
});
