import { mkdirSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import type { TrainingHistoryDocument, TrainingRunRecord } from "./ledger/types.js";

export const SCRIPT_HASH = "0123456789abcdef0123456789abcdef01234567";

export function makeTmpDir(): string {
  const dir = join(tmpdir(), `ledger-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

export function makeRun(overrides: Partial<TrainingRunRecord> = {}): TrainingRunRecord {
  return {
    accelerators: 4,
    args: { batch_size: "64", learning_rate: "0.1" },
    contributor: "alice",
    epochs_trained: 90,
    script: { name: "train.py", version: SCRIPT_HASH },
    tensorboard_logs: "https://logs.example.com/run/resnet18-v0/",
    validation_accuracy: "0.6512",
    ...overrides
  };
}

/** Two models, three runs, two scripts. A fresh copy on every call. */
export function sampleDocument(): TrainingHistoryDocument {
  return {
    resnet18: {
      v0: makeRun(),
      v1: makeRun({
        accelerators: 8,
        contributor: "bob",
        epochs_trained: 120,
        tensorboard_logs: "https://logs.example.com/run/resnet18-v1/",
        validation_accuracy: "0.7013"
      })
    },
    mobilenet: {
      v0: makeRun({
        accelerators: 2,
        args: { batch_size: "256" },
        contributor: "carol",
        epochs_trained: 200,
        script: { name: "distill.py", version: "fedcba9876543210fedcba9876543210fedcba98" },
        tensorboard_logs: "https://logs.example.com/run/mobilenet-v0/",
        validation_accuracy: "0.7200"
      })
    },
    script_authors: {
      "train.py": ["alice", "bob"],
      "distill.py": ["carol"]
    }
  };
}

export function writeJson(dir: string, name: string, value: unknown): string {
  const path = join(dir, name);
  writeFileSync(path, `${JSON.stringify(value, null, 2)}\n`, "utf8");
  return path;
}
