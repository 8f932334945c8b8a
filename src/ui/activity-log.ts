import { createWriteStream } from "node:fs";

import type { EventBus } from "../events/event-bus.js";

/**
 * Appends one timestamped line per ledger event to a plain-text log kept
 * beside the ledger, so every append and verification leaves a trail.
 */
export class ActivityLogger {
  private stream: ReturnType<typeof createWriteStream> | null;
  private unsubs: Array<() => void> = [];

  constructor(readonly logPath: string) {
    this.stream = createWriteStream(logPath, { flags: "a" });
  }

  private append(line: string): void {
    if (!this.stream) {
      return;
    }
    this.stream.write(`${new Date().toISOString()} ${line}\n`);
  }

  attach(bus: EventBus): void {
    const onError = (eventType: string, error: unknown): void => {
      const message = error instanceof Error ? error.message : String(error);
      this.append(`Activity log subscriber error (${eventType}): ${message}`);
    };

    this.unsubs.push(
      bus.subscribeSafe(
        "ledger.loaded",
        (payload) => {
          this.append(`Loaded ${payload.path}: ${payload.models} model(s), ${payload.runs} run(s)`);
        },
        (error) => onError("ledger.loaded", error)
      )
    );

    this.unsubs.push(
      bus.subscribeSafe(
        "run.appended",
        (payload) => {
          this.append(
            `Appended ${payload.model} ${payload.version} by ${payload.contributor} (accuracy ${payload.validation_accuracy})`
          );
          if (payload.new_script) {
            this.append(`Registered script ${payload.new_script}`);
          }
        },
        (error) => onError("run.appended", error)
      )
    );

    this.unsubs.push(
      bus.subscribeSafe(
        "ledger.verified",
        (payload) => {
          const against = payload.baseline_path ? ` against ${payload.baseline_path}` : "";
          this.append(
            `Verified ${payload.path}${against}: ${payload.ok ? "ok" : "failed"} (${payload.fail_count} fail, ${payload.warn_count} warn)`
          );
        },
        (error) => onError("ledger.verified", error)
      )
    );

    this.unsubs.push(
      bus.subscribeSafe(
        "warning.raised",
        (payload) => {
          this.append(`Warning${payload.source ? ` [${payload.source}]` : ""}: ${payload.message}`);
        },
        (error) => onError("warning.raised", error)
      )
    );
  }

  async close(): Promise<void> {
    const stream = this.stream;
    if (!stream) {
      return;
    }
    this.stream = null;
    await new Promise<void>((resolve, reject) => {
      stream.once("error", reject);
      stream.end(() => resolve());
    });
  }

  detach(): void {
    this.unsubs.forEach((unsubscribe) => unsubscribe());
    this.unsubs = [];
  }
}
