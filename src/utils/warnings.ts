import type { EventBus } from "../events/event-bus.js";
import type { Formatter } from "../ui/fmt.js";

export type WarningRecord = {
  message: string;
  source?: string;
  recorded_at: string;
};

export type WarningSink = {
  warn: (message: string, source?: string) => void;
};

const label = (message: string, source?: string): string =>
  source ? `[${source}] ${message}` : message;

export const createConsoleWarningSink = (fmt?: Formatter): WarningSink => ({
  warn: (message: string, source?: string) => {
    const line = label(message, source);
    console.warn(fmt ? fmt.warnBlock(line) : line);
  }
});

export const createEventWarningSink = (bus: EventBus): WarningSink => ({
  warn: (message: string, source?: string) => {
    bus.emit({
      type: "warning.raised",
      payload: {
        message,
        source,
        recorded_at: new Date().toISOString()
      }
    });
  }
});

/** Fans a warning out to every sink, e.g. the console and the activity log. */
export const combineWarningSinks = (...sinks: WarningSink[]): WarningSink => ({
  warn: (message: string, source?: string) => {
    sinks.forEach((sink) => sink.warn(message, source));
  }
});
