#!/usr/bin/env node
import "dotenv/config";

import { readFileSync } from "node:fs";

import { resolveConfig } from "../config/resolve-config.js";
import { EventBus } from "../events/event-bus.js";
import { ActivityLogger } from "../ui/activity-log.js";
import { createStderrFormatter, createStdoutFormatter } from "../ui/fmt.js";
import { resolveAssetPath } from "../utils/asset-root.js";
import {
  combineWarningSinks,
  createConsoleWarningSink,
  createEventWarningSink
} from "../utils/warnings.js";
import {
  COMMAND_HANDLERS,
  LOGGED_COMMANDS,
  getFlag,
  getFlagNumber,
  hasFlag,
  ledgerPathOverride,
  parseArgs,
  type CommandContext
} from "./commands.js";
import { getHelpCommand, renderCommandHelp, renderRootHelp } from "./help.js";

const readPackageVersion = (): string => {
  const raw = readFileSync(resolveAssetPath("package.json"), "utf8");
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed === "object" && parsed !== null && "version" in parsed) {
    return String(parsed.version);
  }
  return "unknown";
};

const write = (text: string): void => {
  process.stdout.write(text);
};

const main = async (): Promise<void> => {
  const args = process.argv.slice(2);
  const fmt = createStdoutFormatter();
  const errFmt = createStderrFormatter();

  if (args.length === 0 || args[0] === "--help" || args[0] === "-h") {
    write(renderRootHelp(fmt));
    return;
  }
  if (args[0] === "--version") {
    write(`${readPackageVersion()}\n`);
    return;
  }

  const command = args[0];
  const handler = COMMAND_HANDLERS[command];
  const helpEntry = getHelpCommand(command);
  if (!handler || !helpEntry) {
    console.error(errFmt.errorBlock(`Unknown command: ${command}`, "Run training-ledger --help"));
    process.exitCode = 1;
    return;
  }

  const parsed = parseArgs(args.slice(1));
  if (hasFlag(parsed.flags, "--help")) {
    write(renderCommandHelp(fmt, helpEntry));
    return;
  }

  let logger: ActivityLogger | null = null;
  try {
    const config = resolveConfig({
      configPath: getFlag(parsed.flags, "--config"),
      overrides: {
        ledgerPath: ledgerPathOverride(command, parsed),
        top: getFlagNumber(parsed.flags, "--top")
      }
    });

    const bus = new EventBus();
    if (config.activityLogPath && LOGGED_COMMANDS.has(command)) {
      logger = new ActivityLogger(config.activityLogPath);
      logger.attach(bus);
    }

    const context: CommandContext = {
      config,
      bus,
      fmt,
      warnings: combineWarningSinks(createConsoleWarningSink(errFmt), createEventWarningSink(bus)),
      write
    };
    process.exitCode = handler(parsed, context);
    await bus.flush();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(errFmt.errorBlock(message));
    process.exitCode = 1;
  } finally {
    if (logger) {
      logger.detach();
      try {
        await logger.close();
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(errFmt.warnBlock(`Failed to close activity log: ${message}`));
      }
    }
  }
};

void main();
