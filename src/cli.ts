#!/usr/bin/env node
import { Command, CommanderError, Option } from "commander";
import { OptionsError, resolveRunOptions } from "./lib/config";
import type { RunOptions } from "./lib/config";
import {
  DEFAULT_LOG_FILE,
  DEFAULT_LOOKUP_FILE,
  DEFAULT_PORT_OUTPUT,
  DEFAULT_TAG_OUTPUT,
} from "./lib/constants";
import { FileError } from "./lib/errors";
import { createLogger } from "./lib/logger";
import type { LogSink } from "./lib/logger";
import { run } from "./lib/run";

export function buildProgram(action: (options: RunOptions) => void): Command {
  return new Command("flowtag")
    .description("Tag flow log records by destination port and protocol and count them.")
    .option("--lookup-file <path>", "lookup table CSV (port,protocol,tag)", DEFAULT_LOOKUP_FILE)
    .option("--log-file <path>", "flow log to classify", DEFAULT_LOG_FILE)
    .option("--tag-output <path>", "output file for tag counts", DEFAULT_TAG_OUTPUT)
    .option("--port-output <path>", "output file for port/protocol counts", DEFAULT_PORT_OUTPUT)
    .addOption(
      new Option("--sort <order>", "row order in both reports")
        .choices(["seen", "count"])
        .default("seen")
    )
    .addOption(
      new Option("--log-level <level>", "minimum level written to the console")
        .choices(["error", "warn", "info", "debug"])
        .default("warn")
    )
    .action((raw: unknown) => {
      action(resolveRunOptions(raw));
    });
}

/** Runs the CLI and returns the process exit code. */
export function main(argv: readonly string[] = process.argv, sink: LogSink = console): number {
  let exitCode = 0;
  const program = buildProgram((options) => {
    const logger = createLogger(options.logLevel, sink);
    try {
      run(options, logger);
    } catch (error) {
      if (!(error instanceof FileError)) {
        throw error;
      }
      logger.error(error.message);
      exitCode = 1;
    }
  }).exitOverride();

  try {
    program.parse([...argv]);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (error instanceof OptionsError) {
      sink.error(`error: ${error.message}`);
      return 1;
    }
    throw error;
  }
  return exitCode;
}

if (require.main === module) {
  process.exitCode = main();
}
