#!/usr/bin/env node

/**
 * shapesift CLI - schema inference for undocumented JSON dataset exports
 */

import { Command } from "commander";
import { createInferCommand } from "./commands/infer.js";
import type { GlobalOptions } from "./config/types.js";
import { logger, isLogLevel } from "../utils/logger.js";

const pkg = {
  name: "shapesift",
  version: "0.1.0",
  description: "Infer the structural schema of undocumented JSON dataset exports",
};

/**
 * Main CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version)
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug");

  program.hook("preAction", (thisCommand) => {
    const { logLevel } = thisCommand.opts<GlobalOptions>();
    if (isLogLevel(logLevel)) {
      logger.setLevel(logLevel);
    }
  });

  program.addCommand(createInferCommand());

  return program;
}

/**
 * CLI entry point
 */
async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error("Unexpected error", { error: message });
  console.error(
    JSON.stringify(
      { status: "error", error: { code: "UNEXPECTED_ERROR", message } },
      null,
      2,
    ),
  );
  process.exit(1);
});
