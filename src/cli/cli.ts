#!/usr/bin/env node

/**
 * chatdeck: main CLI entry point.
 * Commander.js program with one subcommand per user operation.
 */

import { Command } from "commander";
import pc from "picocolors";
import { createAgentsCommand } from "./commands/agents.js";
import { createChatCommand } from "./commands/chat.js";
import { createConfigCommand } from "./commands/config.js";
import { createHistoryCommand, createSearchCommand, createStatsCommand } from "./commands/history.js";
import { createModelsCommand } from "./commands/models.js";
import { createSetupCommand } from "./commands/setup.js";
import { createExportCommand, createImportCommand } from "./commands/transfer.js";
import { logger } from "../utils/logger.js";
import { redactSecrets } from "../utils/sanitizer.js";
import { reportError } from "./output.js";

const VERSION = "1.0.0";

function createProgram(): Command {
  const program = new Command()
    .name("chatdeck")
    .description("Chat with LLM agent profiles that keep persistent, exportable histories")
    .version(VERSION, "-v, --version")
    .option("--verbose", "Log debug output to stderr")
    .hook("preAction", (command) => {
      if (command.opts<{ verbose?: boolean }>().verbose === true) {
        logger.level = "debug";
      }
    });

  program.addCommand(createSetupCommand());
  program.addCommand(createAgentsCommand());
  program.addCommand(createModelsCommand());
  program.addCommand(createChatCommand());
  program.addCommand(createHistoryCommand());
  program.addCommand(createSearchCommand());
  program.addCommand(createStatsCommand());
  program.addCommand(createConfigCommand());
  program.addCommand(createExportCommand());
  program.addCommand(createImportCommand());

  return program;
}

async function main(): Promise<void> {
  try {
    await createProgram().parseAsync(process.argv);
  } catch (error: unknown) {
    reportError(error, "cli");
  }
}

main().catch((error: unknown) => {
  process.stderr.write(
    pc.red(`Fatal error: ${redactSecrets(error instanceof Error ? error.message : String(error))}\n`),
  );
  process.exit(1);
});
