/**
 * Export and import commands.
 */

import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { Command } from "commander";
import pc from "picocolors";
import { NotFoundError, ValidationError } from "../../types/errors.js";
import { exportConversation } from "../../export/exporter.js";
import { importConversation } from "../../export/importer.js";
import { isExportFormat, listExportFormats } from "../../export/types.js";
import { formatFileSize } from "../../utils/format.js";
import { loadCliContext } from "../context.js";
import { reportError, writeLine } from "../output.js";

export function createExportCommand(): Command {
  return new Command("export")
    .description(`Export an agent's conversation (${listExportFormats().join(", ")})`)
    .argument("<agent>", "Agent id")
    .argument("<format>", "Output format")
    .action((agentId: string, formatArg: string) => {
      try {
        const format = formatArg.toLowerCase();
        if (!isExportFormat(format)) {
          throw new ValidationError("export format", `"${formatArg}" (supported: ${listExportFormats().join(", ")})`);
        }

        const { repository } = loadCliContext();
        const profile = repository.loadProfile(agentId);
        const store = repository.openStore(profile);
        const result = exportConversation(repository.agentDir(agentId), profile, store.messages(), format);

        writeLine(
          pc.green(`Exported ${result.messageCount} messages to ${result.filePath} (${formatFileSize(result.bytes)})`),
        );
      } catch (error: unknown) {
        reportError(error, "export");
      }
    });
}

export function createImportCommand(): Command {
  return new Command("import")
    .description("Create a new agent from a JSON export")
    .argument("<agent>", "Id for the new agent")
    .argument("<file>", "Path to a .json export")
    .option("-m, --model <model>", "Bind the new agent to a different model")
    .action((agentId: string, file: string, options: { readonly model?: string }) => {
      try {
        const filePath = resolve(file);
        let text: string;
        try {
          text = readFileSync(filePath, "utf-8");
        } catch {
          throw new NotFoundError("file", filePath);
        }

        const { repository } = loadCliContext();
        const result = importConversation(repository, text, { agentId, model: options.model });
        writeLine(
          pc.green(`Agent "${result.profile.id}" created with ${result.messageCount} imported messages`),
        );
      } catch (error: unknown) {
        reportError(error, "import");
      }
    });
}
