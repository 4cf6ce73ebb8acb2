/**
 * Agent lifecycle commands: list, create, info, delete.
 */

import { Command } from "commander";
import { confirm, password } from "@inquirer/prompts";
import pc from "picocolors";
import { DEFAULT_MODEL_ID } from "../../types/model.js";
import type { AgentProfilePatch } from "../../types/config.js";
import { SecretStore } from "../../storage/secret-store.js";
import { formatFileSize, formatTimestamp } from "../../utils/format.js";
import { loadCliContext } from "../context.js";
import { profileLines, reportError, rule, writeLine, writeLines } from "../output.js";
import { parseBoolean, parseMaxTokens, parseNumber } from "../settings.js";

interface ICreateOptions {
  readonly model?: string;
  readonly system?: string;
  readonly temperature?: string;
  readonly maxTokens?: string;
  readonly stream?: string;
  readonly apiKey?: boolean;
}

function overridesFrom(options: ICreateOptions): AgentProfilePatch {
  return {
    ...(options.system !== undefined ? { systemPrompt: options.system } : {}),
    ...(options.temperature !== undefined
      ? { temperature: parseNumber("temperature", options.temperature) }
      : {}),
    ...(options.maxTokens !== undefined ? { maxTokens: parseMaxTokens(options.maxTokens) } : {}),
    ...(options.stream !== undefined ? { stream: parseBoolean("stream", options.stream) } : {}),
  };
}

export function createAgentsCommand(): Command {
  const agents = new Command("agents").description("Manage agent profiles");

  agents
    .command("list")
    .description("List all agents")
    .action(() => {
      try {
        const { repository } = loadCliContext();
        const ids = repository.listAgents();
        if (ids.size === 0) {
          writeLine(pc.yellow("No agents yet. Create one with \"chatdeck setup\" or \"chatdeck agents create <id>\"."));
          return;
        }
        writeLines([pc.green(`Agents (${ids.size}):`), rule()]);
        for (const id of ids) {
          const summary = repository.summarize(id);
          writeLine(
            `${pc.yellow(id.padEnd(20))} ${summary.modelName.padEnd(14)} ${pc.cyan(`${summary.messageCount} messages`)} ${pc.dim(`updated ${formatTimestamp(summary.updatedAt)}`)}`,
          );
        }
      } catch (error: unknown) {
        reportError(error, "agents list");
      }
    });

  agents
    .command("create <id>")
    .description("Create a new agent")
    .option("-m, --model <model>", "Model to bind the agent to", DEFAULT_MODEL_ID)
    .option("--system <prompt>", "System prompt")
    .option("--temperature <value>", "Sampling temperature (0-2)")
    .option("--max-tokens <value>", "Maximum output tokens, or \"none\"")
    .option("--stream <yes|no>", "Stream responses")
    .option("--api-key", "Prompt for an API key to store with the agent")
    .action(async (id: string, options: ICreateOptions) => {
      try {
        const { repository } = loadCliContext();
        const profile = repository.create(id, options.model ?? DEFAULT_MODEL_ID, overridesFrom(options));

        if (options.apiKey === true) {
          const apiKey = await password({ message: "OpenAI API key:", mask: "*" });
          new SecretStore(repository.agentDir(id)).save(apiKey);
        }

        writeLine(pc.green(`Agent "${profile.id}" created with ${profile.model}`));
      } catch (error: unknown) {
        reportError(error, "agents create");
      }
    });

  agents
    .command("info <id>")
    .description("Show an agent's configuration and history summary")
    .action((id: string) => {
      try {
        const { repository } = loadCliContext();
        const profile = repository.loadProfile(id);
        const summary = repository.summarize(id);
        const hasKey = new SecretStore(summary.directory).hasKey(profile.model);

        writeLines([pc.green(`Agent ${id}`), rule(30)]);
        writeLines(profileLines(profile));
        writeLines([
          `Messages: ${pc.cyan(String(summary.messageCount))}`,
          `History Size: ${pc.cyan(formatFileSize(summary.historyBytes))}`,
          `Backups: ${pc.cyan(String(summary.backupCount))}`,
          `API Key: ${hasKey ? pc.green("stored") : pc.dim("not stored (OPENAI_API_KEY is used)")}`,
          `Directory: ${summary.directory}`,
        ]);
      } catch (error: unknown) {
        reportError(error, "agents info");
      }
    });

  agents
    .command("delete <id>")
    .description("Delete an agent and all of its data")
    .option("-y, --yes", "Skip the confirmation prompt")
    .action(async (id: string, options: { readonly yes?: boolean }) => {
      try {
        const { repository } = loadCliContext();
        const summary = repository.summarize(id);

        if (options.yes !== true) {
          const proceed = await confirm({
            message: `Delete agent "${id}" and its ${summary.messageCount} messages, backups and exports?`,
            default: false,
          });
          if (!proceed) {
            writeLine(pc.cyan("Nothing deleted"));
            return;
          }
        }

        repository.delete(id);
        writeLine(pc.green(`Agent "${id}" deleted`));
      } catch (error: unknown) {
        reportError(error, "agents delete");
      }
    });

  return agents;
}
