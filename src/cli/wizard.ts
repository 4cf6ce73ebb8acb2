/**
 * First-run setup wizard: create an agent, optionally store its API key,
 * optionally start chatting.
 */

import { confirm, input, password, select } from "@inquirer/prompts";
import pc from "picocolors";
import type { IAgentProfile } from "../types/config.js";
import { DEFAULT_MODEL_ID, SUPPORTED_MODELS } from "../types/model.js";
import { SecretStore } from "../storage/secret-store.js";
import { isValidAgentId } from "../utils/sanitizer.js";
import type { ICliContext } from "./context.js";
import { writeLine, writeLines } from "./output.js";
import { parseNumber } from "./settings.js";

export interface IWizardResult {
  readonly profile: IAgentProfile;
  readonly startChat: boolean;
}

export async function runSetupWizard(context: ICliContext): Promise<IWizardResult> {
  const { repository } = context;

  writeLines([
    "",
    pc.cyan("  ╔══════════════════════════════════════════════╗"),
    pc.cyan("  ║             Welcome to chatdeck              ║"),
    pc.cyan("  ╚══════════════════════════════════════════════╝"),
    "",
    "  Let's create your first agent:",
    "",
  ]);

  const id = await input({
    message: "Agent id",
    default: "assistant",
    validate: (value) => {
      if (!isValidAgentId(value)) {
        return "Use 1-64 letters, digits, \"_\" or \"-\"";
      }
      return repository.exists(value) ? `Agent "${value}" already exists` : true;
    },
  });

  const model = await select({
    message: "Model",
    default: context.config.defaultModel,
    choices: Object.values(SUPPORTED_MODELS).map((info) => ({
      name: `${info.name} (${info.id})`,
      value: info.id,
      description: info.description,
    })),
  });

  const systemPrompt = await input({ message: "System prompt (leave empty for none)" });
  const temperature = await input({
    message: "Temperature (0-2)",
    default: "1",
    validate: (value) => {
      const parsed = Number(value);
      return Number.isFinite(parsed) && parsed >= 0 && parsed <= 2 ? true : "Enter a number between 0 and 2";
    },
  });

  const profile = repository.create(id, model || DEFAULT_MODEL_ID, {
    temperature: parseNumber("temperature", temperature),
    ...(systemPrompt.trim().length > 0 ? { systemPrompt: systemPrompt.trim() } : {}),
  });
  writeLine(pc.green(`  ✓ Agent "${profile.id}" created`));

  const hasEnvKey = (process.env["OPENAI_API_KEY"] ?? "").trim().length > 0;
  const storeKey = await confirm({
    message: hasEnvKey ? "OPENAI_API_KEY is set. Store a separate key for this agent anyway?" : "Store an API key for this agent?",
    default: !hasEnvKey,
  });
  if (storeKey) {
    const apiKey = await password({ message: "API key", mask: "*" });
    new SecretStore(repository.agentDir(profile.id)).save(apiKey);
    writeLine(pc.green("  ✓ API key saved"));
  }

  const startChat = await confirm({ message: "Start chatting now?", default: true });
  return { profile, startChat };
}
