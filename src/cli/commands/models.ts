/**
 * `chatdeck models`: list supported models.
 */

import { Command } from "commander";
import pc from "picocolors";
import { SUPPORTED_MODELS } from "../../types/model.js";
import { rule, writeLine, writeLines } from "../output.js";

export function createModelsCommand(): Command {
  return new Command("models").description("List supported models").action(() => {
    writeLines([pc.green("Supported models:"), rule(60)]);
    for (const model of Object.values(SUPPORTED_MODELS)) {
      writeLine(
        `${pc.yellow(model.id.padEnd(14))} ${model.name.padEnd(14)} ${pc.dim(`${model.timeout}s timeout, ${model.costTier}`)}`,
      );
      writeLine(`  ${model.description}`);
    }
  });
}
