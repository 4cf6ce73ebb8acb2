/**
 * Configuration commands: show an agent's profile (or the runtime config)
 * and change one profile setting.
 */

import { Command } from "commander";
import pc from "picocolors";
import { loadCliContext } from "../context.js";
import { profileLines, reportError, rule, writeLine, writeLines } from "../output.js";
import { parseSetting } from "../settings.js";

export function createConfigCommand(): Command {
  const config = new Command("config").description("Show or change configuration");

  config
    .command("show [agent]")
    .description("Show an agent's settings, or the runtime configuration when no agent is given")
    .action((agentId: string | undefined) => {
      try {
        const context = loadCliContext();
        if (agentId === undefined) {
          writeLines([pc.green(`Runtime configuration (${context.configStore.configPath}):`), rule()]);
          writeLine(JSON.stringify(context.config, null, 2));
          return;
        }

        const profile = context.repository.loadProfile(agentId);
        writeLines([pc.green(`Agent ${agentId}:`), rule(30)]);
        writeLines(profileLines(profile));
      } catch (error: unknown) {
        reportError(error, "config show");
      }
    });

  config
    .command("set <agent> <key> <value>")
    .description("Change one setting, e.g. \"config set my-agent temperature 0.7\"")
    .action((agentId: string, key: string, value: string) => {
      try {
        const { repository } = loadCliContext();
        const patch = parseSetting(key, value);
        repository.updateProfile(agentId, patch);
        for (const [name, parsed] of Object.entries(patch)) {
          writeLine(pc.green(`Set ${name} = ${JSON.stringify(parsed)}`));
        }
      } catch (error: unknown) {
        reportError(error, "config set");
      }
    });

  return config;
}
