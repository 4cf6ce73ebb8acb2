/**
 * Read-only history commands: history, search, stats.
 */

import { Command } from "commander";
import pc from "picocolors";
import { computeStats, searchMessages } from "../../core/history-query.js";
import { loadCliContext } from "../context.js";
import { formatMessageLine, reportError, rule, statisticsLines, writeLine, writeLines } from "../output.js";
import { parseNumber } from "../settings.js";

const DEFAULT_HISTORY_COUNT = 20;

export function createHistoryCommand(): Command {
  return new Command("history")
    .description("Show an agent's recent messages")
    .argument("<agent>", "Agent id")
    .option("-n, --count <n>", "Number of messages", String(DEFAULT_HISTORY_COUNT))
    .action((agentId: string, options: { readonly count: string }) => {
      try {
        const { repository } = loadCliContext();
        const count = parseNumber("count", options.count);
        const store = repository.openStore(repository.loadProfile(agentId));
        const recent = store.recent(count);

        if (recent.length === 0) {
          writeLine(pc.yellow("No messages in history"));
          return;
        }
        writeLines([pc.green(`Last ${recent.length} of ${store.size} messages:`), rule(50)]);
        writeLines(recent.map((message) => formatMessageLine(message)));
      } catch (error: unknown) {
        reportError(error, "history");
      }
    });
}

export function createSearchCommand(): Command {
  return new Command("search")
    .description("Search an agent's history (case-insensitive)")
    .argument("<agent>", "Agent id")
    .argument("<term...>", "Text to look for")
    .option("-l, --limit <n>", "Maximum number of results")
    .action((agentId: string, termParts: string[], options: { readonly limit?: string }) => {
      try {
        const { repository } = loadCliContext();
        const term = termParts.join(" ");
        const store = repository.openStore(repository.loadProfile(agentId));
        const limit = options.limit !== undefined ? parseNumber("limit", options.limit) : undefined;
        const results = searchMessages(store.messages(), term, { limit });

        if (results.length === 0) {
          writeLine(pc.yellow(`No matches found for '${term}'`));
          return;
        }
        writeLines([pc.green(`Found ${results.length} matches for "${term}":`), rule(50)]);
        writeLines(results.map((message) => formatMessageLine(message)));
      } catch (error: unknown) {
        reportError(error, "search");
      }
    });
}

export function createStatsCommand(): Command {
  return new Command("stats")
    .description("Show conversation statistics for an agent")
    .argument("<agent>", "Agent id")
    .option("--json", "Print the statistics as JSON")
    .action((agentId: string, options: { readonly json?: boolean }) => {
      try {
        const { repository } = loadCliContext();
        const profile = repository.loadProfile(agentId);
        const stats = computeStats(repository.openStore(profile).messages());

        if (options.json === true) {
          writeLine(JSON.stringify(stats, null, 2));
          return;
        }
        writeLines([pc.green(`Conversation Statistics for ${agentId}:`), rule()]);
        writeLines(statisticsLines(stats, profile.model));
      } catch (error: unknown) {
        reportError(error, "stats");
      }
    });
}
