/**
 * Interactive chat session: a prompt loop that sends plain lines to the
 * model and dispatches `/command` lines to in-session handlers.
 */

import { input, confirm } from "@inquirer/prompts";
import pc from "picocolors";
import type { IAgentProfile } from "../types/config.js";
import { getModelInfo, isSupportedModel, listModelIds, SUPPORTED_MODELS } from "../types/model.js";
import { ValidationError } from "../types/errors.js";
import { ChatSession } from "../core/chat-session.js";
import { computeStats, searchMessages } from "../core/history-query.js";
import { listIncludableFiles } from "../core/file-inclusion.js";
import { exportConversation } from "../export/exporter.js";
import { isExportFormat, listExportFormats } from "../export/types.js";
import { formatFileSize, formatTimestamp } from "../utils/format.js";
import { getUploadsDir } from "../utils/pathResolver.js";
import { logger } from "../utils/logger.js";
import { createProvider, type ICliContext } from "./context.js";
import {
  describeError,
  formatMessageLine,
  profileLines,
  rule,
  statisticsLines,
  writeLine,
  writeLines,
} from "./output.js";

const DEFAULT_HISTORY_COUNT = 5;
const BARE_COMMANDS = new Set(["help", "quit", "exit"]);

export type SessionInput =
  | { readonly kind: "empty" }
  | { readonly kind: "message"; readonly text: string }
  | { readonly kind: "command"; readonly name: string; readonly args: readonly string[]; readonly rest: string };

/**
 * Lines starting with "/" are commands, as are the bare words help, quit
 * and exit. Everything else is a message.
 */
export function parseSessionInput(line: string): SessionInput {
  const trimmed = line.trim();
  if (trimmed.length === 0) {
    return { kind: "empty" };
  }

  const isCommand = trimmed.startsWith("/") || BARE_COMMANDS.has(trimmed.toLowerCase());
  if (!isCommand) {
    return { kind: "message", text: line };
  }

  const body = trimmed.startsWith("/") ? trimmed.slice(1) : trimmed;
  const [name = "", ...args] = body.split(/\s+/);
  const rest = body.slice(name.length).trim();
  return { kind: "command", name: name.toLowerCase(), args, rest };
}

export const SESSION_COMMANDS: ReadonlyArray<readonly [usage: string, description: string]> = [
  ["help, h", "Show this help message"],
  ["history [n]", `Show the last n messages (default: ${DEFAULT_HISTORY_COUNT})`],
  ["search <term>", "Search conversation history"],
  ["stats", "Show conversation statistics"],
  ["config", "Show current configuration"],
  ["export <format>", `Export the conversation (${listExportFormats().join("/")})`],
  ["clear", "Clear conversation history (a backup is kept)"],
  ["files", "List files available for {file} inclusion"],
  ["info", "Show agent information"],
  ["model", "Show current model information"],
  ["switch <model>", "Switch to a different model"],
  ["backups", "List history backups"],
  ["quit, exit, q", "Leave the session"],
];

export function isPromptExit(error: unknown): boolean {
  return error instanceof Error && error.name === "ExitPromptError";
}

export class InteractiveSession {
  private readonly context: ICliContext;
  private readonly chat: ChatSession;
  private readonly workingDirectory: string;

  constructor(context: ICliContext, profile: IAgentProfile, workingDirectory: string = process.cwd()) {
    this.context = context;
    this.workingDirectory = workingDirectory;
    this.chat = new ChatSession({
      provider: createProvider(context, profile),
      store: context.repository.openStore(profile),
      profile,
      config: context.config,
      workingDirectory,
      extraSearchDirs: [getUploadsDir(context.repository.agentDir(profile.id))],
    });
  }

  get session(): ChatSession {
    return this.chat;
  }

  async run(): Promise<void> {
    this.printBanner();

    for (;;) {
      let line: string;
      try {
        line = await input({ message: pc.cyan("You:") });
      } catch (error: unknown) {
        if (isPromptExit(error)) {
          writeLine(pc.green("Goodbye!"));
          return;
        }
        throw error;
      }

      const parsed = parseSessionInput(line);
      if (parsed.kind === "empty") {
        continue;
      }
      if (parsed.kind === "message") {
        await this.sendMessage(parsed.text);
        continue;
      }

      try {
        const keepGoing = await this.handleCommand(parsed.name, parsed.args, parsed.rest);
        if (!keepGoing) {
          return;
        }
      } catch (error: unknown) {
        if (isPromptExit(error)) {
          continue;
        }
        this.printError(error);
      }
    }
  }

  async sendMessage(text: string): Promise<void> {
    const streaming = this.chat.profile.stream;
    process.stdout.write(`\n${pc.green("Assistant:")} `);

    try {
      const result = await this.chat.send(text, {
        onChunk: (chunk) => process.stdout.write(chunk),
      });
      if (!streaming) {
        process.stdout.write(result.assistant.content);
      }
      process.stdout.write("\n");
    } catch (error: unknown) {
      process.stdout.write("\n");
      this.printError(error);
    }
  }

  /** Returns false when the session should end. */
  async handleCommand(name: string, args: readonly string[], rest: string): Promise<boolean> {
    switch (name) {
      case "help":
      case "h":
        this.printHelp();
        return true;
      case "quit":
      case "exit":
      case "q":
        writeLine(pc.green("Goodbye!"));
        return false;
      case "history":
      case "hist":
        this.printHistory(args[0]);
        return true;
      case "search":
        this.printSearch(rest);
        return true;
      case "stats":
      case "statistics":
        writeLines(["", pc.green("Conversation Statistics:"), rule()]);
        writeLines(statisticsLines(computeStats(this.chat.store.messages()), this.chat.profile.model));
        return true;
      case "config":
      case "configuration":
        writeLines(["", pc.green("Agent Configuration:"), rule(30)]);
        writeLines(profileLines(this.chat.profile));
        return true;
      case "export":
        this.export(args[0]);
        return true;
      case "clear":
        await this.clear();
        return true;
      case "files":
      case "file":
        this.printFiles();
        return true;
      case "info":
      case "agent-info":
        this.printInfo();
        return true;
      case "model":
        this.printModel();
        return true;
      case "switch":
        this.switchModel(args[0]);
        return true;
      case "backups":
        this.printBackups();
        return true;
      default:
        writeLine(pc.red(`Unknown command: ${name}`));
        writeLine(pc.cyan("Type 'help' for available commands"));
        return true;
    }
  }

  // ── Handlers ───────────────────────────────────────────────────────────

  private printBanner(): void {
    const profile = this.chat.profile;
    const info = getModelInfo(profile.model);
    writeLines([
      "",
      pc.green("Interactive Chat Session"),
      `${pc.green("Agent:")} ${pc.yellow(profile.id)}`,
      `${pc.green("Model:")} ${pc.yellow(`${info?.name ?? profile.model} (${profile.model})`)}`,
      `${pc.green("Timeout:")} ${pc.cyan(`${info?.timeout ?? "?"}s`)}`,
      `${pc.green("Commands:")} type ${pc.cyan("help")} for commands, ${pc.cyan("quit")} to exit`,
      "-".repeat(80),
    ]);
  }

  private printHelp(): void {
    writeLines(["", pc.green("Available Commands:"), rule()]);
    for (const [usage, description] of SESSION_COMMANDS) {
      writeLine(`${pc.cyan(usage.padEnd(20))} ${description}`);
    }
    writeLines([
      "",
      pc.green("File Inclusion:"),
      "Use {path/to/file} in a message to include that file's contents.",
      "",
      pc.green("Models Available:"),
    ]);
    for (const model of Object.values(SUPPORTED_MODELS)) {
      writeLine(`${pc.yellow(model.id)} - ${model.description}`);
    }
  }

  private printHistory(countArg: string | undefined): void {
    const count = countArg === undefined ? DEFAULT_HISTORY_COUNT : Number(countArg);
    if (!Number.isInteger(count) || count <= 0) {
      throw new ValidationError("history count", `"${countArg ?? ""}" is not a positive whole number`);
    }

    const recent = this.chat.store.recent(count);
    if (recent.length === 0) {
      writeLine(pc.yellow("No messages in history"));
      return;
    }
    writeLines(["", pc.green(`Last ${recent.length} messages:`), rule(50)]);
    writeLines(recent.map((message) => formatMessageLine(message)));
  }

  private printSearch(term: string): void {
    if (term.length === 0) {
      writeLine(pc.red("Usage: search <term>"));
      return;
    }
    const results = searchMessages(this.chat.store.messages(), term);
    if (results.length === 0) {
      writeLine(pc.yellow(`No matches found for '${term}'`));
      return;
    }
    writeLines(["", pc.green(`Found ${results.length} matches for "${term}":`), rule(50)]);
    writeLines(results.map((message) => formatMessageLine(message)));
  }

  private export(formatArg: string | undefined): void {
    const format = formatArg?.toLowerCase();
    if (format === undefined || !isExportFormat(format)) {
      writeLine(pc.red(`Usage: export <${listExportFormats().join("/")}>`));
      return;
    }
    const result = exportConversation(
      this.context.repository.agentDir(this.chat.profile.id),
      this.chat.profile,
      this.chat.store.messages(),
      format,
    );
    writeLine(pc.green(`Exported ${result.messageCount} messages to ${result.filePath}`));
  }

  private async clear(): Promise<void> {
    if (this.chat.store.size === 0) {
      writeLine(pc.yellow("History is already empty"));
      return;
    }
    const proceed = await confirm({
      message: `Clear ${this.chat.store.size} messages? A backup is kept.`,
      default: false,
    });
    if (!proceed) {
      writeLine(pc.cyan("History kept"));
      return;
    }
    const snapshot = this.chat.store.clear();
    writeLine(pc.green(`History cleared (backup ${snapshot.id})`));
  }

  private printFiles(): void {
    const dirs = [
      ".",
      ...this.context.config.searchPaths,
      getUploadsDir(this.context.repository.agentDir(this.chat.profile.id)),
    ];
    const files = listIncludableFiles(dirs, this.workingDirectory);
    if (files.length === 0) {
      writeLine(pc.yellow("No includable files found"));
      return;
    }
    writeLines(["", pc.green(`Files available for inclusion (${files.length}):`), rule(50)]);
    for (const file of files) {
      writeLine(`${pc.cyan(`{${file.path}}`)} ${pc.dim(`(${formatFileSize(file.size)})`)}`);
    }
  }

  private printInfo(): void {
    const summary = this.context.repository.summarize(this.chat.profile.id);
    writeLines([
      "",
      pc.green(`Agent ${summary.id}`),
      rule(30),
      `Model: ${pc.yellow(`${summary.modelName} (${summary.model})`)}`,
      `Messages: ${pc.cyan(String(summary.messageCount))}`,
      `History Size: ${pc.cyan(formatFileSize(summary.historyBytes))}`,
      `Backups: ${pc.cyan(String(summary.backupCount))}`,
      `Created: ${formatTimestamp(summary.createdAt)}`,
      `Updated: ${formatTimestamp(summary.updatedAt)}`,
      `Directory: ${summary.directory}`,
    ]);
  }

  private printModel(): void {
    const model = this.chat.profile.model;
    const info = getModelInfo(model);
    writeLines(["", pc.green("Model Information:"), rule(30)]);
    if (!info) {
      writeLine(`Model: ${pc.yellow(model)}`);
      return;
    }
    writeLines([
      `Model: ${pc.yellow(`${info.name} (${info.id})`)}`,
      `Description: ${info.description}`,
      `Timeout: ${pc.cyan(`${info.timeout}s`)}`,
      `Max Output Tokens: ${pc.cyan(String(info.maxOutputTokens))}`,
      `Streaming: ${pc.cyan(info.supportsStreaming ? "yes" : "no")}`,
      `Cost Tier: ${pc.cyan(info.costTier)}`,
    ]);
  }

  private switchModel(model: string | undefined): void {
    if (model === undefined || !isSupportedModel(model)) {
      writeLine(pc.red(`Usage: switch <model> (available: ${listModelIds().join(", ")})`));
      return;
    }
    const updated = this.context.repository.updateProfile(this.chat.profile.id, { model });
    this.chat.updateProfile(updated);
    logger.info({ agent: updated.id, model }, "Model switched");
    writeLine(pc.green(`Switched to ${getModelInfo(model)?.name ?? model}`));
  }

  private printBackups(): void {
    const backups = this.chat.store.listBackups();
    if (backups.length === 0) {
      writeLine(pc.yellow("No backups"));
      return;
    }
    writeLines(["", pc.green(`Backups (${backups.length}, oldest first):`), rule(50)]);
    for (const entry of backups) {
      const snapshot = this.chat.store.loadBackup(entry.id);
      writeLine(
        `${pc.cyan(entry.id)} ${pc.dim(snapshot.reason)} ${snapshot.messages.length} messages, ${formatTimestamp(snapshot.createdAt)}`,
      );
    }
  }

  private printError(error: unknown): void {
    const { message, hint } = describeError(error);
    logger.warn({ agent: this.chat.profile.id, error: message }, "Session action failed");
    writeLine(pc.red(`Error: ${message}`));
    if (hint !== undefined) {
      writeLine(pc.dim(hint));
    }
  }
}
