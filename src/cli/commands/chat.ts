/**
 * `chatdeck chat <agent> [message...]`: one-shot send, or an interactive
 * session when no message is given.
 */

import { Command } from "commander";
import pc from "picocolors";
import { ChatSession } from "../../core/chat-session.js";
import { getUploadsDir } from "../../utils/pathResolver.js";
import { createProvider, loadCliContext } from "../context.js";
import { reportError } from "../output.js";
import { InteractiveSession } from "../session.js";

interface IChatOptions {
  readonly stream?: boolean;
}

export function createChatCommand(): Command {
  return new Command("chat")
    .description("Chat with an agent")
    .argument("<agent>", "Agent id")
    .argument("[message...]", "Send one message and exit")
    .option("--no-stream", "Disable streaming output for this run")
    .action(async (agentId: string, messageParts: string[], options: IChatOptions) => {
      try {
        const context = loadCliContext();
        const profile = context.repository.loadProfile(agentId);

        if (messageParts.length === 0) {
          await new InteractiveSession(context, profile).run();
          return;
        }

        const session = new ChatSession({
          provider: createProvider(context, profile),
          store: context.repository.openStore(profile),
          profile,
          config: context.config,
          workingDirectory: process.cwd(),
          extraSearchDirs: [getUploadsDir(context.repository.agentDir(profile.id))],
        });

        const streaming = options.stream !== false && profile.stream;
        const result = await session.send(messageParts.join(" "), {
          overrides: { stream: streaming },
          onChunk: (chunk) => process.stdout.write(chunk),
        });
        process.stdout.write(streaming ? "\n" : `${result.assistant.content}\n`);
        if (result.attempts > 1) {
          process.stderr.write(pc.dim(`(succeeded after ${result.attempts} attempts)\n`));
        }
      } catch (error: unknown) {
        reportError(error, "chat");
      }
    });
}
