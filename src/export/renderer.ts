/**
 * Single entry point mapping a message list and its agent into one of the
 * export documents. Pure: no disk access, and the clock is only read when
 * no export time is given.
 */

import type { IAgentProfile } from "../types/config.js";
import type { IStoredMessage } from "../types/message.js";
import { ValidationError } from "../types/errors.js";
import { computeStats } from "../core/history-query.js";
import { renderHtml } from "./html.js";
import { renderJson } from "./json.js";
import { renderMarkdown } from "./markdown.js";
import { renderText } from "./text.js";
import type { ExportFormat, IExportContext } from "./types.js";

export interface IRenderOptions {
  readonly exportedAt?: Date | undefined;
}

export function renderConversation(
  agent: IAgentProfile,
  messages: readonly IStoredMessage[],
  format: ExportFormat,
  options?: IRenderOptions,
): string {
  const context: IExportContext = {
    agent,
    messages,
    stats: computeStats(messages),
    exportedAt: options?.exportedAt ?? new Date(),
  };

  switch (format) {
    case "json":
      return renderJson(context);
    case "txt":
      return renderText(context);
    case "md":
      return renderMarkdown(context);
    case "html":
      return renderHtml(context);
    default: {
      const unknownFormat: never = format;
      throw new ValidationError("export format", String(unknownFormat));
    }
  }
}
