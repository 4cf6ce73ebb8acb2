/**
 * Markdown export with a heading per message.
 */

import type { MessageRole } from "../types/message.js";
import { getModelDisplayName, getModelInfo } from "../types/model.js";
import { formatTimestamp } from "../utils/format.js";
import { ROLE_LABELS, configurationRows, statisticsRows } from "./shared.js";
import type { IExportContext } from "./types.js";

const FENCE = "```";

const ROLE_EMOJI: Readonly<Record<MessageRole, string>> = {
  system: "ℹ️",
  user: "👤",
  assistant: "🤖",
};

const CODE_LINE_PREFIXES = ["def ", "class ", "import ", "from ", "//", "#include", "#!"];
const DECLARATION_KEYWORDS = ["function", "const", "let", "var"];
const CODE_PUNCTUATION = /[(){}[\];]/;

function looksLikeCodeLine(line: string): boolean {
  const trimmed = line.trim();
  if (CODE_LINE_PREFIXES.some((prefix) => trimmed.startsWith(prefix))) {
    return true;
  }
  return line.includes("=") && DECLARATION_KEYWORDS.some((keyword) => line.includes(keyword));
}

/**
 * Wrap runs of code-looking lines in fences. A run opens on a line that
 * looks like code and closes at the first non-blank line without code
 * punctuation. Bodies that already contain a fence are returned unchanged.
 */
export function fenceCodeRuns(content: string): string {
  if (content.includes(FENCE)) {
    return content;
  }

  const output: string[] = [];
  let inCode = false;

  for (const line of content.split("\n")) {
    if (looksLikeCodeLine(line)) {
      if (!inCode) {
        output.push(FENCE);
        inCode = true;
      }
    } else if (inCode && line.trim() !== "" && !CODE_PUNCTUATION.test(line)) {
      output.push(FENCE);
      inCode = false;
    }
    output.push(line);
  }

  if (inCode) {
    output.push(FENCE);
  }
  return output.join("\n");
}

/** Keep table cells on one line and free of column separators. */
function tableCell(value: string): string {
  return value.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

function inlineCode(value: string): string {
  const flat = value.replace(/\r?\n/g, " ");
  return flat.includes("`") ? `\`\` ${flat} \`\`` : `\`${flat}\``;
}

export function renderMarkdown(context: IExportContext): string {
  const { agent, stats } = context;
  const modelName = getModelDisplayName(agent.model);
  const modelInfo = getModelInfo(agent.model);

  const lines: string[] = [
    `# ${modelName} Conversation: ${agent.id}`,
    "",
    `**Agent ID:** ${inlineCode(agent.id)}  `,
    `**Model:** ${inlineCode(agent.model)}  `,
    `**Export Date:** ${formatTimestamp(context.exportedAt.toISOString())} UTC  `,
    `**Total Messages:** ${stats.totalMessages}`,
    "",
  ];

  if (modelInfo) {
    lines.push(
      "## Model Information",
      "",
      `- **Name:** ${modelInfo.name}`,
      `- **Description:** ${modelInfo.description}`,
      `- **Timeout:** ${modelInfo.timeout}s`,
      `- **Max Output Tokens:** ${modelInfo.maxOutputTokens}`,
      `- **Cost Tier:** ${modelInfo.costTier}`,
      "",
    );
  }

  lines.push("## Configuration", "");
  for (const [label, value] of configurationRows(agent)) {
    lines.push(`- **${label}:** ${inlineCode(value)}`);
  }
  lines.push("", "## Statistics", "", "| Metric | Value |", "|--------|-------|");
  for (const [label, value] of statisticsRows(stats)) {
    lines.push(`| ${label} | ${tableCell(value)} |`);
  }
  lines.push("", "## Conversation", "");

  if (context.messages.length === 0) {
    lines.push("_No messages._", "");
  }

  for (const message of context.messages) {
    lines.push(
      `### ${ROLE_EMOJI[message.role]} ${ROLE_LABELS[message.role]} · #${message.index}`,
      `*${formatTimestamp(message.timestamp)}*`,
      "",
      fenceCodeRuns(message.content),
      "",
      "---",
      "",
    );
  }

  return lines.join("\n");
}
