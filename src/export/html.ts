/**
 * Self-contained HTML export: inline styles, no scripts, no external
 * resources. Every piece of agent or message text is escaped.
 */

import { getModelDisplayName, getModelInfo } from "../types/model.js";
import type { IStoredMessage } from "../types/message.js";
import { formatTimestamp } from "../utils/format.js";
import { ROLE_LABELS, configurationRows, statisticsRows, type LabeledRow } from "./shared.js";
import type { IExportContext } from "./types.js";

const FENCED_BLOCK = /(```[\s\S]*?```)/;
const LANGUAGE_TAG = /^[\w+#.-]*\r?\n/;

const STYLES = `
  :root { --primary: #2563eb; --muted: #64748b; --border: #e2e8f0; --surface: #f1f5f9; --code: #f8fafc; }
  * { box-sizing: border-box; }
  body { margin: 0; padding: 1rem; font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, sans-serif; line-height: 1.6; color: #1e293b; background: #e2e8f0; }
  .container { max-width: 1100px; margin: 0 auto; background: #fff; border-radius: 0.75rem; overflow: hidden; }
  header { background: var(--primary); color: #fff; padding: 1.5rem 2rem; }
  header h1 { margin: 0 0 0.5rem; font-size: 1.75rem; }
  section { padding: 1.5rem 2rem; border-bottom: 1px solid var(--border); }
  section h2 { margin-top: 0; color: var(--primary); }
  dl { display: grid; grid-template-columns: max-content 1fr; gap: 0.25rem 1rem; margin: 0; }
  dt { font-weight: 600; color: var(--muted); }
  dd { margin: 0; white-space: pre-wrap; word-break: break-word; }
  .stats { display: grid; grid-template-columns: repeat(auto-fit, minmax(160px, 1fr)); gap: 0.75rem; }
  .stat { background: var(--surface); border-radius: 0.5rem; padding: 0.75rem; text-align: center; }
  .stat-value { font-size: 1.25rem; font-weight: 700; color: var(--primary); }
  .stat-label { font-size: 0.75rem; color: var(--muted); text-transform: uppercase; }
  .message { border: 1px solid var(--border); border-radius: 0.75rem; padding: 1rem 1.25rem; margin-bottom: 1rem; }
  .message.user { background: #eff6ff; }
  .message.assistant { background: #f0fdf4; }
  .message.system { background: #fefce8; }
  .message-header { display: flex; justify-content: space-between; font-size: 0.85rem; color: var(--muted); margin-bottom: 0.5rem; }
  .message-role { font-weight: 600; }
  .message-text { word-wrap: break-word; }
  pre.code-block { background: var(--code); border: 1px solid var(--border); border-radius: 0.5rem; padding: 0.75rem; overflow-x: auto; font-family: Menlo, Monaco, "Ubuntu Mono", monospace; font-size: 0.875rem; }
  .empty { color: var(--muted); font-style: italic; }
  footer { padding: 1rem 2rem; font-size: 0.85rem; color: var(--muted); text-align: center; }
`;

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/**
 * Escape a message body, rendering ``` fenced blocks as <pre> and other
 * newlines as <br>.
 */
export function formatHtmlBody(content: string): string {
  return content
    .split(FENCED_BLOCK)
    .map((part) => {
      if (part.length >= 6 && part.startsWith("```") && part.endsWith("```")) {
        const code = part.slice(3, -3).replace(LANGUAGE_TAG, "").replace(/\s+$/, "");
        return `<pre class="code-block"><code>${escapeHtml(code)}</code></pre>`;
      }
      return escapeHtml(part).replace(/\r?\n/g, "<br>");
    })
    .join("");
}

function definitionList(rows: readonly LabeledRow[]): string {
  const items = rows
    .map(([label, value]) => `<dt>${escapeHtml(label)}</dt><dd>${escapeHtml(value)}</dd>`)
    .join("\n        ");
  return `<dl>\n        ${items}\n      </dl>`;
}

function renderMessage(message: IStoredMessage): string {
  return `      <article class="message ${message.role}" id="message-${message.index}">
        <div class="message-header">
          <span class="message-role">${ROLE_LABELS[message.role]} · #${message.index}</span>
          <time datetime="${escapeHtml(message.timestamp)}">${formatTimestamp(message.timestamp)}</time>
        </div>
        <div class="message-text">${formatHtmlBody(message.content)}</div>
      </article>`;
}

export function renderHtml(context: IExportContext): string {
  const { agent, stats } = context;
  const agentId = escapeHtml(agent.id);
  const modelName = escapeHtml(getModelDisplayName(agent.model));
  const modelInfo = getModelInfo(agent.model);
  const exportedAt = formatTimestamp(context.exportedAt.toISOString());

  const statCards = statisticsRows(stats)
    .map(
      ([label, value]) =>
        `<div class="stat"><div class="stat-value">${escapeHtml(value)}</div><div class="stat-label">${escapeHtml(label)}</div></div>`,
    )
    .join("\n        ");

  const modelSection = modelInfo
    ? `
    <section class="model-info">
      <h2>Model Information</h2>
      ${definitionList([
        ["Name", modelInfo.name],
        ["Description", modelInfo.description],
        ["Timeout", `${modelInfo.timeout}s`],
        ["Max Output Tokens", String(modelInfo.maxOutputTokens)],
        ["Cost Tier", modelInfo.costTier],
      ])}
    </section>`
    : "";

  const messages =
    context.messages.length > 0
      ? context.messages.map(renderMessage).join("\n")
      : `      <p class="empty">No messages in this conversation.</p>`;

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${modelName} Conversation - ${agentId}</title>
  <style>${STYLES}</style>
</head>
<body>
  <div class="container">
    <header>
      <h1>${modelName} Conversation</h1>
      <div>Agent <strong>${agentId}</strong> · Model <strong>${escapeHtml(agent.model)}</strong> · Exported ${exportedAt} UTC</div>
    </header>${modelSection}
    <section class="configuration">
      <h2>Configuration</h2>
      ${definitionList(configurationRows(agent))}
    </section>
    <section class="statistics">
      <h2>Statistics</h2>
      <div class="stats">
        ${statCards}
      </div>
    </section>
    <section class="messages">
      <h2>Conversation</h2>
${messages}
    </section>
    <footer>Exported by chatdeck · ${stats.totalMessages} messages · ${exportedAt} UTC</footer>
  </div>
</body>
</html>
`;
}
