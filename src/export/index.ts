/**
 * Export layer barrel export
 */

export { renderConversation, type IRenderOptions } from "./renderer.js";
export { exportConversation, type IExportResult } from "./exporter.js";
export {
  parseConversationExport,
  importConversation,
  type IParsedExport,
  type IImportOptions,
  type IImportResult,
} from "./importer.js";
export {
  EXPORT_FORMATS,
  isExportFormat,
  listExportFormats,
  type ExportFormat,
  type IExportContext,
  type IExportFormatInfo,
} from "./types.js";
export { fenceCodeRuns } from "./markdown.js";
export { escapeHtml, formatHtmlBody } from "./html.js";
