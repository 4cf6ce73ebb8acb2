/**
 * File-inclusion preprocessor.
 * Expands `{path}` tokens in a user message into the literal contents of the
 * referenced files. A single bad reference fails the whole expansion.
 */

import { readFileSync, statSync, existsSync, type Stats } from "node:fs";
import { basename, extname, isAbsolute, relative, resolve } from "node:path";
import fg from "fast-glob";
import { z } from "zod";
import { FileInclusionError } from "../types/errors.js";
import { DEFAULT_MAX_INCLUSION_BYTES } from "../types/config.js";
import { logger } from "../utils/logger.js";

const TOKEN_PATTERN = /\{([^{}]+)\}/g;

const LIST_IGNORE = ["**/node_modules/**", "**/.git/**", "**/dist/**", "**/coverage/**"];

export interface IFileInclusionOptions {
  /** Per-file size ceiling in bytes. */
  readonly maxBytes?: number | undefined;
  /** Directories tried after the working directory, in order. Relative entries resolve against it. */
  readonly searchDirs?: readonly string[] | undefined;
  /** Prefix each included body with a comment naming the file. */
  readonly includeHeaders?: boolean | undefined;
}

export interface IInclusionToken {
  /** The path between the braces, verbatim. */
  readonly path: string;
  /** Offset of the opening brace. */
  readonly start: number;
  /** Offset just past the closing brace. */
  readonly end: number;
}

export interface IIncludableFile {
  readonly path: string;
  readonly size: number;
}

// ── Token Scanning ───────────────────────────────────────────────────────

export function findInclusionTokens(rawText: string): IInclusionToken[] {
  const tokens: IInclusionToken[] = [];
  for (const match of rawText.matchAll(TOKEN_PATTERN)) {
    const path = match[1];
    if (path === undefined || match.index === undefined) {
      continue;
    }
    tokens.push({ path, start: match.index, end: match.index + match[0].length });
  }
  return tokens;
}

// ── Expansion ────────────────────────────────────────────────────────────

/**
 * Replace every `{path}` token with the referenced file's contents.
 * Included text is inserted as-is and never scanned again.
 */
export function expandFileInclusions(
  rawText: string,
  workingDirectory: string,
  options?: IFileInclusionOptions,
): string {
  const tokens = findInclusionTokens(rawText);
  if (tokens.length === 0) {
    return rawText;
  }

  const maxBytes = options?.maxBytes ?? DEFAULT_MAX_INCLUSION_BYTES;
  const searchDirs = options?.searchDirs ?? [];
  const includeHeaders = options?.includeHeaders ?? false;
  const cache = new Map<string, string>();

  let output = "";
  let cursor = 0;

  for (const token of tokens) {
    let body = cache.get(token.path);
    if (body === undefined) {
      body = readInclusion(token.path, workingDirectory, searchDirs, maxBytes);
      if (includeHeaders) {
        body = buildFileHeader(token.path) + body;
      }
      cache.set(token.path, body);
    }

    output += rawText.slice(cursor, token.start) + body;
    cursor = token.end;
  }

  output += rawText.slice(cursor);
  logger.debug({ files: cache.size, tokens: tokens.length }, "File inclusions expanded");
  return output;
}

function readInclusion(
  tokenPath: string,
  workingDirectory: string,
  searchDirs: readonly string[],
  maxBytes: number,
): string {
  const located = locate(tokenPath, workingDirectory, searchDirs);
  if (!located) {
    throw new FileInclusionError(tokenPath, "missing");
  }

  const { filePath, stats } = located;
  if (!stats.isFile()) {
    throw new FileInclusionError(tokenPath, "not_a_file");
  }
  if (stats.size > maxBytes) {
    throw new FileInclusionError(tokenPath, "too_large", `${stats.size} > ${maxBytes} bytes`);
  }

  let bytes: Buffer;
  try {
    bytes = readFileSync(filePath);
  } catch (error: unknown) {
    const code = error instanceof Error && "code" in error ? String(error.code) : undefined;
    throw new FileInclusionError(tokenPath, "unreadable", code);
  }

  const text = decodeUtf8(bytes);
  if (text === undefined) {
    throw new FileInclusionError(tokenPath, "undecodable");
  }

  logger.info({ file: tokenPath, bytes: bytes.length }, "Included file");
  return text;
}

function locate(
  tokenPath: string,
  workingDirectory: string,
  searchDirs: readonly string[],
): { filePath: string; stats: Stats } | undefined {
  const candidates = isAbsolute(tokenPath)
    ? [tokenPath]
    : [
        resolve(workingDirectory, tokenPath),
        ...searchDirs.map((dir) => resolve(workingDirectory, dir, tokenPath)),
      ];

  for (const filePath of candidates) {
    if (existsSync(filePath)) {
      return { filePath, stats: statSync(filePath) };
    }
  }
  return undefined;
}

/** UTF-8 text, or undefined for binary content or an invalid sequence. */
function decodeUtf8(bytes: Buffer): string | undefined {
  if (bytes.includes(0)) {
    return undefined;
  }
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch {
    return undefined;
  }
}

/** One-line comment in the syntax of the file's language. */
export function buildFileHeader(tokenPath: string): string {
  const name = basename(tokenPath);
  const ext = extname(name).toLowerCase();
  const label = ext.length > 0 ? `File: ${name} (${ext})` : `File: ${name}`;

  switch (ext) {
    case ".py":
    case ".r":
    case ".sh":
    case ".yaml":
    case ".yml":
    case ".toml":
      return `# ${label}\n`;
    case ".html":
    case ".htm":
    case ".xml":
    case ".md":
      return `<!-- ${label} -->\n`;
    case ".css":
    case ".scss":
    case ".sass":
      return `/* ${label} */\n`;
    case ".sql":
      return `-- ${label}\n`;
    default:
      return `// ${label}\n`;
  }
}

// ── Listing ──────────────────────────────────────────────────────────────

const ExtensionsFileSchema = z.object({ extensions: z.array(z.string()) });

let includableExtensions: ReadonlySet<string> | undefined;

export function getIncludableExtensions(): ReadonlySet<string> {
  if (!includableExtensions) {
    const raw: unknown = JSON.parse(
      readFileSync(new URL("../../data/includable-extensions.json", import.meta.url), "utf-8"),
    );
    includableExtensions = new Set(ExtensionsFileSchema.parse(raw).extensions);
  }
  return includableExtensions;
}

export function isIncludableFile(filePath: string): boolean {
  return getIncludableExtensions().has(extname(filePath).toLowerCase());
}

/**
 * Text files under the given directories that can be referenced with
 * `{path}`. Paths are relative to `workingDirectory`, sorted.
 */
export function listIncludableFiles(
  dirs: readonly string[],
  workingDirectory: string,
): IIncludableFile[] {
  const seen = new Set<string>();
  const files: IIncludableFile[] = [];

  for (const dir of dirs) {
    const root = resolve(workingDirectory, dir);
    if (!existsSync(root) || !statSync(root).isDirectory()) {
      continue;
    }

    const matches = fg.sync("**/*", {
      cwd: root,
      absolute: true,
      dot: false,
      onlyFiles: true,
      stats: true,
      ignore: LIST_IGNORE,
    });

    for (const entry of matches) {
      if (seen.has(entry.path) || !isIncludableFile(entry.path)) {
        continue;
      }
      seen.add(entry.path);
      files.push({ path: relative(workingDirectory, entry.path), size: entry.stats?.size ?? 0 });
    }
  }

  return files.sort((a, b) => a.path.localeCompare(b.path));
}
