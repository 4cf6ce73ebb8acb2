import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFileSync } from "node:fs";
import { join } from "node:path";
import { exportConversation } from "../src/export/exporter.js";
import { importConversation, parseConversationExport } from "../src/export/importer.js";
import { renderConversation } from "../src/export/renderer.js";
import { FileAgentRepository } from "../src/storage/agent-repository.js";
import { ValidationError } from "../src/types/errors.js";
import { captureError, createTempDir, fixedClock, removeTempDir, SAMPLE_MESSAGES, SAMPLE_PROFILE } from "./helpers.js";

const NOW = new Date("2026-01-02T12:00:00.000Z");

describe("exportConversation", () => {
  let agentDir: string;

  beforeEach(() => {
    agentDir = createTempDir();
  });

  afterEach(() => {
    removeTempDir(agentDir);
  });

  it("writes the rendered document under exports/", () => {
    const result = exportConversation(agentDir, SAMPLE_PROFILE, SAMPLE_MESSAGES, "md", { now: NOW });
    const expected = renderConversation(SAMPLE_PROFILE, SAMPLE_MESSAGES, "md", { exportedAt: NOW });

    expect(result.filePath).toBe(join(agentDir, "exports", "conversation_20260102T120000000Z.md"));
    expect(readFileSync(result.filePath, "utf-8")).toBe(expected);
    expect(result.bytes).toBe(Buffer.byteLength(expected, "utf-8"));
    expect(result.messageCount).toBe(2);
  });

  it("never overwrites an earlier export", () => {
    exportConversation(agentDir, SAMPLE_PROFILE, SAMPLE_MESSAGES, "txt", { now: NOW });
    const second = exportConversation(agentDir, SAMPLE_PROFILE, SAMPLE_MESSAGES, "txt", { now: NOW });

    expect(second.filePath).toBe(join(agentDir, "exports", "conversation_20260102T120000000Z_2.txt"));
  });
});

describe("importConversation", () => {
  let home: string;
  let repository: FileAgentRepository;

  beforeEach(() => {
    home = createTempDir();
    repository = new FileAgentRepository(home, { now: fixedClock() });
  });

  afterEach(() => {
    removeTempDir(home);
  });

  function exportAlpha(): string {
    const profile = repository.create("alpha", "gpt-4.1", { temperature: 0.3 });
    const store = repository.openStore(profile);
    store.appendTurn("question", "answer", { model: "gpt-4.1" });
    store.append("user", "follow-up");
    return renderConversation(profile, store.messages(), "json", { exportedAt: NOW });
  }

  it("recreates the conversation as a new agent", () => {
    const text = exportAlpha();

    const result = importConversation(repository, text, { agentId: "beta" });

    expect(result.messageCount).toBe(3);
    expect(result.profile.id).toBe("beta");
    expect(result.profile.temperature).toBe(0.3);

    const original = repository.openStore(repository.loadProfile("alpha"));
    const imported = repository.openStore(result.profile);
    expect(imported.messages()).toEqual(original.messages());
    expect(imported.append("assistant", "next").index).toBe(4);
  });

  it("can bind the new agent to another model", () => {
    const result = importConversation(repository, exportAlpha(), { agentId: "beta", model: "gpt-4.1-mini" });
    expect(result.profile.model).toBe("gpt-4.1-mini");
  });

  it("never merges into an existing agent", () => {
    const text = exportAlpha();

    expect(() => importConversation(repository, text, { agentId: "alpha" })).toThrow(ValidationError);
    expect(repository.openStore(repository.loadProfile("alpha")).size).toBe(3);
  });

  it("raises the history limit to fit the imported messages", () => {
    const text = renderConversation({ ...SAMPLE_PROFILE, maxHistorySize: 1 }, SAMPLE_MESSAGES, "json", {
      exportedAt: NOW,
    });
    expect(parseConversationExport(text).settings.maxHistorySize).toBe(2);
  });

  it("rejects text that is not an export", () => {
    expect(captureError(() => parseConversationExport("not json"))).toMatchObject({ field: "export file" });
    expect(captureError(() => parseConversationExport('{"format":"other"}'))).toBeInstanceOf(ValidationError);
  });
});
