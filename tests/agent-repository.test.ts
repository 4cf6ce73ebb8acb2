import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { FileAgentRepository } from "../src/storage/agent-repository.js";
import { InvalidConfigError, NotFoundError, ValidationError } from "../src/types/errors.js";
import { captureError, createTempDir, removeTempDir } from "./helpers.js";

describe("FileAgentRepository", () => {
  let home: string;
  let now: Date;
  let repository: FileAgentRepository;

  beforeEach(() => {
    home = createTempDir();
    now = new Date("2026-01-01T09:00:00.000Z");
    repository = new FileAgentRepository(home, { now: () => now });
  });

  afterEach(() => {
    removeTempDir(home);
  });

  describe("create", () => {
    it("writes a profile with default settings and an empty history", () => {
      const profile = repository.create("alpha", "gpt-4.1");

      expect(profile).toEqual({
        id: "alpha",
        model: "gpt-4.1",
        temperature: 1,
        maxTokens: 32_768,
        systemPrompt: null,
        stream: true,
        topP: 1,
        frequencyPenalty: 0,
        presencePenalty: 0,
        maxHistorySize: 1_000,
        maxBackups: 10,
        createdAt: "2026-01-01T09:00:00.000Z",
        updatedAt: "2026-01-01T09:00:00.000Z",
      });

      const dir = repository.agentDir("alpha");
      for (const sub of ["backups", "logs", "exports", "uploads"]) {
        expect(existsSync(join(dir, sub))).toBe(true);
      }
      expect(repository.openStore(profile).size).toBe(0);
      expect([...repository.listAgents()]).toEqual(["alpha"]);
    });

    it("applies overrides", () => {
      const profile = repository.create("beta", "gpt-4.1-mini", { temperature: 0.2, systemPrompt: "Be brief." });
      expect(profile.temperature).toBe(0.2);
      expect(profile.systemPrompt).toBe("Be brief.");
      expect(repository.loadProfile("beta")).toEqual(profile);
    });

    it("refuses a duplicate id", () => {
      repository.create("alpha", "gpt-4.1");
      const error = captureError(() => repository.create("alpha", "gpt-4.1"));
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toHaveProperty("message", 'Invalid agent id: "alpha" already exists');
    });

    it("rejects bad ids, unknown models and out-of-range settings before touching disk", () => {
      expect(() => repository.create("bad/id", "gpt-4.1")).toThrow(ValidationError);
      expect(() => repository.create("gamma", "gpt-2")).toThrow(ValidationError);
      expect(() => repository.create("gamma", "gpt-4.1", { temperature: 5 })).toThrow(ValidationError);

      expect(existsSync(repository.agentDir("gamma"))).toBe(false);
      expect(repository.listAgents().size).toBe(0);
    });

    it("leaves no directory behind when the seed is out of sequence", () => {
      const seed = [
        { index: 1, role: "user" as const, content: "a", timestamp: "2026-01-01T08:00:00.000Z" },
        { index: 4, role: "assistant" as const, content: "b", timestamp: "2026-01-01T08:00:01.000Z" },
      ];

      expect(() => repository.create("delta", "gpt-4.1", undefined, seed)).toThrow(ValidationError);
      expect(existsSync(repository.agentDir("delta"))).toBe(false);
    });
  });

  describe("profiles", () => {
    it("updates one setting and bumps updatedAt", () => {
      repository.create("alpha", "gpt-4.1");
      now = new Date("2026-01-01T10:00:00.000Z");

      const updated = repository.updateProfile("alpha", { temperature: 0.5 });
      expect(updated.temperature).toBe(0.5);
      expect(updated.updatedAt).toBe("2026-01-01T10:00:00.000Z");
      expect(updated.createdAt).toBe("2026-01-01T09:00:00.000Z");
      expect(repository.loadProfile("alpha").temperature).toBe(0.5);
    });

    it("rejects unknown keys and out-of-range values", () => {
      repository.create("alpha", "gpt-4.1");

      expect(captureError(() => repository.updateProfile("alpha", { bogus: 1 }))).toMatchObject({
        field: "setting",
      });
      expect(() => repository.updateProfile("alpha", { temperature: 3 })).toThrow(ValidationError);
      expect(() => repository.updateProfile("alpha", { model: "gpt-2" })).toThrow(ValidationError);
      expect(repository.loadProfile("alpha").temperature).toBe(1);
    });

    it("reports a missing agent", () => {
      const error = captureError(() => repository.loadProfile("nobody"));
      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toMatchObject({ kind: "agent", target: "nobody" });
    });

    it("rejects a profile whose id does not match its directory", () => {
      repository.create("alpha", "gpt-4.1");
      const configPath = join(repository.agentDir("alpha"), "config.yaml");
      writeFileSync(configPath, readFileSync(configPath, "utf-8").replace("id: alpha", "id: beta"));

      expect(() => repository.loadProfile("alpha")).toThrow(InvalidConfigError);
    });

    it("rejects a profile that is not a mapping", () => {
      repository.create("alpha", "gpt-4.1");
      writeFileSync(join(repository.agentDir("alpha"), "config.yaml"), "just a string\n");

      expect(() => repository.loadProfile("alpha")).toThrow(InvalidConfigError);
    });
  });

  describe("registry", () => {
    it("ignores directories without a profile", () => {
      repository.create("alpha", "gpt-4.1");
      mkdirSync(join(home, "agents", "stray"));

      expect([...repository.listAgents()]).toEqual(["alpha"]);
      expect(repository.exists("stray")).toBe(false);
    });

    it("summarizes an agent", () => {
      const profile = repository.create("alpha", "gpt-4.1");
      repository.openStore(profile).appendTurn("hi", "hello");

      const summary = repository.summarize("alpha");
      expect(summary.messageCount).toBe(2);
      expect(summary.modelName).toBe("GPT-4.1");
      expect(summary.backupCount).toBe(0);
      expect(summary.historyBytes).toBeGreaterThan(0);
    });

    it("deletes an agent and its directory", () => {
      repository.create("alpha", "gpt-4.1");
      repository.delete("alpha");

      expect(repository.exists("alpha")).toBe(false);
      expect(existsSync(repository.agentDir("alpha"))).toBe(false);
      expect(() => repository.delete("alpha")).toThrow(NotFoundError);
    });
  });
});
