import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { ChatSession } from "../src/core/chat-session.js";
import { FileAgentRepository } from "../src/storage/agent-repository.js";
import { DEFAULT_RUNTIME_CONFIG, type IAgentProfile, type IRuntimeConfig } from "../src/types/config.js";
import {
  FatalServiceError,
  FileInclusionError,
  TransientServiceError,
  ValidationError,
} from "../src/types/errors.js";
import { getUploadsDir } from "../src/utils/pathResolver.js";
import { captureRejection, createTempDir, fixedClock, removeTempDir, ScriptedProvider, type IScriptStep } from "./helpers.js";

describe("ChatSession", () => {
  let home: string;
  let wd: string;
  let repository: FileAgentRepository;
  let config: IRuntimeConfig;

  beforeEach(() => {
    home = createTempDir();
    wd = createTempDir();
    repository = new FileAgentRepository(home, { now: fixedClock() });
    config = {
      ...DEFAULT_RUNTIME_CONFIG,
      home,
      searchPaths: [],
      retry: { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 1 },
    };
  });

  afterEach(() => {
    removeTempDir(home);
    removeTempDir(wd);
  });

  function createSession(
    steps: readonly IScriptStep[],
    overrides?: Partial<Pick<IAgentProfile, "stream" | "systemPrompt">>,
  ): { session: ChatSession; provider: ScriptedProvider; profile: IAgentProfile } {
    const profile = repository.create("alpha", "gpt-4.1", { stream: false, ...overrides });
    const provider = new ScriptedProvider(steps);
    const session = new ChatSession({
      provider,
      store: repository.openStore(profile),
      profile,
      config,
      workingDirectory: wd,
      extraSearchDirs: [getUploadsDir(repository.agentDir(profile.id))],
      retryHooks: { sleep: async () => {}, random: () => 0 },
    });
    return { session, provider, profile };
  }

  function storedSize(profile: IAgentProfile): number {
    return repository.openStore(profile).size;
  }

  describe("successful turns", () => {
    it("sends the message and commits both sides of the turn", async () => {
      const { session, provider, profile } = createSession([{ chunks: ["Hi!"] }]);

      const result = await session.send("Hello");

      expect(result.attempts).toBe(1);
      expect(result.user).toMatchObject({ index: 1, role: "user", content: "Hello" });
      expect(result.assistant).toMatchObject({ index: 2, role: "assistant", content: "Hi!", model: "gpt-4.1" });
      expect(storedSize(profile)).toBe(2);

      const request = provider.requests[0];
      expect(request?.messages).toEqual([{ role: "user", content: "Hello" }]);
      expect(request?.temperature).toBe(1);
      expect(request?.maxTokens).toBe(32_768);
      expect(request?.timeoutMs).toBe(300_000);
      expect(request).not.toHaveProperty("system");
    });

    it("replays earlier turns in the next request", async () => {
      const { session, provider } = createSession([{ chunks: ["one"] }, { chunks: ["two"] }]);

      await session.send("first");
      await session.send("second");

      expect(provider.requests[1]?.messages).toEqual([
        { role: "user", content: "first" },
        { role: "assistant", content: "one" },
        { role: "user", content: "second" },
      ]);
    });

    it("passes the system prompt", async () => {
      const { session, provider } = createSession([{ chunks: ["ok"] }], { systemPrompt: "Be brief." });
      await session.send("hi");
      expect(provider.requests[0]?.system).toBe("Be brief.");
    });

    it("applies per-call overrides", async () => {
      const { session, provider } = createSession([{ chunks: ["ok"] }]);
      await session.send("hi", { overrides: { temperature: 0.2, maxTokens: null } });

      expect(provider.requests[0]?.temperature).toBe(0.2);
      expect(provider.requests[0]).not.toHaveProperty("maxTokens");
    });

    it("streams chunks to the callback and stores the joined text", async () => {
      const { session } = createSession([{ chunks: ["Hel", "lo"] }], { stream: true });
      const seen: string[] = [];

      const result = await session.send("hi", { onChunk: (chunk) => seen.push(chunk) });

      expect(seen).toEqual(["Hel", "lo"]);
      expect(result.assistant.content).toBe("Hello");
    });
  });

  describe("file inclusion", () => {
    it("stores the expanded text", async () => {
      writeFileSync(join(wd, "note.txt"), "remember this");
      const { session, provider } = createSession([{ chunks: ["ok"] }]);

      const result = await session.send("Read {note.txt}");

      expect(result.user.content).toBe("Read remember this");
      expect(provider.requests[0]?.messages).toEqual([{ role: "user", content: "Read remember this" }]);
    });

    it("finds files in the agent's uploads directory", async () => {
      const { session } = createSession([{ chunks: ["ok"] }]);
      writeFileSync(join(getUploadsDir(repository.agentDir("alpha")), "up.txt"), "uploaded");

      const result = await session.send("{up.txt}");
      expect(result.user.content).toBe("uploaded");
    });

    it("fails before any provider call when a reference is bad", async () => {
      const { session, provider, profile } = createSession([{ chunks: ["ok"] }]);

      const error = await captureRejection(session.send("see {missing.txt}"));

      expect(error).toBeInstanceOf(FileInclusionError);
      expect(provider.calls).toBe(0);
      expect(storedSize(profile)).toBe(0);
    });
  });

  describe("failures", () => {
    it("rejects a blank message without calling the provider", async () => {
      const { session, provider } = createSession([{ chunks: ["ok"] }]);
      await expect(session.send("   ")).rejects.toThrow(ValidationError);
      expect(provider.calls).toBe(0);
    });

    it("retries a transient failure and succeeds", async () => {
      const { session, provider } = createSession([
        { chunks: [], error: new TransientServiceError("busy") },
        { chunks: ["ok"] },
      ]);

      const result = await session.send("hi");
      expect(result.attempts).toBe(2);
      expect(provider.calls).toBe(2);
    });

    it("honours the retry-after hint of a rate-limited call", async () => {
      const profile = repository.create("alpha", "gpt-4.1", { stream: false });
      const delays: number[] = [];
      const session = new ChatSession({
        provider: new ScriptedProvider([
          { chunks: [], error: new TransientServiceError("rate limited", { retryAfterMs: 2_000 }) },
          { chunks: ["ok"] },
        ]),
        store: repository.openStore(profile),
        profile,
        config: { ...config, retry: { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 10_000 } },
        workingDirectory: wd,
        retryHooks: { sleep: async (ms) => void delays.push(ms), random: () => 0 },
      });

      const result = await session.send("hi");

      expect(result.attempts).toBe(2);
      expect(delays).toEqual([2_000]);
    });

    it("gives up at the retry ceiling and stores nothing", async () => {
      const { session, provider, profile } = createSession([
        { chunks: [], error: new TransientServiceError("overloaded") },
      ]);

      const error = await captureRejection(session.send("hi"));

      expect(error).toBeInstanceOf(FatalServiceError);
      expect(error).toHaveProperty("message", "gave up after 3 attempts: overloaded");
      expect(provider.calls).toBe(3);
      expect(storedSize(profile)).toBe(0);
    });

    it("does not retry a fatal failure", async () => {
      const { session, provider } = createSession([
        { chunks: [], error: new FatalServiceError("bad request", { statusCode: 400 }) },
      ]);

      const error = await captureRejection(session.send("hi"));

      expect(error).toBeInstanceOf(FatalServiceError);
      expect(error).toHaveProperty("message", "bad request");
      expect(provider.calls).toBe(1);
    });

    it("classifies raw provider errors", async () => {
      const { session, provider } = createSession([{ chunks: [], error: new Error("Incorrect API key provided") }]);

      const error = await captureRejection(session.send("hi"));

      expect(error).toBeInstanceOf(FatalServiceError);
      expect(error).toMatchObject({ statusCode: 401 });
      expect(provider.calls).toBe(1);
    });

    it("retries a stream that fails before its first chunk", async () => {
      const { session } = createSession(
        [{ chunks: [], error: new TransientServiceError("reset") }, { chunks: ["ok"] }],
        { stream: true },
      );

      const result = await session.send("hi");
      expect(result.attempts).toBe(2);
      expect(result.assistant.content).toBe("ok");
    });

    it("fails the turn when a stream breaks after partial output", async () => {
      const { session, provider, profile } = createSession(
        [{ chunks: ["partial"], error: new TransientServiceError("connection reset") }],
        { stream: true },
      );
      const seen: string[] = [];

      const error = await captureRejection(session.send("hi", { onChunk: (chunk) => seen.push(chunk) }));

      expect(error).toBeInstanceOf(FatalServiceError);
      expect(error).toHaveProperty("message", "stream interrupted: connection reset");
      expect(seen).toEqual(["partial"]);
      expect(provider.calls).toBe(1);
      expect(storedSize(profile)).toBe(0);
    });

    it("treats an empty answer as a failure", async () => {
      const { session, profile } = createSession([{ chunks: ["  "] }]);

      const error = await captureRejection(session.send("hi"));

      expect(error).toHaveProperty("message", "the model returned an empty response");
      expect(storedSize(profile)).toBe(0);
    });
  });
});
