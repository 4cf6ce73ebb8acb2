/**
 * Shared fixtures for the test suite.
 */

import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { IAgentProfile } from "../src/types/config.js";
import type { ICompletionRequest, IStoredMessage } from "../src/types/message.js";
import type { ICompletionProvider } from "../src/providers/types.js";

export function createTempDir(prefix = "chatdeck-test-"): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error: unknown) {
    return error;
  }
  throw new Error("expected the call to throw");
}

export async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error: unknown) {
    return error;
  }
  throw new Error("expected the promise to reject");
}

export const FIXED_NOW = new Date("2026-01-02T03:04:05.006Z");

export function fixedClock(date: Date = FIXED_NOW): () => Date {
  return () => new Date(date.getTime());
}

export const SAMPLE_PROFILE: IAgentProfile = {
  id: "alpha",
  model: "gpt-4.1",
  temperature: 0.7,
  maxTokens: null,
  systemPrompt: null,
  stream: true,
  topP: 1,
  frequencyPenalty: 0,
  presencePenalty: 0,
  maxHistorySize: 1000,
  maxBackups: 10,
  createdAt: "2026-01-01T09:00:00.000Z",
  updatedAt: "2026-01-01T09:00:00.000Z",
};

export const SAMPLE_MESSAGES: readonly IStoredMessage[] = [
  {
    index: 1,
    role: "user",
    content: "Show me <b>code</b> & more",
    timestamp: "2026-01-01T10:00:00.000Z",
    tokenEstimate: 7,
    model: "gpt-4.1",
  },
  {
    index: 2,
    role: "assistant",
    content: "Sure:\n```ts\nconst x = 1;\n```\nDone",
    timestamp: "2026-01-01T10:00:05.000Z",
    tokenEstimate: 9,
    model: "gpt-4.1",
  },
];

// ── Scripted Provider ────────────────────────────────────────────────────

export interface IScriptStep {
  readonly chunks: readonly string[];
  /** Thrown after the chunks have been yielded (or instead of the reply). */
  readonly error?: unknown;
}

/**
 * In-process completion provider that replays a fixed script, one step per
 * call. The last step repeats once the script runs out.
 */
export class ScriptedProvider implements ICompletionProvider {
  readonly name = "scripted";
  readonly requests: ICompletionRequest[] = [];
  private readonly steps: readonly IScriptStep[];

  constructor(steps: readonly IScriptStep[]) {
    this.steps = steps;
  }

  get calls(): number {
    return this.requests.length;
  }

  async complete(request: ICompletionRequest): Promise<string> {
    const step = this.nextStep(request);
    if (step.error !== undefined) {
      throw step.error;
    }
    return step.chunks.join("");
  }

  async *stream(request: ICompletionRequest): AsyncIterable<string> {
    const step = this.nextStep(request);
    for (const chunk of step.chunks) {
      yield chunk;
    }
    if (step.error !== undefined) {
      throw step.error;
    }
  }

  private nextStep(request: ICompletionRequest): IScriptStep {
    this.requests.push(request);
    const step = this.steps[Math.min(this.requests.length, this.steps.length) - 1];
    if (step === undefined) {
      throw new Error("scripted provider has no steps");
    }
    return step;
  }
}
