import { describe, it, expect } from "vitest";
import {
  fileStamp,
  formatClockTime,
  formatCount,
  formatDuration,
  formatFileSize,
  formatTimestamp,
} from "../src/utils/format.js";
import { isValidAgentId, maskSecret, redactSecrets, sanitizePromptInput } from "../src/utils/sanitizer.js";
import { estimateTokenCount, formatTokenCount } from "../src/utils/tokenCounter.js";
import { computeBackoffDelay, withRetry } from "../src/utils/retry.js";

describe("format", () => {
  it("renders timestamps in UTC", () => {
    expect(formatTimestamp("2026-10-19T04:31:05.120Z")).toBe("2026-10-19 04:31:05");
    expect(formatClockTime("2026-10-19T04:31:05.120Z")).toBe("04:31:05");
    expect(formatTimestamp("not a date")).toBe("not a date");
  });

  it("renders durations as H:MM:SS", () => {
    expect(formatDuration(null)).toBe("N/A");
    expect(formatDuration(3_723_000)).toBe("1:02:03");
    expect(formatDuration(999)).toBe("0:00:00");
  });

  it("renders file sizes", () => {
    expect(formatFileSize(512)).toBe("512 bytes");
    expect(formatFileSize(1_536)).toBe("1.5 KB");
    expect(formatFileSize(3 * 1_024 * 1_024)).toBe("3.0 MB");
  });

  it("builds sortable file stamps", () => {
    expect(fileStamp(new Date("2026-10-19T04:31:05.120Z"))).toBe("20261019T043105120Z");
  });

  it("groups thousands", () => {
    expect(formatCount(1_234_567)).toBe("1,234,567");
    expect(formatCount(999)).toBe("999");
  });

  it("estimates tokens at four characters each", () => {
    expect(estimateTokenCount("abcde")).toBe(2);
    expect(estimateTokenCount("")).toBe(0);
    expect(formatTokenCount(12_345)).toBe("12.3K");
    expect(formatTokenCount(42)).toBe("42");
  });
});

describe("sanitizer", () => {
  it("accepts only directory-safe agent ids", () => {
    expect(isValidAgentId("my-agent_1")).toBe(true);
    expect(isValidAgentId("a".repeat(64))).toBe(true);
    expect(isValidAgentId("a".repeat(65))).toBe(false);
    expect(isValidAgentId("")).toBe(false);
    expect(isValidAgentId("a/b")).toBe(false);
    expect(isValidAgentId("..")).toBe(false);
  });

  it("redacts key-shaped strings and bearer tokens", () => {
    const key = `sk-${"x".repeat(24)}`;
    expect(redactSecrets(`key ${key} done`)).toBe("key sk-[REDACTED] done");
    expect(redactSecrets("Authorization: Bearer test-secret")).toBe("Authorization: Bearer [REDACTED]");
    expect(redactSecrets("nothing to hide")).toBe("nothing to hide");
  });

  it("masks all but the edges of a secret", () => {
    expect(maskSecret("test-secret")).toBe("test...et");
    expect(maskSecret("abc")).toBe("***");
  });

  it("strips NUL bytes", () => {
    expect(sanitizePromptInput("a\0b")).toBe("ab");
  });
});

describe("retry", () => {
  const options = { maxRetries: 3, baseDelayMs: 10, maxDelayMs: 1_000 };

  it("doubles the delay per attempt and caps it", () => {
    const noJitter = (): number => 0;
    expect(computeBackoffDelay(0, { baseDelayMs: 1_000, maxDelayMs: 30_000 }, noJitter)).toBe(1_000);
    expect(computeBackoffDelay(2, { baseDelayMs: 1_000, maxDelayMs: 30_000 }, () => 0.5)).toBe(4_500);
    expect(computeBackoffDelay(10, { baseDelayMs: 1_000, maxDelayMs: 30_000 }, noJitter)).toBe(30_000);
  });

  it("retries until the call succeeds", async () => {
    const delays: number[] = [];
    let calls = 0;

    const result = await withRetry(
      async () => {
        calls++;
        if (calls < 3) {
          throw new Error("flaky");
        }
        return "done";
      },
      { ...options, random: () => 0, sleep: async (ms) => void delays.push(ms) },
    );

    expect(result).toBe("done");
    expect(calls).toBe(3);
    expect(delays).toEqual([10, 20]);
  });

  it("waits at least the server-requested delay, within the cap", async () => {
    const delays: number[] = [];
    let calls = 0;

    await withRetry(
      async () => {
        calls++;
        if (calls < 3) {
          throw new Error("rate limited");
        }
        return "done";
      },
      {
        ...options,
        random: () => 0,
        retryAfter: () => (calls === 1 ? 250 : 5_000),
        sleep: async (ms) => void delays.push(ms),
      },
    );

    expect(delays).toEqual([250, 1_000]);
  });

  it("rethrows the last error at the ceiling", async () => {
    let calls = 0;
    const attempt = withRetry(
      async () => {
        calls++;
        throw new Error(`failure ${calls}`);
      },
      { ...options, maxRetries: 2, random: () => 0, sleep: async () => {} },
    );

    await expect(attempt).rejects.toThrow("failure 3");
    expect(calls).toBe(3);
  });

  it("stops when shouldRetry declines", async () => {
    let calls = 0;
    const attempt = withRetry(
      async () => {
        calls++;
        throw new Error("fatal");
      },
      { ...options, shouldRetry: () => false, sleep: async () => {} },
    );

    await expect(attempt).rejects.toThrow("fatal");
    expect(calls).toBe(1);
  });
});
