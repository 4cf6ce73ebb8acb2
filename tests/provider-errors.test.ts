import { describe, it, expect } from "vitest";
import { APICallError } from "ai";
import { classifyProviderError } from "../src/providers/openai-adapter.js";
import { FatalServiceError, TransientServiceError } from "../src/types/errors.js";

function apiError(statusCode: number, responseHeaders?: Record<string, string>): APICallError {
  return new APICallError({
    message: `HTTP ${statusCode}`,
    url: "https://api.example.test/v1/chat/completions",
    requestBodyValues: {},
    statusCode,
    ...(responseHeaders !== undefined ? { responseHeaders } : {}),
  });
}

describe("classifyProviderError", () => {
  it("treats rate limits as transient and honours retry-after", () => {
    const error = classifyProviderError(apiError(429, { "retry-after": "2" }));
    expect(error).toBeInstanceOf(TransientServiceError);
    expect(error).toMatchObject({ retryAfterMs: 2_000 });
  });

  it("treats server errors and request timeouts as transient", () => {
    expect(classifyProviderError(apiError(503))).toBeInstanceOf(TransientServiceError);
    expect(classifyProviderError(apiError(408))).toBeInstanceOf(TransientServiceError);
  });

  it("treats client errors as fatal and keeps the status", () => {
    const error = classifyProviderError(apiError(400));
    expect(error).toBeInstanceOf(FatalServiceError);
    expect(error).toMatchObject({ statusCode: 400 });
  });

  it("attaches a recovery hint to authentication failures", () => {
    const error = classifyProviderError(apiError(401));
    expect(error).toBeInstanceOf(FatalServiceError);
    expect(error.suggestedRecovery).toBe('Check the agent\'s API key with "chatdeck setup" or set OPENAI_API_KEY.');
  });

  it("maps aborted requests to a timeout", () => {
    const timeout = new Error("The operation was aborted due to timeout");
    timeout.name = "TimeoutError";

    const error = classifyProviderError(timeout);
    expect(error).toBeInstanceOf(TransientServiceError);
    expect(error.message).toBe("request timed out");
  });

  it("falls back to message patterns", () => {
    expect(classifyProviderError(new Error("socket hang up"))).toBeInstanceOf(TransientServiceError);
    expect(classifyProviderError(new Error("something odd"))).toBeInstanceOf(FatalServiceError);
    expect(classifyProviderError("plain string failure")).toBeInstanceOf(FatalServiceError);
  });

  it("scrubs keys from the message", () => {
    const error = classifyProviderError(new Error(`Incorrect API key provided: sk-${"x".repeat(24)}`));
    expect(error.message).toBe("Incorrect API key provided: sk-[REDACTED]");
    expect(error).toMatchObject({ statusCode: 401 });
  });

  it("passes classified errors through", () => {
    const original = new TransientServiceError("busy");
    expect(classifyProviderError(original)).toBe(original);
  });
});
