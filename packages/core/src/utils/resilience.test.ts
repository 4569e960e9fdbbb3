import { describe, it, expect } from "vitest";
import { CapabilityTimeoutError, ProviderError, isAbortError } from "../errors.js";
import { hangUntilAborted } from "../testing.js";
import { classifyProviderError, toProviderError, withTimeout } from "./resilience.js";

describe("withTimeout", () => {
  it("resolves with the value of a call that finishes in time", async () => {
    const value = await withTimeout(async () => 42, { operation: "lookup", timeoutMs: 100 });
    expect(value).toBe(42);
  });

  it("rejects with CapabilityTimeoutError and aborts the call's signal", async () => {
    let seen: AbortSignal | undefined;
    const pending = withTimeout(
      (signal) => {
        seen = signal;
        return hangUntilAborted<string>(signal);
      },
      { operation: "rental search", timeoutMs: 10 },
    );

    await expect(pending).rejects.toBeInstanceOf(CapabilityTimeoutError);
    await expect(pending).rejects.toThrow("rental search timed out after 10ms");
    expect(seen?.aborted).toBe(true);
  });

  it("rejects with an AbortError when the parent signal aborts", async () => {
    const parent = new AbortController();
    const pending = withTimeout(() => new Promise<string>(() => {}), {
      operation: "route lookup",
      timeoutMs: 1_000,
      signal: parent.signal,
    });
    parent.abort();

    const err = await pending.catch((e: unknown) => e);
    expect(isAbortError(err)).toBe(true);
  });

  it("does not start the call when the parent is already aborted", async () => {
    const parent = new AbortController();
    parent.abort();
    let started = false;

    const err = await withTimeout(
      async () => {
        started = true;
        return 1;
      },
      { operation: "lookup", timeoutMs: 100, signal: parent.signal },
    ).catch((e: unknown) => e);

    expect(isAbortError(err)).toBe(true);
    expect(started).toBe(false);
  });
});

describe("classifyProviderError", () => {
  it("reads numeric status properties", () => {
    expect(classifyProviderError(Object.assign(new Error("boom"), { status: 429 }))).toBe("quota");
    expect(classifyProviderError(Object.assign(new Error("boom"), { statusCode: 401 }))).toBe("auth");
    expect(classifyProviderError(Object.assign(new Error("boom"), { status: 503 }))).toBe("unavailable");
  });

  it("falls back to status codes and keywords in the message", () => {
    expect(classifyProviderError(new Error("Request failed with status 500"))).toBe("unavailable");
    expect(classifyProviderError(new Error("Rate limit exceeded"))).toBe("quota");
    expect(classifyProviderError(new Error("Invalid API key"))).toBe("auth");
    expect(classifyProviderError(new Error("Model is overloaded"))).toBe("unavailable");
    expect(classifyProviderError(new Error("Request timed out"))).toBe("timeout");
    expect(classifyProviderError(new Error("Malformed response body"))).toBe("malformed");
    expect(classifyProviderError(new Error("something odd"))).toBe("unknown");
  });

  it("keeps the kind of typed errors", () => {
    expect(classifyProviderError(new CapabilityTimeoutError("generation via a", 5))).toBe("timeout");
    expect(classifyProviderError(new ProviderError("a", "auth", "denied"))).toBe("auth");
    expect(classifyProviderError("not an error")).toBe("unknown");
  });
});

describe("toProviderError", () => {
  it("wraps foreign errors with provider and cause", () => {
    const cause = new Error("Too many requests");
    const err = toProviderError("gemini", cause);

    expect(err.provider).toBe("gemini");
    expect(err.kind).toBe("quota");
    expect(err.message).toBe("[gemini] Too many requests");
    expect(err.cause).toBe(cause);
  });

  it("returns ProviderErrors unchanged", () => {
    const original = new ProviderError("claude", "malformed", "Empty response");
    expect(toProviderError("other", original)).toBe(original);
  });
});
