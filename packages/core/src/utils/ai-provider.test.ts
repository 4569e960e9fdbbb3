import { describe, it, expect, vi, beforeEach } from "vitest";
import { ProviderError } from "../errors.js";
import { createAiSdkBackend } from "./ai-provider.js";

const generateTextMock = vi.hoisted(() => vi.fn());
vi.mock("ai", () => ({ generateText: generateTextMock }));

describe("createAiSdkBackend", () => {
  beforeEach(() => {
    generateTextMock.mockReset();
  });

  it("calls generateText once with sampling options and no SDK retries", async () => {
    generateTextMock.mockResolvedValue({ text: "Rent the compact.", finishReason: "stop" });
    const signal = new AbortController().signal;
    const backend = createAiSdkBackend("gemini", "google/gemini-test");

    const text = await backend.complete("Compare offers", { temperature: 0.3, maxTokens: 200, signal });

    expect(text).toBe("Rent the compact.");
    expect(backend.id).toBe("gemini");
    expect(generateTextMock).toHaveBeenCalledTimes(1);
    expect(generateTextMock).toHaveBeenCalledWith({
      model: "google/gemini-test",
      prompt: "Compare offers",
      temperature: 0.3,
      maxOutputTokens: 200,
      maxRetries: 0,
      abortSignal: signal,
    });
  });

  it("reports filtered responses as malformed", async () => {
    generateTextMock.mockResolvedValue({ text: "", finishReason: "content-filter" });
    const backend = createAiSdkBackend("claude", "anthropic/claude-test");

    const err = await backend
      .complete("hi", { temperature: 0.7, maxTokens: 10, signal: new AbortController().signal })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderError);
    expect(err instanceof ProviderError && err.kind).toBe("malformed");
  });

  it("lets SDK errors through for the gateway to classify", async () => {
    generateTextMock.mockRejectedValue(Object.assign(new Error("Too Many Requests"), { statusCode: 429 }));
    const backend = createAiSdkBackend("gemini", "google/gemini-test");

    await expect(
      backend.complete("hi", { temperature: 0.7, maxTokens: 10, signal: new AbortController().signal }),
    ).rejects.toThrow("Too Many Requests");
  });
});
