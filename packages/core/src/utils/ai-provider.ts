import { generateText, type LanguageModel } from "ai";
import { ProviderError } from "../errors.js";
import type { CompletionOptions, GenerationBackend, ProviderId } from "../types.js";

/**
 * Adapts an AI SDK `LanguageModel` to a generation backend.
 * SDK-level retries are disabled: the gateway makes exactly one attempt per
 * provider and moves on to the next one in order.
 */
export function createAiSdkBackend(id: ProviderId, model: LanguageModel): GenerationBackend {
  return {
    id,
    async complete(prompt: string, { temperature, maxTokens, signal }: CompletionOptions): Promise<string> {
      const result = await generateText({
        model,
        prompt,
        temperature,
        maxOutputTokens: maxTokens,
        maxRetries: 0,
        abortSignal: signal,
      });
      if (result.finishReason === "content-filter") {
        throw new ProviderError(id, "malformed", "Response blocked by content filter");
      }
      return result.text;
    },
  };
}
