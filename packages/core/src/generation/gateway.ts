import { GenerationUnavailableError, ProviderError, abortError, isAbortError } from "../errors.js";
import { STATUS_CODES, emitStatus } from "../events/events.js";
import { DEFAULTS } from "../utils/constants.js";
import { toProviderError, withTimeout } from "../utils/resilience.js";
import type { GenerationBackend, GenerationConfig, ProviderId, RunContext } from "../types.js";

export type GenerationOutcome =
  | { ok: true; text: string; provider: ProviderId; failures: ProviderError[] }
  | { ok: false; failures: ProviderError[] };

/**
 * Uniform entry point to the configured text-generation backends.
 *
 * Backends are tried in `config.providerOrder`, once each. A failure of any kind
 * (timeout, quota, empty text, unknown id) is recorded and the next backend is
 * tried. The gateway keeps no state between calls beyond the backend table
 * passed at construction.
 */
export class GenerationGateway {
  private readonly backends: ReadonlyMap<ProviderId, GenerationBackend>;

  constructor(backends: readonly GenerationBackend[]) {
    const table = new Map<ProviderId, GenerationBackend>();
    for (const backend of backends) {
      if (table.has(backend.id)) throw new Error(`Duplicate generation backend: ${backend.id}`);
      table.set(backend.id, backend);
    }
    this.backends = table;
  }

  providers(): ProviderId[] {
    return [...this.backends.keys()];
  }

  async tryGenerate(prompt: string, config: GenerationConfig, ctx: RunContext): Promise<GenerationOutcome> {
    const failures: ProviderError[] = [];
    const timeoutMs = config.timeoutMs ?? DEFAULTS.PROVIDER_TIMEOUT_MS;

    for (const [index, provider] of config.providerOrder.entries()) {
      if (ctx.signal.aborted) throw abortError();

      const backend = this.backends.get(provider);
      if (!backend) {
        failures.push(new ProviderError(provider, "unknown", "Provider is not configured"));
        continue;
      }

      try {
        const text = await withTimeout(
          (signal) => backend.complete(prompt, { temperature: config.temperature, maxTokens: config.maxTokens, signal }),
          { operation: `generation via ${provider}`, timeoutMs, signal: ctx.signal },
        );
        if (text.trim().length === 0) {
          throw new ProviderError(provider, "malformed", "Empty response");
        }
        return { ok: true, text, provider, failures };
      } catch (err: unknown) {
        if (isAbortError(err) || ctx.signal.aborted) throw abortError();

        const failure = toProviderError(provider, err);
        failures.push(failure);
        console.warn(`[gateway] ${failure.message} (${failure.kind})`);

        const next = config.providerOrder[index + 1];
        if (next !== undefined) {
          emitStatus(ctx.events, {
            code: STATUS_CODES.FALLBACK,
            message: `Switching from ${provider} to ${next}`,
            agent: ctx.agent,
            metadata: { failed: provider, next, kind: failure.kind },
          });
        }
      }
    }

    return { ok: false, failures };
  }

  /** Resolves to the generated text, or rejects with `GenerationUnavailableError`. */
  async generate(prompt: string, config: GenerationConfig, ctx: RunContext): Promise<string> {
    const outcome = await this.tryGenerate(prompt, config, ctx);
    if (!outcome.ok) throw new GenerationUnavailableError(outcome.failures);
    return outcome.text;
  }
}
