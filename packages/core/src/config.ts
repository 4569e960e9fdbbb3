import { z } from "zod";
import { ConfigError } from "./errors.js";
import { DEFAULTS } from "./utils/constants.js";
import type { GenerationConfig } from "./types.js";
import type { SummaryDegradePolicy } from "./agents/summary-agent.js";

export const generationConfigSchema = z.object({
  temperature: z.number().min(0).max(2).default(DEFAULTS.TEMPERATURE),
  maxTokens: z.number().int().positive().default(DEFAULTS.MAX_TOKENS),
  providerOrder: z.array(z.string().min(1)).min(1, "providerOrder must name at least one provider"),
  timeoutMs: z.number().int().positive().default(DEFAULTS.PROVIDER_TIMEOUT_MS),
});

export const rentalConfigSchema = z.object({
  generation: generationConfigSchema,
  capabilityTimeoutMs: z.number().int().positive().default(DEFAULTS.CAPABILITY_TIMEOUT_MS),
  summaryPolicy: z.enum(["any-issue", "failure-only", "never"]).default("any-issue"),
});

export type RentalConfigInput = z.input<typeof rentalConfigSchema>;

/** Resolved configuration, fixed for the lifetime of the process. */
export interface RentalConfig {
  readonly generation: Readonly<GenerationConfig> & { readonly timeoutMs: number };
  readonly capabilityTimeoutMs: number;
  readonly summaryPolicy: SummaryDegradePolicy;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

/** Validates and freezes a configuration object, applying defaults. */
export function resolveConfig(input: RentalConfigInput): RentalConfig {
  const parsed = rentalConfigSchema.safeParse(input);
  if (!parsed.success) throw new ConfigError(`Invalid rental configuration: ${formatIssues(parsed.error)}`);
  const { generation, capabilityTimeoutMs, summaryPolicy } = parsed.data;
  return Object.freeze({
    generation: Object.freeze({ ...generation, providerOrder: Object.freeze([...generation.providerOrder]) }),
    capabilityTimeoutMs,
    summaryPolicy,
  });
}

const numeric = z.coerce.number();

function optionalNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return undefined;
  const parsed = numeric.safeParse(raw);
  if (!parsed.success || Number.isNaN(parsed.data)) throw new ConfigError(`${key} must be a number, got "${raw}"`);
  return parsed.data;
}

/**
 * Reads configuration from environment variables:
 * RENTAL_PROVIDER_ORDER (comma-separated, required), RENTAL_TEMPERATURE,
 * RENTAL_MAX_TOKENS, RENTAL_PROVIDER_TIMEOUT_MS, RENTAL_CAPABILITY_TIMEOUT_MS,
 * RENTAL_SUMMARY_DEGRADE_ON.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): RentalConfig {
  const providerOrder = (env.RENTAL_PROVIDER_ORDER ?? "")
    .split(",")
    .map((p) => p.trim())
    .filter(Boolean);

  const summaryPolicy = env.RENTAL_SUMMARY_DEGRADE_ON?.trim();
  const summary = z.enum(["any-issue", "failure-only", "never"]).optional().safeParse(summaryPolicy || undefined);
  if (!summary.success) {
    throw new ConfigError(`RENTAL_SUMMARY_DEGRADE_ON must be one of any-issue, failure-only, never; got "${summaryPolicy}"`);
  }

  return resolveConfig({
    generation: {
      providerOrder,
      temperature: optionalNumber(env, "RENTAL_TEMPERATURE"),
      maxTokens: optionalNumber(env, "RENTAL_MAX_TOKENS"),
      timeoutMs: optionalNumber(env, "RENTAL_PROVIDER_TIMEOUT_MS"),
    },
    capabilityTimeoutMs: optionalNumber(env, "RENTAL_CAPABILITY_TIMEOUT_MS"),
    summaryPolicy: summary.data,
  });
}
