import type { ProviderId } from "./types.js";

export type RentalCrewErrorCode =
  | "QUERY_PARSE"
  | "SEARCH_UNAVAILABLE"
  | "ROUTE_UNAVAILABLE"
  | "CAPABILITY_TIMEOUT"
  | "PROVIDER"
  | "GENERATION_UNAVAILABLE"
  | "CONFIG"
  | "ORCHESTRATION"
  | "REQUEST_CONFLICT";

export abstract class RentalCrewError extends Error {
  abstract readonly code: RentalCrewErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The request text could not be turned into a valid RentalQuery. */
export class QueryParseError extends RentalCrewError {
  readonly code = "QUERY_PARSE";

  constructor(message: string, readonly rawText: string) {
    super(message);
  }
}

export class SearchUnavailableError extends RentalCrewError {
  readonly code = "SEARCH_UNAVAILABLE";
}

export class RouteUnavailableError extends RentalCrewError {
  readonly code = "ROUTE_UNAVAILABLE";
}

export class CapabilityTimeoutError extends RentalCrewError {
  readonly code = "CAPABILITY_TIMEOUT";

  constructor(readonly operation: string, readonly timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
  }
}

export type ProviderFailureKind = "timeout" | "quota" | "auth" | "malformed" | "unavailable" | "unknown";

/** Normalised failure of a single generation backend. */
export class ProviderError extends RentalCrewError {
  readonly code = "PROVIDER";

  constructor(
    readonly provider: ProviderId,
    readonly kind: ProviderFailureKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`[${provider}] ${message}`, options);
  }
}

/** Every provider in the configured order failed. */
export class GenerationUnavailableError extends RentalCrewError {
  readonly code = "GENERATION_UNAVAILABLE";

  constructor(readonly failures: readonly ProviderError[]) {
    super(
      failures.length === 0
        ? "No generation providers configured"
        : `All generation providers failed: ${failures.map((f) => `${f.provider} (${f.kind})`).join(", ")}`,
    );
  }
}

export class ConfigError extends RentalCrewError {
  readonly code = "CONFIG";
}

/** Unexpected failure of the orchestration run itself. */
export class OrchestrationError extends RentalCrewError {
  readonly code = "ORCHESTRATION";
}

/** A request id was reused while the request holding it is still running. */
export class RequestConflictError extends RentalCrewError {
  readonly code = "REQUEST_CONFLICT";

  constructor(readonly requestId: string) {
    super(`Request ${requestId} is already in progress`);
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

export function abortError(reason = "Aborted"): Error {
  return Object.assign(new Error(reason), { name: "AbortError" });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
