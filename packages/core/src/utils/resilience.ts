import { CapabilityTimeoutError, ProviderError, abortError, type ProviderFailureKind } from "../errors.js";
import type { ProviderId } from "../types.js";

interface TimeoutOptions {
  /** Name of the guarded call, used in the timeout error */
  operation: string;
  timeoutMs: number;
  /** Caller's signal. Aborting it aborts the guarded call. */
  signal?: AbortSignal;
}

/**
 * Runs `fn` with a child AbortSignal that fires on timeout or when the parent
 * aborts. Rejects with `CapabilityTimeoutError` on timeout and with an
 * AbortError when the parent is aborted, even if `fn` ignores its signal.
 */
export async function withTimeout<T>(fn: (signal: AbortSignal) => Promise<T>, opts: TimeoutOptions): Promise<T> {
  const { operation, timeoutMs, signal } = opts;
  if (signal?.aborted) throw abortError();

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onParentAbort: (() => void) | undefined;

  const guard = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new CapabilityTimeoutError(operation, timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
    onParentAbort = () => {
      controller.abort(abortError());
      reject(abortError());
    };
    signal?.addEventListener("abort", onParentAbort, { once: true });
  });

  try {
    return await Promise.race([fn(controller.signal), guard]);
  } finally {
    clearTimeout(timer);
    if (onParentAbort) signal?.removeEventListener("abort", onParentAbort);
  }
}

const QUOTA_STATUS_CODES = new Set([402, 429]);
const AUTH_STATUS_CODES = new Set([401, 403]);
const UNAVAILABLE_STATUS_CODES = new Set([500, 502, 503, 504]);
const MALFORMED_STATUS_CODES = new Set([400, 422]);

function kindFromStatus(status: number): ProviderFailureKind | undefined {
  if (QUOTA_STATUS_CODES.has(status)) return "quota";
  if (AUTH_STATUS_CODES.has(status)) return "auth";
  if (UNAVAILABLE_STATUS_CODES.has(status)) return "unavailable";
  if (MALFORMED_STATUS_CODES.has(status)) return "malformed";
  return undefined;
}

function readStatus(error: Error): number | undefined {
  for (const key of ["status", "statusCode"] as const) {
    const value: unknown = Reflect.get(error, key);
    if (typeof value === "number") return value;
  }
  return undefined;
}

/**
 * Classifies a backend error.
 * Checks a numeric `status`/`statusCode` property first, then status codes and
 * keywords in the message (timeouts, rate limits, capacity, network errors).
 */
export function classifyProviderError(error: unknown): ProviderFailureKind {
  if (error instanceof ProviderError) return error.kind;
  if (error instanceof CapabilityTimeoutError) return "timeout";
  if (!(error instanceof Error)) return "unknown";

  const statusProp = readStatus(error);
  if (statusProp !== undefined) {
    const kind = kindFromStatus(statusProp);
    if (kind) return kind;
  }

  const message = error.message.toLowerCase();

  const statusMatch = message.match(/\b(\d{3})\b/);
  if (statusMatch) {
    const kind = kindFromStatus(Number(statusMatch[1]));
    if (kind) return kind;
  }

  if (error.name === "TimeoutError" || message.includes("timeout") || message.includes("timed out")) {
    return "timeout";
  }
  if (message.includes("rate limit") || message.includes("too many requests") || message.includes("quota")) {
    return "quota";
  }
  if (message.includes("api key") || message.includes("unauthorized")) {
    return "auth";
  }
  if (
    message.includes("overloaded") ||
    message.includes("capacity") ||
    message.includes("econnreset") ||
    message.includes("econnrefused") ||
    message.includes("network") ||
    message.includes("fetch failed") ||
    message.includes("socket hang up")
  ) {
    return "unavailable";
  }
  if (message.includes("invalid json") || message.includes("malformed") || message.includes("no content")) {
    return "malformed";
  }

  return "unknown";
}

/** Wraps any backend failure in a `ProviderError`. */
export function toProviderError(provider: ProviderId, error: unknown): ProviderError {
  if (error instanceof ProviderError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new ProviderError(provider, classifyProviderError(error), message, { cause: error });
}
