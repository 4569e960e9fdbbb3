import type { AgentEventBus } from "./events/agent-events.js";

/** ISO calendar date, `YYYY-MM-DD`. */
export type IsoDate = string;

export type VehicleClass =
  | "economy"
  | "compact"
  | "mid-size"
  | "full-size"
  | "suv"
  | "minivan"
  | "convertible"
  | "luxury";

/** Structured form of a free-text rental request. Built by `parseRentalQuery` only. */
export interface RentalQuery {
  /** Rental location; doubles as the destination for route planning. */
  readonly location: string;
  readonly startDate: IsoDate;
  readonly endDate: IsoDate;
  readonly rawText: string;
  /** Pickup place when the request names one distinct from `location`. */
  readonly origin?: string;
  readonly roundTrip: boolean;
  readonly carSize?: VehicleClass;
}

export interface RentalOffer {
  readonly provider: string;
  readonly vehicleClass: string;
  readonly price: number;
  readonly currency: string;
  readonly pickupLocation: string;
  /** Whether `price` is a daily rate or the total for the rental (default: day) */
  readonly pricePer?: "day" | "total";
  readonly features?: readonly string[];
  readonly specialOffer?: string;
  readonly rating?: number;
  /** Daily rate times rental days, when `price` is a daily rate */
  readonly totalPrice?: number;
  readonly bookingUrl?: string;
}

export interface RouteInfo {
  readonly origin: string;
  readonly destination: string;
  /** Estimated driving time. Absent in local-insights mode. */
  readonly durationMinutes?: number;
  readonly distanceMiles?: number;
  readonly mainRoute?: string;
  readonly notes: readonly string[];
}

export type AgentName = "cars" | "route" | "summary";
export type AgentStatus = "ok" | "failed" | "degraded";

export interface AgentResult<TName extends AgentName = AgentName, TData = unknown> {
  readonly agentName: TName;
  readonly status: AgentStatus;
  readonly content: string;
  readonly rawData?: TData;
  /** Failure reason when status is `failed` (or the cause of a degradation) */
  readonly error?: string;
  /** Generation backend that produced `content` */
  readonly provider?: ProviderId;
  readonly durationMs: number;
}

export type CarsResult = AgentResult<"cars", readonly RentalOffer[]>;
export type RouteResult = AgentResult<"route", RouteInfo>;
export type SummaryResult = AgentResult<"summary", { readonly sources: readonly AgentName[] }>;

export type TaskState = "pending" | "running" | "done" | "failed";

export interface TaskNode<TName extends string = string> {
  readonly name: TName;
  readonly dependencies: ReadonlySet<TName>;
  state: TaskState;
}

export interface TaskSnapshot {
  name: AgentName;
  state: TaskState;
  dependencies: AgentName[];
}

export interface Report {
  readonly requestId: string;
  readonly query: RentalQuery;
  readonly cars: CarsResult;
  readonly route: RouteResult;
  readonly summary: SummaryResult;
  readonly tasks: readonly TaskSnapshot[];
  /** ISO-8601 timestamp */
  readonly generatedAt: string;
}

// ── Capabilities ──

export interface SearchRequest {
  location: string;
  startDate: IsoDate;
  endDate: IsoDate;
  /** Pickup place for one-way rentals */
  origin?: string;
  roundTrip: boolean;
  carSize?: VehicleClass;
}

export interface SearchCapability {
  search(request: SearchRequest, signal: AbortSignal): Promise<RentalOffer[]>;
}

export interface RouteRequest {
  origin: string;
  destination: string;
  startDate: IsoDate;
  endDate: IsoDate;
  roundTrip: boolean;
}

export interface RouteCapability {
  /** Resolves to `null` when the provider has no data for the pair. */
  route(request: RouteRequest, signal: AbortSignal): Promise<RouteInfo | null>;
}

// ── Generation ──

export type ProviderId = string;

export interface GenerationConfig {
  temperature: number;
  maxTokens: number;
  /** Backends to try, in order. Must be non-empty. */
  providerOrder: readonly ProviderId[];
  /** Per-provider deadline in ms */
  timeoutMs?: number;
}

export interface CompletionOptions {
  temperature: number;
  maxTokens: number;
  signal: AbortSignal;
}

export interface GenerationBackend {
  readonly id: ProviderId;
  complete(prompt: string, options: CompletionOptions): Promise<string>;
}

/** Per-call context shared by the gateway and the agents. */
export interface RunContext {
  signal: AbortSignal;
  events?: AgentEventBus;
  agent?: AgentName;
}
