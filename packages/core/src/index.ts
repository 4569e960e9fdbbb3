// ── Core types ──
export type {
  IsoDate,
  VehicleClass,
  RentalQuery,
  RentalOffer,
  RouteInfo,
  AgentName,
  AgentStatus,
  AgentResult,
  CarsResult,
  RouteResult,
  SummaryResult,
  TaskState,
  TaskNode,
  TaskSnapshot,
  Report,
  SearchRequest,
  SearchCapability,
  RouteRequest,
  RouteCapability,
  ProviderId,
  GenerationConfig,
  CompletionOptions,
  GenerationBackend,
  RunContext,
} from "./types.js";

// ── Errors ──
export {
  RentalCrewError,
  QueryParseError,
  SearchUnavailableError,
  RouteUnavailableError,
  CapabilityTimeoutError,
  ProviderError,
  GenerationUnavailableError,
  ConfigError,
  OrchestrationError,
  RequestConflictError,
  isAbortError,
  abortError,
  errorMessage,
} from "./errors.js";
export type { RentalCrewErrorCode, ProviderFailureKind } from "./errors.js";

// ── Config ──
export { rentalConfigSchema, generationConfigSchema, resolveConfig, loadConfigFromEnv } from "./config.js";
export type { RentalConfig, RentalConfigInput } from "./config.js";

// ── Query ──
export { parseRentalQuery, rentalDays } from "./query/parse-query.js";
export type { ParseQueryOptions } from "./query/parse-query.js";

// ── Generation ──
export { GenerationGateway } from "./generation/gateway.js";
export type { GenerationOutcome } from "./generation/gateway.js";
export { createAiSdkBackend } from "./utils/ai-provider.js";

// ── Agents ──
export { createCarsAgent, buildCarsPrompt, formatOffer, toSearchRequest } from "./agents/cars-agent.js";
export { createRouteAgent, buildRoutePrompt, hasDistinctOrigin, toRouteRequest } from "./agents/route-agent.js";
export { createSummaryAgent, buildSummaryPrompt, summaryStatus } from "./agents/summary-agent.js";
export type { SummaryDegradePolicy, SummaryInput } from "./agents/summary-agent.js";
export type { Agent, AgentDeps } from "./agents/run-agent.js";

// ── Orchestration ──
export { RentalOrchestrator, generateRequestId } from "./orchestrator/orchestrator.js";
export type { RentalOrchestratorOptions, ProcessOptions } from "./orchestrator/orchestrator.js";
export { TaskGraph, DependencySkipError } from "./orchestrator/task-graph.js";
export type { TaskDefinition, TaskHooks } from "./orchestrator/task-graph.js";

// ── Events ──
export { AgentEventBus } from "./events/agent-events.js";
export type { AgentEvent, AgentEventHandler } from "./events/agent-events.js";
export { SSE_EVENTS, BUS_EVENTS, BUS_TO_SSE_MAP, STATUS_CODES, emitStatus } from "./events/events.js";
export type { SseEventName, BusEventName, StatusCode, StatusPayload } from "./events/events.js";

// ── Utilities ──
export { DEFAULTS, AGENT_NAMES } from "./utils/constants.js";
export { withTimeout, classifyProviderError, toProviderError } from "./utils/resilience.js";
export { RequestRegistry } from "./utils/request-registry.js";
