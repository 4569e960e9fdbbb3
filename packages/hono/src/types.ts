import type { OpenAPIHono } from "@hono/zod-openapi";
import type {
  GenerationBackend,
  GenerationGateway,
  RentalConfig,
  RentalOrchestrator,
  RequestRegistry,
  RouteCapability,
  SearchCapability,
} from "@rental-crew/core";
import type { OpenAPIConfig } from "./lib/configure-openapi.js";

export interface RentalPluginConfig {
  /** Rental offer lookup used by the cars agent */
  search: SearchCapability;
  /** Route lookup used by the route agent */
  routes: RouteCapability;
  /** Text-generation backends, addressed by id from `config.generation.providerOrder` */
  backends: GenerationBackend[];
  config: RentalConfig;
  now?: () => Date;
  openapi?: OpenAPIConfig;
}

export interface RentalPluginContext {
  orchestrator: RentalOrchestrator;
  /** Running requests, for cancellation by id */
  requests: RequestRegistry;
  gateway: GenerationGateway;
  config: RentalConfig;
}

export interface RentalPluginInstance {
  app: OpenAPIHono;
  orchestrator: RentalOrchestrator;
  gateway: GenerationGateway;
  requests: RequestRegistry;
}
