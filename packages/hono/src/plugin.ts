import { OpenAPIHono } from "@hono/zod-openapi";
import { HTTPException } from "hono/http-exception";
import {
  GenerationGateway,
  QueryParseError,
  RentalOrchestrator,
  RequestConflictError,
  RequestRegistry,
  isAbortError,
} from "@rental-crew/core";
import type { RentalPluginConfig, RentalPluginContext, RentalPluginInstance } from "./types.js";
import { configureOpenAPI } from "./lib/configure-openapi.js";

import { createHealthRoutes } from "./routes/health/health.route.js";
import { createRentalRoutes } from "./routes/rentals/rentals.routes.js";

export function createRentalPlugin(config: RentalPluginConfig): RentalPluginInstance {
  const gateway = new GenerationGateway(config.backends);
  const orchestrator = new RentalOrchestrator({
    search: config.search,
    routes: config.routes,
    gateway,
    config: config.config,
    now: config.now,
  });

  const missing = config.config.generation.providerOrder.filter((id) => !gateway.providers().includes(id));
  if (missing.length > 0) {
    console.warn(`[rental-plugin] providerOrder names unconfigured backends: ${missing.join(", ")}`);
  }

  const requests = new RequestRegistry();
  const ctx: RentalPluginContext = { orchestrator, gateway, requests, config: config.config };

  const app = new OpenAPIHono();

  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return c.json({ error: err.message }, err.status);
    }
    if (err instanceof QueryParseError) {
      return c.json({ error: err.message, code: err.code }, 400);
    }
    if (err instanceof RequestConflictError) {
      return c.json({ error: err.message, code: err.code }, 409);
    }
    if (isAbortError(err)) {
      return c.json({ error: "Rental request cancelled" }, 409);
    }

    console.error("[rental-plugin]", err);
    return c.json({ error: "Internal Server Error" }, 500);
  });

  app.notFound((c) => {
    return c.json({ error: "Not Found" }, 404);
  });

  app.route("/health", createHealthRoutes(ctx));
  app.route("/rentals", createRentalRoutes(ctx));

  configureOpenAPI(app, config.openapi);

  return { app, orchestrator, gateway, requests };
}
