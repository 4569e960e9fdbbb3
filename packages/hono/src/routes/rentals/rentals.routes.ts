import { createRoute, OpenAPIHono, z } from "@hono/zod-openapi";
import { generateRequestId } from "@rental-crew/core";
import type { RentalPluginContext } from "../../types.js";
import { validationHook } from "../../lib/validation.js";
import { createRentalHandlers, toReportResponse } from "./rentals.handlers.js";
import {
  cancelResponseSchema,
  errorResponseSchema,
  rentalRequestSchema,
  reportResponseSchema,
  requestIdParamSchema,
} from "./rentals.schemas.js";

const jsonBody = { content: { "application/json": { schema: rentalRequestSchema } }, required: true };
const errorContent = { "application/json": { schema: errorResponseSchema } };

export function createRentalRoutes(ctx: RentalPluginContext) {
  const router = new OpenAPIHono({ defaultHook: validationHook });
  const handlers = createRentalHandlers(ctx);

  router.openapi(
    createRoute({
      method: "post",
      path: "/",
      tags: ["Rentals"],
      summary: "Plan a car rental",
      description: "Runs the cars and route agents concurrently, then the summary agent, and returns the combined report.",
      request: { body: jsonBody },
      responses: {
        200: { description: "Rental report", content: { "application/json": { schema: reportResponseSchema } } },
        400: { description: "The request could not be understood", content: errorContent },
        409: { description: "The request was cancelled, or its id is already running", content: errorContent },
      },
    }),
    async (c) => {
      const { text, requestId } = c.req.valid("json");
      const report = await handlers.runRequest(text, generateRequestId(requestId));
      return c.json(toReportResponse(report), 200);
    },
  );

  router.post("/stream", (c) => handlers.handleStream(c));
  router.openAPIRegistry.registerPath({
    method: "post",
    path: "/stream",
    tags: ["Rentals"],
    summary: "Plan a car rental with progress events",
    description:
      "Server-sent events: session:start, task:start, task:end and status while the agents run, then report, cancelled or error.",
    request: { body: jsonBody },
    responses: {
      200: { description: "Event stream", content: { "text/event-stream": { schema: z.string() } } },
      400: { description: "Invalid request body", content: errorContent },
      409: { description: "The request id is already running", content: errorContent },
    },
  });

  router.openapi(
    createRoute({
      method: "delete",
      path: "/{requestId}",
      tags: ["Rentals"],
      summary: "Cancel an in-flight rental request",
      request: { params: requestIdParamSchema },
      responses: {
        200: { description: "Request cancelled", content: { "application/json": { schema: cancelResponseSchema } } },
        404: { description: "No active request with this id", content: errorContent },
      },
    }),
    (c) => {
      const { requestId } = c.req.valid("param");
      if (!ctx.requests.cancel(requestId)) {
        return c.json({ error: `No active request with id ${requestId}` }, 404);
      }
      return c.json({ cancelled: true, requestId }, 200);
    },
  );

  return router;
}
