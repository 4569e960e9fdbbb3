import { createRoute, OpenAPIHono, z } from "@hono/zod-openapi";
import type { RentalPluginContext } from "../../types.js";

export function createHealthRoutes(ctx: RentalPluginContext) {
  const router = new OpenAPIHono();

  router.openapi(
    createRoute({
      method: "get",
      path: "/",
      tags: ["Health"],
      summary: "Health check",
      description: "Configured generation backends and the number of rental requests in flight.",
      responses: {
        200: {
          description: "Server is healthy",
          content: {
            "application/json": {
              schema: z.object({
                status: z.string(),
                timestamp: z.string(),
                providers: z.array(z.string()),
                providerOrder: z.array(z.string()),
                activeRequests: z.number().int(),
              }),
            },
          },
        },
      },
    }),
    (c) => {
      return c.json(
        {
          status: "ok",
          timestamp: new Date().toISOString(),
          providers: ctx.gateway.providers(),
          providerOrder: [...ctx.config.generation.providerOrder],
          activeRequests: ctx.requests.size,
        },
        200,
      );
    },
  );

  return router;
}
