import { z } from "@hono/zod-openapi";

export const rentalRequestSchema = z.object({
  text: z.string().trim().min(1).openapi({ example: "car rental in Miami from June 1st to June 5th" }),
  requestId: z.string().min(1).max(128).optional().openapi({
    description: "Client-chosen id, usable with DELETE /rentals/{requestId}. Generated when omitted.",
  }),
});

const agentStatusSchema = z.enum(["ok", "failed", "degraded"]);

const agentResultSchema = z.object({
  agentName: z.enum(["cars", "route", "summary"]),
  status: agentStatusSchema,
  content: z.string(),
  rawData: z.unknown().optional(),
  error: z.string().optional(),
  provider: z.string().optional(),
  durationMs: z.number(),
});

export const reportResponseSchema = z
  .object({
    requestId: z.string(),
    query: z.object({
      location: z.string(),
      startDate: z.string().openapi({ example: "2025-06-01" }),
      endDate: z.string().openapi({ example: "2025-06-05" }),
      rawText: z.string(),
      origin: z.string().optional(),
      roundTrip: z.boolean(),
      carSize: z.string().optional(),
    }),
    cars: agentResultSchema,
    route: agentResultSchema,
    summary: agentResultSchema,
    tasks: z.array(
      z.object({
        name: z.string(),
        state: z.enum(["pending", "running", "done", "failed"]),
        dependencies: z.array(z.string()),
      }),
    ),
    generatedAt: z.string(),
  })
  .openapi("RentalReport");

export type ReportResponse = z.infer<typeof reportResponseSchema>;

export const requestIdParamSchema = z.object({
  requestId: z.string().min(1).openapi({ param: { name: "requestId", in: "path" }, example: "rental_1717000000000_abc123" }),
});

export const cancelResponseSchema = z.object({
  cancelled: z.boolean(),
  requestId: z.string(),
});

export const errorResponseSchema = z.object({
  error: z.string(),
  code: z.string().optional(),
});
