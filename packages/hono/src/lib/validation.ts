import type { z } from "@hono/zod-openapi";
import type { Context } from "hono";

export function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
}

/** Default hook for OpenAPIHono routers: answer invalid input with a JSON 400. */
export function validationHook(result: { success: true } | { success: false; error: z.ZodError }, c: Context) {
  if (!result.success) {
    return c.json({ error: formatIssues(result.error) }, 400);
  }
}
