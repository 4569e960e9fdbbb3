import { readFileSync } from "node:fs";
import type { z } from "zod";

/** Reads a JSON data file and validates it against `schema`. */
export function loadData<T extends z.ZodTypeAny>(url: URL, schema: T): z.output<T> {
  const raw: unknown = JSON.parse(readFileSync(url, "utf8"));
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid data file ${url.pathname}: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`);
  }
  return parsed.data;
}
