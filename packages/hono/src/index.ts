export { createRentalPlugin } from "./plugin.js";
export type { RentalPluginConfig, RentalPluginContext, RentalPluginInstance } from "./types.js";
export type { OpenAPIConfig } from "./lib/configure-openapi.js";
export { toReportResponse } from "./routes/rentals/rentals.handlers.js";
export { reportResponseSchema, rentalRequestSchema } from "./routes/rentals/rentals.schemas.js";
export type { ReportResponse } from "./routes/rentals/rentals.schemas.js";
