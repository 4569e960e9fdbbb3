import type { OpenAPIHono } from "@hono/zod-openapi";

export interface OpenAPIConfig {
  title?: string;
  version?: string;
  description?: string;
  serverUrl?: string;
}

export function configureOpenAPI(app: OpenAPIHono, config: OpenAPIConfig = {}) {
  const {
    title = "Rental Crew API",
    version = "0.1.0",
    description = "Plans car rentals with a crew of cars, route and summary agents",
    serverUrl,
  } = config;

  app.doc("/doc", {
    openapi: "3.1.0",
    info: { title, version, description },
    ...(serverUrl ? { servers: [{ url: serverUrl, description: "Server" }] } : {}),
  });
}
