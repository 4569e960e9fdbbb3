import { serve } from "@hono/node-server";
import { anthropic } from "@ai-sdk/anthropic";
import { google } from "@ai-sdk/google";
import { createAiSdkBackend, loadConfigFromEnv, type GenerationBackend } from "@rental-crew/core";
import { createEstimatedRouteCapability } from "@rental-crew/components/estimated-route";
import { createEstimatedSearchCapability } from "@rental-crew/components/estimated-search";
import { createNominatimGeocoder } from "@rental-crew/components/nominatim";
import { createRentalPlugin } from "./plugin.js";

const env = process.env;
const config = loadConfigFromEnv(env);

const backends: GenerationBackend[] = [];
if (env.GOOGLE_GENERATIVE_AI_API_KEY) {
  backends.push(createAiSdkBackend("gemini", google(env.GEMINI_MODEL ?? "gemini-2.0-flash")));
}
if (env.ANTHROPIC_API_KEY) {
  backends.push(createAiSdkBackend("claude", anthropic(env.ANTHROPIC_MODEL ?? "claude-3-5-haiku-latest")));
}
if (backends.length === 0) {
  console.warn("[serve] No generation backend configured; set GOOGLE_GENERATIVE_AI_API_KEY or ANTHROPIC_API_KEY");
}

const geocode = env.NOMINATIM_URL ? createNominatimGeocoder({ baseUrl: env.NOMINATIM_URL }) : undefined;

const plugin = createRentalPlugin({
  search: createEstimatedSearchCapability(),
  routes: createEstimatedRouteCapability({ geocode }),
  backends,
  config,
});

const port = Number(env.PORT ?? 3000);

serve({ fetch: plugin.app.fetch, port }, (info) => {
  console.log(`[serve] Rental crew listening on http://localhost:${info.port} (providers: ${config.generation.providerOrder.join(", ")})`);
});
