/** Default configuration values */
export const DEFAULTS = {
  TEMPERATURE: 0.7,
  MAX_TOKENS: 1024,
  PROVIDER_TIMEOUT_MS: 30_000,
  CAPABILITY_TIMEOUT_MS: 20_000,
} as const;

export const AGENT_NAMES = {
  CARS: "cars",
  ROUTE: "route",
  SUMMARY: "summary",
} as const;
