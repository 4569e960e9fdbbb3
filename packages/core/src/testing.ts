import { GenerationGateway } from "./generation/gateway.js";
import type { AgentDeps } from "./agents/run-agent.js";
import type {
  CompletionOptions,
  GenerationBackend,
  RentalOffer,
  RouteCapability,
  RouteInfo,
  RouteRequest,
  SearchCapability,
  SearchRequest,
} from "./types.js";

/** In-process stand-ins for backends and capabilities, shared by the tests. */

export type Reply = string | Error | ((prompt: string, options: CompletionOptions) => Promise<string>);

export interface FakeBackend extends GenerationBackend {
  readonly prompts: string[];
}

export function fakeBackend(id: string, reply: Reply): FakeBackend {
  const prompts: string[] = [];
  return {
    id,
    prompts,
    async complete(prompt, options) {
      prompts.push(prompt);
      if (typeof reply === "function") return reply(prompt, options);
      if (reply instanceof Error) throw reply;
      return reply;
    },
  };
}

/** Never settles unless its signal aborts. */
export function hangUntilAborted<T>(signal: AbortSignal): Promise<T> {
  return new Promise<T>((_, reject) => {
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}

export function fakeSearch(result: RentalOffer[] | Error | "hang"): SearchCapability & { calls: SearchRequest[] } {
  const calls: SearchRequest[] = [];
  return {
    calls,
    async search(request, signal) {
      calls.push(request);
      if (result === "hang") return hangUntilAborted(signal);
      if (result instanceof Error) throw result;
      return result;
    },
  };
}

export function fakeRoutes(result: RouteInfo | null | Error | "hang"): RouteCapability & { calls: RouteRequest[] } {
  const calls: RouteRequest[] = [];
  return {
    calls,
    async route(request, signal) {
      calls.push(request);
      if (result === "hang") return hangUntilAborted(signal);
      if (result instanceof Error) throw result;
      return result;
    },
  };
}

export function agentDeps(backends: GenerationBackend[], overrides: Partial<AgentDeps> = {}): AgentDeps {
  return {
    gateway: new GenerationGateway(backends),
    generation: { temperature: 0.7, maxTokens: 512, providerOrder: backends.map((b) => b.id), timeoutMs: 1_000 },
    capabilityTimeoutMs: 1_000,
    ...overrides,
  };
}

export const OFFERS: RentalOffer[] = [
  { provider: "Enterprise", vehicleClass: "economy", price: 40, currency: "USD", pickupLocation: "Miami Airport" },
  { provider: "Hertz", vehicleClass: "compact", price: 45, currency: "USD", pickupLocation: "Downtown Miami", specialOffer: "Free GPS" },
];

export const ROUTE: RouteInfo = {
  origin: "Miami",
  destination: "Orlando",
  durationMinutes: 210,
  distanceMiles: 235,
  mainRoute: "Florida's Turnpike",
  notes: ["Tolls apply on the Turnpike"],
};
