import { describe, it, expect } from "vitest";
import { SearchUnavailableError, isAbortError } from "../errors.js";
import { AgentEventBus } from "../events/agent-events.js";
import { OFFERS, agentDeps, fakeBackend, fakeSearch } from "../testing.js";
import type { RentalQuery } from "../types.js";
import { createCarsAgent, formatOffer } from "./cars-agent.js";

const query: RentalQuery = {
  location: "Miami",
  startDate: "2024-06-01",
  endDate: "2024-06-05",
  rawText: "car rental in Miami from June 1st to June 5th",
  roundTrip: true,
};

const ctx = () => ({ signal: new AbortController().signal, agent: "cars" as const });

describe("formatOffer", () => {
  it("lists the offer's fields on one line", () => {
    expect(formatOffer({ ...OFFERS[1], features: ["GPS", "Bluetooth"], rating: 4.5 }, 1)).toBe(
      "2. Hertz | compact | 45 USD/day | pickup: Downtown Miami | features: GPS, Bluetooth | special: Free GPS | rating: 4.5",
    );
  });

  it("adds the rental total and booking link when present", () => {
    expect(formatOffer({ ...OFFERS[0], totalPrice: 160, bookingUrl: "https://example.com/book" }, 0)).toBe(
      "1. Enterprise | economy | 40 USD/day | total: 160 USD | pickup: Miami Airport | book: https://example.com/book",
    );
  });
});

describe("createCarsAgent", () => {
  it("is named after the results it produces", () => {
    expect(createCarsAgent(fakeSearch(OFFERS), agentDeps([])).name).toBe("cars");
  });

  it("compares every offer and reports ok", async () => {
    const backend = fakeBackend("gemini", "Hertz is the best value.");
    const search = fakeSearch(OFFERS);
    const agent = createCarsAgent(search, agentDeps([backend]));

    const result = await agent.run(query, ctx());

    expect(result.agentName).toBe("cars");
    expect(result.status).toBe("ok");
    expect(result.content).toBe("Hertz is the best value.");
    expect(result.rawData).toEqual(OFFERS);
    expect(result.provider).toBe("gemini");
    expect(search.calls).toEqual([{ location: "Miami", startDate: "2024-06-01", endDate: "2024-06-05", roundTrip: true }]);
    expect(backend.prompts[0]).toContain("Pickup and drop-off in Miami, 2024-06-01 to 2024-06-05 (4 days)");
    expect(backend.prompts[0]).toContain("1. Enterprise | economy | 40 USD/day | pickup: Miami Airport");
    expect(backend.prompts[0]).toContain("2. Hertz | compact | 45 USD/day | pickup: Downtown Miami | special: Free GPS");
  });

  it("fails without calling the gateway when the search fails", async () => {
    const backend = fakeBackend("gemini", "unused");
    const agent = createCarsAgent(fakeSearch(new SearchUnavailableError("Search service down")), agentDeps([backend]));

    const result = await agent.run(query, ctx());

    expect(result.status).toBe("failed");
    expect(result.content).toBe("Rental search failed: Search service down");
    expect(result.error).toBe("Search service down");
    expect(backend.prompts).toHaveLength(0);
  });

  it("fails when the search exceeds its deadline", async () => {
    const agent = createCarsAgent(fakeSearch("hang"), agentDeps([fakeBackend("gemini", "unused")], { capabilityTimeoutMs: 10 }));

    const result = await agent.run(query, ctx());

    expect(result.status).toBe("failed");
    expect(result.error).toBe("rental search timed out after 10ms");
  });

  it("is degraded when no offers are found", async () => {
    const agent = createCarsAgent(fakeSearch([]), agentDeps([fakeBackend("gemini", "unused")]));

    const result = await agent.run(query, ctx());

    expect(result.status).toBe("degraded");
    expect(result.content).toBe("No rental offers were found in Miami for 2024-06-01 to 2024-06-05.");
    expect(result.rawData).toEqual([]);
  });

  it("keeps the offers when every provider fails", async () => {
    const agent = createCarsAgent(fakeSearch(OFFERS), agentDeps([fakeBackend("gemini", new Error("boom"))]));

    const result = await agent.run(query, ctx());

    expect(result.status).toBe("failed");
    expect(result.error).toBe("All generation providers failed: gemini (unknown)");
    expect(result.content).toBe(
      "Found 2 rental offers but could not compare them: All generation providers failed: gemini (unknown)",
    );
    expect(result.rawData).toEqual(OFFERS);
  });

  it("reports searching and generating progress", async () => {
    const events = new AgentEventBus();
    const codes: unknown[] = [];
    events.subscribe((e) => codes.push(e.data.code));
    const agent = createCarsAgent(fakeSearch(OFFERS), agentDeps([fakeBackend("gemini", "ok")]));

    await agent.run(query, { ...ctx(), events });

    expect(codes).toEqual(["searching", "generating"]);
  });

  it("rejects with an AbortError when cancelled mid-search", async () => {
    const controller = new AbortController();
    const agent = createCarsAgent(fakeSearch("hang"), agentDeps([fakeBackend("gemini", "unused")]));

    const pending = agent.run(query, { signal: controller.signal });
    controller.abort();

    const err = await pending.catch((e: unknown) => e);
    expect(isAbortError(err)).toBe(true);
  });
});
