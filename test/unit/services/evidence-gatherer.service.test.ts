import { beforeEach, describe, expect, it, vi } from "vitest";
import { EvidenceGathererService } from "../../../services/evidence-gatherer.service.js";
import { buildPlaceholderEvidence } from "../../../services/search-providers/placeholder.provider.js";
import { loadConfig } from "../../../lib/config.js";
import type { EvidenceRecord } from "../../../types/evidence.types.js";
import { createPageClient, createProvider, sampleEvidence } from "../../helpers/fakes.js";

describe("EvidenceGathererService", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  it("returns the first non-empty result without consulting later providers", async () => {
    const structured = createProvider("google-cse", async () => sampleEvidence);
    const scrape = createProvider("google-html", async () => [
      { title: "Other", link: "https://other.example.com", snippet: "other" },
    ]);
    const gatherer = new EvidenceGathererService([structured, scrape]);

    const result = await gatherer.gather("water boils at 100C", 5);

    expect(result.provider).toBe("google-cse");
    expect(result.evidence).toBe(sampleEvidence);
    expect(structured.search).toHaveBeenCalledWith("water boils at 100C", 5);
    expect(scrape.search).not.toHaveBeenCalled();
  });

  it("moves on when a provider returns nothing", async () => {
    const empty = createProvider("google-html", async () => []);
    const duck = createProvider("duckduckgo-html", async () => sampleEvidence);
    const gatherer = new EvidenceGathererService([empty, duck]);

    await expect(gatherer.search("water boils at 100C", 2)).resolves.toEqual(sampleEvidence);
    expect(empty.search).toHaveBeenCalledTimes(1);
  });

  it("moves on when a provider throws", async () => {
    const broken = createProvider("google-html", async () => {
      throw new Error("socket hang up");
    });
    const duck = createProvider("duckduckgo-html", async () => sampleEvidence);

    const result = await new EvidenceGathererService([broken, duck]).gather("water boils at 100C", 5);

    expect(result.provider).toBe("duckduckgo-html");
    expect(result.evidence).toEqual(sampleEvidence);
  });

  it("returns placeholder evidence when every provider comes back empty", async () => {
    const query = "Scientists discover new planet made entirely of diamonds";
    const gatherer = new EvidenceGathererService([
      createProvider("google-html", async () => []),
      createProvider("duckduckgo-html", async () => []),
    ]);

    const result = await gatherer.gather(query, 5);

    expect(result.provider).toBe("placeholder");
    expect(result.evidence).toEqual(buildPlaceholderEvidence(query));
  });

  it("keeps provider results within the requested limit", async () => {
    const limit = 2;
    const records: EvidenceRecord[] = sampleEvidence.slice(0, limit);
    const gatherer = new EvidenceGathererService([createProvider("google-html", async () => records)]);

    const evidence = await gatherer.search("water boils at 100C", limit);

    expect(evidence.length).toBeGreaterThanOrEqual(1);
    expect(evidence.length).toBeLessThanOrEqual(limit);
  });

  describe("fromConfig", () => {
    it("skips the structured search API without credentials", () => {
      const gatherer = EvidenceGathererService.fromConfig(loadConfig({}), createPageClient());
      expect(gatherer.providerNames).toEqual(["google-html", "duckduckgo-html", "placeholder"]);
    });

    it("tries the structured search API first when configured", () => {
      const config = loadConfig({ GOOGLE_API_KEY: "test-google", GOOGLE_CSE_ID: "test-cx" });
      const gatherer = EvidenceGathererService.fromConfig(config, createPageClient());
      expect(gatherer.providerNames).toEqual(["google-cse", "google-html", "duckduckgo-html", "placeholder"]);
    });

    it("falls through every network source to the placeholders", async () => {
      const config = loadConfig({ GOOGLE_API_KEY: "test-google", GOOGLE_CSE_ID: "test-cx" });
      const client = createPageClient();
      const gatherer = EvidenceGathererService.fromConfig(config, client);

      const result = await gatherer.gather("offline claim to check", 5);

      expect(result.provider).toBe("placeholder");
      expect(result.evidence).toHaveLength(3);
      expect(client.fetchJson).toHaveBeenCalledTimes(1);
      expect(client.fetchPage).toHaveBeenCalledTimes(1);
      expect(client.submitForm).toHaveBeenCalledTimes(1);
    });
  });
});
