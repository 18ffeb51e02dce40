import { describe, expect, it } from "vitest";
import { PharmacyMatcher } from "../src/core/pharmacy-matcher";
import { CITIES, InMemoryRegistry, PHARMACIES, createLogger, pharmacy } from "./helpers/fakes";

function createMatcher(threshold = 0.4) {
  const logger = createLogger();
  const registry = new InMemoryRegistry(CITIES, PHARMACIES);
  return { matcher: new PharmacyMatcher(registry, logger, threshold), logger, registry };
}

describe("PharmacyMatcher", () => {
  it("matches a scraped name to the closest pharmacy of the city", async () => {
    const { matcher, logger } = createMatcher();

    const outcome = await matcher.match("Pharmacie Rina", "Antananarivo");

    expect(outcome).toEqual({
      status: "matched",
      pharmacyId: 7,
      pharmacyName: "Pharmacie Rina Analakely",
      ratio: 28 / 38
    });
    expect(logger.info).toHaveBeenCalledWith(
      {
        rawName: "Pharmacie Rina",
        city: "Antananarivo",
        pharmacyId: 7,
        pharmacyName: "Pharmacie Rina Analakely",
        ratio: 0.74
      },
      "Matched listing to canonical pharmacy"
    );
  });

  it("rejects a best candidate below the threshold and logs the ratio", async () => {
    const { matcher, logger } = createMatcher();

    const outcome = await matcher.match("X Y Z", "Antananarivo");

    expect(outcome).toEqual({
      status: "no-confident-match",
      bestName: "Pharmacie du Lac",
      bestRatio: 4 / 21,
      threshold: 0.4
    });
    expect(logger.warn).toHaveBeenCalledWith(
      { rawName: "X Y Z", city: "Antananarivo", bestName: "Pharmacie du Lac", bestRatio: 0.19, threshold: 0.4 },
      "No confident match for listing"
    );
  });

  it("reports a city without canonical pharmacies", async () => {
    const { matcher, logger } = createMatcher();

    await expect(matcher.match("Pharmacie Sanfily", "Toliara")).resolves.toEqual({
      status: "no-city-coverage",
      city: "Toliara",
      cityKnown: true
    });
    await expect(matcher.match("Pharmacie Tsara", "Morondava")).resolves.toEqual({
      status: "no-city-coverage",
      city: "Morondava",
      cityKnown: false
    });
    expect(logger.warn).toHaveBeenNthCalledWith(
      1,
      { rawName: "Pharmacie Sanfily", city: "Toliara", cityKnown: true },
      "City has no canonical pharmacies"
    );
    expect(logger.warn).toHaveBeenNthCalledWith(
      2,
      { rawName: "Pharmacie Tsara", city: "Morondava", cityKnown: false },
      "City missing from registry"
    );
  });

  it("keeps the first candidate on a tie", async () => {
    const registry = new InMemoryRegistry(CITIES, [
      pharmacy(21, 1, "Pharmacie Soa"),
      pharmacy(20, 1, "Pharmacie Soa")
    ]);
    const matcher = new PharmacyMatcher(registry, createLogger(), 0.4);

    const outcome = await matcher.match("pharmacie soa", "Antananarivo");
    expect(outcome).toMatchObject({ status: "matched", pharmacyId: 21, ratio: 1 });
  });

  it("returns the same pharmacy on repeated calls", async () => {
    const { matcher } = createMatcher();
    const outcomes = await Promise.all([1, 2, 3].map(() => matcher.match("pharmacie RINA", "antananarivo")));
    expect(outcomes.map((outcome) => (outcome.status === "matched" ? outcome.pharmacyId : null))).toEqual([7, 7, 7]);
  });

  it("accepts only ratios strictly above the threshold", async () => {
    const registry = new InMemoryRegistry(CITIES, [pharmacy(30, 1, "bcde")]);

    const atThreshold = new PharmacyMatcher(registry, createLogger(), 0.75);
    const belowThreshold = new PharmacyMatcher(registry, createLogger(), 0.74);

    expect((await atThreshold.match("abcd", "Antananarivo")).status).toBe("no-confident-match");
    expect((await belowThreshold.match("abcd", "Antananarivo")).status).toBe("matched");
  });

  it("never turns a rejection into a match when the threshold rises", async () => {
    const names = ["Pharmacie Rina", "X Y Z", "Pharmacie du Lac", "Lac"];
    const thresholds = [0, 0.2, 0.4, 0.6, 0.8, 1];

    for (const name of names) {
      let previouslyMatched = true;
      for (const threshold of thresholds) {
        const { matcher } = createMatcher(threshold);
        const matched = (await matcher.match(name, "Antananarivo")).status === "matched";
        expect(matched && !previouslyMatched).toBe(false);
        previouslyMatched = matched;
      }
    }
  });

  it("refuses thresholds outside [0, 1]", () => {
    const registry = new InMemoryRegistry(CITIES, PHARMACIES);
    expect(() => new PharmacyMatcher(registry, createLogger(), 1.5)).toThrow(
      "Match threshold must be within [0, 1], got 1.5"
    );
  });
});
