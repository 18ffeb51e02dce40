import { toNameCompareKey } from "@pharmaduty/shared";
import { similarityRatio } from "./similarity";
import type { LoggerLike, MatchOutcome, PharmacyCandidate, RegistryReader } from "./types";

export class PharmacyMatcher {
  constructor(
    private readonly registry: RegistryReader,
    private readonly logger: LoggerLike,
    readonly threshold: number
  ) {
    if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
      throw new RangeError(`Match threshold must be within [0, 1], got ${threshold}`);
    }
  }

  async match(rawName: string, city: string): Promise<MatchOutcome> {
    const candidates = await this.registry.listPharmaciesByCity(city);
    if (!candidates.length) {
      const cityKnown = await this.registry.cityExists(city);
      this.logger.warn(
        { rawName, city, cityKnown },
        cityKnown ? "City has no canonical pharmacies" : "City missing from registry"
      );
      return { status: "no-city-coverage", city, cityKnown };
    }

    const best = pickBestCandidate(rawName, candidates);
    if (best.ratio > this.threshold) {
      this.logger.info(
        { rawName, city, pharmacyId: best.candidate.id, pharmacyName: best.candidate.name, ratio: round(best.ratio) },
        "Matched listing to canonical pharmacy"
      );
      return {
        status: "matched",
        pharmacyId: best.candidate.id,
        pharmacyName: best.candidate.name,
        ratio: best.ratio
      };
    }

    this.logger.warn(
      { rawName, city, bestName: best.candidate.name, bestRatio: round(best.ratio), threshold: this.threshold },
      "No confident match for listing"
    );
    return {
      status: "no-confident-match",
      bestName: best.candidate.name,
      bestRatio: best.ratio,
      threshold: this.threshold
    };
  }
}

// Strictly higher ratio wins, so ties keep the candidate seen first.
function pickBestCandidate(
  rawName: string,
  candidates: PharmacyCandidate[]
): { candidate: PharmacyCandidate; ratio: number } {
  const key = toNameCompareKey(rawName);
  let best: { candidate: PharmacyCandidate; ratio: number } | null = null;

  for (const candidate of candidates) {
    const ratio = similarityRatio(key, toNameCompareKey(candidate.name));
    if (!best || ratio > best.ratio) {
      best = { candidate, ratio };
    }
  }

  if (!best) {
    throw new Error("pickBestCandidate needs at least one candidate");
  }
  return best;
}

function round(ratio: number): number {
  return Math.round(ratio * 100) / 100;
}
