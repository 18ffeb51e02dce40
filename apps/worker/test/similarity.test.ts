import { describe, expect, it } from "vitest";
import { matchingBlocks, similarityRatio } from "../src/core/similarity";

describe("similarityRatio", () => {
  it("scores identical strings as 1", () => {
    expect(similarityRatio("pharmacie rina", "pharmacie rina")).toBe(1);
    expect(similarityRatio("", "")).toBe(1);
  });

  it("scores strings with nothing in common as 0", () => {
    expect(similarityRatio("abc", "xyz")).toBe(0);
    expect(similarityRatio("", "xyz")).toBe(0);
  });

  it("counts characters of every matching block", () => {
    expect(similarityRatio("abcd", "bcde")).toBe(0.75);
    expect(similarityRatio("abxcd", "abcd")).toBeCloseTo(8 / 9, 10);
  });

  it("rates a name that extends the scraped one", () => {
    expect(similarityRatio("pharmacie rina", "pharmacie rina analakely")).toBeCloseTo(28 / 38, 10);
    expect(similarityRatio("pharmacie rina", "pharmacie du lac")).toBeCloseTo(22 / 30, 10);
  });

  it("is case sensitive on its own", () => {
    expect(similarityRatio("ABC", "abc")).toBe(0);
  });
});

describe("matchingBlocks", () => {
  it("recurses on both sides of the longest run", () => {
    expect(matchingBlocks(Array.from("abxcd"), Array.from("abcd"))).toEqual([
      { aStart: 0, bStart: 0, size: 2 },
      { aStart: 3, bStart: 2, size: 2 }
    ]);
  });

  it("prefers the leftmost run among equally long ones", () => {
    expect(matchingBlocks(Array.from("ab"), Array.from("ba"))).toEqual([{ aStart: 0, bStart: 1, size: 1 }]);
  });
});
