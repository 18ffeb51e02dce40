import { describe, expect, it } from "vitest";
import { CityNormalizer, SOURCE_CITY_ALIASES } from "../src/core/city-normalizer";

describe("CityNormalizer", () => {
  const normalizer = new CityNormalizer();

  it("maps every source city code", () => {
    expect(SOURCE_CITY_ALIASES.size).toBe(7);
    expect(normalizer.normalize("TANA")).toBe("Antananarivo");
    expect(normalizer.normalize("TAMATAVE")).toBe("Toamasina");
    expect(normalizer.normalize("DIEGO")).toBe("Antsiranana");
    expect(normalizer.normalize("TULEAR")).toBe("Toliara");
    expect(normalizer.normalize("MAJUNGA")).toBe("Mahajanga");
  });

  it("ignores case", () => {
    expect(normalizer.normalize("tana")).toBe("Antananarivo");
    expect(normalizer.normalize("Antsirabe")).toBe("Antsirabe");
  });

  it("passes unknown tokens through verbatim", () => {
    expect(normalizer.normalize("Morondava")).toBe("Morondava");
    expect(normalizer.normalize("")).toBe("");
  });

  it("uses an injected alias table", () => {
    const custom = new CityNormalizer([["fort-dauphin", "Taolagnaro"]]);
    expect(custom.normalize("FORT-DAUPHIN")).toBe("Taolagnaro");
    expect(custom.normalize("TANA")).toBe("TANA");
  });
});
