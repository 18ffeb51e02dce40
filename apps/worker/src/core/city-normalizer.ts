/** City codes printed by the publication page, mapped to registry city names. */
export const SOURCE_CITY_ALIASES: ReadonlyMap<string, string> = new Map([
  ["TANA", "Antananarivo"],
  ["ANTSIRABE", "Antsirabe"],
  ["FIANARANTSOA", "Fianarantsoa"],
  ["TAMATAVE", "Toamasina"],
  ["DIEGO", "Antsiranana"],
  ["TULEAR", "Toliara"],
  ["MAJUNGA", "Mahajanga"]
]);

export class CityNormalizer {
  private readonly aliases: ReadonlyMap<string, string>;

  constructor(aliases: Iterable<readonly [string, string]> = SOURCE_CITY_ALIASES) {
    this.aliases = new Map([...aliases].map(([code, cityName]) => [code.toUpperCase(), cityName]));
  }

  /** Unknown tokens are returned verbatim. */
  normalize(token: string): string {
    return this.aliases.get(token.toUpperCase()) ?? token;
  }
}
