import type { SqlExecutor } from "./sql";
import type { PharmacyCandidate, RegistryReader } from "./types";

export class RegistryRepository implements RegistryReader {
  constructor(private readonly db: SqlExecutor) {}

  async listPharmaciesByCity(cityName: string): Promise<PharmacyCandidate[]> {
    const result = await this.db.query(
      `
      select p.id, p.name
      from pharmacies p
      join cities c on c.id = p.city_id
      where lower(c.name) = lower($1)
      order by p.id asc
      `,
      [cityName]
    );

    return result.rows.map((row) => ({ id: Number(row.id), name: String(row.name) }));
  }

  async cityExists(cityName: string): Promise<boolean> {
    const result = await this.db.query(
      `select exists(select 1 from cities where lower(name) = lower($1)) as exists`,
      [cityName]
    );
    return result.rows[0]?.exists === true;
  }
}
