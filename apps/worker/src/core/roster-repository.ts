import type { OnDutyRoster, ValidityPeriod } from "@pharmaduty/shared";
import type { QueryResultRow } from "pg";
import { toIsoTimestamp } from "./sql";
import type { SqlExecutor, SqlPool } from "./sql";
import type { RosterStore, RosterUpsertResult } from "./types";

// pg_advisory_xact_lock key serialising roster writers across processes
const ROSTER_LOCK_KEY = 4_207_311;

const ROSTER_COLUMNS = `
  id,
  to_char(start_date, 'YYYY-MM-DD') as start_date,
  to_char(end_date, 'YYYY-MM-DD') as end_date,
  pharmacy_ids,
  created_at,
  updated_at
`;

export class RosterRepository implements RosterStore {
  constructor(private readonly db: SqlPool) {}

  async getCurrentEndDate(): Promise<string | null> {
    const roster = await this.getRoster();
    return roster?.endDate ?? null;
  }

  async getRoster(): Promise<OnDutyRoster | null> {
    const result = await this.db.query(`select ${ROSTER_COLUMNS} from on_duty_rosters order by id asc limit 1`);
    const row = result.rows[0];
    return row ? toRoster(row) : null;
  }

  /**
   * Overwrites the first roster row ever created, or inserts it. Period, ids and
   * updated_at change in one statement inside one transaction.
   */
  async upsertRoster(period: ValidityPeriod, pharmacyIds: number[]): Promise<RosterUpsertResult> {
    const client = await this.db.connect();
    try {
      await client.query("begin");
      await client.query("select pg_advisory_xact_lock($1)", [ROSTER_LOCK_KEY]);

      const existing = await client.query("select id from on_duty_rosters order by id asc limit 1 for update");
      const current = existing.rows[0];
      const row = current
        ? await updateRoster(client, Number(current.id), period, pharmacyIds)
        : await insertRoster(client, period, pharmacyIds);

      await client.query("commit");
      return { roster: toRoster(row), created: !current };
    } catch (error) {
      await client.query("rollback");
      throw error;
    } finally {
      client.release();
    }
  }
}

async function updateRoster(
  client: SqlExecutor,
  rosterId: number,
  period: ValidityPeriod,
  pharmacyIds: number[]
): Promise<QueryResultRow> {
  const result = await client.query(
    `
    update on_duty_rosters
    set start_date = $2::date,
        end_date = $3::date,
        pharmacy_ids = $4::integer[],
        updated_at = now()
    where id = $1
    returning ${ROSTER_COLUMNS}
    `,
    [rosterId, period.startDate, period.endDate, pharmacyIds]
  );
  return firstRow(result.rows);
}

async function insertRoster(
  client: SqlExecutor,
  period: ValidityPeriod,
  pharmacyIds: number[]
): Promise<QueryResultRow> {
  const result = await client.query(
    `
    insert into on_duty_rosters (start_date, end_date, pharmacy_ids)
    values ($1::date, $2::date, $3::integer[])
    returning ${ROSTER_COLUMNS}
    `,
    [period.startDate, period.endDate, pharmacyIds]
  );
  return firstRow(result.rows);
}

function firstRow(rows: QueryResultRow[]): QueryResultRow {
  const row = rows[0];
  if (!row) {
    throw new Error("Roster write returned no row");
  }
  return row;
}

function toRoster(row: QueryResultRow): OnDutyRoster {
  const pharmacyIds: unknown = row.pharmacy_ids;
  return {
    id: Number(row.id),
    startDate: String(row.start_date),
    endDate: String(row.end_date),
    pharmacyIds: Array.isArray(pharmacyIds) ? pharmacyIds.map(Number) : [],
    createdAt: toIsoTimestamp(row.created_at),
    updatedAt: toIsoTimestamp(row.updated_at)
  };
}
