import type { QueryResultRow } from "pg";

// The slice of pg's Pool and PoolClient the repositories use.
export interface SqlExecutor {
  query(text: string, values?: unknown[]): Promise<{ rows: QueryResultRow[]; rowCount: number | null }>;
}

export interface SqlClient extends SqlExecutor {
  release(error?: Error | boolean): void;
}

export interface SqlPool extends SqlExecutor {
  connect(): Promise<SqlClient>;
}

export function toIsoTimestamp(value: unknown): string {
  const date = value instanceof Date ? value : new Date(String(value));
  if (Number.isNaN(date.getTime())) {
    throw new Error(`Invalid timestamp from database: ${String(value)}`);
  }
  return date.toISOString();
}
