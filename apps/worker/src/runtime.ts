import { Pool } from "pg";
import { HttpSourceFetcher } from "./adapters/source-fetcher";
import type { WorkerConfig } from "./config";
import { resolveSsl } from "./core/env";
import { CityNormalizer } from "./core/city-normalizer";
import type { RosterMetrics } from "./core/metrics";
import { PharmacyMatcher } from "./core/pharmacy-matcher";
import { RegistryRepository } from "./core/registry-repository";
import { RosterReconciler } from "./core/roster-reconciler";
import { RosterRepository } from "./core/roster-repository";
import type { LoggerLike } from "./core/types";
import { ExpiryController } from "./jobs/expiry-controller";
import { ingestRoster } from "./jobs/ingest-roster";

export function createPool(config: WorkerConfig): Pool {
  return new Pool({
    connectionString: config.databaseUrl,
    max: config.dbPoolMax,
    idleTimeoutMillis: config.dbIdleTimeoutMs,
    ssl: resolveSsl(config.databaseUrl, config.dbSslMode)
  });
}

export function createExpiryController(
  config: WorkerConfig,
  db: Pool,
  logger: LoggerLike,
  metrics: RosterMetrics
): ExpiryController {
  const store = new RosterRepository(db);
  const fetcher = new HttpSourceFetcher({ url: config.sourceUrl, timeoutMs: config.requestTimeoutMs });
  const normalizer = new CityNormalizer();
  const matcher = new PharmacyMatcher(new RegistryRepository(db), logger, config.matchThreshold);
  const reconciler = new RosterReconciler(store, logger);

  return new ExpiryController({
    store,
    ingest: () => ingestRoster({ fetcher, normalizer, matcher, reconciler, logger }),
    logger,
    metrics,
    timezone: config.timezone
  });
}
