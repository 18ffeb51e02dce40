import { ROSTER_TZ, isValidTimeZone } from "@pharmaduty/shared";
import { envNumber, envValue } from "./core/env";

export const DEFAULT_SOURCE_URL = "https://www.opham.com/urgence/pharmacie";
export const DEFAULT_MATCH_THRESHOLD = 0.4;

export interface WorkerConfig {
  databaseUrl: string;
  dbPoolMax: number;
  dbIdleTimeoutMs: number;
  dbSslMode?: string;
  redisUrl: string;
  queueName: string;
  sourceUrl: string;
  requestTimeoutMs: number;
  matchThreshold: number;
  checkPattern: string;
  timezone: string;
  logLevel: string;
}

export function loadWorkerConfig(env: NodeJS.ProcessEnv): WorkerConfig {
  const databaseUrl = envValue(env.APP_DATABASE_URL) ?? envValue(env.DATABASE_URL);
  if (!databaseUrl) {
    throw new Error("APP_DATABASE_URL or DATABASE_URL is required for worker");
  }

  const matchThreshold = envNumber(env.ROSTER_MATCH_THRESHOLD, DEFAULT_MATCH_THRESHOLD);
  if (matchThreshold < 0 || matchThreshold > 1) {
    throw new Error(`ROSTER_MATCH_THRESHOLD must be between 0 and 1, got ${matchThreshold}`);
  }

  const timezone = envValue(env.ROSTER_TIMEZONE) ?? ROSTER_TZ;
  if (!isValidTimeZone(timezone)) {
    throw new Error(`ROSTER_TIMEZONE is not a known IANA zone: ${timezone}`);
  }

  return {
    databaseUrl,
    dbPoolMax: envNumber(env.DB_POOL_MAX, 3),
    dbIdleTimeoutMs: envNumber(env.DB_IDLE_TIMEOUT_MS, 10000),
    dbSslMode: envValue(env.DB_SSL_MODE),
    redisUrl: envValue(env.REDIS_URL) ?? "redis://localhost:6379",
    queueName: envValue(env.ROSTER_QUEUE_NAME) ?? "roster",
    sourceUrl: envValue(env.ROSTER_SOURCE_URL) ?? DEFAULT_SOURCE_URL,
    requestTimeoutMs: envNumber(env.ROSTER_REQUEST_TIMEOUT_MS, 10000),
    matchThreshold,
    checkPattern: envValue(env.ROSTER_CHECK_PATTERN) ?? "0 6 * * *",
    timezone,
    logLevel: envValue(env.LOG_LEVEL) ?? "info"
  };
}
