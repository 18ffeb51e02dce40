import { config as loadDotenv } from "dotenv";
import { join } from "path";
import { Queue, Worker } from "bullmq";
import pino from "pino";
import { loadWorkerConfig } from "./config";
import { RosterMetrics } from "./core/metrics";
import type { RefreshTrigger } from "./core/types";
import { createExpiryController, createPool } from "./runtime";

loadDotenv({ path: join(process.cwd(), ".env"), override: false });
loadDotenv({ path: join(process.cwd(), "../../.env"), override: false });

const DAILY_CHECK_JOB = "roster-expiry-check";

const config = loadWorkerConfig(process.env);
const logger = pino({ level: config.logLevel });
const metrics = new RosterMetrics();
const db = createPool(config);
const controller = createExpiryController(config, db, logger, metrics);

const connection = {
  url: config.redisUrl
};
const queue = new Queue(config.queueName, { connection });

const worker = new Worker(
  config.queueName,
  async (job) => {
    const trigger: RefreshTrigger = job.name === DAILY_CHECK_JOB ? "schedule" : "manual";
    const result = await controller.ensureRosterFresh(trigger);
    return result.status;
  },
  {
    connection,
    concurrency: 1
  }
);

worker.on("completed", (job, status) => {
  logger.info({ jobId: job.id, name: job.name, status }, "Job completed");
});

worker.on("failed", (job, error) => {
  logger.error({ jobId: job?.id, name: job?.name, error }, "Job failed");
});

async function bootstrap() {
  await queue.add(
    DAILY_CHECK_JOB,
    {},
    {
      jobId: DAILY_CHECK_JOB,
      repeat: {
        pattern: config.checkPattern,
        tz: config.timezone
      },
      attempts: 1,
      removeOnComplete: 100,
      removeOnFail: 500
    }
  );
  setInterval(() => metrics.flush(logger), 60_000).unref();
  logger.info(
    { queue: config.queueName, pattern: config.checkPattern, timezone: config.timezone, source: config.sourceUrl },
    "Roster worker started"
  );

  const result = await controller.ensureRosterFresh("startup");
  logger.info({ status: result.status }, "Startup roster check finished");
}

async function shutdown() {
  logger.info("Shutting down worker...");
  await worker.close();
  await queue.close();
  await db.end();
  process.exit(0);
}

function handleSignal(signal: NodeJS.Signals) {
  shutdown().catch((error) => {
    logger.error({ error, signal }, "Worker shutdown failed");
    process.exit(1);
  });
}

process.on("SIGINT", handleSignal);
process.on("SIGTERM", handleSignal);

bootstrap()
  .catch((error) => {
    logger.error({ error }, "Fatal worker error");
    return shutdown();
  })
  .catch((error) => {
    logger.error({ error }, "Worker shutdown failed");
    process.exit(1);
  });
