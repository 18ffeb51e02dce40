import { config as loadDotenv } from "dotenv";
import { join } from "path";
import pino from "pino";
import { loadWorkerConfig } from "../config";
import { RosterMetrics } from "../core/metrics";
import { RosterRepository } from "../core/roster-repository";
import { createExpiryController, createPool } from "../runtime";

loadDotenv({ path: join(process.cwd(), ".env"), override: false });
loadDotenv({ path: join(process.cwd(), "../../.env"), override: false });

const config = loadWorkerConfig(process.env);
const logger = pino({ level: config.logLevel });
const metrics = new RosterMetrics();

async function main() {
  const force = process.argv.includes("--force");
  const db = createPool(config);

  try {
    const controller = createExpiryController(config, db, logger, metrics);
    const result = force ? await controller.forceRefresh("manual") : await controller.ensureRosterFresh("manual");
    metrics.flush(logger);

    if (result.status === "failed") {
      logger.error({ error: result.error }, "Roster refresh finished with failure");
      process.exitCode = 1;
      return;
    }

    const roster = await new RosterRepository(db).getRoster();
    logger.info(
      {
        status: result.status,
        period: roster ? `${roster.startDate} to ${roster.endDate}` : null,
        pharmacies: roster?.pharmacyIds.length ?? 0
      },
      "Roster refresh finished"
    );
  } finally {
    await db.end();
  }
}

main().catch((error) => {
  logger.error({ error }, "Roster refresh failed");
  process.exit(1);
});
