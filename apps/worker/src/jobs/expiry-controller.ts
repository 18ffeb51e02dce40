import { isAfterDate, resolveToday } from "@pharmaduty/shared";
import { describeError } from "../core/errors";
import type { RosterMetrics } from "../core/metrics";
import type { IngestSummary, LoggerLike, RefreshResult, RefreshTrigger, RosterState, RosterStore } from "../core/types";

const ROSTER_LOCK_KEY = "on-duty-roster";

export interface ExpiryControllerOptions {
  store: RosterStore;
  ingest: () => Promise<IngestSummary>;
  logger: LoggerLike;
  metrics: RosterMetrics;
  timezone: string;
  today?: () => string;
}

export function evaluateRosterState(endDate: string | null, today: string): RosterState {
  if (!endDate) {
    return "NO_ROSTER";
  }
  return isAfterDate(today, endDate) ? "ROSTER_EXPIRED" : "ROSTER_VALID";
}

/**
 * Decides whether the roster has lapsed and re-ingests when it has. Startup,
 * the daily job and the CLI all go through here; a call made while another is
 * running waits for that run and gets its result.
 */
export class ExpiryController {
  private readonly inFlight = new Map<string, Promise<RefreshResult>>();
  private readonly today: () => string;

  constructor(private readonly options: ExpiryControllerOptions) {
    this.today = options.today ?? (() => resolveToday(options.timezone));
  }

  get isRunning(): boolean {
    return this.inFlight.size > 0;
  }

  async ensureRosterFresh(trigger: RefreshTrigger): Promise<RefreshResult> {
    return this.runWithLock(() => this.checkAndIngest(trigger, false));
  }

  /**
   * Ingests even when the roster is still valid. A run already in progress may
   * end as "fresh", so this waits for it to settle and then starts its own.
   */
  async forceRefresh(trigger: RefreshTrigger): Promise<RefreshResult> {
    let running = this.inFlight.get(ROSTER_LOCK_KEY);
    while (running) {
      this.options.logger.info({ lock: ROSTER_LOCK_KEY, trigger }, "Waiting for running roster refresh before forcing");
      await running;
      running = this.inFlight.get(ROSTER_LOCK_KEY);
    }
    return this.runWithLock(() => this.checkAndIngest(trigger, true));
  }

  private async runWithLock(task: () => Promise<RefreshResult>): Promise<RefreshResult> {
    const existing = this.inFlight.get(ROSTER_LOCK_KEY);
    if (existing) {
      this.options.logger.info({ lock: ROSTER_LOCK_KEY }, "Roster refresh already running, joining it");
      return existing;
    }

    const run = task();
    this.inFlight.set(ROSTER_LOCK_KEY, run);

    try {
      return await run;
    } finally {
      this.inFlight.delete(ROSTER_LOCK_KEY);
    }
  }

  private async checkAndIngest(trigger: RefreshTrigger, forced: boolean): Promise<RefreshResult> {
    const { logger, metrics } = this.options;
    let state: RosterState | null = null;

    try {
      const endDate = await this.options.store.getCurrentEndDate();
      const today = this.today();
      state = evaluateRosterState(endDate, today);

      if (endDate && state === "ROSTER_VALID" && !forced) {
        logger.info({ trigger, endDate, today }, "On-duty roster still valid");
        metrics.markFresh(trigger);
        return { status: "fresh", state, endDate };
      }

      logger.info({ trigger, state, endDate, today, forced }, "Refreshing on-duty roster");
      const summary = await this.options.ingest();
      metrics.markIngest(trigger, summary);
      return { status: "ingested", state, forced, summary };
    } catch (error) {
      const message = describeError(error);
      logger.error({ trigger, state, error: message }, "Roster refresh failed, keeping previous roster");
      metrics.markFailure(trigger);
      return { status: "failed", state, error: message };
    }
  }
}
