import type { IngestSummary, LoggerLike } from "./types";

export class RosterMetrics {
  private ingestRuns = 0;
  private failedRuns = 0;
  private freshChecks = 0;
  private skippedUpdates = 0;
  private matchedListings = 0;
  private unmatchedListings = 0;
  private lastTrigger = "";
  private lastRunAt = "";

  markIngest(trigger: string, summary: IngestSummary) {
    this.ingestRuns += 1;
    this.matchedListings += summary.matchedListings;
    this.unmatchedListings += summary.unmatchedListings;
    if (summary.reconcile.status === "skipped") {
      this.skippedUpdates += 1;
    }
    this.touch(trigger);
  }

  markFresh(trigger: string) {
    this.freshChecks += 1;
    this.touch(trigger);
  }

  markFailure(trigger: string) {
    this.failedRuns += 1;
    this.touch(trigger);
  }

  snapshot() {
    return {
      ingest_runs: this.ingestRuns,
      failed_runs: this.failedRuns,
      fresh_checks: this.freshChecks,
      skipped_updates: this.skippedUpdates,
      matched_listings: this.matchedListings,
      unmatched_listings: this.unmatchedListings,
      last_trigger: this.lastTrigger,
      last_run_at: this.lastRunAt
    };
  }

  flush(logger: LoggerLike) {
    logger.info(this.snapshot(), "Roster metrics snapshot");
  }

  private touch(trigger: string) {
    this.lastTrigger = trigger;
    this.lastRunAt = new Date().toISOString();
  }
}
