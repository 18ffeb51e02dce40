import { uniqueInOrder } from "@pharmaduty/shared";
import type { ValidityPeriod } from "@pharmaduty/shared";
import { ReconcileError, describeError } from "./errors";
import type { LoggerLike, ReconcileOutcome, RosterStore } from "./types";

export class RosterReconciler {
  constructor(
    private readonly store: RosterStore,
    private readonly logger: LoggerLike
  ) {}

  /**
   * Writes the period and matched pharmacy ids onto the singleton roster.
   * Without a period nothing is written: a stale roster is kept rather than
   * one whose validity window is unknown.
   */
  async reconcile(period: ValidityPeriod | null, pharmacyIds: readonly number[]): Promise<ReconcileOutcome> {
    if (!period) {
      this.logger.warn({ matched: pharmacyIds.length }, "Could not extract valid date range, skipping roster update");
      return { status: "skipped", reason: "missing-period" };
    }

    const ids = uniqueInOrder(pharmacyIds);
    try {
      const { roster, created } = await this.store.upsertRoster(period, ids);
      this.logger.info(
        { rosterId: roster.id, startDate: roster.startDate, endDate: roster.endDate, pharmacies: ids.length },
        created ? "Created on-duty roster" : "Updated on-duty roster"
      );
      return { status: created ? "created" : "updated", roster };
    } catch (error) {
      throw new ReconcileError(`Could not write on-duty roster: ${describeError(error)}`, { cause: error });
    }
  }
}
