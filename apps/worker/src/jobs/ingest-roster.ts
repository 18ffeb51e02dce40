import type { SourceFetcher } from "../adapters/source-fetcher";
import type { CityNormalizer } from "../core/city-normalizer";
import type { PharmacyMatcher } from "../core/pharmacy-matcher";
import type { RosterReconciler } from "../core/roster-reconciler";
import type { IngestSummary, LoggerLike } from "../core/types";
import { parseRosterPage } from "../parsers/listing-parser";

export interface IngestDependencies {
  fetcher: SourceFetcher;
  normalizer: CityNormalizer;
  matcher: PharmacyMatcher;
  reconciler: RosterReconciler;
  logger: LoggerLike;
}

/**
 * One full pass: fetch, parse, match every listing, reconcile. FetchError and
 * ReconcileError propagate; parse and match gaps only reduce the result.
 */
export async function ingestRoster(deps: IngestDependencies): Promise<IngestSummary> {
  const html = await deps.fetcher.fetchPage();
  const page = parseRosterPage(html);

  for (const gap of page.gaps) {
    deps.logger.warn({ gap: gap.kind, detail: gap.detail }, "Roster page parse gap");
  }

  const matchedIds: number[] = [];
  let skippedListings = 0;
  let unmatchedListings = 0;

  for (const listing of page.listings) {
    if (!listing.name || !listing.cityToken) {
      skippedListings += 1;
      deps.logger.warn(
        { rawName: listing.name, address: listing.address },
        "Listing without name or city, not matched"
      );
      continue;
    }

    const city = deps.normalizer.normalize(listing.cityToken);
    const outcome = await deps.matcher.match(listing.name, city);
    if (outcome.status === "matched") {
      matchedIds.push(outcome.pharmacyId);
    } else {
      unmatchedListings += 1;
    }
  }

  const reconcile = await deps.reconciler.reconcile(page.period, matchedIds);
  const pharmacyIds = reconcile.status === "skipped" ? [] : reconcile.roster.pharmacyIds;

  const summary: IngestSummary = {
    period: page.period,
    totalListings: page.listings.length,
    skippedListings,
    matchedListings: matchedIds.length,
    unmatchedListings,
    pharmacyIds,
    gaps: page.gaps,
    reconcile
  };

  deps.logger.info(
    {
      total: summary.totalListings,
      matched: summary.matchedListings,
      unmatched: summary.unmatchedListings,
      skipped: summary.skippedListings,
      period: page.period ? `${page.period.startDate} to ${page.period.endDate}` : null,
      roster: reconcile.status
    },
    "Roster ingest finished"
  );

  return summary;
}
