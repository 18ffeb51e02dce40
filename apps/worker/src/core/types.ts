import type { OnDutyRoster, ValidityPeriod } from "@pharmaduty/shared";

export interface LoggerLike {
  info(payload: unknown, message?: string): void;
  warn(payload: unknown, message?: string): void;
  error(payload: unknown, message?: string): void;
}

export interface RawListing {
  name: string;
  address: string;
  cityToken: string;
  contactNumbers: string[];
}

export type ParseGapKind = "missing-period" | "missing-table" | "short-row";

export interface ParseGap {
  kind: ParseGapKind;
  detail: string;
}

export interface ParsedRosterPage {
  title: string;
  period: ValidityPeriod | null;
  listings: RawListing[];
  gaps: ParseGap[];
}

export interface PharmacyCandidate {
  id: number;
  name: string;
}

export type MatchOutcome =
  | {
      status: "matched";
      pharmacyId: number;
      pharmacyName: string;
      ratio: number;
    }
  | {
      status: "no-city-coverage";
      city: string;
      cityKnown: boolean;
    }
  | {
      status: "no-confident-match";
      bestName: string;
      bestRatio: number;
      threshold: number;
    };

export interface RegistryReader {
  listPharmaciesByCity(cityName: string): Promise<PharmacyCandidate[]>;
  cityExists(cityName: string): Promise<boolean>;
}

export interface RosterUpsertResult {
  roster: OnDutyRoster;
  created: boolean;
}

export interface RosterStore {
  getCurrentEndDate(): Promise<string | null>;
  getRoster(): Promise<OnDutyRoster | null>;
  upsertRoster(period: ValidityPeriod, pharmacyIds: number[]): Promise<RosterUpsertResult>;
}

export type ReconcileOutcome =
  | { status: "skipped"; reason: "missing-period" }
  | { status: "created" | "updated"; roster: OnDutyRoster };

export type RosterState = "NO_ROSTER" | "ROSTER_VALID" | "ROSTER_EXPIRED";

export type RefreshTrigger = "startup" | "schedule" | "manual";

export interface IngestSummary {
  period: ValidityPeriod | null;
  totalListings: number;
  skippedListings: number;
  matchedListings: number;
  unmatchedListings: number;
  pharmacyIds: number[];
  gaps: ParseGap[];
  reconcile: ReconcileOutcome;
}

export type RefreshResult =
  | { status: "fresh"; state: "ROSTER_VALID"; endDate: string }
  | { status: "ingested"; state: RosterState; forced: boolean; summary: IngestSummary }
  | { status: "failed"; state: RosterState | null; error: string };
