import { DateTime, Info } from "luxon";

export const ROSTER_TZ = "Indian/Antananarivo";

const SOURCE_DATE_FORMAT = "dd/MM/yyyy";

export function isValidTimeZone(zone: string): boolean {
  return Info.isValidIANAZone(zone);
}

export function resolveToday(zone = ROSTER_TZ, now: DateTime = DateTime.now()): string {
  const today = now.setZone(zone).toISODate();
  if (!today) {
    throw new Error(`Cannot resolve today's date in zone ${zone}`);
  }
  return today;
}

/**
 * Parses a `dd/mm/yyyy` date as printed by the publication page into an ISO
 * calendar date. Impossible dates (31/02/2025) give null.
 */
export function parseSourceDate(value: string): string | null {
  const parsed = DateTime.fromFormat(value.trim(), SOURCE_DATE_FORMAT, { zone: "utc" });
  if (!parsed.isValid) {
    return null;
  }
  return parsed.toISODate();
}

export function isAfterDate(left: string, right: string): boolean {
  return left > right;
}
