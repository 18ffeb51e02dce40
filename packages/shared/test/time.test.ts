import { describe, expect, it } from "vitest";
import { DateTime } from "luxon";
import { isAfterDate, isValidTimeZone, parseSourceDate, resolveToday } from "../src/time";

describe("parseSourceDate", () => {
  it("reads day-first dates", () => {
    expect(parseSourceDate("05/01/2025")).toBe("2025-01-05");
    expect(parseSourceDate(" 11/01/2025 ")).toBe("2025-01-11");
  });

  it("rejects impossible calendar dates", () => {
    expect(parseSourceDate("31/02/2025")).toBeNull();
    expect(parseSourceDate("00/01/2025")).toBeNull();
    expect(parseSourceDate("12/13/2025")).toBeNull();
  });
});

describe("resolveToday", () => {
  it("uses the wall clock of the requested zone", () => {
    const lateEveningUtc = DateTime.fromISO("2025-01-11T22:30:00Z");
    expect(resolveToday("Indian/Antananarivo", lateEveningUtc)).toBe("2025-01-12");
    expect(resolveToday("UTC", lateEveningUtc)).toBe("2025-01-11");
  });

  it("throws for an unknown zone", () => {
    expect(() => resolveToday("Mars/Olympus")).toThrow("Cannot resolve today's date in zone Mars/Olympus");
  });
});

describe("date helpers", () => {
  it("compares ISO calendar dates", () => {
    expect(isAfterDate("2025-01-12", "2025-01-11")).toBe(true);
    expect(isAfterDate("2025-01-11", "2025-01-11")).toBe(false);
    expect(isAfterDate("2024-12-31", "2025-01-01")).toBe(false);
  });

  it("validates IANA zones", () => {
    expect(isValidTimeZone("Indian/Antananarivo")).toBe(true);
    expect(isValidTimeZone("Nowhere/Town")).toBe(false);
  });
});
