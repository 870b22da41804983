import { describe, expect, it } from "vitest";

import { addDays, generateDateRange, parseDateList, parseIsoDate, resolveDateFilter } from "../src/dates.ts";
import { ValidationError } from "../src/errors.ts";

describe("generateDateRange", () => {
  it("includes both ends", () => {
    expect(generateDateRange("2026-03-01", "2026-03-03")).toEqual(["2026-03-01", "2026-03-02", "2026-03-03"]);
  });

  it("keeps only Saturdays and Sundays for weekendsOnly", () => {
    // 2026-03-01 is a Sunday, 2026-03-07 a Saturday
    expect(generateDateRange("2026-03-01", "2026-03-07", "weekendsOnly")).toEqual(["2026-03-01", "2026-03-07"]);
  });

  it("keeps Monday to Friday for weekdaysOnly", () => {
    expect(generateDateRange("2026-03-01", "2026-03-07", "weekdaysOnly")).toEqual([
      "2026-03-02",
      "2026-03-03",
      "2026-03-04",
      "2026-03-05",
      "2026-03-06",
    ]);
  });

  it("returns a single day when start equals end", () => {
    expect(generateDateRange("2026-03-15", "2026-03-15")).toEqual(["2026-03-15"]);
  });

  it("returns nothing when start is after end", () => {
    expect(generateDateRange("2026-03-05", "2026-03-01")).toEqual([]);
  });

  it("crosses month boundaries", () => {
    expect(generateDateRange("2026-02-27", "2026-03-02")).toEqual([
      "2026-02-27",
      "2026-02-28",
      "2026-03-01",
      "2026-03-02",
    ]);
  });
});

describe("addDays", () => {
  it("adds whole days", () => {
    expect(addDays("2026-03-15", 7)).toBe("2026-03-22");
    expect(addDays("2026-12-30", 3)).toBe("2027-01-02");
  });
});

describe("parseIsoDate", () => {
  it("rejects malformed input", () => {
    expect(() => parseIsoDate("15/03/2026")).toThrow('Invalid date "15/03/2026", expected YYYY-MM-DD');
  });

  it("rejects days that do not exist", () => {
    expect(() => parseIsoDate("2026-02-30")).toThrow(ValidationError);
  });
});

describe("resolveDateFilter", () => {
  it("maps the flags to a filter", () => {
    expect(resolveDateFilter({})).toBe("none");
    expect(resolveDateFilter({ weekendsOnly: true })).toBe("weekendsOnly");
    expect(resolveDateFilter({ weekdaysOnly: true })).toBe("weekdaysOnly");
  });

  it("refuses both flags at once", () => {
    expect(() => resolveDateFilter({ weekendsOnly: true, weekdaysOnly: true })).toThrow(
      "--weekends-only and --weekdays-only cannot be combined",
    );
  });
});

describe("parseDateList", () => {
  it("trims entries and drops empty ones", () => {
    expect(parseDateList(" 2026-03-15, 2026-03-16 ,")).toEqual(["2026-03-15", "2026-03-16"]);
  });

  it("validates every entry", () => {
    expect(() => parseDateList("2026-03-15,2026-13-01")).toThrow(ValidationError);
  });
});
