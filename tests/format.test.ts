import { describe, expect, it } from "vitest";

import type { ComparisonEntry } from "../src/compare.ts";
import {
  comparisonRow,
  formatAirlines,
  formatComparison,
  formatDuration,
  formatMoney,
  formatTransfers,
  shortDate,
  stopsLabel,
} from "../src/format.ts";

const priced: ComparisonEntry = {
  departureDate: "2026-03-15",
  returnDate: null,
  price: 95,
  currency: "GBP",
  stops: 0,
  carrier: "BRITISH AIRWAYS",
  carrierCode: "BA",
  offersFound: 5,
};

const failed: ComparisonEntry = {
  departureDate: "2026-03-16",
  returnDate: null,
  price: null,
  currency: "GBP",
  stops: null,
  carrier: null,
  carrierCode: null,
  offersFound: 0,
  error: "No flights found",
};

describe("small formatters", () => {
  it("formats money with a symbol or the currency code", () => {
    expect(formatMoney(95, "GBP")).toBe("£95.00");
    expect(formatMoney(1234.5, "EUR")).toBe("€1,234.50");
    expect(formatMoney(10, "JPY")).toBe("JPY 10.00");
  });

  it("labels stops", () => {
    expect(stopsLabel(0)).toBe("Direct");
    expect(stopsLabel(1)).toBe("1 stop");
    expect(stopsLabel(2)).toBe("2 stops");
  });

  it("turns ISO durations into hours and minutes", () => {
    expect(formatDuration("PT2H30M")).toBe("2h 30m");
    expect(formatDuration("PT45M")).toBe("45m");
    expect(formatDuration("PT3H")).toBe("3h");
  });

  it("prints short dates with the weekday", () => {
    expect(shortDate("2026-03-01")).toBe("Sun Mar 01");
    expect(shortDate("not a date")).toBe("not a date");
  });
});

describe("comparisonRow", () => {
  it("prints price, date, stops and carrier", () => {
    expect(comparisonRow(priced)).toBe("  £95.00       Sun Mar 15                     Direct       BRITISH AIRWAYS");
  });

  it("shows the trip length for round trips", () => {
    const row = comparisonRow({ ...priced, returnDate: "2026-03-22", stops: 1, carrier: "IBERIA" });
    expect(row).toBe("  £95.00       Sun Mar 15 → Sun Mar 22 (7d)   1 stop       IBERIA");
  });

  it("prints N/A and the error for failed dates", () => {
    expect(comparisonRow(failed)).toBe("  N/A          Mon Mar 16                     No flights found");
  });
});

describe("formatComparison", () => {
  it("lists every row and the best deal", () => {
    const text = formatComparison({
      origin: "LHR",
      destination: "BCN",
      comparison: [priced, failed],
      cheapest: priced,
    });

    expect(text.split("\n")).toEqual([
      "💰 Price comparison for LHR → BCN",
      "",
      "  £95.00       Sun Mar 15                     Direct       BRITISH AIRWAYS",
      "  N/A          Mon Mar 16                     No flights found",
      "",
      "✅ Best deal: 2026-03-15 at £95.00",
    ]);
  });

  it("omits the best deal when nothing was priced", () => {
    const text = formatComparison({ origin: "LHR", destination: "BCN", comparison: [failed], cheapest: null });

    expect(text.split("\n")).toHaveLength(3);
  });
});

describe("lookups", () => {
  it("joins airline codes", () => {
    expect(formatAirlines({ data: [{ iataCode: "BA", icaoCode: "BAW", businessName: "BRITISH AIRWAYS" }] })).toBe(
      "✈️  [BA/BAW] BRITISH AIRWAYS",
    );
  });

  it("says so when there are no transfers", () => {
    expect(formatTransfers({ data: [] })).toBe("No transfer offers found.");
  });
});
