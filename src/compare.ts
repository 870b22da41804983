// compare.ts

import type { FlightOffersResponse, FlightSearchOptions, FlightSearchQuery } from "./amadeus.ts";
import { COMPARE_MAX_OFFERS, DEFAULT_CURRENCY } from "./config.ts";
import { addDays } from "./dates.ts";
import { errorMessage } from "./errors.ts";
import type { Logger } from "./logger.ts";

export interface ComparisonEntry {
  departureDate: string;
  returnDate: string | null;
  price: number | null;
  currency: string;
  stops: number | null;
  carrier: string | null;
  carrierCode: string | null;
  offersFound: number;
  error?: string;
}

export interface ComparisonResult {
  origin: string;
  destination: string;
  comparison: ComparisonEntry[];
  cheapest: ComparisonEntry | null;
}

export type FlightSearchFn = (query: FlightSearchQuery) => Promise<FlightOffersResponse>;

export interface CompareArgs {
  origin: string;
  destination: string;
  dates: string[];
  returnAfterDays?: number;
  search: FlightSearchFn;
  params?: FlightSearchOptions;
  concurrency?: number;
  onProgress?: (entry: ComparisonEntry, done: number, total: number) => void;
  logger?: Logger;
}

export async function compareDates(args: CompareArgs): Promise<ComparisonResult> {
  const params = args.params ?? {};
  const currency = params.currency ?? DEFAULT_CURRENCY;
  const total = args.dates.length;
  let done = 0;

  args.logger?.info({ dates: total, concurrency: args.concurrency ?? 1 }, "comparing prices");

  const entries = await mapWithConcurrency(args.dates, args.concurrency ?? 1, async (departureDate) => {
    const returnDate = args.returnAfterDays ? addDays(departureDate, args.returnAfterDays) : null;
    const entry = await checkDate({
      search: args.search,
      query: {
        ...params,
        origin: args.origin,
        destination: args.destination,
        departureDate,
        returnDate: returnDate ?? undefined,
        max: COMPARE_MAX_OFFERS,
      },
      currency,
    });

    done++;
    args.logger?.info({ date: departureDate, price: entry.price, error: entry.error }, `[${done}/${total}] checked`);
    args.onProgress?.(entry, done, total);
    return entry;
  });

  const comparison = rankEntries(entries);
  const first = comparison[0];
  return {
    origin: args.origin,
    destination: args.destination,
    comparison,
    cheapest: first && first.price !== null ? first : null,
  };
}

// A failed search becomes a row with an error, never a rejection.
async function checkDate(args: {
  search: FlightSearchFn;
  query: FlightSearchQuery;
  currency: string;
}): Promise<ComparisonEntry> {
  const { query } = args;
  const failed = (error: string): ComparisonEntry => ({
    departureDate: query.departureDate,
    returnDate: query.returnDate ?? null,
    price: null,
    currency: args.currency,
    stops: null,
    carrier: null,
    carrierCode: null,
    offersFound: 0,
    error,
  });

  let response: FlightOffersResponse;
  try {
    response = await args.search(query);
  } catch (e) {
    return failed(errorMessage(e));
  }

  const offers = response?.data ?? [];
  const cheapest = offers[0];
  if (!cheapest) return failed("No flights found");

  const price = Number(cheapest.price?.grandTotal ?? cheapest.price?.total);
  if (!Number.isFinite(price)) return { ...failed("Offer has no usable price"), offersFound: offers.length };

  const segments = cheapest.itineraries?.[0]?.segments ?? [];
  const carrierCode = segments[0]?.carrierCode ?? "";
  const carriers = response.dictionaries?.carriers ?? {};

  return {
    departureDate: query.departureDate,
    returnDate: query.returnDate ?? null,
    price,
    currency: cheapest.price.currency ?? args.currency,
    stops: Math.max(0, segments.length - 1),
    carrier: carriers[carrierCode] ?? carrierCode,
    carrierCode,
    offersFound: offers.length,
  };
}

/** Ascending by price; rows without a price go last, ties keep their order. */
export function rankEntries(entries: ComparisonEntry[]): ComparisonEntry[] {
  return [...entries].sort((a, b) => {
    if (a.price === null || b.price === null) {
      return (a.price === null ? 1 : 0) - (b.price === null ? 1 : 0);
    }
    return a.price - b.price;
  });
}

/**
 * Runs fn over items with at most `limit` calls in flight. Results keep the
 * order of items, whatever order the calls finish in.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index], index);
    }
  };

  const workers = Math.max(1, Math.min(Math.floor(limit) || 1, items.length));
  await Promise.all(Array.from({ length: workers }, () => worker()));
  return results;
}
