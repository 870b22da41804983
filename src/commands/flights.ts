// commands/flights.ts

import { defineCommand } from "citty";

import type { FlightSearchOptions, TravelClass } from "../amadeus.ts";
import { compareDates } from "../compare.ts";
import { DEFAULT_CURRENCY, LARGE_COMPARISON_DATES } from "../config.ts";
import { generateDateRange, parseDateList, parseIsoDate, resolveDateFilter } from "../dates.ts";
import { ValidationError } from "../errors.ts";
import {
  formatAirlines,
  formatCheckinLinks,
  formatComparison,
  formatDelayPrediction,
  formatDestinations,
  formatFlightDates,
  formatLocations,
  formatOffers,
  formatPricing,
} from "../format.ts";
import { floatArg, formatArgs, intArg, oneOf, runTool } from "./shared.ts";

const TRAVEL_CLASSES: readonly TravelClass[] = ["ECONOMY", "PREMIUM_ECONOMY", "BUSINESS", "FIRST"];

const passengerArgs = {
  adults: { type: "string", description: "Number of adults (default: 1)", default: "1" },
  children: { type: "string", description: "Number of children (2-11)" },
  infants: { type: "string", description: "Number of infants (<2)" },
  class: { type: "string", description: "Travel class: ECONOMY, PREMIUM_ECONOMY, BUSINESS, FIRST" },
  nonstop: { type: "boolean", description: "Direct flights only", default: false },
  "max-price": { type: "string", description: "Maximum price" },
  currency: { type: "string", description: `Currency code (default: ${DEFAULT_CURRENCY})`, default: DEFAULT_CURRENCY },
} as const;

function searchOptions(args: {
  adults?: string;
  children?: string;
  infants?: string;
  class?: string;
  nonstop?: boolean;
  "max-price"?: string;
  currency?: string;
}): FlightSearchOptions {
  return {
    adults: intArg("adults", args.adults) ?? 1,
    children: intArg("children", args.children, { allowZero: true }),
    infants: intArg("infants", args.infants, { allowZero: true }),
    travelClass: oneOf("class", args.class, TRAVEL_CLASSES),
    nonStop: args.nonstop === true,
    maxPrice: intArg("max-price", args["max-price"]),
    currency: (args.currency || DEFAULT_CURRENCY).toUpperCase(),
  };
}

/** --dates wins; otherwise --start/--end (both required) with the weekday filter. */
export function selectDates(args: {
  dates?: string;
  start?: string;
  end?: string;
  weekendsOnly?: boolean;
  weekdaysOnly?: boolean;
}): string[] {
  const filter = resolveDateFilter({ weekendsOnly: args.weekendsOnly, weekdaysOnly: args.weekdaysOnly });

  if (args.dates) {
    if (args.start || args.end) throw new ValidationError("--dates cannot be combined with --start/--end");
    return parseDateList(args.dates);
  }
  if (args.start && !args.end) throw new ValidationError("--start requires --end");
  if (args.end && !args.start) throw new ValidationError("--end requires --start");
  if (!args.start || !args.end) throw new ValidationError("Provide --dates or --start and --end");

  return generateDateRange(args.start, args.end, filter);
}

function checkedDate(value: string): string {
  parseIsoDate(value);
  return value.trim();
}

const search = defineCommand({
  meta: { name: "search", description: "Search flight offers" },
  args: {
    from: { type: "string", description: "Origin airport code (e.g., LHR)", required: true },
    to: { type: "string", description: "Destination airport code (e.g., BCN)", required: true },
    date: { type: "string", description: "Departure date (YYYY-MM-DD)", required: true },
    return: { type: "string", description: "Return date for round trip (YYYY-MM-DD)" },
    max: { type: "string", description: "Max results (default: 20)", default: "20" },
    ...passengerArgs,
    ...formatArgs,
  },
  async run({ args }) {
    await runTool(
      args.format,
      async ({ amadeus }) =>
        await amadeus.searchFlightOffers({
          ...searchOptions(args),
          origin: args.from,
          destination: args.to,
          departureDate: checkedDate(args.date),
          returnDate: args.return ? checkedDate(args.return) : undefined,
          max: intArg("max", args.max),
        }),
      (res) => formatOffers(res),
    );
  },
});

const price = defineCommand({
  meta: { name: "price", description: "Confirm pricing for a flight offer before booking" },
  args: {
    offer: { type: "string", description: "Flight offer JSON (from search results)", required: true },
    ...formatArgs,
  },
  async run({ args }) {
    await runTool(
      args.format,
      async ({ amadeus }) => await amadeus.confirmPrice(parseOffers(args.offer)),
      formatPricing,
    );
  },
});

export function parseOffers(json: string): unknown[] {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch {
    throw new ValidationError("Invalid JSON in --offer");
  }
  if (Array.isArray(value)) return value;
  if (value !== null && typeof value === "object") return [value];
  throw new ValidationError("--offer must be a flight offer object or an array of them");
}

const compare = defineCommand({
  meta: { name: "compare", description: "Compare flight prices across multiple dates" },
  args: {
    from: { type: "string", description: "Origin airport code", required: true },
    to: { type: "string", description: "Destination airport code", required: true },
    dates: { type: "string", description: "Comma-separated dates (YYYY-MM-DD)" },
    start: { type: "string", description: "Start of date range (use with --end)" },
    end: { type: "string", description: "End of date range (use with --start)" },
    "weekends-only": { type: "boolean", description: "Only check Saturdays and Sundays", default: false },
    "weekdays-only": { type: "boolean", description: "Only check Monday-Friday", default: false },
    "return-after": { type: "string", description: "Days after departure for the return flight" },
    concurrency: { type: "string", description: "Searches in flight at once (default: 1)", default: "1" },
    ...passengerArgs,
    ...formatArgs,
  },
  async run({ args }) {
    await runTool(
      args.format,
      async ({ amadeus, logger }) => {
        const dates = selectDates({
          dates: args.dates,
          start: args.start,
          end: args.end,
          weekendsOnly: args["weekends-only"],
          weekdaysOnly: args["weekdays-only"],
        });
        if (!dates.length) throw new ValidationError("No dates to compare");
        if (dates.length > LARGE_COMPARISON_DATES) {
          logger.warn({ dates: dates.length }, "comparing this many dates may take a while");
        }

        return await compareDates({
          origin: args.from.toUpperCase(),
          destination: args.to.toUpperCase(),
          dates,
          returnAfterDays: intArg("return-after", args["return-after"]),
          search: (q) => amadeus.searchFlightOffers(q),
          params: searchOptions(args),
          concurrency: intArg("concurrency", args.concurrency),
          logger: logger.child({ module: "compare" }),
        });
      },
      formatComparison,
    );
  },
});

const dateSearchArgs = {
  date: { type: "string", description: "Departure date or range (YYYY-MM-DD or YYYY-MM-DD,YYYY-MM-DD)" },
  "one-way": { type: "boolean", description: "One-way flights only", default: false },
  "round-trip": { type: "boolean", description: "Round-trip flights only", default: false },
  duration: { type: "string", description: "Trip duration in days" },
  nonstop: { type: "boolean", description: "Direct flights only", default: false },
  "max-price": { type: "string", description: "Maximum ticket price" },
  "view-by": { type: "string", description: "Group results: DATE, DESTINATION, DURATION, WEEK, COUNTRY" },
  currency: { type: "string", description: `Currency code (default: ${DEFAULT_CURRENCY})`, default: DEFAULT_CURRENCY },
} as const;

function dateSearchOptions(args: {
  date?: string;
  "one-way"?: boolean;
  "round-trip"?: boolean;
  duration?: string;
  nonstop?: boolean;
  "max-price"?: string;
  "view-by"?: string;
  currency?: string;
}) {
  if (args["one-way"] && args["round-trip"]) {
    throw new ValidationError("--one-way and --round-trip cannot be combined");
  }
  return {
    departureDate: args.date || undefined,
    oneWay: args["one-way"] ? true : args["round-trip"] ? false : undefined,
    duration: intArg("duration", args.duration),
    nonStop: args.nonstop === true,
    maxPrice: floatArg("max-price", args["max-price"]),
    viewBy: args["view-by"] || undefined,
    currency: (args.currency || DEFAULT_CURRENCY).toUpperCase(),
  };
}

const cheapestDates = defineCommand({
  meta: { name: "cheapest-dates", description: "Find the cheapest dates to fly a route" },
  args: {
    origin: { type: "string", alias: "o", description: "Origin airport IATA code", required: true },
    destination: { type: "string", alias: "d", description: "Destination airport IATA code", required: true },
    ...dateSearchArgs,
    ...formatArgs,
  },
  async run({ args }) {
    const options = { origin: args.origin, destination: args.destination };
    await runTool(
      args.format,
      async ({ amadeus }) => await amadeus.findCheapestDates({ ...dateSearchOptions(args), ...options }),
      (res) => formatFlightDates(res, (args.currency || DEFAULT_CURRENCY).toUpperCase()),
    );
  },
});

const inspiration = defineCommand({
  meta: { name: "inspiration", description: "Find the cheapest destinations from an origin" },
  args: {
    origin: { type: "string", alias: "o", description: "Origin airport IATA code", required: true },
    ...dateSearchArgs,
    ...formatArgs,
  },
  async run({ args }) {
    await runTool(
      args.format,
      async ({ amadeus }) => await amadeus.findDestinations({ ...dateSearchOptions(args), origin: args.origin }),
      (res) => formatFlightDates(res, (args.currency || DEFAULT_CURRENCY).toUpperCase()),
    );
  },
});

const LOCATION_TYPES = { airport: "AIRPORT", city: "CITY", both: "AIRPORT,CITY" } as const;

const airports = defineCommand({
  meta: { name: "airports", description: "Search airports and cities (find IATA codes)" },
  args: {
    query: { type: "string", alias: "q", description: "City or airport name", required: true },
    type: { type: "string", description: "airport, city or both (default: both)", default: "both" },
    ...formatArgs,
  },
  async run({ args }) {
    await runTool(
      args.format,
      async ({ amadeus }) => {
        const kind = args.type || "both";
        if (kind !== "airport" && kind !== "city" && kind !== "both") {
          throw new ValidationError("--type must be airport, city or both");
        }
        return await amadeus.searchLocations(args.query, LOCATION_TYPES[kind]);
      },
      formatLocations,
    );
  },
});

const routes = defineCommand({
  meta: { name: "routes", description: "Direct destinations served by an airport" },
  args: {
    airport: { type: "string", alias: "a", description: "Airport IATA code", required: true },
    max: { type: "string", description: "Maximum results (default: 100)", default: "100" },
    ...formatArgs,
  },
  async run({ args }) {
    await runTool(
      args.format,
      async ({ amadeus }) => await amadeus.airportDestinations(args.airport, intArg("max", args.max)),
      (res) => formatDestinations(res, `🌍 Direct destinations from ${args.airport.toUpperCase()}`),
    );
  },
});

const airlineRoutes = defineCommand({
  meta: { name: "airline-routes", description: "Destinations served by an airline" },
  args: {
    airline: { type: "string", alias: "a", description: "Airline IATA code", required: true },
    max: { type: "string", description: "Maximum results (default: 100)", default: "100" },
    ...formatArgs,
  },
  async run({ args }) {
    await runTool(
      args.format,
      async ({ amadeus }) => await amadeus.airlineDestinations(args.airline, intArg("max", args.max)),
      (res) => formatDestinations(res, `✈️  ${args.airline.toUpperCase()} flies to`),
    );
  },
});

const airlines = defineCommand({
  meta: { name: "airlines", description: "Look up airlines by IATA/ICAO code" },
  args: {
    code: { type: "string", alias: "c", description: "Airline code(s), comma-separated (e.g., BA,IB,VY)", required: true },
    ...formatArgs,
  },
  async run({ args }) {
    await runTool(args.format, async ({ amadeus }) => await amadeus.lookupAirlines(args.code), formatAirlines);
  },
});

const checkin = defineCommand({
  meta: { name: "checkin", description: "Airline check-in links" },
  args: {
    airline: { type: "string", alias: "a", description: "Airline IATA code", required: true },
    language: { type: "string", alias: "l", description: "Language code (default: en)", default: "en" },
    ...formatArgs,
  },
  async run({ args }) {
    await runTool(
      args.format,
      async ({ amadeus }) => await amadeus.checkinLinks(args.airline, args.language || "en"),
      formatCheckinLinks,
    );
  },
});

const delay = defineCommand({
  meta: { name: "delay", description: "Predict the delay probability of a flight" },
  args: {
    origin: { type: "string", alias: "o", description: "Origin airport IATA code", required: true },
    destination: { type: "string", alias: "d", description: "Destination airport IATA code", required: true },
    date: { type: "string", description: "Departure date (YYYY-MM-DD)", required: true },
    time: { type: "string", description: "Local departure time (HH:MM)", required: true },
    carrier: { type: "string", alias: "c", description: "Airline IATA code", required: true },
    number: { type: "string", alias: "n", description: "Flight number", required: true },
    aircraft: { type: "string", description: "Aircraft type code" },
    duration: { type: "string", description: "Flight duration in minutes" },
    ...formatArgs,
  },
  async run({ args }) {
    await runTool(
      args.format,
      async ({ amadeus }) => {
        if (!/^\d{2}:\d{2}(:\d{2})?$/.test(args.time)) throw new ValidationError("--time must be HH:MM");
        return await amadeus.predictDelay({
          origin: args.origin,
          destination: args.destination,
          departureDate: checkedDate(args.date),
          departureTime: args.time,
          carrier: args.carrier,
          flightNumber: args.number,
          aircraftCode: args.aircraft || undefined,
          durationMinutes: intArg("duration", args.duration),
        });
      },
      formatDelayPrediction,
    );
  },
});

export const flightCommands = {
  search,
  price,
  compare,
  "cheapest-dates": cheapestDates,
  inspiration,
  airports,
  routes,
  "airline-routes": airlineRoutes,
  airlines,
  checkin,
  delay,
};
