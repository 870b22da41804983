// commands/transfers.ts

import { defineCommand } from "citty";

import type { TransferPoint, TransferQuery, TransferType } from "../amadeus.ts";
import { DEFAULT_CURRENCY } from "../config.ts";
import { ValidationError } from "../errors.ts";
import { formatTransfers } from "../format.ts";
import { formatArgs, intArg, oneOf, runTool } from "./shared.ts";

const TRANSFER_TYPES: readonly TransferType[] = ["PRIVATE", "SHARED", "TAXI", "HOURLY", "AIRPORT_EXPRESS", "AIRPORT_BUS"];

export interface TransferArgs {
  from?: string;
  "from-address"?: string;
  "from-city"?: string;
  "from-country"?: string;
  "from-geo"?: string;
  to?: string;
  address?: string;
  city?: string;
  country?: string;
  geo?: string;
  date: string;
  time: string;
  passengers?: string;
  type?: string;
  currency?: string;
}

export function buildTransferQuery(args: TransferArgs): TransferQuery {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(args.date)) throw new ValidationError("--date must be YYYY-MM-DD");
  if (!/^\d{2}:\d{2}$/.test(args.time)) throw new ValidationError("--time must be HH:MM");

  const start: TransferPoint = args.from
    ? { locationCode: args.from }
    : {
        addressLine: args["from-address"],
        cityName: args["from-city"],
        countryCode: args["from-country"],
        geoCode: args["from-geo"],
      };
  if (!start.locationCode && !start.addressLine && !start.geoCode) {
    throw new ValidationError("Provide --from (airport code), --from-address or --from-geo for the pick-up");
  }

  const end: TransferPoint = args.to
    ? { locationCode: args.to }
    : { addressLine: args.address, cityName: args.city, countryCode: args.country, geoCode: args.geo };
  if (!end.locationCode && !end.addressLine && !end.geoCode) {
    throw new ValidationError("Provide --to (airport code), --address or --geo for the drop-off");
  }

  return {
    start,
    end,
    startDateTime: `${args.date}T${args.time}:00`,
    passengers: intArg("passengers", args.passengers),
    transferType: oneOf("type", args.type, TRANSFER_TYPES),
    currency: args.currency || DEFAULT_CURRENCY,
  };
}

const transfers = defineCommand({
  meta: { name: "transfers", description: "Search airport transfers, taxis and shuttles" },
  args: {
    from: { type: "string", description: "Pick-up airport IATA code" },
    "from-address": { type: "string", description: "Pick-up street address (e.g., a hotel)" },
    "from-city": { type: "string", description: "Pick-up city name" },
    "from-country": { type: "string", description: "Pick-up country code (e.g., FR)" },
    "from-geo": { type: "string", description: "Pick-up coordinates as lat,lng" },
    to: { type: "string", description: "Drop-off airport IATA code" },
    address: { type: "string", description: "Drop-off street address" },
    city: { type: "string", description: "Drop-off city name" },
    country: { type: "string", description: "Drop-off country code (e.g., FR)" },
    geo: { type: "string", description: "Drop-off coordinates as lat,lng" },
    date: { type: "string", description: "Pick-up date (YYYY-MM-DD)", required: true },
    time: { type: "string", description: "Pick-up time (HH:MM)", required: true },
    passengers: { type: "string", description: "Number of passengers (default: 1)", default: "1" },
    type: { type: "string", description: "PRIVATE, SHARED, TAXI, HOURLY, AIRPORT_EXPRESS, AIRPORT_BUS" },
    currency: { type: "string", description: `Currency code (default: ${DEFAULT_CURRENCY})`, default: DEFAULT_CURRENCY },
    ...formatArgs,
  },
  async run({ args }) {
    await runTool(
      args.format,
      async ({ amadeus }) => await amadeus.searchTransfers(buildTransferQuery(args)),
      formatTransfers,
    );
  },
});

export const transferCommands = { transfers };
