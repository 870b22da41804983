// commands/experiences.ts

import { defineCommand } from "citty";

import type { BoundingSquare, PoiCategory } from "../amadeus.ts";
import { CITY_COORDS, getCityCoords } from "../config.ts";
import { ValidationError } from "../errors.ts";
import { formatActivities, formatPointsOfInterest } from "../format.ts";
import { floatArg, formatArgs, oneOf, runTool } from "./shared.ts";

export type SearchArea =
  | { kind: "point"; latitude: number; longitude: number }
  | { kind: "square"; square: BoundingSquare };

interface AreaArgs {
  lat?: string;
  lng?: string;
  city?: string;
  north?: string;
  south?: string;
  east?: string;
  west?: string;
}

const areaArgs = {
  lat: { type: "string", description: "Latitude" },
  lng: { type: "string", description: "Longitude" },
  city: { type: "string", description: `City name (${Object.keys(CITY_COORDS).join(", ")})` },
  north: { type: "string", description: "North latitude of a bounding box" },
  south: { type: "string", description: "South latitude of a bounding box" },
  east: { type: "string", description: "East longitude of a bounding box" },
  west: { type: "string", description: "West longitude of a bounding box" },
} as const;

/** A bounding box wins over --city, which wins over --lat/--lng. */
export function resolveArea(args: AreaArgs): SearchArea {
  const box = [args.north, args.south, args.east, args.west];
  if (box.some((v) => v)) {
    const [north, south, east, west] = (["north", "south", "east", "west"] as const).map((name) =>
      floatArg(name, args[name]),
    );
    if (north === undefined || south === undefined || east === undefined || west === undefined) {
      throw new ValidationError("A bounding box needs --north, --south, --east and --west");
    }
    return { kind: "square", square: { north, south, east, west } };
  }

  if (args.city) {
    const coords = getCityCoords(args.city);
    if (!coords) {
      throw new ValidationError(`Unknown city "${args.city}". Known: ${Object.keys(CITY_COORDS).join(", ")}`);
    }
    return { kind: "point", latitude: coords[0], longitude: coords[1] };
  }

  const latitude = floatArg("lat", args.lat);
  const longitude = floatArg("lng", args.lng);
  if (latitude === undefined || longitude === undefined) {
    throw new ValidationError("Provide --lat and --lng, --city, or a bounding box");
  }
  return { kind: "point", latitude, longitude };
}

const activities = defineCommand({
  meta: { name: "activities", description: "Find tours and activities at a destination" },
  args: {
    ...areaArgs,
    radius: { type: "string", description: "Search radius in km (default: 5)", default: "5" },
    id: { type: "string", description: "Fetch one activity by ID" },
    ...formatArgs,
  },
  async run({ args }) {
    await runTool(
      args.format,
      async ({ amadeus }) => {
        if (args.id) return await amadeus.getActivity(args.id);
        const area = resolveArea(args);
        return area.kind === "square"
          ? await amadeus.searchActivitiesBySquare(area.square)
          : await amadeus.searchActivities(area.latitude, area.longitude, floatArg("radius", args.radius));
      },
      (res) => formatActivities(res),
    );
  },
});

const POI_CATEGORIES: readonly PoiCategory[] = ["SIGHTS", "NIGHTLIFE", "RESTAURANT", "SHOPPING"];

export function parseCategories(value: string | undefined): PoiCategory[] | undefined {
  if (!value) return undefined;
  return value
    .split(",")
    .map((c) => c.trim())
    .filter((c) => c.length > 0)
    .map((c) => oneOf("categories", c, POI_CATEGORIES))
    .filter((c): c is PoiCategory => c !== undefined);
}

const poi = defineCommand({
  meta: { name: "poi", description: "Find points of interest: sights, restaurants, nightlife, shopping" },
  args: {
    ...areaArgs,
    radius: { type: "string", description: "Search radius in km (default: 2)", default: "2" },
    categories: { type: "string", description: "Comma-separated: SIGHTS, NIGHTLIFE, RESTAURANT, SHOPPING" },
    ...formatArgs,
  },
  async run({ args }) {
    await runTool(
      args.format,
      async ({ amadeus }) => {
        const area = resolveArea(args);
        const categories = parseCategories(args.categories);
        return area.kind === "square"
          ? await amadeus.searchPointsOfInterestBySquare(area.square, categories)
          : await amadeus.searchPointsOfInterest(area.latitude, area.longitude, floatArg("radius", args.radius), categories);
      },
      (res) => formatPointsOfInterest(res),
    );
  },
});

export const experienceCommands = { activities, poi };
