// config.ts

import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

import { CredentialError } from "./errors.ts";

export type AmadeusEnvironment = "test" | "production";

export const BASE_URLS: Record<AmadeusEnvironment, string> = {
  test: "https://test.api.amadeus.com",
  production: "https://api.amadeus.com",
};

export const DEFAULT_CURRENCY = "GBP";

// Token lifetime
export const TOKEN_EXPIRY_BUFFER_MS = 60_000; // refresh this long before expiry
export const DEFAULT_TOKEN_TTL_SEC = 1799;

// Timeouts
export const AUTH_TIMEOUT_MS = 30_000;
export const READ_TIMEOUT_MS = 30_000; // reference data
export const SEARCH_TIMEOUT_MS = 60_000; // shopping and pricing

// Retry on 429
export const MAX_ATTEMPTS = 3;

// Date comparison
export const COMPARE_MAX_OFFERS = 5;
export const LARGE_COMPARISON_DATES = 31;

export const MAX_FLIGHT_OFFERS = 250;

const DEFAULT_STATE_DIR = fileURLToPath(new URL("../state", import.meta.url));

const EnvSchema = z.object({
  AMADEUS_ENV: z
    .string()
    .optional()
    .transform((v): AmadeusEnvironment => (v?.trim().toLowerCase() === "production" ? "production" : "test")),
  AMADEUS_STATE_DIR: z.string().trim().min(1).optional(),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

export interface AppConfig {
  environment: AmadeusEnvironment;
  baseUrl: string;
  stateDir: string;
  tokenFile: string;
  logLevel: z.infer<typeof EnvSchema>["LOG_LEVEL"];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.parse(env);
  const stateDir = parsed.AMADEUS_STATE_DIR ?? DEFAULT_STATE_DIR;
  return {
    environment: parsed.AMADEUS_ENV,
    baseUrl: BASE_URLS[parsed.AMADEUS_ENV],
    stateDir,
    tokenFile: join(stateDir, `token-${parsed.AMADEUS_ENV}.json`),
    logLevel: parsed.LOG_LEVEL,
  };
}

export interface Credential {
  readonly clientId: string;
  readonly clientSecret: string;
}

export function readCredentials(env: NodeJS.ProcessEnv = process.env): Credential {
  const names = ["AMADEUS_API_KEY", "AMADEUS_API_SECRET"] as const;
  const missing = names.filter((n) => !env[n]?.trim());
  if (missing.length) throw new CredentialError(missing);

  return Object.freeze({
    clientId: env.AMADEUS_API_KEY?.trim() ?? "",
    clientSecret: env.AMADEUS_API_SECRET?.trim() ?? "",
  });
}

// Coordinates for the --city shortcut (latitude, longitude)
export const CITY_COORDS: Record<string, [number, number]> = {
  paris: [48.8566, 2.3522],
  london: [51.5074, -0.1278],
  barcelona: [41.3851, 2.1734],
  rome: [41.9028, 12.4964],
  amsterdam: [52.3676, 4.9041],
  berlin: [52.52, 13.405],
  madrid: [40.4168, -3.7038],
  lisbon: [38.7223, -9.1393],
  prague: [50.0755, 14.4378],
  vienna: [48.2082, 16.3738],
  "new york": [40.7128, -74.006],
  tokyo: [35.6762, 139.6503],
  dubai: [25.2048, 55.2708],
  singapore: [1.3521, 103.8198],
};

export function getCityCoords(city: string): [number, number] | undefined {
  return CITY_COORDS[city.trim().toLowerCase()];
}
