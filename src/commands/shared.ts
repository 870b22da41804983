// commands/shared.ts

import type { ArgsDef } from "citty";
import { z } from "zod";

import { AmadeusClient } from "../amadeus.ts";
import { loadConfig, readCredentials, type AppConfig } from "../config.ts";
import { RequestDispatcher } from "../dispatcher.ts";
import { TravelApiError, ValidationError, errorMessage } from "../errors.ts";
import { createLogger, type Logger } from "../logger.ts";
import { FileTokenStore, TokenManager } from "../token.ts";

export interface ToolContext {
  config: AppConfig;
  logger: Logger;
  tokens: TokenManager;
  amadeus: AmadeusClient;
}

export function createContext(env: NodeJS.ProcessEnv = process.env): ToolContext {
  const config = loadConfig(env);
  const logger = createLogger({ level: config.logLevel });

  const tokens = new TokenManager({
    baseUrl: config.baseUrl,
    store: new FileTokenStore({ filePath: config.tokenFile }),
    credentials: () => readCredentials(env),
    logger: logger.child({ module: "token" }),
  });
  const http = new RequestDispatcher({
    baseUrl: config.baseUrl,
    tokens,
    logger: logger.child({ module: "http" }),
  });

  return { config, logger, tokens, amadeus: new AmadeusClient(http) };
}

export const formatArgs = {
  format: {
    type: "string",
    description: "Output format: json or human (default: json)",
    default: "json",
  },
} satisfies ArgsDef;

export type OutputFormat = "json" | "human";

export function parseFormat(value: string | undefined): OutputFormat {
  if (value === undefined || value === "json") return "json";
  if (value === "human") return "human";
  throw new ValidationError(`--format must be json or human, got "${value}"`);
}

/**
 * Runs one tool invocation: builds the context, calls the API, prints JSON
 * or the human rendering. Failures print "Error: ..." and exit non-zero.
 */
export async function runTool<T>(
  format: string | undefined,
  call: (ctx: ToolContext) => Promise<T>,
  human: (data: T) => string,
): Promise<void> {
  try {
    const out = parseFormat(format);
    const data = await call(createContext());
    console.log(renderOutput(out, data, human));
  } catch (e) {
    console.error(`Error: ${errorMessage(e)}`);
    process.exitCode = 1;
  }
}

/** A 2xx with an empty body parses to null; neither renderer can use it. */
export function renderOutput<T>(format: OutputFormat, data: T | null | undefined, human: (data: T) => string): string {
  if (data === null || data === undefined) throw new TravelApiError("The API returned an empty response");
  return format === "human" ? human(data) : JSON.stringify(data, null, 2);
}

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();
const finiteNumber = z.coerce.number().finite();

function numberArg(schema: z.ZodNumber, expected: string, name: string, value: string | undefined): number | undefined {
  if (value === undefined || value === "") return undefined;
  const parsed = schema.safeParse(value);
  if (!parsed.success) throw new ValidationError(`--${name} must be ${expected}, got "${value}"`);
  return parsed.data;
}

export function intArg(name: string, value: string | undefined, opts: { allowZero?: boolean } = {}): number | undefined {
  return opts.allowZero
    ? numberArg(nonNegativeInt, "a whole number", name, value)
    : numberArg(positiveInt, "a positive whole number", name, value);
}

export function floatArg(name: string, value: string | undefined): number | undefined {
  return numberArg(finiteNumber, "a number", name, value);
}

export function oneOf<T extends string>(name: string, value: string | undefined, allowed: readonly T[]): T | undefined {
  if (value === undefined || value === "") return undefined;
  const match = allowed.find((a) => a === value.toUpperCase());
  if (!match) throw new ValidationError(`--${name} must be one of ${allowed.join(", ")}`);
  return match;
}
