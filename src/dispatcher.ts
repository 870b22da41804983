// dispatcher.ts

import { z } from "zod";

import { MAX_ATTEMPTS, READ_TIMEOUT_MS } from "./config.ts";
import {
  AuthFailureError,
  ClientError,
  HttpError,
  NetworkError,
  RetriesExhaustedError,
  errorMessage,
  isTimeoutError,
  type NetworkErrorCode,
} from "./errors.ts";
import type { Logger } from "./logger.ts";
import { parseJsonOrNull, type AccessTokenProvider } from "./token.ts";

export type HttpMethod = "GET" | "POST";

export type QueryParams = Record<string, string | number | boolean | undefined | null>;

export type RequestOutcome<T> =
  | { kind: "success"; status: number; body: T }
  | { kind: "rate_limited"; attempts: number; retryAfterMs: number | null }
  | { kind: "auth_failure"; status: number }
  | { kind: "client_error"; status: number; detail: string; payload: unknown }
  | { kind: "http_error"; status: number; payload: unknown }
  | { kind: "network_error"; code: NetworkErrorCode; message: string };

export interface RetryPolicy {
  maxAttempts: number;
  /** Wait after the given (1-based) attempt was rate limited. */
  backoffMs(attempt: number): number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: MAX_ATTEMPTS,
  backoffMs: (attempt) => 2 ** (attempt - 1) * 1000,
};

export interface RequestOptions {
  params?: QueryParams;
  body?: unknown;
  timeoutMs?: number;
}

const ErrorEnvelopeSchema = z.object({
  errors: z
    .array(
      z.object({
        title: z.string().optional(),
        detail: z.string().optional(),
      }),
    )
    .optional(),
});

export class RequestDispatcher {
  private readonly baseUrl: string;
  private readonly tokens: AccessTokenProvider;
  private readonly fetchFn: typeof fetch;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private readonly retry: RetryPolicy;
  private readonly logger: Logger | undefined;

  constructor(args: {
    baseUrl: string;
    tokens: AccessTokenProvider;
    fetch?: typeof fetch;
    sleep?: (ms: number) => Promise<void>;
    retry?: RetryPolicy;
    logger?: Logger;
  }) {
    this.baseUrl = args.baseUrl.replace(/\/+$/, "");
    this.tokens = args.tokens;
    this.fetchFn = args.fetch ?? fetch;
    this.sleepFn = args.sleep ?? sleep;
    this.retry = args.retry ?? DEFAULT_RETRY_POLICY;
    this.logger = args.logger;
  }

  async get<T>(path: string, params?: QueryParams, timeoutMs?: number): Promise<T> {
    return await this.request<T>("GET", path, { params, timeoutMs });
  }

  async post<T>(path: string, body: unknown, timeoutMs?: number): Promise<T> {
    return await this.request<T>("POST", path, { body, timeoutMs });
  }

  async request<T>(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<T> {
    return unwrapOutcome(await this.execute<T>(method, path, options));
  }

  /**
   * Runs one API call to completion. Rate limiting is retried per the retry
   * policy; every other failure is returned as an outcome on first sight.
   * Credential and token-exchange failures are thrown.
   */
  async execute<T>(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<RequestOutcome<T>> {
    const url = this.buildUrl(path, options.params);
    const timeoutMs = options.timeoutMs ?? READ_TIMEOUT_MS;
    let retryAfterMs: number | null = null;

    for (let attempt = 1; attempt <= this.retry.maxAttempts; attempt++) {
      const token = await this.tokens.getAccessToken();

      const headers: Record<string, string> = {
        Authorization: `Bearer ${token}`,
        Accept: "application/json",
      };
      if (method === "POST") headers["Content-Type"] = "application/json";

      let res: Response;
      try {
        res = await this.fetchFn(url, {
          method,
          headers,
          body: method === "POST" ? JSON.stringify(options.body ?? {}) : undefined,
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (e) {
        return this.transportFailure(e, method, path, timeoutMs);
      }

      if (res.status === 429) {
        retryAfterMs = parseRetryAfter(res.headers.get("retry-after"));
        try {
          await res.body?.cancel();
        } catch (e) {
          return this.transportFailure(e, method, path, timeoutMs);
        }
        if (attempt === this.retry.maxAttempts) break;

        const waitMs = this.retry.backoffMs(attempt);
        this.logger?.warn({ path, attempt, waitMs }, "rate limited, backing off");
        await this.sleepFn(waitMs);
        continue;
      }

      // The timeout signal also covers the body, so a stalled download fails here.
      let text: string;
      try {
        text = await res.text();
      } catch (e) {
        return this.transportFailure(e, method, path, timeoutMs);
      }

      if (res.status === 401) {
        await this.tokens.invalidate();
        return { kind: "auth_failure", status: 401 };
      }

      if (res.status === 400) {
        const payload = parseJsonOrNull(text);
        return { kind: "client_error", status: 400, detail: firstErrorDetail(payload) ?? text, payload };
      }

      if (!res.ok) {
        return { kind: "http_error", status: res.status, payload: parseJsonOrNull(text) ?? text };
      }

      this.logger?.debug({ method, path, status: res.status }, "request ok");
      // Response shapes are described by the caller's type parameter.
      return { kind: "success", status: res.status, body: parseJsonOrNull(text) as T };
    }

    return { kind: "rate_limited", attempts: this.retry.maxAttempts, retryAfterMs };
  }

  private transportFailure(e: unknown, method: HttpMethod, path: string, timeoutMs: number): RequestOutcome<never> {
    this.logger?.error({ method, path, err: errorMessage(e) }, "request failed");
    return isTimeoutError(e)
      ? { kind: "network_error", code: "timeout", message: `Request timed out after ${timeoutMs}ms` }
      : { kind: "network_error", code: "network", message: errorMessage(e) };
  }

  private buildUrl(path: string, params?: QueryParams): string {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(params ?? {})) {
      if (value === undefined || value === null) continue;
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }
}

export function unwrapOutcome<T>(outcome: RequestOutcome<T>): T {
  switch (outcome.kind) {
    case "success":
      return outcome.body;
    case "rate_limited":
      throw new RetriesExhaustedError(outcome.attempts, outcome.retryAfterMs);
    case "auth_failure":
      throw new AuthFailureError(
        "Authentication failed. Check AMADEUS_API_KEY and AMADEUS_API_SECRET.",
        outcome.status,
      );
    case "client_error":
      throw new ClientError(outcome.detail, outcome.status);
    case "http_error":
      throw new HttpError(outcome.status, outcome.payload);
    case "network_error":
      throw new NetworkError(outcome.code, outcome.message);
  }
}

export function firstErrorDetail(payload: unknown): string | undefined {
  const parsed = ErrorEnvelopeSchema.safeParse(payload);
  if (!parsed.success) return undefined;
  return parsed.data.errors?.[0]?.detail;
}

function parseRetryAfter(value: string | null): number | null {
  if (!value) return null;
  const seconds = Number(value);
  return Number.isFinite(seconds) ? seconds * 1000 : null;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}
