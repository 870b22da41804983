// token.ts

import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";

import {
  AUTH_TIMEOUT_MS,
  DEFAULT_TOKEN_TTL_SEC,
  TOKEN_EXPIRY_BUFFER_MS,
  type Credential,
} from "./config.ts";
import { AuthFailureError, HttpError, NetworkError, errorMessage, isTimeoutError } from "./errors.ts";
import type { Logger } from "./logger.ts";

export interface CachedToken {
  accessToken: string;
  tokenType: string;
  expiresIn: number; // seconds, as granted
  expiresAt: number; // epoch ms
}

export interface TokenStore {
  load(): Promise<CachedToken | null>;
  save(token: CachedToken): Promise<void>;
  clear(): Promise<void>;
}

export function isTokenUsable(token: CachedToken, nowMs: number): boolean {
  return token.expiresAt > nowMs + TOKEN_EXPIRY_BUFFER_MS;
}

// On-disk shape; expires_at is epoch seconds.
const TokenFileSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().default("Bearer"),
  expires_in: z.number().default(DEFAULT_TOKEN_TTL_SEC),
  expires_at: z.number(),
});

export class FileTokenStore implements TokenStore {
  private readonly filePath: string;

  constructor(args: { filePath: string }) {
    this.filePath = args.filePath;
  }

  async load(): Promise<CachedToken | null> {
    let text: string;
    try {
      text = await readFile(this.filePath, "utf8");
    } catch {
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      return null;
    }

    const parsed = TokenFileSchema.safeParse(raw);
    if (!parsed.success) return null;

    return {
      accessToken: parsed.data.access_token,
      tokenType: parsed.data.token_type,
      expiresIn: parsed.data.expires_in,
      expiresAt: parsed.data.expires_at * 1000,
    };
  }

  async save(token: CachedToken): Promise<void> {
    const row = {
      access_token: token.accessToken,
      token_type: token.tokenType,
      expires_in: token.expiresIn,
      expires_at: token.expiresAt / 1000,
    };
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, JSON.stringify(row, null, 2));
  }

  async clear(): Promise<void> {
    await rm(this.filePath, { force: true });
  }
}

export class MemoryTokenStore implements TokenStore {
  private token: CachedToken | null;

  constructor(initial: CachedToken | null = null) {
    this.token = initial;
  }

  async load(): Promise<CachedToken | null> {
    return this.token;
  }

  async save(token: CachedToken): Promise<void> {
    this.token = { ...token };
  }

  async clear(): Promise<void> {
    this.token = null;
  }
}

/** What the dispatcher needs from token management. */
export interface AccessTokenProvider {
  getAccessToken(): Promise<string>;
  invalidate(): Promise<void>;
}

const TokenResponseSchema = z.object({
  access_token: z.string().optional(),
  token_type: z.string().optional(),
  expires_in: z.union([z.number(), z.string()]).optional(),
  error: z.string().optional(),
});

export class TokenManager implements AccessTokenProvider {
  private readonly baseUrl: string;
  private readonly store: TokenStore;
  private readonly credentials: () => Credential;
  private readonly fetchFn: typeof fetch;
  private readonly now: () => number;
  private readonly timeoutMs: number;
  private readonly logger: Logger | undefined;

  private inflight: Promise<CachedToken> | null = null;

  constructor(args: {
    baseUrl: string;
    store: TokenStore;
    credentials: () => Credential;
    fetch?: typeof fetch;
    now?: () => number;
    timeoutMs?: number;
    logger?: Logger;
  }) {
    this.baseUrl = args.baseUrl.replace(/\/+$/, "");
    this.store = args.store;
    this.credentials = args.credentials;
    this.fetchFn = args.fetch ?? fetch;
    this.now = args.now ?? Date.now;
    this.timeoutMs = args.timeoutMs ?? AUTH_TIMEOUT_MS;
    this.logger = args.logger;
  }

  async getAccessToken(): Promise<string> {
    const cached = await this.store.load();
    if (cached && isTokenUsable(cached, this.now())) {
      this.logger?.debug("using cached access token");
      return cached.accessToken;
    }

    // Concurrent callers wait on the same exchange.
    if (!this.inflight) {
      this.inflight = this.refresh().finally(() => {
        this.inflight = null;
      });
    }
    const token = await this.inflight;
    return token.accessToken;
  }

  async invalidate(): Promise<void> {
    await this.store.clear();
  }

  private async refresh(): Promise<CachedToken> {
    const { clientId, clientSecret } = this.credentials();

    const url = `${this.baseUrl}/v1/security/oauth2/token`;
    const body = new URLSearchParams({
      grant_type: "client_credentials",
      client_id: clientId,
      client_secret: clientSecret,
    });

    let res: Response;
    try {
      res = await this.fetchFn(url, {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (e) {
      throw this.transportFailure(e);
    }

    let text: string;
    try {
      text = await res.text();
    } catch (e) {
      throw this.transportFailure(e);
    }
    const json = parseJsonOrNull(text);
    const parsed = TokenResponseSchema.safeParse(json ?? {});
    const data: z.infer<typeof TokenResponseSchema> = parsed.success ? parsed.data : {};

    if (res.status === 401 || (res.status === 400 && data.error === "invalid_client")) {
      throw new AuthFailureError(
        "Authentication failed. Check AMADEUS_API_KEY and AMADEUS_API_SECRET.",
        res.status,
      );
    }
    if (!res.ok) throw new HttpError(res.status, json ?? text);

    const accessToken = data.access_token ?? "";
    if (!accessToken) throw new AuthFailureError("Auth response missing access_token", res.status);

    const granted = Number(data.expires_in ?? DEFAULT_TOKEN_TTL_SEC);
    const expiresIn = Number.isFinite(granted) ? granted : DEFAULT_TOKEN_TTL_SEC;
    const token: CachedToken = {
      accessToken,
      tokenType: data.token_type ?? "Bearer",
      expiresIn,
      expiresAt: this.now() + expiresIn * 1000,
    };

    await this.store.save(token);
    this.logger?.info({ expiresIn }, "obtained new access token");
    return token;
  }

  private transportFailure(e: unknown): NetworkError {
    if (isTimeoutError(e)) {
      return new NetworkError("timeout", `Token request timed out after ${this.timeoutMs}ms`, { cause: e });
    }
    return new NetworkError("network", `Token request failed: ${errorMessage(e)}`, { cause: e });
  }
}

export function parseJsonOrNull(text: string): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}
