// errors.ts

export class TravelApiError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or empty API credentials in the environment. */
export class CredentialError extends TravelApiError {
  missing: string[];
  constructor(missing: string[]) {
    super(`Missing credentials. Set ${missing.join(" and ")}.`);
    this.missing = missing;
  }
}

export class AuthFailureError extends TravelApiError {
  status: number | null;
  constructor(message: string, status: number | null = null) {
    super(message);
    this.status = status;
  }
}

export class RetriesExhaustedError extends TravelApiError {
  attempts: number;
  retryAfterMs: number | null;
  constructor(attempts: number, retryAfterMs: number | null) {
    super(`Max retries exceeded due to rate limiting (${attempts} attempts)`);
    this.attempts = attempts;
    this.retryAfterMs = retryAfterMs;
  }
}

/** HTTP 400 with the first structured error detail from the response. */
export class ClientError extends TravelApiError {
  status: number;
  detail: string;
  constructor(detail: string, status = 400) {
    super(`Bad request: ${detail}`);
    this.status = status;
    this.detail = detail;
  }
}

export class HttpError extends TravelApiError {
  status: number;
  payload: unknown;
  constructor(status: number, payload: unknown) {
    super(`HTTP ${status}`);
    this.status = status;
    this.payload = payload;
  }
}

export type NetworkErrorCode = "timeout" | "network";

export class NetworkError extends TravelApiError {
  code: NetworkErrorCode;
  constructor(code: NetworkErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.code = code;
  }
}

/** Caller mistakes: bad dates, conflicting flags, unusable arguments. */
export class ValidationError extends TravelApiError {}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** AbortSignal.timeout rejects with TimeoutError; a manual abort with AbortError. */
export function isTimeoutError(e: unknown): boolean {
  return e instanceof Error && (e.name === "TimeoutError" || e.name === "AbortError");
}
