import { describe, expect, it, vi } from "vitest";

import { RequestDispatcher, firstErrorDetail, unwrapOutcome } from "../src/dispatcher.ts";
import { ClientError, HttpError, NetworkError, RetriesExhaustedError } from "../src/errors.ts";
import { createSilentLogger } from "../src/logger.ts";
import { brokenBody, fakeTokens, jsonResponse, queuedFetch, timeoutError } from "./helpers.ts";

const BASE_URL = "https://test.api.amadeus.com";

function setup(responses: Array<Response | Error>) {
  const fake = queuedFetch(responses);
  const tokens = fakeTokens();
  const sleep = vi.fn(async (_ms: number) => {});
  const http = new RequestDispatcher({
    baseUrl: BASE_URL,
    tokens: tokens.provider,
    fetch: fake.fetch,
    sleep,
    logger: createSilentLogger(),
  });
  return { http, calls: fake.calls, sleep, tokens };
}

function rateLimited(headers: Record<string, string> = {}): Response {
  return new Response(null, { status: 429, headers });
}

describe("RequestDispatcher", () => {
  it("returns the parsed body on success", async () => {
    const { http, calls } = setup([jsonResponse(200, { data: [{ id: "1" }] })]);

    const outcome = await http.execute("GET", "/v1/reference-data/airlines", { params: { airlineCodes: "BA" } });

    expect(outcome).toEqual({ kind: "success", status: 200, body: { data: [{ id: "1" }] } });
    expect(calls[0].url).toBe(`${BASE_URL}/v1/reference-data/airlines?airlineCodes=BA`);
  });

  it("sends the bearer token and JSON accept header", async () => {
    const { http, calls } = setup([jsonResponse(200, {})]);

    await http.get("/v1/airline/destinations");

    const headers = new Headers(calls[0].init?.headers);
    expect(headers.get("authorization")).toBe("Bearer test-token");
    expect(headers.get("accept")).toBe("application/json");
    expect(headers.get("content-type")).toBeNull();
  });

  it("serializes POST bodies as JSON", async () => {
    const { http, calls } = setup([jsonResponse(200, {})]);

    await http.post("/v1/shopping/transfer-offers", { passengers: 2 });

    expect(calls[0].init?.method).toBe("POST");
    expect(calls[0].init?.body).toBe('{"passengers":2}');
    expect(new Headers(calls[0].init?.headers).get("content-type")).toBe("application/json");
  });

  it("leaves out query parameters that are undefined or null", async () => {
    const { http, calls } = setup([jsonResponse(200, {})]);

    await http.get("/v1/x", { a: "1", b: undefined, c: null, d: 2, e: false });

    expect(calls[0].url).toBe(`${BASE_URL}/v1/x?a=1&d=2&e=false`);
  });

  it("backs off 1s then 2s and gives up after three rate-limited attempts", async () => {
    const { http, calls, sleep } = setup([rateLimited(), rateLimited(), rateLimited()]);

    const outcome = await http.execute("GET", "/v2/shopping/flight-offers");

    expect(outcome).toEqual({ kind: "rate_limited", attempts: 3, retryAfterMs: null });
    expect(calls).toHaveLength(3);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  });

  it("succeeds when a retry gets through", async () => {
    const { http, sleep } = setup([rateLimited(), jsonResponse(200, { data: [] })]);

    expect(await http.get("/v2/shopping/flight-offers")).toEqual({ data: [] });
    expect(sleep.mock.calls).toEqual([[1000]]);
  });

  it("throws RetriesExhaustedError carrying the server's Retry-After hint", async () => {
    const { http } = setup([rateLimited(), rateLimited(), rateLimited({ "Retry-After": "5" })]);

    const err = await http.get("/v2/shopping/flight-offers").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RetriesExhaustedError);
    expect(err).toHaveProperty("attempts", 3);
    expect(err).toHaveProperty("retryAfterMs", 5000);
    expect(err).toHaveProperty("message", "Max retries exceeded due to rate limiting (3 attempts)");
  });

  it("does not retry a 401 and drops the cached token", async () => {
    const { http, calls, sleep, tokens } = setup([jsonResponse(401, { errors: [{ title: "Unauthorized" }] })]);

    const outcome = await http.execute("GET", "/v1/reference-data/locations");

    expect(outcome).toEqual({ kind: "auth_failure", status: 401 });
    expect(calls).toHaveLength(1);
    expect(sleep).not.toHaveBeenCalled();
    expect(tokens.invalidate).toHaveBeenCalledTimes(1);
  });

  it("uses the first error detail of a 400", async () => {
    const payload = { errors: [{ status: 400, code: 477, title: "INVALID FORMAT", detail: "Invalid date" }] };
    const { http } = setup([jsonResponse(400, payload)]);

    const outcome = await http.execute("GET", "/v2/shopping/flight-offers");

    expect(outcome).toEqual({ kind: "client_error", status: 400, detail: "Invalid date", payload });
  });

  it("falls back to the raw body when a 400 has no structured detail", async () => {
    const { http } = setup([new Response("bad input", { status: 400 })]);

    const err = await http.get("/v2/shopping/flight-offers").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ClientError);
    expect(err).toHaveProperty("message", "Bad request: bad input");
  });

  it("returns other failures as http_error without retrying", async () => {
    const payload = { errors: [{ title: "SYSTEM ERROR" }] };
    const { http, calls } = setup([jsonResponse(500, payload)]);

    const outcome = await http.execute("GET", "/v1/shopping/flight-dates");

    expect(outcome).toEqual({ kind: "http_error", status: 500, payload });
    expect(calls).toHaveLength(1);
  });

  it("reports transport failures as network errors", async () => {
    const { http } = setup([new TypeError("fetch failed")]);

    expect(await http.execute("GET", "/v1/x")).toEqual({
      kind: "network_error",
      code: "network",
      message: "fetch failed",
    });
  });

  it("reports aborted requests as timeouts", async () => {
    const { http } = setup([timeoutError()]);

    const err = await http.request("GET", "/v1/x", { timeoutMs: 5000 }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(NetworkError);
    expect(err).toHaveProperty("code", "timeout");
    expect(err).toHaveProperty("message", "Request timed out after 5000ms");
  });
});

describe("RequestDispatcher body reads", () => {
  it("turns a timeout during the download into a network_error outcome", async () => {
    const { http } = setup([brokenBody(timeoutError())]);

    expect(await http.execute("GET", "/v2/shopping/flight-offers", { timeoutMs: 60_000 })).toEqual({
      kind: "network_error",
      code: "timeout",
      message: "Request timed out after 60000ms",
    });
  });

  it("turns a connection reset during the download into a network_error outcome", async () => {
    const { http } = setup([brokenBody(new TypeError("terminated"), 500)]);

    expect(await http.execute("GET", "/v1/x")).toEqual({ kind: "network_error", code: "network", message: "terminated" });
  });

  it("surfaces a failed download as NetworkError from request()", async () => {
    const { http } = setup([brokenBody(new TypeError("terminated"))]);

    const err = await http.get("/v1/x").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(NetworkError);
    expect(err).toHaveProperty("code", "network");
  });
});

describe("unwrapOutcome", () => {
  it("turns http_error into HttpError", () => {
    expect(() => unwrapOutcome({ kind: "http_error", status: 502, payload: "Bad Gateway" })).toThrow(HttpError);
  });
});

describe("firstErrorDetail", () => {
  it("reads errors[0].detail", () => {
    expect(firstErrorDetail({ errors: [{ detail: "first" }, { detail: "second" }] })).toBe("first");
  });

  it("returns undefined for anything else", () => {
    expect(firstErrorDetail("plain text")).toBeUndefined();
    expect(firstErrorDetail({ errors: [] })).toBeUndefined();
    expect(firstErrorDetail(null)).toBeUndefined();
  });
});
