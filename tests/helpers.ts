// Shared fakes for the unit tests. Nothing here touches the network.

import { vi } from "vitest";

import type { AccessTokenProvider } from "../src/token.ts";

export interface RecordedCall {
  url: string;
  init: RequestInit | undefined;
}

/** A fetch that answers from a queue; an Error in the queue is thrown instead. */
export function queuedFetch(responses: Array<Response | Error>) {
  const calls: RecordedCall[] = [];
  const fetchFn: typeof fetch = async (input, init) => {
    calls.push({ url: String(input), init });
    const next = responses.shift();
    if (!next) throw new Error("no response queued");
    if (next instanceof Error) throw next;
    return next;
  };
  return { fetch: fetchFn, calls };
}

export function jsonResponse(status: number, body: unknown, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

export function fakeTokens(token = "test-token") {
  const getAccessToken = vi.fn(async () => token);
  const invalidate = vi.fn(async () => {});
  const provider: AccessTokenProvider = { getAccessToken, invalidate };
  return { provider, getAccessToken, invalidate };
}

/** A response whose body stream fails after the first chunk. */
export function brokenBody(error: Error, status = 200): Response {
  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(new TextEncoder().encode('{"data":['));
      controller.error(error);
    },
  });
  return new Response(stream, { status });
}

export function timeoutError(): Error {
  const e = new Error("The operation was aborted due to timeout");
  e.name = "TimeoutError";
  return e;
}
