import { afterEach, describe, expect, it } from "vitest";
import { HttpJsonClient } from "./httpJsonClient";

const originalFetch = globalThis.fetch;

const setFetch = (
  handler: (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>,
): void => {
  globalThis.fetch = handler as typeof fetch;
};

afterEach(() => {
  globalThis.fetch = originalFetch;
});

describe("HttpJsonClient", () => {
  it("parses JSON bodies of successful responses", async () => {
    setFetch(async () => new Response(JSON.stringify([{ a: 1 }]), { status: 200 }));

    const client = new HttpJsonClient();
    const result = await client.getJson({
      url: "https://example.test/ok",
      timeoutMs: 500,
      retries: 0,
      retryDelayMs: 1,
    });

    expect(result._unsafeUnwrap()).toEqual([{ a: 1 }]);
  });

  it("retries retryable failures up to configured attempts", async () => {
    let attempts = 0;

    setFetch(async () => {
      attempts += 1;
      if (attempts < 3) {
        throw new Error("socket reset");
      }

      return new Response(JSON.stringify({ ok: true }), { status: 200 });
    });

    const client = new HttpJsonClient();
    const result = await client.getJson({
      url: "https://example.test/retry",
      timeoutMs: 500,
      retries: 2,
      retryDelayMs: 1,
    });

    expect(result._unsafeUnwrap()).toEqual({ ok: true });
    expect(attempts).toBe(3);
  });

  it("makes a single attempt when retries are disabled", async () => {
    let attempts = 0;
    setFetch(async () => {
      attempts += 1;
      throw new Error("socket reset");
    });

    const client = new HttpJsonClient();
    const result = await client.getJson({
      url: "https://example.test/once",
      timeoutMs: 500,
      retries: 0,
      retryDelayMs: 1,
    });

    expect(result._unsafeUnwrapErr()).toMatchObject({
      code: "transport_error",
      message: "socket reset",
      retryable: true,
    });
    expect(attempts).toBe(1);
  });

  it("maps aborted requests to timeout errors", async () => {
    setFetch(
      async (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;

          if (!signal) {
            reject(new Error("missing abort signal"));
            return;
          }

          signal.addEventListener("abort", () => {
            reject(new DOMException("Aborted", "AbortError"));
          });
        }),
    );

    const client = new HttpJsonClient();
    const result = await client.getJson({
      url: "https://example.test/timeout",
      timeoutMs: 5,
      retries: 0,
      retryDelayMs: 1,
    });

    const error = result._unsafeUnwrapErr();
    expect(error.code).toBe("timeout");
    expect(error.message).toBe("HTTP request timed out after 5ms.");
    expect(error.retryable).toBe(true);
  });

  it("maps non-success statuses with the body and retryability", async () => {
    setFetch(async () => new Response("unavailable", { status: 503 }));

    const client = new HttpJsonClient();
    const result = await client.getJson({
      url: "https://example.test/status",
      timeoutMs: 500,
      retries: 0,
      retryDelayMs: 1,
    });

    expect(result._unsafeUnwrapErr()).toEqual({
      code: "non_success_status",
      message: "HTTP request failed with status 503.",
      httpStatus: 503,
      body: "unavailable",
      retryable: true,
    });
  });

  it("maps invalid JSON payloads as non-retryable", async () => {
    setFetch(async () => new Response("not-json", { status: 200 }));

    const client = new HttpJsonClient();
    const result = await client.getJson({
      url: "https://example.test/json",
      timeoutMs: 500,
      retries: 0,
      retryDelayMs: 1,
    });

    const error = result._unsafeUnwrapErr();
    expect(error.code).toBe("invalid_json");
    expect(error.retryable).toBe(false);
  });
});
