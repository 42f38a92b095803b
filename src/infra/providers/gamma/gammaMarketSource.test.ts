import { afterEach, describe, expect, it, vi } from "vitest";
import { GammaMarketSource } from "./gammaMarketSource";

const BASE_URL = "https://gamma.test/";

const respondWith = (body: string, init: ResponseInit) => {
  const mock = vi.fn(async (..._args: Parameters<typeof fetch>) => new Response(body, init));
  vi.stubGlobal("fetch", mock);
  return mock;
};

const fetchFailure = async (slug: string) => {
  const result = await new GammaMarketSource(BASE_URL).fetchMarketGroup(slug);
  if (result.isOk()) {
    throw new Error("expected a failure");
  }
  return result.error;
};

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("GammaMarketSource", () => {
  it("requests the event by slug and returns the raw body", async () => {
    const mock = respondWith('{"slug":"test-index-event"}', { status: 200 });

    const result = await new GammaMarketSource(BASE_URL).fetchMarketGroup(
      "test-index-event",
    );

    expect(result.isOk() && result.value).toBe('{"slug":"test-index-event"}');
    expect(mock.mock.calls[0]?.[0]).toBe(
      "https://gamma.test/events/slug/test-index-event",
    );
  });

  it("rejects an empty slug without a request", async () => {
    const mock = respondWith("", { status: 200 });

    expect(await fetchFailure("  ")).toEqual({
      kind: "market_group_not_found",
      slug: "  ",
    });
    expect(mock).not.toHaveBeenCalled();
  });

  it("maps 404 to a missing market group", async () => {
    respondWith("not found", { status: 404 });

    expect(await fetchFailure("non-existent-market")).toEqual({
      kind: "market_group_not_found",
      slug: "non-existent-market",
    });
  });

  it("maps rejected credentials", async () => {
    respondWith("forbidden", { status: 403 });

    expect(await fetchFailure("test-index-event")).toEqual({
      kind: "authentication_failed",
      reason: "Gamma API rejected the request with status 403",
    });
  });

  it("maps 429 and reads a numeric retry-after header", async () => {
    respondWith("slow down", { status: 429, headers: { "retry-after": "12" } });

    expect(await fetchFailure("test-index-event")).toEqual({
      kind: "rate_limit_exceeded",
      retryAfterSecs: 12,
    });
  });

  it("maps 429 without a usable retry-after header", async () => {
    respondWith("slow down", {
      status: 429,
      headers: { "retry-after": "Wed, 21 Oct 2026 07:28:00 GMT" },
    });

    expect(await fetchFailure("test-index-event")).toEqual({
      kind: "rate_limit_exceeded",
    });
  });

  it("maps gateway statuses to an unavailable service", async () => {
    respondWith("maintenance", { status: 503 });

    expect(await fetchFailure("test-index-event")).toEqual({
      kind: "api_unavailable",
      serviceName: "Gamma",
      reason: "responded with status 503",
    });
  });

  it("leaves other error statuses to the transport", async () => {
    respondWith("boom", { status: 500 });

    expect(await fetchFailure("test-index-event")).toEqual({
      kind: "request_failed",
      status: 500,
      url: "https://gamma.test/events/slug/test-index-event",
      body: "boom",
    });
  });

  it("reports an empty success body as an invalid response", async () => {
    respondWith("null", { status: 200 });

    expect(await fetchFailure("test-index-event")).toEqual({
      kind: "invalid_api_response",
      endpoint: "/events/slug/test-index-event",
      reason: "response body was empty",
      rawSnippet: "null",
    });
  });

  it("passes connection faults through unchanged", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed", { cause: new Error("ENOTFOUND") });
      }),
    );

    expect(await fetchFailure("test-index-event")).toEqual({
      kind: "connection_failed",
      url: "https://gamma.test/events/slug/test-index-event",
      reason: "fetch failed: ENOTFOUND",
    });
  });
});
