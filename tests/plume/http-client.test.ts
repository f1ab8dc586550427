import { http, HttpResponse } from "msw";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { PlumeTokenCache } from "../../lib/infrastructure/plume/auth/token-cache";
import { PlumeHttpClient, buildUrl } from "../../lib/infrastructure/plume/client/http-client";
import {
  PlumeAuthConfigError,
  PlumeAuthExpiredError,
  PlumeClientError,
  PlumeDecodeError,
  PlumeNetworkError,
  PlumeServerError,
  PlumeTimeoutError,
} from "../../lib/infrastructure/plume/errors";
import type { PlumeCredentials } from "../../lib/infrastructure/plume/types";
import {
  TEST_LOCATION_URL,
  TEST_REPORTS_LOCATION_URL,
  createTestToken,
  testCredentials,
} from "../fixtures/plume-responses";
import { server } from "../setup";

const LOCATION_PATH = "Customers/cust-1/locations/loc-1";

describe("PlumeHttpClient", () => {
  let tokenCache: PlumeTokenCache;
  let client: PlumeHttpClient;
  const issueToken = vi.fn(async (_credentials: PlumeCredentials) => createTestToken());

  beforeEach(() => {
    tokenCache = new PlumeTokenCache({ issueToken });
    tokenCache.setCredentials("U1", testCredentials);
    client = new PlumeHttpClient(tokenCache, { timeoutMs: 2000 });
  });

  it("sends the bearer token and parses JSON", async () => {
    const seen: { authorization?: string | null } = {};
    server.use(
      http.get(TEST_LOCATION_URL, ({ request }) => {
        seen.authorization = request.headers.get("authorization");
        return HttpResponse.json({ id: "loc-1" });
      }),
    );

    const payload = await client.get("U1", LOCATION_PATH);

    expect(payload).toEqual({ id: "loc-1" });
    expect(seen.authorization).toBe("Bearer test-access-token");
  });

  it("sends the method and a JSON body when given", async () => {
    const captured: { contentType?: string | null; body?: unknown } = {};
    server.use(
      http.put(`${TEST_LOCATION_URL}/nodes/node-1`, async ({ request }) => {
        captured.contentType = request.headers.get("content-type");
        captured.body = await request.json();
        return HttpResponse.json({ ok: true });
      }),
    );

    const payload = await client.request("U1", {
      method: "PUT",
      path: `${LOCATION_PATH}/nodes/node-1`,
      body: { nickname: "Kitchen" },
    });

    expect(payload).toEqual({ ok: true });
    expect(captured.contentType).toBe("application/json");
    expect(captured.body).toEqual({ nickname: "Kitchen" });
  });

  it("uses the reports base and query parameters for reports calls", async () => {
    const seen: { query?: URLSearchParams } = {};
    server.use(
      http.get(`${TEST_REPORTS_LOCATION_URL}/onlineStats`, ({ request }) => {
        seen.query = new URL(request.url).searchParams;
        return HttpResponse.json([]);
      }),
    );

    await client.get("U1", `${LOCATION_PATH}/onlineStats`, { granularity: "days", limit: 7, unused: undefined }, true);

    expect(seen.query?.get("granularity")).toBe("days");
    expect(seen.query?.get("limit")).toBe("7");
    expect(seen.query?.has("unused")).toBe(false);
  });

  it("falls back to the primary base when no reports base is stored", async () => {
    tokenCache.setCredentials("U2", { ...testCredentials, reportsApiBaseUrl: undefined });
    server.use(http.get(`${TEST_LOCATION_URL}/wanStats`, () => HttpResponse.json([])));

    await expect(client.get("U2", `${LOCATION_PATH}/wanStats`, undefined, true)).resolves.toEqual([]);
  });

  it("requires stored credentials", async () => {
    await expect(client.get("nobody", LOCATION_PATH)).rejects.toBeInstanceOf(PlumeAuthConfigError);
  });

  it.each([401, 403])("invalidates the token on %i", async (status) => {
    server.use(http.get(TEST_LOCATION_URL, () => HttpResponse.json({ message: "token expired" }, { status })));

    await tokenCache.ensureValidToken("U1");
    expect(tokenCache.isValid("U1")).toBe(true);

    await expect(client.get("U1", LOCATION_PATH)).rejects.toBeInstanceOf(PlumeAuthExpiredError);
    expect(tokenCache.isValid("U1")).toBe(false);
    expect(tokenCache.hasCredentials("U1")).toBe(true);
  });

  it("maps other 4xx responses to PlumeClientError and keeps the token", async () => {
    server.use(http.get(TEST_LOCATION_URL, () => HttpResponse.json({ error: "Location not found" }, { status: 404 })));

    await expect(client.get("U1", LOCATION_PATH)).rejects.toSatisfy(
      (error: unknown) =>
        error instanceof PlumeClientError &&
        error.statusCode === 404 &&
        error.message === "Plume API request failed with status 404: Location not found",
    );
    expect(tokenCache.isValid("U1")).toBe(true);
  });

  it("maps 5xx responses to PlumeServerError with the error message", async () => {
    server.use(
      http.get(TEST_LOCATION_URL, () => HttpResponse.json({ error: { message: "upstream failure" } }, { status: 502 })),
    );

    await expect(client.get("U1", LOCATION_PATH)).rejects.toSatisfy(
      (error: unknown) =>
        error instanceof PlumeServerError &&
        error.message === "Plume API request failed with status 502: upstream failure",
    );
  });

  it("keeps a plain-text error body in the message", async () => {
    server.use(http.get(TEST_LOCATION_URL, () => HttpResponse.text("Service Unavailable", { status: 503 })));

    await expect(client.get("U1", LOCATION_PATH)).rejects.toThrow(
      "Plume API request failed with status 503: Service Unavailable",
    );
  });

  it("returns null for an empty 2xx body", async () => {
    server.use(http.get(TEST_LOCATION_URL, () => new HttpResponse(null, { status: 204 })));

    await expect(client.get("U1", LOCATION_PATH)).resolves.toBeNull();
  });

  it("fails with PlumeDecodeError on a non-JSON 2xx body", async () => {
    server.use(http.get(TEST_LOCATION_URL, () => HttpResponse.text("<html></html>")));

    await expect(client.get("U1", LOCATION_PATH)).rejects.toBeInstanceOf(PlumeDecodeError);
  });

  it("maps transport failures to PlumeNetworkError", async () => {
    server.use(http.get(TEST_LOCATION_URL, () => HttpResponse.error()));

    await expect(client.get("U1", LOCATION_PATH)).rejects.toBeInstanceOf(PlumeNetworkError);
  });

  it("aborts slow requests with PlumeTimeoutError", async () => {
    const hangingFetch: typeof fetch = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(Object.assign(new Error("aborted"), { name: "AbortError" })));
      });
    const slowClient = new PlumeHttpClient(tokenCache, { timeoutMs: 20, fetchFn: hangingFetch });

    await expect(slowClient.get("U1", LOCATION_PATH)).rejects.toSatisfy(
      (error: unknown) => error instanceof PlumeTimeoutError && error.timeoutMs === 20,
    );
  });

  it("times out when the body stalls after the headers arrive", async () => {
    const stalledBody: typeof fetch = async () => new Response(new ReadableStream<Uint8Array>(), { status: 200 });
    const slowClient = new PlumeHttpClient(tokenCache, { timeoutMs: 30, fetchFn: stalledBody });

    await expect(slowClient.get("U1", LOCATION_PATH)).rejects.toSatisfy(
      (error: unknown) => error instanceof PlumeTimeoutError && error.timeoutMs === 30,
    );
  });

  it("still reports the status when an error body stalls", async () => {
    const stalledBody: typeof fetch = async () => new Response(new ReadableStream<Uint8Array>(), { status: 503 });
    const slowClient = new PlumeHttpClient(tokenCache, { timeoutMs: 30, fetchFn: stalledBody });

    await expect(slowClient.get("U1", LOCATION_PATH)).rejects.toSatisfy(
      (error: unknown) =>
        error instanceof PlumeServerError && error.message === "Plume API request failed with status 503",
    );
  });
});

describe("buildUrl", () => {
  it("joins base and path with exactly one slash", () => {
    expect(buildUrl("https://api.plume.test/api", "/Customers/c1")).toBe("https://api.plume.test/api/Customers/c1");
    expect(buildUrl("https://api.plume.test/api/", "Customers/c1")).toBe("https://api.plume.test/api/Customers/c1");
  });

  it("appends defined query parameters only", () => {
    expect(buildUrl("https://api.plume.test/api/", "x", { limit: 5, skip: undefined, flag: true })).toBe(
      "https://api.plume.test/api/x?limit=5&flag=true",
    );
  });
});
