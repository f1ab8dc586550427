import { http, HttpResponse } from "msw";
import { describe, expect, it } from "vitest";
import { PlumeTokenIssuer } from "../../lib/infrastructure/plume/auth/token-issuer";
import { PlumeAuthConfigError, PlumeOAuthError } from "../../lib/infrastructure/plume/errors";
import { TEST_SSO_URL, testCredentials } from "../fixtures/plume-responses";
import { server } from "../setup";

const NOW = 1_000_000;

function createIssuer(timeoutMs = 2000) {
  return new PlumeTokenIssuer({ timeoutMs, safetyMarginMs: 60_000, now: () => NOW });
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("Expected promise to reject");
}

describe("PlumeTokenIssuer", () => {
  it("posts the client-credentials form and computes expiry minus the safety margin", async () => {
    const captured: { headers?: Headers; body?: string } = {};
    server.use(
      http.post(TEST_SSO_URL, async ({ request }) => {
        captured.headers = request.headers;
        captured.body = await request.text();
        return HttpResponse.json({ access_token: "issued-token", expires_in: 3600, token_type: "Bearer" });
      }),
    );

    const token = await createIssuer().issueToken(testCredentials);

    expect(token).toEqual({ accessToken: "issued-token", expiresIn: 3600, expiresAt: 4_540_000 });
    expect(captured.headers?.get("authorization")).toBe("Basic test-client-credentials");
    expect(captured.headers?.get("cache-control")).toBe("no-cache");
    expect(captured.headers?.get("content-type")).toBe("application/x-www-form-urlencoded");

    const form = new URLSearchParams(captured.body ?? "");
    expect(form.get("grant_type")).toBe("client_credentials");
    expect(form.get("scope")).toBe("partnerId:partner-1 role:partnerIdAdmin");
  });

  it("defaults expires_in to 3600 when it is missing or not a positive number", async () => {
    server.use(http.post(TEST_SSO_URL, () => HttpResponse.json({ access_token: "a", expires_in: -5 })));
    expect((await createIssuer().issueToken(testCredentials)).expiresIn).toBe(3600);

    server.use(http.post(TEST_SSO_URL, () => HttpResponse.json({ access_token: "b" })));
    expect((await createIssuer().issueToken(testCredentials)).expiresIn).toBe(3600);

    server.use(http.post(TEST_SSO_URL, () => HttpResponse.json({ access_token: "c", expires_in: "7200" })));
    expect((await createIssuer().issueToken(testCredentials)).expiresIn).toBe(7200);
  });

  it("fails with PlumeAuthConfigError when required fields are missing", async () => {
    const error = await captureError(
      createIssuer().issueToken({ ...testCredentials, partnerId: "", authHeader: "  " }),
    );

    expect(error).toBeInstanceOf(PlumeAuthConfigError);
    expect(error).toMatchObject({ missingFields: ["authHeader", "partnerId"] });
  });

  it("maps a non-2xx response to PlumeOAuthError with reason http", async () => {
    server.use(http.post(TEST_SSO_URL, () => HttpResponse.json({ error: "invalid_client" }, { status: 401 })));

    const error = await captureError(createIssuer().issueToken(testCredentials));

    expect(error).toBeInstanceOf(PlumeOAuthError);
    expect(error).toMatchObject({ reason: "http", statusCode: 401 });
  });

  it("rejects a 2xx body without an access_token", async () => {
    server.use(http.post(TEST_SSO_URL, () => HttpResponse.json({ expires_in: 3600 })));

    const error = await captureError(createIssuer().issueToken(testCredentials));

    expect(error).toBeInstanceOf(PlumeOAuthError);
    expect(error).toMatchObject({ reason: "invalid_response" });
  });

  it("rejects a non-JSON body", async () => {
    server.use(http.post(TEST_SSO_URL, () => HttpResponse.text("<html>login</html>")));

    const error = await captureError(createIssuer().issueToken(testCredentials));

    expect(error).toMatchObject({ name: "PlumeOAuthError", reason: "invalid_response" });
  });

  it("reports network failures with reason network", async () => {
    server.use(http.post(TEST_SSO_URL, () => HttpResponse.error()));

    const error = await captureError(createIssuer().issueToken(testCredentials));

    expect(error).toBeInstanceOf(PlumeOAuthError);
    expect(error).toMatchObject({ reason: "network", timedOut: false });
  });

  it("aborts after the timeout and reports it as a timeout", async () => {
    const hangingFetch: typeof fetch = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(Object.assign(new Error("aborted"), { name: "AbortError" })));
      });
    const issuer = new PlumeTokenIssuer({ timeoutMs: 20, safetyMarginMs: 0, fetchFn: hangingFetch });

    const error = await captureError(issuer.issueToken(testCredentials));

    expect(error).toBeInstanceOf(PlumeOAuthError);
    expect(error).toMatchObject({ reason: "timeout", timedOut: true });
  });

  it("reports a timeout when the token response body stalls", async () => {
    const stalledBody: typeof fetch = async () => new Response(new ReadableStream<Uint8Array>(), { status: 200 });
    const issuer = new PlumeTokenIssuer({ timeoutMs: 30, safetyMarginMs: 0, fetchFn: stalledBody });

    const error = await captureError(issuer.issueToken(testCredentials));

    expect(error).toBeInstanceOf(PlumeOAuthError);
    expect(error).toMatchObject({ reason: "timeout", timedOut: true });
  });
});
