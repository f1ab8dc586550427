import { beforeEach, describe, expect, it, vi } from "vitest";
import { PlumeOAuthError } from "../../lib/infrastructure/plume/errors";
import type { PlumeCredentials, PlumeTokenRecord } from "../../lib/infrastructure/plume/types";
import { SetupState, SetupStateMachine } from "../../lib/services/setup-state-machine";
import { TEST_API_BASE, TEST_REPORTS_API_BASE, TEST_SSO_URL, createTestToken } from "../fixtures/plume-responses";

const TIMEOUT_MS = 15 * 60 * 1000;

describe("SetupStateMachine", () => {
  let now: number;
  const setCredentials = vi.fn((_identity: string, _credentials: PlumeCredentials) => {});
  const ensureValidToken = vi.fn(async (_identity: string): Promise<PlumeTokenRecord> => createTestToken());
  let machine: SetupStateMachine;

  beforeEach(() => {
    now = 0;
    machine = new SetupStateMachine({
      tokenCache: { setCredentials, ensureValidToken },
      defaults: { ssoUrl: TEST_SSO_URL, apiBaseUrl: TEST_API_BASE, reportsApiBaseUrl: TEST_REPORTS_API_BASE },
      timeoutMs: TIMEOUT_MS,
      now: () => now,
    });
  });

  async function completeSteps(identity: string) {
    machine.start(identity);
    await machine.submit(identity, "default");
    await machine.submit(identity, "Basic test-client-credentials");
    await machine.submit(identity, "partner-1");
    return machine.submit(identity, "skip");
  }

  it("starts at the SSO URL step", () => {
    const result = machine.start("U1");

    expect(result).toMatchObject({ status: "prompt", state: SetupState.AWAITING_SSO_URL, step: 1, totalSteps: 4 });
    expect(machine.getState("U1")).toBe(SetupState.AWAITING_SSO_URL);
    expect(machine.isActive("U1")).toBe(true);
  });

  it("walks through every step in order", async () => {
    machine.start("U1");

    await expect(machine.submit("U1", TEST_SSO_URL)).resolves.toMatchObject({
      status: "prompt",
      state: SetupState.AWAITING_AUTH_HEADER,
      step: 2,
    });
    await expect(machine.submit("U1", "Basic test-client-credentials")).resolves.toMatchObject({
      state: SetupState.AWAITING_PARTNER_ID,
      step: 3,
    });
    await expect(machine.submit("U1", "partner-1")).resolves.toMatchObject({
      state: SetupState.AWAITING_API_BASE,
      step: 4,
    });
  });

  it("stores credentials and verifies a token on the last step", async () => {
    const result = await completeSteps("U1");

    expect(result).toEqual({
      status: "completed",
      verified: true,
      message: "Setup complete. Connected to Plume as partner partner-1.",
    });
    expect(setCredentials).toHaveBeenCalledWith("U1", {
      ssoUrl: TEST_SSO_URL,
      authHeader: "Basic test-client-credentials",
      partnerId: "partner-1",
      apiBaseUrl: TEST_API_BASE,
      reportsApiBaseUrl: TEST_REPORTS_API_BASE,
    });
    expect(ensureValidToken).toHaveBeenCalledWith("U1");
    expect(machine.isActive("U1")).toBe(false);
  });

  it("reads reports from a custom API base instead of the default reports base", async () => {
    machine.start("U1");
    await machine.submit("U1", "default");
    await machine.submit("U1", "Basic test-client-credentials");
    await machine.submit("U1", "partner-1");

    await machine.submit("U1", "https://eu.plume.test/api/");

    expect(setCredentials).toHaveBeenLastCalledWith("U1", {
      ssoUrl: TEST_SSO_URL,
      authHeader: "Basic test-client-credentials",
      partnerId: "partner-1",
      apiBaseUrl: "https://eu.plume.test/api/",
      reportsApiBaseUrl: "https://eu.plume.test/api/",
    });
  });

  it("keeps credentials but reports a rejected token check", async () => {
    ensureValidToken.mockRejectedValueOnce(new PlumeOAuthError("unauthorized", "http", 401));

    const result = await completeSteps("U1");

    expect(result).toEqual({
      status: "completed",
      verified: false,
      message:
        "Credentials saved, but the token check failed. Plume rejected the credentials. Check the values and run `/network setup` again.",
    });
    expect(setCredentials).toHaveBeenCalledTimes(1);
  });

  it("explains an unreachable identity provider", async () => {
    ensureValidToken.mockRejectedValueOnce(new PlumeOAuthError("timed out", "timeout"));

    const result = await completeSteps("U1");

    expect(result.message).toBe(
      "Credentials saved, but the token check failed. The identity provider could not be reached. Try again later.",
    );
  });

  it("re-prompts on invalid input without advancing", async () => {
    machine.start("U1");

    const result = await machine.submit("U1", "not-a-url");

    expect(result).toEqual({
      status: "invalid",
      state: SetupState.AWAITING_SSO_URL,
      message: "SSO URL must be a URL. Please try again.",
    });
    expect(machine.getState("U1")).toBe(SetupState.AWAITING_SSO_URL);
  });

  it("rejects partner ids with spaces", async () => {
    machine.start("U1");
    await machine.submit("U1", "default");
    await machine.submit("U1", "Basic test-client-credentials");

    const result = await machine.submit("U1", "partner one");

    expect(result).toMatchObject({ status: "invalid", message: "Partner id cannot contain spaces. Please try again." });
  });

  it("cancels at any step without storing anything", async () => {
    machine.start("U1");
    await machine.submit("U1", "default");

    const result = await machine.submit("U1", "CANCEL");

    expect(result).toEqual({ status: "cancelled", message: "Setup cancelled. Nothing was saved." });
    expect(machine.isActive("U1")).toBe(false);
    expect(setCredentials).not.toHaveBeenCalled();
  });

  it("answers not_started when no setup is pending", async () => {
    await expect(machine.submit("U1", "x")).resolves.toEqual({
      status: "not_started",
      message: "No setup in progress. Run `/network setup` to begin.",
    });
    expect(machine.cancel("U1")).toBe(false);
  });

  it("expires sessions idle past the timeout", async () => {
    machine.start("U1");
    now = TIMEOUT_MS + 1;

    await expect(machine.submit("U1", "default")).resolves.toMatchObject({ status: "expired" });
    expect(machine.isActive("U1")).toBe(false);
  });

  it("measures the timeout from the last answered step", async () => {
    machine.start("U1");
    now = TIMEOUT_MS - 1;
    await machine.submit("U1", "default");
    now = TIMEOUT_MS + 1000;

    expect(machine.getState("U1")).toBe(SetupState.AWAITING_AUTH_HEADER);
  });

  it("keeps one pending record per identity", async () => {
    machine.start("U1");
    machine.start("U2");
    await machine.submit("U1", "default");

    expect(machine.getState("U1")).toBe(SetupState.AWAITING_AUTH_HEADER);
    expect(machine.getState("U2")).toBe(SetupState.AWAITING_SSO_URL);
  });

  it("cleans up expired sessions", () => {
    machine.start("U1");
    now = 1000;
    machine.start("U2");
    now = TIMEOUT_MS + 500;

    expect(machine.cleanupExpired()).toBe(1);
    expect(machine.isActive("U1")).toBe(false);
    expect(machine.isActive("U2")).toBe(true);
  });

  it("purges stale sessions of other users when a setup starts", () => {
    machine.start("U1");
    machine.start("U2");
    now = TIMEOUT_MS + 500;

    machine.start("U3");

    expect(machine.cleanupExpired()).toBe(0);
    expect(machine.isActive("U3")).toBe(true);
  });

  it("purges stale sessions of other users when a step is answered", async () => {
    machine.start("U1");
    now = 1000;
    machine.start("U2");
    now = TIMEOUT_MS + 500;

    await machine.submit("U2", "default");

    expect(machine.cleanupExpired()).toBe(0);
    expect(machine.getState("U2")).toBe(SetupState.AWAITING_AUTH_HEADER);
  });
});
