/**
 * Setup State Machine for the /network setup conversation.
 * Linear steps, one validated field per step, cancellable at any step.
 * Pending records live in memory and expire after the session timeout.
 */

import { z } from "zod";
import { getConfigValue, getPlumeConfig, getSetupSessionTimeoutMs } from "../config";
import { getPlumeTokenCache } from "../infrastructure/plume";
import type { PlumeTokenCache } from "../infrastructure/plume/auth/token-cache";
import { PlumeOAuthError } from "../infrastructure/plume/errors";
import type { PlumeCredentials } from "../infrastructure/plume/types";

export enum SetupState {
  AWAITING_SSO_URL = "awaiting_sso_url",
  AWAITING_AUTH_HEADER = "awaiting_auth_header",
  AWAITING_PARTNER_ID = "awaiting_partner_id",
  AWAITING_API_BASE = "awaiting_api_base",
}

const STEP_ORDER: readonly SetupState[] = [
  SetupState.AWAITING_SSO_URL,
  SetupState.AWAITING_AUTH_HEADER,
  SetupState.AWAITING_PARTNER_ID,
  SetupState.AWAITING_API_BASE,
];

export interface PendingSetup {
  identity: string;
  state: SetupState;
  startedAt: Date;
  lastUpdated: Date;
  values: Partial<PlumeCredentials>;
}

export type SetupStepResult =
  | { status: "prompt"; state: SetupState; step: number; totalSteps: number; message: string }
  | { status: "invalid"; state: SetupState; message: string }
  | { status: "completed"; verified: boolean; message: string }
  | { status: "cancelled"; message: string }
  | { status: "expired"; message: string }
  | { status: "not_started"; message: string };

export interface SetupDefaults {
  ssoUrl: string;
  apiBaseUrl: string;
  reportsApiBaseUrl?: string;
}

export interface SetupStateMachineOptions {
  tokenCache: Pick<PlumeTokenCache, "setCredentials" | "ensureValidToken">;
  defaults: SetupDefaults;
  timeoutMs: number;
  now?: () => number;
}

const urlInput = (label: string) =>
  z
    .string()
    .trim()
    .min(1, `${label} cannot be empty`)
    .url(`${label} must be a URL`)
    .refine((value) => /^https?:\/\//i.test(value), `${label} must start with http:// or https://`);

const SetupInputSchemas = {
  [SetupState.AWAITING_SSO_URL]: urlInput("SSO URL"),
  [SetupState.AWAITING_AUTH_HEADER]: z.string().trim().min(1, "Authorization header cannot be empty"),
  [SetupState.AWAITING_PARTNER_ID]: z
    .string()
    .trim()
    .min(1, "Partner id cannot be empty")
    .regex(/^\S+$/, "Partner id cannot contain spaces"),
  [SetupState.AWAITING_API_BASE]: urlInput("API base URL"),
} satisfies Record<SetupState, z.ZodType<string>>;

export class SetupStateMachine {
  private pending = new Map<string, PendingSetup>();
  private readonly now: () => number;

  constructor(private readonly options: SetupStateMachineOptions) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Start (or restart) setup for an identity
   */
  start(identity: string): SetupStepResult {
    this.cleanupExpired();
    const timestamp = new Date(this.now());
    this.pending.set(identity, {
      identity,
      state: SetupState.AWAITING_SSO_URL,
      startedAt: timestamp,
      lastUpdated: timestamp,
      values: {},
    });
    console.log(`[Setup] Started for ${identity}`);
    return this.prompt(SetupState.AWAITING_SSO_URL);
  }

  getState(identity: string): SetupState | null {
    return this.getActive(identity)?.state ?? null;
  }

  isActive(identity: string): boolean {
    return this.getActive(identity) !== null;
  }

  cancel(identity: string): boolean {
    const removed = this.pending.delete(identity);
    if (removed) {
      console.log(`[Setup] Cancelled for ${identity}`);
    }
    return removed;
  }

  /**
   * Answer the current step
   */
  async submit(identity: string, rawInput: string): Promise<SetupStepResult> {
    const record = this.pending.get(identity);
    if (!record) {
      return { status: "not_started", message: "No setup in progress. Run `/network setup` to begin." };
    }
    if (this.isExpired(record)) {
      this.pending.delete(identity);
      console.log(`[Setup] Expired for ${identity}`);
      return { status: "expired", message: "Setup timed out. Run `/network setup` to start again." };
    }
    this.cleanupExpired();

    const input = rawInput.trim();
    if (input.toLowerCase() === "cancel") {
      this.cancel(identity);
      return { status: "cancelled", message: "Setup cancelled. Nothing was saved." };
    }

    const value = this.resolveShortcut(record.state, input);
    const parsed = SetupInputSchemas[record.state].safeParse(value);
    if (!parsed.success) {
      const issue = parsed.error.issues[0]?.message ?? "Invalid value";
      return { status: "invalid", state: record.state, message: `${issue}. Please try again.` };
    }

    this.store(record, parsed.data);

    const next = STEP_ORDER[STEP_ORDER.indexOf(record.state) + 1];
    if (next) {
      console.log(`[Setup] ${identity}: ${record.state} → ${next}`);
      record.state = next;
      record.lastUpdated = new Date(this.now());
      return this.prompt(next);
    }

    return this.complete(record);
  }

  /**
   * Drop pending records past the session timeout
   */
  cleanupExpired(): number {
    let removed = 0;
    for (const [identity, record] of this.pending.entries()) {
      if (this.isExpired(record)) {
        this.pending.delete(identity);
        removed++;
      }
    }
    if (removed > 0) {
      console.log(`[Setup] Cleaned up ${removed} expired setup session(s)`);
    }
    return removed;
  }

  private getActive(identity: string): PendingSetup | null {
    const record = this.pending.get(identity);
    if (!record) {
      return null;
    }
    if (this.isExpired(record)) {
      this.pending.delete(identity);
      return null;
    }
    return record;
  }

  private isExpired(record: PendingSetup): boolean {
    return this.now() - record.lastUpdated.getTime() > this.options.timeoutMs;
  }

  private resolveShortcut(state: SetupState, input: string): string {
    const keyword = input.toLowerCase();
    if (state === SetupState.AWAITING_SSO_URL && keyword === "default") {
      return this.options.defaults.ssoUrl;
    }
    if (state === SetupState.AWAITING_API_BASE && keyword === "skip") {
      return this.options.defaults.apiBaseUrl;
    }
    return input;
  }

  private store(record: PendingSetup, value: string): void {
    switch (record.state) {
      case SetupState.AWAITING_SSO_URL:
        record.values.ssoUrl = value;
        break;
      case SetupState.AWAITING_AUTH_HEADER:
        record.values.authHeader = value;
        break;
      case SetupState.AWAITING_PARTNER_ID:
        record.values.partnerId = value;
        break;
      case SetupState.AWAITING_API_BASE:
        record.values.apiBaseUrl = value;
        break;
    }
  }

  private async complete(record: PendingSetup): Promise<SetupStepResult> {
    this.pending.delete(record.identity);

    const { ssoUrl = "", authHeader = "", partnerId = "", apiBaseUrl = "" } = record.values;
    const { defaults } = this.options;
    // The configured reports base pairs with the default API base only
    const credentials: PlumeCredentials = {
      ssoUrl,
      authHeader,
      partnerId,
      apiBaseUrl,
      reportsApiBaseUrl: apiBaseUrl === defaults.apiBaseUrl ? defaults.reportsApiBaseUrl || undefined : apiBaseUrl,
    };
    this.options.tokenCache.setCredentials(record.identity, credentials);

    try {
      await this.options.tokenCache.ensureValidToken(record.identity);
      console.log(`[Setup] Completed for ${record.identity}, token verified`);
      return {
        status: "completed",
        verified: true,
        message: `Setup complete. Connected to Plume as partner ${partnerId}.`,
      };
    } catch (error) {
      console.warn(
        `[Setup] Completed for ${record.identity}, token issuance failed:`,
        error instanceof Error ? error.message : String(error),
      );
      const reason =
        error instanceof PlumeOAuthError && (error.reason === "timeout" || error.reason === "network")
          ? "The identity provider could not be reached. Try again later."
          : "Plume rejected the credentials. Check the values and run `/network setup` again.";
      return {
        status: "completed",
        verified: false,
        message: `Credentials saved, but the token check failed. ${reason}`,
      };
    }
  }

  private prompt(state: SetupState): SetupStepResult {
    const step = STEP_ORDER.indexOf(state) + 1;
    const totalSteps = STEP_ORDER.length;
    const { defaults } = this.options;

    const instructions: Record<SetupState, string> = {
      [SetupState.AWAITING_SSO_URL]: defaults.ssoUrl
        ? `Send the Plume SSO token URL with \`/network setup <url>\`, or \`/network setup default\` to use ${defaults.ssoUrl}.`
        : "Send the Plume SSO token URL with `/network setup <url>`.",
      [SetupState.AWAITING_AUTH_HEADER]: "Send the authorization header value, e.g. `/network setup Basic <credentials>`.",
      [SetupState.AWAITING_PARTNER_ID]: "Send your Plume partner id with `/network setup <partnerId>`.",
      [SetupState.AWAITING_API_BASE]: `Send the Plume API base URL, or \`/network setup skip\` to use ${defaults.apiBaseUrl}.`,
    };

    return {
      status: "prompt",
      state,
      step,
      totalSteps,
      message: `Step ${step}/${totalSteps}: ${instructions[state]} Send \`/network cancel\` to stop.`,
    };
  }
}

let setupStateMachine: SetupStateMachine | undefined;

export function getSetupStateMachine(): SetupStateMachine {
  if (!setupStateMachine) {
    const plumeConfig = getPlumeConfig();
    setupStateMachine = new SetupStateMachine({
      tokenCache: getPlumeTokenCache(),
      defaults: {
        ssoUrl: plumeConfig.ssoUrl,
        apiBaseUrl: plumeConfig.apiBaseUrl,
        reportsApiBaseUrl: getConfigValue("plumeReportsApiBaseUrl") || undefined,
      },
      timeoutMs: getSetupSessionTimeoutMs(),
    });
  }
  return setupStateMachine;
}

export function __resetSetupStateMachine(): void {
  setupStateMachine = undefined;
}
