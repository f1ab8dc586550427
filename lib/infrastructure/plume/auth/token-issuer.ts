/**
 * Plume Token Issuer
 *
 * OAuth 2.0 client-credentials exchange against the Plume SSO endpoint.
 */

import { z } from "zod";
import { PlumeAuthConfigError, PlumeOAuthError } from "../errors";
import type { PlumeCredentials, PlumeTokenRecord } from "../types";
import { untilAborted } from "../../../utils/abort-signal";

export const DEFAULT_TOKEN_LIFETIME_SECONDS = 3600;

const TokenResponseSchema = z
  .object({
    access_token: z.string().min(1),
    expires_in: z.unknown().optional(),
    token_type: z.string().optional(),
  })
  .passthrough();

export interface PlumeTokenIssuerOptions {
  timeoutMs: number;
  safetyMarginMs: number;
  fetchFn?: typeof fetch;
  now?: () => number;
}

export class PlumeTokenIssuer {
  private readonly fetchFn: typeof fetch;
  private readonly now: () => number;

  constructor(private readonly options: PlumeTokenIssuerOptions) {
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? Date.now;
  }

  async issueToken(credentials: PlumeCredentials): Promise<PlumeTokenRecord> {
    const missingFields = getMissingCredentialFields(credentials);
    if (missingFields.length > 0) {
      throw new PlumeAuthConfigError(
        `Plume credentials are incomplete (missing ${missingFields.join(", ")})`,
        missingFields,
      );
    }

    const body = new URLSearchParams({
      grant_type: "client_credentials",
      scope: `partnerId:${credentials.partnerId} role:partnerIdAdmin`,
    });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    let response: Response;
    let text: string;
    try {
      try {
        response = await this.fetchFn(credentials.ssoUrl, {
          method: "POST",
          headers: {
            "Cache-Control": "no-cache",
            Authorization: credentials.authHeader,
            "Content-Type": "application/x-www-form-urlencoded",
          },
          body: body.toString(),
          signal: controller.signal,
        });
        text = await untilAborted(response.text(), controller.signal);
      } catch (error) {
        throw this.toTransportError(error);
      }
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      throw new PlumeOAuthError(
        `Plume token request failed with status ${response.status}${text ? `: ${text.slice(0, 200)}` : ""}`,
        "http",
        response.status,
      );
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (error) {
      throw new PlumeOAuthError(
        "Plume token response was not valid JSON",
        "invalid_response",
        response.status,
        error instanceof Error ? error : undefined,
      );
    }

    const parsed = TokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new PlumeOAuthError("Plume token response did not include an access_token", "invalid_response", response.status);
    }

    const expiresIn = normalizeExpiresIn(parsed.data.expires_in);
    return {
      accessToken: parsed.data.access_token,
      expiresIn,
      expiresAt: this.now() + expiresIn * 1000 - this.options.safetyMarginMs,
    };
  }

  private toTransportError(error: unknown): PlumeOAuthError {
    const cause = error instanceof Error ? error : undefined;
    if (cause?.name === "AbortError") {
      return new PlumeOAuthError(
        `Plume token request timed out after ${this.options.timeoutMs}ms`,
        "timeout",
        undefined,
        cause,
      );
    }
    return new PlumeOAuthError(
      `Plume token request failed: ${cause?.message ?? String(error)}`,
      "network",
      undefined,
      cause,
    );
  }
}

export function getMissingCredentialFields(credentials: Partial<PlumeCredentials>): string[] {
  const missing: string[] = [];
  if (!credentials.ssoUrl?.trim()) missing.push("ssoUrl");
  if (!credentials.authHeader?.trim()) missing.push("authHeader");
  if (!credentials.partnerId?.trim()) missing.push("partnerId");
  return missing;
}

function normalizeExpiresIn(value: unknown): number {
  const numeric = typeof value === "string" ? Number(value) : value;
  if (typeof numeric === "number" && Number.isFinite(numeric) && numeric > 0) {
    return numeric;
  }
  return DEFAULT_TOKEN_LIFETIME_SECONDS;
}
