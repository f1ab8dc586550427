/**
 * Plume HTTP Client
 *
 * Turns (identity, method, path, params, body) into parsed JSON:
 * - Bearer token from the token cache, issued on demand
 * - Fixed timeout per request
 * - Non-2xx responses mapped to typed errors
 * - Token invalidated when the API answers 401/403
 *
 * No retries. Callers decide whether to try again.
 */

import type { PlumeTokenCache } from "../auth/token-cache";
import {
  PlumeAuthConfigError,
  PlumeAuthExpiredError,
  PlumeDecodeError,
  PlumeError,
  PlumeNetworkError,
  PlumeTimeoutError,
  parsePlumeError,
} from "../errors";
import { untilAborted } from "../../../utils/abort-signal";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface PlumeRequestOptions {
  method?: HttpMethod;
  path: string;
  params?: QueryParams;
  body?: unknown;
  useReportsApi?: boolean;
}

export interface PlumeHttpClientConfig {
  timeoutMs: number;
  fetchFn?: typeof fetch;
}

export class PlumeHttpClient {
  private readonly fetchFn: typeof fetch;

  constructor(
    private readonly tokenCache: PlumeTokenCache,
    private readonly config: PlumeHttpClientConfig,
  ) {
    this.fetchFn = config.fetchFn ?? ((input, init) => fetch(input, init));
  }

  async request(identity: string, options: PlumeRequestOptions): Promise<unknown> {
    const credentials = this.tokenCache.getCredentials(identity);
    if (!credentials) {
      throw new PlumeAuthConfigError(`No Plume credentials configured for ${identity}. Run /network setup first.`);
    }

    const baseUrl = options.useReportsApi
      ? credentials.reportsApiBaseUrl || credentials.apiBaseUrl
      : credentials.apiBaseUrl;
    const url = buildUrl(baseUrl, options.path, options.params);
    const method = options.method ?? "GET";

    const token = await this.tokenCache.ensureValidToken(identity);

    const headers: Record<string, string> = {
      Accept: "application/json",
      Authorization: `Bearer ${token.accessToken}`,
    };
    let body: string | undefined;
    if (options.body !== undefined) {
      headers["Content-Type"] = "application/json";
      body = JSON.stringify(options.body);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);

    // The deadline covers the body as well as the headers
    try {
      let response: Response;
      try {
        response = await this.fetchFn(url, { method, headers, body, signal: controller.signal });
      } catch (error) {
        throw toTransportError(error, options.path, this.config.timeoutMs);
      }

      if (!response.ok) {
        const errorBody = await untilAborted(response.text(), controller.signal).catch(() => "");
        const error = parsePlumeError(response, options.path, errorBody);
        if (error instanceof PlumeAuthExpiredError) {
          this.tokenCache.invalidateToken(identity);
        }
        console.warn(`[Plume HTTP] ${method} ${options.path} failed: ${error.message}`);
        throw error;
      }

      let text: string;
      try {
        text = await untilAborted(response.text(), controller.signal);
      } catch (error) {
        throw toTransportError(error, options.path, this.config.timeoutMs);
      }

      if (!text.trim()) {
        return null;
      }

      try {
        return JSON.parse(text);
      } catch (error) {
        throw new PlumeDecodeError(
          `Plume API returned a non-JSON body for ${options.path}`,
          options.path,
          error instanceof Error ? error : undefined,
        );
      }
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async get(identity: string, path: string, params?: QueryParams, useReportsApi = false): Promise<unknown> {
    return this.request(identity, { method: "GET", path, params, useReportsApi });
  }
}

export function buildUrl(baseUrl: string, path: string, params?: QueryParams): string {
  const base = baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
  const url = new URL(path.replace(/^\//, ""), base);
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
  }
  return url.toString();
}

function toTransportError(error: unknown, endpoint: string, timeoutMs: number): PlumeError {
  const cause = error instanceof Error ? error : undefined;
  if (cause?.name === "AbortError") {
    return new PlumeTimeoutError(`Plume request timed out after ${timeoutMs}ms`, timeoutMs, endpoint, cause);
  }
  return new PlumeNetworkError(
    `Plume request failed: ${cause?.message ?? String(error)}`,
    endpoint,
    cause,
  );
}
