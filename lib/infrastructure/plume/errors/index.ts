/**
 * Plume Error Types
 *
 * Every failure the Plume integration can surface has its own class so the
 * Slack layer can pick "run setup" or "try again later" messaging.
 */

/**
 * Base error class for all Plume-related errors
 */
export class PlumeError extends Error {
  constructor(
    message: string,
    public statusCode?: number,
    public endpoint?: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = "PlumeError";

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PlumeError);
    }
  }
}

/**
 * Setup is incomplete: no stored credentials, or a required field is missing
 */
export class PlumeAuthConfigError extends PlumeError {
  constructor(
    message: string,
    public missingFields: string[] = [],
  ) {
    super(message);
    this.name = "PlumeAuthConfigError";
  }
}

export type OAuthFailureReason = "http" | "network" | "timeout" | "invalid_response";

/**
 * Token issuance failed at the identity provider
 */
export class PlumeOAuthError extends PlumeError {
  constructor(
    message: string,
    public reason: OAuthFailureReason,
    statusCode?: number,
    cause?: Error,
  ) {
    super(message, statusCode, undefined, cause);
    this.name = "PlumeOAuthError";
  }

  get timedOut(): boolean {
    return this.reason === "timeout";
  }
}

/**
 * The API rejected the current bearer token (401/403)
 */
export class PlumeAuthExpiredError extends PlumeError {
  constructor(message: string, statusCode: 401 | 403, endpoint?: string) {
    super(message, statusCode, endpoint);
    this.name = "PlumeAuthExpiredError";
  }
}

/**
 * Any other 4xx response
 */
export class PlumeClientError extends PlumeError {
  constructor(message: string, statusCode: number, endpoint?: string) {
    super(message, statusCode, endpoint);
    this.name = "PlumeClientError";
  }
}

/**
 * 5xx response
 */
export class PlumeServerError extends PlumeError {
  constructor(message: string, statusCode: number, endpoint?: string) {
    super(message, statusCode, endpoint);
    this.name = "PlumeServerError";
  }
}

export class PlumeTimeoutError extends PlumeError {
  constructor(
    message: string,
    public timeoutMs: number,
    endpoint?: string,
    cause?: Error,
  ) {
    super(message, undefined, endpoint, cause);
    this.name = "PlumeTimeoutError";
  }
}

/**
 * The request never produced a response (DNS, refused connection, reset)
 */
export class PlumeNetworkError extends PlumeError {
  constructor(message: string, endpoint?: string, cause?: Error) {
    super(message, undefined, endpoint, cause);
    this.name = "PlumeNetworkError";
  }
}

/**
 * The body was not JSON, or its shape cannot be defaulted
 * (for example an object where a list is required)
 */
export class PlumeDecodeError extends PlumeError {
  constructor(message: string, endpoint?: string, cause?: Error) {
    super(message, undefined, endpoint, cause);
    this.name = "PlumeDecodeError";
  }
}

/**
 * Map a non-2xx Plume response to the matching error type
 */
export function parsePlumeError(
  response: Response,
  endpoint: string,
  body?: string,
): PlumeError {
  const statusCode = response.status;

  let errorMessage = `Plume API request failed with status ${statusCode}`;
  if (body) {
    try {
      const errorData: unknown = JSON.parse(body);
      const detail = extractErrorMessage(errorData);
      if (detail) {
        errorMessage = `${errorMessage}: ${detail}`;
      }
    } catch {
      errorMessage = `${errorMessage}: ${body.slice(0, 300)}`;
    }
  }

  if (statusCode === 401 || statusCode === 403) {
    return new PlumeAuthExpiredError(errorMessage, statusCode, endpoint);
  }

  if (statusCode >= 400 && statusCode < 500) {
    return new PlumeClientError(errorMessage, statusCode, endpoint);
  }

  if (statusCode >= 500) {
    return new PlumeServerError(errorMessage, statusCode, endpoint);
  }

  return new PlumeError(errorMessage, statusCode, endpoint);
}

function extractErrorMessage(data: unknown): string | undefined {
  if (typeof data !== "object" || data === null) {
    return undefined;
  }
  if ("error" in data) {
    const error = data.error;
    if (typeof error === "string") {
      return error;
    }
    if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
      return error.message;
    }
  }
  if ("message" in data && typeof data.message === "string") {
    return data.message;
  }
  return undefined;
}
