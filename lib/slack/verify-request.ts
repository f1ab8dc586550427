import crypto from "crypto";
import { getConfigValue } from "../config";

interface SignatureResultSuccess {
  ok: true;
  timestamp: number;
}

interface SignatureResultFailure {
  ok: false;
  status: number;
  message: string;
}

export type SignatureVerificationResult =
  | SignatureResultSuccess
  | SignatureResultFailure;

const DEFAULT_TOLERANCE_SECONDS = 60 * 5;
const SIGNATURE_VERSION = "v0";

function resolveSecret(): string | null {
  const secret = getConfigValue("slackSigningSecret");
  if (!secret || secret.trim().length === 0) {
    return null;
  }
  return secret;
}

function computeSignature(secret: string, timestamp: number, rawBody: string): string {
  const baseString = `${SIGNATURE_VERSION}:${timestamp}:${rawBody}`;
  const digest = crypto.createHmac("sha256", secret).update(baseString).digest("hex");
  return `${SIGNATURE_VERSION}=${digest}`;
}

/**
 * Verify Slack's X-Slack-Signature header against the raw request body
 */
export function verifySlackRequest({
  headers,
  rawBody,
  toleranceSeconds = DEFAULT_TOLERANCE_SECONDS,
  now = Date.now(),
}: {
  headers: Headers;
  rawBody: string;
  toleranceSeconds?: number;
  now?: number;
}): SignatureVerificationResult {
  const secret = resolveSecret();
  if (!secret) {
    return {
      ok: false,
      status: 500,
      message: "Slack signing secret is not configured",
    };
  }

  const providedSignature = headers.get("x-slack-signature");
  const timestampHeader = headers.get("x-slack-request-timestamp");

  if (!providedSignature || !timestampHeader) {
    return {
      ok: false,
      status: 401,
      message: "Missing Slack signature headers",
    };
  }

  const timestamp = Number(timestampHeader);
  if (!Number.isFinite(timestamp)) {
    return {
      ok: false,
      status: 400,
      message: "Invalid Slack timestamp header",
    };
  }

  if (Math.abs(Math.floor(now / 1000) - timestamp) > toleranceSeconds) {
    return {
      ok: false,
      status: 401,
      message: "Slack request timestamp outside allowable window",
    };
  }

  const expectedBuffer = Buffer.from(computeSignature(secret, timestamp, rawBody), "utf8");
  const providedBuffer = Buffer.from(providedSignature, "utf8");

  if (
    expectedBuffer.length !== providedBuffer.length ||
    !crypto.timingSafeEqual(expectedBuffer, providedBuffer)
  ) {
    return {
      ok: false,
      status: 401,
      message: "Slack signature mismatch",
    };
  }

  return { ok: true, timestamp };
}

/**
 * Sign a body the way Slack does (scripts and tests)
 */
export function createSlackSignature(
  rawBody: string,
  timestamp: number = Math.floor(Date.now() / 1000),
): { signature: string; timestamp: number } {
  const secret = resolveSecret();
  if (!secret) {
    throw new Error("Slack signing secret is not configured");
  }

  return {
    signature: computeSignature(secret, timestamp, rawBody),
    timestamp,
  };
}

/**
 * Verify an incoming Slack request. Returns the Response to send back when
 * verification fails.
 */
export function verifyRequest({
  request,
  rawBody,
}: {
  request: Request;
  rawBody: string;
}): Response | SignatureResultSuccess {
  const result = verifySlackRequest({ headers: request.headers, rawBody });
  if (!result.ok) {
    console.warn(`[Slack Verify] Rejected request: ${result.message}`);
    return new Response(result.message, { status: result.status });
  }
  return result;
}
