/**
 * Error Handler Utility
 * Turns Plume and command errors into user-facing messages and recovery guidance
 */

import {
  PlumeAuthConfigError,
  PlumeAuthExpiredError,
  PlumeClientError,
  PlumeDecodeError,
  PlumeNetworkError,
  PlumeOAuthError,
  PlumeServerError,
  PlumeTimeoutError,
} from "../infrastructure/plume/errors";
import { LocationNotSelectedError } from "../services/network-monitor-service";

export enum ErrorCategory {
  SETUP_REQUIRED = "setup_required",
  AUTH_FAILED = "auth_failed",
  TOKEN_EXPIRED = "token_expired",
  NO_LOCATION = "no_location",
  NOT_FOUND = "not_found",
  CLIENT = "client",
  SERVER = "server",
  TIMEOUT = "timeout",
  NETWORK = "network",
  DECODE = "decode",
  UNKNOWN = "unknown",
}

export interface ErrorContext {
  operation: string; // What was being attempted (e.g., "location health", "WAN report")
  userId?: string;
}

export interface ErrorHandlerResult {
  category: ErrorCategory;
  userMessage: string;
  technicalMessage: string;
  recoverySteps: string[];
  retryable: boolean;
}

export class ErrorHandler {
  static handle(error: unknown, context: ErrorContext): ErrorHandlerResult {
    const category = this.categorizeError(error);
    const result: ErrorHandlerResult = {
      category,
      userMessage: this.getUserMessage(category, context),
      technicalMessage: error instanceof Error ? `${error.name}: ${error.message}` : String(error),
      recoverySteps: this.getRecoverySteps(category),
      retryable: this.isRetryable(category),
    };

    console.error(`[Error Handler] ${context.operation} failed (${category})`, {
      userId: context.userId,
      error: result.technicalMessage,
    });

    return result;
  }

  /**
   * Render the result as one Slack message
   */
  static formatForSlack(result: ErrorHandlerResult): string {
    const lines = [`❌ ${result.userMessage}`];
    if (result.recoverySteps.length > 0) {
      lines.push("", ...result.recoverySteps.map((step) => `• ${step}`));
    }
    return lines.join("\n");
  }

  static categorizeError(error: unknown): ErrorCategory {
    if (error instanceof PlumeAuthConfigError) return ErrorCategory.SETUP_REQUIRED;
    if (error instanceof PlumeOAuthError) {
      if (error.reason === "timeout") return ErrorCategory.TIMEOUT;
      if (error.reason === "network") return ErrorCategory.NETWORK;
      return ErrorCategory.AUTH_FAILED;
    }
    // Credentials survive a 401/403; the next request issues a fresh token
    if (error instanceof PlumeAuthExpiredError) return ErrorCategory.TOKEN_EXPIRED;
    if (error instanceof LocationNotSelectedError) return ErrorCategory.NO_LOCATION;
    if (error instanceof PlumeClientError) {
      return error.statusCode === 404 ? ErrorCategory.NOT_FOUND : ErrorCategory.CLIENT;
    }
    if (error instanceof PlumeServerError) return ErrorCategory.SERVER;
    if (error instanceof PlumeTimeoutError) return ErrorCategory.TIMEOUT;
    if (error instanceof PlumeNetworkError) return ErrorCategory.NETWORK;
    if (error instanceof PlumeDecodeError) return ErrorCategory.DECODE;
    return ErrorCategory.UNKNOWN;
  }

  private static getUserMessage(category: ErrorCategory, context: ErrorContext): string {
    switch (category) {
      case ErrorCategory.SETUP_REQUIRED:
        return "Plume is not set up for you yet. Run `/network setup` first.";
      case ErrorCategory.AUTH_FAILED:
        return `Plume rejected your credentials while loading ${context.operation}. Run \`/network setup\` again.`;
      case ErrorCategory.TOKEN_EXPIRED:
        return `Plume rejected the current access token while loading ${context.operation}. Try again and a new token will be requested.`;
      case ErrorCategory.NO_LOCATION:
        return "No location selected. Use `/network location <customerId> <locationId>` first.";
      case ErrorCategory.NOT_FOUND:
        return `Plume could not find the requested data for ${context.operation}.`;
      case ErrorCategory.CLIENT:
        return `Plume refused the request for ${context.operation}.`;
      case ErrorCategory.SERVER:
        return `Plume had a server error while loading ${context.operation}. Try again later.`;
      case ErrorCategory.TIMEOUT:
        return `Plume did not respond in time while loading ${context.operation}. Try again later.`;
      case ErrorCategory.NETWORK:
        return `Could not reach Plume while loading ${context.operation}. Try again later.`;
      case ErrorCategory.DECODE:
        return `Plume returned data I could not read for ${context.operation}. Try again later.`;
      case ErrorCategory.UNKNOWN:
        return `Something went wrong while loading ${context.operation}.`;
    }
  }

  private static getRecoverySteps(category: ErrorCategory): string[] {
    switch (category) {
      case ErrorCategory.SETUP_REQUIRED:
      case ErrorCategory.AUTH_FAILED:
        return ["Check the SSO URL, authorization header and partner id", "Run `/network setup` to enter them again"];
      case ErrorCategory.NO_LOCATION:
        return ["List locations with `/network locations <customerId>`"];
      case ErrorCategory.NOT_FOUND:
        return ["Check the customer and location ids"];
      default:
        return [];
    }
  }

  private static isRetryable(category: ErrorCategory): boolean {
    return [
      ErrorCategory.TOKEN_EXPIRED,
      ErrorCategory.SERVER,
      ErrorCategory.TIMEOUT,
      ErrorCategory.NETWORK,
      ErrorCategory.DECODE,
    ].includes(category);
  }
}
