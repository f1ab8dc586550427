// Configuration helpers for consolidated config access
import { getConfigValue } from "./loader";

export interface PlumeRuntimeConfig {
  ssoUrl: string;
  apiBaseUrl: string;
  reportsApiBaseUrl: string;
  timeoutMs: number;
  tokenSafetyMarginMs: number;
}

export function getPlumeConfig(): PlumeRuntimeConfig {
  const apiBaseUrl = getConfigValue("plumeApiBaseUrl");
  return {
    ssoUrl: getConfigValue("plumeSsoUrl"),
    apiBaseUrl,
    reportsApiBaseUrl: getConfigValue("plumeReportsApiBaseUrl") || apiBaseUrl,
    timeoutMs: getConfigValue("plumeTimeoutMs"),
    tokenSafetyMarginMs: getConfigValue("plumeTokenSafetyMarginSeconds") * 1000,
  };
}

export function getSetupSessionTimeoutMs(): number {
  return getConfigValue("setupSessionTimeoutMinutes") * 60 * 1000;
}

/**
 * Slack posting needs a bot token; request verification needs the signing secret.
 */
export function isSlackConfigured(): boolean {
  return Boolean(getConfigValue("slackBotToken") && getConfigValue("slackSigningSecret"));
}
