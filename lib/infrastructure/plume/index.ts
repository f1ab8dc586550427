/**
 * Plume Infrastructure
 *
 * Shared token cache, HTTP client and repository, built lazily from config.
 */

import { getPlumeConfig } from "../../config";
import { PlumeTokenCache } from "./auth/token-cache";
import { PlumeTokenIssuer } from "./auth/token-issuer";
import { PlumeHttpClient } from "./client/http-client";
import { LocationRepository } from "./repositories/location-repository";

export * from "./errors";
export * from "./types";
export * from "./auth";
export * from "./client";
export * from "./repositories";

let tokenIssuer: PlumeTokenIssuer | undefined;
let tokenCache: PlumeTokenCache | undefined;
let httpClient: PlumeHttpClient | undefined;
let locationRepository: LocationRepository | undefined;

export function getPlumeTokenIssuer(): PlumeTokenIssuer {
  if (!tokenIssuer) {
    const config = getPlumeConfig();
    tokenIssuer = new PlumeTokenIssuer({
      timeoutMs: config.timeoutMs,
      safetyMarginMs: config.tokenSafetyMarginMs,
    });
  }
  return tokenIssuer;
}

export function getPlumeTokenCache(): PlumeTokenCache {
  if (!tokenCache) {
    tokenCache = new PlumeTokenCache(getPlumeTokenIssuer());
  }
  return tokenCache;
}

export function getPlumeHttpClient(): PlumeHttpClient {
  if (!httpClient) {
    httpClient = new PlumeHttpClient(getPlumeTokenCache(), { timeoutMs: getPlumeConfig().timeoutMs });
  }
  return httpClient;
}

export function getLocationRepository(): LocationRepository {
  if (!locationRepository) {
    locationRepository = new LocationRepository(getPlumeHttpClient());
  }
  return locationRepository;
}

/**
 * Drop every shared instance, stored credentials included (tests only)
 */
export function __resetPlumeInfrastructure(): void {
  tokenIssuer = undefined;
  tokenCache = undefined;
  httpClient = undefined;
  locationRepository = undefined;
}
