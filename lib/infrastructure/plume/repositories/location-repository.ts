/**
 * Location Repository
 * One method per Plume endpoint the bot reads; payloads leave here as domain models.
 */

import type { PlumeHttpClient } from "../client/http-client";
import {
  mapDevices,
  mapInternetHealth,
  mapLocation,
  mapLocations,
  mapNodes,
  mapOnlineStats,
  mapQoeStats,
  mapServiceLevel,
  mapWanSamples,
  mapWifiNetworks,
} from "../client/mappers";
import type {
  InternetHealth,
  LocationSummary,
  NetworkDevice,
  NetworkNode,
  OnlineStatsSeries,
  QoeStats,
  ServiceLevel,
  StatsGranularity,
  WanSample,
  WifiNetwork,
} from "../types/domain-models";

export interface LocationRef {
  customerId: string;
  locationId: string;
}

/** 24 hours of 15-minute samples */
export const DEFAULT_WAN_SAMPLE_LIMIT = 96;

export class LocationRepository {
  constructor(private readonly client: PlumeHttpClient) {}

  async listLocations(identity: string, customerId: string): Promise<LocationSummary[]> {
    const path = `Customers/${encodeURIComponent(customerId)}/locations`;
    return mapLocations(await this.client.get(identity, path), path);
  }

  async getLocation(identity: string, ref: LocationRef): Promise<LocationSummary> {
    const path = locationPath(ref);
    return mapLocation(await this.client.get(identity, path), path);
  }

  async getNodes(identity: string, ref: LocationRef): Promise<NetworkNode[]> {
    const path = `${locationPath(ref)}/nodes`;
    return mapNodes(await this.client.get(identity, path), path);
  }

  async getDevices(identity: string, ref: LocationRef): Promise<NetworkDevice[]> {
    const path = `${locationPath(ref)}/devices`;
    return mapDevices(await this.client.get(identity, path), path);
  }

  async getServiceLevel(identity: string, ref: LocationRef): Promise<ServiceLevel> {
    return mapServiceLevel(await this.client.get(identity, `${locationPath(ref)}/serviceLevel`));
  }

  async getInternetHealth(identity: string, ref: LocationRef): Promise<InternetHealth> {
    return mapInternetHealth(await this.client.get(identity, `${locationPath(ref)}/backhaul`));
  }

  async getWifiNetworks(identity: string, ref: LocationRef): Promise<WifiNetwork[]> {
    const path = `${locationPath(ref)}/wifiNetworks`;
    return mapWifiNetworks(await this.client.get(identity, path), path);
  }

  async getQoeStats(identity: string, ref: LocationRef): Promise<QoeStats> {
    return mapQoeStats(await this.client.get(identity, `${locationPath(ref)}/appqoe/AppQoeStatsByTrafficClass`));
  }

  async getOnlineStats(
    identity: string,
    ref: LocationRef,
    granularity: StatsGranularity,
    limit: number,
  ): Promise<OnlineStatsSeries> {
    const path = `${locationPath(ref)}/onlineStats`;
    const payload = await this.client.get(identity, path, { granularity, limit }, true);
    return mapOnlineStats(payload, path);
  }

  async getWanStats(identity: string, ref: LocationRef, limit = DEFAULT_WAN_SAMPLE_LIMIT): Promise<WanSample[]> {
    const path = `${locationPath(ref)}/wanStats`;
    const payload = await this.client.get(identity, path, { granularity: "15m", limit }, true);
    return mapWanSamples(payload, path);
  }
}

function locationPath(ref: LocationRef): string {
  return `Customers/${encodeURIComponent(ref.customerId)}/locations/${encodeURIComponent(ref.locationId)}`;
}
