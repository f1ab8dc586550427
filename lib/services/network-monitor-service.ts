/**
 * Network Monitor Service
 *
 * Health/stats queries for a caller's selected Plume location.
 * Fetches each report's data sources concurrently and hands them to the analyzers.
 */

import {
  PlumeClientError,
  PlumeDecodeError,
  PlumeServerError,
  getLocationRepository,
  getPlumeTokenCache,
  type InternetHealth,
  type LocationRef,
  type LocationRepository,
  type LocationSummary,
  type NetworkDevice,
  type NetworkNode,
  type PlumeTokenCache,
  type WifiNetwork,
} from "../infrastructure/plume";
import { analyzeLocationHealth, type LocationHealthVerdict } from "./location-health";
import { analyzeWanConsumption, type WanAnalysis } from "./wan-consumption";
import {
  DEFAULT_TIME_RANGE,
  TIME_RANGES,
  processOnlineStats,
  type TimeRangeKey,
  type TimeRangeOption,
  type UptimeMetrics,
} from "./online-stats";

export interface SelectedLocation extends LocationRef {
  name: string;
}

export interface LocationHealthReport {
  location: LocationSummary;
  nodes: NetworkNode[];
  devices: NetworkDevice[];
  internet?: InternetHealth;
  verdict: LocationHealthVerdict;
}

export interface WanReport {
  location: SelectedLocation;
  analysis: WanAnalysis;
}

export interface OnlineStatsReport {
  location: SelectedLocation;
  range: TimeRangeOption;
  metrics: UptimeMetrics;
}

export class LocationNotSelectedError extends Error {
  constructor(identity: string) {
    super(`No location selected for ${identity}. Use /network location <customerId> <locationId> first.`);
    this.name = "LocationNotSelectedError";
  }
}

export class NetworkMonitorService {
  private selections = new Map<string, SelectedLocation>();

  constructor(
    private readonly repository: LocationRepository,
    private readonly tokenCache: Pick<PlumeTokenCache, "clearCredentials" | "hasCredentials">,
  ) {}

  isConfigured(identity: string): boolean {
    return this.tokenCache.hasCredentials(identity);
  }

  async listLocations(identity: string, customerId: string): Promise<LocationSummary[]> {
    return this.repository.listLocations(identity, customerId);
  }

  /**
   * Look the location up once, then remember it for later reports
   */
  async selectLocation(identity: string, ref: LocationRef): Promise<SelectedLocation> {
    const summary = await this.repository.getLocation(identity, ref);
    const selected: SelectedLocation = { ...ref, name: summary.name };
    this.selections.set(identity, selected);
    console.log(`[Network Monitor] ${identity} selected location ${ref.locationId} (${summary.name})`);
    return selected;
  }

  getSelectedLocation(identity: string): SelectedLocation | undefined {
    return this.selections.get(identity);
  }

  /**
   * Forget the selection and the stored credentials
   */
  logout(identity: string): boolean {
    this.selections.delete(identity);
    return this.tokenCache.clearCredentials(identity);
  }

  async getLocationHealth(identity: string): Promise<LocationHealthReport> {
    const ref = this.requireSelection(identity);

    const [location, nodes, devices, serviceLevel, qoe, internet] = await Promise.all([
      this.repository.getLocation(identity, ref),
      this.repository.getNodes(identity, ref),
      this.optional("devices", () => this.repository.getDevices(identity, ref)),
      this.optional("service level", () => this.repository.getServiceLevel(identity, ref)),
      this.optional("QoE stats", () => this.repository.getQoeStats(identity, ref)),
      this.optional("internet health", () => this.repository.getInternetHealth(identity, ref)),
    ]);

    // Without a device list the connected count falls back to the per-pod counts
    const verdict = analyzeLocationHealth({ nodes, devices, serviceLevel, qoe, location });
    console.log(`[Network Monitor] Health for ${ref.locationId}: ${verdict.summary}`);
    return { location, nodes, devices: devices ?? [], internet, verdict };
  }

  async getWanReport(identity: string): Promise<WanReport> {
    const location = this.requireSelection(identity);
    const samples = await this.repository.getWanStats(identity, location);
    return { location, analysis: analyzeWanConsumption(samples) };
  }

  async getOnlineStatsReport(identity: string, rangeKey: TimeRangeKey = DEFAULT_TIME_RANGE): Promise<OnlineStatsReport> {
    const location = this.requireSelection(identity);
    const range = TIME_RANGES[rangeKey];
    const series = await this.repository.getOnlineStats(identity, location, range.granularity, range.limit);
    return { location, range, metrics: processOnlineStats(series, range.granularity, range.limit) };
  }

  async getNodes(identity: string): Promise<NetworkNode[]> {
    return this.repository.getNodes(identity, this.requireSelection(identity));
  }

  async getDevices(identity: string): Promise<NetworkDevice[]> {
    return this.repository.getDevices(identity, this.requireSelection(identity));
  }

  async getWifiNetworks(identity: string): Promise<WifiNetwork[]> {
    return this.repository.getWifiNetworks(identity, this.requireSelection(identity));
  }

  private requireSelection(identity: string): SelectedLocation {
    const selected = this.selections.get(identity);
    if (!selected) {
      throw new LocationNotSelectedError(identity);
    }
    return selected;
  }

  /**
   * Secondary sources degrade to "no data" on API-side failures.
   * Auth and transport errors still propagate.
   */
  private async optional<T>(label: string, load: () => Promise<T>): Promise<T | undefined> {
    try {
      return await load();
    } catch (error) {
      if (error instanceof PlumeClientError || error instanceof PlumeServerError || error instanceof PlumeDecodeError) {
        console.warn(`[Network Monitor] ${label} unavailable: ${error.message}`);
        return undefined;
      }
      throw error;
    }
  }
}

let service: NetworkMonitorService | undefined;

export function getNetworkMonitorService(): NetworkMonitorService {
  if (!service) {
    service = new NetworkMonitorService(getLocationRepository(), getPlumeTokenCache());
  }
  return service;
}

export function __resetNetworkMonitorService(): void {
  service = undefined;
}
