/**
 * Raw Plume payload -> domain model mapping.
 * Missing-field defaults live here and nowhere else.
 */

import type { z } from "zod";
import { PlumeDecodeError } from "../errors";
import {
  LIST_ENVELOPE_KEYS,
  PlumeBackhaulSchema,
  PlumeDeviceSchema,
  PlumeLocationSchema,
  PlumeNodeSchema,
  PlumeOnlineStateEntrySchema,
  PlumeOnlineStatsSchema,
  PlumeQoeSchema,
  PlumeServiceLevelSchema,
  PlumeTrafficClassStatSchema,
  PlumeWanSampleSchema,
  PlumeWifiNetworkSchema,
} from "../types/api-responses";
import type {
  InternetHealth,
  LocationSummary,
  NetworkDevice,
  NetworkNode,
  NodeHealthStatus,
  OnlineStatsSeries,
  QoeStats,
  ServiceLevel,
  WanSample,
  WifiNetwork,
} from "../types/domain-models";

const HEALTH_STATUSES: readonly NodeHealthStatus[] = ["excellent", "good", "fair", "poor", "unknown"];

/**
 * Extract the item list from a bare array or a known envelope key.
 * Anything else cannot be defaulted and fails.
 */
export function extractList(payload: unknown, endpoint: string): unknown[] {
  if (Array.isArray(payload)) {
    return payload;
  }
  if (typeof payload === "object" && payload !== null) {
    for (const key of LIST_ENVELOPE_KEYS) {
      const value: unknown = Reflect.get(payload, key);
      if (Array.isArray(value)) {
        return value;
      }
    }
  }
  throw new PlumeDecodeError(`Expected a list from ${endpoint}, got ${describeValue(payload)}`, endpoint);
}

function parseItems<T extends z.ZodTypeAny>(items: unknown[], schema: T, label: string): Array<z.infer<T>> {
  const parsed: Array<z.infer<T>> = [];
  let skipped = 0;
  for (const item of items) {
    const result = schema.safeParse(item);
    if (result.success) {
      parsed.push(result.data);
    } else {
      skipped++;
    }
  }
  if (skipped > 0) {
    console.warn(`[Plume Mapper] Skipped ${skipped} ${label} item(s) that were not objects`);
  }
  return parsed;
}

export function mapNodes(payload: unknown, endpoint = "nodes"): NetworkNode[] {
  return parseItems(extractList(payload, endpoint), PlumeNodeSchema, "node").map((raw) => {
    const id = raw.id !== null && raw.id !== undefined ? String(raw.id) : "";
    return {
      id,
      name: raw.nickname || raw.defaultName || raw.name || id || "Unknown Pod",
      connectionState: raw.connectionState ?? raw.status ?? "unknown",
      healthStatus: normalizeHealth(typeof raw.health === "string" ? raw.health : raw.health?.status),
      backhaulType: raw.backhaulType ?? undefined,
      alerts: normalizeAlerts(raw.alerts),
      connectedDeviceCount: toOptionalNumber(raw.connectedDeviceCount),
      model: raw.model ?? undefined,
      firmwareVersion: raw.firmwareVersion ?? undefined,
      serialNumber: raw.serialNumber ?? undefined,
    };
  });
}

export function mapDevices(payload: unknown, endpoint = "devices"): NetworkDevice[] {
  return parseItems(extractList(payload, endpoint), PlumeDeviceSchema, "device").map((raw) => {
    const mac = raw.mac || "N/A";
    const state = raw.connectionState ?? raw.status;
    return {
      mac,
      nickname: raw.nickname || raw.name || mac,
      type: raw.type || "Unknown",
      connected: typeof raw.connected === "boolean" ? raw.connected : state?.toLowerCase() === "connected",
    };
  });
}

/**
 * An empty or non-object body means "no service-level data".
 */
export function mapServiceLevel(payload: unknown): ServiceLevel {
  const parsed = PlumeServiceLevelSchema.safeParse(payload);
  if (!parsed.success) {
    return {};
  }
  return {
    status: parsed.data.status ?? undefined,
    connectionState: parsed.data.connectionState ?? undefined,
  };
}

export function mapQoeStats(payload: unknown): QoeStats {
  let entries: unknown[] = [];
  if (Array.isArray(payload)) {
    entries = payload;
  } else {
    const parsed = PlumeQoeSchema.safeParse(payload);
    entries = parsed.success ? parsed.data.trafficClassStats ?? [] : [];
  }

  return {
    trafficClasses: parseItems(entries, PlumeTrafficClassStatSchema, "QoE").map((raw) => ({
      trafficClass: raw.trafficClass || "unknown",
      health: raw.health ?? raw.qualityIndicator ?? "healthy",
    })),
  };
}

export function mapLocation(payload: unknown, endpoint = "location"): LocationSummary {
  const parsed = PlumeLocationSchema.safeParse(payload);
  if (!parsed.success) {
    throw new PlumeDecodeError(`Expected a location object from ${endpoint}, got ${describeValue(payload)}`, endpoint);
  }
  return toLocationSummary(parsed.data);
}

export function mapLocations(payload: unknown, endpoint = "locations"): LocationSummary[] {
  return parseItems(extractList(payload, endpoint), PlumeLocationSchema, "location").map(toLocationSummary);
}

/**
 * A missing or non-object backhaul body reads as an unknown internet state.
 */
export function mapInternetHealth(payload: unknown): InternetHealth {
  const parsed = PlumeBackhaulSchema.safeParse(payload);
  return { status: (parsed.success ? parsed.data.status : undefined) || "unknown" };
}

export function mapWifiNetworks(payload: unknown, endpoint = "wifiNetworks"): WifiNetwork[] {
  return parseItems(extractList(payload, endpoint), PlumeWifiNetworkSchema, "WiFi network").map((raw) => ({
    ssid: raw.ssid || raw.wifiNetwork?.ssid || "Unnamed network",
    enabled: raw.enabled ?? raw.wifiNetwork?.enabled ?? undefined,
    accessZone: raw.accessZone ?? undefined,
  }));
}

export function mapWanSamples(payload: unknown, endpoint = "wanStats"): WanSample[] {
  return parseItems(extractList(payload, endpoint), PlumeWanSampleSchema, "WAN sample").map((raw) => ({
    timestamp: normalizeTimestamp(raw.timestamp),
    rxMegabytes: toNullableNumber(raw.rxBytes),
    txMegabytes: toNullableNumber(raw.txBytes),
    peakRxMbps: toNullableNumber(raw.peakRxMbps),
    peakTxMbps: toNullableNumber(raw.peakTxMbps),
  }));
}

export function mapOnlineStats(payload: unknown, endpoint = "onlineStats"): OnlineStatsSeries {
  if (Array.isArray(payload)) {
    return { samples: mapOnlineStates(payload) };
  }

  const parsed = PlumeOnlineStatsSchema.safeParse(payload);
  if (!parsed.success) {
    throw new PlumeDecodeError(`Expected an online stats object from ${endpoint}, got ${describeValue(payload)}`, endpoint);
  }

  const range = parsed.data.statsDateRange;
  return {
    dateRange:
      range && range.start !== null && range.start !== undefined && range.end !== null && range.end !== undefined
        ? { start: normalizeTimestamp(range.start), end: normalizeTimestamp(range.end) }
        : undefined,
    samples: mapOnlineStates(parsed.data.locationState ?? []),
  };
}

function mapOnlineStates(entries: unknown[]) {
  return parseItems(entries, PlumeOnlineStateEntrySchema, "online state").map((raw) => ({
    timestamp: normalizeTimestamp(raw.timestamp),
    value: raw.value ?? "unknown",
  }));
}

function toLocationSummary(raw: z.infer<typeof PlumeLocationSchema>): LocationSummary {
  const speed = raw.lastThirtyDaysSpeedTestAverages;
  return {
    id: raw.id !== null && raw.id !== undefined ? String(raw.id) : "",
    name: raw.name || "Unknown Location",
    serviceLevelStatus: raw.serviceLevel?.status ?? undefined,
    connectedDevicesCount: toOptionalNumber(raw.connectedDevicesCount),
    speedTestAverages: speed
      ? {
          downloadMbps: toOptionalNumber(speed.downloadMbps),
          uploadMbps: toOptionalNumber(speed.uploadMbps),
        }
      : undefined,
  };
}

function normalizeHealth(value: string | null | undefined): NodeHealthStatus | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  const lowered = value.trim().toLowerCase();
  return HEALTH_STATUSES.find((status) => status === lowered) ?? "unknown";
}

function normalizeAlerts(alerts: unknown[] | null | undefined): string[] {
  if (!alerts) {
    return [];
  }
  const names: string[] = [];
  for (const alert of alerts) {
    if (typeof alert === "string") {
      if (alert) names.push(alert);
      continue;
    }
    if (typeof alert === "object" && alert !== null) {
      const type: unknown = Reflect.get(alert, "type");
      const name: unknown = Reflect.get(alert, "name");
      const label = typeof type === "string" && type ? type : typeof name === "string" && name ? name : undefined;
      if (label) names.push(label);
    }
  }
  return names;
}

/**
 * ISO strings pass through; numbers are epoch seconds or milliseconds.
 */
export function normalizeTimestamp(value: string | number | null | undefined): string {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    const ms = value < 1e12 ? value * 1000 : value;
    return new Date(ms).toISOString();
  }
  return "";
}

function toNullableNumber(value: number | string | null | undefined): number | null {
  return toOptionalNumber(value) ?? null;
}

function toOptionalNumber(value: number | string | null | undefined): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}
