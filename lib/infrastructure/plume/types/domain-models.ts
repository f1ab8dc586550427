/**
 * Plume Domain Models
 *
 * Typed records the analyzers work on. Mappers in ../client/mappers.ts apply
 * every missing-field default once, so nothing downstream reads raw payloads.
 */

export interface PlumeCredentials {
  ssoUrl: string;
  authHeader: string;
  partnerId: string;
  apiBaseUrl: string;
  reportsApiBaseUrl?: string;
}

export interface PlumeTokenRecord {
  accessToken: string;
  expiresAt: number;  // epoch ms, already reduced by the safety margin
  expiresIn: number;  // seconds, as declared by the identity provider
}

export type NodeHealthStatus = "excellent" | "good" | "fair" | "poor" | "unknown";

export interface NetworkNode {
  id: string;
  name: string;
  connectionState: string;
  healthStatus?: NodeHealthStatus;
  backhaulType?: string;
  alerts: string[];
  connectedDeviceCount?: number;
  model?: string;
  firmwareVersion?: string;
  serialNumber?: string;
}

export interface NetworkDevice {
  mac: string;
  nickname: string;
  type: string;
  connected: boolean;
}

export interface ServiceLevel {
  status?: string;
  connectionState?: string;
}

export interface QoeTrafficClassStat {
  trafficClass: string;
  health: string;
}

export interface QoeStats {
  trafficClasses: QoeTrafficClassStat[];
}

export interface SpeedTestAverages {
  downloadMbps?: number;
  uploadMbps?: number;
}

export interface LocationSummary {
  id: string;
  name: string;
  serviceLevelStatus?: string;
  connectedDevicesCount?: number;
  speedTestAverages?: SpeedTestAverages;
}

export interface InternetHealth {
  status: string;
}

/** The encryption key is never mapped */
export interface WifiNetwork {
  ssid: string;
  enabled?: boolean;
  accessZone?: string;
}

export interface WanSample {
  timestamp: string;
  rxMegabytes: number | null;
  txMegabytes: number | null;
  peakRxMbps: number | null;
  peakTxMbps: number | null;
}

export interface OnlineStateSample {
  timestamp: string;
  value: string;
}

export interface OnlineStatsSeries {
  dateRange?: { start: string; end: string };
  samples: OnlineStateSample[];
}

export type StatsGranularity = "hours" | "days";
