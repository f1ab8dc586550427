/**
 * Plume API Response Schemas
 *
 * Raw payload shapes as the Plume Cloud API returns them. Every field is
 * optional and a field of the wrong type reads as absent; unknown keys pass
 * through untouched. Only a non-object item fails to parse.
 */

import { z } from "zod";

const optionalString = z.string().nullish().catch(undefined);
const optionalBoolean = z.boolean().nullish().catch(undefined);
const optionalId = z.union([z.string(), z.number()]).nullish().catch(undefined);
const optionalNumeric = z.union([z.number(), z.string()]).nullish().catch(undefined);
const optionalTimestamp = z.union([z.string(), z.number()]).nullish().catch(undefined);

export const PlumeNodeSchema = z
  .object({
    id: optionalId,
    nickname: optionalString,
    defaultName: optionalString,
    name: optionalString,
    connectionState: optionalString,
    status: optionalString,
    health: z
      .union([z.string(), z.object({ status: optionalString }).passthrough()])
      .nullish()
      .catch(undefined),
    backhaulType: optionalString,
    alerts: z
      .array(z.union([z.string(), z.object({ type: optionalString, name: optionalString }).passthrough(), z.unknown()]))
      .nullish()
      .catch(undefined),
    connectedDeviceCount: optionalNumeric,
    model: optionalString,
    firmwareVersion: optionalString,
    serialNumber: optionalString,
  })
  .passthrough();

export const PlumeDeviceSchema = z
  .object({
    mac: optionalString,
    nickname: optionalString,
    name: optionalString,
    type: optionalString,
    connected: optionalBoolean,
    connectionState: optionalString,
    status: optionalString,
  })
  .passthrough();

export const PlumeServiceLevelSchema = z
  .object({
    status: optionalString,
    connectionState: optionalString,
  })
  .passthrough();

export const PlumeTrafficClassStatSchema = z
  .object({
    trafficClass: optionalString,
    health: optionalString,
    qualityIndicator: optionalString,
  })
  .passthrough();

export const PlumeQoeSchema = z
  .object({
    trafficClassStats: z.array(z.unknown()).nullish().catch(undefined),
  })
  .passthrough();

export const PlumeLocationSchema = z
  .object({
    id: optionalId,
    name: optionalString,
    serviceLevel: z.object({ status: optionalString }).passthrough().nullish().catch(undefined),
    connectedDevicesCount: optionalNumeric,
    lastThirtyDaysSpeedTestAverages: z
      .object({ downloadMbps: optionalNumeric, uploadMbps: optionalNumeric })
      .passthrough()
      .nullish()
      .catch(undefined),
  })
  .passthrough();

export const PlumeBackhaulSchema = z
  .object({
    status: optionalString,
  })
  .passthrough();

export const PlumeWifiNetworkSchema = z
  .object({
    ssid: optionalString,
    enabled: optionalBoolean,
    accessZone: optionalString,
    wifiNetwork: z
      .object({ ssid: optionalString, enabled: optionalBoolean })
      .passthrough()
      .nullish()
      .catch(undefined),
  })
  .passthrough();

export const PlumeWanSampleSchema = z
  .object({
    timestamp: optionalTimestamp,
    rxBytes: optionalNumeric,
    txBytes: optionalNumeric,
    peakRxMbps: optionalNumeric,
    peakTxMbps: optionalNumeric,
  })
  .passthrough();

export const PlumeOnlineStatsSchema = z
  .object({
    statsDateRange: z
      .object({ start: optionalTimestamp, end: optionalTimestamp })
      .passthrough()
      .nullish()
      .catch(undefined),
    locationState: z.array(z.unknown()).nullish().catch(undefined),
  })
  .passthrough();

export const PlumeOnlineStateEntrySchema = z
  .object({
    timestamp: optionalTimestamp,
    value: optionalString,
  })
  .passthrough();

export type PlumeNodeResponse = z.infer<typeof PlumeNodeSchema>;
export type PlumeDeviceResponse = z.infer<typeof PlumeDeviceSchema>;
export type PlumeServiceLevelResponse = z.infer<typeof PlumeServiceLevelSchema>;
export type PlumeQoeResponse = z.infer<typeof PlumeQoeSchema>;
export type PlumeLocationResponse = z.infer<typeof PlumeLocationSchema>;
export type PlumeBackhaulResponse = z.infer<typeof PlumeBackhaulSchema>;
export type PlumeWifiNetworkResponse = z.infer<typeof PlumeWifiNetworkSchema>;
export type PlumeWanSampleResponse = z.infer<typeof PlumeWanSampleSchema>;
export type PlumeOnlineStatsResponse = z.infer<typeof PlumeOnlineStatsSchema>;

/**
 * List endpoints answer either with a bare array or wrapped in one of these keys
 */
export const LIST_ENVELOPE_KEYS = ["items", "data", "nodes", "devices", "locations", "wanStats", "wifiNetworks"] as const;
