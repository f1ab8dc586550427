/**
 * WAN Consumption Analyzer
 *
 * 15-minute WAN samples -> peaks, averages, p95, totals and busy hours.
 * Values are left unrounded; formatters round for display.
 */

import type { WanSample } from "../infrastructure/plume/types";

export type ActivityIntensity = "High activity" | "Moderate activity";

export interface PeakActivityWindow {
  hour: number;
  label: string;
  averageRxMbps: number;
  intensity: ActivityIntensity;
}

export interface WanAnalysis {
  peakRxMbps: number | null;
  peakRxTimestamp: string | null;
  peakTxMbps: number | null;
  peakTxTimestamp: string | null;
  averageRxMbps: number | null;
  averageTxMbps: number | null;
  p95RxMbps: number | null;
  p95TxMbps: number | null;
  totalRxMegabytes: number;
  totalTxMegabytes: number;
  dataQualityPercentage: number;
  peakWindows: PeakActivityWindow[];
  totalSamples: number;
  validSamples: number;
  nullSamples: number;
}

const MODERATE_ACTIVITY_FACTOR = 1.5;
const HIGH_ACTIVITY_FACTOR = 2;
const MAX_PEAK_WINDOWS = 3;

interface ValidWanSample {
  timestamp: string;
  rxMegabytes: number;
  txMegabytes: number;
  peakRxMbps: number;
  peakTxMbps: number;
}

function toValidSample(sample: WanSample): ValidWanSample | null {
  const { rxMegabytes, txMegabytes, peakRxMbps, peakTxMbps } = sample;
  if (rxMegabytes === null || txMegabytes === null || peakRxMbps === null || peakTxMbps === null) {
    return null;
  }
  return { timestamp: sample.timestamp, rxMegabytes, txMegabytes, peakRxMbps, peakTxMbps };
}

/**
 * Nearest-rank percentile: the value at floor(p * N) of the ascending sort,
 * clamped to the last index. Null for an empty list.
 */
export function percentile(values: readonly number[], p: number): number | null {
  if (values.length === 0) {
    return null;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const index = Math.min(Math.floor(p * sorted.length), sorted.length - 1);
  return sorted[index] ?? null;
}

function mean(values: readonly number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function formatHourWindow(hour: number): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  return `${pad(hour)}:00-${pad((hour + 1) % 24)}:00 UTC`;
}

/**
 * Hours (UTC) whose mean RX is well above the overall average, busiest first
 */
export function findPeakActivityWindows(
  samples: readonly ValidWanSample[],
  averageRxMbps: number | null,
): PeakActivityWindow[] {
  if (!averageRxMbps || averageRxMbps <= 0) {
    return [];
  }

  const buckets = new Map<number, number[]>();
  for (const sample of samples) {
    const time = Date.parse(sample.timestamp);
    if (Number.isNaN(time)) {
      continue;
    }
    const hour = new Date(time).getUTCHours();
    const bucket = buckets.get(hour) ?? [];
    bucket.push(sample.peakRxMbps);
    buckets.set(hour, bucket);
  }

  const candidates: PeakActivityWindow[] = [];
  for (const hour of [...buckets.keys()].sort((a, b) => a - b)) {
    const hourMean = mean(buckets.get(hour) ?? []);
    if (hourMean === null || hourMean <= averageRxMbps * MODERATE_ACTIVITY_FACTOR) {
      continue;
    }
    candidates.push({
      hour,
      label: formatHourWindow(hour),
      averageRxMbps: hourMean,
      intensity: hourMean > averageRxMbps * HIGH_ACTIVITY_FACTOR ? "High activity" : "Moderate activity",
    });
  }

  return candidates
    .sort((a, b) => b.averageRxMbps - a.averageRxMbps)
    .slice(0, MAX_PEAK_WINDOWS);
}

export function analyzeWanConsumption(samples: readonly WanSample[]): WanAnalysis {
  const valid: ValidWanSample[] = [];
  let totalRxMegabytes = 0;
  let totalTxMegabytes = 0;

  for (const sample of samples) {
    // Partial samples still count toward the byte totals
    if (sample.rxMegabytes !== null) totalRxMegabytes += sample.rxMegabytes;
    if (sample.txMegabytes !== null) totalTxMegabytes += sample.txMegabytes;

    const validSample = toValidSample(sample);
    if (validSample) {
      valid.push(validSample);
    }
  }

  let peakRx: ValidWanSample | null = null;
  let peakTx: ValidWanSample | null = null;
  for (const sample of valid) {
    if (!peakRx || sample.peakRxMbps > peakRx.peakRxMbps) peakRx = sample;
    if (!peakTx || sample.peakTxMbps > peakTx.peakTxMbps) peakTx = sample;
  }

  const rxValues = valid.map((sample) => sample.peakRxMbps);
  const txValues = valid.map((sample) => sample.peakTxMbps);
  const averageRxMbps = mean(rxValues);

  return {
    peakRxMbps: peakRx?.peakRxMbps ?? null,
    peakRxTimestamp: peakRx?.timestamp ?? null,
    peakTxMbps: peakTx?.peakTxMbps ?? null,
    peakTxTimestamp: peakTx?.timestamp ?? null,
    averageRxMbps,
    averageTxMbps: mean(txValues),
    p95RxMbps: percentile(rxValues, 0.95),
    p95TxMbps: percentile(txValues, 0.95),
    totalRxMegabytes,
    totalTxMegabytes,
    dataQualityPercentage: samples.length > 0 ? (valid.length / samples.length) * 100 : 0,
    peakWindows: findPeakActivityWindows(valid, averageRxMbps),
    totalSamples: samples.length,
    validSamples: valid.length,
    nullSamples: samples.length - valid.length,
  };
}
