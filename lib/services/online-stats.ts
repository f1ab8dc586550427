/**
 * Uptime/Incident Analyzer
 *
 * Online-state samples are taken in the order given; nothing is re-sorted.
 * Incidents use transition counting: each move into "offline" opens one
 * incident and consecutive offline samples extend it.
 */

import type { OnlineStateSample, OnlineStatsSeries, StatsGranularity } from "../infrastructure/plume/types";

export type ConnectivityTrend = "improving" | "stable" | "declining";
export type UptimeStatusLabel = "Excellent" | "Good" | "Fair" | "Poor" | "Critical";

export interface StateCounts {
  online: number;
  offline: number;
  intermittent: number;
}

export interface OfflineIncident {
  startedAt: string;
  state: "offline";
  durationSamples: number;
}

export interface UptimeMetrics {
  uptimePercentage: number;
  onlineCount: number;
  offlineCount: number;
  intermittentCount: number;
  totalCount: number;
  incidentCount: number;
  incidents: OfflineIncident[];
  trend: ConnectivityTrend;
  statusLabel: UptimeStatusLabel;
  timeRangeLabel: string;
  dateRange?: { start: string; end: string };
}

export interface TimeRangeOption {
  key: TimeRangeKey;
  granularity: StatsGranularity;
  limit: number;
  buttonLabel: string;
}

export type TimeRangeKey = "3h" | "24h" | "7d";

export const TIME_RANGES: Record<TimeRangeKey, TimeRangeOption> = {
  "3h": { key: "3h", granularity: "hours", limit: 3, buttonLabel: "Last 3 Hours" },
  "24h": { key: "24h", granularity: "days", limit: 1, buttonLabel: "Last 24 Hours" },
  "7d": { key: "7d", granularity: "days", limit: 7, buttonLabel: "Last 7 Days" },
};

export const DEFAULT_TIME_RANGE: TimeRangeKey = "7d";

export function isTimeRangeKey(value: string): value is TimeRangeKey {
  return value === "3h" || value === "24h" || value === "7d";
}

const MIN_TREND_SAMPLES = 4;
const TREND_THRESHOLD_POINTS = 5;

type StateLike = Pick<OnlineStateSample, "value">;

function stateOf(sample: StateLike): string {
  return sample.value.trim().toLowerCase();
}

export function calculateUptimePercentage(samples: readonly StateLike[]): number {
  if (samples.length === 0) {
    return 0;
  }
  const online = samples.filter((sample) => stateOf(sample) === "online").length;
  return (online / samples.length) * 100;
}

/**
 * Anything that is neither "online" nor "offline" counts as intermittent
 */
export function countStates(samples: readonly StateLike[]): StateCounts {
  const counts: StateCounts = { online: 0, offline: 0, intermittent: 0 };
  for (const sample of samples) {
    const state = stateOf(sample);
    if (state === "online") {
      counts.online++;
    } else if (state === "offline") {
      counts.offline++;
    } else {
      counts.intermittent++;
    }
  }
  return counts;
}

export function detectIncidents(samples: readonly OnlineStateSample[]): OfflineIncident[] {
  const incidents: OfflineIncident[] = [];
  let current: OfflineIncident | null = null;

  for (const sample of samples) {
    if (stateOf(sample) !== "offline") {
      current = null;
      continue;
    }
    if (current) {
      current.durationSamples++;
    } else {
      current = { startedAt: sample.timestamp, state: "offline", durationSamples: 1 };
      incidents.push(current);
    }
  }

  return incidents;
}

export function analyzeConnectivityTrend(samples: readonly StateLike[]): ConnectivityTrend {
  if (samples.length < MIN_TREND_SAMPLES) {
    return "stable";
  }

  const midpoint = Math.floor(samples.length / 2);
  const difference =
    calculateUptimePercentage(samples.slice(midpoint)) - calculateUptimePercentage(samples.slice(0, midpoint));

  if (difference > TREND_THRESHOLD_POINTS) {
    return "improving";
  }
  if (difference < -TREND_THRESHOLD_POINTS) {
    return "declining";
  }
  return "stable";
}

export function getStatusLabel(uptimePercentage: number): UptimeStatusLabel {
  if (uptimePercentage >= 99.5) return "Excellent";
  if (uptimePercentage >= 98) return "Good";
  if (uptimePercentage >= 95) return "Fair";
  if (uptimePercentage >= 90) return "Poor";
  return "Critical";
}

export function getTimeRangeLabel(granularity: string, limit: number): string {
  if (granularity === "hours") {
    return `Last ${limit} Hour${limit === 1 ? "" : "s"}`;
  }
  if (granularity === "days") {
    return limit === 1 ? "Last 24 Hours" : `Last ${limit} Days`;
  }
  return `Last ${limit} ${granularity}`;
}

export function processOnlineStats(
  series: OnlineStatsSeries,
  granularity: string,
  limit: number,
): UptimeMetrics {
  const { samples } = series;
  const uptimePercentage = calculateUptimePercentage(samples);
  const counts = countStates(samples);
  const incidents = detectIncidents(samples);

  return {
    uptimePercentage,
    onlineCount: counts.online,
    offlineCount: counts.offline,
    intermittentCount: counts.intermittent,
    totalCount: samples.length,
    incidentCount: incidents.length,
    incidents,
    trend: analyzeConnectivityTrend(samples),
    statusLabel: getStatusLabel(uptimePercentage),
    timeRangeLabel: getTimeRangeLabel(granularity, limit),
    dateRange: series.dateRange,
  };
}
