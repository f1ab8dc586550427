/**
 * Network Report Formatters
 *
 * Plain mrkdwn text for each analyzer output. Pure functions: inputs are never
 * mutated and empty inputs render "N/A" or "No data available".
 */

import type {
  InternetHealth,
  LocationSummary,
  NetworkDevice,
  NetworkNode,
  WifiNetwork,
} from "../infrastructure/plume/types";
import type { HealthSeverity, LocationHealthVerdict } from "../services/location-health";
import { isGatewayNode } from "../services/location-health";
import type { ConnectivityTrend, UptimeMetrics } from "../services/online-stats";
import type { WanAnalysis } from "../services/wan-consumption";
import { MessageEmojis } from "../utils/message-styling";

export const NO_DATA = "No data available";
export const NOT_AVAILABLE = "N/A";
export const MAX_LISTED_DEVICES = 10;

const PROGRESS_BAR_LENGTH = 8;

// ============================================================================
// NUMBER FORMATTING
// ============================================================================

export function formatNumber(value: number, decimals = 0): string {
  return value.toLocaleString("en-US", {
    minimumFractionDigits: decimals,
    maximumFractionDigits: decimals,
  });
}

export function formatMbps(value: number | null | undefined): string {
  if (value === null || value === undefined || !Number.isFinite(value)) {
    return NOT_AVAILABLE;
  }
  return `${formatNumber(value, 2)} Mbps`;
}

export function formatPercent(value: number): string {
  return `${formatNumber(value, 1)}%`;
}

function formatMegabytes(value: number): string {
  return `${formatNumber(value, 2)} MB`;
}

// ============================================================================
// SHARED PIECES
// ============================================================================

export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  if (maxLength <= 3) {
    return text.slice(0, maxLength);
  }
  return `${text.slice(0, maxLength - 1)}…`;
}

export function formatProgressBar(percentage: number, length = PROGRESS_BAR_LENGTH): string {
  const filled = Math.max(0, Math.min(length, Math.floor((percentage / 100) * length)));
  return "█".repeat(filled) + "░".repeat(length - filled);
}

export function getStatusEmoji(statusLabel: string): string {
  switch (statusLabel) {
    case "Excellent":
    case "Good":
      return MessageEmojis.SUCCESS;
    case "Fair":
      return MessageEmojis.DEGRADED;
    case "Poor":
      return MessageEmojis.DISRUPTED;
    case "Critical":
      return MessageEmojis.OFFLINE;
    default:
      return MessageEmojis.UNKNOWN;
  }
}

export function getTrendDisplay(trend: ConnectivityTrend): string {
  const labels: Record<ConnectivityTrend, string> = {
    improving: "↗️ Improving",
    stable: "➡️ Stable",
    declining: "↘️ Declining",
  };
  return labels[trend];
}

export function getSeverityEmoji(severity: HealthSeverity): string {
  const emojis: Record<HealthSeverity, string> = {
    offline: MessageEmojis.OFFLINE,
    disrupted: MessageEmojis.DISRUPTED,
    warning: MessageEmojis.DEGRADED,
    degraded: MessageEmojis.DEGRADED,
    healthy: MessageEmojis.HEALTHY,
  };
  return emojis[severity];
}

function bulletList(items: readonly string[]): string[] {
  return items.map((item) => `• ${item}`);
}

// ============================================================================
// LOCATION HEALTH
// ============================================================================

export function formatHealthReport(locationName: string, verdict: LocationHealthVerdict): string {
  const connectedPods = verdict.pods.filter((pod) => pod.connected).length;
  const lines = [
    `${MessageEmojis.LOCATION} *${locationName}*`,
    `${getSeverityEmoji(verdict.severity)} *${verdict.summary}*`,
    "",
    `*Pods:* ${verdict.pods.length > 0 ? `${connectedPods}/${verdict.pods.length} connected` : NOT_AVAILABLE}`,
    `*Connected devices:* ${formatNumber(verdict.connectedDeviceCount)}`,
    `*Service level:* ${verdict.serviceLevelStatus ?? NOT_AVAILABLE}`,
  ];

  if (verdict.issues.length > 0) {
    lines.push("", "*Issues*", ...bulletList(verdict.issues));
  }
  if (verdict.warnings.length > 0) {
    lines.push("", "*Warnings*", ...bulletList(verdict.warnings));
  }

  return lines.join("\n");
}

/**
 * Location card: speed-test averages and device count from the location summary
 */
/**
 * Internet status plus the location's 30-day speed-test averages
 */
export function formatConnectionSummary(location: LocationSummary, internet?: InternetHealth): string {
  const speed = location.speedTestAverages;
  return [
    `${MessageEmojis.INTERNET} Internet: *${internet?.status ?? "unknown"}*`,
    `*30-day speed test download / upload:* ${formatMbps(speed?.downloadMbps)} / ${formatMbps(speed?.uploadMbps)}`,
  ].join("\n");
}

export function formatLocationsList(locations: readonly LocationSummary[]): string {
  if (locations.length === 0) {
    return `${MessageEmojis.LOCATION} *Locations*\n${NO_DATA}`;
  }
  return [
    `${MessageEmojis.LOCATION} *Locations*`,
    ...locations.map((location) => `• *${location.name}* (\`${location.id || NOT_AVAILABLE}\`)`),
  ].join("\n");
}

// ============================================================================
// WAN CONSUMPTION
// ============================================================================

export function formatWanReport(locationName: string, analysis: WanAnalysis): string {
  const title = `${MessageEmojis.CHART} *WAN Consumption: ${locationName}*`;
  if (analysis.totalSamples === 0) {
    return `${title}\n${NO_DATA}`;
  }

  const lines = [
    title,
    `*Peak download:* ${formatPeak(analysis.peakRxMbps, analysis.peakRxTimestamp)}`,
    `*Peak upload:* ${formatPeak(analysis.peakTxMbps, analysis.peakTxTimestamp)}`,
    `*Average download / upload:* ${formatMbps(analysis.averageRxMbps)} / ${formatMbps(analysis.averageTxMbps)}`,
    `*95th percentile download / upload:* ${formatMbps(analysis.p95RxMbps)} / ${formatMbps(analysis.p95TxMbps)}`,
    `*Total transferred:* ${formatMegabytes(analysis.totalRxMegabytes)} down / ${formatMegabytes(analysis.totalTxMegabytes)} up`,
    `*Data quality:* ${formatPercent(analysis.dataQualityPercentage)} (${formatNumber(analysis.validSamples)}/${formatNumber(analysis.totalSamples)} samples complete)`,
    "",
    "*Peak activity windows*",
  ];

  if (analysis.peakWindows.length === 0) {
    lines.push(NOT_AVAILABLE);
  } else {
    lines.push(
      ...bulletList(
        analysis.peakWindows.map(
          (window) => `${window.label}: ${formatMbps(window.averageRxMbps)} (${window.intensity})`,
        ),
      ),
    );
  }

  return lines.join("\n");
}

function formatPeak(value: number | null, timestamp: string | null): string {
  if (value === null) {
    return NOT_AVAILABLE;
  }
  return timestamp ? `${formatMbps(value)} at ${timestamp}` : formatMbps(value);
}

// ============================================================================
// ONLINE STATS
// ============================================================================

export function formatStatusBox(metrics: UptimeMetrics): string {
  const status = truncateText(metrics.statusLabel, 15).padEnd(15);
  const timeRange = truncateText(metrics.timeRangeLabel, 22).padEnd(22);
  const trend = truncateText(getTrendDisplay(metrics.trend), 14).padEnd(14);
  const incidents = String(metrics.incidentCount).slice(0, 13).padEnd(13);

  return [
    "┌──────────────────────────────┐",
    `│  ${getStatusEmoji(metrics.statusLabel)} Status: ${status} │`,
    `│  ${MessageEmojis.CLOCK}  ${timeRange} │`,
    `│  ${MessageEmojis.TREND} Trend: ${trend} │`,
    `│  ${MessageEmojis.BELL} Incidents: ${incidents} │`,
    "└──────────────────────────────┘",
  ].join("\n");
}

export function formatBreakdown(
  metrics: Pick<UptimeMetrics, "onlineCount" | "intermittentCount" | "offlineCount" | "totalCount">,
): string {
  const heading = `${MessageEmojis.CHART} DETAILED BREAKDOWN:`;
  if (metrics.totalCount === 0) {
    return `${heading}\n   ${NO_DATA}`;
  }

  const row = (label: string, count: number) => {
    const share = ((count / metrics.totalCount) * 100).toFixed(1).padStart(5);
    return `${label}${String(count).padStart(4)} (${share}%)`;
  };

  return [
    heading,
    row(`   ${MessageEmojis.HEALTHY} Online:      `, metrics.onlineCount),
    row(`   ${MessageEmojis.DEGRADED} Intermittent:`, metrics.intermittentCount),
    row(`   ${MessageEmojis.OFFLINE} Offline:     `, metrics.offlineCount),
  ].join("\n");
}

export function formatOnlineStatsMessage(locationName: string, metrics: UptimeMetrics): string {
  const displayName = truncateText(locationName, 22).padEnd(22);
  const uptime = metrics.uptimePercentage.toFixed(1).padStart(5);

  const header = [
    "╭──────────────────────────────╮",
    `│   ${MessageEmojis.LOCATION} ${displayName} │`,
    "│   Connection Status Report   │",
    "╰──────────────────────────────╯",
  ].join("\n");

  const uptimeDisplay = [
    "         ╭─────────────╮",
    `         │  ${MessageEmojis.CHART} ${uptime}%  │`,
    `         │   ${formatProgressBar(metrics.uptimePercentage)}  │`,
    "         │   ONLINE    │",
    "         ╰─────────────╯",
  ].join("\n");

  return `${header}\n\n${uptimeDisplay}\n\n${formatStatusBox(metrics)}\n\n${formatBreakdown(metrics)}`;
}

// ============================================================================
// NODES & DEVICES
// ============================================================================

export function formatNodesList(nodes: readonly NetworkNode[]): string {
  const heading = `${MessageEmojis.POD} *Pods*`;
  if (nodes.length === 0) {
    return `${heading}\n${NO_DATA}`;
  }

  const lines = [heading];
  for (const node of nodes) {
    lines.push(
      `• ${node.name}${isGatewayNode(node) ? " (gateway)" : ""}`,
      `  Status: *${node.connectionState}*`,
      `  Model: ${node.model ?? NOT_AVAILABLE}`,
      `  Firmware: ${node.firmwareVersion ?? NOT_AVAILABLE}`,
    );
  }
  return lines.join("\n");
}

export function formatDevicesList(devices: readonly NetworkDevice[]): string {
  const heading = `${MessageEmojis.DEVICE} *Devices*`;
  if (devices.length === 0) {
    return `${heading}\n${NO_DATA}`;
  }

  const lines = [heading];
  for (const device of devices.slice(0, MAX_LISTED_DEVICES)) {
    lines.push(
      `• ${device.nickname} (${device.type})`,
      `  MAC: \`${device.mac}\``,
      `  Status: ${device.connected ? "connected" : "disconnected"}`,
    );
  }

  if (devices.length > MAX_LISTED_DEVICES) {
    lines.push("", `... and ${devices.length - MAX_LISTED_DEVICES} more devices`);
  }
  return lines.join("\n");
}

export function formatWifiNetworks(networks: readonly WifiNetwork[]): string {
  const heading = `${MessageEmojis.WIFI} *WiFi Networks*`;
  if (networks.length === 0) {
    return `${heading}\n${NO_DATA}`;
  }

  const lines = [heading];
  for (const network of networks) {
    const details: string[] = [];
    if (network.enabled !== undefined) {
      details.push(network.enabled ? "enabled" : "disabled");
    }
    if (network.accessZone) {
      details.push(`${network.accessZone} zone`);
    }
    lines.push(`• *${network.ssid}*${details.length > 0 ? ` (${details.join(", ")})` : ""}`);
  }
  return lines.join("\n");
}
