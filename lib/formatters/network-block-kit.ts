/**
 * Network Block Kit Formatter
 *
 * Wraps the text reports in Slack blocks and adds the time-range and
 * navigation buttons handled by api/interactivity.ts.
 */

import type { KnownBlock } from "@slack/web-api";
import type { LocationHealthVerdict } from "../services/location-health";
import { TIME_RANGES, type TimeRangeKey, type UptimeMetrics } from "../services/online-stats";
import type { WanAnalysis } from "../services/wan-consumption";
import type {
  InternetHealth,
  LocationSummary,
  NetworkDevice,
  NetworkNode,
  WifiNetwork,
} from "../infrastructure/plume/types";
import {
  MessageEmojis,
  createActionsBlock,
  createContextBlock,
  createDivider,
  createHeaderBlock,
  createSectionBlock,
} from "../utils/message-styling";
import {
  formatConnectionSummary,
  formatDevicesList,
  formatHealthReport,
  formatNodesList,
  formatOnlineStatsMessage,
  formatWanReport,
  formatWifiNetworks,
} from "./network-reports";

export const TIME_RANGE_ACTION_PREFIX = "network_time_range_";
export const NAVIGATION_ACTION_PREFIX = "network_nav_";

export type NetworkView = "status" | "wan" | "stats" | "nodes" | "devices" | "wifi";

const NAVIGATION_LABELS: Record<NetworkView, string> = {
  status: "Location Health",
  wan: "WAN Consumption Report",
  stats: "Online Stats Report",
  nodes: "Pods",
  devices: "Devices",
  wifi: "WiFi Networks",
};

export function isNetworkView(value: string): value is NetworkView {
  return Object.hasOwn(NAVIGATION_LABELS, value);
}

/**
 * Buttons to every other report; the current one is left out
 */
export function buildNavigationBlock(current: NetworkView): KnownBlock {
  const views = Object.keys(NAVIGATION_LABELS).filter(isNetworkView).filter((view) => view !== current);
  return createActionsBlock(
    views.map((view) => ({
      text: NAVIGATION_LABELS[view],
      actionId: `${NAVIGATION_ACTION_PREFIX}${view}`,
      value: view,
    })),
    "network_navigation",
  );
}

export function buildTimeRangeBlock(selected: TimeRangeKey): KnownBlock {
  return createActionsBlock(
    Object.values(TIME_RANGES).map((range) => ({
      text: range.buttonLabel,
      actionId: `${TIME_RANGE_ACTION_PREFIX}${range.key}`,
      value: range.key,
      style: range.key === selected ? ("primary" as const) : undefined,
    })),
    "network_time_range",
  );
}

export function buildHealthBlocks(
  location: LocationSummary,
  verdict: LocationHealthVerdict,
  internet?: InternetHealth,
): KnownBlock[] {
  return [
    createHeaderBlock(`${MessageEmojis.LOCATION} Network Health`),
    createSectionBlock(formatHealthReport(location.name, verdict)),
    createSectionBlock(formatConnectionSummary(location, internet)),
    createDivider(),
    buildNavigationBlock("status"),
  ];
}

export function buildWanBlocks(locationName: string, analysis: WanAnalysis): KnownBlock[] {
  return [
    createHeaderBlock(`${MessageEmojis.CHART} WAN Consumption`),
    createSectionBlock(formatWanReport(locationName, analysis)),
    createContextBlock("Based on 15-minute samples from the last 24 hours. Times are UTC."),
    createDivider(),
    buildNavigationBlock("wan"),
  ];
}

/**
 * The dashboard is monospace art, so it goes inside a code block
 */
export function buildOnlineStatsBlocks(
  locationName: string,
  metrics: UptimeMetrics,
  selected: TimeRangeKey,
): KnownBlock[] {
  return [
    createHeaderBlock(`${MessageEmojis.CHART} Online Stats`),
    createSectionBlock("```\n" + formatOnlineStatsMessage(locationName, metrics) + "\n```"),
    createContextBlock("Select a time range to view:"),
    buildTimeRangeBlock(selected),
    createDivider(),
    buildNavigationBlock("stats"),
  ];
}

export function buildNodesBlocks(nodes: readonly NetworkNode[]): KnownBlock[] {
  return [createSectionBlock(formatNodesList(nodes)), createDivider(), buildNavigationBlock("nodes")];
}

export function buildDevicesBlocks(devices: readonly NetworkDevice[]): KnownBlock[] {
  return [createSectionBlock(formatDevicesList(devices)), createDivider(), buildNavigationBlock("devices")];
}

export function buildWifiBlocks(networks: readonly WifiNetwork[]): KnownBlock[] {
  return [createSectionBlock(formatWifiNetworks(networks)), createDivider(), buildNavigationBlock("wifi")];
}

export function buildMessageBlocks(text: string): KnownBlock[] {
  return [createSectionBlock(text)];
}
