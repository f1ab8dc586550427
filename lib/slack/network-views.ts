/**
 * Network report views shared by the /network command and the button handler.
 * Every view resolves to a message; errors become an error message instead of a throw.
 */

import type { KnownBlock } from "@slack/web-api";
import {
  buildDevicesBlocks,
  buildHealthBlocks,
  buildMessageBlocks,
  buildNavigationBlock,
  buildNodesBlocks,
  buildOnlineStatsBlocks,
  buildWanBlocks,
  buildWifiBlocks,
  type NetworkView,
} from "../formatters/network-block-kit";
import { formatLocationsList } from "../formatters/network-reports";
import type { LocationRef } from "../infrastructure/plume";
import type { NetworkMonitorService } from "../services/network-monitor-service";
import { DEFAULT_TIME_RANGE, type TimeRangeKey } from "../services/online-stats";
import { ErrorHandler } from "../utils/error-handler";
import { createSectionBlock } from "../utils/message-styling";
import { getSlackClient } from "./client";

export interface NetworkMessage {
  text: string;
  blocks: KnownBlock[];
}

export interface EphemeralTarget {
  channelId: string;
  userId: string;
}

const VIEW_OPERATIONS: Record<NetworkView, string> = {
  status: "location health",
  wan: "the WAN consumption report",
  stats: "online stats",
  nodes: "the pod list",
  devices: "the device list",
  wifi: "the WiFi network list",
};

export async function renderNetworkView(
  monitor: NetworkMonitorService,
  identity: string,
  view: NetworkView,
  range: TimeRangeKey = DEFAULT_TIME_RANGE,
): Promise<NetworkMessage> {
  try {
    switch (view) {
      case "status": {
        const report = await monitor.getLocationHealth(identity);
        return {
          text: `${report.location.name}: ${report.verdict.summary}`,
          blocks: buildHealthBlocks(report.location, report.verdict, report.internet),
        };
      }
      case "wan": {
        const report = await monitor.getWanReport(identity);
        return {
          text: `WAN consumption for ${report.location.name}`,
          blocks: buildWanBlocks(report.location.name, report.analysis),
        };
      }
      case "stats": {
        const report = await monitor.getOnlineStatsReport(identity, range);
        return {
          text: `${report.location.name}: ${report.metrics.uptimePercentage.toFixed(1)}% online (${report.metrics.timeRangeLabel})`,
          blocks: buildOnlineStatsBlocks(report.location.name, report.metrics, range),
        };
      }
      case "nodes": {
        const nodes = await monitor.getNodes(identity);
        return { text: `${nodes.length} pod(s)`, blocks: buildNodesBlocks(nodes) };
      }
      case "devices": {
        const devices = await monitor.getDevices(identity);
        return { text: `${devices.length} device(s)`, blocks: buildDevicesBlocks(devices) };
      }
      case "wifi": {
        const networks = await monitor.getWifiNetworks(identity);
        return { text: `${networks.length} WiFi network(s)`, blocks: buildWifiBlocks(networks) };
      }
    }
  } catch (error) {
    return errorMessage(error, VIEW_OPERATIONS[view], identity);
  }
}

export async function renderLocationSelection(
  monitor: NetworkMonitorService,
  identity: string,
  ref: LocationRef,
): Promise<NetworkMessage> {
  try {
    const selected = await monitor.selectLocation(identity, ref);
    const text = `✅ Now monitoring *${selected.name}* (\`${selected.locationId}\`).`;
    return { text, blocks: [createSectionBlock(text), buildNavigationBlock("status")] };
  } catch (error) {
    return errorMessage(error, "the location", identity);
  }
}

export async function renderLocationsList(
  monitor: NetworkMonitorService,
  identity: string,
  customerId: string,
): Promise<NetworkMessage> {
  try {
    const text = formatLocationsList(await monitor.listLocations(identity, customerId));
    return { text, blocks: buildMessageBlocks(text) };
  } catch (error) {
    return errorMessage(error, "locations", identity);
  }
}

export function textMessage(text: string): NetworkMessage {
  return { text, blocks: buildMessageBlocks(text) };
}

export async function postEphemeralMessage(target: EphemeralTarget, message: NetworkMessage): Promise<void> {
  await getSlackClient().chat.postEphemeral({
    channel: target.channelId,
    user: target.userId,
    text: message.text,
    blocks: message.blocks,
  });
}

function errorMessage(error: unknown, operation: string, userId: string): NetworkMessage {
  const result = ErrorHandler.handle(error, { operation, userId });
  return textMessage(ErrorHandler.formatForSlack(result));
}
