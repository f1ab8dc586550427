/**
 * Location Health Analyzer
 *
 * Reduces nodes, devices, service level and QoE into one verdict.
 * Pure: no I/O, never throws on missing fields.
 */

import type {
  LocationSummary,
  NetworkDevice,
  NetworkNode,
  NodeHealthStatus,
  QoeStats,
  ServiceLevel,
} from "../infrastructure/plume/types";

export type HealthSeverity = "offline" | "disrupted" | "warning" | "degraded" | "healthy";

export const HEALTH_SUMMARIES = {
  noPods: "NO PODS FOUND",
  offline: "LOCATION IS OFFLINE",
  degraded: "DEGRADED SERVICE",
  operational: "ALL SYSTEMS OPERATIONAL",
} as const;

export interface PodDetail {
  id: string;
  name: string;
  connected: boolean;
  isGateway: boolean;
  healthStatus?: NodeHealthStatus;
  backhaulType?: string;
  alerts: string[];
  connectedDeviceCount?: number;
}

export interface LocationHealthInput {
  nodes: NetworkNode[];
  devices?: NetworkDevice[];
  serviceLevel?: ServiceLevel;
  qoe?: QoeStats;
  location?: LocationSummary;
}

export interface LocationHealthVerdict {
  online: boolean;
  issues: string[];
  warnings: string[];
  disconnectedNodes: string[];
  pods: PodDetail[];
  poorQoeTrafficClasses: string[];
  connectedDeviceCount: number;
  serviceLevelStatus?: string;
  summary: string;
  severity: HealthSeverity;
}

const CONNECTED_STATES = new Set(["connected", "online"]);
const WARNING_HEALTH: ReadonlySet<NodeHealthStatus> = new Set<NodeHealthStatus>(["fair", "poor"]);

export function isGatewayNode(node: Pick<NetworkNode, "backhaulType">): boolean {
  return node.backhaulType?.toLowerCase() === "ethernet";
}

export function isNodeConnected(node: Pick<NetworkNode, "connectionState">): boolean {
  return CONNECTED_STATES.has(node.connectionState.trim().toLowerCase());
}

/**
 * "Full Service", "FULL_SERVICE" and "fullService" all mean full service.
 * A missing status counts as full service.
 */
export function isFullService(status: string | undefined): boolean {
  if (!status) {
    return true;
  }
  const normalized = status.replace(/[^a-z]/gi, "").toLowerCase();
  return normalized === "" || normalized === "fullservice";
}

export function analyzeLocationHealth(input: LocationHealthInput): LocationHealthVerdict {
  const { nodes, devices, serviceLevel, qoe, location } = input;

  const issues: string[] = [];
  const warnings: string[] = [];
  const disconnectedNodes: string[] = [];
  const pods: PodDetail[] = [];
  let connectedGateways = 0;
  let nodeDeviceTotal = 0;

  for (const node of nodes) {
    const connected = isNodeConnected(node);
    const isGateway = isGatewayNode(node);

    pods.push({
      id: node.id,
      name: node.name,
      connected,
      isGateway,
      healthStatus: node.healthStatus,
      backhaulType: node.backhaulType,
      alerts: [...node.alerts],
      connectedDeviceCount: node.connectedDeviceCount,
    });

    if (!connected) {
      issues.push(`${node.name} is disconnected`);
      disconnectedNodes.push(node.name);
      continue;
    }

    if (isGateway) {
      connectedGateways++;
    }
    nodeDeviceTotal += node.connectedDeviceCount ?? 0;

    if (node.healthStatus && WARNING_HEALTH.has(node.healthStatus)) {
      warnings.push(`${node.name} health is ${node.healthStatus}`);
    }
    for (const alert of node.alerts) {
      warnings.push(`${node.name} alert: ${alert}`);
    }
  }

  const poorQoeTrafficClasses: string[] = [];
  for (const stat of qoe?.trafficClasses ?? []) {
    if (stat.health.toLowerCase().includes("poor")) {
      poorQoeTrafficClasses.push(stat.trafficClass);
      warnings.push(`Poor QoE detected for ${stat.trafficClass} traffic`);
    }
  }

  const connectedDeviceCount = devices
    ? devices.filter((device) => device.connected).length
    : nodeDeviceTotal;

  const serviceLevelStatus = serviceLevel?.status || location?.serviceLevelStatus || undefined;
  const online = connectedGateways > 0;

  let summary: string;
  let severity: HealthSeverity;
  if (nodes.length === 0) {
    summary = HEALTH_SUMMARIES.noPods;
    severity = "offline";
  } else if (!online) {
    summary = HEALTH_SUMMARIES.offline;
    severity = "offline";
  } else if (issues.length > 0) {
    summary = `ONLINE but ${pluralize(issues.length, "pod")} disconnected`;
    severity = "disrupted";
  } else if (warnings.length > 0) {
    summary = `ONLINE but ${pluralize(warnings.length, "health issue")}`;
    severity = "warning";
  } else if (!isFullService(serviceLevelStatus)) {
    summary = HEALTH_SUMMARIES.degraded;
    severity = "degraded";
    warnings.push(`Service level is ${serviceLevelStatus}`);
  } else {
    summary = HEALTH_SUMMARIES.operational;
    severity = "healthy";
  }

  return {
    online,
    issues,
    warnings,
    disconnectedNodes,
    pods,
    poorQoeTrafficClasses,
    connectedDeviceCount,
    serviceLevelStatus,
    summary,
    severity,
  };
}

function pluralize(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}
