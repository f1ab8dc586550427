import { config as loadEnv } from "dotenv";
import { describeConfig, getPlumeConfig, refreshConfig } from "../lib/config";
import {
  formatConnectionSummary,
  formatHealthReport,
  formatOnlineStatsMessage,
  formatWanReport,
} from "../lib/formatters/network-reports";
import { getPlumeTokenCache } from "../lib/infrastructure/plume";
import { getNetworkMonitorService } from "../lib/services/network-monitor-service";
import { DEFAULT_TIME_RANGE, isTimeRangeKey } from "../lib/services/online-stats";

loadEnv();
loadEnv({ path: ".env.local", override: true });
refreshConfig();

const IDENTITY = "cli";

async function main(): Promise<void> {
  const authHeader = process.env.PLUME_AUTH_HEADER;
  const partnerId = process.env.PLUME_PARTNER_ID;
  const customerId = process.env.PLUME_CUSTOMER_ID;
  const locationId = process.env.PLUME_LOCATION_ID;
  const rangeArg = process.argv[2] ?? DEFAULT_TIME_RANGE;

  if (!authHeader || !partnerId || !customerId || !locationId) {
    console.error(
      "Set PLUME_AUTH_HEADER, PLUME_PARTNER_ID, PLUME_CUSTOMER_ID and PLUME_LOCATION_ID (in .env or .env.local)",
    );
    process.exitCode = 1;
    return;
  }
  if (!isTimeRangeKey(rangeArg)) {
    console.error(`Unknown time range "${rangeArg}". Use 3h, 24h or 7d.`);
    process.exitCode = 1;
    return;
  }

  console.log("[Config]", describeConfig());

  const plumeConfig = getPlumeConfig();
  getPlumeTokenCache().setCredentials(IDENTITY, {
    ssoUrl: plumeConfig.ssoUrl,
    authHeader,
    partnerId,
    apiBaseUrl: plumeConfig.apiBaseUrl,
    reportsApiBaseUrl: plumeConfig.reportsApiBaseUrl,
  });

  const monitor = getNetworkMonitorService();
  const location = await monitor.selectLocation(IDENTITY, { customerId, locationId });

  const [health, wan, stats] = await Promise.all([
    monitor.getLocationHealth(IDENTITY),
    monitor.getWanReport(IDENTITY),
    monitor.getOnlineStatsReport(IDENTITY, rangeArg),
  ]);

  console.log(formatHealthReport(location.name, health.verdict));
  console.log(formatConnectionSummary(health.location, health.internet));
  console.log("");
  console.log(formatWanReport(location.name, wan.analysis));
  console.log("");
  console.log(formatOnlineStatsMessage(location.name, stats.metrics));
}

main().catch((error: unknown) => {
  console.error("❌ Location health check failed:", error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
