import { describe, expect, it } from "vitest";
import type { NetworkDevice, NetworkNode, WanSample } from "../../lib/infrastructure/plume/types";
import {
  formatBreakdown,
  formatDevicesList,
  formatHealthReport,
  formatConnectionSummary,
  formatLocationsList,
  formatMbps,
  formatNodesList,
  formatOnlineStatsMessage,
  formatPercent,
  formatProgressBar,
  formatStatusBox,
  formatWanReport,
  formatWifiNetworks,
  truncateText,
} from "../../lib/formatters/network-reports";
import { analyzeLocationHealth } from "../../lib/services/location-health";
import { processOnlineStats } from "../../lib/services/online-stats";
import { analyzeWanConsumption } from "../../lib/services/wan-consumption";

function node(overrides: Partial<NetworkNode> = {}): NetworkNode {
  return {
    id: "node-1",
    name: "Gateway",
    connectionState: "connected",
    healthStatus: "good",
    backhaulType: "ethernet",
    alerts: [],
    ...overrides,
  };
}

describe("number helpers", () => {
  it("formats throughput with two decimals and grouping", () => {
    expect(formatMbps(1234.5)).toBe("1,234.50 Mbps");
    expect(formatMbps(null)).toBe("N/A");
    expect(formatMbps(Number.NaN)).toBe("N/A");
  });

  it("formats percentages with one decimal", () => {
    expect(formatPercent(97.26)).toBe("97.3%");
    expect(formatPercent(0)).toBe("0.0%");
  });

  it("truncates with an ellipsis", () => {
    expect(truncateText("abcdefghij", 5)).toBe("abcd…");
    expect(truncateText("abc", 5)).toBe("abc");
    expect(truncateText("abcdef", 3)).toBe("abc");
  });

  it("draws an eight-cell progress bar", () => {
    expect(formatProgressBar(50)).toBe("████░░░░");
    expect(formatProgressBar(99.9)).toBe("███████░");
    expect(formatProgressBar(100)).toBe("████████");
    expect(formatProgressBar(-5)).toBe("░░░░░░░░");
  });
});

describe("formatHealthReport", () => {
  it("lists counts, issues and warnings", () => {
    const verdict = analyzeLocationHealth({
      nodes: [node({ alerts: ["reboot"] }), node({ id: "node-2", name: "Pod 2", backhaulType: "wifi", connectionState: "disconnected" })],
    });

    expect(formatHealthReport("Main Office", verdict)).toBe(
      [
        "🏢 *Main Office*",
        "🟠 *ONLINE but 1 pod disconnected*",
        "",
        "*Pods:* 1/2 connected",
        "*Connected devices:* 0",
        "*Service level:* N/A",
        "",
        "*Issues*",
        "• Pod 2 is disconnected",
        "",
        "*Warnings*",
        "• Gateway alert: reboot",
      ].join("\n"),
    );
  });

  it("renders N/A pods when none were found", () => {
    const text = formatHealthReport("Empty", analyzeLocationHealth({ nodes: [] }));

    expect(text.split("\n").slice(0, 4)).toEqual(["🏢 *Empty*", "🔴 *NO PODS FOUND*", "", "*Pods:* N/A"]);
  });

  it("does not mutate the verdict", () => {
    const verdict = analyzeLocationHealth({ nodes: [node({ healthStatus: "fair" })] });
    const before = JSON.stringify(verdict);

    formatHealthReport("Office", verdict);

    expect(JSON.stringify(verdict)).toBe(before);
  });
});

describe("location formatting", () => {
  it("renders the internet status with the speed-test averages", () => {
    expect(
      formatConnectionSummary(
        { id: "loc-1", name: "Main Office", speedTestAverages: { downloadMbps: 250.5, uploadMbps: 20 } },
        { status: "online" },
      ),
    ).toBe("🌐 Internet: *online*\n*30-day speed test download / upload:* 250.50 Mbps / 20.00 Mbps");
  });

  it("falls back to unknown and N/A without backhaul or speed data", () => {
    expect(formatConnectionSummary({ id: "loc-2", name: "Annex" })).toBe(
      "🌐 Internet: *unknown*\n*30-day speed test download / upload:* N/A / N/A",
    );
  });

  it("lists locations with their ids", () => {
    expect(formatLocationsList([{ id: "loc-1", name: "Main Office" }])).toBe("🏢 *Locations*\n• *Main Office* (`loc-1`)");
    expect(formatLocationsList([])).toBe("🏢 *Locations*\nNo data available");
  });
});

describe("formatWanReport", () => {
  it("renders every metric", () => {
    const samples: WanSample[] = [10, 20, 30, 40, 50, 60, 70, 80, 90, 100].map((value, index) => ({
      timestamp: `2024-05-01T10:${String(index * 5).padStart(2, "0")}:00Z`,
      rxMegabytes: 1,
      txMegabytes: 0.5,
      peakRxMbps: value,
      peakTxMbps: 5,
    }));

    expect(formatWanReport("Office", analyzeWanConsumption(samples)).split("\n")).toEqual([
      "📊 *WAN Consumption: Office*",
      "*Peak download:* 100.00 Mbps at 2024-05-01T10:45:00Z",
      "*Peak upload:* 5.00 Mbps at 2024-05-01T10:00:00Z",
      "*Average download / upload:* 55.00 Mbps / 5.00 Mbps",
      "*95th percentile download / upload:* 100.00 Mbps / 5.00 Mbps",
      "*Total transferred:* 10.00 MB down / 5.00 MB up",
      "*Data quality:* 100.0% (10/10 samples complete)",
      "",
      "*Peak activity windows*",
      "N/A",
    ]);
  });

  it("says there is no data for an empty series", () => {
    expect(formatWanReport("Office", analyzeWanConsumption([]))).toBe(
      "📊 *WAN Consumption: Office*\nNo data available",
    );
  });

  it("renders N/A peaks when every sample is partial", () => {
    const analysis = analyzeWanConsumption([
      { timestamp: "t1", rxMegabytes: 2, txMegabytes: null, peakRxMbps: null, peakTxMbps: null },
    ]);

    const lines = formatWanReport("Office", analysis).split("\n");

    expect(lines[1]).toBe("*Peak download:* N/A");
    expect(lines[6]).toBe("*Data quality:* 0.0% (0/1 samples complete)");
  });
});

describe("online stats dashboard", () => {
  const metrics = processOnlineStats(
    {
      samples: ["online", "offline", "online", "offline"].map((value, index) => ({ timestamp: `t${index}`, value })),
    },
    "days",
    7,
  );

  it("renders the status box", () => {
    expect(formatStatusBox(metrics).split("\n")).toEqual([
      "┌──────────────────────────────┐",
      `│  🔴 Status: Critical${" ".repeat(7)} │`,
      `│  ⏱️  Last 7 Days${" ".repeat(11)} │`,
      `│  📈 Trend: ➡️ Stable${" ".repeat(5)} │`,
      `│  🔔 Incidents: 2${" ".repeat(12)} │`,
      "└──────────────────────────────┘",
    ]);
  });

  it("renders the state breakdown", () => {
    expect(formatBreakdown(metrics)).toBe(
      [
        "📊 DETAILED BREAKDOWN:",
        "   🟢 Online:         2 ( 50.0%)",
        "   🟡 Intermittent:   0 (  0.0%)",
        "   🔴 Offline:        2 ( 50.0%)",
      ].join("\n"),
    );
    expect(formatBreakdown({ onlineCount: 0, intermittentCount: 0, offlineCount: 0, totalCount: 0 })).toBe(
      "📊 DETAILED BREAKDOWN:\n   No data available",
    );
  });

  it("combines header, uptime gauge, status box and breakdown", () => {
    const message = formatOnlineStatsMessage("Main Office", metrics);

    expect(message).toContain(`│   🏢 Main Office${" ".repeat(11)} │`);
    expect(message).toContain("│  📊  50.0%  │");
    expect(message).toContain("│   ████░░░░  │");
    expect(message.endsWith(formatBreakdown(metrics))).toBe(true);
  });
});

describe("nodes and devices", () => {
  it("lists pods and marks the gateway", () => {
    expect(
      formatNodesList([
        node({ model: "SuperPod", firmwareVersion: "4.1.0" }),
        node({ name: "Upstairs", backhaulType: "wifi", connectionState: "disconnected" }),
      ]),
    ).toBe(
      [
        "📡 *Pods*",
        "• Gateway (gateway)",
        "  Status: *connected*",
        "  Model: SuperPod",
        "  Firmware: 4.1.0",
        "• Upstairs",
        "  Status: *disconnected*",
        "  Model: N/A",
        "  Firmware: N/A",
      ].join("\n"),
    );
    expect(formatNodesList([])).toBe("📡 *Pods*\nNo data available");
  });

  it("caps the device list at ten entries", () => {
    const devices: NetworkDevice[] = Array.from({ length: 12 }, (_, index) => ({
      mac: `aa:00:${index}`,
      nickname: `Device ${index}`,
      type: "phone",
      connected: index % 2 === 0,
    }));

    const lines = formatDevicesList(devices).split("\n");

    expect(lines[0]).toBe("📱 *Devices*");
    expect(lines.slice(1, 4)).toEqual(["• Device 0 (phone)", "  MAC: `aa:00:0`", "  Status: connected"]);
    expect(lines.slice(4, 7)).toEqual(["• Device 1 (phone)", "  MAC: `aa:00:1`", "  Status: disconnected"]);
    expect(lines).toHaveLength(1 + 10 * 3 + 2);
    expect(lines[lines.length - 1]).toBe("... and 2 more devices");
  });
});

describe("WiFi network formatting", () => {
  it("lists each SSID with the details that are known", () => {
    expect(
      formatWifiNetworks([
        { ssid: "Office-Net", enabled: true, accessZone: "home" },
        { ssid: "Lab", enabled: false },
        { ssid: "Printer-Net" },
      ]),
    ).toBe("📶 *WiFi Networks*\n• *Office-Net* (enabled, home zone)\n• *Lab* (disabled)\n• *Printer-Net*");
  });

  it("says so when there are no networks", () => {
    expect(formatWifiNetworks([])).toBe("📶 *WiFi Networks*\nNo data available");
  });
});
