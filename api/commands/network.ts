import { enqueueBackgroundTask } from "../../lib/background-tasks";
import type { NetworkView } from "../../lib/formatters/network-block-kit";
import { getNetworkMonitorService, type NetworkMonitorService } from "../../lib/services/network-monitor-service";
import { DEFAULT_TIME_RANGE, isTimeRangeKey } from "../../lib/services/online-stats";
import {
  SetupState,
  getSetupStateMachine,
  type SetupStateMachine,
  type SetupStepResult,
} from "../../lib/services/setup-state-machine";
import {
  postEphemeralMessage,
  renderLocationSelection,
  renderLocationsList,
  renderNetworkView,
  textMessage,
  type NetworkMessage,
} from "../../lib/slack/network-views";
import { verifyRequest } from "../../lib/slack/verify-request";

export interface CommandPayload {
  text: string;
  userId: string;
  userName?: string;
  channelId?: string;
}

export interface CommandResponse {
  status: number;
  body: Record<string, unknown>;
}

export const HELP_TEXT = `Usage: \`/network <subcommand>\`

• \`setup\`: connect your Plume account (SSO URL, authorization header, partner id, API base)
• \`cancel\`: stop a setup in progress
• \`locations <customerId>\`: list a customer's locations
• \`location <customerId> <locationId>\`: choose the location to monitor
• \`status\`: location health
• \`wan\`: WAN consumption report
• \`stats [3h|24h|7d]\`: online stats (default 7d)
• \`nodes\`: pods at the location
• \`devices\`: connected devices
• \`wifi\`: WiFi networks (SSIDs) at the location
• \`logout\`: forget your Plume credentials`;

const NOT_CONFIGURED_TEXT = "Plume is not set up for you yet. Run `/network setup` first.";

const REPORT_SUBCOMMANDS: Record<string, NetworkView> = {
  status: "status",
  health: "status",
  wan: "wan",
  stats: "stats",
  nodes: "nodes",
  pods: "nodes",
  devices: "devices",
  wifi: "wifi",
  ssids: "wifi",
};

export async function POST(request: Request) {
  const rawBody = await request.text();
  const verification = verifyRequest({ request, rawBody });

  if (verification instanceof Response) {
    return verification;
  }

  const params = new URLSearchParams(rawBody);
  const payload: CommandPayload = {
    text: params.get("text") ?? "",
    userId: params.get("user_id") ?? "",
    userName: params.get("user_name") ?? undefined,
    channelId: params.get("channel_id") ?? undefined,
  };

  const response = await handleNetworkCommand(payload);

  return new Response(JSON.stringify(response.body), {
    status: response.status,
    headers: { "content-type": "application/json" },
  });
}

export async function handleNetworkCommand(
  payload: CommandPayload,
  monitor: NetworkMonitorService = getNetworkMonitorService(),
  setup: SetupStateMachine = getSetupStateMachine(),
): Promise<CommandResponse> {
  if (!payload.userId) {
    return { status: 400, body: { response_type: "ephemeral", text: "Missing user id." } };
  }

  const text = payload.text.trim();
  const [rawSubcommand = "", ...args] = text.split(/\s+/);
  const subcommand = rawSubcommand.toLowerCase();
  const identity = payload.userId;

  console.log(`[Network Command] ${identity} ran "${subcommand || "help"}"`);

  switch (subcommand) {
    case "":
    case "help":
      return helpResponse(HELP_TEXT);

    case "setup":
      return handleSetup(payload, setup, text.replace(/^setup\b/i, "").trim());

    case "cancel":
      return helpResponse(setup.cancel(identity) ? "Setup cancelled. Nothing was saved." : "No setup in progress.");

    case "logout": {
      setup.cancel(identity);
      const removed = monitor.logout(identity);
      return helpResponse(removed ? "Your Plume credentials were removed." : "No Plume credentials were stored for you.");
    }

    case "locations": {
      const [customerId] = args;
      if (!customerId) {
        return helpResponse("Usage: `/network locations <customerId>`");
      }
      return runInBackground(payload, monitor, "Loading locations...", () =>
        renderLocationsList(monitor, identity, customerId),
      );
    }

    case "location": {
      const [customerId, locationId] = args;
      if (!customerId || !locationId) {
        return helpResponse("Usage: `/network location <customerId> <locationId>`");
      }
      return runInBackground(payload, monitor, "Looking up the location...", () =>
        renderLocationSelection(monitor, identity, { customerId, locationId }),
      );
    }

    default: {
      const view = REPORT_SUBCOMMANDS[subcommand];
      if (!view) {
        return helpResponse(`Unknown subcommand \`${rawSubcommand}\`.\n\n${HELP_TEXT}`);
      }

      const [rangeArg] = args;
      let range = DEFAULT_TIME_RANGE;
      if (view === "stats" && rangeArg) {
        if (!isTimeRangeKey(rangeArg)) {
          return helpResponse(`Unknown time range \`${rangeArg}\`. Use 3h, 24h or 7d.`);
        }
        range = rangeArg;
      }

      if (!monitor.isConfigured(identity)) {
        return helpResponse(NOT_CONFIGURED_TEXT);
      }
      if (!monitor.getSelectedLocation(identity)) {
        return helpResponse("No location selected. Use `/network location <customerId> <locationId>` first.");
      }

      return runInBackground(payload, monitor, "Fetching the report...", () =>
        renderNetworkView(monitor, identity, view, range),
      );
    }
  }
}

async function handleSetup(payload: CommandPayload, setup: SetupStateMachine, value: string): Promise<CommandResponse> {
  const identity = payload.userId;

  if (!value || !setup.isActive(identity)) {
    if (value) {
      return helpResponse("No setup in progress. Run `/network setup` to begin.");
    }
    return setupResponse(setup.start(identity));
  }

  // The last step issues a token, which can outlast Slack's response deadline
  if (setup.getState(identity) === SetupState.AWAITING_API_BASE && payload.channelId) {
    const channelId = payload.channelId;
    enqueueBackgroundTask(
      setup.submit(identity, value).then((result) =>
        postEphemeralMessage({ channelId, userId: identity }, textMessage(result.message)),
      ),
    );
    return helpResponse("Checking your credentials with Plume...");
  }

  return setupResponse(await setup.submit(identity, value));
}

function setupResponse(result: SetupStepResult): CommandResponse {
  return helpResponse(result.message);
}

/**
 * Acknowledge now and post the finished message once it is ready
 */
function runInBackground(
  payload: CommandPayload,
  monitor: NetworkMonitorService,
  acknowledgement: string,
  render: () => Promise<NetworkMessage>,
): CommandResponse {
  if (!monitor.isConfigured(payload.userId)) {
    return helpResponse(NOT_CONFIGURED_TEXT);
  }

  const channelId = payload.channelId;
  if (!channelId) {
    return helpResponse("This command has to be run from a channel or DM.");
  }

  enqueueBackgroundTask(
    render().then((message) => postEphemeralMessage({ channelId, userId: payload.userId }, message)),
  );

  return helpResponse(`⏳ ${acknowledgement}`);
}

function helpResponse(message: string): CommandResponse {
  return {
    status: 200,
    body: {
      response_type: "ephemeral",
      text: message,
    },
  };
}
