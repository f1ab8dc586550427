/**
 * Slack Interactivity Handler
 * Handles the time-range and navigation buttons on /network reports
 */

import { z } from "zod";
import { enqueueBackgroundTask } from "../lib/background-tasks";
import {
  NAVIGATION_ACTION_PREFIX,
  TIME_RANGE_ACTION_PREFIX,
  isNetworkView,
} from "../lib/formatters/network-block-kit";
import { getNetworkMonitorService, type NetworkMonitorService } from "../lib/services/network-monitor-service";
import { isTimeRangeKey } from "../lib/services/online-stats";
import { postEphemeralMessage, renderNetworkView } from "../lib/slack/network-views";
import { verifyRequest } from "../lib/slack/verify-request";

const BlockActionsPayloadSchema = z.object({
  type: z.literal("block_actions"),
  user: z.object({ id: z.string().min(1) }).passthrough(),
  channel: z.object({ id: z.string() }).passthrough().optional(),
  container: z.object({ channel_id: z.string().optional() }).passthrough().optional(),
  actions: z.array(
    z
      .object({
        action_id: z.string(),
        value: z.string().optional(),
      })
      .passthrough(),
  ),
});

export type BlockActionsPayload = z.infer<typeof BlockActionsPayloadSchema>;

export async function POST(request: Request) {
  try {
    const rawBody = await request.text();

    const verification = verifyRequest({ request, rawBody });
    if (verification instanceof Response) {
      return verification;
    }

    // Slack sends interactivity payloads as application/x-www-form-urlencoded
    // with the JSON data in a "payload" parameter
    const params = new URLSearchParams(rawBody);
    const payloadStr = params.get("payload");

    if (!payloadStr) {
      return new Response("Missing payload", { status: 400 });
    }

    const parsed = BlockActionsPayloadSchema.safeParse(JSON.parse(payloadStr));
    if (!parsed.success) {
      // Other interaction types are not used by this app
      return new Response("", { status: 200 });
    }

    console.log(`[Interactivity] Received block_actions from user ${parsed.data.user.id}`);
    handleBlockActions(parsed.data);

    // Slack expects a 200 OK response within 3 seconds
    return new Response("", { status: 200 });
  } catch (error) {
    console.error("[Interactivity] Error handling interaction:", error);
    return new Response("Error processing interaction", { status: 500 });
  }
}

/**
 * Queue one report per recognised action. Returns how many were queued.
 */
export function handleBlockActions(
  payload: BlockActionsPayload,
  monitor: NetworkMonitorService = getNetworkMonitorService(),
): number {
  const userId = payload.user.id;
  const channelId = payload.channel?.id ?? payload.container?.channel_id;
  if (!channelId) {
    console.warn(`[Interactivity] No channel on block_actions from ${userId}`);
    return 0;
  }

  let queued = 0;
  for (const action of payload.actions) {
    const value = action.value ?? "";

    if (action.action_id.startsWith(TIME_RANGE_ACTION_PREFIX) && isTimeRangeKey(value)) {
      enqueueBackgroundTask(
        renderNetworkView(monitor, userId, "stats", value).then((message) =>
          postEphemeralMessage({ channelId, userId }, message),
        ),
      );
      queued++;
    } else if (action.action_id.startsWith(NAVIGATION_ACTION_PREFIX) && isNetworkView(value)) {
      enqueueBackgroundTask(
        renderNetworkView(monitor, userId, value).then((message) =>
          postEphemeralMessage({ channelId, userId }, message),
        ),
      );
      queued++;
    } else {
      console.warn(`[Interactivity] Unhandled action ${action.action_id}`);
    }
  }

  return queued;
}
