import { WebClient } from "@slack/web-api";
import { getConfigValue } from "../config";

let slackClient: WebClient | null = null;

export function getSlackClient(): WebClient {
  if (!slackClient) {
    const slackBotToken = getConfigValue("slackBotToken");

    if (!slackBotToken) {
      throw new Error("SLACK_BOT_TOKEN is not configured");
    }

    slackClient = new WebClient(slackBotToken);
  }

  return slackClient;
}
