/**
 * Slack Message Styling Design System
 *
 * Centralized constants and utilities for consistent Slack Block Kit messages
 */

import type {
  ActionsBlock,
  Button,
  ContextBlock,
  DividerBlock,
  HeaderBlock,
  SectionBlock,
} from "@slack/web-api";

// ============================================================================
// EMOJI CONSTANTS
// ============================================================================

export const MessageEmojis = {
  // Status
  SUCCESS: "✅",
  ERROR: "❌",
  WARNING: "⚠️",
  INFO: "ℹ️",
  PROCESSING: "⏳",

  // Severity
  HEALTHY: "🟢",
  DEGRADED: "🟡",
  DISRUPTED: "🟠",
  OFFLINE: "🔴",
  UNKNOWN: "❓",

  // Network
  LOCATION: "🏢",
  INTERNET: "🌐",
  WIFI: "📶",
  POD: "📡",
  DEVICE: "📱",
  CHART: "📊",
  TREND: "📈",
  BELL: "🔔",
  CLOCK: "⏱️",
  REFRESH: "🔄",
} as const;

// ============================================================================
// SLACK LIMITS
// ============================================================================

const HEADER_TEXT_LIMIT = 150;
const SECTION_TEXT_LIMIT = 3000;

// ============================================================================
// BLOCK KIT BUILDER HELPERS
// ============================================================================

export function createHeaderBlock(text: string): HeaderBlock {
  return {
    type: "header",
    text: {
      type: "plain_text",
      text: clip(text, HEADER_TEXT_LIMIT),
      emoji: true,
    },
  };
}

/**
 * Create a section block with markdown text
 */
export function createSectionBlock(text: string, accessory?: Button): SectionBlock {
  const block: SectionBlock = {
    type: "section",
    text: {
      type: "mrkdwn",
      text: clip(text, SECTION_TEXT_LIMIT),
    },
  };

  if (accessory) {
    block.accessory = accessory;
  }

  return block;
}

export function createDivider(): DividerBlock {
  return { type: "divider" };
}

/**
 * Create a context block (small gray text at bottom)
 */
export function createContextBlock(text: string): ContextBlock {
  return {
    type: "context",
    elements: [
      {
        type: "mrkdwn",
        text,
      },
    ],
  };
}

export interface ActionButton {
  text: string;
  actionId: string;
  value?: string;
  style?: "primary" | "danger";
}

/**
 * Create an actions block with buttons
 */
export function createActionsBlock(buttons: ActionButton[], blockId?: string): ActionsBlock {
  const block: ActionsBlock = {
    type: "actions",
    elements: buttons.map((btn) => {
      const button: Button = {
        type: "button",
        text: {
          type: "plain_text",
          text: btn.text,
          emoji: true,
        },
        action_id: btn.actionId,
      };

      if (btn.value) button.value = btn.value;
      if (btn.style) button.style = btn.style;

      return button;
    }),
  };

  if (blockId) {
    block.block_id = blockId;
  }

  return block;
}

function clip(text: string, limit: number): string {
  return text.length <= limit ? text : `${text.slice(0, limit - 1)}…`;
}
