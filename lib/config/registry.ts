import { z } from "zod";

export interface ConfigDefinition {
  envVar: string;
  description: string;
  /** Sensitive values are masked by describeConfig() */
  sensitive?: boolean;
}

export const DEFAULT_PLUME_API_BASE = "https://piranha-gamma.prod.us-west-2.aws.plumenet.io/api/";

export const CONFIG_DEFINITIONS = {
  slackBotToken: {
    envVar: "SLACK_BOT_TOKEN",
    description: "Bot token used to post ephemeral reports",
    sensitive: true,
  },
  slackSigningSecret: {
    envVar: "SLACK_SIGNING_SECRET",
    description: "Signing secret used to verify slash command and interactivity requests",
    sensitive: true,
  },
  plumeSsoUrl: {
    envVar: "PLUME_SSO_URL",
    description: "Default OAuth token endpoint offered during /network setup",
  },
  plumeApiBaseUrl: {
    envVar: "PLUME_API_BASE",
    description: "Default Plume Cloud API base URL",
  },
  plumeReportsApiBaseUrl: {
    envVar: "PLUME_REPORTS_API_BASE",
    description: "Plume reporting API base URL (falls back to PLUME_API_BASE)",
  },
  plumeTimeoutMs: {
    envVar: "PLUME_TIMEOUT_MS",
    description: "Timeout for every outbound Plume request, in milliseconds",
  },
  plumeTokenSafetyMarginSeconds: {
    envVar: "PLUME_TOKEN_SAFETY_MARGIN_SECONDS",
    description: "Seconds before expiry at which a cached token stops being used",
  },
  setupSessionTimeoutMinutes: {
    envVar: "SETUP_SESSION_TIMEOUT_MINUTES",
    description: "Minutes a half-finished /network setup stays open",
  },
} as const satisfies Record<string, ConfigDefinition>;

export type ConfigKey = keyof typeof CONFIG_DEFINITIONS;

function stringSetting(fallback = "") {
  return z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : fallback));
}

function numberSetting(key: ConfigKey, fallback: number, options: { allowZero?: boolean } = {}) {
  const base = z.coerce.number().int();
  const bounded = options.allowZero ? base.nonnegative() : base.positive();
  // An empty variable means "unset", not zero
  return z.preprocess((value) => (value === "" ? undefined : value), bounded).catch(({ input }) => {
    if (input !== undefined && input !== "") {
      console.warn(
        `[Config] Invalid number for ${CONFIG_DEFINITIONS[key].envVar}: ${String(input)}. Falling back to default.`,
      );
    }
    return fallback;
  });
}

export const ConfigSchema = z.object({
  slackBotToken: stringSetting(),
  slackSigningSecret: stringSetting(),
  plumeSsoUrl: stringSetting(),
  plumeApiBaseUrl: stringSetting(DEFAULT_PLUME_API_BASE),
  plumeReportsApiBaseUrl: stringSetting(),
  plumeTimeoutMs: numberSetting("plumeTimeoutMs", 10_000),
  plumeTokenSafetyMarginSeconds: numberSetting("plumeTokenSafetyMarginSeconds", 60, { allowZero: true }),
  setupSessionTimeoutMinutes: numberSetting("setupSessionTimeoutMinutes", 15),
});

export type ConfigValueMap = z.infer<typeof ConfigSchema>;
