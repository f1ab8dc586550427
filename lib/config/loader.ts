import { CONFIG_DEFINITIONS, ConfigSchema, type ConfigKey, type ConfigValueMap } from "./registry";

const CONFIG_KEYS = Object.keys(CONFIG_DEFINITIONS) as ConfigKey[];

let config: ConfigValueMap = loadFromEnvironment();

export function getConfigSync(): ConfigValueMap {
  return config;
}

export function getConfigValue<K extends ConfigKey>(key: K): ConfigValueMap[K] {
  return config[key];
}

/**
 * Re-read process.env. Tests and scripts call this after changing the environment.
 */
export function refreshConfig(): ConfigValueMap {
  config = loadFromEnvironment();
  return config;
}

/**
 * Config snapshot that is safe to log: sensitive values are masked.
 */
export function describeConfig(): Record<ConfigKey, string> {
  const described = {} as Record<ConfigKey, string>;
  for (const key of CONFIG_KEYS) {
    const definition = CONFIG_DEFINITIONS[key];
    const value = config[key];
    if ("sensitive" in definition && definition.sensitive) {
      described[key] = value ? "********" : "(not set)";
    } else {
      described[key] = String(value);
    }
  }
  return described;
}

function loadFromEnvironment(): ConfigValueMap {
  const raw: Record<string, string | undefined> = {};
  for (const key of CONFIG_KEYS) {
    raw[key] = process.env[CONFIG_DEFINITIONS[key].envVar];
  }
  return ConfigSchema.parse(raw);
}
