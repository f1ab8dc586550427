// Barrel export for config module
export { getConfigValue, getConfigSync, refreshConfig, describeConfig } from "./loader";
export { CONFIG_DEFINITIONS, DEFAULT_PLUME_API_BASE } from "./registry";
export type { ConfigKey, ConfigValueMap, ConfigDefinition } from "./registry";
export * from "./helpers";
