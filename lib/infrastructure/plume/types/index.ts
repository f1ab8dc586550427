/**
 * Plume Types
 * Central export for API response schemas and domain models
 */

export * from "./api-responses";
export type * from "./domain-models";
