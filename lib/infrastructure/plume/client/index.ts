export * from "./http-client";
export * from "./mappers";
