export * from "./token-issuer";
export * from "./token-cache";
