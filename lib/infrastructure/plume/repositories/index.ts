export * from "./location-repository";
