// @filename: helpers/operations/mod.ts
export * from "./core.ts";
export * from "./errors.ts";
export * from "./timing.ts";
export * from "./combination.ts";
export * from "./multicast.ts";
