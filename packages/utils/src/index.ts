export * from "./lib/log";
export * from "./lib/errors";
