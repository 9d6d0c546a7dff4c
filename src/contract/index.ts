export * from "./json";
export * from "./errors";
export * from "./events";
export * from "./commands";
