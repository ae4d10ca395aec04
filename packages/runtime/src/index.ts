export * from "./util";
export * from "./env";
export * from "./config";
export * from "./logger";
export * from "./ops_log";
export * from "./http";
