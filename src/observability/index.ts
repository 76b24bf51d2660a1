export * from "./types";
export * from "./logger";
export * from "./logWriters";
export * from "./metrics";
export * from "./runId";
