export * from "./downloader";
export * from "./skipGuard";
