import type { AppConfig } from "../config";
import { LocalFileStorage } from "./localFileStorage";
import type { DocumentStorage } from "./types";

export function createStorage(config: AppConfig): DocumentStorage {
  return new LocalFileStorage(config.outputDir);
}

export * from "./types";
export * from "./localFileStorage";
export * from "./memoryStorage";
