import type { AppConfig } from "../config";
import { LocalJsonlSink } from "./localJsonlSink";
import { NoopSink } from "./noopSink";
import type { Sink } from "./types";

export function createSink(config: AppConfig, runId: string, enabled = true): Sink {
  return enabled ? new LocalJsonlSink(config.manifestsDir, runId) : new NoopSink();
}

export * from "./types";
export * from "./localJsonlSink";
export * from "./noopSink";
