import type { LogLevel } from "../observability/types";

export interface AppConfig {
  listingUrl: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  downloadTimeoutMs: number;
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  politenessDelayMs: number;
  maxPages: number;
  maxConsecutivePageFailures: number;
  outputDir: string;
  manifestsDir: string;
  logFile: string;
  logLevel: LogLevel;
}
