export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogFields {
  url?: string;
  pageUrl?: string;
  fileName?: string;
  attempt?: number;
  [key: string]: unknown;
}

export interface LogRecord {
  ts: string;
  level: LogLevel;
  msg: string;
  component: string;
  runId: string;
  fields: LogFields;
}

export interface LogWriter {
  write(record: LogRecord): void;
}

export type MetricCounterName =
  | "pages_visited"
  | "pages_failed"
  | "documents_found"
  | "documents_excluded"
  | "downloaded"
  | "skipped_duplicate"
  | "failed";

export type MetricTimerName = "page_fetch_ms" | "download_ms";
