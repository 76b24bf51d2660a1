import fs from "node:fs";
import path from "node:path";
import type { LogRecord, LogWriter } from "./types";

function formatValue(value: unknown): string {
  if (typeof value === "string") {
    return /\s/.test(value) ? JSON.stringify(value) : value;
  }
  if (value instanceof Error) {
    return JSON.stringify(value.message);
  }
  return JSON.stringify(value);
}

export function formatPretty(record: LogRecord): string {
  const fields = Object.entries(record.fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`);
  return [record.ts, record.level.toUpperCase().padEnd(5), `[${record.component}]`, record.msg, ...fields].join(" ");
}

export function formatJson(record: LogRecord): string {
  return JSON.stringify({
    ts: record.ts,
    level: record.level,
    msg: record.msg,
    component: record.component,
    runId: record.runId,
    ...record.fields,
  });
}

export class ConsoleLogWriter implements LogWriter {
  write(record: LogRecord): void {
    const line = formatPretty(record);
    if (record.level === "error") {
      console.error(line);
      return;
    }
    console.log(line);
  }
}

/**
 * Appends one JSON object per line. Writes are synchronous so lines from a run
 * stay in order and a later run only ever adds whole lines after them.
 */
export class FileLogWriter implements LogWriter {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
  }

  write(record: LogRecord): void {
    fs.appendFileSync(this.filePath, `${formatJson(record)}\n`, "utf-8");
  }
}

export class MemoryLogWriter implements LogWriter {
  readonly records: LogRecord[] = [];

  write(record: LogRecord): void {
    this.records.push(record);
  }

  messages(): string[] {
    return this.records.map((record) => record.msg);
  }

  find(msg: string): LogRecord[] {
    return this.records.filter((record) => record.msg === msg);
  }
}
