import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { createRunId } from "../runId";
import { Logger } from "../logger";
import { ConsoleLogWriter, FileLogWriter, formatPretty, MemoryLogWriter } from "../logWriters";
import type { LogRecord } from "../types";

const RECORD: LogRecord = {
  ts: "2026-01-02T03:04:05.000Z",
  level: "warn",
  msg: "fetch_attempt_retrying",
  component: "fetch",
  runId: "run_x",
  fields: { url: "https://guias.test/a", attempt: 2, reason: "HTTP 503", skipped: undefined },
};

describe("Logger", () => {
  it("sends every record to every writer with component and run id", () => {
    const first = new MemoryLogWriter();
    const second = new MemoryLogWriter();
    const logger = new Logger({ component: "cli", runId: "run_1", writers: [first, second] });

    logger.child("crawl").info("crawl_page_start", { pageUrl: "https://guias.test/" });

    expect(first.records).toHaveLength(1);
    expect(second.records).toEqual(first.records);
    expect(first.records[0]).toMatchObject({
      level: "info",
      msg: "crawl_page_start",
      component: "crawl",
      runId: "run_1",
      fields: { pageUrl: "https://guias.test/" },
    });
  });

  it("drops records below the configured level", () => {
    const writer = new MemoryLogWriter();
    const logger = new Logger({ component: "cli", runId: "run_1", level: "warn", writers: [writer] });

    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    logger.error("d");

    expect(writer.messages()).toEqual(["c", "d"]);
  });
});

describe("log writers", () => {
  let root: string | undefined;

  afterEach(async () => {
    if (root) {
      await fs.promises.rm(root, { recursive: true, force: true });
      root = undefined;
    }
  });

  it("formats console lines for people", () => {
    expect(formatPretty(RECORD)).toBe(
      '2026-01-02T03:04:05.000Z WARN  [fetch] fetch_attempt_retrying url=https://guias.test/a attempt=2 reason="HTTP 503"',
    );
  });

  it("sends errors to stderr and the rest to stdout", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const writer = new ConsoleLogWriter();

    writer.write(RECORD);
    writer.write({ ...RECORD, level: "error" });

    expect(log).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(1);
  });

  it("appends JSON lines across runs", async () => {
    root = await fs.promises.mkdtemp(path.join(os.tmpdir(), "guidelines-log-"));
    const file = path.join(root, "logs", "run.log");

    new FileLogWriter(file).write(RECORD);
    new FileLogWriter(file).write({ ...RECORD, runId: "run_y", level: "info" });

    const lines = fs.readFileSync(file, "utf-8").split("\n");
    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe("");
    expect(JSON.parse(lines[0])).toEqual({
      ts: "2026-01-02T03:04:05.000Z",
      level: "warn",
      msg: "fetch_attempt_retrying",
      component: "fetch",
      runId: "run_x",
      url: "https://guias.test/a",
      attempt: 2,
      reason: "HTTP 503",
    });
    expect(JSON.parse(lines[1])).toMatchObject({ runId: "run_y", level: "info" });
  });
});

describe("createRunId", () => {
  it("is built from the timestamp and a random suffix", () => {
    expect(createRunId(new Date("2026-01-02T03:04:05.678Z"), () => 0.5)).toBe("run_2026-01-02T03-04-05-678Z_i00000");
  });
});
