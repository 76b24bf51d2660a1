import fs from "node:fs";
import path from "node:path";
import type { DocumentDescriptor, DownloadRecord } from "../types";
import type { Sink } from "./types";

export class LocalJsonlSink implements Sink {
  private readonly discoveredPath: string;
  private readonly downloadsPath: string;
  private readonly runId: string;

  constructor(manifestsDir: string, runId: string) {
    const directory = path.resolve(manifestsDir);
    fs.mkdirSync(directory, { recursive: true });
    this.discoveredPath = path.join(directory, "discovered.jsonl");
    this.downloadsPath = path.join(directory, "downloads.jsonl");
    this.runId = runId;
  }

  async publishDiscovered(items: DocumentDescriptor[]): Promise<void> {
    await this.appendLines(
      this.discoveredPath,
      items.map((item) => ({
        runId: this.runId,
        ...item,
      })),
    );
  }

  async publishDownloadResult(records: DownloadRecord[]): Promise<void> {
    await this.appendLines(
      this.downloadsPath,
      records.map((record) => ({
        runId: this.runId,
        ...record,
      })),
    );
  }

  private async appendLines(filePath: string, records: unknown[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    const content = records.map((record) => JSON.stringify(record)).join("\n") + "\n";
    await fs.promises.appendFile(filePath, content, "utf-8");
  }
}
