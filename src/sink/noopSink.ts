import type { DocumentDescriptor, DownloadRecord } from "../types";
import type { Sink } from "./types";

export class NoopSink implements Sink {
  async publishDiscovered(_items: DocumentDescriptor[]): Promise<void> {
    return;
  }

  async publishDownloadResult(_records: DownloadRecord[]): Promise<void> {
    return;
  }
}
