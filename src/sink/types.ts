import type { DocumentDescriptor, DownloadRecord } from "../types";

export interface Sink {
  publishDiscovered(items: DocumentDescriptor[]): Promise<void>;
  publishDownloadResult(records: DownloadRecord[]): Promise<void>;
}
