import type { DocumentStorage } from "./types";

export class InMemoryStorage implements DocumentStorage {
  readonly location = "memory://";
  readonly files = new Map<string, Buffer>();
  readonly existsCalls: string[] = [];
  failWrites?: Error;

  async ensureReady(): Promise<void> {
    return;
  }

  async exists(fileName: string): Promise<boolean> {
    this.existsCalls.push(fileName);
    return this.files.has(fileName);
  }

  async write(fileName: string, data: Uint8Array): Promise<string> {
    if (this.failWrites) {
      throw this.failWrites;
    }
    this.files.set(fileName, Buffer.from(data));
    return this.locate(fileName);
  }

  locate(fileName: string): string {
    return `${this.location}${fileName}`;
  }

  async discardPending(): Promise<void> {
    return;
  }
}
