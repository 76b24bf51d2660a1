import fs from "node:fs";
import path from "node:path";
import { StorageUnavailableError } from "../core/errors";
import type { DocumentStorage } from "./types";

export const PARTIAL_SUFFIX = ".part";

export class LocalFileStorage implements DocumentStorage {
  readonly location: string;
  private readonly pending = new Set<string>();

  constructor(directory: string) {
    this.location = path.resolve(directory);
  }

  async ensureReady(): Promise<void> {
    try {
      await fs.promises.mkdir(this.location, { recursive: true });
      await fs.promises.access(this.location, fs.constants.W_OK);
    } catch (error) {
      throw new StorageUnavailableError(this.location, error);
    }
  }

  locate(fileName: string): string {
    const resolved = path.resolve(this.location, fileName);
    if (path.dirname(resolved) !== this.location) {
      throw new Error(`File name escapes the output directory: ${fileName}`);
    }
    return resolved;
  }

  async exists(fileName: string): Promise<boolean> {
    try {
      await fs.promises.access(this.locate(fileName), fs.constants.F_OK);
      return true;
    } catch {
      return false;
    }
  }

  async write(fileName: string, data: Uint8Array): Promise<string> {
    const finalPath = this.locate(fileName);
    const tempPath = `${finalPath}${PARTIAL_SUFFIX}`;
    this.pending.add(tempPath);

    try {
      const handle = await fs.promises.open(tempPath, "w");
      try {
        await handle.writeFile(data);
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.promises.rename(tempPath, finalPath);
      return finalPath;
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      throw error;
    } finally {
      this.pending.delete(tempPath);
    }
  }

  async discardPending(): Promise<void> {
    const paths = [...this.pending];
    this.pending.clear();
    await Promise.all(paths.map((tempPath) => fs.promises.rm(tempPath, { force: true })));
  }
}
