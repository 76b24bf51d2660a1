import type { DocumentStorage } from "../store";
import type { DownloadOutcome } from "../types";

/** Runs `fetchAndStore` only when `fileName` is not on disk yet. */
export async function skipIfPresent(
  storage: DocumentStorage,
  fileName: string,
  fetchAndStore: () => Promise<DownloadOutcome>,
): Promise<DownloadOutcome> {
  if (await storage.exists(fileName)) {
    return { status: "skipped_duplicate", fileName, filePath: storage.locate(fileName) };
  }
  return fetchAndStore();
}
