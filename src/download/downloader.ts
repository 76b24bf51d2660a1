import type { AppConfig } from "../config";
import { errorMessage } from "../core/errors";
import { type PageFetcher, PDF_REQUEST_ACCEPT } from "../core/pageFetcher";
import type { RequestThrottle } from "../core/throttle";
import type { Logger } from "../observability";
import type { DocumentStorage } from "../store";
import type { DocumentDescriptor, DownloadOutcome } from "../types";
import { skipIfPresent } from "./skipGuard";

export interface DownloaderDeps {
  config: AppConfig;
  logger: Logger;
  storage: DocumentStorage;
  fetcher: PageFetcher;
  throttle: RequestThrottle;
}

export const PDF_SIGNATURE = Buffer.from("%PDF-", "ascii");

export function hasPdfSignature(payload: Uint8Array): boolean {
  return payload.length >= PDF_SIGNATURE.length && PDF_SIGNATURE.equals(payload.subarray(0, PDF_SIGNATURE.length));
}

async function fetchAndStore(deps: DownloaderDeps, descriptor: DocumentDescriptor): Promise<DownloadOutcome> {
  const { config, storage, fetcher, throttle } = deps;
  const { fileName } = descriptor;

  const result = await throttle.run(() =>
    fetcher.fetch(descriptor.sourceUrl, { accept: PDF_REQUEST_ACCEPT, timeoutMs: config.downloadTimeoutMs }),
  );

  if (result.kind === "permanent_failure") {
    return {
      status: "failed",
      fileName,
      reason: result.statusCode === undefined ? "network" : "http",
      message: result.reason,
    };
  }

  if (!hasPdfSignature(result.body)) {
    return {
      status: "failed",
      fileName,
      reason: "invalid_content",
      message: `payload is not a PDF (content-type ${result.contentType ?? "unknown"}, ${result.body.length} bytes)`,
    };
  }

  try {
    const filePath = await storage.write(fileName, result.body);
    return { status: "downloaded", fileName, filePath, bytes: result.body.length };
  } catch (error) {
    return { status: "failed", fileName, reason: "write_error", message: errorMessage(error) };
  }
}

function logOutcome(logger: Logger, descriptor: DocumentDescriptor, outcome: DownloadOutcome): void {
  const fields = { url: descriptor.sourceUrl, fileName: outcome.fileName };
  switch (outcome.status) {
    case "downloaded":
      logger.info("download_item_ok", { ...fields, bytes: outcome.bytes });
      break;
    case "skipped_duplicate":
      logger.info("download_item_skipped_existing", fields);
      break;
    case "failed":
      logger.error("download_item_failed", { ...fields, reason: outcome.reason, error: outcome.message });
      break;
  }
}

/**
 * Fetches one document unless it is already on disk. Every failure comes back
 * as a `failed` outcome; nothing is thrown.
 */
export async function downloadOne(deps: DownloaderDeps, descriptor: DocumentDescriptor): Promise<DownloadOutcome> {
  let outcome: DownloadOutcome;
  try {
    outcome = await skipIfPresent(deps.storage, descriptor.fileName, () => fetchAndStore(deps, descriptor));
  } catch (error) {
    outcome = { status: "failed", fileName: descriptor.fileName, reason: "write_error", message: errorMessage(error) };
  }

  logOutcome(deps.logger, descriptor, outcome);
  return outcome;
}
