export type DocumentClassification = "GER" | "GRR" | "Other";

export interface DocumentDescriptor {
  readonly sourceUrl: string;
  readonly displayName: string;
  readonly extractedIdentifier?: string;
  readonly classification: DocumentClassification;
  readonly originalBaseName: string;
  readonly fileName: string;
}

export interface FetchSuccess {
  kind: "success";
  body: Buffer;
  contentType?: string;
  statusCode: number;
  resolvedUrl: string;
  attemptCount: number;
}

export interface FetchTransientFailure {
  kind: "transient_failure";
  reason: string;
  statusCode?: number;
  attemptCount: number;
}

export interface FetchPermanentFailure {
  kind: "permanent_failure";
  reason: string;
  statusCode?: number;
  attemptCount: number;
}

export type FetchResult = FetchSuccess | FetchTransientFailure | FetchPermanentFailure;

// What callers of the retrying fetcher see: transient failures are either retried away or escalated.
export type SettledFetchResult = FetchSuccess | FetchPermanentFailure;

export type DownloadFailureReason = "http" | "network" | "invalid_content" | "write_error";

export type DownloadOutcome =
  | { status: "downloaded"; fileName: string; filePath: string; bytes: number }
  | { status: "skipped_duplicate"; fileName: string; filePath: string }
  | { status: "failed"; fileName: string; reason: DownloadFailureReason; message: string };

export interface DownloadRecord {
  sourceUrl: string;
  fileName: string;
  status: DownloadOutcome["status"];
  reason?: DownloadFailureReason;
  message?: string;
  bytes?: number;
  finishedAt: string;
}
