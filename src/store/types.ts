export interface DocumentStorage {
  /** Where documents end up, for logs and summaries. */
  readonly location: string;
  /** Creates the output location if needed; throws when it cannot be used. */
  ensureReady(): Promise<void>;
  exists(fileName: string): Promise<boolean>;
  /**
   * Writes the whole payload under `fileName` and returns its location. Either
   * the complete file is in place afterwards or nothing is.
   */
  write(fileName: string, data: Uint8Array): Promise<string>;
  locate(fileName: string): string;
  /** Removes temporary files of writes still in progress. */
  discardPending(): Promise<void>;
}
