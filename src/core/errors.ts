export type HarvestErrorCode = "config_invalid" | "listing_unreachable" | "storage_unavailable";

export class HarvestError extends Error {
  readonly code: HarvestErrorCode;

  constructor(code: HarvestErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends HarvestError {
  constructor(message: string) {
    super("config_invalid", message);
  }
}

export class ListingUnreachableError extends HarvestError {
  readonly listingUrl: string;

  constructor(listingUrl: string, reason: string) {
    super("listing_unreachable", `Listing page unreachable: ${listingUrl} (${reason})`);
    this.listingUrl = listingUrl;
  }
}

export class StorageUnavailableError extends HarvestError {
  constructor(directory: string, cause: unknown) {
    super("storage_unavailable", `Output directory unavailable: ${directory} (${errorMessage(cause)})`, { cause });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
