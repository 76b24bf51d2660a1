import type { AppConfig } from "../config";
import type { Logger } from "../observability";
import type { FetchResult, SettledFetchResult } from "../types";
import { errorMessage } from "./errors";
import { defaultFetch, type FetchFn, getFetchDispatcher } from "./fetch";
import { type RetryPolicy, withRetry } from "./retry";
import type { SleepFn } from "./sleep";

export interface FetchRequest {
  accept: string;
  timeoutMs: number;
}

export const HTML_REQUEST_ACCEPT = "text/html,application/xhtml+xml";
export const PDF_REQUEST_ACCEPT = "application/pdf,*/*";

interface PageFetcherDeps {
  config: AppConfig;
  logger: Logger;
  fetchFn?: FetchFn;
  sleep?: SleepFn;
}

export function isRetriableStatus(status: number): boolean {
  return status >= 500;
}

export function retryPolicyFromConfig(config: AppConfig): RetryPolicy {
  return {
    maxAttempts: config.maxAttempts,
    baseDelayMs: config.backoffBaseMs,
    maxDelayMs: config.backoffMaxMs,
  };
}

export class PageFetcher {
  private readonly config: AppConfig;
  private readonly logger: Logger;
  private readonly fetchFn: FetchFn;
  private readonly sleep?: SleepFn;
  private readonly policy: RetryPolicy;

  constructor(deps: PageFetcherDeps) {
    this.config = deps.config;
    this.logger = deps.logger;
    this.fetchFn = deps.fetchFn ?? defaultFetch;
    this.sleep = deps.sleep;
    this.policy = retryPolicyFromConfig(deps.config);
  }

  /** GET with retry and backoff; never throws. */
  async fetch(url: string, request: FetchRequest): Promise<SettledFetchResult> {
    return withRetry((attempt) => this.fetchOnce(url, request, attempt), this.policy, {
      sleep: this.sleep,
      onAttempt: (result, attempt, retryInMs) => this.logAttempt(url, result, attempt, retryInMs),
    });
  }

  /** A single GET. Network errors, timeouts and 5xx are transient; any other failure, 4xx included, is permanent. */
  async fetchOnce(url: string, request: FetchRequest, attempt = 1): Promise<FetchResult> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await this.fetchFn(url, {
        method: "GET",
        headers: {
          "user-agent": this.config.userAgent,
          accept: request.accept,
        },
        dispatcher: getFetchDispatcher(this.config.ignoreHttpsErrors),
        signal: controller.signal,
        redirect: "follow",
      });

      if (!response.ok) {
        const reason = `HTTP ${response.status}`;
        return isRetriableStatus(response.status)
          ? { kind: "transient_failure", reason, statusCode: response.status, attemptCount: attempt }
          : { kind: "permanent_failure", reason, statusCode: response.status, attemptCount: attempt };
      }

      if (!response.body) {
        return {
          kind: "permanent_failure",
          reason: "response has no body",
          statusCode: response.status,
          attemptCount: attempt,
        };
      }

      const body = Buffer.from(await response.arrayBuffer());
      return {
        kind: "success",
        body,
        contentType: response.headers.get("content-type") ?? undefined,
        statusCode: response.status,
        resolvedUrl: response.url || url,
        attemptCount: attempt,
      };
    } catch (error) {
      const reason = controller.signal.aborted ? `timed out after ${request.timeoutMs}ms` : errorMessage(error);
      return { kind: "transient_failure", reason, attemptCount: attempt };
    } finally {
      clearTimeout(timeout);
    }
  }

  private logAttempt(url: string, result: FetchResult, attempt: number, retryInMs?: number): void {
    if (result.kind === "success") {
      this.logger.info("fetch_attempt_ok", {
        url,
        attempt,
        statusCode: result.statusCode,
        bytes: result.body.length,
      });
      return;
    }

    this.logger.warn(retryInMs === undefined ? "fetch_attempt_failed" : "fetch_attempt_retrying", {
      url,
      attempt,
      maxAttempts: this.policy.maxAttempts,
      outcome: result.kind,
      statusCode: result.statusCode,
      reason: result.reason,
      retryInMs,
    });
  }
}
