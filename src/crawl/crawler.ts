import { classifyLink } from "../classify";
import type { AppConfig } from "../config";
import { ListingUnreachableError } from "../core/errors";
import { HTML_REQUEST_ACCEPT, type PageFetcher } from "../core/pageFetcher";
import type { RequestThrottle } from "../core/throttle";
import type { Logger, RunStatistics } from "../observability";
import type { DocumentDescriptor } from "../types";
import { extractAnchors, extractNextPageUrl, pageParam, withPageParam } from "./htmlParser";

export interface CrawlDependencies {
  config: AppConfig;
  logger: Logger;
  stats: RunStatistics;
  fetcher: PageFetcher;
  throttle: RequestThrottle;
}

export interface CrawlReport {
  descriptors: DocumentDescriptor[];
  pagesVisited: number;
  pagesFailed: number;
  excluded: number;
  reachedPageLimit: boolean;
}

/** After a failed page there is no HTML to read the pager from, so the next page is guessed from the URL. */
function guessNextPageUrl(pageUrl: string): string | undefined {
  const current = pageParam(pageUrl);
  return current === undefined ? undefined : withPageParam(pageUrl, current + 1);
}

class DescriptorCollector {
  readonly descriptors: DocumentDescriptor[] = [];
  private readonly byUrl = new Set<string>();
  private readonly byFileName = new Map<string, string>();
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  add(descriptor: DocumentDescriptor, pageUrl: string): boolean {
    if (this.byUrl.has(descriptor.sourceUrl)) {
      return false;
    }

    const claimedBy = this.byFileName.get(descriptor.fileName);
    if (claimedBy !== undefined) {
      this.logger.warn("crawl_file_name_collision", {
        pageUrl,
        url: descriptor.sourceUrl,
        fileName: descriptor.fileName,
        claimedBy,
      });
      return false;
    }

    this.byUrl.add(descriptor.sourceUrl);
    this.byFileName.set(descriptor.fileName, descriptor.sourceUrl);
    this.descriptors.push(descriptor);
    return true;
  }
}

/**
 * Walks the paginated listing from `listingUrl` and returns the included
 * documents in discovery order. "No next link" ends the crawl whether it is the
 * real last page or a pager that could not be read; the final log line carries
 * the page count and the safety bound so the two can be told apart by hand.
 */
export async function crawlAllPages(deps: CrawlDependencies, listingUrl: string): Promise<CrawlReport> {
  const { config, logger, stats, fetcher, throttle } = deps;
  const collector = new DescriptorCollector(logger);
  const visited = new Set<string>();
  let pageUrl: string | undefined = listingUrl;
  let pagesVisited = 0;
  let pagesFailed = 0;
  let consecutiveFailures = 0;
  let excluded = 0;

  while (pageUrl && pagesVisited < config.maxPages) {
    const currentUrl: string = pageUrl;
    visited.add(currentUrl);
    pagesVisited += 1;
    logger.info("crawl_page_start", { pageUrl: currentUrl, page: pagesVisited });

    const stopTimer = stats.startTimer("page_fetch_ms");
    const result = await throttle.run(() =>
      fetcher.fetch(currentUrl, { accept: HTML_REQUEST_ACCEPT, timeoutMs: config.requestTimeoutMs }),
    );
    const durationMs = stopTimer();
    stats.incrementCounter("pages_visited");

    let nextUrl: string | undefined;
    if (result.kind === "permanent_failure") {
      if (pagesVisited === 1) {
        throw new ListingUnreachableError(currentUrl, result.reason);
      }

      pagesFailed += 1;
      consecutiveFailures += 1;
      stats.incrementCounter("pages_failed");
      logger.error("crawl_page_fetch_failed", {
        pageUrl: currentUrl,
        page: pagesVisited,
        reason: result.reason,
        attempts: result.attemptCount,
      });

      if (consecutiveFailures >= config.maxConsecutivePageFailures) {
        logger.warn("crawl_stopped_after_failures", { pageUrl: currentUrl, consecutiveFailures });
        pageUrl = undefined;
        break;
      }
      nextUrl = guessNextPageUrl(currentUrl);
    } else {
      consecutiveFailures = 0;
      const html = result.body.toString("utf-8");
      let includedOnPage = 0;
      let excludedOnPage = 0;

      for (const anchor of extractAnchors(html)) {
        const classified = classifyLink(anchor.href, anchor.text, {
          baseUrl: currentUrl,
          contextText: anchor.contextText,
        });
        if (classified.kind === "include" && collector.add(classified.descriptor, currentUrl)) {
          includedOnPage += 1;
        } else if (classified.kind === "exclude") {
          excludedOnPage += 1;
          logger.debug("crawl_link_excluded", {
            url: classified.descriptor.sourceUrl,
            classification: classified.descriptor.classification,
          });
        }
      }

      excluded += excludedOnPage;
      stats.incrementCounter("documents_found", includedOnPage);
      stats.incrementCounter("documents_excluded", excludedOnPage);
      logger.info("crawl_page_complete", {
        pageUrl: currentUrl,
        page: pagesVisited,
        includedOnPage,
        excludedOnPage,
        durationMs,
      });
      nextUrl = extractNextPageUrl(html, currentUrl);
    }

    if (nextUrl && visited.has(nextUrl)) {
      logger.warn("crawl_pagination_cycle", { pageUrl: currentUrl, nextUrl });
      nextUrl = undefined;
    }
    pageUrl = nextUrl;
  }

  const reachedPageLimit = pageUrl !== undefined && pagesVisited >= config.maxPages;
  if (reachedPageLimit) {
    logger.warn("crawl_max_pages_reached", { maxPages: config.maxPages, pendingPageUrl: pageUrl });
  }

  logger.info("crawl_finished", {
    pagesVisited,
    pagesFailed,
    maxPages: config.maxPages,
    documentsFound: collector.descriptors.length,
    excluded,
  });

  return {
    descriptors: collector.descriptors,
    pagesVisited,
    pagesFailed,
    excluded,
    reachedPageLimit,
  };
}
