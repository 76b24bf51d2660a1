import type { AppConfig } from "../config";
import { crawlAllPages, type CrawlReport } from "../crawl";
import { downloadOne } from "../download";
import { errorMessage } from "./errors";
import type { Logger, RunStatistics, RunStatisticsSnapshot } from "../observability";
import type { Sink } from "../sink";
import type { DocumentStorage } from "../store";
import type { DocumentDescriptor, DownloadOutcome, DownloadRecord } from "../types";
import type { PageFetcher } from "./pageFetcher";
import type { RequestThrottle } from "./throttle";

export interface PipelineContext {
  runId: string;
  config: AppConfig;
  logger: Logger;
  stats: RunStatistics;
  storage: DocumentStorage;
  sink: Sink;
  fetcher: PageFetcher;
  throttle: RequestThrottle;
}

export interface RunSummary {
  runId: string;
  statistics: RunStatisticsSnapshot;
  outputDir: string;
}

function toDownloadRecord(descriptor: DocumentDescriptor, outcome: DownloadOutcome): DownloadRecord {
  return {
    sourceUrl: descriptor.sourceUrl,
    fileName: outcome.fileName,
    status: outcome.status,
    reason: outcome.status === "failed" ? outcome.reason : undefined,
    message: outcome.status === "failed" ? outcome.message : undefined,
    bytes: outcome.status === "downloaded" ? outcome.bytes : undefined,
    finishedAt: new Date().toISOString(),
  };
}

/** Manifests are a record of the run; a failed append is logged and the run goes on. */
async function publishToSink(ctx: PipelineContext, manifest: string, publish: () => Promise<void>): Promise<void> {
  try {
    await publish();
  } catch (error) {
    ctx.logger.error("manifest_write_failed", { manifest, error: errorMessage(error) });
  }
}

async function discover(ctx: PipelineContext): Promise<CrawlReport> {
  await ctx.storage.ensureReady();
  ctx.logger.info("crawl_start", { listingUrl: ctx.config.listingUrl, maxPages: ctx.config.maxPages });

  const report = await crawlAllPages(
    {
      config: ctx.config,
      logger: ctx.logger.child("crawl"),
      stats: ctx.stats,
      fetcher: ctx.fetcher,
      throttle: ctx.throttle,
    },
    ctx.config.listingUrl,
  );
  await publishToSink(ctx, "discovered", () => ctx.sink.publishDiscovered(report.descriptors));
  ctx.logger.info("crawl_complete", { documentsFound: report.descriptors.length, excluded: report.excluded });
  return report;
}

/** Crawl, then download every discovered document in order. Per-document failures never stop the run. */
export async function runPipeline(ctx: PipelineContext): Promise<RunSummary> {
  ctx.logger.info("pipeline_start", { outputDir: ctx.storage.location });
  const { descriptors } = await discover(ctx);
  const downloadLogger = ctx.logger.child("download");

  for (const [index, descriptor] of descriptors.entries()) {
    downloadLogger.info("download_progress", {
      progress: `${index + 1}/${descriptors.length}`,
      fileName: descriptor.fileName,
    });

    const stopTimer = ctx.stats.startTimer("download_ms");
    const outcome = await downloadOne(
      {
        config: ctx.config,
        logger: downloadLogger,
        storage: ctx.storage,
        fetcher: ctx.fetcher,
        throttle: ctx.throttle,
      },
      descriptor,
    );
    stopTimer();
    ctx.stats.recordOutcome(outcome);
    const record = toDownloadRecord(descriptor, outcome);
    await publishToSink(ctx, "downloads", () => ctx.sink.publishDownloadResult([record]));
  }

  ctx.stats.logSummary(ctx.logger);
  const outputDir = ctx.storage.location;
  ctx.logger.info("pipeline_complete", { outputDir });
  return { runId: ctx.runId, statistics: ctx.stats.snapshot(), outputDir };
}

/** Discovery only: lists what a full run would download. */
export async function runCrawlOnly(ctx: PipelineContext): Promise<CrawlReport> {
  const report = await discover(ctx);
  for (const descriptor of report.descriptors) {
    ctx.logger.info("crawl_discovered_dry_run", {
      url: descriptor.sourceUrl,
      fileName: descriptor.fileName,
      identifier: descriptor.extractedIdentifier,
    });
  }
  ctx.stats.logSummary(ctx.logger);
  return report;
}
