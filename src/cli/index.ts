import { type AppConfig, loadConfig, validateConfig } from "../config";
import { errorMessage, HarvestError } from "../core/errors";
import type { FetchFn } from "../core/fetch";
import { PageFetcher } from "../core/pageFetcher";
import { type PipelineContext, runCrawlOnly, runPipeline } from "../core/pipeline";
import type { SleepFn } from "../core/sleep";
import { RequestThrottle } from "../core/throttle";
import { ConsoleLogWriter, createRunId, FileLogWriter, Logger, type LogWriter, RunStatistics } from "../observability";
import { createSink } from "../sink";
import { createStorage, type DocumentStorage } from "../store";

export type CommandName = "run" | "crawl";

export interface ParsedCliArgs {
  command: CommandName;
  ignoreHttpsErrors: boolean;
  maxPages?: number;
  outputDir?: string;
  configPath?: string;
}

/** Seams for tests; production runs use the defaults. */
export interface CliRuntime {
  env?: NodeJS.ProcessEnv;
  fetchFn?: FetchFn;
  sleep?: SleepFn;
  writers?: LogWriter[];
  storage?: DocumentStorage;
  manifests?: boolean;
  onInterrupt?: (storage: DocumentStorage) => void;
}

const EXIT_OK = 0;
const EXIT_FATAL = 1;
export const EXIT_INTERRUPTED = 130;

const HELP_TEXT = `
Usage:
  imss-guidelines [command] [options]

Commands:
  run      Crawl the guideline listing and download every GER document (default)
  crawl    Crawl the listing and print the documents a run would download

Options:
  --config <path>        Optional path to JSON config file
  --output-dir <dir>     Directory the PDFs are written to
  --max-pages <n>        Safety bound on listing pages visited
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  -h, --help             Show this help
`;

function parseCommand(raw: string | undefined): CommandName | "help" | undefined {
  if (raw === undefined || raw.startsWith("-")) {
    return "run";
  }

  if (raw === "run" || raw === "crawl") {
    return raw;
  }

  if (raw === "help") {
    return "help";
  }

  return undefined;
}

function optionValue(argv: string[], name: string): string | undefined {
  const index = argv.indexOf(name);
  return index >= 0 ? argv[index + 1] : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command || command === "help") {
    return "help";
  }

  const maxPagesRaw = optionValue(argv, "--max-pages");
  const maxPagesParsed = maxPagesRaw ? Number.parseInt(maxPagesRaw, 10) : undefined;
  return {
    command,
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
    maxPages: maxPagesParsed !== undefined && Number.isFinite(maxPagesParsed) ? maxPagesParsed : undefined,
    outputDir: optionValue(argv, "--output-dir"),
    configPath: optionValue(argv, "--config"),
  };
}

export function applyCliOverrides(config: AppConfig, parsed: ParsedCliArgs): AppConfig {
  return validateConfig({
    ...config,
    ignoreHttpsErrors: parsed.ignoreHttpsErrors || config.ignoreHttpsErrors,
    maxPages: parsed.maxPages ?? config.maxPages,
    outputDir: parsed.outputDir ?? config.outputDir,
  });
}

/** On SIGINT or SIGTERM, removes in-flight `.part` files and exits with 130. Returns the installed handler. */
export function installInterruptCleanup(
  storage: DocumentStorage,
  exit: (code: number) => void = (code) => process.exit(code),
): (signal: NodeJS.Signals) => void {
  const handler = (signal: NodeJS.Signals): void => {
    process.off("SIGINT", handler);
    process.off("SIGTERM", handler);
    console.error(`received ${signal}, removing partial downloads`);
    void storage
      .discardPending()
      .catch((error: unknown) => console.error(`cleanup failed: ${errorMessage(error)}`))
      .finally(() => exit(EXIT_INTERRUPTED));
  };
  process.on("SIGINT", handler);
  process.on("SIGTERM", handler);
  return handler;
}

export async function runCli(argv: string[], runtime: CliRuntime = {}): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return EXIT_OK;
  }

  let config: AppConfig;
  try {
    config = applyCliOverrides(loadConfig(parsed.configPath, runtime.env), parsed);
  } catch (error) {
    console.error(`fatal: ${errorMessage(error)}`);
    return EXIT_FATAL;
  }

  const runId = createRunId();
  const writers = runtime.writers ?? [new ConsoleLogWriter(), new FileLogWriter(config.logFile)];
  const logger = new Logger({ component: "cli", runId, level: config.logLevel, writers });
  const storage = runtime.storage ?? createStorage(config);
  (runtime.onInterrupt ?? installInterruptCleanup)(storage);

  logger.info("command_start", {
    command: parsed.command,
    listingUrl: config.listingUrl,
    outputDir: storage.location,
    maxPages: config.maxPages,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
  });

  try {
    const ctx: PipelineContext = {
      runId,
      config,
      logger: logger.child(parsed.command === "run" ? "pipeline" : "crawl"),
      stats: new RunStatistics(),
      storage,
      sink: createSink(config, runId, runtime.manifests ?? true),
      fetcher: new PageFetcher({
        config,
        logger: logger.child("fetch"),
        fetchFn: runtime.fetchFn,
        sleep: runtime.sleep,
      }),
      throttle: new RequestThrottle({ minDelayMs: config.politenessDelayMs, sleep: runtime.sleep }),
    };

    if (parsed.command === "crawl") {
      await runCrawlOnly(ctx);
    } else {
      const summary = await runPipeline(ctx);
      logger.info("pdfs_saved", { outputDir: summary.outputDir, ...summary.statistics });
    }

    logger.info("command_complete", { command: parsed.command });
    return EXIT_OK;
  } catch (error) {
    logger.error("command_failed", {
      command: parsed.command,
      code: error instanceof HarvestError ? error.code : "unexpected",
      error: errorMessage(error),
    });
    return EXIT_FATAL;
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
