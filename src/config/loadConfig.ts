import fs from "node:fs";
import path from "node:path";
import { ConfigError, errorMessage } from "../core/errors";
import { LOG_LEVELS, type LogLevel } from "../observability/types";
import type { AppConfig } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  listingUrl: "https://www.imss.gob.mx/guias_practicaclinica?field_categoria_gs_value=All",
  userAgent:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36",
  ignoreHttpsErrors: false,
  requestTimeoutMs: 20_000,
  downloadTimeoutMs: 120_000,
  maxAttempts: 3,
  backoffBaseMs: 1_000,
  backoffMaxMs: 10_000,
  politenessDelayMs: 1_000,
  maxPages: 200,
  maxConsecutivePageFailures: 2,
  outputDir: "imss_pdfs",
  manifestsDir: "manifests",
  logFile: "imss_download.log",
  logLevel: "info",
};

class FileOverrides {
  private readonly fields: Map<string, unknown>;
  private readonly source: string;

  constructor(fields: Map<string, unknown>, source: string) {
    this.fields = fields;
    this.source = source;
    for (const key of fields.keys()) {
      if (!Object.hasOwn(DEFAULT_CONFIG, key)) {
        throw new ConfigError(`Unknown config key "${key}" in ${source}`);
      }
    }
  }

  string(key: keyof AppConfig): string | undefined {
    const value = this.fields.get(key);
    if (value === undefined || typeof value === "string") {
      return value;
    }
    throw new ConfigError(`${key} in ${this.source} must be a string`);
  }

  number(key: keyof AppConfig): number | undefined {
    const value = this.fields.get(key);
    if (value === undefined || typeof value === "number") {
      return value;
    }
    throw new ConfigError(`${key} in ${this.source} must be a number`);
  }

  boolean(key: keyof AppConfig): boolean | undefined {
    const value = this.fields.get(key);
    if (value === undefined || typeof value === "boolean") {
      return value;
    }
    throw new ConfigError(`${key} in ${this.source} must be a boolean`);
  }
}

function readConfigFile(configPath?: string): FileOverrides {
  if (!configPath) {
    return new FileOverrides(new Map(), "defaults");
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config file is not valid JSON: ${absolutePath} (${errorMessage(error)})`);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Config file must contain a JSON object: ${absolutePath}`);
  }
  return new FileOverrides(new Map(Object.entries(parsed)), absolutePath);
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}

function requireInteger(config: AppConfig, key: keyof AppConfig, min: number): void {
  const value = config[key];
  if (typeof value !== "number" || !Number.isInteger(value) || value < min) {
    throw new ConfigError(`${key} must be an integer >= ${min} (got ${String(value)})`);
  }
}

export function validateConfig(config: AppConfig): AppConfig {
  let listing: URL;
  try {
    listing = new URL(config.listingUrl);
  } catch {
    throw new ConfigError(`listingUrl is not a valid URL: ${config.listingUrl}`);
  }
  if (listing.protocol !== "http:" && listing.protocol !== "https:") {
    throw new ConfigError(`listingUrl must use http or https: ${config.listingUrl}`);
  }

  requireInteger(config, "requestTimeoutMs", 1);
  requireInteger(config, "downloadTimeoutMs", 1);
  requireInteger(config, "maxAttempts", 1);
  requireInteger(config, "backoffBaseMs", 0);
  requireInteger(config, "backoffMaxMs", 0);
  requireInteger(config, "politenessDelayMs", 0);
  requireInteger(config, "maxPages", 1);
  requireInteger(config, "maxConsecutivePageFailures", 1);

  for (const key of ["outputDir", "manifestsDir", "logFile"] as const) {
    if (config[key].trim() === "") {
      throw new ConfigError(`${key} must not be empty`);
    }
  }

  return config;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const file = readConfigFile(configPath);
  const d = DEFAULT_CONFIG;

  return validateConfig({
    listingUrl: env.LISTING_URL ?? file.string("listingUrl") ?? d.listingUrl,
    userAgent: env.USER_AGENT ?? file.string("userAgent") ?? d.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, file.boolean("ignoreHttpsErrors") ?? d.ignoreHttpsErrors),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, file.number("requestTimeoutMs") ?? d.requestTimeoutMs),
    downloadTimeoutMs: toInt(env.DOWNLOAD_TIMEOUT_MS, file.number("downloadTimeoutMs") ?? d.downloadTimeoutMs),
    maxAttempts: toInt(env.MAX_ATTEMPTS, file.number("maxAttempts") ?? d.maxAttempts),
    backoffBaseMs: toInt(env.BACKOFF_BASE_MS, file.number("backoffBaseMs") ?? d.backoffBaseMs),
    backoffMaxMs: toInt(env.BACKOFF_MAX_MS, file.number("backoffMaxMs") ?? d.backoffMaxMs),
    politenessDelayMs: toInt(env.POLITENESS_DELAY_MS, file.number("politenessDelayMs") ?? d.politenessDelayMs),
    maxPages: toInt(env.MAX_PAGES, file.number("maxPages") ?? d.maxPages),
    maxConsecutivePageFailures: toInt(
      env.MAX_CONSECUTIVE_PAGE_FAILURES,
      file.number("maxConsecutivePageFailures") ?? d.maxConsecutivePageFailures,
    ),
    outputDir: env.OUTPUT_DIR ?? file.string("outputDir") ?? d.outputDir,
    manifestsDir: env.MANIFESTS_DIR ?? file.string("manifestsDir") ?? d.manifestsDir,
    logFile: env.LOG_FILE ?? file.string("logFile") ?? d.logFile,
    logLevel: toLogLevel(env.LOG_LEVEL, toLogLevel(file.string("logLevel"), d.logLevel)),
  });
}

export { DEFAULT_CONFIG };
