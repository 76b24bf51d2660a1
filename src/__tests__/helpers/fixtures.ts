import { Response } from "undici";
import { vi } from "vitest";
import { type AppConfig, DEFAULT_CONFIG } from "../../config";
import type { FetchFn } from "../../core/fetch";
import { Logger, MemoryLogWriter } from "../../observability";

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...DEFAULT_CONFIG,
    listingUrl: "https://guias.test/listado?field_categoria_gs_value=All",
    politenessDelayMs: 1_000,
    backoffBaseMs: 1_000,
    backoffMaxMs: 8_000,
    maxAttempts: 3,
    ...overrides,
  };
}

export function testLogger(): { logger: Logger; writer: MemoryLogWriter } {
  const writer = new MemoryLogWriter();
  return { logger: new Logger({ component: "test", runId: "run_test", level: "debug", writers: [writer] }), writer };
}

export const PDF_BYTES = Buffer.from("%PDF-1.4\n1 0 obj\n<<>>\nendobj\n%%EOF\n", "ascii");

export function pdfResponse(body: Uint8Array = PDF_BYTES): Response {
  return new Response(body, { status: 200, headers: { "content-type": "application/pdf" } });
}

export function htmlResponse(html: string, status = 200): Response {
  return new Response(html, { status, headers: { "content-type": "text/html; charset=utf-8" } });
}

export function statusResponse(status: number): Response {
  return new Response(`status ${status}`, { status });
}

export type Route = Response | Error | Array<Response | Error>;

/**
 * In-process stand-in for the site: each URL answers from its route, and an
 * array route answers once per entry, repeating the last one.
 */
export function fakeSite(routes: Record<string, Route>) {
  const requested: string[] = [];
  const served = new Map<string, number>();

  const fetchFn = vi.fn<FetchFn>(async (url) => {
    requested.push(url);
    const route = routes[url];
    if (route === undefined) {
      return statusResponse(404);
    }

    const entries = Array.isArray(route) ? route : [route];
    const index = served.get(url) ?? 0;
    served.set(url, index + 1);
    const entry = entries[Math.min(index, entries.length - 1)];
    if (entry instanceof Error) {
      throw entry;
    }
    return entry.clone();
  });

  return { fetchFn, requested };
}

export function recordingSleep() {
  const waits: number[] = [];
  const sleep = async (ms: number): Promise<void> => {
    waits.push(ms);
  };
  return { sleep, waits };
}

export function listingPage(links: Array<{ href: string; text: string }>, nextHref?: string): string {
  const items = links.map((link) => `<li class="guia"><a href="${link.href}">${link.text}</a></li>`).join("\n");
  const pager = nextHref ? `<ul class="pager"><li class="pager-next"><a href="${nextHref}">siguiente ›</a></li></ul>` : "";
  return `<html><body><ul class="guias">${items}</ul>${pager}</body></html>`;
}
