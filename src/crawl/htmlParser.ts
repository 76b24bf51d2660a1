import { load } from "cheerio";

export interface ParsedAnchor {
  href: string;
  text: string;
  contextText: string;
}

const PAGE_PARAM = "page";

function sanitizeText(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

function normalizeUrl(baseUrl: string, href: string): string | undefined {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return undefined;
  }
}

/** Every anchor with an href, in document order, with the text of its enclosing listing block. */
export function extractAnchors(html: string): ParsedAnchor[] {
  const $ = load(html);
  const anchors: ParsedAnchor[] = [];

  $("a[href]").each((_, element) => {
    const href = $(element).attr("href")?.trim();
    if (!href) {
      return;
    }

    const text = sanitizeText($(element).text() || $(element).attr("title") || "");
    const contextText = sanitizeText($(element).closest("tr, li, article, section, div").first().text());
    anchors.push({ href, text, contextText });
  });

  return anchors;
}

/** Drupal pagers count from 0 and leave the parameter out on the first page. */
export function pageParam(url: string): number | undefined {
  try {
    const raw = new URL(url).searchParams.get(PAGE_PARAM);
    if (raw === null) {
      return 0;
    }
    const parsed = Number.parseInt(raw, 10);
    return Number.isFinite(parsed) && parsed >= 0 ? parsed : undefined;
  } catch {
    return undefined;
  }
}

export function withPageParam(url: string, page: number): string {
  const next = new URL(url);
  next.searchParams.set(PAGE_PARAM, String(page));
  return next.toString();
}

/**
 * Next listing page: an explicit "next" control first, then a numbered pager
 * link whose page parameter is one past the current page.
 */
export function extractNextPageUrl(html: string, pageUrl: string): string | undefined {
  const $ = load(html);

  const explicitNext =
    $("a[rel='next']").attr("href") ||
    $(".pager-next a, .pager__item--next a").attr("href") ||
    $(".pagination a.next").attr("href") ||
    $("ul.pager a:contains('siguiente'), ul.pager a:contains('Siguiente')").attr("href");

  if (explicitNext) {
    return normalizeUrl(pageUrl, explicitNext);
  }

  const current = pageParam(pageUrl);
  if (current === undefined) {
    return undefined;
  }

  let numbered: string | undefined;
  $("ul.pager a[href], .pagination a[href], nav.pager a[href]").each((_, element) => {
    const candidate = normalizeUrl(pageUrl, $(element).attr("href") ?? "");
    if (!numbered && candidate && pageParam(candidate) === current + 1) {
      numbered = candidate;
    }
  });

  return numbered;
}
