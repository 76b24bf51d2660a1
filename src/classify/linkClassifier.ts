import type { DocumentClassification, DocumentDescriptor } from "../types";
import { buildLocalFileName, sanitizeBaseName, urlBaseName } from "./fileName";
import {
  COMPREHENSIVE_GUIDELINE_TOKEN,
  IDENTIFIER_PATTERN,
  PDF_EXTENSION,
  QUICK_REFERENCE_TOKEN,
  stemEndsWithToken,
} from "./rules";

export type IgnoreReason = "invalid_url" | "unsupported_scheme" | "not_pdf";

export type ClassifiedLink =
  | { kind: "include"; descriptor: DocumentDescriptor }
  | { kind: "exclude"; descriptor: DocumentDescriptor }
  | { kind: "ignore"; reason: IgnoreReason };

export interface ClassifyOptions {
  /** Resolves relative hrefs; usually the listing page URL. */
  baseUrl?: string;
  /** Text of the listing block around the anchor, searched for an identifier last. */
  contextText?: string;
}

function resolveUrl(href: string, baseUrl?: string): URL | undefined {
  try {
    return baseUrl ? new URL(href.trim(), baseUrl) : new URL(href.trim());
  } catch {
    return undefined;
  }
}

function normalizeText(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

export function extractIdentifier(...sources: Array<string | undefined>): string | undefined {
  for (const source of sources) {
    const match = source?.match(IDENTIFIER_PATTERN);
    if (match) {
      return match[0].toUpperCase();
    }
  }
  return undefined;
}

export function classifyStem(stem: string): DocumentClassification {
  if (stemEndsWithToken(stem, QUICK_REFERENCE_TOKEN)) {
    return "GRR";
  }
  if (stemEndsWithToken(stem, COMPREHENSIVE_GUIDELINE_TOKEN)) {
    return "GER";
  }
  return "Other";
}

export function classifyLink(href: string, anchorText: string, options: ClassifyOptions = {}): ClassifiedLink {
  const url = resolveUrl(href, options.baseUrl);
  if (!url) {
    return { kind: "ignore", reason: "invalid_url" };
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    return { kind: "ignore", reason: "unsupported_scheme" };
  }

  const baseName = urlBaseName(url);
  if (!baseName.toLowerCase().endsWith(PDF_EXTENSION) || baseName.length === PDF_EXTENSION.length) {
    return { kind: "ignore", reason: "not_pdf" };
  }

  url.hash = "";
  const stem = baseName.slice(0, -PDF_EXTENSION.length);
  const classification = classifyStem(stem);
  const extractedIdentifier = extractIdentifier(stem, anchorText, options.contextText);
  const originalBaseName = sanitizeBaseName(stem);
  const descriptor: DocumentDescriptor = Object.freeze({
    sourceUrl: url.toString(),
    displayName: normalizeText(anchorText) || baseName,
    extractedIdentifier,
    classification,
    originalBaseName,
    fileName: buildLocalFileName(originalBaseName, extractedIdentifier),
  });

  return classification === "GER" ? { kind: "include", descriptor } : { kind: "exclude", descriptor };
}
