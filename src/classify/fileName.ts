const UNSAFE_CHARACTERS = /[^\p{L}\p{N}_.-]/gu;

export function sanitizeBaseName(stem: string): string {
  const sanitized = stem.replace(UNSAFE_CHARACTERS, "_");
  return sanitized === "" ? "document" : sanitized;
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/** Last path segment of `url`, percent-decoded where possible. */
export function urlBaseName(url: URL): string {
  const segments = url.pathname.split("/").filter(Boolean);
  return decodeSegment(segments[segments.length - 1] ?? "");
}

/** `{identifier}_{base}.pdf`, or `{base}.pdf` without an identifier. */
export function buildLocalFileName(originalBaseName: string, identifier?: string): string {
  return identifier ? `${identifier}_${originalBaseName}.pdf` : `${originalBaseName}.pdf`;
}
