// src/core/render/utils.ts
const SCHEME_PATTERN = /^https?:\/\//i;

export function isRenderableUrl(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Trims the input and prepends https:// when no http(s) scheme is present.
 */
export function normalizeUrl(urlString: string): string {
  const trimmed = urlString.trim();
  if (SCHEME_PATTERN.test(trimmed)) {
    return trimmed;
  }
  return `https://${trimmed}`;
}

export function hostnameOf(urlString: string): string | undefined {
  try {
    return new URL(urlString).hostname.toLowerCase();
  } catch {
    return undefined;
  }
}

export function elapsedSeconds(startedAt: number): number {
  return (performance.now() - startedAt) / 1000;
}
