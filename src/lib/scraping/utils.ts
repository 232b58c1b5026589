export async function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Uniform pick in [min, max]. `random` is injectable for tests. */
export function randomBetween(
  [min, max]: [number, number],
  random: () => number = Math.random
): number {
  const lo = Math.min(min, max);
  const hi = Math.max(min, max);
  return Math.round(lo + random() * (hi - lo));
}

export function parsePrice(raw: string | undefined | null): number | null {
  if (!raw) return null;
  // "¥3,990 税込", "$1,299.00" → first number, thousands separators dropped
  const match = raw.match(/\d[\d,]*(?:\.\d+)?/);
  if (!match) return null;
  const num = parseFloat(match[0].replace(/,/g, ""));
  return isNaN(num) || num < 0 ? null : num;
}

export function parseRating(raw: string | undefined | null): number | null {
  if (!raw) return null;
  // "平均評価4.4", "4.4 out of 5"
  const match = raw.match(/\d+(?:\.\d+)?/);
  if (!match) return null;
  const num = parseFloat(match[0]);
  if (isNaN(num) || num < 0 || num > 5) return null;
  return num;
}

export function parseReviewCount(raw: string | undefined | null): number | null {
  if (!raw) return null;
  // "（12）", "1,024 reviews"
  const match = raw.match(/\d[\d,]*/);
  if (!match) return null;
  const num = parseInt(match[0].replace(/,/g, ""), 10);
  return isNaN(num) ? null : num;
}

export function resolveUrl(href: string | undefined | null, base: string): string | null {
  if (!href || !href.trim()) return null;
  try {
    const url = new URL(href.trim(), base);
    if (url.protocol !== "http:" && url.protocol !== "https:") return null;
    url.hash = "";
    return url.href;
  } catch {
    return null;
  }
}

/**
 * Stable product id from its detail URL. With a pattern, the id is the
 * pattern's capture groups joined by ":" (or the whole match when it has
 * none); otherwise the URL path without surrounding slashes.
 */
export function deriveProductId(detailUrl: string, pattern?: string): string {
  if (pattern) {
    const match = detailUrl.match(new RegExp(pattern));
    if (match) {
      const groups = match.slice(1).filter((g): g is string => g !== undefined);
      return groups.length > 0 ? groups.join(":") : match[0];
    }
  }
  const url = new URL(detailUrl);
  const path = url.pathname.replace(/^\/+|\/+$/g, "");
  return path || url.href;
}

/** Category URL for a 1-based page index, keeping any existing query */
export function buildPageUrl(categoryUrl: string, pageIndex: number): string {
  const url = new URL(categoryUrl);
  url.searchParams.set("page", String(pageIndex));
  return url.href;
}
