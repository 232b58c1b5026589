import type { ParserSelectors } from "./scraping/parser";

function intEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = parseInt(raw, 10);
  return isNaN(parsed) ? fallback : parsed;
}

/** Comma-separated list, or undefined when unset */
function listEnv(name: string): string[] | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  const items = raw
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
  return items.length > 0 ? items : undefined;
}

const SELECTOR_ENV: [keyof ParserSelectors, string][] = [
  ["card", "CARD_SELECTOR"],
  ["link", "LINK_SELECTOR"],
  ["name", "NAME_SELECTOR"],
  ["brand", "BRAND_SELECTOR"],
  ["price", "PRICE_SELECTOR"],
  ["regularPrice", "REGULAR_PRICE_SELECTOR"],
  ["rating", "RATING_SELECTOR"],
  ["reviewCount", "REVIEW_COUNT_SELECTOR"],
  ["image", "IMAGE_SELECTOR"],
];

/** Card selectors set in the environment; unset ones keep the parser defaults */
export function selectorsFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<ParserSelectors> {
  const selectors: Partial<ParserSelectors> = {};
  for (const [key, name] of SELECTOR_ENV) {
    const value = env[name]?.trim();
    if (value) selectors[key] = value;
  }
  return selectors;
}

const delayRangeMs: [number, number] = [intEnv("DELAY_MIN_MS", 1000), intEnv("DELAY_MAX_MS", 3000)];

export const config = {
  // Required: set CATEGORY_URL or pass --url
  categoryUrl: process.env.CATEGORY_URL || "",
  maxItems: intEnv("MAX_ITEMS", 200),
  maxPages: intEnv("MAX_PAGES", 50),
  retryCount: intEnv("RETRY_COUNT", 3),
  delayRangeMs,
  retryBaseDelayMs: intEnv("RETRY_BASE_DELAY_MS", 2000),
  retryMaxDelayMs: intEnv("RETRY_MAX_DELAY_MS", 30000),
  retryJitterRatio: 0.25,
  blockCooldownMs: intEnv("BLOCK_COOLDOWN_MS", 60000),
  renderTimeoutMs: intEnv("RENDER_TIMEOUT_MS", 30000),
  selectorGraceMs: intEnv("SELECTOR_GRACE_MS", 5000),
  selectors: selectorsFromEnv(),
  challengeSelectors: listEnv("CHALLENGE_SELECTORS"),
  challengeTitles: listEnv("CHALLENGE_TITLES"),
  productIdPattern: process.env.PRODUCT_ID_PATTERN || "",
  enrichDetails: process.env.ENRICH_DETAILS === "true",
  headless: process.env.HEADLESS !== "false",
  browserChannel: process.env.BROWSER_CHANNEL || undefined,
  dbPath: process.env.DB_PATH || "data/products.db",
  csvPath: process.env.CSV_PATH || "data/products.csv",
  analysisDir: process.env.ANALYSIS_DIR || "analysis",
  // Empty string disables the log file
  logFile: process.env.LOG_FILE ?? "scraping.log",
  userAgents: [
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  ],
  getRandomUserAgent(): string {
    return this.userAgents[Math.floor(Math.random() * this.userAgents.length)];
  },
};
