// ===== Product =====

/** One scraped product card. Frozen once created. */
export interface ProductRecord {
  id: string;
  name: string;
  brand: string;
  priceRegular: number | null;
  priceDiscounted: number | null;
  rating: number | null;
  reviewCount: number;
  imageUrl: string | null;
  detailUrl: string;
}

/** Fields read from a product detail page; null where the page lacks them */
export interface ProductDetail {
  name: string | null;
  rating: number | null;
  reviewCount: number | null;
  imageUrl: string | null;
  currentPrice: number | null;
  originalPrice: number | null;
}

// ===== Scrape run =====

export interface ScrapeOptions {
  categoryUrl: string;
  maxItems: number;
  maxPages: number;
  retryCount: number;
  delayRangeMs: [number, number];
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  retryJitterRatio: number;
  blockCooldownMs: number;
  renderTimeoutMs: number;
  productIdPattern: string;
  enrichDetails: boolean;
  csvPath: string;
  analysisDir: string;
}

/** Transient state of one run. Never persisted. */
export interface ScrapeSession {
  pageIndex: number;
  itemsCollected: number;
  pagesFetched: number;
  attemptsByPage: Map<number, number>;
  startedAt: number;
}

export type RunStatus = "completed" | "aborted";

export interface ScrapeRun {
  id: string;
  timestamp: string;
  categoryUrl: string;
  itemCount: number;
  pagesFetched: number;
  status: RunStatus;
  error: string | null;
  durationMs: number;
}

// ===== Analysis =====

export interface BrandCount {
  brand: string;
  count: number;
}

export interface ProductStatistics {
  productCount: number;
  meanPrice: number | null;
  medianPrice: number | null;
  maxPrice: number | null;
  minPrice: number | null;
  stdDevPrice: number | null;
  meanRating: number | null;
  brandCount: number;
  saleCount: number;
  topBrands: BrandCount[];
  priceRatingCorrelation: number | null;
}
