import * as cheerio from "cheerio";
import { config } from "../config";
import { BlockedError, NavigationError } from "../errors";
import { createLogger } from "../logger";
import type { LoadOptions, PageLoader } from "./browser";
import { buildPageUrl, delay, randomBetween } from "./utils";

const log = createLogger("fetcher");

export interface ChallengeMarkers {
  /** Elements that only exist on bot interstitials */
  selectors: string[];
  /** Fragments of an interstitial's <title>, matched case-insensitively */
  titles: string[];
}

// Structural markers only: bot-management scripts are injected into normal pages too
export const DEFAULT_CHALLENGE_MARKERS: ChallengeMarkers = {
  selectors: ["#challenge-running", "#challenge-form", ".cf-browser-verification", "#px-captcha"],
  titles: ["just a moment", "attention required", "access denied"],
};

/** Markers from CHALLENGE_SELECTORS / CHALLENGE_TITLES, falling back to the defaults */
export function configuredChallengeMarkers(): ChallengeMarkers {
  return {
    selectors: config.challengeSelectors ?? DEFAULT_CHALLENGE_MARKERS.selectors,
    titles: config.challengeTitles ?? DEFAULT_CHALLENGE_MARKERS.titles,
  };
}

export interface PageFetcher {
  loadPage(pageIndex: number): Promise<string>;
}

/** The marker that identifies `markup` as an interstitial, or null */
export function detectChallenge(
  markup: string,
  markers: ChallengeMarkers = DEFAULT_CHALLENGE_MARKERS
): string | null {
  const $ = cheerio.load(markup);
  const title = $("title").first().text().toLowerCase();
  const byTitle = markers.titles.find((t) => title.includes(t.toLowerCase()));
  if (byTitle) return byTitle;
  return markers.selectors.find((selector) => $(selector).length > 0) ?? null;
}

/**
 * Load a URL and reject interstitials and HTTP errors. Challenge markers are
 * checked first since challenge pages are usually served with a 403 or 503.
 */
export async function loadMarkup(
  loader: PageLoader,
  url: string,
  options: LoadOptions & { challengeMarkers?: ChallengeMarkers } = {}
): Promise<string> {
  const { challengeMarkers, ...loadOptions } = options;
  const page = await loader.loadUrl(url, loadOptions);

  const marker = detectChallenge(page.markup, challengeMarkers ?? configuredChallengeMarkers());
  if (marker) throw new BlockedError(url, marker);

  if (page.status !== null && page.status >= 400) {
    throw new NavigationError(`HTTP ${page.status} for ${url}`, url, page.status);
  }
  return page.markup;
}

export interface CategoryFetcherOptions {
  categoryUrl: string;
  delayRangeMs: [number, number];
  cardSelector?: string;
  challengeMarkers?: ChallengeMarkers;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

/** Loads numbered pages of one category listing, politely. */
export class CategoryFetcher implements PageFetcher {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(
    private readonly loader: PageLoader,
    private readonly options: CategoryFetcherOptions
  ) {
    this.sleep = options.sleep ?? delay;
    this.random = options.random ?? Math.random;
  }

  pageUrl(pageIndex: number): string {
    return buildPageUrl(this.options.categoryUrl, pageIndex);
  }

  async loadPage(pageIndex: number): Promise<string> {
    const url = this.pageUrl(pageIndex);
    log.info(`Loading page ${pageIndex}: ${url}`);

    const markup = await loadMarkup(this.loader, url, {
      waitForSelector: this.options.cardSelector,
      scroll: true,
      challengeMarkers: this.options.challengeMarkers,
    });

    // Rate limit: every successful load is followed by a randomized pause
    const waitMs = randomBetween(this.options.delayRangeMs, this.random);
    await this.sleep(waitMs);
    return markup;
  }
}
