import { randomUUID } from "crypto";
import type Database from "better-sqlite3";
import { ProductAccumulator } from "./accumulator";
import { computeStatistics, writeStatistics } from "./analysis";
import { config } from "./config";
import { getDb, insertScrapeRun } from "./db";
import type { RetryExhaustedError } from "./errors";
import { createLogger } from "./logger";
import { profiler as defaultProfiler, type RunProfiler } from "./profiler";
import { withBrowserSession, type PageLoader } from "./scraping/browser";
import { enrichWithDetails } from "./scraping/details";
import { CategoryFetcher, type PageFetcher } from "./scraping/fetcher";
import { countCards, extractProducts, type ParserSelectors, DEFAULT_SELECTORS } from "./scraping/parser";
import { RetryController, type RetryPolicy } from "./scraping/retry";
import { buildPageUrl, delay } from "./scraping/utils";
import { persist } from "./sink";
import type { ProductRecord, ProductStatistics, RunStatus, ScrapeOptions, ScrapeSession } from "./types";

const log = createLogger("pipeline");

export interface PipelineOptions extends ScrapeOptions {
  selectors?: Partial<ParserSelectors>;
}

export interface PipelineDeps {
  /** Use this fetcher instead of opening a browser session */
  fetcher?: PageFetcher;
  /** Loads detail pages when enrichment is on and `fetcher` is injected */
  detailLoader?: PageLoader;
  db?: Database.Database;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  profiler?: RunProfiler;
}

export interface ScrapeResult {
  runId: string;
  records: readonly ProductRecord[];
  pagesFetched: number;
  status: RunStatus;
  error: RetryExhaustedError | null;
  statistics: ProductStatistics | null;
  csvPath: string | null;
}

interface Collected {
  records: readonly ProductRecord[];
  session: ScrapeSession;
  error: RetryExhaustedError | null;
}

export function defaultScrapeOptions(): ScrapeOptions {
  return {
    categoryUrl: config.categoryUrl,
    maxItems: config.maxItems,
    maxPages: config.maxPages,
    retryCount: config.retryCount,
    delayRangeMs: config.delayRangeMs,
    retryBaseDelayMs: config.retryBaseDelayMs,
    retryMaxDelayMs: config.retryMaxDelayMs,
    retryJitterRatio: config.retryJitterRatio,
    blockCooldownMs: config.blockCooldownMs,
    renderTimeoutMs: config.renderTimeoutMs,
    productIdPattern: config.productIdPattern,
    enrichDetails: config.enrichDetails,
    csvPath: config.csvPath,
    analysisDir: config.analysisDir,
  };
}

function retryPolicy(opts: ScrapeOptions): RetryPolicy {
  return {
    retryCount: opts.retryCount,
    baseDelayMs: opts.retryBaseDelayMs,
    maxDelayMs: opts.retryMaxDelayMs,
    jitterRatio: opts.retryJitterRatio,
    blockCooldownMs: opts.blockCooldownMs,
  };
}

/** Pass items through, counting how many were pulled */
function* counted<T>(items: Iterable<T>, counter: { count: number }): Generator<T> {
  for (const item of items) {
    counter.count++;
    yield item;
  }
}

/**
 * Fetch pages in order until the accumulator is full, a page has no cards,
 * a page's parsed records are all duplicates, or a page exhausts its retries.
 * A page whose cards were all skipped does not end pagination.
 */
async function collect(
  opts: PipelineOptions,
  fetcher: PageFetcher,
  detailLoader: PageLoader | null,
  deps: PipelineDeps,
  prof: RunProfiler
): Promise<Collected> {
  const session: ScrapeSession = {
    pageIndex: 1,
    itemsCollected: 0,
    pagesFetched: 0,
    attemptsByPage: new Map(),
    startedAt: Date.now(),
  };
  const accumulator = new ProductAccumulator(opts.maxItems);
  const retry = new RetryController(fetcher, retryPolicy(opts), { sleep: deps.sleep, random: deps.random });
  let error: RetryExhaustedError | null = null;

  prof.start("pipeline:paginate");
  while (!accumulator.isFull() && session.pageIndex <= opts.maxPages) {
    const pageIndex = session.pageIndex;
    const outcome = await prof.time(`page:${pageIndex}`, () => retry.attempt(pageIndex));
    session.attemptsByPage.set(pageIndex, outcome.attempts);

    if (outcome.state === "exhausted") {
      log.error(`Aborting run at page ${pageIndex}`, outcome.error);
      error = outcome.error;
      break;
    }
    session.pagesFetched++;

    if (countCards(outcome.markup, opts.selectors) === 0) {
      log.info(`Page ${pageIndex} has no product cards, pagination ended`);
      break;
    }

    const parsed = { count: 0 };
    const added = accumulator.add(
      counted(
        extractProducts(outcome.markup, {
          baseUrl: buildPageUrl(opts.categoryUrl, pageIndex),
          selectors: opts.selectors,
          idPattern: opts.productIdPattern,
        }),
        parsed
      )
    );
    session.itemsCollected = accumulator.size;
    log.info(`Page ${pageIndex}: +${added} products (${accumulator.size}/${opts.maxItems})`);

    if (parsed.count === 0) {
      log.warn(`Page ${pageIndex} had cards but none could be parsed`);
    } else if (added === 0) {
      log.info(`Page ${pageIndex} added no new products, stopping`);
      break;
    }
    session.pageIndex++;
  }
  prof.stop("pipeline:paginate", { pages: session.pagesFetched, items: accumulator.size });

  let records = accumulator.snapshot();
  if (error) {
    if (opts.enrichDetails) log.warn("Skipping detail enrichment after an aborted run");
  } else if (opts.enrichDetails && records.length > 0) {
    if (detailLoader) {
      const loader = detailLoader;
      const snapshot = records;
      records = await prof.time("pipeline:details", () =>
        enrichWithDetails(snapshot, loader, {
          policy: retryPolicy(opts),
          delayRangeMs: opts.delayRangeMs,
          sleep: deps.sleep,
          random: deps.random,
        })
      );
    } else {
      log.warn("Detail enrichment requested without a page loader, skipping");
    }
  }

  return { records, session, error };
}

export async function runScrape(
  options: Partial<PipelineOptions> = {},
  deps: PipelineDeps = {}
): Promise<ScrapeResult> {
  const opts: PipelineOptions = {
    ...defaultScrapeOptions(),
    ...options,
    selectors: { ...config.selectors, ...options.selectors },
  };
  if (!opts.categoryUrl) {
    throw new Error("No category URL: set CATEGORY_URL or pass --url");
  }
  const prof = deps.profiler ?? defaultProfiler;
  const runId = randomUUID();
  const sleep = deps.sleep ?? delay;

  log.info(`Run ${runId}: scraping ${opts.categoryUrl} (max ${opts.maxItems} items)`);

  const collected = deps.fetcher
    ? await collect(opts, deps.fetcher, deps.detailLoader ?? null, deps, prof)
    : await withBrowserSession({ renderTimeoutMs: opts.renderTimeoutMs }, (session) =>
        collect(
          opts,
          new CategoryFetcher(session, {
            categoryUrl: opts.categoryUrl,
            delayRangeMs: opts.delayRangeMs,
            cardSelector: opts.selectors?.card ?? DEFAULT_SELECTORS.card,
            sleep,
            random: deps.random,
          }),
          session,
          deps,
          prof
        )
      );

  const { records, session, error } = collected;
  const db = deps.db ?? getDb();

  // Partial results are still written after an abort
  let statistics: ProductStatistics | null = null;
  let csvPath: string | null = null;
  if (records.length > 0) {
    csvPath = prof.timeSync("pipeline:persist", () => persist(records, { csvPath: opts.csvPath, db }).csvPath);
    statistics = prof.timeSync("pipeline:analyze", () => computeStatistics(records));
    const statsPath = writeStatistics(statistics, opts.analysisDir);
    log.info(`Statistics written to ${statsPath}`);
  } else {
    log.warn("No products collected, nothing to persist");
  }

  const status: RunStatus = error ? "aborted" : "completed";
  insertScrapeRun(
    {
      id: runId,
      timestamp: new Date().toISOString(),
      categoryUrl: opts.categoryUrl,
      itemCount: records.length,
      pagesFetched: session.pagesFetched,
      status,
      error: error ? error.message : null,
      durationMs: Date.now() - session.startedAt,
    },
    db
  );

  log.info(`Run ${runId} ${status}: ${records.length} products from ${session.pagesFetched} pages`);
  return { runId, records, pagesFetched: session.pagesFetched, status, error, statistics, csvPath };
}
