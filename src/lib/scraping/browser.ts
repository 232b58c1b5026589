import { chromium, errors } from "playwright-core";
import type { Browser, BrowserContext } from "playwright-core";
import { config } from "../config";
import { FetchError, NavigationError, TimeoutError } from "../errors";
import { createLogger } from "../logger";
import { randomBetween } from "./utils";

const log = createLogger("browser");

const LAUNCH_ARGS = [
  "--disable-blink-features=AutomationControlled",
  "--no-sandbox",
  "--disable-setuid-sandbox",
  "--disable-dev-shm-usage",
];

export interface BrowserSessionOptions {
  headless?: boolean;
  channel?: string;
  renderTimeoutMs?: number;
  /** How long to wait for `waitForSelector` before reading the page anyway */
  selectorGraceMs?: number;
  userAgent?: string;
}

export interface LoadOptions {
  /** Soft wait for this selector after load; pages without it still resolve */
  waitForSelector?: string;
  scroll?: boolean;
}

export interface LoadedPage {
  url: string;
  status: number | null;
  markup: string;
}

/** Anything that can turn a URL into rendered markup */
export interface PageLoader {
  loadUrl(url: string, options?: LoadOptions): Promise<LoadedPage>;
}

/** Map a Playwright failure onto the fetch error taxonomy */
export function classifyBrowserError(error: unknown, url: string, timeoutMs: number): FetchError {
  if (error instanceof FetchError) return error;
  if (error instanceof errors.TimeoutError) {
    return new TimeoutError(url, timeoutMs, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new NavigationError(`Navigation to ${url} failed: ${message}`, url, undefined, {
    cause: error,
  });
}

/**
 * One Chromium instance and context, owned by a single run.
 * Acquire with `withBrowserSession` so it is always released.
 */
export class BrowserSession implements PageLoader {
  private closed = false;

  private constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly renderTimeoutMs: number,
    private readonly selectorGraceMs: number
  ) {}

  static async open(options: BrowserSessionOptions = {}): Promise<BrowserSession> {
    const browser = await chromium.launch({
      headless: options.headless ?? config.headless,
      channel: options.channel ?? config.browserChannel,
      args: LAUNCH_ARGS,
    });

    try {
      const context = await browser.newContext({
        userAgent: options.userAgent ?? config.getRandomUserAgent(),
        viewport: { width: 1280, height: 800 },
      });
      await context.addInitScript(() => {
        Object.defineProperty(navigator, "webdriver", { get: () => undefined });
      });
      // Images, fonts and media only slow the render down
      await context.route("**/*", (route) => {
        const type = route.request().resourceType();
        if (["image", "font", "media"].includes(type)) {
          return route.abort();
        }
        return route.continue();
      });

      log.info("Browser session opened");
      return new BrowserSession(
        browser,
        context,
        options.renderTimeoutMs ?? config.renderTimeoutMs,
        options.selectorGraceMs ?? config.selectorGraceMs
      );
    } catch (error) {
      await browser.close();
      throw error;
    }
  }

  async loadUrl(url: string, options: LoadOptions = {}): Promise<LoadedPage> {
    if (this.closed) throw new Error("Browser session is closed");

    const page = await this.context.newPage();
    try {
      const response = await page.goto(url, {
        waitUntil: "domcontentloaded",
        timeout: this.renderTimeoutMs,
      });
      await page.waitForLoadState("load", { timeout: this.renderTimeoutMs });

      if (options.waitForSelector) {
        const rendered = await page
          .locator(options.waitForSelector)
          .first()
          .waitFor({ timeout: Math.min(this.selectorGraceMs, this.renderTimeoutMs) })
          .then(
            () => true,
            () => false
          );
        if (!rendered) {
          log.info(`No "${options.waitForSelector}" rendered on ${url}`);
        }
      }

      if (options.scroll) {
        const depth = randomBetween([300, 700]);
        await page.evaluate((y) => window.scrollTo(0, y), depth);
      }

      return {
        url: page.url(),
        status: response ? response.status() : null,
        markup: await page.content(),
      };
    } catch (error) {
      throw classifyBrowserError(error, url, this.renderTimeoutMs);
    } finally {
      // A crashed page can fail to close; keep the load error
      await page.close().catch((error: unknown) => log.warn(`Failed to close page for ${url}`, error));
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.context.close();
    } finally {
      await this.browser.close();
      log.info("Browser session closed");
    }
  }
}

/** Scoped acquisition: the session is closed when `fn` settles, even on failure */
export async function withBrowserSession<T>(
  options: BrowserSessionOptions,
  fn: (session: BrowserSession) => Promise<T>
): Promise<T> {
  const session = await BrowserSession.open(options);
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
