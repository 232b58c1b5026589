import { describe, it, expect, vi, beforeEach } from "vitest";
import { errors } from "playwright-core";
import { CategoryFetcher, detectChallenge, loadMarkup } from "../lib/scraping/fetcher";
import { classifyBrowserError, type LoadOptions, type LoadedPage } from "../lib/scraping/browser";
import { BlockedError, NavigationError, TimeoutError } from "../lib/errors";

const CATEGORY_URL = "https://shop.example.com/category/tops/";
const LISTING = `<html><body><ul><li class="product-card">Tee</li></ul></body></html>`;

describe("CategoryFetcher", () => {
  let response: { status: number | null; markup: string };
  const loadUrl = vi.fn(
    async (url: string, _options?: LoadOptions): Promise<LoadedPage> => ({ url, ...response })
  );
  const sleep = vi.fn(async (_ms: number) => {});

  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, "log").mockImplementation(() => {});
    response = { status: 200, markup: LISTING };
  });

  function fetcher(categoryUrl = CATEGORY_URL) {
    return new CategoryFetcher(
      { loadUrl },
      {
        categoryUrl,
        delayRangeMs: [1000, 3000],
        cardSelector: ".product-card",
        sleep,
        random: () => 0.5,
      }
    );
  }

  it("loads the numbered page and waits for cards", async () => {
    const markup = await fetcher().loadPage(2);

    expect(markup).toBe(LISTING);
    expect(loadUrl).toHaveBeenCalledWith(`${CATEGORY_URL}?page=2`, {
      waitForSelector: ".product-card",
      scroll: true,
    });
  });

  it("waits a randomized delay before returning", async () => {
    await fetcher().loadPage(1);

    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(2000);
  });

  it("keeps the category's own query string", () => {
    expect(fetcher("https://shop.example.com/c?sort=new").pageUrl(3)).toBe(
      "https://shop.example.com/c?sort=new&page=3"
    );
  });

  it("raises BlockedError on a challenge page even with an error status", async () => {
    response = { status: 403, markup: "<html><head><title>Just a moment...</title></head></html>" };

    const error = await fetcher().loadPage(1).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BlockedError);
    expect(error).toMatchObject({ marker: "just a moment" });
    expect(sleep).not.toHaveBeenCalled();
  });

  it("raises NavigationError on an HTTP error status", async () => {
    response = { status: 503, markup: "<html><body>Service Unavailable</body></html>" };

    const error = await fetcher().loadPage(4).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NavigationError);
    expect(error).toMatchObject({ status: 503, pageUrl: `${CATEGORY_URL}?page=4` });
  });

  it("accepts a page with no response status", async () => {
    response = { status: null, markup: LISTING };
    await expect(fetcher().loadPage(1)).resolves.toBe(LISTING);
  });
});

describe("loadMarkup", () => {
  function loaderFor(markup: string) {
    return {
      loadUrl: async (url: string): Promise<LoadedPage> => ({ url, status: 200, markup }),
    };
  }

  it("checks custom challenge markers", async () => {
    const loader = loaderFor("<div id='bot-wall'>verify you are human</div>");

    await expect(
      loadMarkup(loader, "https://shop.example.com/p/1", {
        challengeMarkers: { selectors: ["#bot-wall"], titles: [] },
      })
    ).rejects.toBeInstanceOf(BlockedError);
  });

  it("accepts a normal listing that loads the bot-management script", async () => {
    const markup = `<html><head><title>Tops | Shop</title>
      <script src="/cdn-cgi/challenge-platform/scripts/jsd/main.js"></script></head>
      <body><ul><li class="product-card">Tee</li></ul></body></html>`;

    await expect(loadMarkup(loaderFor(markup), `${CATEGORY_URL}?page=1`)).resolves.toBe(markup);
  });
});

describe("detectChallenge", () => {
  it("matches interstitial titles case-insensitively", () => {
    expect(detectChallenge("<html><head><title>JUST A MOMENT...</title></head></html>")).toBe("just a moment");
  });

  it("matches interstitial elements", () => {
    expect(detectChallenge("<form id='challenge-form' action='/verify'></form>")).toBe("#challenge-form");
    expect(detectChallenge("<div id='px-captcha'></div>")).toBe("#px-captcha");
  });

  it("returns null for a normal listing", () => {
    expect(detectChallenge(LISTING)).toBeNull();
  });
});

describe("classifyBrowserError", () => {
  const url = "https://shop.example.com/category/tops/?page=1";

  it("maps Playwright timeouts to TimeoutError", () => {
    const cause = new errors.TimeoutError("page.goto: Timeout 30000ms exceeded.");
    const error = classifyBrowserError(cause, url, 30000);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error.message).toBe(`Timed out after 30000ms loading ${url}`);
    expect(error.cause).toBe(cause);
  });

  it("maps other failures to NavigationError", () => {
    const error = classifyBrowserError(new Error("net::ERR_NAME_NOT_RESOLVED"), url, 30000);

    expect(error).toBeInstanceOf(NavigationError);
    expect(error.message).toBe(`Navigation to ${url} failed: net::ERR_NAME_NOT_RESOLVED`);
  });

  it("passes fetch errors through unchanged", () => {
    const blocked = new BlockedError(url, "cf-challenge");
    expect(classifyBrowserError(blocked, url, 30000)).toBe(blocked);
  });
});
