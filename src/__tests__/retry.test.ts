import { describe, it, expect, vi, beforeEach } from "vitest";
import { RetryController, backoffDelayMs, type RetryPolicy } from "../lib/scraping/retry";
import { BlockedError, NavigationError, RetryExhaustedError, TimeoutError } from "../lib/errors";

const URL = "https://shop.example.com/category/tops/?page=1";

const POLICY: RetryPolicy = {
  retryCount: 3,
  baseDelayMs: 100,
  maxDelayMs: 1000,
  jitterRatio: 0,
  blockCooldownMs: 5000,
};

function timeout() {
  return new TimeoutError(URL, 30000);
}

function blocked() {
  return new BlockedError(URL, "px-captcha");
}

describe("RetryController", () => {
  const sleep = vi.fn(async (_ms: number) => {});
  const loadPage = vi.fn<(pageIndex: number) => Promise<string>>();

  beforeEach(() => {
    vi.clearAllMocks();
    loadPage.mockReset();
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  function controller(policy: RetryPolicy = POLICY) {
    return new RetryController({ loadPage }, policy, { sleep, random: () => 0 });
  }

  it("returns the markup on first success without waiting", async () => {
    loadPage.mockResolvedValueOnce("<html>ok</html>");

    const outcome = await controller().attempt(1);

    expect(outcome).toEqual({ state: "succeeded", markup: "<html>ok</html>", attempts: 1 });
    expect(sleep).not.toHaveBeenCalled();
  });

  it("succeeds after three timeouts with retryCount 3", async () => {
    loadPage
      .mockRejectedValueOnce(timeout())
      .mockRejectedValueOnce(timeout())
      .mockRejectedValueOnce(timeout())
      .mockResolvedValueOnce("<html>ok</html>");

    const markup = await controller().fetchWithRetry(1);

    expect(markup).toBe("<html>ok</html>");
    expect(loadPage).toHaveBeenCalledTimes(4);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200, 400]);
  });

  it("raises RetryExhaustedError after four consecutive failures", async () => {
    loadPage.mockRejectedValue(timeout());

    await expect(controller().fetchWithRetry(2)).rejects.toBeInstanceOf(RetryExhaustedError);
    expect(loadPage).toHaveBeenCalledTimes(4);
    expect(sleep).toHaveBeenCalledTimes(3);
  });

  it("reports exhaustion as a typed outcome", async () => {
    const last = new NavigationError("HTTP 502 for page", URL, 502);
    loadPage
      .mockRejectedValueOnce(timeout())
      .mockRejectedValueOnce(new NavigationError("net::ERR_CONNECTION_RESET", URL))
      .mockRejectedValueOnce(timeout())
      .mockRejectedValueOnce(last);

    const outcome = await controller().attempt(3);

    expect(outcome.state).toBe("exhausted");
    if (outcome.state !== "exhausted") return;
    expect(outcome.attempts).toBe(4);
    expect(outcome.error.pageIndex).toBe(3);
    expect(outcome.error.lastError).toBe(last);
    expect(outcome.error.cause).toBe(last);
  });

  it("retries a bot challenge once after the cool-down", async () => {
    loadPage.mockRejectedValueOnce(blocked()).mockResolvedValueOnce("<html>ok</html>");

    const outcome = await controller().attempt(1);

    expect(outcome.state).toBe("succeeded");
    expect(loadPage).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(5000);
  });

  it("gives up on a second bot challenge", async () => {
    loadPage.mockRejectedValue(blocked());

    const outcome = await controller().attempt(1);

    expect(outcome.state).toBe("exhausted");
    if (outcome.state !== "exhausted") return;
    expect(outcome.attempts).toBe(2);
    expect(outcome.error.lastError).toBeInstanceOf(BlockedError);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([5000]);
  });

  it("does not charge the challenge retry to the transient budget", async () => {
    loadPage
      .mockRejectedValueOnce(blocked())
      .mockRejectedValueOnce(timeout())
      .mockRejectedValueOnce(timeout())
      .mockRejectedValueOnce(timeout())
      .mockResolvedValueOnce("<html>ok</html>");

    const outcome = await controller().attempt(1);

    expect(outcome).toEqual({ state: "succeeded", markup: "<html>ok</html>", attempts: 5 });
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([5000, 100, 200, 400]);
  });

  it("fails fast with retryCount 0", async () => {
    loadPage.mockRejectedValue(timeout());

    const outcome = await controller({ ...POLICY, retryCount: 0 }).attempt(1);

    expect(outcome.state).toBe("exhausted");
    expect(loadPage).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("lets errors outside the fetch taxonomy propagate", async () => {
    loadPage.mockRejectedValueOnce(new TypeError("markup is not a string"));

    await expect(controller().attempt(1)).rejects.toThrow(TypeError);
    expect(loadPage).toHaveBeenCalledTimes(1);
  });
});

describe("backoffDelayMs", () => {
  it("doubles per attempt", () => {
    expect([0, 1, 2, 3].map((a) => backoffDelayMs(POLICY, a, () => 0))).toEqual([100, 200, 400, 800]);
  });

  it("caps at maxDelayMs", () => {
    expect(backoffDelayMs({ ...POLICY, maxDelayMs: 250 }, 3, () => 0)).toBe(250);
  });

  it("adds up to jitterRatio of the delay", () => {
    const policy = { ...POLICY, jitterRatio: 0.5 };
    expect(backoffDelayMs(policy, 0, () => 1)).toBe(150);
    expect(backoffDelayMs(policy, 1, () => 0.5)).toBe(250);
  });
});
