import { BlockedError, FetchError, RetryExhaustedError, isFetchError } from "../errors";
import { createLogger } from "../logger";
import type { PageFetcher } from "./fetcher";
import { delay } from "./utils";

const log = createLogger("retry");

export interface RetryPolicy {
  /** Retries after the first attempt for timeouts and navigation failures */
  retryCount: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Up to this fraction of the backoff is added as random jitter */
  jitterRatio: number;
  /** Wait before the single retry that follows a bot challenge */
  blockCooldownMs: number;
}

export type RetryOutcome =
  | { state: "succeeded"; markup: string; attempts: number }
  | { state: "exhausted"; error: RetryExhaustedError; attempts: number };

export interface RetryDeps {
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export function backoffDelayMs(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const base = Math.min(policy.baseDelayMs * Math.pow(2, attempt), policy.maxDelayMs);
  return Math.round(base + base * policy.jitterRatio * random());
}

/**
 * Wraps a fetcher with the Attempting → Succeeded | Exhausted state machine.
 * Timeouts and navigation errors back off exponentially up to `retryCount`
 * retries. A bot challenge gets one cool-down retry outside that budget;
 * a second challenge exhausts the page.
 */
export class RetryController {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(
    private readonly fetcher: PageFetcher,
    private readonly policy: RetryPolicy,
    deps: RetryDeps = {}
  ) {
    this.sleep = deps.sleep ?? delay;
    this.random = deps.random ?? Math.random;
  }

  async attempt(pageIndex: number): Promise<RetryOutcome> {
    let transientFailures = 0;
    let blocked = false;
    let attempts = 0;

    for (;;) {
      attempts++;
      const result = await this.fetcher.loadPage(pageIndex).then(
        (markup) => ({ ok: true as const, markup }),
        (error: unknown) => ({ ok: false as const, error })
      );
      if (result.ok) {
        if (attempts > 1) log.info(`Page ${pageIndex} succeeded on attempt ${attempts}`);
        return { state: "succeeded", markup: result.markup, attempts };
      }
      if (!isFetchError(result.error)) throw result.error;
      const failure = result.error;

      if (failure instanceof BlockedError) {
        if (blocked) {
          log.error(`Page ${pageIndex} blocked twice, giving up`, failure);
          return this.exhausted(pageIndex, attempts, failure);
        }
        blocked = true;
        log.warn(`Page ${pageIndex} blocked, cooling down ${this.policy.blockCooldownMs}ms`, failure);
        await this.sleep(this.policy.blockCooldownMs);
        continue;
      }

      if (transientFailures >= this.policy.retryCount) {
        log.error(`Page ${pageIndex} failed ${attempts} times, giving up`, failure);
        return this.exhausted(pageIndex, attempts, failure);
      }

      const waitMs = backoffDelayMs(this.policy, transientFailures, this.random);
      transientFailures++;
      log.warn(
        `Attempt ${attempts} for page ${pageIndex} failed (${failure.name}), retry ${transientFailures}/${this.policy.retryCount} in ${waitMs}ms`,
        failure
      );
      await this.sleep(waitMs);
    }
  }

  /** Same as `attempt`, but throws the RetryExhaustedError */
  async fetchWithRetry(pageIndex: number): Promise<string> {
    const outcome = await this.attempt(pageIndex);
    if (outcome.state === "exhausted") throw outcome.error;
    return outcome.markup;
  }

  private exhausted(pageIndex: number, attempts: number, lastError: FetchError): RetryOutcome {
    return {
      state: "exhausted",
      error: new RetryExhaustedError(pageIndex, attempts, lastError),
      attempts,
    };
  }
}
