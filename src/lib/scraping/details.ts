import { createLogger } from "../logger";
import type { ProductDetail, ProductRecord } from "../types";
import type { PageLoader } from "./browser";
import { loadMarkup, type ChallengeMarkers } from "./fetcher";
import { createProductRecord, parseProductDetail } from "./parser";
import { RetryController, type RetryDeps, type RetryPolicy } from "./retry";
import { delay, randomBetween } from "./utils";

const log = createLogger("details");

/** Detail-page values win over card values wherever the page has them */
export function mergeDetail(record: ProductRecord, detail: ProductDetail): ProductRecord {
  let { priceRegular, priceDiscounted } = record;
  if (detail.currentPrice !== null) {
    if (detail.originalPrice !== null && detail.currentPrice < detail.originalPrice) {
      priceRegular = detail.originalPrice;
      priceDiscounted = detail.currentPrice;
    } else {
      priceRegular = detail.currentPrice;
      priceDiscounted = null;
    }
  }

  return createProductRecord({
    ...record,
    name: detail.name ?? record.name,
    rating: detail.rating ?? record.rating,
    reviewCount: detail.reviewCount ?? record.reviewCount,
    imageUrl: detail.imageUrl ?? record.imageUrl,
    priceRegular,
    priceDiscounted,
  });
}

export interface EnrichOptions extends RetryDeps {
  policy: RetryPolicy;
  delayRangeMs: [number, number];
  challengeMarkers?: ChallengeMarkers;
}

/**
 * Visit each product's detail page in order and merge what it adds.
 * A product whose page cannot be loaded is kept as scraped.
 */
export async function enrichWithDetails(
  records: readonly ProductRecord[],
  loader: PageLoader,
  options: EnrichOptions
): Promise<ProductRecord[]> {
  const sleep = options.sleep ?? delay;
  const random = options.random ?? Math.random;
  const enriched: ProductRecord[] = [];

  for (let i = 0; i < records.length; i++) {
    const record = records[i];
    // One "page" per record: the controller's page index is the record position
    const controller = new RetryController(
      {
        loadPage: () =>
          loadMarkup(loader, record.detailUrl, { challengeMarkers: options.challengeMarkers }),
      },
      options.policy,
      { sleep, random }
    );

    const outcome = await controller.attempt(i + 1);
    if (outcome.state === "exhausted") {
      log.warn(`Keeping ${record.id} without details`, outcome.error);
      enriched.push(record);
    } else {
      enriched.push(mergeDetail(record, parseProductDetail(outcome.markup, record.detailUrl)));
    }

    log.info(`Details ${i + 1}/${records.length}: ${record.id}`);
    if (i < records.length - 1) {
      await sleep(randomBetween(options.delayRangeMs, random));
    }
  }

  return enriched;
}
