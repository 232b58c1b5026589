import * as cheerio from "cheerio";
import type { Cheerio } from "cheerio";
import type { AnyNode } from "domhandler";
import { ParseFieldError } from "../errors";
import { createLogger } from "../logger";
import type { ProductDetail, ProductRecord } from "../types";
import { deriveProductId, parsePrice, parseRating, parseReviewCount, resolveUrl } from "./utils";

const log = createLogger("parser");

export interface ParserSelectors {
  card: string;
  link: string;
  name: string;
  brand: string;
  /** Current (possibly discounted) price */
  price: string;
  /** Struck-through regular price, only present on sale cards */
  regularPrice: string;
  rating: string;
  reviewCount: string;
  image: string;
}

export const DEFAULT_SELECTORS: ParserSelectors = {
  card: ".product-card",
  link: "a[href]",
  name: ".product-card__name",
  brand: ".product-card__brand",
  price: ".product-card__price",
  regularPrice: ".product-card__price--regular, s, del",
  rating: ".product-card__rating",
  reviewCount: ".product-card__review-count",
  image: "img",
};

export interface ExtractOptions {
  /** Page URL that relative links resolve against */
  baseUrl: string;
  selectors?: Partial<ParserSelectors>;
  idPattern?: string;
}

/**
 * Build an immutable record. A discounted price that is not below the
 * regular price is dropped; one without a regular price becomes the regular.
 */
export function createProductRecord(fields: ProductRecord): ProductRecord {
  let { priceRegular, priceDiscounted } = fields;
  if (priceDiscounted !== null) {
    if (priceRegular === null) {
      priceRegular = priceDiscounted;
      priceDiscounted = null;
    } else if (priceDiscounted >= priceRegular) {
      if (priceDiscounted > priceRegular) {
        log.warn(`Dropping discounted price ${priceDiscounted} above regular ${priceRegular} for ${fields.id}`);
      }
      priceDiscounted = null;
    }
  }
  return Object.freeze({ ...fields, priceRegular, priceDiscounted });
}

function cleanText<T extends AnyNode>($el: Cheerio<T>): string {
  return $el.text().replace(/\s+/g, " ").trim();
}

function parseCard<T extends AnyNode>(
  $card: Cheerio<T>,
  index: number,
  selectors: ParserSelectors,
  options: ExtractOptions
): ProductRecord | ParseFieldError {
  const name = cleanText($card.find(selectors.name).first());
  if (!name) return new ParseFieldError("name", index);

  const href = $card.is("a[href]") ? $card.attr("href") : $card.find(selectors.link).first().attr("href");
  const detailUrl = resolveUrl(href, options.baseUrl);
  if (!detailUrl) return new ParseFieldError("detail_url", index);

  // The regular price may sit inside the price element, so read the current
  // price from a copy with it removed
  const $regular = $card.find(selectors.regularPrice).first();
  const $current = $card.find(selectors.price).first().clone();
  $current.find(selectors.regularPrice).remove();

  const struck = parsePrice(cleanText($regular));
  const current = parsePrice(cleanText($current));

  let priceRegular: number | null = current;
  let priceDiscounted: number | null = null;
  if (struck !== null) {
    priceRegular = struck;
    priceDiscounted = current;
  }

  const $rating = $card.find(selectors.rating).first();
  const rating = parseRating($rating.attr("aria-label") || cleanText($rating));
  const reviewCount = parseReviewCount(cleanText($card.find(selectors.reviewCount).first())) ?? 0;

  const $img = $card.find(selectors.image).first();
  const imageUrl = resolveUrl($img.attr("src") || $img.attr("data-src"), options.baseUrl);

  return createProductRecord({
    id: deriveProductId(detailUrl, options.idPattern || undefined),
    name,
    brand: cleanText($card.find(selectors.brand).first()),
    priceRegular,
    priceDiscounted,
    rating,
    reviewCount,
    imageUrl,
    detailUrl,
  });
}

/**
 * Lazily yield one record per product card. Cards missing a name or a link
 * are logged and skipped. The generator is one-shot.
 */
export function* extractProducts(markup: string, options: ExtractOptions): Generator<ProductRecord> {
  const selectors: ParserSelectors = { ...DEFAULT_SELECTORS, ...options.selectors };
  const $ = cheerio.load(markup);
  const cards = $(selectors.card).toArray();

  for (let i = 0; i < cards.length; i++) {
    const result = parseCard($(cards[i]), i, selectors, options);
    if (result instanceof ParseFieldError) {
      log.warn(`Skipping card: ${result.message}`);
      continue;
    }
    yield result;
  }
}

/** Number of cards on a page, parsed or not. Zero means pagination ended. */
export function countCards(markup: string, selectors: Partial<ParserSelectors> = {}): number {
  const $ = cheerio.load(markup);
  return $(selectors.card ?? DEFAULT_SELECTORS.card).length;
}

// ===== Detail page =====

export interface DetailSelectors {
  name: string;
  rating: string;
  reviewCount: string;
  image: string;
  price: string;
  discountPrice: string;
  priceDownMarker: string;
  originalPrice: string;
}

export const DEFAULT_DETAIL_SELECTORS: DetailSelectors = {
  name: ".p-goods-information__heading, h1",
  rating: ".c-rating",
  reviewCount: ".c-rating-total",
  image: "#photoMain img",
  price: ".p-goods-information__price",
  discountPrice: ".p-goods-information__price--discount",
  priceDownMarker: ".p-goods-information-pricedown__rate",
  originalPrice: ".u-text-style-strike",
};

/** Price text of an element with its inline labels (tax notes etc.) removed */
function priceOf<T extends AnyNode>($el: Cheerio<T>): number | null {
  if ($el.length === 0) return null;
  const $copy = $el.clone();
  $copy.find("span").remove();
  return parsePrice(cleanText($copy));
}

export function parseProductDetail(
  markup: string,
  baseUrl: string,
  selectors: DetailSelectors = DEFAULT_DETAIL_SELECTORS
): ProductDetail {
  const $ = cheerio.load(markup);

  const name = cleanText($(selectors.name).first()) || null;

  const $rating = $(selectors.rating).first();
  const rating = parseRating($rating.attr("aria-label") || cleanText($rating));
  const reviewCount = parseReviewCount(cleanText($(selectors.reviewCount).first()));

  const $img = $(selectors.image).first();
  const imageUrl = resolveUrl($img.attr("src") || $img.attr("data-src"), baseUrl);

  const $discount = $(selectors.discountPrice).first();
  const $price = $(selectors.price).first();
  let currentPrice = priceOf($discount.length > 0 ? $discount : $price);

  let originalPrice: number | null = null;
  if ($(selectors.priceDownMarker).length > 0) {
    originalPrice = parsePrice(cleanText($(selectors.originalPrice).first()));
    if (currentPrice === null) currentPrice = parsePrice(cleanText($price));
  }

  return { name, rating, reviewCount, imageUrl, currentPrice, originalPrice };
}
