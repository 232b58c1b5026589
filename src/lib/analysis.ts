import * as fs from "fs";
import * as path from "path";
import type { BrandCount, ProductRecord, ProductStatistics } from "./types";

const TOP_BRANDS = 20;

/** What the customer pays: the discounted price when there is one */
export function effectivePrice(product: ProductRecord): number | null {
  return product.priceDiscounted ?? product.priceRegular;
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

function mean(values: number[]): number {
  return values.reduce((s, v) => s + v, 0) / values.length;
}

function median(values: number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

/** Sample standard deviation (n - 1) */
function stdDev(values: number[]): number {
  const m = mean(values);
  const variance = values.reduce((s, v) => s + (v - m) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

export function pearson(xs: number[], ys: number[]): number | null {
  if (xs.length !== ys.length || xs.length < 2) return null;
  const mx = mean(xs);
  const my = mean(ys);
  let num = 0;
  let dx = 0;
  let dy = 0;
  for (let i = 0; i < xs.length; i++) {
    num += (xs[i] - mx) * (ys[i] - my);
    dx += (xs[i] - mx) ** 2;
    dy += (ys[i] - my) ** 2;
  }
  if (dx === 0 || dy === 0) return null;
  return num / Math.sqrt(dx * dy);
}

export function countBrands(products: readonly ProductRecord[]): BrandCount[] {
  const counts = new Map<string, number>();
  for (const p of products) {
    if (!p.brand) continue;
    counts.set(p.brand, (counts.get(p.brand) ?? 0) + 1);
  }
  // Stable sort keeps first-seen order among ties
  return [...counts.entries()]
    .map(([brand, count]) => ({ brand, count }))
    .sort((a, b) => b.count - a.count);
}

export function computeStatistics(products: readonly ProductRecord[]): ProductStatistics {
  const prices = products
    .map(effectivePrice)
    .filter((p): p is number => p !== null);
  const ratings = products
    .map((p) => p.rating)
    .filter((r): r is number => r !== null);

  const pairs = products.flatMap((p) => {
    const price = effectivePrice(p);
    return price !== null && p.rating !== null ? [[price, p.rating] as const] : [];
  });
  const correlation = pearson(
    pairs.map(([price]) => price),
    pairs.map(([, rating]) => rating)
  );

  const brands = countBrands(products);

  return {
    productCount: products.length,
    meanPrice: prices.length > 0 ? Math.trunc(mean(prices)) : null,
    medianPrice: prices.length > 0 ? Math.trunc(median(prices)) : null,
    maxPrice: prices.length > 0 ? Math.trunc(Math.max(...prices)) : null,
    minPrice: prices.length > 0 ? Math.trunc(Math.min(...prices)) : null,
    stdDevPrice: prices.length > 1 ? Math.trunc(stdDev(prices)) : null,
    meanRating: ratings.length > 0 ? round2(mean(ratings)) : null,
    brandCount: brands.length,
    saleCount: products.filter((p) => p.priceDiscounted !== null).length,
    topBrands: brands.slice(0, TOP_BRANDS),
    priceRatingCorrelation: correlation === null ? null : round2(correlation),
  };
}

export function writeStatistics(stats: ProductStatistics, outputDir: string): string {
  const dir = path.resolve(process.cwd(), outputDir);
  fs.mkdirSync(dir, { recursive: true });
  const filePath = path.join(dir, "statistics.json");
  fs.writeFileSync(filePath, JSON.stringify(stats, null, 2) + "\n", "utf-8");
  return filePath;
}
