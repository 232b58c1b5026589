import * as fs from "fs";
import * as path from "path";
import type { ProductRecord } from "./types";

export const CSV_COLUMNS = [
  "id",
  "name",
  "brand",
  "price_regular",
  "price_discounted",
  "rating",
  "review_count",
  "image_url",
  "detail_url",
] as const;

export function escapeCsv(value: string | number | null | undefined): string {
  const str = value == null ? "" : String(value);
  if (
    str.includes('"') ||
    str.includes(",") ||
    str.includes("\n") ||
    str.includes("\r")
  ) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

export function toCsvRow(product: ProductRecord): string {
  const cells = [
    product.id,
    product.name,
    product.brand,
    product.priceRegular,
    product.priceDiscounted,
    product.rating,
    product.reviewCount,
    product.imageUrl,
    product.detailUrl,
  ];
  return cells.map(escapeCsv).join(",");
}

/**
 * Write all products to a UTF-8 CSV with a header row. The file is replaced
 * on every call, so writing the same set twice yields the same file.
 */
export function exportProductsCsv(products: readonly ProductRecord[], filePath: string): string {
  const resolved = path.resolve(process.cwd(), filePath);
  fs.mkdirSync(path.dirname(resolved), { recursive: true });

  const lines = [CSV_COLUMNS.join(","), ...products.map(toCsvRow)];
  fs.writeFileSync(resolved, lines.join("\n") + "\n", "utf-8");
  return resolved;
}
