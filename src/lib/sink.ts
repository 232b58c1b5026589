import type Database from "better-sqlite3";
import { getDb, upsertProducts } from "./db";
import { exportProductsCsv } from "./export";
import { createLogger } from "./logger";
import type { ProductRecord } from "./types";

const log = createLogger("sink");

export interface PersistTarget {
  csvPath: string;
  db?: Database.Database;
}

/** Write the full record set to the CSV file and the products table */
export function persist(records: readonly ProductRecord[], target: PersistTarget): { csvPath: string } {
  const csvPath = exportProductsCsv(records, target.csvPath);
  log.info(`Wrote ${records.length} products to ${csvPath}`);

  upsertProducts(records, target.db ?? getDb());
  log.info(`Upserted ${records.length} products into the products table`);

  return { csvPath };
}
