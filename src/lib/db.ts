import Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import { config } from "./config";
import type { ProductRecord, RunStatus, ScrapeRun } from "./types";

let db: Database.Database | null = null;

export function getDb(): Database.Database {
  if (db) return db;

  const dbPath = path.resolve(process.cwd(), config.dbPath);
  const dir = path.dirname(dbPath);

  // Ensure directory exists
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  db = new Database(dbPath);
  db.pragma("journal_mode = WAL");

  initSchema(db);
  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

export function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS products (
      id               TEXT PRIMARY KEY,
      name             TEXT NOT NULL,
      brand            TEXT NOT NULL DEFAULT '',
      price_regular    REAL,
      price_discounted REAL,
      rating           REAL,
      review_count     INTEGER NOT NULL DEFAULT 0,
      image_url        TEXT,
      detail_url       TEXT NOT NULL,
      scraped_at       TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS scrape_runs (
      id            TEXT PRIMARY KEY,
      timestamp     TEXT NOT NULL,
      category_url  TEXT NOT NULL,
      item_count    INTEGER NOT NULL DEFAULT 0,
      pages_fetched INTEGER NOT NULL DEFAULT 0,
      status        TEXT NOT NULL,
      error         TEXT,
      duration_ms   INTEGER NOT NULL DEFAULT 0
    );
  `);
}

// ===== Products =====

interface ProductRow {
  id: string;
  name: string;
  brand: string;
  price_regular: number | null;
  price_discounted: number | null;
  rating: number | null;
  review_count: number;
  image_url: string | null;
  detail_url: string;
}

function rowToProduct(row: ProductRow): ProductRecord {
  return Object.freeze({
    id: row.id,
    name: row.name,
    brand: row.brand,
    priceRegular: row.price_regular,
    priceDiscounted: row.price_discounted,
    rating: row.rating,
    reviewCount: row.review_count,
    imageUrl: row.image_url,
    detailUrl: row.detail_url,
  });
}

/** Insert or overwrite by id, all in one transaction */
export function upsertProducts(products: readonly ProductRecord[], target: Database.Database = getDb()): void {
  const stmt = target.prepare(`
    INSERT OR REPLACE INTO products (
      id, name, brand, price_regular, price_discounted, rating,
      review_count, image_url, detail_url, scraped_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);

  const scrapedAt = new Date().toISOString();
  target.transaction(() => {
    for (const p of products) {
      stmt.run(
        p.id,
        p.name,
        p.brand,
        p.priceRegular,
        p.priceDiscounted,
        p.rating,
        p.reviewCount,
        p.imageUrl,
        p.detailUrl,
        scrapedAt
      );
    }
  })();
}

export function getAllProducts(target: Database.Database = getDb()): ProductRecord[] {
  const rows = target
    .prepare(
      `SELECT id, name, brand, price_regular, price_discounted, rating, review_count, image_url, detail_url
       FROM products ORDER BY rowid`
    )
    .all() as ProductRow[];
  return rows.map(rowToProduct);
}

export function countProducts(target: Database.Database = getDb()): number {
  const row = target.prepare("SELECT COUNT(*) AS n FROM products").get() as { n: number };
  return row.n;
}

// ===== Scrape runs =====

interface ScrapeRunRow {
  id: string;
  timestamp: string;
  category_url: string;
  item_count: number;
  pages_fetched: number;
  status: RunStatus;
  error: string | null;
  duration_ms: number;
}

export function insertScrapeRun(run: ScrapeRun, target: Database.Database = getDb()): void {
  target
    .prepare(`
    INSERT INTO scrape_runs (id, timestamp, category_url, item_count, pages_fetched, status, error, duration_ms)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `)
    .run(
      run.id,
      run.timestamp,
      run.categoryUrl,
      run.itemCount,
      run.pagesFetched,
      run.status,
      run.error,
      run.durationMs
    );
}

export function getLatestRun(target: Database.Database = getDb()): ScrapeRun | null {
  const row = target
    .prepare("SELECT * FROM scrape_runs ORDER BY timestamp DESC LIMIT 1")
    .get() as ScrapeRunRow | undefined;
  if (!row) return null;
  return {
    id: row.id,
    timestamp: row.timestamp,
    categoryUrl: row.category_url,
    itemCount: row.item_count,
    pagesFetched: row.pages_fetched,
    status: row.status,
    error: row.error,
    durationMs: row.duration_ms,
  };
}
