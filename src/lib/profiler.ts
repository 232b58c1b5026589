/**
 * Lightweight profiling for scrape runs.
 * Records phase name + elapsed ms, then prints a summary table.
 * Labels are "<group>:<name>"; "pipeline:*" entries are top level and
 * "page:*" entries are printed under "pipeline:paginate".
 */

interface TimerEntry {
  label: string;
  startMs: number;
  endMs?: number;
  meta?: Record<string, number | string>;
}

export interface CompletedTimer {
  label: string;
  durationMs: number;
  meta?: Record<string, number | string>;
}

export class RunProfiler {
  private timers: TimerEntry[] = [];
  private active = new Map<string, TimerEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  start(label: string): void {
    const entry: TimerEntry = { label, startMs: this.now() };
    this.active.set(label, entry);
    this.timers.push(entry);
  }

  stop(label: string, meta?: Record<string, number | string>): number {
    const entry = this.active.get(label);
    if (!entry) {
      console.warn(`[profiler] No active timer for "${label}"`);
      return 0;
    }
    entry.endMs = this.now();
    if (meta) entry.meta = { ...entry.meta, ...meta };
    this.active.delete(label);
    return entry.endMs - entry.startMs;
  }

  /** Wrap an async operation with timing */
  async time<T>(label: string, fn: () => Promise<T>, meta?: Record<string, number | string>): Promise<T> {
    this.start(label);
    try {
      const result = await fn();
      this.stop(label, meta);
      return result;
    } catch (err) {
      this.stop(label, { error: "failed" });
      throw err;
    }
  }

  /** Wrap a sync operation with timing */
  timeSync<T>(label: string, fn: () => T, meta?: Record<string, number | string>): T {
    this.start(label);
    try {
      const result = fn();
      this.stop(label, meta);
      return result;
    } catch (err) {
      this.stop(label, { error: "failed" });
      throw err;
    }
  }

  completed(): CompletedTimer[] {
    const done: CompletedTimer[] = [];
    for (const t of this.timers) {
      if (t.endMs === undefined) continue;
      done.push({ label: t.label, durationMs: t.endMs - t.startMs, meta: t.meta });
    }
    return done;
  }

  /** Print top-level phases by duration, pages in fetch order under pagination */
  printSummary(): void {
    const completed = this.completed();
    if (completed.length === 0) return;

    const phases = completed
      .filter((t) => t.label.startsWith("pipeline:"))
      .sort((a, b) => b.durationMs - a.durationMs);
    const pages = completed.filter((t) => t.label.startsWith("page:"));

    console.log("\n=== Scrape Profile ===");
    for (const entry of phases) {
      printEntry(entry, 0);
      if (entry.label === "pipeline:paginate") {
        for (const page of pages) printEntry(page, 1);
      }
    }
    console.log("");
  }

  reset(): void {
    this.timers = [];
    this.active.clear();
  }
}

function printEntry(entry: CompletedTimer, indent: number): void {
  const pad = "  ".repeat(indent);
  const label = entry.label.padEnd(40 - indent * 2);
  const duration = `${entry.durationMs}ms`.padStart(8);
  const metaStr = entry.meta
    ? "  " + Object.entries(entry.meta).map(([k, v]) => `${k}=${v}`).join(", ")
    : "";
  console.log(`${pad}${label} ${duration}${metaStr}`);
}

// Singleton profiler instance
export const profiler = new RunProfiler();
