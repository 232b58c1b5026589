import { describe, it, expect, vi } from "vitest";
import { RunProfiler } from "../lib/profiler";

function fakeClock(...ticks: number[]) {
  let i = 0;
  return () => ticks[Math.min(i++, ticks.length - 1)];
}

describe("RunProfiler", () => {
  it("records durations and metadata", () => {
    const prof = new RunProfiler(fakeClock(100, 350));
    prof.start("pipeline:paginate");
    const ms = prof.stop("pipeline:paginate", { pages: 3 });

    expect(ms).toBe(250);
    expect(prof.completed()).toEqual([{ label: "pipeline:paginate", durationMs: 250, meta: { pages: 3 } }]);
  });

  it("marks failed async phases and rethrows", async () => {
    const prof = new RunProfiler(fakeClock(0, 40));

    await expect(
      prof.time("pipeline:details", async () => {
        throw new Error("browser crashed");
      })
    ).rejects.toThrow("browser crashed");
    expect(prof.completed()[0]).toEqual({ label: "pipeline:details", durationMs: 40, meta: { error: "failed" } });
  });

  it("warns when stopping a timer that never started", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const prof = new RunProfiler();

    expect(prof.stop("pipeline:persist")).toBe(0);
    expect(warn).toHaveBeenCalledWith('[profiler] No active timer for "pipeline:persist"');
    warn.mockRestore();
  });

  it("prints pages under pagination", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const prof = new RunProfiler(fakeClock(0, 0, 10, 20, 30));
    prof.start("pipeline:paginate");
    prof.timeSync("page:1", () => "<html></html>");
    prof.stop("pipeline:paginate");
    prof.printSummary();

    const lines = log.mock.calls.map(([line]) => String(line));
    expect(lines[0]).toBe("\n=== Scrape Profile ===");
    expect(lines[1].startsWith("pipeline:paginate")).toBe(true);
    expect(lines[2].startsWith("  page:1")).toBe(true);
    log.mockRestore();
  });
});
