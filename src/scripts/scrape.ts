import "dotenv/config";
import { closeDb } from "../lib/db";
import { runScrape, type PipelineOptions } from "../lib/pipeline";
import { profiler } from "../lib/profiler";

function parseArgs(argv: string[]): Partial<PipelineOptions> {
  const options: Partial<PipelineOptions> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--url" && argv[i + 1]) {
      options.categoryUrl = argv[++i];
    } else if (arg === "--max-items" && argv[i + 1]) {
      const n = parseInt(argv[++i], 10);
      if (!isNaN(n)) options.maxItems = n;
    } else if (arg === "--details") {
      options.enrichDetails = true;
    }
  }

  return options;
}

async function main() {
  const result = await runScrape(parseArgs(process.argv.slice(2)));

  profiler.printSummary();

  if (result.statistics) {
    console.log("=== Summary ===");
    for (const [key, value] of Object.entries(result.statistics)) {
      if (key === "topBrands") continue;
      console.log(`${key}: ${typeof value === "number" ? value.toLocaleString() : String(value)}`);
    }
  }

  closeDb();

  if (result.error) {
    console.error(`Run aborted: ${result.error.message}`);
    process.exit(1);
  }
  process.exit(0);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  closeDb();
  process.exit(1);
});
