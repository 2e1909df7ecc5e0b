import { closeCacheDb } from "../lib/db";
import { runPipeline } from "../lib/pipeline";
import type { PipelineOptions } from "../lib/pipeline";

const USAGE = `Usage: run-pipeline [--skip-breaks] [--skip-details] [--skip-standardize]
                    [--skip-merge] [--second-source <csv>] [--pages <n>]`;

function parseArgs(args: string[]): PipelineOptions {
  const options: PipelineOptions = {};

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case "--skip-breaks":
        options.scrapeBreaks = false;
        break;
      case "--skip-details":
        options.scrapeDetails = false;
        break;
      case "--skip-standardize":
        options.standardize = false;
        break;
      case "--skip-merge":
        options.merge = false;
        break;
      case "--second-source":
        if (!args[i + 1]) throw new Error(`--second-source needs a path\n${USAGE}`);
        options.secondSource = args[++i];
        break;
      case "--pages": {
        const pages = parseInt(args[i + 1] ?? "", 10);
        if (!Number.isInteger(pages) || pages < 1) {
          throw new Error(`--pages needs a positive integer\n${USAGE}`);
        }
        options.pages = pages;
        i++;
        break;
      }
      case "--help":
        console.log(USAGE);
        process.exit(0);
      default:
        throw new Error(`Unknown argument ${args[i]}\n${USAGE}`);
    }
  }

  return options;
}

async function main() {
  const summary = await runPipeline(parseArgs(process.argv.slice(2)));

  if (summary.mergeStats) {
    console.log("\nMerge Statistics:");
    for (const [key, value] of Object.entries(summary.mergeStats)) {
      console.log(`  ${key}: ${value}`);
    }
  }

  closeCacheDb();
}

main().catch((err) => {
  console.error("Fatal error:", err instanceof Error ? err.message : err);
  closeCacheDb();
  process.exit(1);
});
