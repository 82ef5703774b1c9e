import { loadScraperConfig } from "../src/config.js";
import { isScrapeError } from "../src/errors.js";
import { createScraperRuntime } from "../src/runtime.js";

type CliOptions = {
  name: string;
  timeoutMs: number;
  navigationTimeoutMs?: number;
  contentTimeoutMs?: number;
  detectVideos?: boolean;
};

function printHelp(): void {
  console.log(`Usage: node --import tsx scripts/scrape-once.ts --name <advertiser> [options]

Resolves one advertiser, scrapes its page and prints the result JSON.

Options:
  --name <advertiser>             Advertiser name to search for (required)
  --timeout-ms <n>                Max run time in ms before the run is cancelled (default: 180000)
  --navigation-timeout-ms <n>     Override NAVIGATION_TIMEOUT for this run
  --content-timeout-ms <n>        Override WAIT_TIMEOUT for this run
  --videos                        Also count video creatives (overrides DETECT_VIDEOS)
  -h, --help                      Show help
`);
}

function positiveInt(raw: string): number | undefined {
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

function parseArgs(argv: string[]): CliOptions {
  const out: CliOptions = { name: "", timeoutMs: 180_000 };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const next = argv[i + 1];
    if (arg === "-h" || arg === "--help") {
      printHelp();
      process.exit(0);
    }
    if (arg === "--videos") {
      out.detectVideos = true;
      continue;
    }
    if (arg === "--name" && next) {
      out.name = next.trim();
      i += 1;
      continue;
    }
    if (arg === "--timeout-ms" && next) {
      out.timeoutMs = positiveInt(next) ?? out.timeoutMs;
      i += 1;
      continue;
    }
    if (arg === "--navigation-timeout-ms" && next) {
      out.navigationTimeoutMs = positiveInt(next);
      i += 1;
      continue;
    }
    if (arg === "--content-timeout-ms" && next) {
      out.contentTimeoutMs = positiveInt(next);
      i += 1;
      continue;
    }
  }

  return out;
}

async function main(): Promise<void> {
  const opts = parseArgs(process.argv.slice(2));
  if (!opts.name) {
    printHelp();
    process.exit(1);
  }

  const runtime = createScraperRuntime(loadScraperConfig());
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new Error(`run exceeded ${opts.timeoutMs}ms`)), opts.timeoutMs);
  process.once("SIGINT", () => controller.abort(new Error("interrupted")));

  try {
    const result = await runtime.pipeline.run(
      { name: opts.name },
      {
        signal: controller.signal,
        navigationTimeoutMs: opts.navigationTimeoutMs,
        contentTimeoutMs: opts.contentTimeoutMs,
        detectVideos: opts.detectVideos,
      },
    );
    console.log(JSON.stringify(result, null, 2));
  } finally {
    clearTimeout(timer);
    await runtime.close();
  }
}

main().catch((err) => {
  const message = isScrapeError(err) ? `${err.kind}: ${err.detail}` : err instanceof Error ? err.message : String(err);
  console.error(`scrape-once failed: ${message}`);
  process.exit(1);
});
