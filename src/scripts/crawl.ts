import { config } from "../lib/config";
import { closeDb, getDb } from "../lib/db";
import { runCrawlStage } from "../lib/pipeline";
import { BrowserRenderer } from "../lib/scraping/browser";
import { PageRenderer } from "../lib/scraping/types";
import { HttpRenderer } from "../lib/scraping/utils";

const renderer: PageRenderer =
  config.renderer === "http"
    ? new HttpRenderer({ timeoutMs: config.renderTimeoutMs })
    : new BrowserRenderer({
        timeoutMs: config.renderTimeoutMs,
        executablePath: config.chromiumPath,
      });

async function main() {
  const args = process.argv.slice(2);
  const force: string[] = [];
  let maxPages = config.maxPages;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--force" && args[i + 1]) {
      force.push(args[i + 1]);
      i++;
    } else if (args[i] === "--max-pages" && args[i + 1]) {
      maxPages = parseInt(args[i + 1], 10);
      i++;
    }
  }

  // First Ctrl-C lets in-flight listings finish; the second exits at once
  const controller = new AbortController();
  process.on("SIGINT", () => {
    if (controller.signal.aborted) process.exit(130);
    console.log("\n[crawler] Interrupted, finishing in-flight listings...");
    controller.abort();
  });

  console.log(`Crawling ${config.searchUrl} (up to ${maxPages} pages, ${config.renderer} renderer)`);

  const report = await runCrawlStage(getDb(), {
    renderer,
    searchUrl: config.searchUrl,
    maxPages,
    concurrency: config.concurrency,
    requestDelayMs: config.scrapeDelayMs,
    maxAttempts: config.maxAttempts,
    retryDelayMs: config.retryDelayMs,
    renderTimeoutMs: config.renderTimeoutMs,
    force,
    signal: controller.signal,
  });

  console.log(`\n=== Summary ===`);
  console.log(`Pages: ${report.pagesVisited}`);
  console.log(`Discovered: ${report.discovered}`);
  console.log(`Skipped: ${report.skipped}`);
  console.log(`Stored: ${report.stored}`);
  console.log(`Failed: ${report.failed}`);
  for (const [reason, count] of Object.entries(report.failuresByReason)) {
    console.log(`  ${reason}: ${count}`);
  }

  await renderer.close();
  closeDb();
  process.exit(0);
}

main().catch((err) => {
  console.error("Fatal error:", err instanceof Error ? err.message : err);
  closeDb();
  renderer.close().then(
    () => process.exit(1),
    () => process.exit(1)
  );
});
