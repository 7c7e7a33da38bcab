export const config = {
  dbPath: process.env.DB_PATH || "data/vehicle-listings.db",
  searchUrl:
    process.env.OLX_SEARCH_URL ||
    "https://www.olx.com.br/autos-e-pecas/carros-vans-e-utilitarios",
  maxPages: parseInt(process.env.CRAWL_MAX_PAGES || "100", 10),
  concurrency: parseInt(process.env.CRAWL_CONCURRENCY || "3", 10),
  scrapeDelayMs: parseInt(process.env.SCRAPE_DELAY_MS || "2000", 10),
  maxAttempts: parseInt(process.env.CRAWL_MAX_ATTEMPTS || "3", 10),
  retryDelayMs: parseInt(process.env.CRAWL_RETRY_DELAY_MS || "2000", 10),
  renderTimeoutMs: parseInt(process.env.RENDER_TIMEOUT_MS || "30000", 10),
  // "browser" renders with Chromium, "http" fetches static HTML
  renderer: process.env.CRAWL_RENDERER === "http" ? "http" : "browser",
  chromiumPath: process.env.CHROMIUM_PATH || undefined,
  yearFloor: parseInt(process.env.YEAR_FLOOR || "1980", 10),
  referenceYear: parseInt(
    process.env.FEATURE_REFERENCE_YEAR || String(new Date().getFullYear()),
    10
  ),
  stateMinListings: parseInt(process.env.STATE_MIN_LISTINGS || "50", 10),
  brandTopN: parseInt(process.env.BRAND_TOP_N || "20", 10),
  userAgents: [
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.2 Safari/605.1.15",
    "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  ],
  getRandomUserAgent(): string {
    return this.userAgents[Math.floor(Math.random() * this.userAgents.length)];
  },
};
