import { chromium, errors, Browser, BrowserContext } from "playwright-core";
import { config } from "../config";
import { FetchError } from "../errors";
import { PageRenderer, RenderOptions, RenderedPage } from "./types";

const LAUNCH_ARGS = [
  "--disable-blink-features=AutomationControlled",
  "--no-sandbox",
  "--disable-setuid-sandbox",
];

const BLOCKED_RESOURCES = new Set(["image", "font", "media"]);

export interface BrowserRendererOptions {
  timeoutMs?: number;
  /** Chromium binary; playwright-core does not download one. */
  executablePath?: string;
  waitUntil?: "load" | "domcontentloaded" | "networkidle";
}

/**
 * Renders pages in headless Chromium so JS-populated sections exist before
 * the HTML is read. One browser and one context are shared by every page
 * this renderer opens.
 */
export class BrowserRenderer implements PageRenderer {
  private browser: Browser | null = null;
  // Pending or ready; concurrent callers share one launch
  private context: Promise<BrowserContext> | null = null;

  constructor(private readonly options: BrowserRendererOptions = {}) {}

  private getContext(): Promise<BrowserContext> {
    if (this.browser && !this.browser.isConnected()) {
      console.warn("[browser] Browser disconnected, relaunching");
      this.browser = null;
      this.context = null;
    }
    if (!this.context) {
      this.context = this.openContext().catch((error: unknown) => {
        this.context = null;
        throw error;
      });
    }
    return this.context;
  }

  private async openContext(): Promise<BrowserContext> {
    const browser = await chromium.launch({
      headless: true,
      args: LAUNCH_ARGS,
      executablePath: this.options.executablePath,
    });
    this.browser = browser;
    return browser.newContext({
      userAgent: config.getRandomUserAgent(),
      viewport: { width: 1920, height: 1080 },
      locale: "pt-BR",
    });
  }

  async render(url: string, options: RenderOptions = {}): Promise<RenderedPage> {
    const timeoutMs = options.timeoutMs ?? this.options.timeoutMs ?? 30000;
    const ctx = await this.getContext();
    const page = await ctx.newPage();

    try {
      // Keep CSS: some anti-bot checks need it
      await page.route("**/*", (route) => {
        if (BLOCKED_RESOURCES.has(route.request().resourceType())) {
          return route.abort();
        }
        return route.continue();
      });

      const response = await page
        .goto(url, { waitUntil: this.options.waitUntil ?? "domcontentloaded", timeout: timeoutMs })
        .catch((error: unknown) => {
          throw classifyNavigationError(url, error);
        });

      const status = response?.status() ?? 200;
      if (status >= 400) {
        throw new FetchError(url, "http_status", { status });
      }

      if (options.waitForSelector) {
        await page
          .waitForSelector(options.waitForSelector, { timeout: timeoutMs })
          .catch((error: unknown) => {
            throw new FetchError(url, "render_not_ready", { cause: error });
          });
      }

      return {
        url,
        finalUrl: page.url(),
        status,
        html: await page.content(),
        fetchedAt: new Date().toISOString(),
      };
    } finally {
      await page.close().catch((error: unknown) => {
        console.warn(
          `[browser] Failed to close page for ${url}:`,
          error instanceof Error ? error.message : error
        );
      });
    }
  }

  async close(): Promise<void> {
    const pending = this.context;
    this.context = null;
    this.browser = null;
    if (!pending) return;
    const context = await pending;
    await context.browser()?.close();
  }
}

export function classifyNavigationError(url: string, error: unknown): FetchError {
  if (error instanceof FetchError) return error;
  if (error instanceof errors.TimeoutError) {
    return new FetchError(url, "timeout", { cause: error });
  }
  return new FetchError(url, "network", { cause: error });
}
