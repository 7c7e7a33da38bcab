import { config } from "../config";
import { ProxyAgent, fetch as undiciFetch } from "undici";
import { FetchError } from "../errors";
import { PageRenderer, RenderOptions, RenderedPage } from "./types";

export async function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function getProxyDispatcher(): ProxyAgent | undefined {
  const proxyUrl =
    process.env.HTTPS_PROXY ||
    process.env.https_proxy ||
    process.env.HTTP_PROXY ||
    process.env.http_proxy;
  if (!proxyUrl) return undefined;
  return new ProxyAgent(proxyUrl);
}

/** Exponential backoff with up to one base delay of jitter. `attempt` is 1-based. */
export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  random: () => number = Math.random
): number {
  return baseDelayMs * Math.pow(2, attempt - 1) + random() * baseDelayMs;
}

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  onRetry?: (error: FetchError, attempt: number, waitMs: number) => void;
}

/**
 * Run `fn` until it succeeds, throws something other than a retryable
 * FetchError, or `maxAttempts` is spent. The last error is rethrown.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const { maxAttempts, baseDelayMs, sleep = delay, random, onRetry } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (!(error instanceof FetchError) || !error.retryable || attempt >= maxAttempts) {
        throw error;
      }
      const waitMs = backoffDelay(attempt, baseDelayMs, random);
      onRetry?.(error, attempt, waitMs);
      await sleep(waitMs);
    }
  }
}

function classifyFetchFailure(url: string, error: unknown): FetchError {
  if (error instanceof FetchError) return error;
  if (error instanceof Error && error.name === "AbortError") {
    return new FetchError(url, "timeout", { cause: error });
  }
  return new FetchError(url, "network", { cause: error });
}

/**
 * Plain HTTP fetch for pages that do not need a browser. Does not run
 * scripts, so `waitForSelector` is not honoured.
 */
export class HttpRenderer implements PageRenderer {
  constructor(private readonly options: { timeoutMs?: number } = {}) {}

  async render(url: string, options: RenderOptions = {}): Promise<RenderedPage> {
    const timeoutMs = options.timeoutMs ?? this.options.timeoutMs ?? 15000;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await undiciFetch(url, {
        headers: {
          "User-Agent": config.getRandomUserAgent(),
          Accept:
            "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
          "Accept-Language": "pt-BR,pt;q=0.9,en;q=0.8",
        },
        signal: controller.signal,
        dispatcher: getProxyDispatcher(),
      });

      if (!response.ok) {
        throw new FetchError(url, "http_status", { status: response.status });
      }

      const html = await response.text();
      return {
        url,
        finalUrl: response.url || url,
        status: response.status,
        html,
        fetchedAt: new Date().toISOString(),
      };
    } catch (error) {
      throw classifyFetchFailure(url, error);
    } finally {
      clearTimeout(timeout);
    }
  }

  async close(): Promise<void> {}
}
