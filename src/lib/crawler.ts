import { ExtractionError, FetchError, SourceUnreachableError } from "./errors";
import { extractListing } from "./olx/listing-page";
import { buildSearchPageUrl, parseSearchPage } from "./olx/search-page";
import { LISTING } from "./olx/selectors";
import { RateLimiter } from "./scraping/rate-limit";
import { PageRenderer, RenderedPage } from "./scraping/types";
import { delay, withRetry } from "./scraping/utils";
import { ListingState, RawListingRecord, SearchCard } from "./types";

/** Where extracted records go as soon as they exist. */
export interface RawSink {
  append(record: RawListingRecord): boolean;
  storedListingIds(): Set<string>;
}

export interface CrawlOptions {
  renderer: PageRenderer;
  sink: RawSink;
  searchUrl: string;
  maxPages: number;
  concurrency: number;
  /** Minimum gap between any two request starts, across all workers. */
  requestDelayMs: number;
  /** Attempts per page, first one included. */
  maxAttempts: number;
  retryDelayMs: number;
  renderTimeoutMs?: number;
  /** Listing ids to refetch even when already stored. */
  force?: Iterable<string>;
  /** Stops the crawl between listings; in-flight listings finish. */
  signal?: AbortSignal;
  onTransition?: (listingId: string, state: ListingState) => void;
  rateLimiter?: RateLimiter;
  sleep?: (ms: number) => Promise<void>;
}

export interface ListingOutcome {
  listingId: string;
  url: string;
  state: ListingState;
  attempts: number;
  reason: string | null;
}

export interface CrawlReport {
  pagesVisited: number;
  discovered: number;
  skipped: number;
  stored: number;
  duplicates: number;
  failed: number;
  pending: number;
  cancelled: boolean;
  failuresByReason: Record<string, number>;
  listings: ListingOutcome[];
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Discover listings page by page, then fetch and extract each detail page
 * with a bounded pool of workers. Every extracted record is handed to the
 * sink immediately, so an interrupted crawl keeps what it already stored.
 */
export async function crawl(options: CrawlOptions): Promise<CrawlReport> {
  const {
    renderer,
    sink,
    searchUrl,
    maxPages,
    requestDelayMs,
    maxAttempts,
    retryDelayMs,
    renderTimeoutMs,
    signal,
    onTransition,
    sleep = delay,
  } = options;
  const concurrency = Math.max(1, options.concurrency);
  const force = new Set(options.force ?? []);
  const limiter = options.rateLimiter ?? new RateLimiter(requestDelayMs);

  const fetchPage = (
    url: string,
    waitForSelector: string | undefined,
    onAttempt: (attempt: number) => void = () => {},
    onRetry: () => void = () => {}
  ): Promise<RenderedPage> =>
    withRetry(
      async (attempt) => {
        onAttempt(attempt);
        await limiter.wait();
        return renderer.render(url, { waitForSelector, timeoutMs: renderTimeoutMs });
      },
      {
        maxAttempts,
        baseDelayMs: retryDelayMs,
        sleep,
        onRetry: (error, attempt, waitMs) => {
          onRetry();
          console.warn(
            `[crawler] Attempt ${attempt}/${maxAttempts} failed for ${url} (${error.reason}), retrying in ${Math.round(waitMs)}ms`
          );
        },
      }
    );

  // Phase 1: discovery
  const discovered = new Map<string, SearchCard>();
  let pagesVisited = 0;

  for (let page = 1; page <= maxPages; page++) {
    if (signal?.aborted) break;
    const url = buildSearchPageUrl(searchUrl, page);

    let rendered: RenderedPage;
    try {
      rendered = await fetchPage(url, undefined);
    } catch (error) {
      if (page === 1) {
        throw new SourceUnreachableError(
          `Search results unreachable at ${url}: ${errorMessage(error)}`
        );
      }
      console.warn(`[crawler] Stopping pagination at page ${page}: ${errorMessage(error)}`);
      break;
    }
    pagesVisited++;

    const cards = parseSearchPage(rendered.html, rendered.finalUrl);
    const fresh = cards.filter((c) => !discovered.has(c.listingId));
    console.log(
      `[crawler] Page ${page}/${maxPages}: ${cards.length} cards, ${fresh.length} new`
    );
    if (fresh.length === 0) break;
    for (const card of fresh) discovered.set(card.listingId, card);
  }

  // Phase 2: detail pages
  const stored = sink.storedListingIds();
  const outcomes: ListingOutcome[] = [];
  const queue: { card: SearchCard; outcome: ListingOutcome }[] = [];

  const transition = (outcome: ListingOutcome, state: ListingState) => {
    outcome.state = state;
    onTransition?.(outcome.listingId, state);
  };

  for (const card of Array.from(discovered.values())) {
    const outcome: ListingOutcome = {
      listingId: card.listingId,
      url: card.url,
      state: ListingState.DISCOVERED,
      attempts: 0,
      reason: null,
    };
    outcomes.push(outcome);
    onTransition?.(card.listingId, ListingState.DISCOVERED);

    if (stored.has(card.listingId) && !force.has(card.listingId)) {
      transition(outcome, ListingState.SKIPPED);
    } else {
      queue.push({ card, outcome });
    }
  }

  console.log(
    `[crawler] Discovered ${discovered.size} listings on ${pagesVisited} pages; ${queue.length} to fetch, ${discovered.size - queue.length} already stored`
  );

  let duplicates = 0;
  let fatal: unknown = null;
  let next = 0;

  const processListing = async (card: SearchCard, outcome: ListingOutcome) => {
    try {
      const page = await fetchPage(
        card.url,
        LISTING.ready,
        (attempt) => {
          outcome.attempts = attempt;
          transition(outcome, ListingState.FETCHING);
        },
        () => transition(outcome, ListingState.FAILED_RETRYABLE)
      );
      transition(outcome, ListingState.RENDERED);

      const record = extractListing(page, card);
      transition(outcome, ListingState.EXTRACTED);

      if (!sink.append(record)) duplicates++;
      transition(outcome, ListingState.STORED);
    } catch (error) {
      if (error instanceof FetchError && error.retryable) {
        outcome.reason = error.reason;
        transition(outcome, ListingState.FAILED_RETRYABLE);
      } else if (error instanceof FetchError || error instanceof ExtractionError) {
        outcome.reason = error.reason;
        transition(outcome, ListingState.FAILED_TERMINAL);
      } else {
        throw error;
      }
      console.warn(`[crawler] ${card.listingId} failed (${outcome.reason}): ${errorMessage(error)}`);
    }
  };

  const worker = async () => {
    while (next < queue.length && !signal?.aborted && fatal === null) {
      const { card, outcome } = queue[next++];
      try {
        await processListing(card, outcome);
      } catch (error) {
        // Anything that is not a per-listing failure (e.g. the store itself
        // broke) ends the crawl once in-flight listings finish.
        fatal = error;
      }
    }
  };

  await Promise.all(
    Array.from({ length: Math.min(concurrency, queue.length) }, () => worker())
  );
  if (fatal !== null) throw fatal;

  const failuresByReason: Record<string, number> = {};
  let storedCount = 0;
  let failed = 0;
  let pending = 0;
  for (const o of outcomes) {
    if (o.state === ListingState.STORED) storedCount++;
    else if (o.state === ListingState.FAILED_RETRYABLE || o.state === ListingState.FAILED_TERMINAL) {
      failed++;
      const reason = o.reason ?? "unknown";
      failuresByReason[reason] = (failuresByReason[reason] ?? 0) + 1;
    } else if (o.state !== ListingState.SKIPPED) pending++;
  }

  const report: CrawlReport = {
    pagesVisited,
    discovered: discovered.size,
    skipped: discovered.size - queue.length,
    stored: storedCount,
    duplicates,
    failed,
    pending,
    cancelled: signal?.aborted ?? false,
    failuresByReason,
    listings: outcomes,
  };

  console.log(
    `[crawler] Done: ${report.stored} stored (${duplicates} already present), ${report.failed} failed, ${report.skipped} skipped` +
      (report.cancelled ? `, cancelled with ${pending} pending` : "")
  );
  return report;
}
