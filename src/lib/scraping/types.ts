/** HTML of a fully loaded page plus the metadata of the fetch that produced it. */
export interface RenderedPage {
  url: string;
  finalUrl: string;
  status: number;
  html: string;
  fetchedAt: string;
}

export interface RenderOptions {
  /** Selector that marks JS-populated content as ready. */
  waitForSelector?: string;
  timeoutMs?: number;
}

/**
 * Loads a page. Implementations throw FetchError for anything that kept the
 * page from loading, including HTTP error statuses.
 */
export interface PageRenderer {
  render(url: string, options?: RenderOptions): Promise<RenderedPage>;
  close(): Promise<void>;
}
