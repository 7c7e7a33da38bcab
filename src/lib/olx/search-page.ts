import * as cheerio from "cheerio";
import { SearchCard } from "../types";
import { SEARCH } from "./selectors";

/** Search page `n` of the category; OLX paginates with `?o=`. */
export function buildSearchPageUrl(searchUrl: string, page: number): string {
  const url = new URL(searchUrl);
  url.searchParams.set("o", String(page));
  return url.toString();
}

/**
 * Ad id from a listing URL: OLX ends every ad path with `-<digits>`,
 * e.g. `/autos-e-pecas/carros-vans-e-utilitarios/honda-civic-2020-1234567890`.
 */
export function listingIdFromUrl(url: string): string | null {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return null;
  }
  const match = pathname.match(/-(\d{6,})\/?$/);
  return match ? match[1] : null;
}

function resolveUrl(href: string | undefined, baseUrl: string): string | null {
  if (!href) return null;
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return null;
  }
}

export function parseSearchPage(html: string, baseUrl: string): SearchCard[] {
  const $ = cheerio.load(html);
  const cards: SearchCard[] = [];
  const seen = new Set<string>();

  $(SEARCH.card).each((_, node) => {
    const $el = $(node);
    // Trimmed text, or null when the selector matched nothing
    const text = (selector: string): string | null => {
      const el = $el.find(selector).first();
      return el.length ? el.text().trim() : null;
    };

    const href = $el.find(SEARCH.link).first().attr("href") ?? $el.closest("a").attr("href");
    const url = resolveUrl(href, baseUrl);
    if (!url) return;
    const listingId = listingIdFromUrl(url);
    if (!listingId || seen.has(listingId)) return;
    seen.add(listingId);

    cards.push({
      listingId,
      url,
      title: text(SEARCH.title),
      priceText: text(SEARCH.price),
      mileageText: text(SEARCH.mileage),
      colorText: text(SEARCH.color),
      motorText: text(SEARCH.motor),
    });
  });

  return cards;
}
