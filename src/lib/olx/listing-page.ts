import * as cheerio from "cheerio";
import { ExtractionError } from "../errors";
import { DETAIL_KEYS } from "../normalization-maps";
import { normalizeOptionName } from "../parsers";
import { RenderedPage } from "../scraping/types";
import { RawListingRecord, SearchCard } from "../types";
import { listingIdFromUrl } from "./search-page";
import { LISTING } from "./selectors";

/**
 * Turn a rendered listing detail page into one raw record. Fields the ad
 * does not show come back as null; only a page that cannot describe a
 * listing at all raises ExtractionError.
 *
 * The search card, when given, fills fields the detail page lacks (price,
 * mileage and motor are shown on the card).
 */
export function extractListing(
  page: RenderedPage,
  card?: SearchCard
): RawListingRecord {
  const url = card?.url ?? page.url;
  if (page.html.trim() === "") throw new ExtractionError(url, "empty_page");

  const $ = cheerio.load(page.html);
  if ($("body").text().trim() === "") throw new ExtractionError(url, "empty_page");

  const listingId =
    card?.listingId ?? listingIdFromUrl(page.url) ?? listingIdFromUrl(page.finalUrl);
  if (!listingId) throw new ExtractionError(url, "missing_required_selector");

  const text = (selector: string): string | null => {
    const el = $(selector).first();
    return el.length ? el.text().trim() : null;
  };

  const title = text(LISTING.title) ?? card?.title ?? null;
  if (title === null || $(LISTING.ready).length === 0) {
    throw new ExtractionError(url, "missing_required_selector");
  }

  let priceText: string | null = null;
  for (const sel of LISTING.price) {
    priceText = text(sel);
    if (priceText !== null) break;
  }
  priceText = priceText ?? card?.priceText ?? null;
  if (priceText !== null && priceText.trim() !== "" && !/\d/.test(priceText)) {
    throw new ExtractionError(url, "malformed_price");
  }

  const details = extractDetails($);
  const detail = (key: string): string | null => details[key] ?? null;

  const $location = $(LISTING.location).first();
  const locationPart = (selector: string): string | null => {
    const el = $location.find(selector).first();
    return el.length ? el.text().trim() : null;
  };

  return {
    listingId,
    fetchedAt: page.fetchedAt,
    sourceUrl: url,
    title,
    priceText,
    locationText: locationPart(LISTING.cityStateZip),
    neighborhoodText: locationPart(LISTING.neighborhood),
    mileageText: detail(DETAIL_KEYS.mileage) ?? card?.mileageText ?? null,
    fuelText: detail(DETAIL_KEYS.fuel),
    transmissionText: detail(DETAIL_KEYS.transmission),
    colorText: detail(DETAIL_KEYS.color) ?? card?.colorText ?? null,
    motorText: card?.motorText ?? detail(DETAIL_KEYS.motorPower),
    brandText: detail(DETAIL_KEYS.brand),
    modelText: detail(DETAIL_KEYS.model),
    doorsText: detail(DETAIL_KEYS.doors),
    description: text(LISTING.description),
    details,
    extras: extractExtras($),
  };
}

/** Label/value pairs of the detail section, labels normalized to snake_case. */
function extractDetails($: cheerio.CheerioAPI): Record<string, string> {
  const details: Record<string, string> = {};

  $(LISTING.detailRow).each((_, row) => {
    const $row = $(row);
    const label = $row.find(LISTING.detailLabel).first().text().trim();
    const value = $row.find(LISTING.detailValue).last().text().trim();
    if (!label || !value) return;
    const key = normalizeOptionName(label);
    if (key && !(key in details)) details[key] = value;
  });

  return details;
}

/** Optional extras as a sorted set of option keys. */
function extractExtras($: cheerio.CheerioAPI): string[] {
  const extras = new Set<string>();

  $(LISTING.option).each((_, el) => {
    const $el = $(el);
    const leaves = $el.find("span, p");
    const texts =
      leaves.length > 0
        ? leaves.map((_, leaf) => $(leaf).text()).get()
        : $el.text().split("\n");

    for (const raw of texts) {
      const key = normalizeOptionName(raw.trim());
      if (key) extras.add(key);
    }
  });

  return Array.from(extras).sort();
}
