import { ValidationError } from "./errors";
import { DETAIL_KEYS } from "./normalization-maps";
import {
  cleanText,
  extractYear,
  normalizeBrand,
  parseDoors,
  parseLocation,
  parseMileage,
  parseMotor,
  parsePrice,
} from "./parsers";
import { CleanedRecord, PipelineStage, RawListingRecord, StageReport } from "./types";

export interface NormalizeOptions {
  yearFloor: number;
  /** Latest model year accepted is currentYear + 1. */
  currentYear: number;
  minPrice: number;
  maxPrice: number;
}

export const DEFAULT_NORMALIZE_OPTIONS: NormalizeOptions = {
  yearFloor: 1980,
  currentYear: new Date().getFullYear(),
  minPrice: 1000,
  maxPrice: 1_000_000,
};

export interface NormalizeResult {
  records: CleanedRecord[];
  rejections: ValidationError[];
  /** Older observations of listings that were crawled more than once. */
  superseded: number;
  report: StageReport;
}

/** Most recent observation per listing; ties keep the first row seen. */
export function latestObservations(rows: RawListingRecord[]): {
  latest: RawListingRecord[];
  superseded: number;
} {
  const byId = new Map<string, RawListingRecord>();
  for (const row of rows) {
    const current = byId.get(row.listingId);
    if (!current || row.fetchedAt > current.fetchedAt) byId.set(row.listingId, row);
  }
  return { latest: Array.from(byId.values()), superseded: rows.length - byId.size };
}

/** Clean one raw observation, or say which field kept it out. */
export function normalizeRecord(
  raw: RawListingRecord,
  options: NormalizeOptions
): CleanedRecord | ValidationError {
  const reject = (field: string, reason: string) =>
    new ValidationError(raw.listingId, field, reason);

  const title = cleanText(raw.title);
  if (title === null) return reject("title", "missing_title");

  const price = parsePrice(raw.priceText, { min: options.minPrice, max: options.maxPrice });
  if (!price.ok) return reject("price", price.reason);

  const year = extractYear(title, {
    floor: options.yearFloor,
    currentYear: options.currentYear,
  });
  if (!year.ok) return reject("year", year.reason);

  const mileage = parseMileage(cleanText(raw.mileageText));
  if (!mileage.ok) return reject("mileage", mileage.reason);

  const location = parseLocation(cleanText(raw.locationText));
  const detail = (key: string) => cleanText(raw.details[key] ?? null);

  return {
    listingId: raw.listingId,
    sourceUrl: raw.sourceUrl,
    fetchedAt: raw.fetchedAt,
    title,
    price: price.value,
    year: year.value,
    mileageKm: mileage.value,
    motor: parseMotor(cleanText(raw.motorText)),
    doors: parseDoors(cleanText(raw.doorsText)),
    city: location.city,
    stateClean: location.stateClean,
    neighborhood: cleanText(raw.neighborhoodText)?.toLowerCase() ?? null,
    zipCode: location.zipCode,
    marca: normalizeBrand(raw.brandText),
    model: cleanText(raw.modelText),
    fuel: cleanText(raw.fuelText),
    transmission: cleanText(raw.transmissionText),
    color: cleanText(raw.colorText),
    category: detail(DETAIL_KEYS.category),
    steering: detail(DETAIL_KEYS.steering),
    vehicleType: detail(DETAIL_KEYS.vehicleType),
    extras: Array.from(new Set(raw.extras)).sort(),
  };
}

/**
 * Clean a whole raw snapshot. Rejected rows are reported and skipped; the
 * rest of the batch is always processed.
 */
export function normalizeSnapshot(
  rows: RawListingRecord[],
  options: NormalizeOptions = DEFAULT_NORMALIZE_OPTIONS
): NormalizeResult {
  const { latest, superseded } = latestObservations(rows);
  const records: CleanedRecord[] = [];
  const rejections: ValidationError[] = [];
  const rejectedByReason: Record<string, number> = {};

  for (const raw of latest) {
    const result = normalizeRecord(raw, options);
    if (result instanceof ValidationError) {
      rejections.push(result);
      rejectedByReason[result.reason] = (rejectedByReason[result.reason] ?? 0) + 1;
      console.warn(`[normalize] Rejected ${result.listingId}: ${result.field} ${result.reason}`);
    } else {
      records.push(result);
    }
  }

  records.sort((a, b) => a.listingId.localeCompare(b.listingId));

  const report: StageReport = {
    stage: PipelineStage.NORMALIZE,
    input: latest.length,
    accepted: records.length,
    rejected: rejections.length,
    rejectedByReason,
  };

  console.log(
    `[normalize] ${rows.length} raw rows, ${superseded} superseded, ${report.accepted} accepted, ${report.rejected} rejected`
  );
  return { records, rejections, superseded, report };
}
