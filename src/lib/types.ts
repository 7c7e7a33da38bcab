// ===== Enums =====

export enum ListingState {
  DISCOVERED = "discovered",
  FETCHING = "fetching",
  RENDERED = "rendered",
  EXTRACTED = "extracted",
  STORED = "stored",
  FAILED_RETRYABLE = "failed_retryable",
  FAILED_TERMINAL = "failed_terminal",
  SKIPPED = "skipped",
}

export enum PipelineStage {
  CRAWL = "crawl",
  NORMALIZE = "normalize",
  FEATURES = "features",
}

export const UNKNOWN = "UNKNOWN";
export const STATE_OTHER = "STATE_OTHER";
export const BRAND_OTHER = "BRAND_OTHER";

// ===== Raw listing (crawler output, messy) =====

/** Summary scraped from one search-result card. */
export interface SearchCard {
  listingId: string;
  url: string;
  title: string | null;
  priceText: string | null;
  mileageText: string | null;
  colorText: string | null;
  motorText: string | null;
}

/**
 * One observation of a listing. `null` means the field was not scraped,
 * `""` means it was scraped and blank.
 */
export interface RawListingRecord {
  listingId: string;
  fetchedAt: string; // ISO-8601
  sourceUrl: string;
  title: string | null;
  priceText: string | null;
  locationText: string | null;
  neighborhoodText: string | null;
  mileageText: string | null;
  fuelText: string | null;
  transmissionText: string | null;
  colorText: string | null;
  motorText: string | null;
  brandText: string | null;
  modelText: string | null;
  doorsText: string | null;
  description: string | null;
  details: Record<string, string>;
  extras: string[]; // sorted, deduplicated option keys
}

// ===== Cleaned listing (normalizer output) =====

export interface CleanedRecord {
  listingId: string;
  sourceUrl: string;
  fetchedAt: string;
  title: string;
  price: number;
  year: number;
  mileageKm: number | null;
  motor: number | null;
  doors: number | null;
  city: string | null;
  stateClean: string; // UF code or UNKNOWN
  neighborhood: string | null;
  zipCode: string | null;
  marca: string; // canonical brand or UNKNOWN
  model: string | null;
  fuel: string | null;
  transmission: string | null;
  color: string | null;
  category: string | null;
  steering: string | null;
  vehicleType: string | null;
  extras: string[];
}

// ===== Feature row (feature builder output) =====

export interface FeatureRecord {
  listing_id: string;
  log_price: number;
  car_age: number;
  km_per_year: number | null;
  motor: number | null;
  marca: string;
  state_clean: string;
  transmission: string | null;
  fuel: string | null;
  leather_seats: 0 | 1;
  sunroof: 0 | 1;
  four_wheel_drive: 0 | 1;
  armored: 0 | 1;
  single_owner: 0 | 1;
}

// ===== Reports =====

export interface StageReport {
  stage: PipelineStage;
  input: number;
  accepted: number;
  rejected: number;
  rejectedByReason: Record<string, number>;
}

export interface PipelineRun {
  id: string;
  stage: PipelineStage;
  startedAt: string;
  durationMs: number;
  reportJson: string;
}

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string };
