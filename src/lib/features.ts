import { SchemaViolation } from "./errors";
import { FEATURE_COLUMNS, featureRecordSchema } from "./feature-schema";
import { GroupingConfig, GroupingManifest, fitGrouping, groupBrand, groupState } from "./grouping";
import { FEATURE_OPTIONS } from "./normalization-maps";
import { CleanedRecord, FeatureRecord, PipelineStage, StageReport } from "./types";

export interface FeatureConfig extends GroupingConfig {
  /** Year ages are measured from; passed in so runs are reproducible. */
  referenceYear: number;
  /** Substituted when a listing is not older than the reference year. */
  carAgeFloor: number;
}

export const DEFAULT_FEATURE_CONFIG: FeatureConfig = {
  referenceYear: new Date().getFullYear(),
  carAgeFloor: 0.5,
  stateMinListings: 50,
  brandTopN: 20,
};

export interface FeatureResult {
  rows: FeatureRecord[];
  manifest: GroupingManifest;
  violations: SchemaViolation[];
  report: StageReport;
}

export function carAge(year: number, referenceYear: number, floor: number): number {
  const age = referenceYear - year;
  return age <= 0 ? floor : age;
}

type FeatureCandidate = { [K in keyof FeatureRecord]: FeatureRecord[K] | null };

function flag(extras: Set<string>, key: string): 0 | 1 {
  return extras.has(key) ? 1 : 0;
}

/** Derive the unvalidated feature row for one cleaned record under a fitted grouping. */
export function toFeatureCandidate(
  record: CleanedRecord,
  manifest: GroupingManifest,
  config: Pick<FeatureConfig, "referenceYear" | "carAgeFloor">
): FeatureCandidate {
  const age = carAge(record.year, config.referenceYear, config.carAgeFloor);
  const extras = new Set(record.extras);

  return {
    listing_id: record.listingId,
    log_price: record.price > 0 ? Math.log(record.price) : null,
    car_age: age,
    km_per_year: record.mileageKm === null ? null : record.mileageKm / age,
    motor: record.motor,
    marca: groupBrand(manifest, record.marca),
    state_clean: groupState(manifest, record.stateClean),
    transmission: record.transmission,
    fuel: record.fuel,
    leather_seats: flag(extras, FEATURE_OPTIONS.leather_seats),
    sunroof: flag(extras, FEATURE_OPTIONS.sunroof),
    four_wheel_drive: flag(extras, FEATURE_OPTIONS.four_wheel_drive),
    armored: flag(extras, FEATURE_OPTIONS.armored),
    single_owner: flag(extras, FEATURE_OPTIONS.single_owner),
  };
}

/**
 * Validate a candidate against the declared schema. The first offending
 * column, in schema order, is reported; nothing is imputed.
 */
export function validateFeatureRow(candidate: FeatureCandidate): FeatureRecord | SchemaViolation {
  const result = featureRecordSchema.safeParse(candidate);
  if (result.success) return result.data;

  const bad = new Set(result.error.issues.map((i) => String(i.path[0])));
  const column = FEATURE_COLUMNS.find((c) => bad.has(c.name))?.name ?? "unknown";
  return new SchemaViolation(candidate.listing_id ?? "", column);
}

/**
 * Fit the grouping on this batch and build the feature table. The manifest
 * goes out with the rows so inference can reuse the same grouping.
 */
export function buildFeatures(
  records: CleanedRecord[],
  config: FeatureConfig = DEFAULT_FEATURE_CONFIG,
  fittedAt?: string
): FeatureResult {
  const manifest = fitGrouping(records, config, fittedAt);
  const rows: FeatureRecord[] = [];
  const violations: SchemaViolation[] = [];
  const rejectedByReason: Record<string, number> = {};

  for (const record of records) {
    const result = validateFeatureRow(toFeatureCandidate(record, manifest, config));
    if (result instanceof SchemaViolation) {
      violations.push(result);
      rejectedByReason[result.column] = (rejectedByReason[result.column] ?? 0) + 1;
      console.warn(`[features] Rejected ${result.listingId}: ${result.column} violates schema`);
    } else {
      rows.push(result);
    }
  }

  const retainedStates = Object.values(manifest.states).filter((d) => d.decision === "retained").length;
  const retainedBrands = Object.values(manifest.brands).filter((d) => d.decision === "retained").length;
  console.log(
    `[features] ${rows.length} rows, ${violations.length} rejected; kept ${retainedStates} states and ${retainedBrands} brands`
  );

  return {
    rows,
    manifest,
    violations,
    report: {
      stage: PipelineStage.FEATURES,
      input: records.length,
      accepted: rows.length,
      rejected: violations.length,
      rejectedByReason,
    },
  };
}
