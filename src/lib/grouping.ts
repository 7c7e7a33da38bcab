import { z } from "zod";
import { FEATURE_SCHEMA_VERSION } from "./feature-schema";
import { BRAND_OTHER, STATE_OTHER } from "./types";

export interface GroupingConfig {
  /** States with fewer listings than this collapse to STATE_OTHER. */
  stateMinListings: number;
  /** Brands outside the N most frequent collapse to BRAND_OTHER. */
  brandTopN: number;
}

export const groupDecisionSchema = z.object({
  count: z.number().int().nonnegative(),
  decision: z.enum(["retained", "other"]),
});

export const groupingManifestSchema = z.object({
  schemaVersion: z.string().min(1),
  fittedAt: z.string(),
  rowCount: z.number().int().nonnegative(),
  referenceYear: z.number().int(),
  stateMinListings: z.number().int().nonnegative(),
  brandTopN: z.number().int().nonnegative(),
  states: z.record(groupDecisionSchema),
  brands: z.record(groupDecisionSchema),
});

export type GroupDecision = z.infer<typeof groupDecisionSchema>;
export type GroupingManifest = z.infer<typeof groupingManifestSchema>;

export function countValues(values: Iterable<string>): Map<string, number> {
  const counts = new Map<string, number>();
  for (const v of values) counts.set(v, (counts.get(v) ?? 0) + 1);
  return counts;
}

/** Retain every value with at least `minCount` occurrences. */
export function fitThreshold(
  counts: Map<string, number>,
  minCount: number
): Record<string, GroupDecision> {
  const decisions: Record<string, GroupDecision> = {};
  for (const [value, count] of Array.from(counts).sort(([a], [b]) => a.localeCompare(b))) {
    decisions[value] = { count, decision: count >= minCount ? "retained" : "other" };
  }
  return decisions;
}

/** Retain the `n` most frequent values; ties go to the alphabetically first. */
export function fitTopN(
  counts: Map<string, number>,
  n: number
): Record<string, GroupDecision> {
  const ranked = Array.from(counts).sort(
    ([a, ca], [b, cb]) => cb - ca || a.localeCompare(b)
  );
  const decisions: Record<string, GroupDecision> = {};
  ranked.forEach(([value, count], i) => {
    decisions[value] = { count, decision: i < n ? "retained" : "other" };
  });
  return decisions;
}

export function fitGrouping(
  rows: { stateClean: string; marca: string }[],
  config: GroupingConfig & { referenceYear: number },
  fittedAt: string = new Date().toISOString()
): GroupingManifest {
  return {
    schemaVersion: FEATURE_SCHEMA_VERSION,
    fittedAt,
    rowCount: rows.length,
    referenceYear: config.referenceYear,
    stateMinListings: config.stateMinListings,
    brandTopN: config.brandTopN,
    states: fitThreshold(countValues(rows.map((r) => r.stateClean)), config.stateMinListings),
    brands: fitTopN(countValues(rows.map((r) => r.marca)), config.brandTopN),
  };
}

/**
 * Map a value through a fitted decision table. Values the table has never
 * seen were not frequent enough to be retained, so they go to `other`.
 */
function applyDecisions(
  decisions: Record<string, GroupDecision>,
  value: string,
  other: string
): string {
  return decisions[value]?.decision === "retained" ? value : other;
}

export function groupState(manifest: GroupingManifest, state: string): string {
  return applyDecisions(manifest.states, state, STATE_OTHER);
}

export function groupBrand(manifest: GroupingManifest, brand: string): string {
  return applyDecisions(manifest.brands, brand, BRAND_OTHER);
}

/** Apply a stored grouping to an inference-time record without refitting. */
export function applyGrouping<T extends { stateClean: string; marca: string }>(
  manifest: GroupingManifest,
  record: T
): T {
  return {
    ...record,
    stateClean: groupState(manifest, record.stateClean),
    marca: groupBrand(manifest, record.marca),
  };
}

export function parseGroupingManifest(json: string): GroupingManifest {
  return groupingManifestSchema.parse(JSON.parse(json));
}
