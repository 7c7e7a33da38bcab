import type Database from "better-sqlite3";
import { randomUUID } from "crypto";
import { crawl, CrawlOptions, CrawlReport } from "./crawler";
import {
  checkProvenance,
  insertPipelineRun,
  readCleanedSnapshot,
  readRawSnapshot,
  writeCleanedSnapshot,
  writeFeatureSnapshot,
} from "./db";
import { buildFeatures, FeatureConfig, FeatureResult } from "./features";
import { normalizeSnapshot, NormalizeOptions, NormalizeResult } from "./normalization";
import { RawStoreWriter } from "./raw-store";
import { PipelineStage } from "./types";

function recordRun(
  db: Database.Database,
  stage: PipelineStage,
  startTime: number,
  report: object
): string {
  const id = randomUUID();
  insertPipelineRun(db, {
    id,
    stage,
    startedAt: new Date(startTime).toISOString(),
    durationMs: Date.now() - startTime,
    reportJson: JSON.stringify(report),
  });
  return id;
}

export type CrawlStageOptions = Omit<CrawlOptions, "sink">;

/** Crawl straight into the raw snapshot. */
export async function runCrawlStage(
  db: Database.Database,
  options: CrawlStageOptions
): Promise<CrawlReport & { runId: string }> {
  const startTime = Date.now();
  const writer = new RawStoreWriter(db);
  const report = await crawl({ ...options, sink: writer });

  const { listings, ...counts } = report;
  const runId = recordRun(db, PipelineStage.CRAWL, startTime, counts);
  const stats = writer.getStats();
  console.log(
    `[raw-store] ${stats.appended} rows appended, ${stats.duplicates} already present (${listings.length} listings seen)`
  );
  return { ...report, runId };
}

/** Rebuild the cleaned snapshot from every raw row stored so far. */
export function runNormalizeStage(
  db: Database.Database,
  options: NormalizeOptions
): NormalizeResult & { runId: string } {
  const startTime = Date.now();
  const result = normalizeSnapshot(readRawSnapshot(db), options);
  writeCleanedSnapshot(db, result.records, result.rejections);

  const runId = recordRun(db, PipelineStage.NORMALIZE, startTime, {
    ...result.report,
    superseded: result.superseded,
  });
  return { ...result, runId };
}

/** Rebuild the feature table and grouping manifest from the cleaned snapshot. */
export function runFeatureStage(
  db: Database.Database,
  config: FeatureConfig,
  fittedAt?: string
): FeatureResult & { runId: string } {
  const startTime = Date.now();
  const result = buildFeatures(readCleanedSnapshot(db), config, fittedAt);
  writeFeatureSnapshot(db, result.rows, result.manifest, result.violations);

  const issues = checkProvenance(db);
  if (issues.length > 0) {
    console.warn(
      `[features] ${issues.length} rows without provenance, e.g. ${issues[0].listingId} (cleaned=${issues[0].cleanedRows}, raw=${issues[0].rawRows})`
    );
  }

  const runId = recordRun(db, PipelineStage.FEATURES, startTime, {
    ...result.report,
    provenanceIssues: issues.length,
  });
  return { ...result, runId };
}
