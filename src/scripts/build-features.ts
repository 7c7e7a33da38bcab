import { config } from "../lib/config";
import { closeDb, getDb } from "../lib/db";
import { runFeatureStage } from "../lib/pipeline";

function main() {
  const result = runFeatureStage(getDb(), {
    referenceYear: config.referenceYear,
    carAgeFloor: 0.5,
    stateMinListings: config.stateMinListings,
    brandTopN: config.brandTopN,
  });

  console.log(`\n=== Summary ===`);
  console.log(`Schema: ${result.manifest.schemaVersion}, reference year ${result.manifest.referenceYear}`);
  console.log(`Rows: ${result.report.accepted}/${result.report.input}`);
  for (const [column, count] of Object.entries(result.report.rejectedByReason)) {
    console.log(`  ${column}: ${count}`);
  }
  closeDb();
}

try {
  main();
} catch (err) {
  console.error("Fatal error:", err instanceof Error ? err.message : err);
  closeDb();
  process.exit(1);
}
