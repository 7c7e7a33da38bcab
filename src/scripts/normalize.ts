import { config } from "../lib/config";
import { closeDb, getDb } from "../lib/db";
import { runNormalizeStage } from "../lib/pipeline";

function main() {
  const result = runNormalizeStage(getDb(), {
    yearFloor: config.yearFloor,
    currentYear: new Date().getFullYear(),
    minPrice: 1000,
    maxPrice: 1_000_000,
  });

  console.log(`\n=== Summary ===`);
  console.log(`Input: ${result.report.input} (${result.superseded} superseded observations)`);
  console.log(`Accepted: ${result.report.accepted}`);
  console.log(`Rejected: ${result.report.rejected}`);
  for (const [reason, count] of Object.entries(result.report.rejectedByReason)) {
    console.log(`  ${reason}: ${count}`);
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
