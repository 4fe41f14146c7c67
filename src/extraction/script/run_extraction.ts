// Load envs from .env
// npx tsx src/extraction/script/run_extraction.ts
import "dotenv/config";
import { runExtraction } from "../business/run_extraction";
import { loadExtractionConfig } from "../config";

async function main() {
  const config = loadExtractionConfig();
  const summary = await runExtraction(config);

  /* eslint-disable no-console */
  console.log("=== Report Extraction ===");
  console.log(`Processed: ${summary.processed} | Skipped: ${summary.skipped}`);
  for (const result of summary.results) {
    if (result.ok) {
      console.log(
        `  ${result.reportId}: ${result.data.rowCount} rows -> ${result.data.objectKey}`
      );
    } else {
      console.log(`  ${result.reportId}: skipped (${result.error})`);
    }
  }
  /* eslint-enable no-console */
}

main().catch(err => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
