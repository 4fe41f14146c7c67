// Lambda handler for the scheduled report extraction (Node.js)
// This is a thin wrapper that delegates to the extraction business layer.

import { runExtraction } from "../../src/extraction/business/run_extraction";
import { loadExtractionConfig } from "../../src/extraction/config";
import type { ExtractionSummary } from "../../src/extraction/types/domain";
import { withRequestContext } from "../../src/util/logger";

interface LambdaContextLike {
  awsRequestId?: string;
  functionName?: string;
  functionVersion?: string;
}

/**
 * AWS Lambda entrypoint.
 * Loads configuration from environment variables and extracts every configured report.
 */
export const handler = async (
  _event?: unknown,
  context: LambdaContextLike = {}
) => {
  const logger = withRequestContext("functions/extract_reports", context);
  let summary: ExtractionSummary;
  try {
    summary = await runExtraction(loadExtractionConfig());
  } catch (err) {
    logger.error({ err }, "report extraction failed");
    throw err;
  }
  logger.info(
    { processed: summary.processed, skipped: summary.skipped },
    "extraction handler done"
  );

  return {
    statusCode: 200,
    body: JSON.stringify({ status: "ok", summary }),
  };
};
