import { getLogger } from "../../util/logger";
import { createS3Client } from "../../util/s3";
import type { ExtractionConfig } from "../config";
import { LocalReportStore } from "../db/local_report_store";
import { S3ObjectStorage } from "../db/s3_object_storage";
import { createReportingApiClient } from "../infrastructure/reporting_api_client";
import type {
  ObjectStorage,
  ReportFileStore,
  ReportingApi,
  Sleep,
} from "../types/contracts";
import type {
  ExtractionSummary,
  ReportExtractionResult,
} from "../types/domain";
import { extractReport } from "./extract_report";

export interface RunExtractionDependencies {
  api?: ReportingApi;
  store?: ReportFileStore;
  storage?: ObjectStorage;
  sleep?: Sleep;
}

/**
 * Extracts every configured report, one after another.
 * Clients are created once and shared across reports.
 */
export async function runExtraction(
  config: ExtractionConfig,
  deps: RunExtractionDependencies = {}
): Promise<ExtractionSummary> {
  const logger = getLogger("extraction/run_extraction");

  const api =
    deps.api ??
    createReportingApiClient({ token: config.token, baseUrl: config.baseUrl });
  const store = deps.store ?? new LocalReportStore({ dataRoot: config.dataRoot });
  const storage =
    deps.storage ??
    new S3ObjectStorage({
      bucket: config.bucketName,
      client: createS3Client({ endpoint: config.s3Endpoint }),
    });

  logger.info({ reports: config.reportIds.length }, "starting report extraction");

  const results: ReportExtractionResult[] = [];
  for (const reportId of config.reportIds) {
    const result = await extractReport(reportId, {
      api,
      store,
      storage,
      pollIntervalMs: config.pollIntervalMs,
      sleep: deps.sleep,
    });
    results.push(result);
  }

  const processed = results.filter(r => r.ok).length;
  const skipped = results.length - processed;
  logger.info({ processed, skipped }, "report extraction finished");

  return { processed, skipped, results };
}
