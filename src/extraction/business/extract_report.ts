import type { Logger } from "pino";
import { getLogger } from "../../util/logger";
import { buildObjectKey, OBJECT_KEY_PREFIX } from "../db/s3_object_storage";
import { ReportingApiError } from "../infrastructure/reporting_api_client";
import type {
  ObjectStorage,
  ReportFileStore,
  ReportingApi,
  Sleep,
} from "../types/contracts";
import { ReportFileStatus } from "../types/domain";
import type { ReportExtractionResult } from "../types/domain";
import { formatCsv, parseCsv, renameColumns } from "./csv";
import { normalizeHeader } from "./header_normalizer";
import { waitForCompletion } from "./poll_report_status";

export interface ExtractReportDependencies {
  api: ReportingApi;
  store: ReportFileStore;
  storage: ObjectStorage;
  pollIntervalMs: number;
  sleep?: Sleep;
  objectKeyPrefix?: string;
}

/**
 * Starts an ad-hoc run. An HTTP rejection (e.g. a run already in progress)
 * is treated as PENDING so the caller still polls for the latest run.
 */
async function triggerReportRun(
  api: ReportingApi,
  reportId: string,
  logger: Logger
): Promise<string> {
  try {
    return await api.triggerReportFile(reportId);
  } catch (err) {
    if (err instanceof ReportingApiError) {
      logger.warn(
        { reportId, status: err.status, apiMessage: err.apiMessage },
        "report trigger rejected, polling existing runs"
      );
      return ReportFileStatus.Pending;
    }
    throw err;
  }
}

/**
 * Trigger → poll → download → normalize headers → write locally → upload.
 *
 * Only the trigger step is guarded: a non-HTTP failure there skips the report.
 * Failures in later steps propagate to the caller.
 */
export async function extractReport(
  reportId: string,
  deps: ExtractReportDependencies
): Promise<ReportExtractionResult> {
  const logger = getLogger("extraction/extract_report").child({ reportId });

  logger.info("generating ad-hoc report run");
  let status: string;
  try {
    status = await triggerReportRun(deps.api, reportId, logger);
  } catch (err) {
    logger.error({ err }, "report trigger failed, skipping report");
    return {
      ok: false,
      reportId,
      error: err instanceof Error ? err.message : String(err),
    };
  }
  logger.info({ status }, "report run triggered");

  if (status !== ReportFileStatus.Completed) {
    const { polls } = await waitForCompletion(deps.api, reportId, {
      intervalMs: deps.pollIntervalMs,
      sleep: deps.sleep,
      logger,
    });
    logger.debug({ polls }, "report run completed");
  }

  logger.info("downloading report");
  const raw = await deps.api.downloadRecentData(reportId);
  const table = parseCsv(raw);
  if (table.headers.length === 0) {
    throw new Error(`Report ${reportId} returned no data`);
  }

  logger.info("cleaning up column headers");
  const normalized = renameColumns(table, normalizeHeader);

  logger.info("saving file");
  const { filePath } = await deps.store.write(reportId, formatCsv(normalized));

  const objectKey = buildObjectKey(
    filePath,
    deps.objectKeyPrefix ?? OBJECT_KEY_PREFIX
  );
  logger.info({ objectKey }, "uploading report");
  await deps.storage.uploadFile({ filePath, key: objectKey });

  return {
    ok: true,
    reportId,
    data: {
      filePath,
      objectKey,
      columns: normalized.headers,
      rowCount: normalized.rows.length,
    },
  };
}
