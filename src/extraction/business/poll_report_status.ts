import type { Logger } from "pino";
import { getLogger } from "../../util/logger";
import type { ReportingApi, Sleep } from "../types/contracts";
import { ReportFileStatus } from "../types/domain";
import type { ReportFileRecord } from "../types/domain";

export const defaultSleep: Sleep = ms =>
  new Promise(resolve => setTimeout(resolve, ms));

function compareSchedulingDate(a: string, b: string): number {
  const ta = Date.parse(a);
  const tb = Date.parse(b);
  if (Number.isFinite(ta) && Number.isFinite(tb)) return ta - tb;
  // Unparseable timestamps fall back to lexical order
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Returns the record with the latest schedulingDate. On ties the record
 * appearing last in the input wins.
 */
export function selectLatestRecord(
  records: readonly ReportFileRecord[]
): ReportFileRecord | undefined {
  let latest: ReportFileRecord | undefined;
  for (const record of records) {
    if (
      latest === undefined ||
      compareSchedulingDate(record.schedulingDate, latest.schedulingDate) >= 0
    ) {
      latest = record;
    }
  }
  return latest;
}

export interface WaitForCompletionOptions {
  intervalMs: number;
  sleep?: Sleep;
  logger?: Logger;
}

export interface CompletedReportRun {
  record: ReportFileRecord;
  polls: number;
}

/**
 * Polls the report's run records until the latest one is COMPLETED.
 * There is no upper bound on the number of polls.
 */
export async function waitForCompletion(
  api: ReportingApi,
  reportId: string,
  options: WaitForCompletionOptions
): Promise<CompletedReportRun> {
  const sleep = options.sleep ?? defaultSleep;
  const logger = options.logger ?? getLogger("extraction/poll_report_status");
  let polls = 0;

  for (;;) {
    const records = await api.listReportFiles(reportId);
    polls += 1;
    const latest = selectLatestRecord(records);
    logger.info(
      {
        reportId,
        polls,
        status: latest?.reportFileStatus ?? null,
        schedulingDate: latest?.schedulingDate ?? null,
      },
      "report status"
    );

    if (latest?.reportFileStatus === ReportFileStatus.Completed) {
      return { record: latest, polls };
    }
    await sleep(options.intervalMs);
  }
}
