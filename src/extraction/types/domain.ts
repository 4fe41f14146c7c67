/**
 * Domain types for report extraction.
 */
export enum ReportFileStatus {
  Pending = "PENDING",
  Completed = "COMPLETED",
}

/**
 * One generation request of a report as listed by the reporting API.
 * `reportFileStatus` stays a plain string: the API may add states beyond
 * the ones this job acts on.
 */
export interface ReportFileRecord {
  schedulingDate: string;
  reportFileStatus: string;
}

export interface StoredReportFile {
  filePath: string;
  /** true when the report directory did not exist before the write */
  createdDirectory: boolean;
}

export interface ExtractedReport {
  filePath: string;
  objectKey: string;
  columns: string[];
  rowCount: number;
}

export type ReportExtractionResult =
  | { ok: true; reportId: string; data: ExtractedReport }
  | { ok: false; reportId: string; error: string };

export interface ExtractionSummary {
  processed: number;
  skipped: number;
  results: ReportExtractionResult[];
}
