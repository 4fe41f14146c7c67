import type { ReportFileRecord, StoredReportFile } from "./domain";

/**
 * Reporting API interface
 */
export interface ReportingApi {
  triggerReportFile(reportId: string): Promise<string>;
  listReportFiles(reportId: string): Promise<ReportFileRecord[]>;
  downloadRecentData(reportId: string): Promise<string>;
}

/**
 * Local report file store interface
 */
export interface ReportFileStore {
  write(reportId: string, csv: string): Promise<StoredReportFile>;
}

/**
 * Remote object storage interface
 */
export interface ObjectStorage {
  uploadFile(params: { filePath: string; key: string }): Promise<void>;
}

export type Sleep = (ms: number) => Promise<void>;
