import { z } from "zod";
import { getLogger } from "../../util/logger";
import type { ReportingApi } from "../types/contracts";
import type { ReportFileRecord } from "../types/domain";

/**
 * SmartRecruiters reporting API client.
 *
 * Endpoints (per report id):
 * - POST {base}/reporting-api/v201804/reports/{id}/files      trigger an ad-hoc run
 * - GET  {base}/reporting-api/v201804/reports/{id}/files      paginated run records
 * - GET  {base}/reporting-api/v201804/reports/{id}/files/recent/data   CSV of the latest run
 */

export const DEFAULT_BASE_URL = "https://api.smartrecruiters.com";
const REPORTS_PATH = "reporting-api/v201804/reports";
const TOKEN_HEADER = "X-SmartToken";

export interface FetchInit {
  method?: string;
  headers?: Record<string, string>;
}

export interface FetchResponse {
  ok: boolean;
  status: number;
  statusText: string;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init?: FetchInit) => Promise<FetchResponse>;

export class ReportingApiError extends Error {
  readonly status: number;
  readonly apiMessage?: string;

  constructor(params: {
    operation: string;
    status: number;
    statusText: string;
    apiMessage?: string;
  }) {
    const { operation, status, statusText, apiMessage } = params;
    super(
      `${operation} failed with HTTP ${status} ${statusText}` +
        (apiMessage ? `: ${apiMessage}` : "")
    );
    this.name = "ReportingApiError";
    this.status = status;
    this.apiMessage = apiMessage;
  }
}

const reportFileRecordSchema = z.object({
  schedulingDate: z.string(),
  reportFileStatus: z.string(),
});

const triggerResponseSchema = z.object({
  reportFileStatus: z.string(),
});

const reportFilesPageSchema = z.object({
  content: z.array(reportFileRecordSchema).default([]),
  nextPage: z.union([z.string(), z.number()]).nullish(),
});

const errorBodySchema = z.object({ message: z.string() });

export function buildReportFilesUrl(baseUrl: string, reportId: string): string {
  const base = baseUrl.replace(/\/+$/, "");
  return `${base}/${REPORTS_PATH}/${encodeURIComponent(reportId)}/files`;
}

async function toApiError(
  operation: string,
  res: FetchResponse
): Promise<ReportingApiError> {
  // Error bodies are JSON with a `message` field; tolerate anything else
  const body: unknown = await res.json().catch(() => undefined);
  const parsed = errorBodySchema.safeParse(body);
  return new ReportingApiError({
    operation,
    status: res.status,
    statusText: res.statusText,
    apiMessage: parsed.success ? parsed.data.message : undefined,
  });
}

function parseBody<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  body: unknown,
  operation: string
): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(i => `${i.path.join(".") || "<root>"}: ${i.message}`)
      .join("; ");
    throw new Error(`${operation} returned an unexpected body: ${issues}`);
  }
  return parsed.data;
}

export function createReportingApiClient(params: {
  token: string;
  baseUrl?: string;
  fetchFn?: FetchLike;
}): ReportingApi {
  const logger = getLogger("extraction/reporting_api_client");
  const baseUrl = params.baseUrl ?? DEFAULT_BASE_URL;
  const fetchFn: FetchLike = params.fetchFn ?? fetch;
  const headers: Record<string, string> = { [TOKEN_HEADER]: params.token };

  return {
    async triggerReportFile(reportId: string): Promise<string> {
      const operation = `Trigger report ${reportId}`;
      const res = await fetchFn(buildReportFilesUrl(baseUrl, reportId), {
        method: "POST",
        headers,
      });
      if (!res.ok) throw await toApiError(operation, res);
      const body = parseBody(triggerResponseSchema, await res.json(), operation);
      return body.reportFileStatus;
    },

    async listReportFiles(reportId: string): Promise<ReportFileRecord[]> {
      const operation = `List report files ${reportId}`;
      const filesUrl = buildReportFilesUrl(baseUrl, reportId);
      const records: ReportFileRecord[] = [];

      // First request carries no page parameter; follow nextPage until exhausted
      let nextPage: string | undefined = undefined;
      let pages = 0;
      do {
        const url = new URL(filesUrl);
        if (nextPage !== undefined) url.searchParams.set("page", nextPage);

        const res = await fetchFn(url.toString(), { method: "GET", headers });
        if (!res.ok) throw await toApiError(operation, res);
        const page = parseBody(reportFilesPageSchema, await res.json(), operation);

        records.push(...page.content);
        pages += 1;
        nextPage =
          page.nextPage == null || page.nextPage === ""
            ? undefined
            : String(page.nextPage);
      } while (nextPage !== undefined);

      logger.debug({ reportId, pages, records: records.length }, "report files listed");
      return records;
    },

    async downloadRecentData(reportId: string): Promise<string> {
      const operation = `Download report ${reportId}`;
      const url = `${buildReportFilesUrl(baseUrl, reportId)}/recent/data`;
      const res = await fetchFn(url, {
        method: "GET",
        headers: { ...headers, Accept: "text/csv" },
      });
      if (!res.ok) throw await toApiError(operation, res);
      return res.text();
    },
  };
}
