import os from "os";
import path from "path";
import { z } from "zod";
import { getJson, getNumber, getString, isLocal } from "../util/env";
import { DEFAULT_BASE_URL } from "./infrastructure/reporting_api_client";

/**
 * Extraction job configuration, read from the environment.
 * Every variable may be overridden per stage with NAME__<stage>.
 */
const configSchema = z.object({
  baseUrl: z.string().url(),
  token: z.string().min(1),
  bucketName: z.string().min(1),
  reportIds: z.array(z.string().trim().min(1)),
  dataRoot: z.string().min(1),
  pollIntervalMs: z.number().int().nonnegative(),
  s3Endpoint: z.string().url().optional(),
});

export type ExtractionConfig = z.infer<typeof configSchema>;

const ENV_NAMES: Record<keyof ExtractionConfig, string> = {
  baseUrl: "SMARTRECRUITERS_BASE_URL",
  token: "SMARTTOKEN",
  bucketName: "BUCKET_NAME",
  reportIds: "REPORT_IDS",
  dataRoot: "DATA_ROOT",
  pollIntervalMs: "POLL_INTERVAL_MS",
  s3Endpoint: "S3_ENDPOINT",
};

// 10 requests per second is the API's rate limit
export const DEFAULT_POLL_INTERVAL_MS = 100;

// Lambda only allows writes under the temp dir
function defaultDataRoot(): string {
  return isLocal()
    ? path.join(process.cwd(), "data")
    : path.join(os.tmpdir(), "data");
}

function isConfigKey(key: unknown): key is keyof ExtractionConfig {
  return (
    typeof key === "string" &&
    Object.prototype.hasOwnProperty.call(ENV_NAMES, key)
  );
}

function envNameFor(key: string | number | undefined): string {
  return isConfigKey(key) ? ENV_NAMES[key] : String(key);
}

export function loadExtractionConfig(): ExtractionConfig {
  const raw = {
    baseUrl: getString(ENV_NAMES.baseUrl, DEFAULT_BASE_URL),
    token: getString(ENV_NAMES.token),
    bucketName: getString(ENV_NAMES.bucketName),
    reportIds: getJson(ENV_NAMES.reportIds),
    dataRoot: path.resolve(getString(ENV_NAMES.dataRoot, defaultDataRoot())),
    pollIntervalMs: getNumber(ENV_NAMES.pollIntervalMs, DEFAULT_POLL_INTERVAL_MS),
    s3Endpoint: getString(ENV_NAMES.s3Endpoint),
  };

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => {
      const name = envNameFor(issue.path[0]);
      return issue.code === "invalid_type" && issue.received === "undefined"
        ? `Missing required env var: ${name}`
        : `Invalid env var ${name}: ${issue.message}`;
    });
    throw new Error(problems.join("; "));
  }
  return parsed.data;
}
