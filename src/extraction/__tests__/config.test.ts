import os from "os";
import path from "path";
import { loadExtractionConfig } from "@src/extraction/config";

const VARS = [
  "SMARTTOKEN",
  "BUCKET_NAME",
  "REPORT_IDS",
  "SMARTRECRUITERS_BASE_URL",
  "DATA_ROOT",
  "POLL_INTERVAL_MS",
  "S3_ENDPOINT",
  "STAGE",
  "IS_LOCAL",
  "AWS_LAMBDA_FUNCTION_NAME",
  "AWS_EXECUTION_ENV",
];

describe("loadExtractionConfig", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv, NODE_ENV: "test" };
    for (const name of VARS) {
      delete process.env[name];
      delete process.env[`${name}__dev`];
      delete process.env[`${name}__prod`];
    }
    process.env.SMARTTOKEN = "test-token";
    process.env.BUCKET_NAME = "test-bucket";
    process.env.REPORT_IDS = '["a1","b2"]';
    process.env.DATA_ROOT = "/tmp/reports";
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  it("reads required values and applies defaults", () => {
    expect(loadExtractionConfig()).toEqual({
      baseUrl: "https://api.smartrecruiters.com",
      token: "test-token",
      bucketName: "test-bucket",
      reportIds: ["a1", "b2"],
      dataRoot: "/tmp/reports",
      pollIntervalMs: 100,
    });
  });

  it("reads optional overrides", () => {
    process.env.SMARTRECRUITERS_BASE_URL = "https://sandbox.example.test";
    process.env.POLL_INTERVAL_MS = "500";
    process.env.S3_ENDPOINT = "http://localhost:9000";

    const config = loadExtractionConfig();

    expect(config.baseUrl).toBe("https://sandbox.example.test");
    expect(config.pollIntervalMs).toBe(500);
    expect(config.s3Endpoint).toBe("http://localhost:9000");
  });

  it("defaults the data root under the working directory locally", () => {
    delete process.env.DATA_ROOT;
    expect(loadExtractionConfig().dataRoot).toBe(
      path.join(process.cwd(), "data")
    );
  });

  it("defaults the data root to the temp dir inside Lambda", () => {
    delete process.env.DATA_ROOT;
    process.env.AWS_LAMBDA_FUNCTION_NAME = "extract-reports";
    expect(loadExtractionConfig().dataRoot).toBe(
      path.resolve(os.tmpdir(), "data")
    );
  });

  it("prefers stage-specific values", () => {
    process.env.STAGE = "prod";
    process.env.BUCKET_NAME__prod = "prod-bucket";
    expect(loadExtractionConfig().bucketName).toBe("prod-bucket");
  });

  it("names a missing variable", () => {
    delete process.env.SMARTTOKEN;
    expect(() => loadExtractionConfig()).toThrow(
      "Missing required env var: SMARTTOKEN"
    );
  });

  it("rejects report ids that are not a JSON array of strings", () => {
    process.env.REPORT_IDS = '{"a":1}';
    expect(() => loadExtractionConfig()).toThrow(
      "Invalid env var REPORT_IDS: Expected array, received object"
    );
  });

  it("rejects report ids that are not JSON", () => {
    process.env.REPORT_IDS = "a1,b2";
    expect(() => loadExtractionConfig()).toThrow(
      "Env var REPORT_IDS is not valid JSON: a1,b2"
    );
  });

  it("rejects a negative poll interval", () => {
    process.env.POLL_INTERVAL_MS = "-5";
    expect(() => loadExtractionConfig()).toThrow(
      "Invalid env var POLL_INTERVAL_MS"
    );
  });
});
