import {
  getBoolean,
  getEnvVar,
  getJson,
  getNumber,
  getStage,
  getString,
  isLocal,
} from "../../util/env";

describe("env utils", () => {
  const originalEnv = process.env;
  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.STAGE;
  });
  afterAll(() => {
    process.env = originalEnv;
  });

  test("stage resolution with STAGE", () => {
    process.env.STAGE = "prod";
    expect(getStage()).toBe("prod");
  });

  test("stage fallback to NODE_ENV", () => {
    process.env.NODE_ENV = "production";
    expect(getStage()).toBe("prod");
  });

  test("isLocal detects absence of lambda env", () => {
    delete process.env.AWS_LAMBDA_FUNCTION_NAME;
    delete process.env.AWS_EXECUTION_ENV;
    expect(isLocal()).toBe(true);
  });

  test("isLocal is false inside lambda", () => {
    delete process.env.IS_LOCAL;
    process.env.AWS_LAMBDA_FUNCTION_NAME = "extract-reports";
    expect(isLocal()).toBe(false);
  });

  test("getEnvVar returns default when missing", () => {
    const value = getEnvVar("UNKNOWN_VAR", {
      parse: raw => raw,
      defaultValue: "abc",
    });
    expect(value).toBe("abc");
  });

  test("getEnvVar stageAware picks staged value first", () => {
    process.env.STAGE = "dev";
    process.env.MY_KEY__dev = "staged";
    process.env.MY_KEY = "plain";
    expect(getString("MY_KEY")).toBe("staged");
  });

  test("getEnvVar ignores staged value when stageAware is false", () => {
    process.env.STAGE = "dev";
    process.env.MY_KEY__dev = "staged";
    process.env.MY_KEY = "plain";
    const v = getEnvVar("MY_KEY", { parse: raw => raw, stageAware: false });
    expect(v).toBe("plain");
  });

  test("empty values count as missing", () => {
    process.env.EMPTY_KEY = "";
    expect(getString("EMPTY_KEY", "fallback")).toBe("fallback");
  });

  test("parsers: number and boolean", () => {
    process.env.NUMBER_KEY = "42";
    process.env.BOOL_KEY = "true";
    process.env.BOOL_NO = "no";
    expect(getNumber("NUMBER_KEY")).toBe(42);
    expect(getBoolean("BOOL_KEY")).toBe(true);
    expect(getBoolean("BOOL_NO")).toBe(false);
  });

  test("number parser rejects garbage", () => {
    process.env.NUMBER_KEY = "forty";
    expect(() => getNumber("NUMBER_KEY")).toThrow(
      "Env var NUMBER_KEY is not a number: forty"
    );
  });

  test("getString returns default", () => {
    expect(getString("NOPE", "x")).toBe("x");
  });

  test("required getEnvVar names the keys it tried", () => {
    delete process.env.NOPE;
    delete process.env.NOPE__dev;
    process.env.NODE_ENV = "development";
    expect(() =>
      getEnvVar("NOPE", { parse: raw => raw, required: true })
    ).toThrow("Missing required env var: NOPE__dev or NOPE");
  });

  test("getJson parses arrays and rejects invalid JSON", () => {
    process.env.IDS = '["a","b"]';
    expect(getJson("IDS")).toEqual(["a", "b"]);
    process.env.IDS = "[a";
    expect(() => getJson("IDS")).toThrow("Env var IDS is not valid JSON: [a");
  });
});
