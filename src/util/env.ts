/**
 * Environment utilities for runtime/stage detection and safe env var access.
 */

export function getNodeEnv(): string {
  return process.env.NODE_ENV || "development";
}

export function getStage(): string {
  // Explicit STAGE wins; derive from NODE_ENV otherwise
  const stage = process.env.STAGE;
  if (stage && stage.length > 0) return stage;
  return getNodeEnv() === "production" ? "prod" : "dev";
}

export function isProduction(): boolean {
  const stage = getStage();
  return stage === "prod" || getNodeEnv() === "production";
}

export function isTest(): boolean {
  return getNodeEnv() === "test" || Boolean(process.env.JEST_WORKER_ID);
}

export function isLocal(): boolean {
  // Heuristics: explicit local flag or absence of Lambda execution env implies local
  const localFlag = process.env.IS_LOCAL === "true";
  const isLambda = Boolean(
    process.env.AWS_LAMBDA_FUNCTION_NAME || process.env.AWS_EXECUTION_ENV
  );
  return localFlag || !isLambda;
}

export interface GetEnvVarOptions<T> {
  parse: (raw: string) => T;
  defaultValue?: T;
  required?: boolean;
  stageAware?: boolean; // if true, prefer NAME__<stage> before NAME
}

/**
 * Returns the raw value of an env var, or undefined when unset or empty.
 * When `stageAware` (the default), NAME__<stage> is checked before NAME.
 */
export function readEnv(name: string, stageAware = true): string | undefined {
  const stageKey = `${name}__${getStage()}`;
  const candidate = stageAware
    ? process.env[stageKey] ?? process.env[name]
    : process.env[name];
  if (candidate == null || candidate === "") return undefined;
  return candidate;
}

/**
 * Reads an environment variable with fallbacks and parsing.
 * - If not found, returns `defaultValue` when provided; otherwise throws when `required` is true.
 */
export function getEnvVar<T>(
  name: string,
  options: GetEnvVarOptions<T>
): T | undefined {
  const stageAware = options.stageAware !== false;
  const raw = readEnv(name, stageAware);

  if (raw !== undefined) return options.parse(raw);

  if (options.defaultValue !== undefined) return options.defaultValue;

  if (options.required) {
    const tried = stageAware ? `${name}__${getStage()} or ${name}` : name;
    throw new Error(`Missing required env var: ${tried}`);
  }

  return undefined;
}

const asString = (raw: string): string => raw;

export function getString(name: string): string | undefined;
export function getString(name: string, defaultValue: string): string;
export function getString(
  name: string,
  defaultValue?: string
): string | undefined {
  return getEnvVar(name, { parse: asString, defaultValue });
}

export function getNumber(name: string): number | undefined;
export function getNumber(name: string, defaultValue: number): number;
export function getNumber(
  name: string,
  defaultValue?: number
): number | undefined {
  return getEnvVar(name, {
    defaultValue,
    parse: raw => {
      const n = Number(raw);
      if (Number.isNaN(n))
        throw new Error(`Env var ${name} is not a number: ${raw}`);
      return n;
    },
  });
}

export function getBoolean(name: string): boolean | undefined;
export function getBoolean(name: string, defaultValue: boolean): boolean;
export function getBoolean(
  name: string,
  defaultValue?: boolean
): boolean | undefined {
  return getEnvVar(name, {
    defaultValue,
    parse: raw => {
      const lowered = raw.toLowerCase();
      if (["1", "true", "yes", "y"].includes(lowered)) return true;
      if (["0", "false", "no", "n"].includes(lowered)) return false;
      throw new Error(`Env var ${name} is not a boolean: ${raw}`);
    },
  });
}

/**
 * Parses a JSON-encoded env var (e.g. REPORT_IDS='["a","b"]').
 * The parsed value is returned as `unknown`; callers validate its shape.
 */
export function getJson(name: string): unknown {
  return getEnvVar<unknown>(name, {
    parse: raw => {
      try {
        return JSON.parse(raw);
      } catch {
        throw new Error(`Env var ${name} is not valid JSON: ${raw}`);
      }
    },
  });
}
