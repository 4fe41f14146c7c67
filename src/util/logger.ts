import pino, { Logger, LoggerOptions, TransportSingleOptions } from "pino";
import { getStage, isLocal, isProduction, isTest } from "./env";

/**
 * Centralized structured logger for both local runs and AWS Lambda.
 * - Local/dev: pretty-printed logs for readability
 * - Lambda/prod: JSON logs optimized for CloudWatch and log analysis
 */
const baseOptions: LoggerOptions = {
  level:
    process.env.LOG_LEVEL ||
    (isTest() ? "silent" : isProduction() ? "info" : "debug"),
  base: {
    service: "report-extractor",
    stage: getStage(),
  },
  redact: {
    // Remove sensitive fields from logs
    paths: [
      "*.password",
      "*.secret",
      "*.token",
      "*.apiKey",
      "headers.authorization",
      'headers["X-SmartToken"]',
    ],
    remove: true,
  },
  messageKey: "message",
  timestamp: pino.stdTimeFunctions.isoTime,
};

// No transport worker under Jest: it would keep the test process alive
const transport: TransportSingleOptions | undefined =
  isLocal() && !isProduction() && !isTest()
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          singleLine: false,
          ignore: "pid,hostname",
        },
      }
    : undefined;

const rootLogger: Logger = pino({ ...baseOptions, transport });

/**
 * Returns a child logger with module-scoped bindings.
 */
export function getLogger(moduleName?: string): Logger {
  if (!moduleName) return rootLogger;
  return rootLogger.child({ module: moduleName });
}

/**
 * Returns a child logger augmented with AWS Lambda request context fields.
 * Use inside Lambda handlers when `context` is available.
 */
export function withRequestContext(
  moduleName: string | undefined,
  request: {
    awsRequestId?: string;
    functionName?: string;
    functionVersion?: string;
  }
): Logger {
  return getLogger(moduleName).child({
    requestId: request.awsRequestId,
    functionName: request.functionName,
    functionVersion: request.functionVersion,
  });
}
