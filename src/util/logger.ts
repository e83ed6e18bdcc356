import pino, { Logger, LoggerOptions } from "pino";
import { getStage, isLocal, isProduction, isTest } from "./env";

/**
 * Centralized structured logger for local runs and scheduled CI runs.
 * - Local/dev: pretty-printed logs for readability
 * - CI/prod: JSON logs, one object per line
 * - Tests: plain JSON on stdout, silent unless LOG_LEVEL is set
 */
function resolveLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (isTest()) return "silent";
  return isProduction() ? "info" : "debug";
}

const baseOptions: LoggerOptions = {
  level: resolveLevel(),
  base: {
    service: "pivot-levels-report",
    stage: getStage(),
  },
  redact: {
    // Remove credentials from logs
    paths: [
      "*.password",
      "*.secret",
      "*.token",
      "*.apiKey",
      "*.sendKey",
      "headers.authorization",
    ],
    remove: true,
  },
  messageKey: "message",
  timestamp: pino.stdTimeFunctions.isoTime,
};

const transport =
  isLocal() && !isProduction() && !isTest()
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          singleLine: false,
          ignore: "pid,hostname",
          messageKey: "message",
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
 * Returns a child logger bound to a single report run.
 */
export function withRunContext(
  moduleName: string | undefined,
  run: { runId: string; seeds?: string[] }
): Logger {
  return getLogger(moduleName).child({ runId: run.runId, seeds: run.seeds });
}

export default rootLogger;
