import path from "path"
import pino from "pino"
import { formatFileTimestamp } from "./date-utils.js"

const isProduction = process.env.NODE_ENV === "production"
const isTest = process.env.NODE_ENV === "test"

interface TransportTarget {
  target: string
  options: Record<string, unknown>
}

/**
 * File this process logs to, or null under test.
 */
export const logFilePath: string | null = isTest
  ? null
  : path.join(
      process.env.LOG_DIR ?? path.join(process.env.DATA_DIR ?? "data", "logs"),
      `ticket-classifier_${formatFileTimestamp(new Date())}.log`
    )

/**
 * Build the transport for the current environment.
 *
 * Outside production the console gets pino-pretty. Every run also writes JSON
 * lines to `ticket-classifier_<YYYYMMDD_HHMMSS>.log` in `LOG_DIR`
 * (default `<DATA_DIR>/logs`). Tests log nowhere but stdout.
 */
function buildTransport(): pino.LoggerOptions["transport"] {
  if (logFilePath === null) return undefined

  const targets: TransportTarget[] = [
    isProduction
      ? { target: "pino/file", options: { destination: 1 } }
      : {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        },
  ]

  targets.push({
    target: "pino/file",
    options: { destination: logFilePath, mkdir: true },
  })

  return { targets }
}

/**
 * Structured logger shared by the library and the CLI.
 */
export const logger = pino({
  level: process.env.LOG_LEVEL || (isProduction ? "info" : "debug"),
  transport: buildTransport(),
  base: {
    service: "ticket-classifier",
    env: process.env.NODE_ENV || "development",
  },
  redact: {
    paths: ["apiKey", "openaiApiKey", "OPENAI_API_KEY", "config.openaiApiKey"],
    censor: "[REDACTED]",
  },
})

/**
 * Create a child logger bound to a module name.
 */
export function createModuleLogger(module: string) {
  return logger.child({ module })
}

export type Logger = typeof logger
