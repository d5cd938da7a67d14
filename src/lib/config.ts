/**
 * Runtime configuration for the ticket classifier.
 *
 * Values come from the environment (the CLI loads `.env` through dotenv first)
 * and are validated with zod so a bad value fails the run before any ticket is
 * touched.
 */

import path from "path"
import { z } from "zod"
import { ConfigError } from "./errors.js"

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback)

const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().min(1).optional(),
  MODEL_VERSION: z.string().min(1).default("gpt-4o-mini"),
  BATCH_SIZE: positiveInt(100),
  MAX_RETRIES: positiveInt(3),
  PARALLEL_REQUESTS: positiveInt(4),
  PARALLEL_BATCH_SIZE: positiveInt(8),
  REQUEST_TIMEOUT: positiveInt(30),
  CHECKPOINT_DIR: z.string().min(1).default("checkpoints"),
  CHECKPOINT_KEEP_LAST: positiveInt(5),
  DATA_DIR: z.string().min(1).default("data"),
  INPUT_FILE: z.string().min(1).optional(),
  OUTPUT_FILE: z.string().min(1).optional(),
  OUTPUT_DIR: z.string().min(1).optional(),
  LOG_DIR: z.string().min(1).optional(),
  SHUTDOWN_GRACE_MS: z.coerce.number().int().nonnegative().default(3000),
})

export interface ClassifierConfig {
  openaiApiKey: string | null
  modelVersion: string
  /** Completed tickets between checkpoints */
  checkpointInterval: number
  /** Attempts per oracle call before a terminal failure */
  maxRetries: number
  /** Concurrency ceiling (P) */
  parallelRequests: number
  /** Wave width (W) */
  parallelBatchSize: number
  requestTimeoutMs: number
  checkpointDir: string
  checkpointKeepLast: number
  dataDir: string
  inputFile: string
  outputFile: string
  outputDir: string
  logDir: string
  serviceCatalogFile: string
  shutdownGraceMs: number
}

/** File name of the service catalog inside the data directory */
export const SERVICE_CATALOG_FILE_NAME = "service_categories_and_types.json"

/**
 * Parse and validate configuration from an environment map.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ClassifierConfig {
  const result = EnvSchema.safeParse(env)
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`)
  }

  const parsed = result.data
  const outputDir = parsed.OUTPUT_DIR ?? path.join(parsed.DATA_DIR, "output")

  return {
    openaiApiKey: parsed.OPENAI_API_KEY ?? null,
    modelVersion: parsed.MODEL_VERSION,
    checkpointInterval: parsed.BATCH_SIZE,
    maxRetries: parsed.MAX_RETRIES,
    parallelRequests: parsed.PARALLEL_REQUESTS,
    parallelBatchSize: parsed.PARALLEL_BATCH_SIZE,
    requestTimeoutMs: parsed.REQUEST_TIMEOUT * 1000,
    checkpointDir: parsed.CHECKPOINT_DIR,
    checkpointKeepLast: parsed.CHECKPOINT_KEEP_LAST,
    dataDir: parsed.DATA_DIR,
    inputFile: parsed.INPUT_FILE ?? path.join(parsed.DATA_DIR, "tickets.csv"),
    outputFile: parsed.OUTPUT_FILE ?? path.join(outputDir, "classified-tickets.csv"),
    outputDir,
    logDir: parsed.LOG_DIR ?? path.join(parsed.DATA_DIR, "logs"),
    serviceCatalogFile: path.join(parsed.DATA_DIR, SERVICE_CATALOG_FILE_NAME),
    shutdownGraceMs: parsed.SHUTDOWN_GRACE_MS,
  }
}
