/**
 * Error types that cross module boundaries.
 *
 * Per-row classification failures never escape the scheduler; everything else
 * here aborts the command that raised it.
 */

/** Invalid or missing configuration values */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "ConfigError"
  }
}

/** A resource the run needs (input file, service catalog, credentials) is missing */
export class PrerequisiteError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "PrerequisiteError"
  }
}

/** The input table could not be read or lacks required columns */
export class TableReadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "TableReadError"
  }
}

/** A checkpoint file exists but could not be read or validated */
export class CheckpointLoadError extends Error {
  readonly filePath: string

  constructor(filePath: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : ""
    super(`Failed to load checkpoint ${filePath}${reason}`, options)
    this.name = "CheckpointLoadError"
    this.filePath = filePath
  }
}

/** Writing the final output table failed; the run is reported as failed */
export class OutputWriteError extends Error {
  constructor(destination: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : ""
    super(`Failed to write results to ${destination}${reason}`, options)
    this.name = "OutputWriteError"
  }
}

/** The classification oracle gave up on a ticket after exhausting its retries */
export class ClassificationError extends Error {
  readonly stage: "category" | "request_type" | "priority"

  constructor(stage: ClassificationError["stage"], message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "ClassificationError"
    this.stage = stage
  }
}

/**
 * Extract a printable message from an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
