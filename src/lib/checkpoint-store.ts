/**
 * Durable checkpoints for long classification runs.
 *
 * Each save writes a new JSON file holding the full table snapshot plus the
 * counters needed to resume, then prunes all but the newest `keepLast` files.
 * Files are never rewritten; resuming always reads the single newest one.
 */

import fs from "fs/promises"
import path from "path"
import { z } from "zod"
import { CheckpointLoadError } from "./errors.js"
import { createModuleLogger } from "./logger.js"
import type { ProcessingState } from "./processing-state.js"
import { findMissingColumns, type TicketTable } from "./ticket-table.js"

const log = createModuleLogger("checkpoint-store")

export const CHECKPOINT_FILE_PREFIX = "checkpoint_"
export const CHECKPOINT_FILE_SUFFIX = ".json"
export const DEFAULT_KEEP_LAST = 5

export const TicketTableSchema = z.object({
  columns: z.array(z.string()),
  rows: z.array(z.record(z.string(), z.string().nullable())),
})

export const CheckpointSchema = z
  .object({
    version: z.literal(1),
    lastIndex: z.number().int().min(-1),
    processedCount: z.number().int().nonnegative(),
    errorCount: z.number().int().nonnegative(),
    startTime: z.number(),
    createdAt: z.string(),
    table: TicketTableSchema,
  })
  .superRefine((checkpoint, ctx) => {
    const { errorCount, processedCount } = checkpoint
    if (errorCount > processedCount) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["errorCount"],
        message: `errorCount ${errorCount} exceeds processedCount ${processedCount}`,
      })
    }
    const rowCount = checkpoint.table.rows.length
    if (checkpoint.lastIndex >= rowCount) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["lastIndex"],
        message: `lastIndex ${checkpoint.lastIndex} is outside a table of ${rowCount} rows`,
      })
    }
    const missing = findMissingColumns(checkpoint.table)
    if (missing.length > 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["table", "columns"],
        message: `table is missing required column(s): ${missing.join(", ")}`,
      })
    }
  })
export type Checkpoint = z.infer<typeof CheckpointSchema>

export interface CheckpointFileInfo {
  filePath: string
  mtimeMs: number
}

export interface LoadedCheckpoint extends Checkpoint {
  filePath: string
}

/**
 * The part of the store the scheduler depends on.
 */
export interface CheckpointWriter {
  save(state: ProcessingState, table: TicketTable): Promise<string>
}

export interface CheckpointStoreOptions {
  /** Number of newest checkpoints retained after each save (default 5) */
  keepLast?: number
  now?: () => Date
}

let sequence = 0

function nextSequence(): string {
  sequence = (sequence + 1) % 10000
  return String(sequence).padStart(4, "0")
}

function isCheckpointFileName(name: string): boolean {
  return name.startsWith(CHECKPOINT_FILE_PREFIX) && name.endsWith(CHECKPOINT_FILE_SUFFIX)
}

function isMissingError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT"
}

export class CheckpointStore implements CheckpointWriter {
  readonly directory: string
  private readonly keepLast: number
  private readonly now: () => Date

  constructor(directory: string, options: CheckpointStoreOptions = {}) {
    this.directory = directory
    this.keepLast = options.keepLast ?? DEFAULT_KEEP_LAST
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Write a new checkpoint, then prune old ones.
   *
   * @returns Path of the written checkpoint
   * @throws If the new checkpoint could not be written. Existing checkpoints are untouched.
   */
  async save(state: ProcessingState, table: TicketTable): Promise<string> {
    const createdAt = this.now()
    const checkpoint: Checkpoint = {
      version: 1,
      lastIndex: state.lastProcessedIndex,
      processedCount: state.processedCount,
      errorCount: state.errorCount,
      startTime: state.startTime,
      createdAt: createdAt.toISOString(),
      table,
    }
    // Serialized before the first await so later row writes cannot leak into the snapshot
    const payload = JSON.stringify(checkpoint, null, 2)

    const epoch = String(createdAt.getTime()).padStart(13, "0")
    const stem = `${epoch}-${nextSequence()}-${state.lastProcessedIndex}`
    const fileName = `${CHECKPOINT_FILE_PREFIX}${stem}${CHECKPOINT_FILE_SUFFIX}`
    const filePath = path.join(this.directory, fileName)
    const tempPath = `${filePath}.tmp`

    await fs.mkdir(this.directory, { recursive: true })
    try {
      await fs.writeFile(tempPath, payload)
      await fs.rename(tempPath, filePath)
    } catch (error) {
      await fs.rm(tempPath, { force: true })
      throw error
    }
    log.info({ filePath, lastIndex: checkpoint.lastIndex }, "Checkpoint saved")

    await this.prune()
    return filePath
  }

  /**
   * List checkpoint files, newest first (by modification time, then name).
   */
  async list(): Promise<CheckpointFileInfo[]> {
    let names: string[]
    try {
      names = await fs.readdir(this.directory)
    } catch (error) {
      if (isMissingError(error)) return []
      throw error
    }

    const files: CheckpointFileInfo[] = []
    for (const name of names.filter(isCheckpointFileName)) {
      const filePath = path.join(this.directory, name)
      try {
        const stats = await fs.stat(filePath)
        files.push({ filePath, mtimeMs: stats.mtimeMs })
      } catch (error) {
        // Pruned by a concurrent save between readdir and stat
        if (!isMissingError(error)) throw error
      }
    }

    return files.sort((a, b) => b.mtimeMs - a.mtimeMs || b.filePath.localeCompare(a.filePath))
  }

  /**
   * Load the newest checkpoint.
   *
   * @returns null when there is no checkpoint directory or it holds no checkpoints
   * @throws CheckpointLoadError if the newest checkpoint cannot be read or fails validation.
   *   Older checkpoints are not tried.
   */
  async loadLatest(): Promise<LoadedCheckpoint | null> {
    const [latest] = await this.list()
    if (!latest) return null

    let raw: unknown
    try {
      raw = JSON.parse(await fs.readFile(latest.filePath, "utf-8"))
    } catch (error) {
      throw new CheckpointLoadError(latest.filePath, { cause: error })
    }

    const result = CheckpointSchema.safeParse(raw)
    if (!result.success) {
      throw new CheckpointLoadError(latest.filePath, {
        cause: new Error(result.error.issues.map((issue) => issue.message).join("; ")),
      })
    }

    log.info({ filePath: latest.filePath, lastIndex: result.data.lastIndex }, "Loaded checkpoint")
    return { ...result.data, filePath: latest.filePath }
  }

  /**
   * Delete every checkpoint (and any leftover partial write).
   *
   * @returns Number of checkpoints deleted
   */
  async clear(): Promise<number> {
    const files = await this.list()
    for (const file of files) {
      await fs.rm(file.filePath, { force: true })
    }

    let names: string[] = []
    try {
      names = await fs.readdir(this.directory)
    } catch (error) {
      if (!isMissingError(error)) throw error
    }
    for (const name of names) {
      const isPartialWrite =
        name.startsWith(CHECKPOINT_FILE_PREFIX) && name.endsWith(`${CHECKPOINT_FILE_SUFFIX}.tmp`)
      if (isPartialWrite) {
        await fs.rm(path.join(this.directory, name), { force: true })
      }
    }

    return files.length
  }

  private async prune(): Promise<void> {
    try {
      const files = await this.list()
      for (const file of files.slice(this.keepLast)) {
        await fs.rm(file.filePath, { force: true })
        log.debug({ filePath: file.filePath }, "Removed old checkpoint")
      }
    } catch (error) {
      log.warn({ error }, "Failed to prune old checkpoints")
    }
  }
}
