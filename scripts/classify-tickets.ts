#!/usr/bin/env node
/**
 * Classify support tickets into service category, request type and priority.
 *
 * Runs resume from the newest checkpoint unless --fresh is given. Ctrl-C stops
 * after the current wave; progress up to the last checkpoint is kept.
 *
 * Usage:
 *   npm run classify -- process                      # Resume or start a run
 *   npm run classify -- process --fresh              # Ignore checkpoints
 *   npm run classify -- process --parallel-requests 8 --batch-size 16
 *   npm run classify -- save                         # Snapshot current results
 *   npm run classify -- cleanup --yes                # Delete checkpoints and logs
 *   npm run classify -- version
 */

import "dotenv/config"
import path from "path"
import * as readline from "readline"
import { Command, InvalidArgumentError } from "commander"
import { CheckpointStore } from "../src/lib/checkpoint-store.js"
import { CLIStatusBar } from "../src/lib/cli-status-bar.js"
import { loadConfig, type ClassifierConfig } from "../src/lib/config.js"
import { CsvTableFile } from "../src/lib/csv-table.js"
import { getErrorMessage } from "../src/lib/errors.js"
import { logFilePath, logger } from "../src/lib/logger.js"
import {
  deleteFiles,
  findLogFiles,
  processTickets,
  saveCurrentResults,
} from "../src/lib/ticket-run.js"

export const TOOL_VERSION = "1.0.0"

export function parsePositiveInt(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError("Must be a positive integer")
  }
  const parsed = parseInt(value, 10)
  if (parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer")
  }
  return parsed
}

export interface ProcessCommandOptions {
  fresh?: boolean
  batchSize?: number
  parallelRequests?: number
  checkpointInterval?: number
  statusBar: boolean
}

/**
 * Apply command-line overrides on top of the environment configuration.
 */
export function applyOverrides(
  config: ClassifierConfig,
  options: Omit<ProcessCommandOptions, "statusBar">
): ClassifierConfig {
  return {
    ...config,
    parallelBatchSize: options.batchSize ?? config.parallelBatchSize,
    parallelRequests: options.parallelRequests ?? config.parallelRequests,
    checkpointInterval: options.checkpointInterval ?? config.checkpointInterval,
  }
}

export function isAffirmative(answer: string): boolean {
  return /^y(es)?$/i.test(answer.trim())
}

async function confirm(question: string, assumeYes: boolean): Promise<boolean> {
  if (assumeYes) return true
  if (!process.stdin.isTTY) {
    console.log(`${question} (not a TTY; pass --yes to confirm)`)
    return false
  }
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout })
  return new Promise((resolve) => {
    rl.question(`${question} [y/N] `, (answer) => {
      rl.close()
      resolve(isAffirmative(answer))
    })
  })
}

/**
 * Abort the run on SIGINT/SIGTERM. If it has not wound down within the grace
 * period the process exits with status 1; a second signal exits at once.
 *
 * @returns Function removing the handlers
 */
function installShutdownHandlers(controller: AbortController, graceMs: number): () => void {
  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      logger.warn({ signal }, "Second signal received, exiting immediately")
      process.exit(1)
    }
    logger.warn({ signal, graceMs }, "Shutdown requested, stopping after in-flight tickets")
    controller.abort()
    setTimeout(() => {
      logger.error({ graceMs }, "Shutdown grace period elapsed, forcing exit")
      process.exit(1)
    }, graceMs).unref()
  }

  process.on("SIGINT", onSignal)
  process.on("SIGTERM", onSignal)
  return () => {
    process.off("SIGINT", onSignal)
    process.off("SIGTERM", onSignal)
  }
}

async function runProcess(options: ProcessCommandOptions): Promise<void> {
  const config = applyOverrides(loadConfig(), options)
  logger.info(
    {
      model: config.modelVersion,
      parallelRequests: config.parallelRequests,
      parallelBatchSize: config.parallelBatchSize,
      checkpointInterval: config.checkpointInterval,
      fresh: options.fresh ?? false,
    },
    "Starting ticket classification"
  )

  const controller = new AbortController()
  const removeHandlers = installShutdownHandlers(controller, config.shutdownGraceMs)
  const display: { bar: CLIStatusBar | null } = { bar: null }

  try {
    const result = await processTickets(config, {
      fresh: options.fresh,
      signal: controller.signal,
      onStart: (run) => {
        display.bar = new CLIStatusBar(
          {
            totalItems: run.table.rows.length,
            itemLabel: "tickets",
            mode: run.resumedFrom ? "resumed" : undefined,
          },
          options.statusBar
        )
        display.bar.start()
      },
      onProgress: (stats) => display.bar?.update(stats),
    })
    display.bar?.stop()

    if (result.exitReason === "interrupted") {
      logger.warn(
        { processedCount: result.stats.processedCount },
        "Processing interrupted. Progress up to the latest checkpoint is kept; run `process` again to resume."
      )
      process.exit(1)
    }
    console.log(`\nResults written to ${result.outputDestination}`)
  } finally {
    display.bar?.stop()
    removeHandlers()
  }
}

async function runCleanup(options: { yes?: boolean }): Promise<void> {
  const config = loadConfig()
  const assumeYes = options.yes ?? false

  const store = new CheckpointStore(config.checkpointDir)
  const checkpoints = await store.list()
  if (checkpoints.length === 0) {
    console.log("No checkpoints found.")
  } else if (await confirm(`Found ${checkpoints.length} checkpoints. Delete all?`, assumeYes)) {
    const deleted = await store.clear()
    console.log(`Deleted ${deleted} checkpoint(s).`)
  }

  // The file this command is logging to stays open until exit
  const logFiles = findLogFiles(config.logDir, logFilePath)
  if (logFiles.length === 0) {
    console.log("No log files found.")
  } else if (await confirm(`Found ${logFiles.length} log files. Delete all?`, assumeYes)) {
    const deleted = deleteFiles(logFiles)
    console.log(`Deleted ${deleted} log file(s).`)
  }
}

async function runSave(): Promise<void> {
  const config = loadConfig()
  const outcome = await saveCurrentResults({
    checkpoints: new CheckpointStore(config.checkpointDir),
    source: new CsvTableFile(config.inputFile),
    outputDir: config.outputDir,
  })

  if (!outcome.saved) {
    console.error(`Could not generate results: ${outcome.reason}.`)
    process.exit(1)
  }
  console.log(`Results saved to ${outcome.outputPath} (source: ${outcome.source})`)
}

function runVersion(): void {
  const config = loadConfig()
  console.log(`Ticket Classifier v${TOOL_VERSION}`)
  console.log(`Using OpenAI Model: ${config.modelVersion}`)
  console.log(`Parallel Processing: ${config.parallelRequests} concurrent tickets`)
}

/**
 * Run a command action; any error is fatal.
 */
async function runCommand(command: string, action: () => Promise<void> | void): Promise<void> {
  try {
    await action()
  } catch (error) {
    logger.fatal({ command, error: getErrorMessage(error) }, `${command} failed`)
    process.exit(1)
  }
}

// CLI setup
export const program = new Command()
  .name("classify-tickets")
  .description("Classify support tickets with an LLM, with checkpointed resumable runs")
  .version(TOOL_VERSION)

program
  .command("process")
  .description("Classify tickets, resuming from the latest checkpoint")
  .option("--fresh", "Ignore checkpoints and start from the first ticket")
  .option("--batch-size <number>", "Tickets per wave", parsePositiveInt)
  .option("--parallel-requests <number>", "Maximum concurrent classifications", parsePositiveInt)
  .option(
    "--checkpoint-interval <number>",
    "Completed tickets between checkpoints",
    parsePositiveInt
  )
  .option("--no-status-bar", "Disable the terminal status bar")
  .action(async (options: ProcessCommandOptions) => {
    await runCommand("process", () => runProcess(options))
  })

program
  .command("cleanup")
  .description("Delete all checkpoints and log files")
  .option("-y, --yes", "Delete without asking for confirmation")
  .action(async (options: { yes?: boolean }) => {
    await runCommand("cleanup", () => runCleanup(options))
  })

program
  .command("save")
  .description("Write the current results to a timestamped CSV in the output directory")
  .action(async () => {
    await runCommand("save", runSave)
  })

program
  .command("version")
  .description("Display version information")
  .action(async () => {
    await runCommand("version", runVersion)
  })

// Only run when executed directly, not when imported for testing
const isMainModule =
  import.meta.url === `file://${process.argv[1]}` ||
  path.basename(process.argv[1] ?? "").startsWith("classify-tickets")

if (isMainModule) {
  program.parseAsync().catch((error: unknown) => {
    logger.fatal({ error: getErrorMessage(error) }, "Unexpected error")
    process.exit(1)
  })
}
