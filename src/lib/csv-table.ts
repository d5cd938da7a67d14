/**
 * CSV-backed table source and sink.
 *
 * Empty cells are read as null and nulls are written as empty cells, so an
 * unclassified row round-trips unchanged.
 */

import fs from "fs"
import path from "path"
import csv from "csv-parser"
import { stringify } from "csv-stringify/sync"
import { TableReadError } from "./errors.js"
import {
  findMissingColumns,
  type TableRow,
  type TableSink,
  type TableSource,
  type TicketTable,
} from "./ticket-table.js"

/**
 * Parse CSV rows from a readable stream, keeping header order.
 */
export async function readCsvTable(input: NodeJS.ReadableStream): Promise<TicketTable> {
  const columns: string[] = []
  const rows: TableRow[] = []

  await new Promise<void>((resolve, reject) => {
    input
      .on("error", reject)
      // Spreadsheet exports often start with a byte order mark
      .pipe(csv({ mapHeaders: ({ header }) => header.replace(/^\uFEFF/, "").trim() }))
      .on("headers", (headers: string[]) => columns.push(...headers))
      .on("data", (record: Record<string, string>) => {
        const row: TableRow = {}
        for (const column of columns) {
          const value = record[column]
          row[column] = value === undefined || value === "" ? null : value
        }
        rows.push(row)
      })
      .on("end", resolve)
      .on("error", reject)
  })

  return { columns, rows }
}

/**
 * Serialize a table to CSV text with a header row.
 */
export function tableToCsv(table: TicketTable): string {
  const records = table.rows.map((row) => table.columns.map((column) => row[column] ?? ""))
  return stringify(records, { header: true, columns: table.columns })
}

/**
 * A CSV file used as both source and sink.
 */
export class CsvTableFile implements TableSource, TableSink {
  readonly filePath: string

  constructor(filePath: string) {
    this.filePath = filePath
  }

  get description(): string {
    return this.filePath
  }

  exists(): boolean {
    return fs.existsSync(this.filePath)
  }

  /**
   * @throws TableReadError if the file is missing, unreadable or lacks the ticket columns
   */
  async read(): Promise<TicketTable> {
    let table: TicketTable
    try {
      table = await readCsvTable(fs.createReadStream(this.filePath))
    } catch (error) {
      throw new TableReadError(`Could not read input table ${this.filePath}`, { cause: error })
    }

    const missing = findMissingColumns(table)
    if (missing.length > 0) {
      throw new TableReadError(
        `Input table ${this.filePath} is missing required column(s): ${missing.join(", ")}`
      )
    }
    return table
  }

  async write(table: TicketTable): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true })
    await fs.promises.writeFile(this.filePath, tableToCsv(table))
  }
}
