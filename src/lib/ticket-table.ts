/**
 * In-memory ticket table and the source/sink seams around it.
 *
 * Rows are addressed by index; the scheduler hands each concurrent task a
 * distinct index so cell writes never overlap.
 */

import type { ClassificationResult, CompleteClassification } from "./classification/types.js"

export const TITLE_COLUMN = "Ticket_Title"
export const SUMMARY_COLUMN = "Ticket_Summary"
export const CATEGORY_COLUMN = "New_Service_Category"
export const REQUEST_TYPE_COLUMN = "New_Service_Request_Type"
export const PRIORITY_COLUMN = "Priority"

export const REQUIRED_COLUMNS = [TITLE_COLUMN, SUMMARY_COLUMN] as const
export const OUTPUT_COLUMNS = [CATEGORY_COLUMN, REQUEST_TYPE_COLUMN, PRIORITY_COLUMN] as const

export type TableRow = Record<string, string | null>

export interface TicketTable {
  /** Column order, preserved on output */
  columns: string[]
  rows: TableRow[]
}

export interface TicketInput {
  title: string
  summary: string
}

/** Where the input table comes from */
export interface TableSource {
  readonly description: string
  exists(): boolean
  read(): Promise<TicketTable>
}

/** Where the finished table goes */
export interface TableSink {
  readonly description: string
  write(table: TicketTable): Promise<void>
}

/**
 * Append any missing output column, defaulting every row's cell to null.
 * Existing columns (and their values) are left alone.
 */
export function ensureOutputColumns(table: TicketTable): TicketTable {
  for (const column of OUTPUT_COLUMNS) {
    if (!table.columns.includes(column)) {
      table.columns.push(column)
    }
    for (const row of table.rows) {
      if (!(column in row)) {
        row[column] = null
      }
    }
  }
  return table
}

/**
 * Return the names of required input columns the table lacks.
 */
export function findMissingColumns(table: TicketTable): string[] {
  return REQUIRED_COLUMNS.filter((column) => !table.columns.includes(column))
}

export function getTicket(table: TicketTable, index: number): TicketInput {
  const row = table.rows[index]
  if (!row) {
    throw new RangeError(`Row ${index} is outside the table (${table.rows.length} rows)`)
  }
  return {
    title: row[TITLE_COLUMN] ?? "",
    summary: row[SUMMARY_COLUMN] ?? "",
  }
}

/**
 * Write a classification outcome into a row. A partial result is stored as
 * all nulls so no half-populated row survives.
 */
export function writeClassification(
  table: TicketTable,
  index: number,
  result: ClassificationResult | null
): void {
  const row = table.rows[index]
  if (!row) {
    throw new RangeError(`Row ${index} is outside the table (${table.rows.length} rows)`)
  }
  if (result !== null && isCompleteResult(result)) {
    row[CATEGORY_COLUMN] = result.category
    row[REQUEST_TYPE_COLUMN] = result.requestType
    row[PRIORITY_COLUMN] = result.priority
    return
  }
  row[CATEGORY_COLUMN] = null
  row[REQUEST_TYPE_COLUMN] = null
  row[PRIORITY_COLUMN] = null
}

export function isCompleteResult(result: ClassificationResult): result is CompleteClassification {
  return result.category !== null && result.requestType !== null && result.priority !== null
}

/**
 * Deep copy a table so a snapshot cannot be mutated by later row writes.
 */
export function cloneTable(table: TicketTable): TicketTable {
  return {
    columns: [...table.columns],
    rows: table.rows.map((row) => ({ ...row })),
  }
}
