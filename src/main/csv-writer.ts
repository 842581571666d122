import * as fs from 'node:fs/promises'
import * as path from 'node:path'

import type { FeatureValue } from '../shared/types'

// ─── Error Types ──────────────────────────────────────────────

export class CsvWriterError extends Error {
  public readonly code: string
  public override readonly cause?: unknown

  constructor(message: string, code: string, cause?: unknown) {
    super(message)
    this.name = 'CsvWriterError'
    this.code = code
    this.cause = cause
  }
}

// ─── Types ────────────────────────────────────────────────────

export type CsvRow = Readonly<Record<string, FeatureValue>>

export interface CsvWriteResult {
  finalPath: string
  rowsWritten: number
}

// ─── Formatting ───────────────────────────────────────────────

const NEEDS_QUOTING = /[",\r\n]/

/**
 * Format a single cell. Null is written as an empty field; booleans as
 * `true` / `false`; fields containing a comma, quote, CR or LF are quoted
 * with embedded quotes doubled.
 */
export function formatCell(value: FeatureValue | undefined): string {
  if (value === null || value === undefined) return ''
  const text = String(value)
  return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text
}

export function formatRow(columns: readonly string[], row: CsvRow): string {
  return columns.map(c => formatCell(row[c])).join(',')
}

/** Render header plus rows, CRLF-terminated like most CSV dialects. */
export function renderCsv(columns: readonly string[], rows: readonly CsvRow[]): string {
  const lines = [columns.map(c => formatCell(c)).join(','), ...rows.map(r => formatRow(columns, r))]
  return lines.map(l => `${l}\r\n`).join('')
}

/**
 * Write a CSV file, creating the parent directory as needed.
 *
 * @throws {CsvWriterError} If the directory or file cannot be written.
 */
export async function writeCsv(
  filePath: string,
  columns: readonly string[],
  rows: readonly CsvRow[]
): Promise<CsvWriteResult> {
  const finalPath = path.resolve(filePath)

  try {
    await fs.mkdir(path.dirname(finalPath), { recursive: true })
  } catch (err) {
    throw new CsvWriterError(
      `Failed to create output directory "${path.dirname(finalPath)}"`,
      'MKDIR_FAILED',
      err
    )
  }

  try {
    await fs.writeFile(finalPath, renderCsv(columns, rows), 'utf-8')
  } catch (err) {
    throw new CsvWriterError(`Failed to write "${finalPath}"`, 'WRITE_FAILED', err)
  }

  return { finalPath, rowsWritten: rows.length }
}
