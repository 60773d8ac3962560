/**
 * Delimited-text reading for the archive's CSV files
 * Semicolon-delimited, Latin-1 encoded, header row present
 */

import { parse } from 'csv-parse/sync'
import { CSVParsingError } from '../errors'
import { normalizeHeader } from './column-mapping'

export type CsvRow = Record<string, string>

export interface ParsedTable {
  /** Normalized header names, in column order */
  headers: string[]
  rows: CsvRow[]
}

export interface ParseDelimitedOptions {
  delimiter?: string
  encoding?: BufferEncoding
  /** Used in error messages only */
  filename?: string
}

function toRow(record: unknown): CsvRow | null {
  if (typeof record !== 'object' || record === null || Array.isArray(record)) {
    return null
  }

  const row: CsvRow = {}
  for (const [key, value] of Object.entries(record)) {
    if (typeof value === 'string') {
      row[key] = value
    }
  }
  return row
}

/**
 * Parse a delimited file into rows keyed by normalized (trimmed, uppercased) header
 *
 * Rows with more fields than the header are skipped; rows with fewer fields
 * are kept with the trailing columns absent.
 */
export function parseDelimited(input: Buffer | string, options: ParseDelimitedOptions = {}): ParsedTable {
  let headers: string[] = []
  let records: unknown
  try {
    records = parse(input, {
      delimiter: options.delimiter ?? ';',
      encoding: options.encoding ?? 'latin1',
      columns: (header: string[]) => {
        headers = header.map(normalizeHeader)
        return headers
      },
      skip_empty_lines: true,
      relax_quotes: true,
      relax_column_count_less: true,
      skip_records_with_error: true,
    })
  } catch (error) {
    throw new CSVParsingError(
      error instanceof Error ? error.message : String(error),
      options.filename
    )
  }

  if (!Array.isArray(records)) {
    throw new CSVParsingError('Parser did not return a list of records', options.filename)
  }

  const rows: CsvRow[] = []
  for (const record of records) {
    const row = toRow(record)
    if (row) rows.push(row)
  }
  return { headers, rows }
}
