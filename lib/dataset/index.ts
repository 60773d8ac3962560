/**
 * Reader for the aggregated dataset, as consumed by the serving layer
 *
 * A missing file means the pipeline has not run yet: callers get placeholder
 * rows flagged as such. Numeric cells that are not finite numbers read as 0,
 * since JSON transport cannot carry NaN.
 */

import { readFile } from 'fs/promises'
import { parseDelimited, type CsvRow } from '../utils/csv'
import { ValidationError } from '../errors'

export interface DatasetRow {
  legalName: string
  regionCode: string
  total: number
  mean: number
  stdDev: number
}

export interface AggregatedDataset {
  /** true when the rows are stand-ins for a dataset that does not exist yet */
  placeholder: boolean
  rows: DatasetRow[]
}

export const PLACEHOLDER_ROWS: readonly DatasetRow[] = [
  { legalName: 'OPERADORA EXEMPLO (PLACEHOLDER) A', regionCode: 'RJ', total: 900000, mean: 300000, stdDev: 0 },
  { legalName: 'OPERADORA EXEMPLO (PLACEHOLDER) B', regionCode: 'SP', total: 500000, mean: 250000, stdDev: 0 },
]

/**
 * Numeric cell, with anything non-finite replaced by 0
 */
export function safeNumber(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') return 0
  const value = Number(raw)
  return Number.isFinite(value) ? value : 0
}

function toDatasetRow(row: CsvRow): DatasetRow {
  return {
    legalName: row.RAZAO_SOCIAL ?? '',
    regionCode: row.UF ?? '',
    total: safeNumber(row.TOTAL_DESPESAS),
    mean: safeNumber(row.MEDIA_TRIMESTRAL),
    stdDev: safeNumber(row.DESVIO_PADRAO),
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * Read the aggregated CSV written by the pipeline
 */
export async function readAggregatedDataset(path: string): Promise<AggregatedDataset> {
  let content: Buffer
  try {
    content = await readFile(path)
  } catch (error) {
    if (isMissingFile(error)) {
      return { placeholder: true, rows: PLACEHOLDER_ROWS.map((row) => ({ ...row })) }
    }
    throw error
  }

  const { rows } = parseDelimited(content, { delimiter: ',', encoding: 'utf8', filename: path })
  return { placeholder: false, rows: rows.map(toDatasetRow) }
}

export interface RegionTotal {
  regionCode: string
  total: number
}

export interface DatasetSummary {
  grandTotal: number
  /** Largest first */
  byRegion: RegionTotal[]
}

/**
 * Grand total and per-region totals
 */
export function summarizeByRegion(rows: readonly DatasetRow[]): DatasetSummary {
  const totals = new Map<string, number>()
  let grandTotal = 0

  for (const row of rows) {
    grandTotal += row.total
    totals.set(row.regionCode, (totals.get(row.regionCode) ?? 0) + row.total)
  }

  const byRegion = [...totals.entries()]
    .map(([regionCode, total]) => ({ regionCode, total }))
    .sort((a, b) => b.total - a.total)

  return { grandTotal, byRegion }
}

export interface SearchOptions {
  /** Case-insensitive substring of the legal name */
  search?: string
  page?: number
  limit?: number
}

export interface SearchResult {
  data: DatasetRow[]
  meta: {
    total: number
    page: number
    limit: number
    pagesTotal: number
  }
}

/**
 * Filter by legal name and return one page
 */
export function searchDataset(rows: readonly DatasetRow[], options: SearchOptions = {}): SearchResult {
  const page = options.page ?? 1
  const limit = options.limit ?? 10

  if (!Number.isInteger(page) || page < 1) {
    throw new ValidationError(`page must be an integer >= 1, got: ${page}`)
  }
  if (!Number.isInteger(limit) || limit < 1 || limit > 100) {
    throw new ValidationError(`limit must be an integer between 1 and 100, got: ${limit}`)
  }

  const term = options.search?.trim().toLowerCase()
  const matches = term ? rows.filter((row) => row.legalName.toLowerCase().includes(term)) : [...rows]
  const start = (page - 1) * limit

  return {
    data: matches.slice(start, start + limit),
    meta: {
      total: matches.length,
      page,
      limit,
      pagesTotal: Math.ceil(matches.length / limit),
    },
  }
}
