/**
 * Statement transformation
 * Parses an extracted accounting file, normalizes values, joins each row with
 * the operator registry and keeps the rows that belong in the expense analysis
 */

import { readFile } from 'fs/promises'
import { basename } from 'path'
import { parseDelimited, type CsvRow } from '../utils/csv'
import { renameAccountingColumn } from '../utils/column-mapping'
import { parseLocaleNumber, tryParseLocaleNumber } from '../utils/number'
import { isValidTaxpayerId } from '../validation/taxpayer-id'
import { toError } from '../errors'
import type { RegistryEntry, RegistryMap } from '../types/registry'
import type {
  ConsolidatedRecord,
  EnrichedRecord,
  RawAccountingRecord,
  TransformResult,
  TransformStats,
} from '../types/records'

type MatchedRecord = EnrichedRecord & { registry: RegistryEntry }

function emptyStats(file: string): TransformStats {
  return {
    file,
    rowsRead: 0,
    unmatched: 0,
    nonPositive: 0,
    unparseableValues: 0,
    invalidTaxpayerIds: 0,
    emitted: 0,
  }
}

/**
 * Map a source row, already keyed by logical column names, to a raw record
 */
function toRawRecord(row: CsvRow): RawAccountingRecord {
  return {
    registrationId: row.registrationId ?? '',
    accountCode: row.accountCode ?? null,
    rawValue: row.value ?? null,
    period: row.period ?? null,
  }
}

function renameColumns(row: CsvRow): CsvRow {
  const renamed: CsvRow = {}
  for (const [header, value] of Object.entries(row)) {
    renamed[renameAccountingColumn(header)] = value
  }
  return renamed
}

/**
 * Join a raw record with the registry
 * The taxpayer id is only checked for matched records
 */
export function enrichRecord(raw: RawAccountingRecord, registry: RegistryMap): EnrichedRecord {
  const entry = registry.get(raw.registrationId.trim()) ?? null

  return {
    raw,
    registry: entry,
    numericValue: parseLocaleNumber(raw.rawValue),
    taxpayerIdValid: entry ? isValidTaxpayerId(entry.taxpayerId) : false,
  }
}

function toConsolidated(record: MatchedRecord): ConsolidatedRecord {
  return {
    taxpayerId: record.registry.taxpayerId,
    legalName: record.registry.legalName,
    registrationId: record.raw.registrationId.trim(),
    category: record.registry.category,
    regionCode: record.registry.regionCode,
    numericValue: record.numericValue,
    taxpayerIdValid: record.taxpayerIdValid,
  }
}

function isMatched(record: EnrichedRecord): record is MatchedRecord {
  return record.registry !== null
}

/**
 * Transform parsed rows of one statement file
 *
 * Filters, in order: records without a registry match, then records whose
 * value is not strictly positive.
 */
export function transformRows(
  headers: readonly string[],
  rows: CsvRow[],
  registry: RegistryMap,
  file: string = 'statement'
): TransformResult {
  const stats = emptyStats(file)
  const logicalHeaders = headers.map(renameAccountingColumn)

  if (!logicalHeaders.includes('value')) {
    return { records: [], stats: { ...stats, skipped: 'no-value-column' } }
  }
  if (!logicalHeaders.includes('registrationId')) {
    console.warn(`   ⚠️  ${file}: value column without a registration column`)
    return { records: [], stats: { ...stats, skipped: 'parse-failure' } }
  }

  const records: ConsolidatedRecord[] = []

  for (const row of rows) {
    stats.rowsRead++

    const raw = toRawRecord(renameColumns(row))
    const enriched = enrichRecord(raw, registry)

    if (tryParseLocaleNumber(raw.rawValue) === null) {
      stats.unparseableValues++
    }

    if (!isMatched(enriched)) {
      stats.unmatched++
      continue
    }
    if (enriched.numericValue <= 0) {
      stats.nonPositive++
      continue
    }

    if (!enriched.taxpayerIdValid) {
      stats.invalidTaxpayerIds++
    }
    records.push(toConsolidated(enriched))
  }

  stats.emitted = records.length
  return { records, stats }
}

/**
 * Transform one extracted statement file
 * An unreadable file yields no records rather than an error
 */
export async function transformFile(path: string, registry: RegistryMap): Promise<TransformResult> {
  const file = basename(path)

  try {
    const content = await readFile(path)
    const { headers, rows } = parseDelimited(content, { filename: file })
    return transformRows(headers, rows, registry, file)
  } catch (error) {
    console.warn(`   ⚠️  Could not process ${file}: ${toError(error).message}`)
    return { records: [], stats: { ...emptyStats(file), skipped: 'parse-failure' } }
  }
}
