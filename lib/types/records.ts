/**
 * Accounting record types, from raw source row to aggregated statistic
 */

import type { RegistryEntry } from './registry'

/**
 * One row of an extracted accounting statement
 */
export interface RawAccountingRecord {
  registrationId: string
  accountCode: string | null
  /** Locale-formatted number, e.g. "1.234,56" */
  rawValue: string | null
  period: string | null
}

/**
 * Raw record joined with the registry
 */
export interface EnrichedRecord {
  raw: RawAccountingRecord
  /** null when the registration id has no registry entry */
  registry: RegistryEntry | null
  numericValue: number
  /** false for unmatched records */
  taxpayerIdValid: boolean
}

/**
 * Record kept for aggregation and written to the consolidated output
 */
export interface ConsolidatedRecord {
  taxpayerId: string
  legalName: string
  registrationId: string
  category: string | null
  regionCode: string
  numericValue: number
  /** Data-quality flag; not an output column */
  taxpayerIdValid: boolean
}

/**
 * Statistics of one (legal name, region) group
 */
export interface AggregatedStatistic {
  legalName: string
  regionCode: string
  total: number
  mean: number
  /** Sample standard deviation; 0 for single-member groups */
  stdDev: number
  count: number
}

/**
 * Why a file produced no records
 */
export type TransformSkipReason = 'no-value-column' | 'parse-failure'

export interface TransformStats {
  file: string
  rowsRead: number
  unmatched: number
  nonPositive: number
  unparseableValues: number
  /** Among emitted records */
  invalidTaxpayerIds: number
  emitted: number
  skipped?: TransformSkipReason
}

export interface TransformResult {
  records: ConsolidatedRecord[]
  stats: TransformStats
}
