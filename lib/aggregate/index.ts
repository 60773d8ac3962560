/**
 * Expense aggregation per operator and region
 */

import type { AggregatedStatistic, ConsolidatedRecord } from '../types/records'

interface Group {
  legalName: string
  regionCode: string
  values: number[]
}

/**
 * Sample standard deviation (n - 1 denominator)
 * A single value has no spread to estimate and yields 0
 */
export function sampleStdDev(values: readonly number[], mean: number): number {
  if (values.length < 2) return 0

  let squares = 0
  for (const value of values) {
    squares += (value - mean) ** 2
  }
  return Math.sqrt(squares / (values.length - 1))
}

function groupKey(record: ConsolidatedRecord): string {
  return JSON.stringify([record.legalName, record.regionCode])
}

/**
 * Group records by (legal name, region) and compute total, mean and standard deviation
 *
 * @returns Statistics sorted by total, largest first; groups with equal
 * totals keep the order in which they were first encountered
 */
export function aggregate(records: Iterable<ConsolidatedRecord>): AggregatedStatistic[] {
  const groups = new Map<string, Group>()

  for (const record of records) {
    const key = groupKey(record)
    let group = groups.get(key)
    if (!group) {
      group = { legalName: record.legalName, regionCode: record.regionCode, values: [] }
      groups.set(key, group)
    }
    group.values.push(record.numericValue)
  }

  const statistics: AggregatedStatistic[] = []
  for (const group of groups.values()) {
    const total = group.values.reduce((sum, value) => sum + value, 0)
    const mean = total / group.values.length

    statistics.push({
      legalName: group.legalName,
      regionCode: group.regionCode,
      total,
      mean,
      stdDev: sampleStdDev(group.values, mean),
      count: group.values.length,
    })
  }

  // Array.prototype.sort is stable
  return statistics.sort((a, b) => b.total - a.total)
}
