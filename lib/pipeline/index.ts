/**
 * Full-refresh pipeline
 *
 * registry -> archive retrieval -> transformation -> aggregation -> outputs
 *
 * Per-item failures are skipped where they happen; only two conditions abort
 * the run (nothing retrieved, nothing surviving transformation), and neither
 * writes any output.
 */

import { loadRegistry } from '../registry'
import { retrieveRecent } from '../archive'
import { transformFile } from '../transform'
import { aggregate } from '../aggregate'
import { writeOutputs, type OutputPaths } from '../output'
import { PipelineError, toError } from '../errors'
import type { PipelineConfig } from '../config'
import type { FetchLike } from '../http'
import type { RegistryMap } from '../types/registry'
import type { RetrievedFile } from '../types/archive'
import type { ConsolidatedRecord, TransformStats } from '../types/records'

export interface PipelineDeps {
  fetch?: FetchLike
}

export interface PipelineResult {
  registryEntries: number
  files: RetrievedFile[]
  fileStats: TransformStats[]
  consolidatedRows: number
  aggregatedGroups: number
  /** Share of consolidated rows whose taxpayer id passes the checksum (0..1) */
  taxpayerIdValidRate: number
  outputs: OutputPaths
}

/**
 * Load the registry, degrading to an empty lookup on any failure
 */
async function loadRegistryOrEmpty(config: PipelineConfig, deps: PipelineDeps): Promise<RegistryMap> {
  try {
    return await loadRegistry({
      directoryUrl: config.registryDirectoryUrl,
      listingTimeoutMs: config.listingTimeoutMs,
      downloadTimeoutMs: config.downloadTimeoutMs,
      userAgent: config.userAgent,
      fetch: deps.fetch,
    })
  } catch (error) {
    console.warn(`   ⚠️  Registry unavailable, continuing without enrichment: ${toError(error).message}`)
    return new Map()
  }
}

export async function runPipeline(config: PipelineConfig, deps: PipelineDeps = {}): Promise<PipelineResult> {
  // Step 1: registry lookup
  const registry = await loadRegistryOrEmpty(config, deps)

  // Step 2: statement archives
  const files = await retrieveRecent({
    rootUrl: config.statementsRootUrl,
    dataDir: config.dataDir,
    maxPeriods: config.maxPeriods,
    maxFiles: config.maxFiles,
    listingTimeoutMs: config.listingTimeoutMs,
    downloadTimeoutMs: config.downloadTimeoutMs,
    userAgent: config.userAgent,
    fetch: deps.fetch,
  })

  if (files.length === 0) {
    throw new PipelineError('No data files were retrieved', 'retrieval')
  }

  // Step 3: transformation
  console.log('⚙️  Transforming statements...')
  const consolidated: ConsolidatedRecord[] = []
  const fileStats: TransformStats[] = []

  for (const file of files) {
    const { records, stats } = await transformFile(file.localPath, registry)
    fileStats.push(stats)

    if (stats.skipped === 'no-value-column') {
      console.log(`   ℹ️  ${stats.file}: no value column, not a statement file`)
    } else if (!stats.skipped) {
      console.log(
        `   ✓ ${stats.file}: ${stats.emitted.toLocaleString()} of ${stats.rowsRead.toLocaleString()} rows kept ` +
          `(${stats.unmatched.toLocaleString()} unmatched, ${stats.nonPositive.toLocaleString()} non-positive)`
      )
    }

    for (const record of records) {
      consolidated.push(record)
    }
  }

  if (consolidated.length === 0) {
    throw new PipelineError('No records survived transformation', 'transformation')
  }

  // Step 4: aggregation and outputs
  console.log('📊 Aggregating...')
  const statistics = aggregate(consolidated)

  console.log('💾 Writing outputs...')
  let outputs: OutputPaths
  try {
    outputs = await writeOutputs(consolidated, statistics, config.dataDir)
  } catch (error) {
    throw new PipelineError(`Failed to write outputs: ${toError(error).message}`, 'output')
  }

  const validIds = consolidated.filter((record) => record.taxpayerIdValid).length

  return {
    registryEntries: registry.size,
    files,
    fileStats,
    consolidatedRows: consolidated.length,
    aggregatedGroups: statistics.length,
    taxpayerIdValidRate: validIds / consolidated.length,
    outputs,
  }
}
