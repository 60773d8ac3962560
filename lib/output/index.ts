/**
 * Pipeline outputs
 *
 * All files are staged beside their targets as "<name>.tmp" and only renamed
 * into place once every one of them has been written, so the targets hold
 * either the previous run's set or the new one.
 */

import archiver from 'archiver'
import { createObjectCsvWriter } from 'csv-writer'
import { createWriteStream } from 'fs'
import { mkdir, rename, rm, stat } from 'fs/promises'
import { basename, join } from 'path'
import type { AggregatedStatistic, ConsolidatedRecord } from '../types/records'

export const CONSOLIDATED_CSV = 'consolidado_despesas.csv'
export const CONSOLIDATED_ZIP = 'consolidado_despesas.zip'
export const AGGREGATED_CSV = 'despesas_agregadas.csv'

/** Written for a registry entry without a category column */
export const UNKNOWN_CATEGORY = 'ND'

export const CONSOLIDATED_HEADER = [
  { id: 'CNPJ', title: 'CNPJ' },
  { id: 'RazaoSocial', title: 'RazaoSocial' },
  { id: 'RegistroANS', title: 'RegistroANS' },
  { id: 'Modalidade', title: 'Modalidade' },
  { id: 'UF', title: 'UF' },
  { id: 'Valor', title: 'Valor' },
]

export const AGGREGATED_HEADER = [
  { id: 'Razao_Social', title: 'Razao_Social' },
  { id: 'UF', title: 'UF' },
  { id: 'Total_Despesas', title: 'Total_Despesas' },
  { id: 'Media_Trimestral', title: 'Media_Trimestral' },
  { id: 'Desvio_Padrao', title: 'Desvio_Padrao' },
]

export interface OutputPaths {
  consolidatedCsv: string
  consolidatedZip: string
  aggregatedCsv: string
}

export function outputPaths(dataDir: string): OutputPaths {
  return {
    consolidatedCsv: join(dataDir, CONSOLIDATED_CSV),
    consolidatedZip: join(dataDir, CONSOLIDATED_ZIP),
    aggregatedCsv: join(dataDir, AGGREGATED_CSV),
  }
}

export async function writeConsolidatedCsv(records: readonly ConsolidatedRecord[], path: string): Promise<void> {
  const writer = createObjectCsvWriter({ path, header: CONSOLIDATED_HEADER })
  await writer.writeRecords(
    records.map((record) => ({
      CNPJ: record.taxpayerId,
      RazaoSocial: record.legalName,
      RegistroANS: record.registrationId,
      Modalidade: record.category ?? UNKNOWN_CATEGORY,
      UF: record.regionCode,
      Valor: record.numericValue,
    }))
  )
}

/**
 * Package the consolidated CSV for distribution
 *
 * @param entryName - Name of the CSV inside the archive, defaults to its file name
 */
export function writeConsolidatedZip(
  csvPath: string,
  zipPath: string,
  entryName: string = basename(csvPath)
): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const output = createWriteStream(zipPath)
    const archive = archiver('zip', { zlib: { level: 9 } })

    output.on('close', () => resolve())
    output.on('error', reject)
    archive.on('error', reject)

    archive.pipe(output)
    archive.file(csvPath, { name: entryName })
    archive.finalize().catch(reject)
  })
}

export async function writeAggregatedCsv(statistics: readonly AggregatedStatistic[], path: string): Promise<void> {
  const writer = createObjectCsvWriter({ path, header: AGGREGATED_HEADER })
  await writer.writeRecords(
    statistics.map((statistic) => ({
      Razao_Social: statistic.legalName,
      UF: statistic.regionCode,
      Total_Despesas: statistic.total,
      Media_Trimestral: statistic.mean,
      Desvio_Padrao: statistic.stdDev,
    }))
  )
}

interface StagedFile {
  path: string
  tmpPath: string
}

function staged(path: string): StagedFile {
  return { path, tmpPath: `${path}.tmp` }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * A target can be replaced by rename when it is absent or a regular file
 */
async function assertReplaceable(path: string): Promise<void> {
  try {
    const stats = await stat(path)
    if (!stats.isFile()) {
      throw new Error(`Cannot replace ${path}: not a regular file`)
    }
  } catch (error) {
    if (isMissingFile(error)) return
    throw error
  }
}

/**
 * Write the consolidated CSV, its ZIP and the aggregated CSV
 * A failure before the renames leaves every target untouched and removes the staged files.
 */
export async function writeOutputs(
  records: readonly ConsolidatedRecord[],
  statistics: readonly AggregatedStatistic[],
  dataDir: string
): Promise<OutputPaths> {
  const paths = outputPaths(dataDir)
  const consolidatedCsv = staged(paths.consolidatedCsv)
  const consolidatedZip = staged(paths.consolidatedZip)
  const aggregatedCsv = staged(paths.aggregatedCsv)
  const files = [consolidatedCsv, consolidatedZip, aggregatedCsv]

  await mkdir(dataDir, { recursive: true })

  try {
    await writeConsolidatedCsv(records, consolidatedCsv.tmpPath)
    await writeConsolidatedZip(consolidatedCsv.tmpPath, consolidatedZip.tmpPath, CONSOLIDATED_CSV)
    await writeAggregatedCsv(statistics, aggregatedCsv.tmpPath)

    for (const file of files) {
      await assertReplaceable(file.path)
    }
    for (const file of files) {
      await rename(file.tmpPath, file.path)
    }
  } catch (error) {
    await Promise.all(files.map((file) => rm(file.tmpPath, { force: true })))
    throw error
  }

  console.log(`   ✓ ${paths.consolidatedCsv} (${records.length.toLocaleString()} rows)`)
  console.log(`   ✓ ${paths.consolidatedZip}`)
  console.log(`   ✓ ${paths.aggregatedCsv} (${statistics.length.toLocaleString()} groups)`)

  return paths
}
