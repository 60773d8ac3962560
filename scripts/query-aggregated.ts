#!/usr/bin/env tsx

/**
 * Query the aggregated dataset written by the pipeline
 *
 * Usage:
 *   npx tsx scripts/query-aggregated.ts [--search <term>] [--page <n>] [--limit <n>]
 */

import { config } from 'dotenv'
config({ path: ['.env.local', '.env'] })

import chalk from 'chalk'
import { getPipelineConfig } from '../lib/config'
import { outputPaths } from '../lib/output'
import { readAggregatedDataset, searchDataset, summarizeByRegion } from '../lib/dataset'
import { formatUserError, toError } from '../lib/errors'

const currency = new Intl.NumberFormat('pt-BR', { style: 'currency', currency: 'BRL' })

function argValue(args: string[], flag: string): string | undefined {
  const index = args.indexOf(flag)
  return index >= 0 ? args[index + 1] : undefined
}

async function main() {
  const args = process.argv.slice(2)

  try {
    const { aggregatedCsv } = outputPaths(getPipelineConfig().dataDir)
    const dataset = await readAggregatedDataset(aggregatedCsv)

    if (dataset.placeholder) {
      console.log(chalk.yellow(`⚠️  ${aggregatedCsv} not found, showing placeholder rows (run the pipeline first)\n`))
    }

    const page = argValue(args, '--page')
    const limit = argValue(args, '--limit')
    const result = searchDataset(dataset.rows, {
      search: argValue(args, '--search'),
      page: page ? Number(page) : undefined,
      limit: limit ? Number(limit) : undefined,
    })

    console.log(chalk.bold(`Page ${result.meta.page}/${result.meta.pagesTotal} (${result.meta.total} operators)\n`))
    for (const row of result.data) {
      console.log(`  ${row.legalName.padEnd(60).substring(0, 60)} ${row.regionCode.padEnd(3)} ${currency.format(row.total)}`)
    }

    const summary = summarizeByRegion(dataset.rows)
    console.log(chalk.bold(`\nTotal: ${currency.format(summary.grandTotal)}`))
    for (const { regionCode, total } of summary.byRegion.slice(0, 5)) {
      console.log(`  ${regionCode.padEnd(3)} ${currency.format(total)}`)
    }
    console.log()
  } catch (error) {
    console.error(chalk.red(`\n❌ ${formatUserError(toError(error))}\n`))
    process.exit(1)
  }
}

void main()
