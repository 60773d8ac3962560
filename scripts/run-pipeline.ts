#!/usr/bin/env tsx

/**
 * Run the full-refresh expense pipeline
 *
 * Downloads the operator registry and the most recent accounting statements,
 * then writes the consolidated and aggregated datasets to DATA_DIR
 *
 * Usage:
 *   npx tsx scripts/run-pipeline.ts [--max-files <n>] [--max-periods <n>]
 */

// Load environment variables (.env.local takes precedence, then .env)
import { config } from 'dotenv'
config({ path: ['.env.local', '.env'] })

import chalk from 'chalk'
import { getPipelineConfig, type PipelineConfig } from '../lib/config'
import { runPipeline } from '../lib/pipeline'
import { formatUserError, logError, PipelineError, toError, ValidationError } from '../lib/errors'

function readFlag(args: string[], flag: string): number | undefined {
  const index = args.indexOf(flag)
  if (index < 0) return undefined

  const value = Number(args[index + 1])
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${flag} expects a positive integer`)
  }
  return value
}

function parseArgs(base: PipelineConfig): PipelineConfig {
  const args = process.argv.slice(2)
  return {
    ...base,
    maxFiles: readFlag(args, '--max-files') ?? base.maxFiles,
    maxPeriods: readFlag(args, '--max-periods') ?? base.maxPeriods,
  }
}

async function main() {
  console.log(chalk.bold.blue('\n🚀 Operator expenses pipeline\n'))

  try {
    const pipelineConfig = parseArgs(getPipelineConfig())
    console.log(`📂 Data directory: ${pipelineConfig.dataDir}\n`)

    const startTime = Date.now()
    const result = await runPipeline(pipelineConfig)
    const seconds = ((Date.now() - startTime) / 1000).toFixed(1)

    console.log(chalk.bold.green(`\n✅ Pipeline complete in ${seconds}s\n`))
    console.log(chalk.bold('Summary:'))
    console.log(`├─ Registry operators:   ${chalk.yellow(result.registryEntries.toLocaleString())}`)
    console.log(`├─ Files retrieved:      ${chalk.yellow(result.files.length)}`)
    console.log(`├─ Consolidated rows:    ${chalk.yellow(result.consolidatedRows.toLocaleString())}`)
    console.log(`├─ Aggregated groups:    ${chalk.yellow(result.aggregatedGroups.toLocaleString())}`)
    console.log(`└─ Valid taxpayer ids:   ${chalk.yellow(`${(result.taxpayerIdValidRate * 100).toFixed(1)}%`)}\n`)

    console.log(chalk.bold('Outputs:'))
    console.log(`  • ${result.outputs.consolidatedCsv}`)
    console.log(`  • ${result.outputs.consolidatedZip}`)
    console.log(`  • ${result.outputs.aggregatedCsv}\n`)
  } catch (error) {
    const err = toError(error)
    console.error(chalk.red(`\n❌ ${formatUserError(err)}\n`))
    if (!(err instanceof PipelineError) && !(err instanceof ValidationError)) {
      logError(err, { script: 'run-pipeline' })
    }
    process.exit(1)
  }
}

void main()
