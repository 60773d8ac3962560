#!/usr/bin/env tsx

/**
 * Debug a directory listing
 * Shows the links the pipeline would see for a given extension
 *
 * Usage:
 *   npx tsx scripts/discover-links.ts <directory-url> [extension]
 *
 * Example:
 *   npx tsx scripts/discover-links.ts https://dadosabertos.ans.gov.br/FTP/PDA/demonstracoes_contabeis/2024/ .zip
 */

import { config } from 'dotenv'
config({ path: ['.env.local', '.env'] })

import chalk from 'chalk'
import { getPipelineConfig } from '../lib/config'
import { discoverLinks, listLinks } from '../lib/discovery'
import { listPeriods } from '../lib/archive'
import { formatUserError, toError } from '../lib/errors'

async function main() {
  const [directoryUrl, extension] = process.argv.slice(2)

  if (!directoryUrl) {
    console.error(chalk.red('❌ Error: directory URL required\n'))
    console.error('Usage: npx tsx scripts/discover-links.ts <directory-url> [extension]\n')
    process.exit(1)
  }

  try {
    const pipelineConfig = getPipelineConfig()
    const options = { timeoutMs: pipelineConfig.listingTimeoutMs, userAgent: pipelineConfig.userAgent }

    const links = extension
      ? await discoverLinks(directoryUrl, extension, options)
      : await listLinks(directoryUrl, options)

    console.log(chalk.bold(`\n🔗 ${links.length} link(s)${extension ? ` ending in ${extension}` : ''}:\n`))
    links.forEach((link, i) => {
      console.log(`  ${String(i + 1).padStart(3)}. ${link}`)
    })

    if (!extension) {
      const periods = await listPeriods(directoryUrl, pipelineConfig.maxPeriods, options)
      console.log(chalk.bold(`\n📅 Most recent periods: ${periods.map((p) => p.name).join(', ') || '(none)'}\n`))
    }
  } catch (error) {
    console.error(chalk.red(`\n❌ ${formatUserError(toError(error))}\n`))
    process.exit(1)
  }
}

void main()
