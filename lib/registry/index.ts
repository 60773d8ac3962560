/**
 * Operator registry loader
 * Finds the registry CSV on its directory listing, downloads it and builds the lookup map
 */

import { discoverLinks } from '../discovery'
import { downloadFile, downloadOptions, listingOptions, type NetworkOptions } from '../http'
import { parseDelimited, type CsvRow } from '../utils/csv'
import { missingRegistryFields, resolveRegistryColumns } from '../utils/column-mapping'
import { NoRegistryFoundError, RegistryFormatError } from '../errors'
import type { RegistryEntry, RegistryMap } from '../types/registry'

/**
 * Substrings that mark the registry report among other CSVs of the directory
 */
export const REGISTRY_LINK_MARKERS = ['relatorio', 'cadop', 'report', 'registry']

export interface LoadRegistryOptions extends NetworkOptions {
  directoryUrl: string
}

export interface RegistryColumnNames {
  registrationId: string
  taxpayerId: string
  legalName: string
  regionCode: string
  category: string | null
}

/**
 * Pick the registry file among the CSV links of the directory
 * Prefers a link carrying a marker token, falls back to the first link
 */
export function selectRegistryLink(links: readonly string[]): string | null {
  const marked = links.find((link) => {
    const lower = link.toLowerCase()
    return REGISTRY_LINK_MARKERS.some((marker) => lower.includes(marker))
  })
  return marked ?? links[0] ?? null
}

/**
 * Resolve the registry's logical columns, failing when a required one is absent
 */
export function resolveRegistryColumnNames(headers: string[]): RegistryColumnNames {
  const columns = resolveRegistryColumns(headers)
  const { registrationId, taxpayerId, legalName, regionCode } = columns

  if (!registrationId || !taxpayerId || !legalName || !regionCode) {
    throw new RegistryFormatError(
      `Registry is missing required columns: ${missingRegistryFields(columns).join(', ')} (headers: ${headers.join(', ')})`,
      headers
    )
  }

  return { registrationId, taxpayerId, legalName, regionCode, category: columns.category }
}

/**
 * Build the lookup map from parsed registry rows
 * Rows with an empty registration id are skipped; a repeated id replaces the earlier entry
 */
export function buildRegistryMap(rows: CsvRow[], columns: RegistryColumnNames): Map<string, RegistryEntry> {
  const registry = new Map<string, RegistryEntry>()

  for (const row of rows) {
    const registrationId = (row[columns.registrationId] ?? '').trim()
    if (!registrationId) continue

    const category = columns.category ? (row[columns.category] ?? '').trim() : ''

    registry.set(registrationId, {
      registrationId,
      taxpayerId: (row[columns.taxpayerId] ?? '').trim(),
      legalName: (row[columns.legalName] ?? '').trim(),
      regionCode: (row[columns.regionCode] ?? '').trim(),
      category: category || null,
    })
  }

  return registry
}

/**
 * Parse a downloaded registry file into the lookup map
 */
export function parseRegistry(content: Buffer | string, filename?: string): Map<string, RegistryEntry> {
  const { headers, rows } = parseDelimited(content, { filename })
  const columns = resolveRegistryColumnNames(headers)
  return buildRegistryMap(rows, columns)
}

/**
 * Locate, download and parse the operator registry
 *
 * @throws NoRegistryFoundError when the directory lists no CSV file
 * @throws DownloadError, RegistryFormatError, CSVParsingError
 */
export async function loadRegistry(options: LoadRegistryOptions): Promise<RegistryMap> {
  console.log('📇 Loading operator registry...')

  const links = await discoverLinks(options.directoryUrl, '.csv', listingOptions(options))
  const registryUrl = selectRegistryLink(links)

  if (!registryUrl) {
    throw new NoRegistryFoundError(options.directoryUrl)
  }

  console.log(`   📥 ${registryUrl}`)
  const content = await downloadFile(registryUrl, downloadOptions(options))
  const registry = parseRegistry(content, registryUrl)

  console.log(`   ✓ ${registry.size.toLocaleString()} operators loaded`)
  return registry
}
