/**
 * Archive retrieval
 * Walks the most recent period directories, downloads the statement ZIPs and
 * extracts the primary data file of each (the largest CSV member)
 */

import StreamZip from 'node-stream-zip'
import { randomUUID } from 'crypto'
import { tmpdir } from 'os'
import { basename, join } from 'path'
import { mkdir, rename, rm, writeFile } from 'fs/promises'
import { asDirectoryUrl, discoverLinks, listLinks } from '../discovery'
import { downloadFile, downloadOptions, listingOptions, type HttpOptions, type NetworkOptions } from '../http'
import { ArchiveError, toError } from '../errors'
import type { RetrievedFile } from '../types/archive'

export interface RetrieveOptions extends NetworkOptions {
  /** Listing whose numeric subdirectories are periods (years) */
  rootUrl: string
  /** Where extracted files are written */
  dataDir: string
  maxPeriods?: number
  /** Budget across all periods */
  maxFiles?: number
}

export interface PeriodDirectory {
  name: string
  url: string
}

export interface ExtractedMember {
  entryName: string
  localPath: string
  sizeBytes: number
}

export type ExtractOutcome =
  | { status: 'extracted'; member: ExtractedMember }
  | { status: 'no-data-file' }
  /** The member would overwrite a file extracted earlier in the run */
  | { status: 'duplicate'; entryName: string }

export interface ExtractOptions {
  extension?: string
  /** Local paths already written during this run */
  claimed?: ReadonlySet<string>
}

const DATA_EXTENSION = '.csv'

/**
 * Code-point order, largest first
 */
function compareDescending(a: string, b: string): number {
  return a < b ? 1 : a > b ? -1 : 0
}

/**
 * Name of a period directory link, or null when the link is not one
 * A period is a directory whose name is purely numeric (e.g. "2024/")
 */
export function periodName(link: string): string | null {
  const segments = new URL(link).pathname.split('/').filter(Boolean)
  const last = segments[segments.length - 1]
  return last && /^\d+$/.test(last) ? last : null
}

/**
 * List the most recent period directories, newest first
 */
export async function listPeriods(
  rootUrl: string,
  maxPeriods: number,
  options: HttpOptions
): Promise<PeriodDirectory[]> {
  const links = await listLinks(rootUrl, options)
  const periods = new Map<string, PeriodDirectory>()

  for (const link of links) {
    const name = periodName(link)
    if (name && !periods.has(name)) {
      periods.set(name, { name, url: asDirectoryUrl(link) })
    }
  }

  return [...periods.values()]
    .sort((a, b) => Number(b.name) - Number(a.name) || compareDescending(a.name, b.name))
    .slice(0, maxPeriods)
}

/**
 * Extract the largest data member of a ZIP file
 *
 * Ties on size keep the first member encountered. The member is written to
 * a ".part" file first and renamed once complete; a member whose local path
 * is already claimed is left in the archive.
 */
export async function extractLargestMember(
  archivePath: string,
  dataDir: string,
  options: ExtractOptions = {}
): Promise<ExtractOutcome> {
  const extension = (options.extension ?? DATA_EXTENSION).toLowerCase()
  const zip = new StreamZip.async({ file: archivePath })

  try {
    const entries = await zip.entries()
    let largest: StreamZip.ZipEntry | null = null

    for (const entry of Object.values(entries)) {
      if (entry.isDirectory || !entry.name.toLowerCase().endsWith(extension)) continue
      if (!largest || entry.size > largest.size) {
        largest = entry
      }
    }

    if (!largest) {
      return { status: 'no-data-file' }
    }

    const localPath = join(dataDir, basename(largest.name))
    if (options.claimed?.has(localPath)) {
      return { status: 'duplicate', entryName: largest.name }
    }

    const partPath = `${localPath}.part`
    try {
      await zip.extract(largest.name, partPath)
      await rename(partPath, localPath)
    } catch (error) {
      await rm(partPath, { force: true })
      throw error
    }

    return { status: 'extracted', member: { entryName: largest.name, localPath, sizeBytes: largest.size } }
  } finally {
    await zip.close()
  }
}

/**
 * Download one archive and extract its primary data file
 */
async function retrieveArchive(
  archiveUrl: string,
  options: RetrieveOptions,
  claimed: ReadonlySet<string>
): Promise<ExtractOutcome> {
  const data = await downloadFile(archiveUrl, downloadOptions(options))
  const archivePath = join(tmpdir(), `statements-${randomUUID()}.zip`)

  try {
    await writeFile(archivePath, data)

    try {
      return await extractLargestMember(archivePath, options.dataDir, { claimed })
    } catch (error) {
      throw new ArchiveError(`Unreadable archive: ${toError(error).message}`, archiveUrl, toError(error))
    }
  } finally {
    await rm(archivePath, { force: true })
  }
}

/**
 * Retrieve the primary data files of the most recent archives
 *
 * Failures are skipped per archive; the caller decides what an empty result means.
 *
 * @returns Extracted files, newest period first
 */
export async function retrieveRecent(options: RetrieveOptions): Promise<RetrievedFile[]> {
  const maxPeriods = options.maxPeriods ?? 3
  const maxFiles = options.maxFiles ?? 3

  console.log(`🗂️  Retrieving statements (last ${maxPeriods} periods, up to ${maxFiles} files)...`)
  await mkdir(options.dataDir, { recursive: true })

  const periods = await listPeriods(options.rootUrl, maxPeriods, listingOptions(options))
  if (periods.length === 0) {
    console.warn(`   ⚠️  No period directories found at ${options.rootUrl}`)
  }

  const retrieved: RetrievedFile[] = []
  const claimed = new Set<string>()

  for (const period of periods) {
    if (retrieved.length >= maxFiles) break

    const archives = (await discoverLinks(period.url, '.zip', listingOptions(options))).sort(compareDescending)
    console.log(`   📅 ${period.name}: ${archives.length} archive(s)`)

    for (const archiveUrl of archives) {
      if (retrieved.length >= maxFiles) break

      try {
        const outcome = await retrieveArchive(archiveUrl, options, claimed)
        if (outcome.status === 'no-data-file') {
          console.warn(`   ⚠️  No ${DATA_EXTENSION} member in ${archiveUrl}`)
          continue
        }
        if (outcome.status === 'duplicate') {
          console.warn(`   ⚠️  ${outcome.entryName} already retrieved, skipping ${archiveUrl}`)
          continue
        }

        const { member } = outcome
        claimed.add(member.localPath)
        retrieved.push({ period: period.name, archiveUrl, ...member })
        console.log(`   ✓ Extracted ${member.entryName} (${member.sizeBytes.toLocaleString()} bytes)`)
      } catch (error) {
        console.warn(`   ⚠️  Skipping ${archiveUrl}: ${toError(error).message}`)
      }
    }
  }

  return retrieved
}
