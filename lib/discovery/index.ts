/**
 * Link discovery on remote directory listings
 *
 * The archive publishes plain HTML index pages; the only structure relied on
 * is the presence of <a href> elements.
 */

import * as cheerio from 'cheerio'
import { fetchText, type HttpOptions } from '../http'
import { toError } from '../errors'

/**
 * Make sure relative targets resolve inside the directory, not beside it
 */
export function asDirectoryUrl(url: string): string {
  return url.endsWith('/') ? url : `${url}/`
}

/**
 * Extract and resolve every hyperlink target of an HTML page, in document order
 */
export function extractLinks(html: string, baseUrl: string): string[] {
  const $ = cheerio.load(html)
  const base = asDirectoryUrl(baseUrl)
  const links: string[] = []

  $('a[href]').each((_, element) => {
    const href = $(element).attr('href')?.trim()
    if (!href || !URL.canParse(href, base)) return

    links.push(new URL(href, base).toString())
  })

  return links
}

/**
 * List all links of a directory page
 * Returns an empty list when the page cannot be fetched
 */
export async function listLinks(directoryUrl: string, options: HttpOptions): Promise<string[]> {
  try {
    const html = await fetchText(directoryUrl, options)
    return extractLinks(html, directoryUrl)
  } catch (error) {
    console.warn(`   ⚠️  Could not read listing ${directoryUrl}: ${toError(error).message}`)
    return []
  }
}

/**
 * Path of a URL, decoded, without query string or fragment
 */
function urlPath(url: string): string {
  const { pathname } = new URL(url)
  try {
    return decodeURIComponent(pathname)
  } catch {
    return pathname
  }
}

/**
 * Discover files with a given extension in a directory listing
 *
 * @param directoryUrl - Listing page URL
 * @param extension - File extension including the dot (e.g. ".zip"), matched case-insensitively
 * @returns Absolute URLs in document order, duplicates included
 */
export async function discoverLinks(
  directoryUrl: string,
  extension: string,
  options: HttpOptions
): Promise<string[]> {
  const links = await listLinks(directoryUrl, options)
  const suffix = extension.toLowerCase()
  return links.filter((link) => urlPath(link).toLowerCase().endsWith(suffix))
}
