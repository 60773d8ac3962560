/**
 * HTTP client for the open-data archive
 * Fetches directory listings and downloads files with a per-call timeout
 */

import { DownloadError } from '../errors'
import { DEFAULT_USER_AGENT } from '../config'

/**
 * The subset of a fetch Response the pipeline reads
 */
export interface HttpResponse {
  ok: boolean
  status: number
  statusText: string
  text(): Promise<string>
  arrayBuffer(): Promise<ArrayBuffer>
}

export interface HttpRequestInit {
  headers: Record<string, string>
  signal: AbortSignal
}

/**
 * Anything shaped like the global fetch (tests pass an in-process fake)
 */
export type FetchLike = (url: string, init: HttpRequestInit) => Promise<HttpResponse>

export interface HttpOptions {
  timeoutMs: number
  userAgent?: string
  fetch?: FetchLike
}

function isTimeout(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    (error.name === 'TimeoutError' || error.name === 'AbortError')
  )
}

async function request(url: string, options: HttpOptions): Promise<HttpResponse> {
  const fetchImpl: FetchLike = options.fetch ?? fetch

  let response: HttpResponse
  try {
    response = await fetchImpl(url, {
      headers: {
        'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
      },
      signal: AbortSignal.timeout(options.timeoutMs),
    })
  } catch (error) {
    if (isTimeout(error)) {
      throw new DownloadError(`Timed out after ${options.timeoutMs}ms: ${url}`, url)
    }

    const errorMessage = error instanceof Error ? error.message : 'Unknown error'
    const errorCause = error instanceof Error && 'cause' in error && error.cause ? String(error.cause) : ''
    throw new DownloadError(
      `Network error while fetching ${url}: ${errorMessage}${errorCause ? ` (${errorCause})` : ''}`,
      url
    )
  }

  if (!response.ok) {
    throw new DownloadError(
      `Failed to fetch ${url}: ${response.status} ${response.statusText}`,
      url,
      response.status
    )
  }

  return response
}

/**
 * Fetch a page as text (directory listings)
 */
export async function fetchText(url: string, options: HttpOptions): Promise<string> {
  const response = await request(url, options)
  try {
    return await response.text()
  } catch (error) {
    throw new DownloadError(
      `Failed to read body of ${url}: ${error instanceof Error ? error.message : String(error)}`,
      url
    )
  }
}

/**
 * Download a file into memory
 * @returns Buffer containing the file data
 */
export async function downloadFile(url: string, options: HttpOptions): Promise<Buffer> {
  const response = await request(url, options)
  try {
    const arrayBuffer = await response.arrayBuffer()
    return Buffer.from(arrayBuffer)
  } catch (error) {
    if (isTimeout(error)) {
      throw new DownloadError(`Timed out after ${options.timeoutMs}ms: ${url}`, url)
    }
    throw new DownloadError(
      `Failed to read body of ${url}: ${error instanceof Error ? error.message : String(error)}`,
      url
    )
  }
}

/**
 * Timeouts and transport shared by every component that reaches the archive
 */
export interface NetworkOptions {
  listingTimeoutMs: number
  downloadTimeoutMs: number
  userAgent?: string
  fetch?: FetchLike
}

export function listingOptions(network: NetworkOptions): HttpOptions {
  return { timeoutMs: network.listingTimeoutMs, userAgent: network.userAgent, fetch: network.fetch }
}

export function downloadOptions(network: NetworkOptions): HttpOptions {
  return { timeoutMs: network.downloadTimeoutMs, userAgent: network.userAgent, fetch: network.fetch }
}
