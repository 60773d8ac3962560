import type { FetchLike, HttpRequestInit, HttpResponse } from '../../lib/http'

export interface FakeRoute {
  status?: number
  body?: string | Buffer
  /** Reject instead of answering */
  error?: Error
}

export interface FakeFetch {
  fetch: FetchLike
  /** Every URL requested, in order */
  calls: string[]
}

function toArrayBuffer(data: Buffer): ArrayBuffer {
  const copy = new ArrayBuffer(data.length)
  new Uint8Array(copy).set(data)
  return copy
}

function respond(status: number, body: string | Buffer): HttpResponse {
  const data = typeof body === 'string' ? Buffer.from(body, 'utf8') : body
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? 'OK' : status === 404 ? 'Not Found' : 'Error',
    text: async () => data.toString('utf8'),
    arrayBuffer: async () => toArrayBuffer(data),
  }
}

/**
 * In-process stand-in for fetch; unknown URLs answer 404
 */
export function createFakeFetch(routes: Record<string, FakeRoute>): FakeFetch {
  const calls: string[] = []

  const fetch: FetchLike = async (url: string, _init: HttpRequestInit) => {
    calls.push(url)
    const route = routes[url]
    if (!route) return respond(404, 'not found')
    if (route.error) throw route.error
    return respond(route.status ?? 200, route.body ?? '')
  }

  return { fetch, calls }
}

/**
 * Minimal directory index page
 */
export function listingHtml(hrefs: string[]): string {
  const anchors = hrefs.map((href) => `    <a href="${href}">${href}</a><br>`).join('\n')
  return `<html>\n  <head><title>Index</title></head>\n  <body>\n${anchors}\n  </body>\n</html>\n`
}
