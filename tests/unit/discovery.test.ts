import { describe, expect, it } from 'vitest'

import { asDirectoryUrl, discoverLinks, extractLinks, listLinks } from '../../lib/discovery'
import { createFakeFetch, listingHtml } from '../fixtures/fake-fetch'

const DIRECTORY = 'https://example.test/dir/'

describe('asDirectoryUrl', () => {
  it('adds a trailing slash once', () => {
    expect(asDirectoryUrl('https://example.test/dir')).toBe(DIRECTORY)
    expect(asDirectoryUrl(DIRECTORY)).toBe(DIRECTORY)
  })
})

describe('extractLinks', () => {
  it('resolves relative, rooted and absolute targets in document order', () => {
    const html = listingHtml(['a.zip', '/top.csv', '../', 'https://other.test/x.zip'])

    expect(extractLinks(html, 'https://example.test/dir')).toEqual([
      'https://example.test/dir/a.zip',
      'https://example.test/top.csv',
      'https://example.test/',
      'https://other.test/x.zip',
    ])
  })

  it('ignores anchors without a target', () => {
    const html = '<a name="top">Top</a><a href="">empty</a><a href="b.zip">b</a>'

    expect(extractLinks(html, DIRECTORY)).toEqual(['https://example.test/dir/b.zip'])
  })
})

describe('listLinks', () => {
  it('returns an empty list when the listing cannot be fetched', async () => {
    const { fetch } = createFakeFetch({})

    await expect(listLinks(DIRECTORY, { timeoutMs: 1000, fetch })).resolves.toEqual([])
    expect(console.warn).toHaveBeenCalledTimes(1)
  })
})

describe('discoverLinks', () => {
  it('keeps links whose path ends with the extension, ignoring case and query string', async () => {
    const { fetch } = createFakeFetch({
      [DIRECTORY]: {
        body: listingHtml(['../', 'A.ZIP', 'b.zip?download=1', 'notes.txt', 'sub%20dir/c.zip', 'zip/']),
      },
    })

    const links = await discoverLinks(DIRECTORY, '.zip', { timeoutMs: 1000, fetch })

    expect(links).toEqual([
      'https://example.test/dir/A.ZIP',
      'https://example.test/dir/b.zip?download=1',
      'https://example.test/dir/sub%20dir/c.zip',
    ])
  })

  it('keeps duplicates', async () => {
    const { fetch } = createFakeFetch({ [DIRECTORY]: { body: listingHtml(['a.csv', 'a.csv']) } })

    await expect(discoverLinks(DIRECTORY, '.csv', { timeoutMs: 1000, fetch })).resolves.toEqual([
      'https://example.test/dir/a.csv',
      'https://example.test/dir/a.csv',
    ])
  })
})
