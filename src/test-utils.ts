/**
 * In-process stand-ins shared by the test suites.
 */

import type { PageFetcher } from './core/page-fetcher.js'
import { FetchError } from './core/fetch-with-retry.js'
import type { ScraperConfig } from './config.js'
import type { ListingRecord, RawPage } from './schema/listing-record.js'
import type { DuplicateMatch, ListingStore } from './lib/listing-store.js'
import { identitySignature } from './lib/normalize.js'

/** Serves canned HTML by URL; unknown URLs fail like a 404 */
export class FakeFetcher implements PageFetcher {
  readonly method = 'http' as const
  readonly calls: string[] = []
  closed = 0

  constructor(private readonly pages: Record<string, string | Error>) {}

  async fetch(url: string): Promise<RawPage> {
    this.calls.push(url)
    const page = this.pages[url]
    if (page === undefined) throw new FetchError(url, 'HTTP 404: Not Found', 404)
    if (page instanceof Error) throw page
    return { url, html: page, method: this.method }
  }

  async close(): Promise<void> {
    this.closed++
  }
}

export function testConfig(overrides: Partial<ScraperConfig> = {}): ScraperConfig {
  return {
    baseUrl: null,
    paginationPattern: 'page={page}',
    minListings: 30,
    maxPages: 10,
    requestDelayMs: 0,
    retryDelayMs: 0,
    timeoutMs: 1000,
    maxRetries: 1,
    userAgent: 'test-agent',
    outputDir: 'output',
    ...overrides,
  }
}

/** Inventory page in the generic layout with one detail link per path */
export function inventoryPage(paths: string[]): string {
  const items = paths
    .map(p => `<div class="bus-listing"><a class="detail-link" href="${p}">View</a></div>`)
    .join('\n')
  return `<html><body><main>${items}</main></body></html>`
}

/** Detail page in the generic layout */
export function detailPage(title: string, price = '$50,000'): string {
  return `<html><body>
    <h1>${title}</h1>
    <div class="price">${price}</div>
  </body></html>`
}

/** Keeps rows in memory and applies the same duplicate checks as the Supabase store */
export class MemoryListingStore implements ListingStore {
  readonly rows: { id: number; record: ListingRecord }[] = []
  readonly failOn = new Set<string>()
  private nextId = 1

  async findDuplicate(record: ListingRecord, crossSourceDedupe: boolean): Promise<DuplicateMatch | null> {
    const byUrl = this.rows.find(r => r.record.sourceUrl === record.sourceUrl)
    if (byUrl) return { id: byUrl.id, matchedOn: 'source_url' }

    const byVin = record.vin ? this.rows.find(r => r.record.vin === record.vin) : undefined
    if (byVin) return { id: byVin.id, matchedOn: 'vin' }

    if (crossSourceDedupe) {
      const signature = identitySignature(record)
      const bySignature = this.rows.find(r => identitySignature(r.record) === signature)
      if (bySignature) return { id: bySignature.id, matchedOn: 'signature' }
    }
    return null
  }

  async insert(record: ListingRecord): Promise<number> {
    if (this.failOn.has(record.sourceUrl)) throw new Error('insert rejected')
    const id = this.nextId++
    this.rows.push({ id, record })
    return id
  }
}
