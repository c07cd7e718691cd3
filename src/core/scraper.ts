/**
 * ListingScraper drives one scrape run: discover (optional) → extract each
 * listing → collect the ones that produced data.
 *
 * Owns its page fetcher, including the browser session in browser mode.
 * Use withListingScraper() so the session is released however the run ends.
 */

import { readFile } from 'node:fs/promises'
import '../parsers/load-all.js'
import { getSiteProfile } from '../parsers/registry.js'
import type { ListingOutcome, ListingRecord } from '../schema/listing-record.js'
import { loadConfig, type ScraperConfig } from '../config.js'
import { createPageFetcher, type PageFetcher } from './page-fetcher.js'
import { discoverListings, type DiscoveryResult } from './discover.js'

const PROGRESS_EVERY = 10

/** Fields that count as "data" when deciding whether a record is empty */
const CONTENT_FIELDS = [
  'title',
  'year',
  'make',
  'model',
  'price',
  'mileage',
  'engine',
  'transmission',
  'gvwr',
  'vin',
  'description',
] as const

export interface ListingScraperOptions {
  config?: ScraperConfig
  /** Fetch through a headless browser instead of plain HTTP */
  useBrowser?: boolean
  /** Inject a fetcher (tests, custom transports) */
  fetcher?: PageFetcher
}

export interface ScrapeAllOptions {
  limit?: number
  customUrls?: string[]
  maxPages?: number
}

function hasContent(record: ListingRecord): boolean {
  return CONTENT_FIELDS.some(field => record[field] !== null) || record.images.length > 0
}

function dedupeUrls(urls: string[]): string[] {
  return [...new Set(urls)]
}

export class ListingScraper {
  readonly config: ScraperConfig
  private readonly fetcher: PageFetcher

  constructor(options: ListingScraperOptions = {}) {
    this.config = options.config ?? loadConfig()
    this.fetcher =
      options.fetcher ??
      createPageFetcher(
        {
          timeoutMs: this.config.timeoutMs,
          requestDelayMs: this.config.requestDelayMs,
          retryDelayMs: this.config.retryDelayMs,
          maxRetries: this.config.maxRetries,
          userAgent: this.config.userAgent,
        },
        options.useBrowser ?? false
      )
  }

  async discover(seedUrl: string, maxPages = this.config.maxPages): Promise<DiscoveryResult> {
    return discoverListings(this.fetcher, seedUrl, maxPages, {
      minListings: this.config.minListings,
      paginationPattern: this.config.paginationPattern,
    })
  }

  async getListingUrls(seedUrl: string, maxPages = this.config.maxPages): Promise<string[]> {
    return (await this.discover(seedUrl, maxPages)).urls
  }

  /** Extract one detail page. Never throws: failures come back as outcomes. */
  async scrapeListing(url: string): Promise<ListingOutcome> {
    const profile = getSiteProfile(url)
    try {
      console.log(`[${profile.label}] Scraping ${url}`)
      const page = await this.fetcher.fetch(url)
      const record = profile.parser.parseListing(page.html, url)

      if (!hasContent(record)) {
        console.warn(`[${profile.label}] No listing data found at ${url}`)
        return { status: 'empty', url, reason: 'no listing fields found on page' }
      }
      return { status: 'ok', url, record }
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err)
      console.error(`[${profile.label}] Error scraping ${url}: ${error}`)
      return { status: 'error', url, error }
    }
  }

  /** Extract every URL in order, keeping every outcome */
  async collectListings(urls: string[]): Promise<ListingOutcome[]> {
    const outcomes: ListingOutcome[] = []
    let succeeded = 0

    for (const url of urls) {
      const outcome = await this.scrapeListing(url)
      outcomes.push(outcome)
      if (outcome.status === 'ok') succeeded++

      if (outcomes.length % PROGRESS_EVERY === 0) {
        console.log(`[scraper] Progress: ${outcomes.length}/${urls.length} processed, ${succeeded} with data`)
      }
    }

    console.log(`[scraper] Extraction complete: ${succeeded} of ${urls.length} listings returned data`)
    return outcomes
  }

  async scrapeAllListings(options: ScrapeAllOptions = {}): Promise<ListingRecord[]> {
    let urls: string[]

    if (options.customUrls && options.customUrls.length > 0) {
      urls = dedupeUrls(options.customUrls)
      console.log(`[scraper] Using ${urls.length} provided URLs`)
    } else {
      const baseUrl = this.config.baseUrl
      if (!baseUrl) {
        throw new Error('No listing URLs given and BASE_URL is not configured')
      }
      urls = await this.getListingUrls(baseUrl, options.maxPages ?? this.config.maxPages)
    }

    if (options.limit !== undefined && urls.length > options.limit) {
      console.log(`[scraper] Limiting to ${options.limit} of ${urls.length} URLs`)
      urls = urls.slice(0, options.limit)
    }

    console.log(`[scraper] Starting extraction of ${urls.length} listings`)
    const outcomes = await this.collectListings(urls)
    return outcomes.flatMap(o => (o.status === 'ok' ? [o.record] : []))
  }

  /**
   * Mixed seeds: inventory pages are discovered, anything else is treated
   * as a detail page.
   */
  async scrapeSeeds(seeds: string[], options: Omit<ScrapeAllOptions, 'customUrls'> = {}): Promise<ListingRecord[]> {
    const urls: string[] = []

    for (const seed of seeds) {
      const profile = getSiteProfile(seed)
      if (profile.inventoryPattern && profile.inventoryPattern.test(seed)) {
        console.log(`[scraper] ${seed} is an inventory page, discovering listings`)
        urls.push(...(await this.getListingUrls(seed, options.maxPages ?? this.config.maxPages)))
      } else {
        urls.push(seed)
      }
    }

    if (urls.length === 0) {
      console.warn('[scraper] Seeds produced no listing URLs')
      return []
    }
    return this.scrapeAllListings({ limit: options.limit, customUrls: urls })
  }

  /** One URL per non-blank line. A file that cannot be read yields no records. */
  async scrapeFromFile(
    filename: string,
    { limit }: Pick<ScrapeAllOptions, 'limit'> = {}
  ): Promise<ListingRecord[]> {
    let urls: string[]
    try {
      const content = await readFile(filename, 'utf-8')
      urls = content
        .split(/\r?\n/)
        .map(line => line.trim())
        .filter(Boolean)
    } catch (err) {
      console.error(`[scraper] Could not read URLs from ${filename}: ${err instanceof Error ? err.message : String(err)}`)
      return []
    }

    console.log(`[scraper] Read ${urls.length} URLs from ${filename}`)
    if (urls.length === 0) return []
    return this.scrapeAllListings({ customUrls: urls, limit })
  }

  async close(): Promise<void> {
    await this.fetcher.close()
  }
}

/** Create a scraper, run `fn`, and always release the scraper's fetcher */
export async function withListingScraper<T>(
  options: ListingScraperOptions,
  fn: (scraper: ListingScraper) => Promise<T>
): Promise<T> {
  const scraper = new ListingScraper(options)
  try {
    return await fn(scraper)
  } finally {
    await scraper.close()
  }
}
