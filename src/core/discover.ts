/**
 * Listing discovery: walks an inventory page and its pagination, collecting
 * detail URLs until enough listings are found or the page budget runs out.
 */

import type { PageFetcher } from './page-fetcher.js'
import { getSiteProfile } from '../parsers/registry.js'

export type DiscoveryStopReason = 'min-listings' | 'max-pages' | 'empty-page' | 'fetch-error'

export interface DiscoveryResult {
  urls: string[]
  pagesFetched: number
  stopReason: DiscoveryStopReason
}

export interface DiscoveryOptions {
  minListings: number
  /** Used when the site profile does not define its own pattern */
  paginationPattern: string
}

/**
 * URL of page `page` of an inventory listing.
 *
 * The pattern is either a full URL template ("https://x.com/inventory/p/{page}")
 * or a query fragment ("page={page}") appended to the seed URL.
 */
export function buildPageUrl(seedUrl: string, pattern: string, page: number): string {
  const filled = pattern.replace(/\{page(?:_num)?\}/g, String(page))
  if (/^https?:\/\//i.test(filled)) return filled
  const fragment = filled.replace(/^[?&]/, '')
  return `${seedUrl}${seedUrl.includes('?') ? '&' : '?'}${fragment}`
}

export async function discoverListings(
  fetcher: PageFetcher,
  seedUrl: string,
  maxPages: number,
  options: DiscoveryOptions
): Promise<DiscoveryResult> {
  const profile = getSiteProfile(seedUrl)
  const pattern = profile.paginationPattern ?? options.paginationPattern
  const seen = new Set<string>()
  let pagesFetched = 0
  let page = 1

  while (page <= maxPages && seen.size < options.minListings) {
    const url = page === 1 ? seedUrl : buildPageUrl(seedUrl, pattern, page)
    console.log(`[discover] Page ${page}: ${url}`)

    let html: string
    try {
      html = (await fetcher.fetch(url)).html
    } catch (err) {
      console.error(`[discover] Failed to fetch page ${page}: ${err instanceof Error ? err.message : String(err)}`)
      return { urls: [...seen], pagesFetched, stopReason: 'fetch-error' }
    }
    pagesFetched++

    const pageUrls = profile.parser.parseListingPage(html, url)
    if (pageUrls.length === 0) {
      console.warn(`[discover] No listings found on page ${page}, stopping`)
      return { urls: [...seen], pagesFetched, stopReason: 'empty-page' }
    }

    for (const listingUrl of pageUrls) seen.add(listingUrl)
    console.log(`[discover] Found ${pageUrls.length} listings on page ${page} (${seen.size} unique so far)`)
    page++
  }

  const stopReason: DiscoveryStopReason = seen.size >= options.minListings ? 'min-listings' : 'max-pages'
  console.log(`[discover] Done: ${seen.size} listing URLs from ${pagesFetched} pages (${stopReason})`)
  return { urls: [...seen], pagesFetched, stopReason }
}

/** Unique detail URLs reachable from `seedUrl`, in discovery order */
export async function getListingUrls(
  fetcher: PageFetcher,
  seedUrl: string,
  maxPages: number,
  options: DiscoveryOptions
): Promise<string[]> {
  const { urls } = await discoverListings(fetcher, seedUrl, maxPages, options)
  return urls
}
