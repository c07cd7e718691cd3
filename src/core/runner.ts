/**
 * Core runner. Scrape listings → clean → write output files →
 * persist to Supabase → summary.
 *
 * Failures at any stage are logged and reported in RunResult.error; the
 * runner itself never throws.
 */

import { mkdirSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import type { ListingRecord } from '../schema/listing-record.js'
import type { ScraperConfig } from '../config.js'
import { cleanListing } from '../lib/validate.js'
import { persistListings, SupabaseListingStore, type ListingStore, type PersistResult } from '../lib/listing-store.js'
import type { PageFetcher } from './page-fetcher.js'
import { withListingScraper, type ListingScraper } from './scraper.js'
import { writeCsv } from './csv.js'
import { buildSummary, writeSummary, type Summary } from './summary.js'

/** Where the run gets its listing URLs from */
export type RunSource =
  | { kind: 'urls'; urls: string[] }
  | { kind: 'file'; path: string }
  | { kind: 'seeds'; seeds: string[] }
  | { kind: 'base' }

export interface RunOptions {
  source: RunSource
  config?: ScraperConfig
  useBrowser?: boolean
  fetcher?: PageFetcher
  limit?: number
  maxPages?: number
  /** Skip the database step */
  dryRun?: boolean
  /** Directory for JSON/CSV/summary output; null disables file output */
  outputRoot?: string | null
  /** Defaults to the Supabase store, created only when persisting */
  store?: ListingStore
  crossSourceDedupe?: boolean
}

export interface RunResult {
  records: ListingRecord[]
  persisted: PersistResult | null
  summary: Summary
  outputDir: string | null
  durationMs: number
  error: string | null
}

function collect(scraper: ListingScraper, options: RunOptions): Promise<ListingRecord[]> {
  const { source, limit, maxPages } = options
  switch (source.kind) {
    case 'urls':
      return scraper.scrapeAllListings({ customUrls: source.urls, limit })
    case 'file':
      return scraper.scrapeFromFile(source.path, { limit })
    case 'seeds':
      return scraper.scrapeSeeds(source.seeds, { limit, maxPages })
    case 'base':
      return scraper.scrapeAllListings({ limit, maxPages })
  }
}

function writeOutputs(records: ListingRecord[], summary: Summary, outputRoot: string): string {
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19)
  const outputDir = join(outputRoot, timestamp)
  mkdirSync(outputDir, { recursive: true })

  writeFileSync(join(outputDir, 'listings.json'), JSON.stringify(records, null, 2) + '\n', 'utf-8')
  writeCsv(records, join(outputDir, 'listings.csv'))
  writeSummary(summary, join(outputDir, 'summary.json'))

  // Write latest pointer
  writeFileSync(join(outputRoot, 'latest.txt'), timestamp + '\n', 'utf-8')

  console.log(`[runner] Output written to ${outputDir}`)
  return outputDir
}

export async function runScrape(options: RunOptions): Promise<RunResult> {
  const startTime = Date.now()
  let records: ListingRecord[] = []
  let persisted: PersistResult | null = null
  let outputDir: string | null = null

  try {
    // 1. Scrape (browser session released when this block ends)
    const raw = await withListingScraper(
      { config: options.config, useBrowser: options.useBrowser, fetcher: options.fetcher },
      scraper => collect(scraper, options)
    )
    console.log(`[runner] Scraped ${raw.length} listings`)

    // 2. Clean
    records = raw.map(cleanListing)

    if (records.length === 0) {
      console.warn('[runner] No listings found, nothing to write')
      return { records, persisted, summary: buildSummary(records), outputDir, durationMs: Date.now() - startTime, error: null }
    }

    // 3. Output files
    const summary = buildSummary(records)
    if (options.outputRoot) {
      outputDir = writeOutputs(records, summary, options.outputRoot)
    }

    // 4. Persist
    if (options.dryRun) {
      console.log('[runner] Dry run, skipping database')
    } else {
      const store = options.store ?? new SupabaseListingStore()
      persisted = await persistListings(store, records, { crossSourceDedupe: options.crossSourceDedupe })
    }

    return { records, persisted, summary, outputDir, durationMs: Date.now() - startTime, error: null }
  } catch (err) {
    const errorMsg = err instanceof Error ? err.message : String(err)
    console.error(`[runner] ERROR: ${errorMsg}`)
    return {
      records,
      persisted,
      summary: buildSummary(records),
      outputDir,
      durationMs: Date.now() - startTime,
      error: errorMsg,
    }
  }
}
