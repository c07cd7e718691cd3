/**
 * Summary builder: generates summary.json from ListingRecord[].
 */

import { writeFileSync } from 'node:fs'
import type { ListingRecord } from '../schema/listing-record.js'
import { parsePrice } from '../lib/normalize.js'

export interface Summary {
  totalCount: number
  byMake: Record<string, number>
  byYear: Record<string, number>
  bySource: Record<string, number>
  priceStats: {
    min: number | null
    max: number | null
    avg: number | null
    pricedCount: number
  }
  generatedAt: string
}

type CountKey = 'make' | 'year' | 'source'

function countBy(records: ListingRecord[], key: CountKey): Record<string, number> {
  const counts: Record<string, number> = {}
  for (const record of records) {
    const val = record[key] || 'Unknown'
    counts[val] = (counts[val] || 0) + 1
  }
  // Sort by count descending
  return Object.fromEntries(
    Object.entries(counts).sort(([, a], [, b]) => b - a)
  )
}

export function buildSummary(records: ListingRecord[]): Summary {
  const prices = records
    .map(r => parsePrice(r.priceValue))
    .filter((p): p is number => p !== null)

  return {
    totalCount: records.length,
    byMake: countBy(records, 'make'),
    byYear: countBy(records, 'year'),
    bySource: countBy(records, 'source'),
    priceStats: {
      min: prices.length ? Math.min(...prices) : null,
      max: prices.length ? Math.max(...prices) : null,
      avg: prices.length ? Math.round(prices.reduce((s, p) => s + p, 0) / prices.length) : null,
      pricedCount: prices.length,
    },
    generatedAt: new Date().toISOString(),
  }
}

export function writeSummary(summary: Summary, outputPath: string): void {
  writeFileSync(outputPath, JSON.stringify(summary, null, 2) + '\n', 'utf-8')
}
