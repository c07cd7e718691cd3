/**
 * CSV writer: writes ListingRecord[] to a CSV file.
 * Features and image URLs are joined with " | " into one cell each.
 */

import { writeFileSync } from 'node:fs'
import type { ListingRecord } from '../schema/listing-record.js'

const COLUMNS = [
  'source',
  'title',
  'year',
  'make',
  'model',
  'price',
  'priceValue',
  'mileage',
  'engine',
  'transmission',
  'gvwr',
  'passengers',
  'wheelchair',
  'color',
  'vin',
  'sourceUrl',
  'scrapedAt',
] as const

/** Escape a value for CSV (RFC 4180) */
export function esc(val: unknown): string {
  const str = val == null ? '' : String(val)
  if (str.includes('"') || str.includes(',') || str.includes('\n')) {
    return '"' + str.replace(/"/g, '""') + '"'
  }
  return str
}

export function toCsv(records: ListingRecord[]): string {
  const header = [...COLUMNS, 'features', 'images'].join(',')
  const rows = records.map(record =>
    [
      ...COLUMNS.map(col => esc(record[col])),
      esc(record.features.join(' | ')),
      esc(record.images.map(img => img.url).join(' | ')),
    ].join(',')
  )
  return header + '\n' + rows.join('\n') + '\n'
}

/** Write listing records to a CSV file */
export function writeCsv(records: ListingRecord[], outputPath: string): void {
  writeFileSync(outputPath, toCsv(records), 'utf-8')
}
