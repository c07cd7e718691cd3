/**
 * Base parser: all site-specific parsers extend this.
 *
 * parseListing() loads the page once and runs the extraction steps in order:
 * basic info, technical details, overview text, images. Subclasses fill in
 * each step for their site's markup.
 */

import * as cheerio from 'cheerio'
import type { CheerioAPI } from 'cheerio'
import {
  emptyRecord,
  type ListingImage,
  type ListingParser,
  type ListingRecord,
  type TechnicalField,
} from '../schema/listing-record.js'
import { cleanText } from '../lib/normalize.js'

export abstract class BaseListingParser implements ListingParser {
  /** Site label stored with every record, e.g. "rossbus.com" */
  abstract readonly source: string

  /** Selector for the detail links on an inventory page */
  protected abstract readonly listingLinkSelector: string

  protected abstract extractBasicInfo($: CheerioAPI, record: ListingRecord): void
  protected abstract extractTechnicalDetails($: CheerioAPI, record: ListingRecord): void
  protected abstract extractOverview($: CheerioAPI, record: ListingRecord): void
  protected abstract extractImages($: CheerioAPI, pageUrl: string): ListingImage[]

  parseListingPage(html: string, url: string): string[] {
    const $ = cheerio.load(html)
    return collectLinks($, this.listingLinkSelector, url)
  }

  parseListing(html: string, url: string): ListingRecord {
    const $ = cheerio.load(html)
    const record = emptyRecord(this.source, url)

    this.extractBasicInfo($, record)
    this.extractTechnicalDetails($, record)
    this.extractOverview($, record)
    record.images = this.extractImages($, url)

    return record
  }
}

// ── Shared extraction helpers ────────────────────────────────────

/** Cleaned text of the first element matching `selector` */
export function textOf($: CheerioAPI, selector: string): string | null {
  const el = $(selector).first()
  return el.length ? cleanText(el.text()) : null
}

/** Try each selector in turn; first one present on the page wins */
export function firstText($: CheerioAPI, selectors: string[]): string | null {
  for (const selector of selectors) {
    const el = $(selector).first()
    if (el.length) return cleanText(el.text())
  }
  return null
}

/** Resolve an href against the page URL; null for non-navigable links */
export function resolveUrl(href: string | undefined, baseUrl: string): string | null {
  const raw = href?.trim()
  if (!raw || raw.startsWith('#') || /^(javascript|mailto|tel):/i.test(raw)) return null
  try {
    const resolved = new URL(raw, baseUrl)
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') return null
    resolved.hash = ''
    return resolved.href
  } catch {
    return null
  }
}

/** Absolute hrefs of every element matching `selector`, in page order */
export function collectLinks($: CheerioAPI, selector: string, baseUrl: string): string[] {
  const urls: string[] = []
  $(selector).each((_, el) => {
    const url = resolveUrl($(el).attr('href'), baseUrl)
    if (url) urls.push(url)
  })
  return urls
}

/** Feature list of the first element matching `selector` */
export function featureList($: CheerioAPI, selector: string): string[] {
  const el = $(selector).first()
  return el.length ? splitFeatures(el.html() ?? '') : []
}

/** <li> items of an HTML fragment, otherwise its non-empty lines */
export function splitFeatures(fragment: string): string[] {
  const $ = cheerio.load(fragment, null, false)

  const items = $('li')
  if (items.length) {
    return items
      .toArray()
      .map(li => cleanText($(li).text()))
      .filter((text): text is string => text !== null)
  }

  return $.root()
    .text()
    .split(/\r?\n/)
    .map(line => cleanText(line))
    .filter((text): text is string => text !== null)
}

export interface ImageOptions {
  /** Prefer data-src over src (lazy-loaded galleries) */
  lazy?: boolean
  /** Skip images without a width attribute of at least this many pixels */
  minWidth?: number
}

/** Image list from every <img> matching `selector` */
export function collectImages(
  $: CheerioAPI,
  selector: string,
  pageUrl: string,
  options: ImageOptions = {}
): ListingImage[] {
  const images: ListingImage[] = []
  $(selector).each((_, img) => {
    const el = $(img)
    if (options.minWidth !== undefined) {
      const width = parseInt(el.attr('width') ?? '', 10)
      if (isNaN(width) || width < options.minWidth) return
    }
    const src = (options.lazy && el.attr('data-src')) || el.attr('src')
    const url = resolveUrl(src, pageUrl)
    if (!url) return
    const index = images.length
    images.push({
      index,
      url,
      name: `vehicle_image_${index}`,
      description: cleanText(el.attr('alt')),
    })
  })
  return images
}

/** Map a spec label ("Odometer", "GVWR (lbs)") to the record field it fills */
export function technicalFieldFor(label: string): TechnicalField | null {
  const key = label.toLowerCase()
  if (key.includes('mileage') || key.includes('miles') || key.includes('odometer')) return 'mileage'
  if (key.includes('passenger') || key.includes('capacity')) return 'passengers'
  if (key.includes('wheelchair') || key.includes('accessible')) return 'wheelchair'
  if (key.includes('engine')) return 'engine'
  if (key.includes('transmission')) return 'transmission'
  if (key.includes('gvwr') || key.includes('gross')) return 'gvwr'
  if (key.includes('exterior color') || key.includes('ext color')) return 'exteriorColor'
  if (key.includes('interior color') || key.includes('int color')) return 'interiorColor'
  if (key.includes('color')) return 'color'
  return null
}

/** Map a label to year / make / model */
export function identityFieldFor(label: string): 'year' | 'make' | 'model' | null {
  const key = label.toLowerCase()
  if (key.includes('year')) return 'year'
  if (key.includes('make')) return 'make'
  if (key.includes('model')) return 'model'
  return null
}

/** Apply one label/value pair to the record; returns false if the label is unknown */
export function applyLabeledValue(record: ListingRecord, label: string, value: string | null): boolean {
  if (!value) return false
  const field = technicalFieldFor(label)
  if (field) {
    record[field] = value
    return true
  }
  if (/\bvin\b/i.test(label)) {
    record.vin = value
    return true
  }
  return false
}
