/**
 * Shared ListingRecord schema: every site parser normalizes into this.
 * This is the single output shape for JSON, CSV, summary.json and DB writes.
 */

export interface ListingImage {
  index: number
  url: string
  name: string
  description: string | null
}

export interface ListingRecord {
  title: string | null
  year: string | null
  make: string | null
  model: string | null
  /** Price as displayed on the page, e.g. "$84,500" */
  price: string | null
  /** Digits and dot only, e.g. "84500" */
  priceValue: string | null
  mileage: string | null
  engine: string | null
  transmission: string | null
  gvwr: string | null
  passengers: string | null
  wheelchair: string | null
  color: string | null
  exteriorColor: string | null
  interiorColor: string | null
  vin: string | null
  description: string | null
  interiorDescription: string | null
  exteriorDescription: string | null
  specs: string | null
  features: string[]
  images: ListingImage[]
  source: string
  sourceUrl: string
  scrapedAt: string
}

/** Fields a parser fills from the technical details block */
export type TechnicalField =
  | 'mileage'
  | 'engine'
  | 'transmission'
  | 'gvwr'
  | 'passengers'
  | 'wheelchair'
  | 'color'
  | 'exteriorColor'
  | 'interiorColor'

export interface RawPage {
  url: string
  html: string
  method: 'http' | 'browser'
}

/** Result of extracting one detail page */
export type ListingOutcome =
  | { status: 'ok'; url: string; record: ListingRecord }
  | { status: 'empty'; url: string; reason: string }
  | { status: 'error'; url: string; error: string }

/** Capability every site parser implements */
export interface ListingParser {
  parseListing(html: string, url: string): ListingRecord
  parseListingPage(html: string, url: string): string[]
}

/**
 * Site profile: parser plus pagination settings for one target website.
 * Defined once in src/parsers/sites/ and never mutated.
 */
export interface SiteProfile {
  key: string
  label: string
  /** Hostnames this profile serves; a leading "www." is ignored */
  hosts: string[]
  pathPrefix?: string
  pattern?: RegExp
  /** "page={page}" query fragment, or a full URL template starting with http */
  paginationPattern?: string
  /** Matches inventory (multi-item) pages; anything else is a detail page */
  inventoryPattern?: RegExp
  parser: ListingParser
}

export function emptyRecord(source: string, sourceUrl: string): ListingRecord {
  return {
    title: null,
    year: null,
    make: null,
    model: null,
    price: null,
    priceValue: null,
    mileage: null,
    engine: null,
    transmission: null,
    gvwr: null,
    passengers: null,
    wheelchair: null,
    color: null,
    exteriorColor: null,
    interiorColor: null,
    vin: null,
    description: null,
    interiorDescription: null,
    exteriorDescription: null,
    specs: null,
    features: [],
    images: [],
    source,
    sourceUrl,
    scrapedAt: new Date().toISOString(),
  }
}
