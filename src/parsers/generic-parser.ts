/**
 * Generic parser: used when no site profile matches the URL.
 *
 * Best effort only: tries the class names, spec tables, definition lists and
 * labeled spans that most dealer templates use.
 */

import type { CheerioAPI } from 'cheerio'
import type { ListingImage, ListingRecord, TechnicalField } from '../schema/listing-record.js'
import { cleanText, extractNumericPrice, parseYearMakeModel } from '../lib/normalize.js'
import {
  BaseListingParser,
  applyLabeledValue,
  collectImages,
  featureList,
  firstText,
} from './base-parser.js'

const FIELD_SELECTORS: Record<TechnicalField, string[]> = {
  mileage: ['.mileage', '.miles', '.odometer', '.product-mileage', '.item-mileage'],
  passengers: ['.passengers', '.capacity', '.product-passengers', '.item-passengers'],
  wheelchair: ['.wheelchair', '.accessible', '.product-wheelchair', '.item-wheelchair'],
  engine: ['.engine', '.engine-type', '.product-engine', '.item-engine'],
  transmission: ['.transmission', '.trans', '.product-transmission', '.item-transmission'],
  gvwr: ['.gvwr', '.gross-weight', '.product-gvwr', '.item-gvwr'],
  color: ['.color', '.product-color', '.item-color'],
  exteriorColor: ['.exterior-color', '.ext-color', '.product-exterior-color'],
  interiorColor: ['.interior-color', '.int-color', '.product-interior-color'],
}

const TECHNICAL_FIELDS: TechnicalField[] = [
  'mileage',
  'passengers',
  'wheelchair',
  'engine',
  'transmission',
  'gvwr',
  'color',
  'exteriorColor',
  'interiorColor',
]

const GALLERY_SELECTORS = [
  '.gallery img',
  '.product-gallery img',
  '.item-gallery img',
  '.listing-gallery img',
  '.carousel img',
  '.slider img',
  '.product-images img',
  '.photos img',
  'a[rel="gallery"] img',
  '[data-gallery] img',
]

/** Images at least this wide are treated as listing photos when no gallery exists */
const MIN_FALLBACK_IMAGE_WIDTH = 300

export class GenericListingParser extends BaseListingParser {
  readonly source = 'web_scraper'
  protected readonly listingLinkSelector =
    '.bus-listing a.detail-link, .listing a.detail-link, a.listing-link'

  protected extractBasicInfo($: CheerioAPI, record: ListingRecord): void {
    record.title = firstText($, ['h1', '.product-title', '.item-title', '.listing-title'])

    const found = {
      year: firstText($, ['.year', '.product-year', '.item-year', '.listing-year']),
      make: firstText($, ['.make', '.brand', '.product-make', '.item-make', '.listing-make']),
      model: firstText($, ['.model', '.product-model', '.item-model', '.listing-model']),
    }
    // Title wins for the generic layout; element values only fill the gaps
    const fromTitle = parseYearMakeModel(record.title)
    record.year = fromTitle.year ?? found.year
    record.make = fromTitle.make ?? found.make
    record.model = fromTitle.model ?? found.model

    record.price = firstText($, ['.price', '.product-price', '.item-price', '.listing-price', '.amount'])
    record.priceValue = extractNumericPrice(record.price)
    record.vin = firstText($, ['.vin', '.product-vin', '.item-vin', '.listing-vin'])
  }

  protected extractTechnicalDetails($: CheerioAPI, record: ListingRecord): void {
    for (const field of TECHNICAL_FIELDS) {
      const value = firstText($, FIELD_SELECTORS[field])
      if (value) record[field] = value
    }

    // Spec tables: first cell is the label, second the value
    $('table.specs tr, table.specifications tr, .specs-table tr').each((_, row) => {
      const cells = $(row).find('td, th')
      if (cells.length < 2) return
      applyLabeledValue(record, $(cells[0]).text(), cleanText($(cells[1]).text()))
    })

    // Definition lists
    $('dl dt').each((_, dt) => {
      const dd = $(dt).next('dd')
      if (dd.length) applyLabeledValue(record, $(dt).text(), cleanText(dd.text()))
    })

    // Labeled spans: <span class="label">Engine</span><span class="value">...</span>
    $('.label').each((_, label) => {
      const value = $(label).next('.value')
      if (value.length) applyLabeledValue(record, $(label).text(), cleanText(value.text()))
    })
  }

  protected extractOverview($: CheerioAPI, record: ListingRecord): void {
    record.description = firstText($, [
      '.description',
      '.product-description',
      '.item-description',
      '.listing-description',
    ])
    record.interiorDescription = firstText($, ['.interior-description', '.int-desc', '.product-interior', '.item-interior'])
    record.exteriorDescription = firstText($, ['.exterior-description', '.ext-desc', '.product-exterior', '.item-exterior'])
    record.specs = firstText($, ['.specs', '.specifications', '.product-specs', '.item-specs'])

    for (const selector of ['.features', '.product-features', '.item-features', '.listing-features']) {
      if ($(selector).length) {
        record.features = featureList($, selector)
        break
      }
    }
  }

  protected extractImages($: CheerioAPI, pageUrl: string): ListingImage[] {
    for (const selector of GALLERY_SELECTORS) {
      if ($(selector).length) return collectImages($, selector, pageUrl)
    }

    return collectImages($, 'img', pageUrl, { minWidth: MIN_FALLBACK_IMAGE_WIDTH })
  }
}
