/**
 * Micro Bird parser: microbird.com school vehicles.
 *
 * Details are "Label: value" list items, so each line is split on the
 * first colon after a known label.
 */

import type { CheerioAPI } from 'cheerio'
import type { ListingImage, ListingRecord, TechnicalField } from '../../schema/listing-record.js'
import {
  cleanText,
  extractNumericPrice,
  fillFromTitle,
  normalizeMake,
  type YearMakeModel,
} from '../../lib/normalize.js'
import { BaseListingParser, collectImages, firstText, splitFeatures } from '../base-parser.js'
import { registerSite } from '../registry.js'

/** Label prefixes, most specific first ("exterior color:" before "color:") */
const DETAIL_LABELS: [string, TechnicalField][] = [
  ['mileage:', 'mileage'],
  ['miles:', 'mileage'],
  ['passenger:', 'passengers'],
  ['passengers:', 'passengers'],
  ['capacity:', 'passengers'],
  ['wheelchair:', 'wheelchair'],
  ['engine:', 'engine'],
  ['transmission:', 'transmission'],
  ['gvwr:', 'gvwr'],
  ['exterior color:', 'exteriorColor'],
  ['interior color:', 'interiorColor'],
  ['color:', 'color'],
]

/** Lower-cased text of every detail list item */
function detailLines($: CheerioAPI, selector: string): string[] {
  return $(selector)
    .toArray()
    .map(li => cleanText($(li).text())?.toLowerCase())
    .filter((line): line is string => Boolean(line))
}

/** Value after `label` in `line`, or null when the label is absent */
function valueAfter(line: string, label: string): string | null {
  const idx = line.indexOf(label)
  return idx >= 0 ? cleanText(line.slice(idx + label.length)) : null
}

export class MicroBirdParser extends BaseListingParser {
  readonly source = 'microbird.com'
  protected readonly listingLinkSelector =
    '.inventory-list .bus-item a.detail-link, .bus-grid .bus-card a.view-details'

  protected extractBasicInfo($: CheerioAPI, record: ListingRecord): void {
    record.title = firstText($, ['.inventory-title', '.product-title'])

    const found: YearMakeModel = { year: null, make: null, model: null }
    for (const line of detailLines($, '.inventory-details li, .details li')) {
      if (line.includes('year:')) found.year = valueAfter(line, 'year:')
      else if (line.includes('make:')) found.make = normalizeMake(valueAfter(line, 'make:'))
      else if (line.includes('model:')) found.model = valueAfter(line, 'model:')
    }
    const ymm = fillFromTitle(found, record.title)
    record.year = ymm.year
    record.make = ymm.make
    record.model = ymm.model

    record.price = firstText($, ['.inventory-price', '.price'])
    record.priceValue = extractNumericPrice(record.price)
    record.vin = firstText($, ['.inventory-vin', '.vin'])
  }

  protected extractTechnicalDetails($: CheerioAPI, record: ListingRecord): void {
    for (const line of detailLines($, '.inventory-details li, .details li, .specs li')) {
      for (const [label, field] of DETAIL_LABELS) {
        if (!line.includes(label)) continue
        const value = valueAfter(line, label)
        if (value) record[field] = value
        break
      }
    }
  }

  protected extractOverview($: CheerioAPI, record: ListingRecord): void {
    record.description = firstText($, ['.inventory-description', '.description'])

    $('.description-section, .info-section').each((_, section) => {
      const heading = cleanText($(section).find('h3, h4').first().text())?.toLowerCase()
      const content = $(section).find('.section-content, .content').first()
      if (!heading || !content.length) return

      if (heading.includes('interior')) record.interiorDescription = cleanText(content.text())
      else if (heading.includes('exterior')) record.exteriorDescription = cleanText(content.text())
      else if (heading.includes('feature')) record.features = splitFeatures(content.html() ?? '')
      else if (heading.includes('spec')) record.specs = cleanText(content.text())
    })
  }

  protected extractImages($: CheerioAPI, pageUrl: string): ListingImage[] {
    return collectImages($, '.inventory-gallery img, .gallery img, .slider img', pageUrl, { lazy: true })
  }
}

registerSite({
  key: 'micro-bird',
  label: 'Micro Bird',
  hosts: ['microbird.com'],
  pathPrefix: '/school-vehicles',
  inventoryPattern: /\/school-vehicles\/?(?:\?.*)?$/i,
  parser: new MicroBirdParser(),
})
