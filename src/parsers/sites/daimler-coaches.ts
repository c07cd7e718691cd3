/**
 * Daimler Coaches North America parser: pre-owned motor coaches.
 *
 * Details come as parallel label/value cells: .vehicle-details .detail-label
 * next to .detail-value, or a .specs-table th/td grid. Gallery images are
 * lazy-loaded through data-src.
 */

import type { CheerioAPI } from 'cheerio'
import type { ListingImage, ListingRecord } from '../../schema/listing-record.js'
import { cleanText, extractNumericPrice, fillFromTitle, type YearMakeModel } from '../../lib/normalize.js'
import {
  BaseListingParser,
  applyLabeledValue,
  collectImages,
  firstText,
  identityFieldFor,
  splitFeatures,
} from '../base-parser.js'
import { registerSite } from '../registry.js'

interface DetailPair {
  label: string
  value: string | null
}

function detailPairs($: CheerioAPI): DetailPair[] {
  const labels = $('.vehicle-details .detail-label, .specs-table th').toArray()
  const values = $('.vehicle-details .detail-value, .specs-table td').toArray()
  const count = Math.min(labels.length, values.length)

  const pairs: DetailPair[] = []
  for (let i = 0; i < count; i++) {
    pairs.push({
      label: cleanText($(labels[i]).text())?.toLowerCase() ?? '',
      value: cleanText($(values[i]).text()),
    })
  }
  return pairs
}

export class DaimlerCoachesParser extends BaseListingParser {
  readonly source = 'daimlercoachesnorthamerica.com'
  protected readonly listingLinkSelector =
    '.vehicle-listing a.vehicle-link, .inventory-grid .vehicle-item a'

  protected extractBasicInfo($: CheerioAPI, record: ListingRecord): void {
    record.title = firstText($, ['.vehicle-title', 'h1.title'])

    const found: YearMakeModel = { year: null, make: null, model: null }
    for (const { label, value } of detailPairs($)) {
      const field = identityFieldFor(label)
      if (field && value) found[field] = value
    }
    const ymm = fillFromTitle(found, record.title)
    record.year = ymm.year
    record.make = ymm.make
    record.model = ymm.model

    record.price = firstText($, ['.vehicle-price', '.price'])
    record.priceValue = extractNumericPrice(record.price)
    record.vin = firstText($, ['.vehicle-vin', '.vin'])
  }

  protected extractTechnicalDetails($: CheerioAPI, record: ListingRecord): void {
    for (const { label, value } of detailPairs($)) {
      applyLabeledValue(record, label, value)
    }
  }

  protected extractOverview($: CheerioAPI, record: ListingRecord): void {
    record.description = firstText($, ['.vehicle-description', '.description'])

    $('.description-section').each((_, section) => {
      const heading = cleanText($(section).find('h3, h4').first().text())?.toLowerCase()
      const content = $(section).find('.section-content').first()
      if (!heading || !content.length) return

      if (heading.includes('interior')) record.interiorDescription = cleanText(content.text())
      else if (heading.includes('exterior')) record.exteriorDescription = cleanText(content.text())
      else if (heading.includes('feature')) record.features = splitFeatures(content.html() ?? '')
      else if (heading.includes('spec')) record.specs = cleanText(content.text())
    })
  }

  protected extractImages($: CheerioAPI, pageUrl: string): ListingImage[] {
    return collectImages($, '.vehicle-gallery img, .gallery img, .carousel img', pageUrl, { lazy: true })
  }
}

registerSite({
  key: 'daimler-coaches',
  label: 'Daimler Coaches North America',
  hosts: ['daimlercoachesnorthamerica.com'],
  pathPrefix: '/pre-owned-motor-coaches',
  inventoryPattern: /\/pre-owned-motor-coaches\/?(?:\?.*)?$/i,
  paginationPattern: 'page={page}',
  parser: new DaimlerCoachesParser(),
})
