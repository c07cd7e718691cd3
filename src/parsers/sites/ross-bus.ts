/**
 * Ross Bus parser (rossbus.com)
 *
 * Inventory: section.IdxBusesWrap (category grid) and div.BusListWrapper
 * (bus list) both link out through .FillYellowBtn buttons.
 * Detail pages keep specs in .DeepDetails ul.NoBullet li pairs:
 *   <span class="First">Engine</span><span class="Last">Cummins ISB 6.7</span>
 */

import type { CheerioAPI } from 'cheerio'
import type { ListingImage, ListingRecord } from '../../schema/listing-record.js'
import { cleanText, fillFromTitle } from '../../lib/normalize.js'
import { BaseListingParser, collectImages, featureList, firstText, textOf } from '../base-parser.js'
import { registerSite } from '../registry.js'

/** Spec labels this site exposes, mapped to record fields */
const SPEC_FIELDS: Record<string, 'passengers' | 'engine' | 'transmission' | 'gvwr'> = {
  capacity: 'passengers',
  engine: 'engine',
  transmission: 'transmission',
  gvwr: 'gvwr',
}

const MAX_SPEC_LENGTH = 56

export class RossBusParser extends BaseListingParser {
  readonly source = 'rossbus.com'
  protected readonly listingLinkSelector =
    'section.IdxBusesWrap .FillYellowBtn a, .BusListWrapper .FillYellowBtn a'

  protected extractBasicInfo($: CheerioAPI, record: ListingRecord): void {
    record.title = textOf($, 'h5.BlueTitle')
    record.description = textOf($, '.Describe.FParagraph1.EditorText')

    const extra = $('.Extra_Info_Wrap').first()
    if (extra.length) {
      record.wheelchair = /Lift Equipped\s*:\s*Yes/i.test(extra.text()) ? 'Yes' : 'No'
    }

    record.vin = textOf($, '.bus-vin')

    const ymm = fillFromTitle({ year: null, make: null, model: null }, record.title)
    record.year = ymm.year
    record.make = ymm.make
    record.model = ymm.model
  }

  protected extractTechnicalDetails($: CheerioAPI, record: ListingRecord): void {
    const list = $('.DeepDetails ul.NoBullet').first()
    list.children('li').each((_, li) => {
      const label = cleanText($(li).find('.First').first().text())?.toLowerCase()
      const value = cleanText($(li).find('.Last').first().text())
      if (!label || !value) return
      const field = SPEC_FIELDS[label]
      if (field) record[field] = value.toLowerCase().slice(0, MAX_SPEC_LENGTH)
    })
  }

  protected extractOverview($: CheerioAPI, record: ListingRecord): void {
    if (!record.description) {
      record.description = firstText($, ['.bus-description', '.listing-description'])
    }
    record.interiorDescription = firstText($, ['.bus-interior-description', '.listing-interior'])
    record.exteriorDescription = firstText($, ['.bus-exterior-description', '.listing-exterior'])
    record.specs = firstText($, ['.bus-specs', '.listing-specs'])

    record.features = featureList($, '.bus-features, .listing-features')
  }

  protected extractImages($: CheerioAPI, pageUrl: string): ListingImage[] {
    return collectImages($, 'ul.slides li img', pageUrl)
  }
}

registerSite({
  key: 'ross-bus',
  label: 'Ross Bus',
  hosts: ['rossbus.com'],
  inventoryPattern: /rossbus\.com\/(?:$|\?|inventory|buses|bus-inventory|used-buses)/i,
  parser: new RossBusParser(),
})
