import { describe, it, expect } from 'vitest'
import { cleanListing, validateListing } from './validate.js'
import { emptyRecord, type ListingRecord } from '../schema/listing-record.js'

function listing(overrides: Partial<ListingRecord> = {}): ListingRecord {
  return {
    ...emptyRecord('web_scraper', 'http://dealer.test/bus/1'),
    title: '2018 Ford E450 Shuttle',
    year: '2018',
    make: 'Ford',
    model: 'E450 Shuttle',
    price: '$42,900',
    priceValue: '42900',
    ...overrides,
  }
}

describe('validateListing', () => {
  it('accepts a complete listing', () => {
    expect(validateListing(listing())).toEqual({ valid: true, errors: [] })
  })

  it('requires a title', () => {
    expect(validateListing(listing({ title: null }))).toEqual({
      valid: false,
      errors: ['title: title is required'],
    })
  })

  it('rejects a malformed year', () => {
    expect(validateListing(listing({ year: '18' })).errors).toEqual(['year: year must be four digits'])
  })

  it('rejects VINs with forbidden letters', () => {
    const result = validateListing(listing({ vin: '1FDFE4FS7GDC1234O' }))
    expect(result.errors).toEqual(['vin: vin must be 17 characters without I, O or Q'])
  })

  it('enforces column lengths', () => {
    const result = validateListing(listing({ make: 'M'.repeat(26) }))
    expect(result.valid).toBe(false)
    expect(result.errors).toHaveLength(1)
    expect(result.errors[0]).toMatch(/^make: /)
  })

  it('needs a numeric value next to a display price', () => {
    expect(validateListing(listing({ priceValue: null })).errors).toEqual([
      'priceValue: a display price with digits needs a numeric price value',
    ])
  })

  it('accepts a text-only price without a numeric value', () => {
    expect(validateListing(listing({ price: 'Call for Price', priceValue: null }))).toEqual({
      valid: true,
      errors: [],
    })
  })

  it('rejects a source URL that is not a URL', () => {
    expect(validateListing(listing({ sourceUrl: 'bus-1' })).errors).toEqual(['sourceUrl: Invalid url'])
  })
})

describe('cleanListing', () => {
  it('trims text, upper-cases the VIN and drops blank features', () => {
    const cleaned = cleanListing(
      listing({
        title: '  2018 Ford  E450 ',
        engine: '   ',
        vin: ' 1fdfe4fs7gdc12345 ',
        features: [' Lift ', '', '  '],
        sourceUrl: ' http://dealer.test/bus/1 ',
      })
    )

    expect(cleaned.title).toBe('2018 Ford E450')
    expect(cleaned.engine).toBeNull()
    expect(cleaned.vin).toBe('1FDFE4FS7GDC12345')
    expect(cleaned.features).toEqual(['Lift'])
    expect(cleaned.sourceUrl).toBe('http://dealer.test/bus/1')
  })

  it('drops images without a URL and renumbers the rest', () => {
    const cleaned = cleanListing(
      listing({
        images: [
          { index: 0, url: ' ', name: 'vehicle_image_0', description: null },
          { index: 1, url: 'http://dealer.test/a.jpg', name: '', description: '  Side ' },
        ],
      })
    )

    expect(cleaned.images).toEqual([
      { index: 0, url: 'http://dealer.test/a.jpg', name: 'vehicle_image_0', description: 'Side' },
    ])
  })
})
