/**
 * Cleaning and validation applied to every record before it is stored.
 * Column limits mirror the listings table.
 */

import { z } from 'zod'
import type { ListingImage, ListingRecord } from '../schema/listing-record.js'
import { cleanText } from './normalize.js'

const optionalText = (max: number) => z.string().max(max).nullable()

const listingSchema = z
  .object({
    title: z.string({ invalid_type_error: 'title is required' }).min(1).max(256),
    year: z.string().regex(/^\d{4}$/, 'year must be four digits').nullable(),
    make: optionalText(25),
    model: optionalText(50),
    engine: optionalText(60),
    transmission: optionalText(60),
    mileage: optionalText(100),
    passengers: optionalText(60),
    wheelchair: optionalText(60),
    price: optionalText(30),
    priceValue: optionalText(30),
    vin: z
      .string()
      .max(60)
      .regex(/^[A-HJ-NPR-Z0-9]{17}$/, 'vin must be 17 characters without I, O or Q')
      .nullable(),
    sourceUrl: z.string().min(1).max(1000).url(),
  })
  .passthrough()
  // "Call for Price" and similar carry no number to extract
  .refine(r => !r.price || !/\d/.test(r.price) || r.priceValue, {
    message: 'a display price with digits needs a numeric price value',
    path: ['priceValue'],
  })

export interface ValidationResult {
  valid: boolean
  errors: string[]
}

export function validateListing(record: ListingRecord): ValidationResult {
  const result = listingSchema.safeParse(record)
  if (result.success) return { valid: true, errors: [] }
  return {
    valid: false,
    errors: result.error.issues.map(issue => `${issue.path.join('.') || 'record'}: ${issue.message}`),
  }
}

function cleanImages(images: ListingImage[]): ListingImage[] {
  return images
    .filter(img => img.url.trim() !== '')
    .map((img, index) => ({
      index,
      url: img.url.trim(),
      name: img.name.trim() || `vehicle_image_${index}`,
      description: cleanText(img.description),
    }))
}

/** Trim every text field, turn empty strings into null, drop blank features and images */
export function cleanListing(record: ListingRecord): ListingRecord {
  return {
    ...record,
    title: cleanText(record.title),
    year: cleanText(record.year),
    make: cleanText(record.make),
    model: cleanText(record.model),
    price: cleanText(record.price),
    priceValue: cleanText(record.priceValue),
    mileage: cleanText(record.mileage),
    engine: cleanText(record.engine),
    transmission: cleanText(record.transmission),
    gvwr: cleanText(record.gvwr),
    passengers: cleanText(record.passengers),
    wheelchair: cleanText(record.wheelchair),
    color: cleanText(record.color),
    exteriorColor: cleanText(record.exteriorColor),
    interiorColor: cleanText(record.interiorColor),
    vin: cleanText(record.vin)?.toUpperCase() ?? null,
    description: cleanText(record.description),
    interiorDescription: cleanText(record.interiorDescription),
    exteriorDescription: cleanText(record.exteriorDescription),
    specs: cleanText(record.specs),
    features: record.features
      .map(f => cleanText(f))
      .filter((f): f is string => f !== null),
    images: cleanImages(record.images),
    sourceUrl: record.sourceUrl.trim(),
  }
}
