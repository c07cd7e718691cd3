/**
 * Listing persistence: validates records, skips ones already stored, and
 * inserts the rest.
 *
 * Duplicate checks, in order: same source URL, same VIN, and (opt-in) the
 * same year/make/model/title signature from another source.
 */

import type { SupabaseClient } from '@supabase/supabase-js'
import type { ListingRecord } from '../schema/listing-record.js'
import type { NewListingImageRow, NewListingRow } from '../types/database.js'
import { identitySignature } from './normalize.js'
import { getSupabase } from './supabase.js'
import { validateListing } from './validate.js'

export type DuplicateKey = 'source_url' | 'vin' | 'signature'

export interface DuplicateMatch {
  id: number
  matchedOn: DuplicateKey
}

/** Storage seam: Supabase in production, in-memory fakes in tests */
export interface ListingStore {
  findDuplicate(record: ListingRecord, crossSourceDedupe: boolean): Promise<DuplicateMatch | null>
  insert(record: ListingRecord): Promise<number>
}

export interface PersistOptions {
  /** Also treat equal year/make/model/title from another source as a duplicate */
  crossSourceDedupe?: boolean
}

export interface PersistResult {
  insertedIds: number[]
  duplicates: number
  invalid: number
  failed: number
}

export async function persistListings(
  store: ListingStore,
  records: ListingRecord[],
  options: PersistOptions = {}
): Promise<PersistResult> {
  const crossSource = options.crossSourceDedupe ?? false
  const result: PersistResult = { insertedIds: [], duplicates: 0, invalid: 0, failed: 0 }

  // Keys inserted during this batch, so repeats inside one run are caught too
  const batchKeys = new Set<string>()
  const keysOf = (record: ListingRecord): string[] => {
    const keys = [`url:${record.sourceUrl}`]
    if (record.vin) keys.push(`vin:${record.vin}`)
    if (crossSource) keys.push(`sig:${identitySignature(record)}`)
    return keys
  }

  for (const record of records) {
    const { valid, errors } = validateListing(record)
    if (!valid) {
      result.invalid++
      console.warn(`[store] Skipping invalid listing ${record.sourceUrl}: ${errors.join('; ')}`)
      continue
    }

    const keys = keysOf(record)
    if (keys.some(k => batchKeys.has(k))) {
      result.duplicates++
      console.log(`[store] Skipping repeat of ${record.sourceUrl} within this run`)
      continue
    }

    try {
      const existing = await store.findDuplicate(record, crossSource)
      if (existing) {
        result.duplicates++
        console.log(`[store] Listing already stored (id ${existing.id}, by ${existing.matchedOn}): ${record.sourceUrl}`)
        continue
      }

      const id = await store.insert(record)
      result.insertedIds.push(id)
      for (const k of keys) batchKeys.add(k)
    } catch (err) {
      result.failed++
      console.error(`[store] Failed to store ${record.sourceUrl}: ${err instanceof Error ? err.message : String(err)}`)
    }
  }

  console.log(
    `[store] Inserted ${result.insertedIds.length} of ${records.length} listings ` +
    `(${result.duplicates} duplicates, ${result.invalid} invalid, ${result.failed} failed)`
  )
  return result
}

// ── Supabase implementation ──────────────────────────────────────

export function toDbRow(record: ListingRecord): NewListingRow {
  return {
    title: record.title,
    year: record.year,
    make: record.make,
    model: record.model,
    price: record.price,
    price_value: record.priceValue,
    mileage: record.mileage,
    engine: record.engine,
    transmission: record.transmission,
    gvwr: record.gvwr,
    passengers: record.passengers,
    wheelchair: record.wheelchair,
    color: record.color,
    exterior_color: record.exteriorColor,
    interior_color: record.interiorColor,
    vin: record.vin,
    description: record.description,
    interior_description: record.interiorDescription,
    exterior_description: record.exteriorDescription,
    specs: record.specs,
    features: record.features,
    source: record.source,
    source_url: record.sourceUrl,
    identity_signature: identitySignature(record),
    scraped_at: record.scrapedAt,
  }
}

export class SupabaseListingStore implements ListingStore {
  constructor(private readonly client: SupabaseClient = getSupabase()) {}

  private async findBy(column: string, value: string): Promise<number | null> {
    const { data, error } = await this.client
      .from('listings')
      .select('id')
      .eq(column, value)
      .limit(1)
      .maybeSingle<{ id: number }>()

    if (error) throw new Error(`Failed to look up listing by ${column}: ${error.message}`)
    return data ? data.id : null
  }

  async findDuplicate(record: ListingRecord, crossSourceDedupe: boolean): Promise<DuplicateMatch | null> {
    const byUrl = await this.findBy('source_url', record.sourceUrl)
    if (byUrl !== null) return { id: byUrl, matchedOn: 'source_url' }

    if (record.vin) {
      const byVin = await this.findBy('vin', record.vin)
      if (byVin !== null) return { id: byVin, matchedOn: 'vin' }
    }

    if (crossSourceDedupe) {
      const bySignature = await this.findBy('identity_signature', identitySignature(record))
      if (bySignature !== null) return { id: bySignature, matchedOn: 'signature' }
    }

    return null
  }

  async insert(record: ListingRecord): Promise<number> {
    const { data: inserted, error: insertErr } = await this.client
      .from('listings')
      .insert(toDbRow(record))
      .select('id')
      .single<{ id: number }>()

    if (insertErr) throw new Error(`Failed to insert listing: ${insertErr.message}`)

    if (record.images.length > 0) {
      const imageRows: NewListingImageRow[] = record.images.map(img => ({
        listing_id: inserted.id,
        image_index: img.index,
        url: img.url,
        name: img.name,
        description: img.description,
      }))
      const { error: imageErr } = await this.client.from('listing_images').insert(imageRows)
      if (imageErr) {
        // Without its images the row must go too, or the next run skips it as a duplicate
        await this.removeListing(inserted.id)
        throw new Error(`Failed to insert images for listing ${inserted.id}: ${imageErr.message}`)
      }
    }

    return inserted.id
  }

  private async removeListing(id: number): Promise<void> {
    const { error } = await this.client.from('listings').delete().eq('id', id)
    if (error) console.error(`[store] Could not remove listing ${id} after failed image insert: ${error.message}`)
  }
}
