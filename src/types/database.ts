// Row types for the listings tables

export interface ListingRow {
  id: number
  title: string | null
  year: string | null
  make: string | null
  model: string | null
  price: string | null
  price_value: string | null
  mileage: string | null
  engine: string | null
  transmission: string | null
  gvwr: string | null
  passengers: string | null
  wheelchair: string | null
  color: string | null
  exterior_color: string | null
  interior_color: string | null
  vin: string | null
  description: string | null
  interior_description: string | null
  exterior_description: string | null
  specs: string | null
  features: string[]
  source: string
  source_url: string
  identity_signature: string
  scraped_at: string
  created_at: string
}

export interface ListingImageRow {
  id: number
  listing_id: number
  image_index: number
  url: string
  name: string
  description: string | null
}

/** Listing row ready for insertion */
export type NewListingRow = Omit<ListingRow, 'id' | 'created_at'>

export type NewListingImageRow = Omit<ListingImageRow, 'id'>
