/**
 * Parser registry: maps a URL to the site profile that knows its markup.
 * Site files call registerSite() at module level; see load-all.ts.
 *
 * Lookup order: hostname (+ longest matching path prefix), then URL
 * patterns in registration order, then the generic profile.
 */

import type { ListingParser, SiteProfile } from '../schema/listing-record.js'
import { GenericListingParser } from './generic-parser.js'

export const GENERIC_PROFILE: SiteProfile = {
  key: 'generic',
  label: 'Generic',
  hosts: [],
  parser: new GenericListingParser(),
}

const profiles: SiteProfile[] = []

function normalizeHost(host: string): string {
  return host.toLowerCase().replace(/^www\./, '')
}

export function registerSite(profile: SiteProfile): void {
  const existing = profiles.findIndex(p => p.key === profile.key)
  if (existing >= 0) {
    profiles[existing] = profile
  } else {
    profiles.push(profile)
  }
}

export function listSites(): SiteProfile[] {
  return [...profiles]
}

export function getSiteProfile(url: string): SiteProfile {
  let parsed: URL
  try {
    parsed = new URL(url)
  } catch {
    console.warn(`[registry] Could not parse ${url}, using generic parser`)
    return GENERIC_PROFILE
  }

  const host = normalizeHost(parsed.hostname)
  const path = parsed.pathname

  let best: SiteProfile | null = null
  for (const profile of profiles) {
    if (!profile.hosts.some(h => normalizeHost(h) === host)) continue
    if (profile.pathPrefix && !path.startsWith(profile.pathPrefix)) continue
    const prefixLength = profile.pathPrefix?.length ?? 0
    if (!best || prefixLength > (best.pathPrefix?.length ?? 0)) best = profile
  }
  if (best) return best

  for (const profile of profiles) {
    if (profile.pattern && profile.pattern.test(url)) return profile
  }

  return GENERIC_PROFILE
}

export function getParser(url: string): ListingParser {
  return getSiteProfile(url).parser
}
