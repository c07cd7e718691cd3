import { describe, it, expect, vi, afterEach } from 'vitest'
import './load-all.js'
import { GENERIC_PROFILE, getParser, getSiteProfile, listSites, registerSite } from './registry.js'
import { GenericListingParser } from './generic-parser.js'
import { RossBusParser } from './sites/ross-bus.js'

describe('parser registry', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('registers every bundled site', () => {
    expect(listSites().map(s => s.key)).toEqual(['ross-bus', 'daimler-coaches', 'micro-bird'])
  })

  it('matches hosts with or without www and in any case', () => {
    expect(getSiteProfile('https://www.rossbus.com/bus/1').key).toBe('ross-bus')
    expect(getSiteProfile('https://ROSSBUS.com/').key).toBe('ross-bus')
  })

  it('requires the path prefix when a profile declares one', () => {
    expect(getSiteProfile('https://daimlercoachesnorthamerica.com/pre-owned-motor-coaches/abc').key).toBe(
      'daimler-coaches'
    )
    expect(getSiteProfile('https://daimlercoachesnorthamerica.com/about')).toBe(GENERIC_PROFILE)
  })

  it('falls back to the generic profile for unknown sites', () => {
    expect(getSiteProfile('https://unknown-dealer.test/bus/1')).toBe(GENERIC_PROFILE)
    expect(getParser('https://unknown-dealer.test/bus/1')).toBeInstanceOf(GenericListingParser)
  })

  it('falls back to the generic profile for unparsable URLs', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    expect(getSiteProfile('not a url')).toBe(GENERIC_PROFILE)
    expect(warn).toHaveBeenCalledWith('[registry] Could not parse not a url, using generic parser')
  })

  it('picks the longest matching path prefix on a shared host', () => {
    const parser = new GenericListingParser()
    registerSite({ key: 'shared-root', label: 'Shared', hosts: ['shared.test'], parser })
    registerSite({ key: 'shared-coaches', label: 'Shared coaches', hosts: ['shared.test'], pathPrefix: '/coaches', parser })

    expect(getSiteProfile('https://shared.test/coaches/1').key).toBe('shared-coaches')
    expect(getSiteProfile('https://shared.test/vans/1').key).toBe('shared-root')
  })

  it('matches URL patterns when no host matches', () => {
    registerSite({
      key: 'pattern-site',
      label: 'Pattern',
      hosts: [],
      pattern: /\/coach-listing\/\d+/,
      parser: new RossBusParser(),
    })

    expect(getSiteProfile('https://mirror.test/coach-listing/42').key).toBe('pattern-site')
  })

  it('replaces a profile registered under the same key', () => {
    const before = listSites().length
    registerSite({ key: 'pattern-site', label: 'Pattern v2', hosts: [], parser: new GenericListingParser() })

    expect(listSites()).toHaveLength(before)
    expect(listSites().find(s => s.key === 'pattern-site')?.label).toBe('Pattern v2')
  })
})
