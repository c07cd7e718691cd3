import { describe, it, expect } from 'vitest'
import './load-all.js'
import { getParser } from './registry.js'
import { GenericListingParser } from './generic-parser.js'
import { RossBusParser } from './sites/ross-bus.js'
import { DaimlerCoachesParser } from './sites/daimler-coaches.js'
import { MicroBirdParser } from './sites/micro-bird.js'
import { splitFeatures, technicalFieldFor, resolveUrl } from './base-parser.js'

describe('GenericListingParser', () => {
  const url = 'http://dealer.test/inventory/2015-ford-e450'
  const html = `<html><body>
    <h1>2015 Ford  E450 Starcraft Allstar</h1>
    <span class="make">Chevy</span>
    <span class="price">$48,995</span>
    <div class="engine">Triton V10</div>
    <div class="specs-table"><table>
      <tr><th>Odometer</th><td>102,345</td></tr>
      <tr><td>Transmission</td><td>Automatic</td></tr>
    </table></div>
    <dl>
      <dt>VIN</dt><dd>1FDXE45S85HA12345</dd>
      <dt>Passenger Capacity</dt><dd>22</dd>
    </dl>
    <span class="label">Wheelchair Lift</span><span class="value">Yes</span>
    <div class="description">Great   shape,
      ready for service.</div>
    <ul class="features"><li>Lift</li><li> Rear AC </li></ul>
    <img src="/logo.png" width="120">
    <img src="/uploads/bus-side.jpg" width="640" alt="Side view">
    <img src="/uploads/no-width.jpg">
  </body></html>`

  const record = new GenericListingParser().parseListing(html, url)

  it('takes year, make and model from the title before page elements', () => {
    expect(record.title).toBe('2015 Ford E450 Starcraft Allstar')
    expect(record.year).toBe('2015')
    expect(record.make).toBe('Ford')
    expect(record.model).toBe('E450 Starcraft Allstar')
  })

  it('keeps the display price and its numeric value', () => {
    expect(record.price).toBe('$48,995')
    expect(record.priceValue).toBe('48995')
  })

  it('reads classed fields, spec tables, definition lists and labeled spans', () => {
    expect(record.engine).toBe('Triton V10')
    expect(record.mileage).toBe('102,345')
    expect(record.transmission).toBe('Automatic')
    expect(record.vin).toBe('1FDXE45S85HA12345')
    expect(record.passengers).toBe('22')
    expect(record.wheelchair).toBe('Yes')
  })

  it('collects description and features', () => {
    expect(record.description).toBe('Great shape, ready for service.')
    expect(record.features).toEqual(['Lift', 'Rear AC'])
  })

  it('falls back to wide images when the page has no gallery', () => {
    expect(record.images).toEqual([
      {
        index: 0,
        url: 'http://dealer.test/uploads/bus-side.jpg',
        name: 'vehicle_image_0',
        description: 'Side view',
      },
    ])
  })

  it('stamps source and URL', () => {
    expect(record.source).toBe('web_scraper')
    expect(record.sourceUrl).toBe(url)
  })

  it('uses element values when the title has no year', () => {
    const r = new GenericListingParser().parseListing(
      '<h1>Shuttle Bus</h1><span class="year">2012</span><span class="make">Ford</span>',
      url
    )
    expect(r.year).toBe('2012')
    expect(r.make).toBe('Ford')
    expect(r.model).toBeNull()
  })

  it('finds detail links on an inventory page', () => {
    const links = new GenericListingParser().parseListingPage(
      `<div class="listing"><a class="detail-link" href="/bus/1">1</a></div>
       <a class="listing-link" href="bus/2#top">2</a>
       <a class="listing-link" href="javascript:void(0)">3</a>
       <a class="other" href="/about">About</a>`,
      'http://dealer.test/inventory/'
    )
    expect(links).toEqual(['http://dealer.test/bus/1', 'http://dealer.test/inventory/bus/2'])
  })
})

describe('RossBusParser', () => {
  const url = 'https://www.rossbus.com/bus/2016-ford-e450-glaval'
  const html = `<html><body>
    <h5 class="BlueTitle">2016 Ford E450 Glaval Titan</h5>
    <div class="Describe FParagraph1 EditorText"><p>Clean  bus,
      ready to go.</p></div>
    <div class="Extra_Info_Wrap"><p>Lift Equipped : Yes</p></div>
    <div class="bus-vin">1FDFE4FS7GDC12345</div>
    <div class="DeepDetails"><ul class="NoBullet">
      <li><span class="First">Capacity</span><span class="Last">24 Passengers + 2 WC</span></li>
      <li><span class="First">Engine</span><span class="Last">Ford 6.8L V10 Gasoline</span></li>
      <li><span class="First">Transmission</span><span class="Last">Allison 2100 PTS Five Speed Automatic with Overdrive and Tow Haul</span></li>
      <li><span class="First">Mileage</span><span class="Last">98,000</span></li>
    </ul></div>
    <ul class="bus-features"><li>Air Conditioning</li><li> Rear Lift </li></ul>
    <ul class="slides">
      <li><img src="/images/bus-1.jpg" alt="Front view"></li>
      <li><img src="https://cdn.rossbus.com/bus-2.jpg"></li>
    </ul>
  </body></html>`

  const record = new RossBusParser().parseListing(html, url)

  it('reads the title block', () => {
    expect(record).toMatchObject({
      title: '2016 Ford E450 Glaval Titan',
      year: '2016',
      make: 'Ford',
      model: 'E450 Glaval Titan',
      description: 'Clean bus, ready to go.',
      wheelchair: 'Yes',
      vin: '1FDFE4FS7GDC12345',
      source: 'rossbus.com',
    })
  })

  it('keeps only the known spec rows, lower-cased and truncated', () => {
    expect(record.passengers).toBe('24 passengers + 2 wc')
    expect(record.engine).toBe('ford 6.8l v10 gasoline')
    expect(record.transmission).toBe('allison 2100 pts five speed automatic with overdrive and')
    expect(record.mileage).toBeNull()
  })

  it('reports no lift when the extra info block says otherwise', () => {
    const r = new RossBusParser().parseListing(
      '<h5 class="BlueTitle">2012 Chevrolet Express</h5><div class="Extra_Info_Wrap">Lift Equipped: No</div>',
      url
    )
    expect(r.wheelchair).toBe('No')
  })

  it('collects features and slider images', () => {
    expect(record.features).toEqual(['Air Conditioning', 'Rear Lift'])
    expect(record.images).toEqual([
      { index: 0, url: 'https://www.rossbus.com/images/bus-1.jpg', name: 'vehicle_image_0', description: 'Front view' },
      { index: 1, url: 'https://cdn.rossbus.com/bus-2.jpg', name: 'vehicle_image_1', description: null },
    ])
  })

  it('follows the yellow buttons on inventory pages', () => {
    const links = new RossBusParser().parseListingPage(
      `<section class="IdxBusesWrap">
         <div class="FillYellowBtn"><a href="/inventory/shuttle-buses">Shuttle</a></div>
       </section>
       <div class="BusListWrapper">
         <div class="FillYellowBtn"><a href="https://www.rossbus.com/bus/123">View</a></div>
       </div>`,
      'https://www.rossbus.com/'
    )
    expect(links).toEqual(['https://www.rossbus.com/inventory/shuttle-buses', 'https://www.rossbus.com/bus/123'])
  })
})

describe('DaimlerCoachesParser', () => {
  const url = 'https://www.daimlercoachesnorthamerica.com/pre-owned-motor-coaches/2017-setra-s417'
  const html = `<html><body>
    <div class="vehicle-title">2017 Setra S417 Coach</div>
    <div class="vehicle-price">$289,000</div>
    <div class="vehicle-details">
      <span class="detail-label">Year</span><span class="detail-value">2017</span>
      <span class="detail-label">Make</span><span class="detail-value">Setra</span>
      <span class="detail-label">Model</span><span class="detail-value">S 417</span>
      <span class="detail-label">Mileage</span><span class="detail-value">412,000 mi</span>
      <span class="detail-label">Engine</span><span class="detail-value">Detroit DD13</span>
      <span class="detail-label">VIN Number</span><span class="detail-value">WKK41700000012345</span>
    </div>
    <div class="vehicle-description">Well maintained coach.</div>
    <div class="description-section"><h3>Interior</h3><div class="section-content">56 reclining   seats</div></div>
    <div class="description-section"><h3>Features</h3><div class="section-content"><ul><li>Wi-Fi</li><li>Restroom</li></ul></div></div>
    <div class="vehicle-gallery"><img data-src="/media/coach-1.jpg" src="/placeholder.gif" alt="Coach"></div>
  </body></html>`

  const record = new DaimlerCoachesParser().parseListing(html, url)

  it('prefers the detail grid over the title for identity fields', () => {
    expect(record.year).toBe('2017')
    expect(record.make).toBe('Setra')
    expect(record.model).toBe('S 417')
  })

  it('maps labeled values onto technical fields', () => {
    expect(record.mileage).toBe('412,000 mi')
    expect(record.engine).toBe('Detroit DD13')
    expect(record.vin).toBe('WKK41700000012345')
    expect(record.priceValue).toBe('289000')
  })

  it('reads headed description sections', () => {
    expect(record.description).toBe('Well maintained coach.')
    expect(record.interiorDescription).toBe('56 reclining seats')
    expect(record.features).toEqual(['Wi-Fi', 'Restroom'])
  })

  it('prefers lazy-load sources for gallery images', () => {
    expect(record.images.map(i => i.url)).toEqual([
      'https://www.daimlercoachesnorthamerica.com/media/coach-1.jpg',
    ])
  })
})

describe('MicroBirdParser', () => {
  const url = 'https://www.microbird.com/school-vehicles/g5-2019'
  const html = `<html><body>
    <h2 class="inventory-title">2019 Micro Bird G5 Ford</h2>
    <div class="inventory-price">$72,500</div>
    <ul class="inventory-details">
      <li>Year: 2019</li>
      <li>Make: MICRO BIRD</li>
      <li>Model: G5</li>
      <li>Mileage: 31,200</li>
      <li>Passengers: 20</li>
      <li>Exterior Color: Yellow</li>
    </ul>
    <div class="info-section"><h4>Exterior</h4><div class="content">Yellow  paint</div></div>
    <div class="description-section"><h3>Features</h3><div class="section-content">Air brakes
      LED lights
    </div></div>
    <div class="inventory-gallery"><img data-src="/media/g5.jpg"></div>
  </body></html>`

  const record = new MicroBirdParser().parseListing(html, url)

  it('parses "label: value" detail lines', () => {
    expect(record).toMatchObject({
      year: '2019',
      make: 'Micro Bird',
      model: 'g5',
      price: '$72,500',
      priceValue: '72500',
      mileage: '31,200',
      passengers: '20',
      exteriorColor: 'yellow',
      color: null,
    })
  })

  it('reads sections and splits plain-text feature lines', () => {
    expect(record.exteriorDescription).toBe('Yellow paint')
    expect(record.features).toEqual(['Air brakes', 'LED lights'])
  })

  it('collects lazy gallery images', () => {
    expect(record.images.map(i => i.url)).toEqual(['https://www.microbird.com/media/g5.jpg'])
  })

  it('is chosen for microbird.com URLs', () => {
    expect(getParser(url)).toBeInstanceOf(MicroBirdParser)
  })
})

describe('shared helpers', () => {
  it('maps spec labels to fields, most specific first', () => {
    expect(technicalFieldFor('Odometer')).toBe('mileage')
    expect(technicalFieldFor('GVWR (lbs)')).toBe('gvwr')
    expect(technicalFieldFor('Exterior Color')).toBe('exteriorColor')
    expect(technicalFieldFor('Color')).toBe('color')
    expect(technicalFieldFor('Stock #')).toBeNull()
  })

  it('skips anchors and non-web links', () => {
    expect(resolveUrl('#gallery', 'http://dealer.test/')).toBeNull()
    expect(resolveUrl('mailto:sales@dealer.test', 'http://dealer.test/')).toBeNull()
    expect(resolveUrl('ftp://dealer.test/file', 'http://dealer.test/')).toBeNull()
    expect(resolveUrl(' /bus/1#photos ', 'http://dealer.test/x')).toBe('http://dealer.test/bus/1')
  })

  it('splits feature fragments by list item or by line', () => {
    expect(splitFeatures('<ul><li>A</li><li></li><li>B</li></ul>')).toEqual(['A', 'B'])
    expect(splitFeatures('One\n\n  Two  \n')).toEqual(['One', 'Two'])
  })
})
