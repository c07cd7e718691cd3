/**
 * Field normalization for vehicle listing data.
 */

/** Collapse whitespace and trim; empty strings become null */
export function cleanText(raw: string | undefined | null): string | null {
  if (raw == null) return null
  const text = raw.replace(/\s+/g, ' ').trim()
  return text || null
}

/** Strip everything but digits and the decimal point: "$84,500.00" -> "84500.00" */
export function extractNumericPrice(raw: string | undefined | null): string | null {
  if (!raw) return null
  const digits = raw.replace(/[^\d.]/g, '')
  return digits || null
}

/** Parse price string to number */
export function parsePrice(raw: string | number | undefined | null): number | null {
  if (raw == null) return null
  if (typeof raw === 'number') return raw > 0 ? raw : null
  const cleaned = raw.replace(/[$,\s]/g, '')
  const num = parseFloat(cleaned)
  if (isNaN(num) || num <= 0) return null
  return num
}

const TITLE_PATTERN = /(\d{4})\s+([A-Za-z]+(?:\s+[A-Za-z]+)?)\s+([A-Za-z0-9]+(?:\s+[A-Za-z0-9]+)*)/

export interface YearMakeModel {
  year: string | null
  make: string | null
  model: string | null
}

/** Parse "2015 Blue Bird Vision" into year / make / model */
export function parseYearMakeModel(title: string | null): YearMakeModel {
  const match = title ? TITLE_PATTERN.exec(title) : null
  if (!match) return { year: null, make: null, model: null }
  return { year: match[1], make: match[2], model: match[3] }
}

/** Fill only the parts still missing from `found` using the title */
export function fillFromTitle(found: YearMakeModel, title: string | null): YearMakeModel {
  if (found.year && found.make && found.model) return found
  const fromTitle = parseYearMakeModel(title)
  return {
    year: found.year ?? fromTitle.year,
    make: found.make ?? fromTitle.make,
    model: found.model ?? fromTitle.model,
  }
}

/**
 * Identity signature used for cross-source dedupe:
 * year|make|model|title, lower-cased and whitespace-collapsed.
 */
export function identitySignature(item: {
  title: string | null
  year: string | null
  make: string | null
  model: string | null
}): string {
  return [item.year, item.make, item.model, item.title]
    .map(part => (part ?? '').toLowerCase().replace(/\s+/g, ' ').trim())
    .join('|')
}

export function titleCase(str: string): string {
  return str
    .toLowerCase()
    .split(' ')
    .map(w => w.charAt(0).toUpperCase() + w.slice(1))
    .join(' ')
}

/** Normalize make/brand name */
export function normalizeMake(raw: string | undefined | null): string | null {
  const text = cleanText(raw)
  return text ? titleCase(text) : null
}
