#!/usr/bin/env tsx
/**
 * CLI runner for the vehicle listing scraper.
 *
 * Usage:
 *   npx tsx src/cli.ts --urls <url...>          Scrape these detail pages
 *   npx tsx src/cli.ts --url-file <path>        Scrape URLs listed in a file
 *   npx tsx src/cli.ts --seeds <url...>         Discover inventory pages, scrape detail pages
 *   npx tsx src/cli.ts                          Discover BASE_URL
 *   npx tsx src/cli.ts --list                   List site profiles
 *
 * Options:
 *   --browser (alias --selenium)   Fetch through headless Chromium
 *   --limit <n>                    Scrape at most n listings
 *   --max-pages <n>                Inventory pages to walk per seed
 *   --dry-run                      Skip the database
 *   --no-output                    Skip JSON/CSV/summary files
 *   --cross-source                 Also dedupe on year/make/model/title
 */

import { resolve } from 'node:path'
import { loadConfig } from './config.js'
import { runScrape, type RunResult, type RunSource } from './core/runner.js'
import './parsers/load-all.js'
import { listSites } from './parsers/registry.js'

const args = process.argv.slice(2)

function hasFlag(name: string): boolean {
  return args.includes(`--${name}`)
}

function getFlag(name: string): string | undefined {
  const idx = args.indexOf(`--${name}`)
  const value = idx >= 0 ? args[idx + 1] : undefined
  return value && !value.startsWith('--') ? value : undefined
}

/** Every value after --name up to the next flag */
function getListFlag(name: string): string[] | undefined {
  const idx = args.indexOf(`--${name}`)
  if (idx < 0) return undefined
  const values: string[] = []
  for (const arg of args.slice(idx + 1)) {
    if (arg.startsWith('--')) break
    values.push(arg)
  }
  return values
}

function getIntFlag(name: string): number | undefined {
  const raw = getFlag(name)
  if (raw === undefined) return undefined
  if (!/^\d+$/.test(raw)) {
    console.error(`Error: --${name} must be a whole number, got "${raw}"`)
    process.exit(1)
  }
  return parseInt(raw, 10)
}

function resolveSource(): RunSource | null {
  const urls = getListFlag('urls')
  const urlFile = getFlag('url-file')
  const seeds = getListFlag('seeds')

  const given = [urls, urlFile, seeds].filter(v => v !== undefined)
  if (given.length > 1) {
    console.error('Error: --urls, --url-file and --seeds cannot be combined')
    return null
  }

  if (urls) {
    if (urls.length === 0) {
      console.error('Error: --urls needs at least one URL')
      return null
    }
    return { kind: 'urls', urls }
  }
  if (hasFlag('url-file')) {
    if (!urlFile) {
      console.error('Error: --url-file needs a path')
      return null
    }
    return { kind: 'file', path: urlFile }
  }
  if (seeds) {
    if (seeds.length === 0) {
      console.error('Error: --seeds needs at least one URL')
      return null
    }
    return { kind: 'seeds', seeds }
  }
  return { kind: 'base' }
}

function printResult(r: RunResult) {
  console.log('\n=== SUMMARY ===')
  if (r.error) console.log(`  FAILED: ${r.error}`)
  console.log(`  Listings found: ${r.records.length}`)
  if (r.persisted) {
    console.log(`  Inserted: ${r.persisted.insertedIds.length}`)
    console.log(`  Duplicates: ${r.persisted.duplicates}`)
    console.log(`  Invalid: ${r.persisted.invalid}`)
    if (r.persisted.failed > 0) console.log(`  Failed inserts: ${r.persisted.failed}`)
  }
  if (r.outputDir) console.log(`  Output: ${r.outputDir}`)
  console.log(`  Duration: ${(r.durationMs / 1000).toFixed(1)}s`)
}

function printUsage() {
  console.log(`
Usage:
  npx tsx src/cli.ts --urls <url...> [options]
  npx tsx src/cli.ts --url-file <path> [options]
  npx tsx src/cli.ts --seeds <url...> [options]
  npx tsx src/cli.ts [options]                      (discovers BASE_URL)
  npx tsx src/cli.ts --list

Options:
  --browser | --selenium   Fetch through headless Chromium
  --limit <n>              Scrape at most n listings
  --max-pages <n>          Inventory pages to walk per seed
  --dry-run                Skip the database
  --no-output              Skip JSON/CSV/summary files
  --cross-source           Also dedupe on year/make/model/title
`)
}

async function main() {
  if (hasFlag('help')) {
    printUsage()
    process.exit(0)
  }

  if (hasFlag('list')) {
    console.log('Site profiles:')
    for (const site of listSites()) {
      console.log(`  ${site.key.padEnd(18)} ${site.label.padEnd(32)} ${site.hosts.join(', ')}${site.pathPrefix ?? ''}`)
    }
    console.log(`  ${'generic'.padEnd(18)} (fallback for every other site)`)
    process.exit(0)
  }

  const source = resolveSource()
  if (!source) {
    printUsage()
    process.exit(1)
  }

  const config = loadConfig()
  if (source.kind === 'base' && !config.baseUrl) {
    console.error('Error: pass --urls, --url-file or --seeds, or set BASE_URL in .env')
    printUsage()
    process.exit(1)
  }

  const result = await runScrape({
    source,
    config,
    useBrowser: hasFlag('browser') || hasFlag('selenium'),
    limit: getIntFlag('limit'),
    maxPages: getIntFlag('max-pages'),
    dryRun: hasFlag('dry-run'),
    outputRoot: hasFlag('no-output') ? null : resolve(config.outputDir),
    crossSourceDedupe: hasFlag('cross-source'),
  })

  printResult(result)
  process.exit(result.error || result.records.length === 0 ? 1 : 0)
}

main().catch(err => {
  console.error('Fatal error:', err)
  process.exit(1)
})
