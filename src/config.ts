/**
 * Scraper settings: read once from the environment (.env via dotenv).
 */

import 'dotenv/config'

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export interface ScraperConfig {
  baseUrl: string | null
  paginationPattern: string
  minListings: number
  maxPages: number
  requestDelayMs: number
  retryDelayMs: number
  timeoutMs: number
  maxRetries: number
  userAgent: string
  outputDir: string
}

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36'

type Env = Record<string, string | undefined>

function readInt(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim()
  if (!raw) return fallback
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`)
  }
  return parseInt(raw, 10)
}

export function loadConfig(env: Env = process.env): ScraperConfig {
  const maxRetries = readInt(env, 'MAX_RETRIES', 3)
  if (maxRetries < 1) throw new ConfigError('MAX_RETRIES must be at least 1')

  return {
    baseUrl: env.BASE_URL?.trim() || null,
    paginationPattern: env.PAGINATION_PATTERN?.trim() || 'page={page}',
    minListings: readInt(env, 'MIN_LISTINGS', 30),
    maxPages: readInt(env, 'MAX_PAGES', 10),
    requestDelayMs: readInt(env, 'REQUEST_DELAY_MS', 10_000),
    retryDelayMs: readInt(env, 'RETRY_DELAY_MS', 5_000),
    timeoutMs: readInt(env, 'TIMEOUT_MS', 30_000),
    maxRetries,
    userAgent: env.USER_AGENT?.trim() || DEFAULT_USER_AGENT,
    outputDir: env.OUTPUT_DIR?.trim() || 'output',
  }
}
