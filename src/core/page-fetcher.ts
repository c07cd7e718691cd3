/**
 * Page fetchers: plain HTTP via fetch(), or a headless Chromium session for
 * JavaScript-rendered inventory sites.
 *
 * Both apply the same policy: a timeout per attempt, a fixed throttle delay
 * after every attempt (success or failure), and a bounded number of attempts
 * with a fixed delay between them.
 */

import { chromium, type Browser, type Page } from 'playwright-core'
import type { RawPage } from '../schema/listing-record.js'
import { FetchError, sleep, withRetry } from './fetch-with-retry.js'

export interface PageFetcher {
  readonly method: RawPage['method']
  fetch(url: string): Promise<RawPage>
  close(): Promise<void>
}

export interface FetchPolicy {
  timeoutMs: number
  requestDelayMs: number
  retryDelayMs: number
  maxRetries: number
  userAgent: string
}

abstract class ThrottledFetcher implements PageFetcher {
  abstract readonly method: RawPage['method']

  constructor(protected readonly policy: FetchPolicy) {}

  /** One attempt at retrieving the page body */
  protected abstract load(url: string): Promise<string>

  async fetch(url: string): Promise<RawPage> {
    const html = await withRetry(
      async () => {
        try {
          return await this.load(url)
        } finally {
          await sleep(this.policy.requestDelayMs)
        }
      },
      {
        maxRetries: this.policy.maxRetries,
        retryDelayMs: this.policy.retryDelayMs,
        label: url,
      }
    )
    return { url, html, method: this.method }
  }

  async close(): Promise<void> {}
}

export class HttpPageFetcher extends ThrottledFetcher {
  readonly method = 'http' as const

  protected async load(url: string): Promise<string> {
    const controller = new AbortController()
    const timer = setTimeout(() => controller.abort(), this.policy.timeoutMs)

    try {
      const res = await fetch(url, {
        headers: {
          'User-Agent': this.policy.userAgent,
          Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
          'Accept-Language': 'en-US,en;q=0.9',
        },
        redirect: 'follow',
        signal: controller.signal,
      })

      if (!res.ok) {
        throw new FetchError(url, `HTTP ${res.status}: ${res.statusText}`, res.status)
      }
      return await res.text()
    } catch (err) {
      if (err instanceof FetchError) throw err
      if (controller.signal.aborted) {
        throw new FetchError(url, `Timed out after ${this.policy.timeoutMs}ms`)
      }
      throw new FetchError(url, err instanceof Error ? err.message : String(err))
    } finally {
      clearTimeout(timer)
    }
  }
}

export interface BrowserFetchPolicy extends FetchPolicy {
  /** Wait after navigation so client-side rendering can finish */
  settleMs: number
}

/**
 * Reuses one browser and one tab for every fetch. Launched on first use,
 * released by close().
 */
export class BrowserPageFetcher extends ThrottledFetcher {
  readonly method = 'browser' as const

  private browser: Browser | null = null
  private page: Page | null = null

  constructor(protected readonly policy: BrowserFetchPolicy) {
    super(policy)
  }

  private async getPage(): Promise<Page> {
    if (this.page) return this.page

    if (!this.browser) {
      console.log('[browser] Launching headless Chromium...')
      this.browser = await chromium.launch({
        headless: true,
        args: ['--disable-blink-features=AutomationControlled', '--no-sandbox'],
      })
    }
    this.page = await this.browser.newPage({
      userAgent: this.policy.userAgent,
      viewport: { width: 1920, height: 1080 },
      ignoreHTTPSErrors: true,
    })
    return this.page
  }

  protected async load(url: string): Promise<string> {
    let page: Page
    try {
      page = await this.getPage()
    } catch (err) {
      throw new FetchError(url, `Browser launch failed: ${err instanceof Error ? err.message : String(err)}`)
    }

    try {
      const response = await page.goto(url, {
        waitUntil: 'domcontentloaded',
        timeout: this.policy.timeoutMs,
      })
      if (response && !response.ok()) {
        throw new FetchError(url, `HTTP ${response.status()}: ${response.statusText()}`, response.status())
      }
      await page.waitForTimeout(this.policy.settleMs)
      return await page.content()
    } catch (err) {
      if (err instanceof FetchError) throw err
      throw new FetchError(url, err instanceof Error ? err.message : String(err))
    }
  }

  async close(): Promise<void> {
    const browser = this.browser
    this.browser = null
    this.page = null
    if (browser) {
      await browser.close()
      console.log('[browser] Closed')
    }
  }
}

export function createPageFetcher(
  policy: FetchPolicy,
  useBrowser: boolean,
  settleMs = 3000
): PageFetcher {
  return useBrowser
    ? new BrowserPageFetcher({ ...policy, settleMs })
    : new HttpPageFetcher(policy)
}
