/**
 * Playwright-backed rendering sessions.
 *
 * Device modes:
 * - vps: attach to an already running browser over CDP (BROWSER_WS_ENDPOINT)
 * - pc:  launch a locally installed Chrome, optionally on a persistent
 *        profile directory so an interactive login survives restarts
 *
 * playwright-core ships no browsers; nothing is downloaded.
 */

import { chromium, errors, type Browser, type BrowserContext, type Locator, type Page } from 'playwright-core'
import { loggers } from '../config/logger.js'
import { CrawlError } from '../crawl/errors.js'
import {
  navFailed,
  navOk,
  type ClickTarget,
  type NavResult,
  type PageHandle,
  type RenderingSession,
  type SelectorSpec,
  type SessionLease,
  type SessionProvider,
} from './session.js'

const log = loggers.render

export type DeviceMode = 'pc' | 'vps'

export interface PlaywrightProviderOptions {
  device: DeviceMode
  wsEndpoint?: string
  executablePath?: string
  userDataDir?: string
  headless?: boolean
  navigationTimeoutMs?: number
  /** Pause after each scroll so lazy listings can load. */
  scrollPauseMs?: number
}

const CLOSED_PATTERNS = [
  'Target page, context or browser has been closed',
  'Browser has been closed',
  'Target closed',
  'browser has disconnected',
]

export function isSessionClosedError(error: unknown): boolean {
  const message = error instanceof Error ? error.message : String(error)
  return CLOSED_PATTERNS.some((pattern) => message.includes(pattern))
}

function toNavFailure(error: unknown): NavResult {
  const message = error instanceof Error ? error.message : String(error)
  if (isSessionClosedError(error)) {
    return navFailed('session-lost', message)
  }
  if (error instanceof errors.TimeoutError) {
    return navFailed('timeout', message)
  }
  return navFailed('failure', message)
}

export class PlaywrightSession implements RenderingSession {
  constructor(
    private readonly page: Page,
    private readonly timeoutMs: number,
    private readonly scrollPauseMs: number
  ) {}

  async navigate(url: string): Promise<NavResult> {
    try {
      const response = await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.timeoutMs })
      const status = response?.status()
      if (status === 404 || status === 410) {
        return navFailed('not-found', `HTTP ${status} for ${url}`, status)
      }
      if (status !== undefined && status >= 400) {
        return navFailed('failure', `HTTP ${status} for ${url}`, status)
      }
      return navOk(this.page.url())
    } catch (error) {
      return toNavFailure(error)
    }
  }

  async scrollUntil(predicate: () => Promise<boolean>, maxIterations: number): Promise<PageHandle> {
    for (let i = 0; i < maxIterations; i++) {
      if (await predicate()) break
      await this.guard(() => this.page.evaluate('window.scrollTo(0, document.body.scrollHeight)'))
      await this.guard(() => this.page.waitForTimeout(this.scrollPauseMs))
    }
    return { url: this.page.url() }
  }

  async click(target: ClickTarget): Promise<NavResult> {
    try {
      await this.page
        .locator(target.selector)
        .nth(target.index ?? 0)
        .click({ timeout: this.timeoutMs })
      await this.page.waitForLoadState('domcontentloaded', { timeout: this.timeoutMs })
      return navOk(this.page.url())
    } catch (error) {
      return toNavFailure(error)
    }
  }

  async extractField(spec: SelectorSpec): Promise<string | undefined> {
    const locator = this.locate(spec.selector, spec.within).nth(spec.index ?? 0)
    const value = await this.guard(async () => {
      if ((await locator.count()) === 0) return null
      return spec.attribute
        ? locator.getAttribute(spec.attribute, { timeout: this.timeoutMs })
        : locator.innerText({ timeout: this.timeoutMs })
    }, spec.selector)
    return value ?? undefined
  }

  async countMatches(selector: string, within?: ClickTarget): Promise<number> {
    return (await this.guard(() => this.locate(selector, within).count(), selector)) ?? 0
  }

  currentUrl(): string {
    return this.page.url()
  }

  private locate(selector: string, within?: ClickTarget): Locator {
    return within
      ? this.page.locator(within.selector).nth(within.index ?? 0).locator(selector)
      : this.page.locator(selector)
  }

  /**
   * A closed browser ends the run; any other read error is reported as "nothing there".
   */
  private async guard<T>(read: () => Promise<T>, selector?: string): Promise<T | null> {
    try {
      return await read()
    } catch (error) {
      if (isSessionClosedError(error)) {
        throw new CrawlError('SessionLost', 'Browser session closed', { cause: error })
      }
      log.debug('Page read failed', { selector, reason: error instanceof Error ? error.message : String(error) })
      return null
    }
  }
}

export class PlaywrightSessionProvider implements SessionProvider {
  private browser: Browser | null = null
  private context: BrowserContext | null = null
  private readonly leased = new Set<string>()

  constructor(private readonly options: PlaywrightProviderOptions) {
    if (options.device === 'vps' && !options.wsEndpoint) {
      throw new Error('vps device mode needs BROWSER_WS_ENDPOINT')
    }
  }

  async acquire(targetId: string): Promise<SessionLease> {
    if (this.leased.has(targetId)) {
      throw new Error(`Session for target ${targetId} is already leased`)
    }

    const context = await this.getContext()
    const page = await context.newPage()
    const timeoutMs = this.options.navigationTimeoutMs ?? 30_000
    page.setDefaultTimeout(timeoutMs)
    this.leased.add(targetId)

    log.debug('Session acquired', { targetId, device: this.options.device })

    let released = false
    return {
      session: new PlaywrightSession(page, timeoutMs, this.options.scrollPauseMs ?? 1_500),
      release: async () => {
        if (released) return
        released = true
        this.leased.delete(targetId)
        if (!page.isClosed()) {
          await page.close()
        }
        log.debug('Session released', { targetId })
      },
    }
  }

  /**
   * Closing a launched browser closes its contexts; closing a CDP browser only disconnects.
   */
  async close(): Promise<void> {
    if (this.browser) {
      await this.browser.close()
    } else if (this.context) {
      await this.context.close()
    }
    this.browser = null
    this.context = null
  }

  private async getContext(): Promise<BrowserContext> {
    if (this.context) return this.context

    const { device, wsEndpoint, executablePath, userDataDir, headless = true } = this.options

    if (device === 'vps' && wsEndpoint) {
      log.info('Connecting to remote browser')
      this.browser = await chromium.connectOverCDP(wsEndpoint)
      this.context = this.browser.contexts()[0] ?? (await this.browser.newContext())
      return this.context
    }

    const launch = executablePath ? { executablePath, headless } : { channel: 'chrome', headless }

    if (userDataDir) {
      log.info('Launching Chrome with persistent profile', { userDataDir })
      this.context = await chromium.launchPersistentContext(userDataDir, launch)
      return this.context
    }

    log.info('Launching Chrome')
    this.browser = await chromium.launch(launch)
    this.context = await this.browser.newContext()
    return this.context
  }
}
