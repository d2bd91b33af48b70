import fs from 'node:fs'
import path from 'node:path'
import { errors, expect } from '@playwright/test'
import type { Locator, Page, Response } from '@playwright/test'
import type { Settings } from '../config/settings'
import { extractNumberFromText } from '../support/text'
import { isOnPath, toUrlMatcher } from '../support/urls'
import type { UrlPattern } from '../support/urls'

export type ElementState = 'visible' | 'hidden' | 'attached' | 'detached'
export type LoadState = 'load' | 'domcontentloaded' | 'networkidle'
export type AriaRole = Parameters<Page['getByRole']>[0]
export type RoleOptions = Parameters<Page['getByRole']>[1]

export class ElementNotFoundError extends Error {
  readonly selector: string

  constructor(selector: string, options?: ErrorOptions) {
    super(`No element matches ${selector}`, options)
    this.name = 'ElementNotFoundError'
    this.selector = selector
  }
}

export const isTimeoutError = (error: unknown): error is errors.TimeoutError =>
  error instanceof errors.TimeoutError

/**
 * Shared driver handle for every page object: the only place that talks to
 * the Playwright `Page`. Selector-taking calls default their timeout to
 * `settings.timeout` and, like `page.click`, act on the first match.
 */
export class BasePage {
  readonly timeout: number

  constructor(
    readonly page: Page,
    readonly settings: Settings
  ) {
    this.timeout = settings.timeout
  }

  // Navigation

  async goto(url: string, waitUntil: LoadState = 'networkidle'): Promise<void> {
    await this.page.goto(url, { waitUntil, timeout: this.timeout })
  }

  async waitForUrl(url: UrlPattern, timeout = this.timeout): Promise<void> {
    await this.page.waitForURL(toUrlMatcher(url), { timeout })
  }

  currentUrl(): string {
    return this.page.url()
  }

  /** Whether the current pathname contains `path` as whole segments. */
  isOnPath(path: string): boolean {
    return isOnPath(this.currentUrl(), path)
  }

  async reload(waitUntil: LoadState = 'networkidle'): Promise<void> {
    await this.page.reload({ waitUntil, timeout: this.timeout })
  }

  // Locating

  locator(selector: string): Locator {
    return this.page.locator(selector)
  }

  byText(text: string | RegExp, exact = false): Locator {
    return this.page.getByText(text, { exact })
  }

  byRole(role: AriaRole, options?: RoleOptions): Locator {
    return this.page.getByRole(role, options)
  }

  // Interaction

  async click(selector: string, timeout = this.timeout): Promise<void> {
    await this.act(selector, (target) => target.first().click({ timeout }))
  }

  /** Click the `index`-th match (0-based) of a selector that may match many elements. */
  async clickNth(selector: string, index = 0, timeout = this.timeout): Promise<void> {
    await this.act(selector, (target) => target.nth(index).click({ timeout }))
  }

  async fill(selector: string, value: string, timeout = this.timeout): Promise<void> {
    await this.act(selector, (target) => target.first().fill(value, { timeout }))
  }

  async getText(selector: string, timeout = this.timeout): Promise<string | null> {
    return this.act(selector, (target) => target.first().textContent({ timeout }))
  }

  async getValue(selector: string, timeout = this.timeout): Promise<string> {
    return this.act(selector, (target) => target.first().inputValue({ timeout }))
  }

  // Waiting

  async waitForElementState(selector: string, state: ElementState = 'visible', timeout = this.timeout): Promise<void> {
    await this.page.locator(selector).first().waitFor({ state, timeout })
  }

  /**
   * Poll until the first match of `selector` is visible. Resolves `false`
   * instead of throwing when the timeout runs out.
   */
  async appears(selector: string, timeout = this.timeout): Promise<boolean> {
    try {
      await this.waitForElementState(selector, 'visible', timeout)
      return true
    } catch (error) {
      if (isTimeoutError(error)) return false
      throw error
    }
  }

  /** Like {@link appears}, for whichever of `selectors` shows up first. */
  async appearsAny(selectors: readonly string[], timeout = this.timeout): Promise<boolean> {
    try {
      await this.either(selectors).first().waitFor({ state: 'visible', timeout })
      return true
    } catch (error) {
      if (isTimeoutError(error)) return false
      throw error
    }
  }

  /** Unconditional sleep. Prefer {@link appears} or {@link waitForElementState}. */
  async waitForTimeout(ms: number): Promise<void> {
    await this.page.waitForTimeout(ms)
  }

  async waitForLoadState(state: LoadState = 'networkidle', timeout = this.timeout): Promise<void> {
    await this.page.waitForLoadState(state, { timeout })
  }

  // Querying; these look at the first match and do not wait

  async isVisible(selector: string): Promise<boolean> {
    return this.page.locator(selector).first().isVisible()
  }

  async isEnabled(selector: string): Promise<boolean> {
    return this.page.locator(selector).first().isEnabled()
  }

  async count(selector: string): Promise<number> {
    return this.page.locator(selector).count()
  }

  // Assertions

  async expectVisible(selector: string, timeout = this.timeout, message?: string): Promise<void> {
    await expect(this.page.locator(selector).first(), message ?? `${selector} should be visible`).toBeVisible({ timeout })
  }

  async expectHidden(selector: string, timeout = this.timeout, message?: string): Promise<void> {
    await expect(this.page.locator(selector).first(), message ?? `${selector} should be hidden`).toBeHidden({ timeout })
  }

  async expectContainsText(selector: string, text: string | RegExp, timeout = this.timeout): Promise<void> {
    await expect(this.page.locator(selector).first(), `${selector} should contain ${String(text)}`).toContainText(text, {
      timeout,
    })
  }

  async expectUrl(url: UrlPattern, timeout = this.timeout): Promise<void> {
    const matcher = toUrlMatcher(url)
    const message = `URL should match ${String(url)}`
    if (typeof matcher === 'function') {
      await expect.poll(() => matcher(new URL(this.currentUrl())), { message, timeout }).toBe(true)
    } else {
      await expect(this.page, message).toHaveURL(matcher, { timeout })
    }
  }

  /** At least one of `selectors` becomes visible. */
  async expectAnyVisible(selectors: readonly string[], message: string, timeout = this.timeout): Promise<void> {
    await expect(this.either(selectors).first(), message).toBeVisible({ timeout })
  }

  async expectCountAbove(selector: string, min: number, message: string, timeout = this.timeout): Promise<void> {
    await expect.poll(() => this.count(selector), { message, timeout }).toBeGreaterThan(min)
  }

  // Screenshots

  async takeScreenshot(name: string, fullPage = false): Promise<string> {
    fs.mkdirSync(this.settings.screenshotDir, { recursive: true })
    const file = path.join(this.settings.screenshotDir, `${name}.png`)
    await this.page.screenshot({ path: file, fullPage })
    return file
  }

  // Local storage

  async getLocalStorageItem(key: string): Promise<string | null> {
    return this.page.evaluate((storageKey) => window.localStorage.getItem(storageKey), key)
  }

  async setLocalStorageItem(key: string, value: string): Promise<void> {
    await this.page.evaluate(([storageKey, storageValue]) => window.localStorage.setItem(storageKey, storageValue), [
      key,
      value,
    ] as const)
  }

  async clearLocalStorage(): Promise<void> {
    await this.page.evaluate(() => window.localStorage.clear())
  }

  // Utilities

  extractNumberFromText(text: string): number {
    return extractNumberFromText(text)
  }

  /**
   * Wait for the next response whose URL contains `urlPattern` (or matches it,
   * for a RegExp).
   */
  async waitForApiResponse(urlPattern: string | RegExp, timeout = this.timeout): Promise<Response> {
    return this.page.waitForResponse(
      (response) =>
        typeof urlPattern === 'string' ? response.url().includes(urlPattern) : urlPattern.test(response.url()),
      { timeout }
    )
  }

  private either(selectors: readonly string[]): Locator {
    const [first, ...rest] = selectors.map((selector) => this.page.locator(selector))
    if (first === undefined) throw new Error('At least one selector is required')
    return rest.reduce((combined, next) => combined.or(next), first)
  }

  private async act<T>(selector: string, action: (target: Locator) => Promise<T>): Promise<T> {
    const target = this.page.locator(selector)
    try {
      return await action(target)
    } catch (error) {
      if (isTimeoutError(error) && (await target.count()) === 0) {
        throw new ElementNotFoundError(selector, { cause: error })
      }
      throw error
    }
  }
}
