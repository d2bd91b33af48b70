import type { WatchlistLocators } from '../config/locators'
import { formatLocator } from '../support/selectors'
import type { BasePage } from './BasePage'

export class WatchlistPage {
  readonly url: string

  constructor(
    readonly base: BasePage,
    readonly locators: WatchlistLocators
  ) {
    this.url = base.settings.urls.watchlists
  }

  async navigate(): Promise<void> {
    await this.base.goto(this.url)
    await this.base.waitForUrl('/watchlists')
  }

  async isLoaded(): Promise<boolean> {
    return this.base.appears(this.locators.pageHeader)
  }

  async isCreateButtonVisible(): Promise<boolean> {
    return this.base.isVisible(this.locators.createButton)
  }

  async clickCreateWatchlist(): Promise<void> {
    await this.base.click(this.locators.createButton)
    await this.base.waitForElementState(this.locators.nameInput, 'visible')
  }

  async fillWatchlistName(name: string): Promise<void> {
    await this.base.fill(this.locators.nameInput, name)
  }

  async clickSave(): Promise<boolean> {
    return this.clickIfPresent(this.locators.saveButton)
  }

  async createWatchlist(name: string): Promise<void> {
    await this.clickCreateWatchlist()
    await this.fillWatchlistName(name)
    await this.clickSave()
  }

  async getWatchlistCount(): Promise<number> {
    return this.base.count(this.locators.watchlistItem)
  }

  async isWatchlistDisplayed(name: string): Promise<boolean> {
    return this.base.isVisible(formatLocator(this.locators.watchlistNamed, { name }))
  }

  async clickAddStock(): Promise<boolean> {
    if (!(await this.clickIfPresent(this.locators.addStockButton))) return false
    await this.base.waitForElementState(this.locators.stockSymbolInput, 'visible')
    return true
  }

  async fillStockSymbol(symbol: string): Promise<void> {
    await this.base.fill(this.locators.stockSymbolInput, symbol)
  }

  async addStockToWatchlist(symbol: string): Promise<void> {
    await this.clickAddStock()
    await this.fillStockSymbol(symbol)
    await this.clickSave()
  }

  async isStockInWatchlist(symbol: string): Promise<boolean> {
    return this.base.isVisible(formatLocator(this.locators.stockNamed, { symbol }))
  }

  /** Returns false when the watchlist has no removable stock. */
  async removeFirstStock(): Promise<boolean> {
    return this.clickIfPresent(this.locators.removeStockButton)
  }

  /** Returns false when there is no watchlist to delete. */
  async deleteFirstWatchlist(): Promise<boolean> {
    return this.clickIfPresent(this.locators.deleteWatchlistButton)
  }

  async isSuccessMessageDisplayed(): Promise<boolean> {
    return this.base.isVisible(this.locators.successMessage)
  }

  async isErrorMessageDisplayed(): Promise<boolean> {
    return this.base.isVisible(this.locators.errorMessage)
  }

  async expectWatchlistPageLoaded(): Promise<void> {
    await this.base.expectVisible(this.locators.pageHeader)
    await this.base.expectUrl('/watchlists')
  }

  async expectCreateButtonVisible(): Promise<void> {
    await this.base.expectVisible(this.locators.createButton)
  }

  async expectWatchlistCreated(name: string): Promise<void> {
    await this.base.expectVisible(
      formatLocator(this.locators.watchlistNamed, { name }),
      this.base.timeout,
      `Watchlist '${name}' should be displayed`
    )
  }

  async expectStockInWatchlist(symbol: string): Promise<void> {
    await this.base.expectVisible(
      formatLocator(this.locators.stockNamed, { symbol }),
      this.base.timeout,
      `Stock ${symbol} should be in the watchlist`
    )
  }

  private async clickIfPresent(selector: string): Promise<boolean> {
    if ((await this.base.count(selector)) === 0) return false
    await this.base.click(selector)
    await this.base.waitForLoadState('networkidle')
    return true
  }
}
