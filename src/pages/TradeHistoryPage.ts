import type { TradeHistoryLocators } from '../config/locators'
import type { TradeType } from '../models/trade'
import { formatLocator } from '../support/selectors'
import type { BasePage } from './BasePage'

export class TradeHistoryPage {
  readonly url: string

  constructor(
    readonly base: BasePage,
    readonly locators: TradeHistoryLocators
  ) {
    this.url = base.settings.urls.trades
  }

  async navigate(): Promise<void> {
    await this.base.goto(this.url)
    await this.base.waitForUrl('/trades')
  }

  async isLoaded(): Promise<boolean> {
    return this.base.appears(this.locators.pageHeader)
  }

  async areTradesDisplayed(): Promise<boolean> {
    return (await this.getTradeCount()) > 0
  }

  /** Counted by BUY/SELL labels rather than table rows. */
  async getTradeCount(): Promise<number> {
    return this.base.count(this.locators.tradeType)
  }

  async isEmptyStateDisplayed(): Promise<boolean> {
    return this.base.isVisible(this.locators.emptyState)
  }

  async isTradeTypeDisplayed(type: TradeType): Promise<boolean> {
    return this.base.isVisible(formatLocator(this.locators.tradeTypeNamed, { type }))
  }

  async isSymbolDisplayed(symbol: string): Promise<boolean> {
    return this.base.isVisible(formatLocator(this.locators.symbolNamed, { symbol }))
  }

  async areTimestampsDisplayed(): Promise<boolean> {
    return (await this.base.count(this.locators.timestampCell)) > 0
  }

  async arePricesDisplayed(): Promise<boolean> {
    return (await this.base.count(this.locators.priceCell)) > 0
  }

  async isSortButtonVisible(): Promise<boolean> {
    return this.base.isVisible(this.locators.sortButton)
  }

  /** Returns false when the page has no sort control. */
  async clickSort(): Promise<boolean> {
    if (!(await this.isSortButtonVisible())) return false
    await this.base.click(this.locators.sortButton)
    await this.base.waitForLoadState('networkidle')
    return true
  }

  async isFilterButtonVisible(): Promise<boolean> {
    return this.base.isVisible(this.locators.filterButton)
  }

  async isPaginationVisible(): Promise<boolean> {
    return this.base.isVisible(this.locators.pagination)
  }

  async refresh(): Promise<void> {
    await this.base.reload()
  }

  async expectTradeHistoryPageLoaded(): Promise<void> {
    await this.base.expectVisible(this.locators.pageHeader)
    await this.base.expectUrl('/trades')
  }

  async expectTradesDisplayed(): Promise<void> {
    await this.base.expectCountAbove(this.locators.tradeType, 0, 'Trades should be displayed')
  }

  async expectTradeAppears(type: TradeType, symbol: string): Promise<void> {
    await this.base.expectVisible(
      formatLocator(this.locators.tradeTypeNamed, { type }),
      this.base.timeout,
      `${type} trade should be displayed`
    )
    await this.base.expectVisible(
      formatLocator(this.locators.symbolNamed, { symbol }),
      this.base.timeout,
      `Symbol ${symbol} should be displayed`
    )
  }

  async expectEmptyState(): Promise<void> {
    await this.base.expectVisible(this.locators.emptyState)
  }

  async expectTradesOrEmptyState(): Promise<void> {
    await this.base.expectAnyVisible(
      [this.locators.tradeType, this.locators.emptyState],
      'Trade history should show trades or an empty state'
    )
  }
}
