import type { PortfolioLocators } from '../config/locators'
import type { BasePage } from './BasePage'

export class PortfolioPage {
  readonly url: string

  constructor(
    readonly base: BasePage,
    readonly locators: PortfolioLocators
  ) {
    this.url = base.settings.urls.portfolio
  }

  async navigate(): Promise<void> {
    await this.base.goto(this.url)
    await this.base.waitForUrl('/portfolio')
  }

  async isLoaded(): Promise<boolean> {
    return this.base.appears(this.locators.pageHeader)
  }

  async arePositionsDisplayed(): Promise<boolean> {
    return (await this.getPositionCount()) > 0
  }

  /** Counted by visible stock symbols, since row markup varies between builds. */
  async getPositionCount(): Promise<number> {
    return this.base.count(this.locators.stockSymbol)
  }

  async isEmptyStateDisplayed(): Promise<boolean> {
    return this.base.isVisible(this.locators.emptyState)
  }

  async areMetricsDisplayed(): Promise<boolean> {
    return this.base.isVisible(this.locators.portfolioMetrics)
  }

  async getPortfolioValue(): Promise<number | null> {
    if (!(await this.areMetricsDisplayed())) return null
    const text = await this.base.getText(this.locators.portfolioMetrics)
    return text ? this.base.extractNumberFromText(text) : null
  }

  async areTradeButtonsVisible(): Promise<boolean> {
    return (await this.base.count(this.locators.tradeButton)) > 0
  }

  /** Returns false when there is no position at `index`. */
  async clickTradeButtonForPosition(index = 0): Promise<boolean> {
    if ((await this.base.count(this.locators.tradeButton)) <= index) return false
    await this.base.clickNth(this.locators.tradeButton, index)
    return true
  }

  async refresh(): Promise<void> {
    await this.base.reload()
  }

  async expectPortfolioPageLoaded(): Promise<void> {
    await this.base.expectVisible(this.locators.pageHeader)
    await this.base.expectUrl('/portfolio')
  }

  async expectPositionsDisplayed(): Promise<void> {
    await this.base.expectCountAbove(this.locators.stockSymbol, 0, 'Positions should be displayed')
  }

  /** Share count, market value and P&L columns are shown for the listed positions. */
  async expectPositionDetails(): Promise<void> {
    await this.base.expectVisible(this.locators.quantityCell, this.base.timeout, 'Position quantity should be displayed')
    await this.base.expectVisible(this.locators.valueCell, this.base.timeout, 'Position value should be displayed')
    await this.base.expectVisible(this.locators.profitLossCell, this.base.timeout, 'Position P&L should be displayed')
  }

  async expectMetricsDisplayed(): Promise<void> {
    await this.base.expectVisible(this.locators.portfolioMetrics, this.base.timeout, 'Portfolio metrics should be displayed')
  }

  async expectEmptyState(): Promise<void> {
    await this.base.expectVisible(this.locators.emptyState)
  }

  /** Either positions or the empty state; which one depends on the account. */
  async expectPositionsOrEmptyState(): Promise<void> {
    await this.base.expectAnyVisible(
      [this.locators.stockSymbol, this.locators.emptyState],
      'Portfolio should show positions or an empty state'
    )
  }
}
