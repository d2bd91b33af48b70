import type { DashboardLocators } from '../config/locators'
import type { BasePage } from './BasePage'

export class DashboardPage {
  readonly url: string

  constructor(
    readonly base: BasePage,
    readonly locators: DashboardLocators
  ) {
    this.url = base.settings.urls.dashboard
  }

  async navigate(): Promise<void> {
    await this.base.goto(this.url)
    await this.base.waitForUrl('/dashboard')
  }

  async isLoaded(): Promise<boolean> {
    return (await this.base.appears(this.locators.header)) && (await this.base.appears(this.locators.logoutButton))
  }

  async logout(): Promise<void> {
    await this.base.click(this.locators.logoutButton)
    await this.base.waitForUrl('/login')
  }

  async isLoggedIn(): Promise<boolean> {
    return this.base.isVisible(this.locators.logoutButton)
  }

  // Navigation

  async navigateToTrading(): Promise<void> {
    await this.base.click(this.locators.tradingLink)
    await this.base.waitForUrl('/trading')
  }

  async navigateToPortfolio(): Promise<void> {
    await this.base.click(this.locators.portfolioLink)
    await this.base.waitForUrl('/portfolio')
  }

  async navigateToWatchlists(): Promise<void> {
    await this.base.click(this.locators.watchlistsLink)
    await this.base.waitForUrl('/watchlists')
  }

  async navigateToTrades(): Promise<void> {
    await this.base.click(this.locators.tradesLink)
    await this.base.waitForUrl('/trades')
  }

  // Portfolio summary

  async isPortfolioSummaryDisplayed(): Promise<boolean> {
    return (await this.base.isVisible(this.locators.portfolioValue)) || (await this.base.isVisible(this.locators.cashBalance))
  }

  async getPortfolioValue(): Promise<number | null> {
    return this.readAmount(this.locators.portfolioValue)
  }

  async getCashBalance(): Promise<number | null> {
    return this.readAmount(this.locators.cashBalance)
  }

  async getProfitLoss(): Promise<number | null> {
    return this.readAmount(this.locators.profitLoss)
  }

  async isTopPositionsDisplayed(): Promise<boolean> {
    return this.base.isVisible(this.locators.topPositions)
  }

  async isNavigationVisible(): Promise<boolean> {
    return this.base.isVisible(this.locators.navigationMenu)
  }

  async expectDashboardLoaded(): Promise<void> {
    await this.base.expectVisible(this.locators.header)
    await this.base.expectVisible(this.locators.logoutButton)
  }

  async expectLoggedIn(): Promise<void> {
    await this.base.expectVisible(this.locators.logoutButton, this.base.timeout, 'Logout button should be visible')
    await this.base.expectUrl('/dashboard')
  }

  async expectPortfolioSummaryVisible(): Promise<void> {
    await this.base.expectAnyVisible(
      [this.locators.portfolioValue, this.locators.cashBalance],
      'Portfolio summary should be visible'
    )
  }

  async expectNavigationVisible(): Promise<void> {
    await this.base.expectVisible(this.locators.navigationMenu)
  }

  private async readAmount(selector: string): Promise<number | null> {
    if (!(await this.base.isVisible(selector))) return null
    const text = await this.base.getText(selector)
    return text ? this.base.extractNumberFromText(text) : null
  }
}
