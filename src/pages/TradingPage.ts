import type { TradingLocators } from '../config/locators'
import { TradeType } from '../models/trade'
import type { Trade } from '../models/trade'
import { formatLocator } from '../support/selectors'
import type { BasePage } from './BasePage'

/**
 * What the page object last did to the trade modal. It is bookkeeping for
 * tests, not a guard: actions run whatever the recorded state is.
 */
export type TradeModalState =
  | { status: 'closed' }
  | { status: 'open'; side?: TradeType }
  | { status: 'submitted'; side?: TradeType }

export type TradeOutcome = 'success' | 'error' | 'pending'

export interface ExecuteTradeOptions {
  /** Wait for a success or error message after submitting. Defaults to true. */
  waitForResult?: boolean
  /** Open the modal from the row of `trade.symbol` instead of the first listed stock. */
  matchSymbol?: boolean
}

export class TradingPage {
  readonly url: string
  private modal: TradeModalState = { status: 'closed' }

  constructor(
    readonly base: BasePage,
    readonly locators: TradingLocators
  ) {
    this.url = base.settings.urls.trading
  }

  get modalState(): TradeModalState {
    return this.modal
  }

  async navigate(): Promise<void> {
    await this.base.goto(this.url)
    await this.base.waitForUrl('/trading')
    this.modal = { status: 'closed' }
  }

  /** Stock rows render client-side after the header, so wait for them too. */
  async isLoaded(): Promise<boolean> {
    return (await this.base.appears(this.locators.pageHeader)) && (await this.base.appears(this.locators.stockSymbols))
  }

  async areStocksDisplayed(): Promise<boolean> {
    return (await this.base.count(this.locators.stockSymbols)) > 0
  }

  async areTradeButtonsVisible(): Promise<boolean> {
    return (await this.base.count(this.locators.tradeButton)) > 0
  }

  async openTradeModal(): Promise<void> {
    await this.base.waitForElementState(this.locators.tradeButton, 'visible')
    await this.base.clickNth(this.locators.tradeButton, 0)
    await this.waitForModal()
  }

  async openTradeModalFor(symbol: string): Promise<void> {
    await this.base.click(formatLocator(this.locators.tradeButtonForSymbol, { symbol }))
    await this.waitForModal()
  }

  async isTradeModalOpen(): Promise<boolean> {
    return (await this.base.isVisible(this.locators.buyButton)) && (await this.base.isVisible(this.locators.sellButton))
  }

  async selectBuy(): Promise<void> {
    await this.base.click(this.locators.buyButton)
    this.modal = { status: 'open', side: TradeType.Buy }
  }

  async selectSell(): Promise<void> {
    await this.base.click(this.locators.sellButton)
    this.modal = { status: 'open', side: TradeType.Sell }
  }

  async fillQuantity(quantity: number): Promise<void> {
    await this.base.fill(this.locators.quantityInput, String(quantity))
  }

  async clickExecute(): Promise<void> {
    await this.base.clickNth(this.locators.executeButton, 0)
    this.modal = { status: 'submitted', side: this.modal.status === 'closed' ? undefined : this.modal.side }
  }

  async clickCancel(): Promise<void> {
    await this.base.clickNth(this.locators.cancelButton, 0)
    this.modal = { status: 'closed' }
  }

  async executeBuyTrade(quantity: number, waitForResult = true): Promise<TradeOutcome> {
    await this.openTradeModal()
    return this.submit(TradeType.Buy, quantity, waitForResult)
  }

  async executeSellTrade(quantity: number, waitForResult = true): Promise<TradeOutcome> {
    await this.openTradeModal()
    return this.submit(TradeType.Sell, quantity, waitForResult)
  }

  async executeTrade(trade: Trade, options: ExecuteTradeOptions = {}): Promise<TradeOutcome> {
    if (options.matchSymbol) {
      await this.openTradeModalFor(trade.symbol)
    } else {
      await this.openTradeModal()
    }
    return this.submit(trade.tradeType, trade.quantity, options.waitForResult ?? true)
  }

  async isSuccessMessageDisplayed(): Promise<boolean> {
    return this.base.isVisible(this.locators.successMessage)
  }

  async isErrorMessageDisplayed(): Promise<boolean> {
    return this.base.isVisible(this.locators.errorMessage)
  }

  async isQuantityInputVisible(): Promise<boolean> {
    return (await this.base.count(this.locators.quantityInput)) > 0
  }

  async isExecuteButtonVisible(): Promise<boolean> {
    return (await this.base.count(this.locators.executeButton)) > 0
  }

  /** Which result message is on screen right now. */
  async currentOutcome(): Promise<TradeOutcome> {
    if (await this.isSuccessMessageDisplayed()) return 'success'
    if (await this.isErrorMessageDisplayed()) return 'error'
    return 'pending'
  }

  async expectTradingPageLoaded(): Promise<void> {
    await this.base.expectVisible(this.locators.pageHeader)
    await this.base.expectUrl('/trading')
  }

  async expectStocksDisplayed(): Promise<void> {
    await this.base.expectCountAbove(this.locators.stockSymbols, 0, 'Stocks should be displayed')
  }

  async expectTradeModalOpen(): Promise<void> {
    await this.base.expectVisible(this.locators.buyButton)
    await this.base.expectVisible(this.locators.sellButton)
  }

  async expectTradeFormElements(): Promise<void> {
    await this.base.expectCountAbove(this.locators.quantityInput, 0, 'Quantity input should be visible')
    await this.base.expectCountAbove(this.locators.executeButton, 0, 'Execute button should be visible')
  }

  async expectTradeOutcome(): Promise<void> {
    await this.base.expectAnyVisible(
      [this.locators.successMessage, this.locators.errorMessage],
      'A trade success or error message should be shown'
    )
  }

  private async waitForModal(): Promise<void> {
    await this.base.waitForElementState(this.locators.buyButton, 'visible')
    this.modal = { status: 'open' }
  }

  private async submit(side: TradeType, quantity: number, waitForResult: boolean): Promise<TradeOutcome> {
    if (side === TradeType.Buy) {
      await this.selectBuy()
    } else {
      await this.selectSell()
    }
    await this.fillQuantity(quantity)
    await this.clickExecute()

    if (!waitForResult) return 'pending'
    await this.base.appearsAny([this.locators.successMessage, this.locators.errorMessage])
    return this.currentOutcome()
  }
}
