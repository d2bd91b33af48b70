import fs from 'node:fs'
import { z } from 'zod'

const selector = z.string().min(1, 'selector must not be empty')

const loginLocators = z
  .object({
    emailInput: selector,
    passwordInput: selector,
    submitButton: selector,
    errorMessage: selector,
    registerLink: selector,
    loginLink: selector,
    registerNameInput: selector,
  })
  .strict()

const dashboardLocators = z
  .object({
    header: selector,
    logoutButton: selector,
    portfolioValue: selector,
    cashBalance: selector,
    profitLoss: selector,
    topPositions: selector,
    navigationMenu: selector,
    tradingLink: selector,
    portfolioLink: selector,
    watchlistsLink: selector,
    tradesLink: selector,
  })
  .strict()

const tradingLocators = z
  .object({
    pageHeader: selector,
    tradeButton: selector,
    tradeButtonForSymbol: selector,
    buyButton: selector,
    sellButton: selector,
    quantityInput: selector,
    executeButton: selector,
    cancelButton: selector,
    successMessage: selector,
    errorMessage: selector,
    stockSymbols: selector,
  })
  .strict()

const portfolioLocators = z
  .object({
    pageHeader: selector,
    stockSymbol: selector,
    quantityCell: selector,
    valueCell: selector,
    profitLossCell: selector,
    tradeButton: selector,
    portfolioMetrics: selector,
    emptyState: selector,
  })
  .strict()

const watchlistLocators = z
  .object({
    pageHeader: selector,
    createButton: selector,
    nameInput: selector,
    saveButton: selector,
    cancelButton: selector,
    watchlistItem: selector,
    watchlistNamed: selector,
    addStockButton: selector,
    stockSymbolInput: selector,
    stockNamed: selector,
    removeStockButton: selector,
    deleteWatchlistButton: selector,
    successMessage: selector,
    errorMessage: selector,
  })
  .strict()

const tradeHistoryLocators = z
  .object({
    pageHeader: selector,
    tradeType: selector,
    tradeTypeNamed: selector,
    stockSymbol: selector,
    symbolNamed: selector,
    priceCell: selector,
    timestampCell: selector,
    sortButton: selector,
    filterButton: selector,
    pagination: selector,
    emptyState: selector,
  })
  .strict()

export const locatorTableSchema = z
  .object({
    login: loginLocators,
    dashboard: dashboardLocators,
    trading: tradingLocators,
    portfolio: portfolioLocators,
    watchlist: watchlistLocators,
    tradeHistory: tradeHistoryLocators,
  })
  .strict()

const locatorOverrideSchema = z
  .object({
    login: loginLocators.partial(),
    dashboard: dashboardLocators.partial(),
    trading: tradingLocators.partial(),
    portfolio: portfolioLocators.partial(),
    watchlist: watchlistLocators.partial(),
    tradeHistory: tradeHistoryLocators.partial(),
  })
  .partial()
  .strict()

export type LocatorTable = z.infer<typeof locatorTableSchema>
export type LocatorOverride = z.infer<typeof locatorOverrideSchema>
export type LoginLocators = LocatorTable['login']
export type DashboardLocators = LocatorTable['dashboard']
export type TradingLocators = LocatorTable['trading']
export type PortfolioLocators = LocatorTable['portfolio']
export type WatchlistLocators = LocatorTable['watchlist']
export type TradeHistoryLocators = LocatorTable['tradeHistory']

export class LocatorConfigError extends Error {
  readonly file: string

  constructor(file: string, detail: string, options?: ErrorOptions) {
    super(`Invalid locator file ${file}: ${detail}`, options)
    this.name = 'LocatorConfigError'
    this.file = file
  }
}

function readLocatorFile<T>(file: string, schema: z.ZodType<T>): T {
  let raw: unknown
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'))
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error)
    throw new LocatorConfigError(file, detail, { cause: error })
  }

  const result = schema.safeParse(raw)
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ')
    throw new LocatorConfigError(file, detail)
  }
  return result.data
}

export function mergeLocators(table: LocatorTable, override: LocatorOverride): LocatorTable {
  return {
    login: { ...table.login, ...override.login },
    dashboard: { ...table.dashboard, ...override.dashboard },
    trading: { ...table.trading, ...override.trading },
    portfolio: { ...table.portfolio, ...override.portfolio },
    watchlist: { ...table.watchlist, ...override.watchlist },
    tradeHistory: { ...table.tradeHistory, ...override.tradeHistory },
  }
}

/**
 * Load the selector table for every page object. A partial override file, when
 * given, replaces individual selectors so a different build of the app can be
 * targeted without touching the page objects.
 */
export function loadLocators(file: string, overrideFile?: string): LocatorTable {
  const table = readLocatorFile(file, locatorTableSchema)
  if (overrideFile === undefined) return table
  return mergeLocators(table, readLocatorFile(overrideFile, locatorOverrideSchema))
}
