export { BasePage, ElementNotFoundError, isTimeoutError } from './BasePage'
export type { AriaRole, ElementState, LoadState, RoleOptions } from './BasePage'
export { LoginPage } from './LoginPage'
export { DashboardPage } from './DashboardPage'
export { TradingPage } from './TradingPage'
export type { ExecuteTradeOptions, TradeModalState, TradeOutcome } from './TradingPage'
export { PortfolioPage } from './PortfolioPage'
export { WatchlistPage } from './WatchlistPage'
export { TradeHistoryPage } from './TradeHistoryPage'
