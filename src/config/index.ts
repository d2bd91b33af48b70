export { loadSettings, pageUrls, SettingsError } from './settings'
export type { LoadSettingsOptions, PageName, PageUrls, Settings } from './settings'
export { loadLocators, mergeLocators, LocatorConfigError } from './locators'
export type {
  DashboardLocators,
  LocatorOverride,
  LocatorTable,
  LoginLocators,
  PortfolioLocators,
  TradeHistoryLocators,
  TradingLocators,
  WatchlistLocators,
} from './locators'
export { TestData } from './testData'
