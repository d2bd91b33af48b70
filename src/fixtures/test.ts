import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { test as base, expect } from '@playwright/test'
import type { Page } from '@playwright/test'
import { loadLocators } from '../config/locators'
import type { LocatorTable } from '../config/locators'
import { loadSettings } from '../config/settings'
import type { Settings } from '../config/settings'
import { TestData } from '../config/testData'
import {
  BasePage,
  DashboardPage,
  LoginPage,
  PortfolioPage,
  TradeHistoryPage,
  TradingPage,
  WatchlistPage,
} from '../pages'
import { makeLogger } from '../support/logger'
import type { Logger } from '../support/logger'
import { preservesStorage, requiresAuthenticatedSession } from '../support/tags'
import { isOnPath } from '../support/urls'
import { SessionStateCache } from './sessionState'
import { createStorageState } from './storageState'

type WorkerFixtures = {
  settings: Settings
  locators: LocatorTable
  logger: Logger
  /** Storage state file of a logged-in primary user, created on first use in this worker. */
  sessionState: SessionStateCache<string>
}

type TestFixtures = {
  clearStorage: void
  basePage: BasePage
  loginPage: LoginPage
  dashboardPage: DashboardPage
  tradingPage: TradingPage
  portfolioPage: PortfolioPage
  watchlistPage: WatchlistPage
  tradeHistoryPage: TradeHistoryPage
  /** A page on the app, logged in as the primary user; logged out again afterwards. */
  authenticatedPage: Page
}

export const test = base.extend<TestFixtures, WorkerFixtures>({
  settings: [
    async ({}, use) => {
      await use(loadSettings())
    },
    { scope: 'worker' },
  ],

  locators: [
    async ({ settings }, use) => {
      await use(loadLocators(settings.locatorsFile, settings.locatorsOverrideFile))
    },
    { scope: 'worker' },
  ],

  logger: [
    async ({}, use, workerInfo) => {
      await use(makeLogger({ bindings: { worker: workerInfo.workerIndex } }))
    },
    { scope: 'worker' },
  ],

  sessionState: [
    async ({ browser, settings, locators, logger }, use) => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'trading-app-e2e-'))
      const file = path.join(dir, 'storage-state.json')
      await use(new SessionStateCache(() => createStorageState({ browser, settings, locators, logger, file })))
      fs.rmSync(dir, { recursive: true, force: true })
    },
    { scope: 'worker' },
  ],

  // Tests that drive the sign-in flow themselves start from a fresh context.
  storageState: async ({ sessionState }, use, testInfo) => {
    await use(requiresAuthenticatedSession(testInfo.tags) ? await sessionState.resolve() : undefined)
  },

  page: async ({ page, settings }, use) => {
    page.setDefaultTimeout(settings.timeout)
    await use(page)
  },

  clearStorage: [
    async ({ context }, use, testInfo) => {
      if (!preservesStorage(testInfo.tags)) {
        await context.clearCookies()
      }
      await use()
    },
    { auto: true },
  ],

  basePage: async ({ page, settings }, use) => {
    await use(new BasePage(page, settings))
  },

  loginPage: async ({ basePage, locators }, use) => {
    await use(new LoginPage(basePage, locators.login))
  },

  dashboardPage: async ({ basePage, locators }, use) => {
    await use(new DashboardPage(basePage, locators.dashboard))
  },

  tradingPage: async ({ basePage, locators }, use) => {
    await use(new TradingPage(basePage, locators.trading))
  },

  portfolioPage: async ({ basePage, locators }, use) => {
    await use(new PortfolioPage(basePage, locators.portfolio))
  },

  watchlistPage: async ({ basePage, locators }, use) => {
    await use(new WatchlistPage(basePage, locators.watchlist))
  },

  tradeHistoryPage: async ({ basePage, locators }, use) => {
    await use(new TradeHistoryPage(basePage, locators.tradeHistory))
  },

  authenticatedPage: async ({ page, basePage, loginPage, dashboardPage, logger }, use, testInfo) => {
    await basePage.goto(basePage.settings.baseUrl)
    if (isOnPath(basePage.currentUrl(), '/login')) {
      logger.info({ test: testInfo.title }, 'session not authenticated, logging in')
      await loginPage.login(TestData.primaryUser)
    }

    await use(page)

    try {
      if (await dashboardPage.isLoggedIn()) {
        await dashboardPage.logout()
      }
    } catch (error) {
      logger.warn({ err: error, test: testInfo.title }, 'logout after test failed')
    }
  },
})

export { expect }
