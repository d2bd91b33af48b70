import type { Browser } from '@playwright/test'
import type { LocatorTable } from '../config/locators'
import type { Settings } from '../config/settings'
import { TestData } from '../config/testData'
import { BasePage } from '../pages/BasePage'
import { LoginPage } from '../pages/LoginPage'
import type { Logger } from '../support/logger'

export interface StorageStateOptions {
  browser: Browser
  settings: Settings
  locators: LocatorTable
  logger: Logger
  /** Where the storage state JSON is written. */
  file: string
}

/** Log the primary user in once in a throwaway context and save its cookies and local storage. */
export async function createStorageState({ browser, settings, locators, logger, file }: StorageStateOptions): Promise<string> {
  const context = await browser.newContext({
    baseURL: settings.baseUrl,
    viewport: { width: settings.viewportWidth, height: settings.viewportHeight },
  })
  try {
    const page = await context.newPage()
    page.setDefaultTimeout(settings.timeout)
    const base = new BasePage(page, settings)
    const loginPage = new LoginPage(base, locators.login)
    const user = TestData.primaryUser

    logger.info({ email: user.email }, 'creating authenticated session')
    await loginPage.navigate()
    await loginPage.login(user)
    await context.storageState({ path: file })
    logger.info({ file }, 'authenticated session saved')
    return file
  } finally {
    await context.close()
  }
}
