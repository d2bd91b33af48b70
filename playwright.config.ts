import { defineConfig, devices } from '@playwright/test';
import { loadSettings } from './src/config/settings';
import { tagFilter } from './src/support/tags';

const settings = loadSettings();
const tags = (process.env.E2E_TAGS ?? '')
  .split(',')
  .map((tag) => tag.trim())
  .filter((tag) => tag.length > 0);

/**
 * Playwright configuration for the trading app end-to-end suite.
 * Settings come from .env.test and the environment; see src/config/settings.ts.
 */
export default defineConfig({
  testDir: './e2e',
  globalSetup: './src/fixtures/globalSetup.ts',
  // Tests share one backend account, so run them one at a time.
  fullyParallel: false,
  forbidOnly: !!process.env.CI,
  retries: process.env.CI ? 2 : 0,
  workers: 1,
  ...(tags.length > 0 ? { grep: tagFilter(tags) } : {}),
  reporter: [['list'], ['html', { outputFolder: `${settings.reportDir}/html`, open: 'never' }]],
  outputDir: `${settings.reportDir}/test-results`,
  timeout: 60000,
  use: {
    baseURL: settings.baseUrl,
    headless: settings.headless,
    launchOptions: { slowMo: settings.slowMo },
    actionTimeout: settings.timeout,
    navigationTimeout: settings.timeout,
    trace: 'on-first-retry',
    screenshot: 'only-on-failure',
    video: 'retain-on-failure',
  },

  projects: [
    {
      name: 'chromium',
      use: {
        ...devices['Desktop Chrome'],
        viewport: { width: settings.viewportWidth, height: settings.viewportHeight },
      },
    },
  ],
});
