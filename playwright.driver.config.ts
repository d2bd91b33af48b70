import { defineConfig } from '@playwright/test';
import config from './playwright.config';

/**
 * Runs the BasePage driver tests alone. They serve their own pages through
 * page.route, so the app and API availability check is left out.
 */
export default defineConfig({
  ...config,
  globalSetup: undefined,
  testMatch: '**/base-page.spec.ts',
});
