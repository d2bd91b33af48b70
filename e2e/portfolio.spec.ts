import { test, expect } from '../src/fixtures';
import { Tag } from '../src/support/tags';
import { isOnPath } from '../src/support/urls';

test.describe('Portfolio', { tag: Tag.Portfolio }, () => {
  test.beforeEach(async ({ authenticatedPage, portfolioPage }) => {
    expect(isOnPath(authenticatedPage.url(), '/login'), 'Session should not be on the login page').toBe(false);
    await portfolioPage.navigate();
  });

  test.describe('load', { tag: Tag.Smoke }, () => {
    test('portfolio page loads', async ({ portfolioPage }) => {
      expect(await portfolioPage.isLoaded(), 'Portfolio page should be loaded').toBe(true);
      await portfolioPage.expectPortfolioPageLoaded();
    });

    test('metrics are shown', async ({ portfolioPage }) => {
      await portfolioPage.expectMetricsDisplayed();
    });
  });

  test('shows positions or an empty state', async ({ portfolioPage }) => {
    await portfolioPage.expectPositionsOrEmptyState();
  });

  test('positions carry details and a trade button', async ({ portfolioPage }) => {
    await portfolioPage.expectPositionsOrEmptyState();

    if (await portfolioPage.arePositionsDisplayed()) {
      expect(await portfolioPage.getPositionCount()).toBeGreaterThan(0);
      expect(await portfolioPage.areTradeButtonsVisible(), 'Trade buttons should be visible').toBe(true);
      await portfolioPage.expectPositionDetails();
    } else {
      await portfolioPage.expectEmptyState();
    }
  });

  test('state survives a reload', async ({ portfolioPage }) => {
    await portfolioPage.expectPositionsOrEmptyState();
    const before = await portfolioPage.arePositionsDisplayed();

    await portfolioPage.refresh();
    await portfolioPage.expectPositionsOrEmptyState();

    expect(await portfolioPage.arePositionsDisplayed(), 'Portfolio state should persist after refresh').toBe(before);
  });
});
