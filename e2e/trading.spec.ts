import { test, expect } from '../src/fixtures';
import { TestData } from '../src/config';
import { createTrade, TradeType } from '../src/models';
import { Tag } from '../src/support/tags';
import { isOnPath } from '../src/support/urls';

test.describe('Trading page', { tag: [Tag.Trading, Tag.Smoke] }, () => {
  test.beforeEach(async ({ authenticatedPage, tradingPage }) => {
    expect(isOnPath(authenticatedPage.url(), '/login'), 'Session should not be on the login page').toBe(false);
    await tradingPage.navigate();
  });

  test('trading page loads', async ({ tradingPage }) => {
    expect(await tradingPage.isLoaded(), 'Trading page should be loaded').toBe(true);
    await tradingPage.expectTradingPageLoaded();
  });

  test('stocks are listed', async ({ tradingPage }) => {
    await tradingPage.expectStocksDisplayed();
  });

  test('each stock has a trade button', async ({ tradingPage }) => {
    await tradingPage.expectStocksDisplayed();
    expect(await tradingPage.areTradeButtonsVisible(), 'Trade buttons should be visible').toBe(true);
  });
});

test.describe('Buy trade', { tag: [Tag.Trading, Tag.Regression] }, () => {
  test.beforeEach(async ({ authenticatedPage, tradingPage }) => {
    expect(isOnPath(authenticatedPage.url(), '/login'), 'Session should not be on the login page').toBe(false);
    await tradingPage.navigate();
  });

  test('trade button opens the modal', async ({ tradingPage }) => {
    await tradingPage.openTradeModal();

    await tradingPage.expectTradeModalOpen();
    expect(tradingPage.modalState).toEqual({ status: 'open' });
  });

  test('choosing BUY shows the order form', async ({ tradingPage }) => {
    await tradingPage.openTradeModal();
    await tradingPage.selectBuy();

    await tradingPage.expectTradeFormElements();
    expect(tradingPage.modalState).toEqual({ status: 'open', side: TradeType.Buy });
  });

  test('buy order reports an outcome', async ({ tradingPage }) => {
    const outcome = await tradingPage.executeBuyTrade(TestData.tradeQuantity.default);

    await tradingPage.expectTradeOutcome();
    expect(['success', 'error']).toContain(outcome);
    expect(tradingPage.modalState).toEqual({ status: 'submitted', side: TradeType.Buy });
  });

  test('cancel closes the modal', async ({ tradingPage }) => {
    await tradingPage.openTradeModal();
    await tradingPage.selectBuy();
    await tradingPage.clickCancel();

    expect(tradingPage.modalState).toEqual({ status: 'closed' });
  });

  test('order for a named stock reports an outcome', async ({ tradingPage }) => {
    const trade = createTrade({ symbol: TestData.stockSymbols[0], quantity: TestData.tradeQuantity.small, tradeType: TradeType.Buy });

    await tradingPage.executeTrade(trade, { matchSymbol: true });

    await tradingPage.expectTradeOutcome();
  });
});

test.describe('Sell trade', { tag: [Tag.Trading, Tag.Regression] }, () => {
  test('sell order reports an outcome', async ({ authenticatedPage, tradingPage }) => {
    expect(isOnPath(authenticatedPage.url(), '/login'), 'Session should not be on the login page').toBe(false);
    await tradingPage.navigate();

    await tradingPage.executeSellTrade(TestData.tradeQuantity.small);

    await tradingPage.expectTradeOutcome();
    expect(tradingPage.modalState).toEqual({ status: 'submitted', side: TradeType.Sell });
  });

  test('buy then sell', async ({ authenticatedPage, tradingPage }) => {
    expect(isOnPath(authenticatedPage.url(), '/login'), 'Session should not be on the login page').toBe(false);
    await tradingPage.navigate();
    await tradingPage.executeBuyTrade(TestData.tradeQuantity.default);
    await tradingPage.expectTradeOutcome();

    await tradingPage.navigate();
    await tradingPage.executeSellTrade(TestData.tradeQuantity.small);
    await tradingPage.expectTradeOutcome();
  });
});
