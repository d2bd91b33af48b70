import fs from 'node:fs';
import path from 'node:path';
import { errors } from '@playwright/test';
import { test, expect } from '../src/fixtures';
import { BasePage, ElementNotFoundError, isTimeoutError } from '../src/pages';
import { Tag } from '../src/support/tags';

// Served through page.route, so these tests need neither the app nor the network.
const origin = 'http://driver.test';

const ordersHtml = `<!doctype html>
<html>
  <body>
    <h1>Orders</h1>
    <p id="banner">Welcome back</p>
    <p id="balance">Balance: $1,234.50</p>
    <p id="status"></p>
    <input id="quantity" type="number" value="" />
    <ul>
      <li class="row">AAPL 10 shares</li>
      <li class="row">MSFT 5 shares</li>
      <li class="row">TSLA 2 shares</li>
    </ul>
    <button id="hidden" style="display: none">Hidden</button>
    <button id="disabled" disabled>Disabled</button>
    <button id="reveal">Reveal</button>
    <button id="hide">Hide banner</button>
    <button id="ping">Ping</button>
    <script>
      document.querySelectorAll('.row').forEach((row) =>
        row.addEventListener('click', () => {
          document.getElementById('status').textContent = 'Selected ' + row.textContent;
        })
      );
      document.getElementById('reveal').addEventListener('click', () =>
        setTimeout(() => {
          const late = document.createElement('p');
          late.id = 'late';
          late.textContent = 'Late arrival';
          document.body.append(late);
        }, 300)
      );
      document.getElementById('hide').addEventListener('click', () => {
        document.getElementById('banner').style.display = 'none';
      });
      document.getElementById('ping').addEventListener('click', () => fetch('/api/ping?n=1'));
    </script>
  </body>
</html>`;

async function openOrders(driver: BasePage, pathname = '/orders'): Promise<void> {
  await driver.page.route(`${origin}/**`, async (route) => {
    const { pathname: requested } = new URL(route.request().url());
    if (requested === '/api/ping') {
      await route.fulfill({ contentType: 'application/json', body: JSON.stringify({ ok: true }) });
      return;
    }
    await route.fulfill({ contentType: 'text/html', body: ordersHtml });
  });
  await driver.goto(`${origin}${pathname}`);
}

test.describe('BasePage', { tag: Tag.Login }, () => {
  test.describe('missing and hidden elements', () => {
    test.beforeEach(async ({ basePage }) => {
      await openOrders(basePage);
    });

    test('no match fails with ElementNotFoundError', async ({ basePage }) => {
      const error = await basePage.click('#missing', 500).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ElementNotFoundError);
      expect(error).toMatchObject({ name: 'ElementNotFoundError', selector: '#missing' });
      expect(error).toHaveProperty('cause');
    });

    test('a hidden match times out instead', async ({ basePage }) => {
      const error = await basePage.click('#hidden', 500).catch((caught: unknown) => caught);

      expect(isTimeoutError(error)).toBe(true);
      expect(error).not.toBeInstanceOf(ElementNotFoundError);
    });

    test('reads on a missing element fail the same way', async ({ basePage }) => {
      await expect(basePage.getText('#missing', 500)).rejects.toBeInstanceOf(ElementNotFoundError);
      await expect(basePage.getValue('#missing', 500)).rejects.toBeInstanceOf(ElementNotFoundError);
    });

    test('appears resolves false when nothing shows up', async ({ basePage }) => {
      expect(await basePage.appears('#missing', 300)).toBe(false);
      expect(await basePage.appears('#hidden', 300)).toBe(false);
    });

    test('appears waits for an element added later', async ({ basePage }) => {
      await basePage.click('#reveal');

      expect(await basePage.appears('#late', 5000)).toBe(true);
      await basePage.expectContainsText('#late', 'Late arrival');
    });

    test('appearsAny takes whichever selector shows', async ({ basePage }) => {
      expect(await basePage.appearsAny(['#missing', '#banner'], 1000)).toBe(true);
      expect(await basePage.appearsAny(['#missing', '#hidden'], 300)).toBe(false);
    });
  });

  test.describe('interaction and queries', () => {
    test.beforeEach(async ({ basePage }) => {
      await openOrders(basePage);
    });

    test('fill then getValue', async ({ basePage }) => {
      await basePage.fill('#quantity', '25');

      expect(await basePage.getValue('#quantity')).toBe('25');
    });

    test('getText reads an amount', async ({ basePage }) => {
      const text = await basePage.getText('#balance');

      expect(text).toBe('Balance: $1,234.50');
      expect(basePage.extractNumberFromText(text ?? '')).toBe(1234.5);
    });

    test('clickNth clicks the indexed match', async ({ basePage }) => {
      await basePage.clickNth('.row', 1);

      await basePage.expectContainsText('#status', 'Selected MSFT 5 shares');
    });

    test('expectHidden follows an element being hidden', async ({ basePage }) => {
      await basePage.expectHidden('#hidden');
      expect(await basePage.isVisible('#banner')).toBe(true);

      await basePage.click('#hide');

      await basePage.expectHidden('#banner', 2000, 'Banner should be hidden');
      expect(await basePage.isVisible('#banner')).toBe(false);
    });

    test('isEnabled and count', async ({ basePage }) => {
      expect(await basePage.isEnabled('#disabled')).toBe(false);
      expect(await basePage.isEnabled('#quantity')).toBe(true);
      expect(await basePage.count('.row')).toBe(3);
      expect(await basePage.count('#missing')).toBe(0);
    });

    test('multi-selector and count expectations', async ({ basePage }) => {
      await basePage.expectAnyVisible(['#missing', 'h1'], 'Heading should be visible');
      await basePage.expectCountAbove('.row', 2, 'Three rows should be listed');
      await basePage.expectVisible('h1');
    });

    test('byRole and byText locate by accessible name and text', async ({ basePage }) => {
      await expect(basePage.byRole('heading', { name: 'Orders' })).toBeVisible();
      await expect(basePage.byRole('button', { name: 'Disabled' })).toBeDisabled();
      await expect(basePage.byText('Welcome back', true)).toBeVisible();
      await expect(basePage.byText('Welcome', true)).toHaveCount(0);
    });
  });

  test.describe('local storage', () => {
    test('set, get and clear', async ({ basePage }) => {
      await openOrders(basePage);

      await basePage.setLocalStorageItem('token', 'test-token');
      await basePage.setLocalStorageItem('user', '{"name":"O\'Brien \\"QA\\""}');

      expect(await basePage.getLocalStorageItem('token')).toBe('test-token');
      expect(await basePage.getLocalStorageItem('user')).toBe('{"name":"O\'Brien \\"QA\\""}');

      await basePage.clearLocalStorage();

      expect(await basePage.getLocalStorageItem('token')).toBeNull();
      expect(await basePage.getLocalStorageItem('user')).toBeNull();
    });

    test('survives a reload', async ({ basePage }) => {
      await openOrders(basePage);
      await basePage.setLocalStorageItem('token', 'test-token');

      await basePage.reload();

      expect(await basePage.getLocalStorageItem('token')).toBe('test-token');
    });
  });

  test.describe('responses', () => {
    test.beforeEach(async ({ basePage }) => {
      await openOrders(basePage);
    });

    test('waitForApiResponse matches a URL substring', async ({ basePage }) => {
      const [response] = await Promise.all([basePage.waitForApiResponse('/api/ping', 5000), basePage.click('#ping')]);

      expect(response.status()).toBe(200);
      expect(await response.json()).toEqual({ ok: true });
    });

    test('waitForApiResponse matches a RegExp', async ({ basePage }) => {
      const [response] = await Promise.all([
        basePage.waitForApiResponse(/\/api\/ping\?n=1$/, 5000),
        basePage.click('#ping'),
      ]);

      expect(response.url()).toBe(`${origin}/api/ping?n=1`);
    });

    test('waitForApiResponse times out when nothing answers', async ({ basePage }) => {
      await expect(basePage.waitForApiResponse('/api/never', 300)).rejects.toBeInstanceOf(errors.TimeoutError);
    });
  });

  test.describe('URL matching', () => {
    test('a path in the query string does not count', async ({ basePage }) => {
      await openOrders(basePage, '/login?next=/trading');

      expect(basePage.currentUrl()).toBe(`${origin}/login?next=/trading`);
      expect(basePage.isOnPath('/login')).toBe(true);
      expect(basePage.isOnPath('/trading')).toBe(false);

      await basePage.expectUrl('/login', 1000);
      await basePage.waitForUrl('/login', 1000);
      await expect(basePage.waitForUrl('/trading', 300)).rejects.toBeInstanceOf(errors.TimeoutError);
    });

    test('RegExp and exact strings go through unchanged', async ({ basePage }) => {
      await openOrders(basePage, '/orders');

      await basePage.expectUrl(/\/orders$/, 1000);
      await basePage.expectUrl(`${origin}/orders`, 1000);
    });
  });

  test('takeScreenshot creates the screenshot directory', async ({ page, settings }, testInfo) => {
    const screenshotDir = testInfo.outputPath('shots', 'nested');
    const driver = new BasePage(page, { ...settings, screenshotDir });
    await openOrders(driver);
    expect(fs.existsSync(screenshotDir)).toBe(false);

    const file = await driver.takeScreenshot('orders');

    expect(file).toBe(path.join(screenshotDir, 'orders.png'));
    expect(fs.statSync(file).size).toBeGreaterThan(0);
  });
});
