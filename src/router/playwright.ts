import { chromium, errors, firefox } from 'playwright-core';
import type { Browser, BrowserType, Page } from 'playwright-core';
import { WaitTimeoutError } from '../errors.js';
import type { BrowserName, PageElementLocator } from '../types.js';
import type { BrowserConnection, BrowserDriver } from './connection.js';

export interface PlaywrightDriverOptions {
  browser: BrowserName;
  /** Path to a locally installed Chrome/Chromium/Firefox */
  executablePath?: string;
}

/** Translate a locator into a Playwright selector string */
export function toSelector(locator: PageElementLocator): string {
  switch (locator.strategy) {
    case 'id':
      return `id=${locator.value}`;
    case 'css':
      return `css=${locator.value}`;
    case 'xpath':
      return `xpath=${locator.value}`;
    case 'text':
      return `text=${locator.value}`;
  }
}

async function bounded<T>(
  what: string,
  timeoutMs: number,
  action: () => Promise<T>
): Promise<T> {
  try {
    return await action();
  } catch (err) {
    if (err instanceof errors.TimeoutError) {
      throw new WaitTimeoutError(what, timeoutMs, { cause: err });
    }
    throw err;
  }
}

/** Wrap an open Playwright page as a {@link BrowserConnection} */
export function playwrightConnection(browser: Browser, page: Page): BrowserConnection {
  const find = (locator: PageElementLocator) => page.locator(toSelector(locator));

  return {
    goto(url, timeoutMs) {
      return bounded(url, timeoutMs, async () => {
        await page.goto(url, { timeout: timeoutMs });
      });
    },

    waitForClickable(locator, timeoutMs) {
      // A trial click runs the actionability checks without clicking
      return bounded(locator.label, timeoutMs, () =>
        find(locator).click({ trial: true, timeout: timeoutMs })
      );
    },

    waitForPresence(locator, timeoutMs) {
      return bounded(locator.label, timeoutMs, () =>
        find(locator).waitFor({ state: 'attached', timeout: timeoutMs })
      );
    },

    click(locator, timeoutMs) {
      return bounded(locator.label, timeoutMs, () =>
        find(locator).click({ timeout: timeoutMs })
      );
    },

    clear(locator, timeoutMs) {
      return bounded(locator.label, timeoutMs, () =>
        find(locator).clear({ timeout: timeoutMs })
      );
    },

    type(locator, text, timeoutMs) {
      return bounded(locator.label, timeoutMs, () =>
        find(locator).pressSequentially(text, { timeout: timeoutMs })
      );
    },

    clickAtPosition(locator, timeoutMs) {
      return bounded(locator.label, timeoutMs, async () => {
        const target = find(locator);
        await target.scrollIntoViewIfNeeded({ timeout: timeoutMs });
        const box = await target.boundingBox({ timeout: timeoutMs });
        if (!box) {
          throw new Error(`${locator.label} is not rendered`);
        }
        const x = box.x + box.width / 2;
        const y = box.y + box.height / 2;
        await page.mouse.move(x, y);
        await page.mouse.click(x, y);
      });
    },

    readText(locator, timeoutMs) {
      return bounded(locator.label, timeoutMs, async () => {
        const text = await find(locator).innerText({ timeout: timeoutMs });
        return text.trim();
      });
    },

    close(timeoutMs) {
      let timer: NodeJS.Timeout | undefined;
      const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(
          () => reject(new WaitTimeoutError('browser to close', timeoutMs)),
          timeoutMs
        );
      });
      return Promise.race([browser.close(), deadline]).finally(() => clearTimeout(timer));
    },
  };
}

/**
 * Browser driver backed by `playwright-core`.
 *
 * No browser is bundled: either install one through Playwright or point
 * `executablePath` at a local binary.
 */
export function playwrightDriver(options: PlaywrightDriverOptions): BrowserDriver {
  const browserType: BrowserType = options.browser === 'firefox' ? firefox : chromium;

  return {
    async open({ headless, timeoutMs }) {
      const browser = await browserType.launch({
        headless,
        executablePath: options.executablePath,
        timeout: timeoutMs,
      });
      try {
        const page = await browser.newPage();
        return playwrightConnection(browser, page);
      } catch (err) {
        await browser.close();
        throw err;
      }
    },
  };
}
