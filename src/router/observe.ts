import { setTimeout as delay } from 'node:timers/promises';
import { LINKSYS_LOCATORS } from '../constants.js';
import { ObservationError, WaitTimeoutError, describeError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { PageElementLocator, RouterConfig, RouterLocators } from '../types.js';
import type { BrowserConnection, BrowserDriver } from './connection.js';
import { playwrightDriver } from './playwright.js';
import { RouterSession, withRouterSession } from './session.js';

export interface ObserveOptions {
  /** Defaults to a Playwright driver built from `config` */
  driver?: BrowserDriver;
  /** Override individual console elements if the firmware markup differs */
  locators?: Partial<RouterLocators>;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Run one interaction against `locator`, converting any failure into an
 * `ObservationError`. The session is closed before the error is thrown.
 */
async function interact<T>(
  session: RouterSession,
  locator: PageElementLocator,
  action: (conn: BrowserConnection, timeoutMs: number) => Promise<T>
): Promise<T> {
  try {
    return await action(session.connection, session.timeoutMs);
  } catch (err) {
    await session.close();
    if (err instanceof WaitTimeoutError) {
      throw new ObservationError('ElementTimeout', locator.label, { cause: err });
    }
    throw new ObservationError(
      'InteractionFailed',
      `${locator.label}: ${describeError(err)}`,
      { cause: err }
    );
  }
}

async function authenticate(
  session: RouterSession,
  locators: RouterLocators
): Promise<void> {
  const { passwordInput, submitButton } = locators;

  await interact(session, passwordInput, async (conn, timeoutMs) => {
    await conn.waitForClickable(passwordInput, timeoutMs);
    await conn.click(passwordInput, timeoutMs);
    await conn.clear(passwordInput, timeoutMs);
    await conn.type(passwordInput, session.routerPassword, timeoutMs);
  });

  await interact(session, submitButton, async (conn, timeoutMs) => {
    await conn.waitForClickable(submitButton, timeoutMs);
    await conn.click(submitButton, timeoutMs);
  });
}

/** Presence wait, then a pointer click on the element's position */
function clickByPosition(
  session: RouterSession,
  locator: PageElementLocator
): Promise<void> {
  return interact(session, locator, async (conn, timeoutMs) => {
    await conn.waitForPresence(locator, timeoutMs);
    await conn.clickAtPosition(locator, timeoutMs);
  });
}

function extractIp(session: RouterSession, locator: PageElementLocator): Promise<string> {
  return interact(session, locator, async (conn, timeoutMs) => {
    await conn.waitForPresence(locator, timeoutMs);
    return conn.readText(locator, timeoutMs);
  });
}

/**
 * Log into the router console and read the ISP-assigned IP address.
 *
 * Sequence: load console → enter password → submit → settle → open
 * Troubleshooting → open Diagnostics → read the IP element. Every wait is
 * bounded by `config.timeoutSeconds`; the browser is closed on every exit.
 *
 * The returned text is not validated as an IP address.
 *
 * @throws {ObservationError} when any step cannot complete
 */
export async function observeIspIp(
  config: RouterConfig,
  options: ObserveOptions = {}
): Promise<string> {
  const logger = options.logger ?? silentLogger;
  const sleep = options.sleep ?? ((ms: number) => delay(ms));
  const locators: RouterLocators = { ...LINKSYS_LOCATORS, ...options.locators };
  const driver =
    options.driver ??
    playwrightDriver({ browser: config.browser, executablePath: config.executablePath });

  const session = new RouterSession({
    routerUrl: config.url,
    routerPassword: config.password,
    timeoutSeconds: config.timeoutSeconds,
    headless: config.headless,
    driver,
    logger,
  });

  return withRouterSession(session, async (s) => {
    logger.debug('Logging into router console');
    await authenticate(s, locators);

    logger.debug(`Waiting ${config.settleDelayMs}ms for the console to render`);
    await sleep(config.settleDelayMs);

    await clickByPosition(s, locators.troubleshootingIcon);
    await sleep(config.tabDelayMs);
    await clickByPosition(s, locators.diagnosticsTab);

    const ip = await extractIp(s, locators.ipAddress);
    logger.info(`Router reports ISP IP ${ip}`);
    return ip;
  });
}
