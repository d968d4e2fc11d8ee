import { ObservationError, describeError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { BrowserConnection, BrowserDriver } from './connection.js';

export type SessionState = 'new' | 'open' | 'closed';

export interface RouterSessionOptions {
  routerUrl: string;
  routerPassword: string;
  timeoutSeconds: number;
  headless: boolean;
  driver: BrowserDriver;
  logger?: Logger;
}

/**
 * One browsing session against the router console.
 *
 * The session owns its connection: it is opened once by `init` and
 * released once by `close`. `close` may be called any number of times;
 * only the first call reaches the browser.
 */
export class RouterSession {
  readonly routerUrl: string;
  readonly routerPassword: string;
  readonly timeoutSeconds: number;

  private readonly headless: boolean;
  private readonly driver: BrowserDriver;
  private readonly logger: Logger;
  private conn: BrowserConnection | null = null;
  private current: SessionState = 'new';

  constructor(options: RouterSessionOptions) {
    this.routerUrl = options.routerUrl;
    this.routerPassword = options.routerPassword;
    this.timeoutSeconds = options.timeoutSeconds;
    this.headless = options.headless;
    this.driver = options.driver;
    this.logger = options.logger ?? silentLogger;
  }

  get state(): SessionState {
    return this.current;
  }

  /** Budget for a single wait. Playwright reads 0 as "no limit", so floor at 1ms. */
  get timeoutMs(): number {
    return Math.max(1, Math.round(this.timeoutSeconds * 1000));
  }

  get connection(): BrowserConnection {
    if (this.current !== 'open' || !this.conn) {
      throw new Error(`Router session is ${this.current}, not open`);
    }
    return this.conn;
  }

  /** Launch the browser and load the console's landing page */
  async init(): Promise<void> {
    if (this.current !== 'new') {
      throw new Error(`Router session already ${this.current}`);
    }
    this.current = 'open';

    let conn: BrowserConnection;
    try {
      conn = await this.driver.open({
        headless: this.headless,
        timeoutMs: this.timeoutMs,
      });
    } catch (err) {
      await this.close();
      throw new ObservationError(
        'ConnectionFailed',
        `could not start browser: ${describeError(err)}`,
        { cause: err }
      );
    }

    this.conn = conn;

    this.logger.debug(`Opening ${this.routerUrl}`);
    try {
      await conn.goto(this.routerUrl, this.timeoutMs);
    } catch (err) {
      await this.close();
      throw new ObservationError(
        'ConnectionFailed',
        `could not load ${this.routerUrl}: ${describeError(err)}`,
        { cause: err }
      );
    }
  }

  async close(): Promise<void> {
    if (this.current === 'closed') return;
    this.current = 'closed';

    const conn = this.conn;
    this.conn = null;
    if (!conn) return;

    try {
      await conn.close(this.timeoutMs);
    } catch (err) {
      this.logger.warn(`Closing browser failed: ${describeError(err)}`);
    }
  }
}

/**
 * Run `fn` against an initialised session and close it afterwards,
 * whichever way `fn` exits.
 */
export async function withRouterSession<T>(
  session: RouterSession,
  fn: (session: RouterSession) => Promise<T>
): Promise<T> {
  try {
    await session.init();
    return await fn(session);
  } finally {
    await session.close();
  }
}
