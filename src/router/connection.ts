import type { PageElementLocator } from '../types.js';

/**
 * A live browser page, reduced to the handful of actions the observer
 * performs. Every wait takes an explicit budget and rejects with a
 * `WaitTimeoutError` once it runs out.
 */
export interface BrowserConnection {
  goto(url: string, timeoutMs: number): Promise<void>;
  /** Resolve once the element is visible, enabled and receives pointer events */
  waitForClickable(locator: PageElementLocator, timeoutMs: number): Promise<void>;
  /** Resolve once the element is attached to the DOM */
  waitForPresence(locator: PageElementLocator, timeoutMs: number): Promise<void>;
  click(locator: PageElementLocator, timeoutMs: number): Promise<void>;
  clear(locator: PageElementLocator, timeoutMs: number): Promise<void>;
  type(locator: PageElementLocator, text: string, timeoutMs: number): Promise<void>;
  /**
   * Move the pointer over the element's box and click there, without an
   * element-level click (which an overlay may intercept).
   */
  clickAtPosition(locator: PageElementLocator, timeoutMs: number): Promise<void>;
  readText(locator: PageElementLocator, timeoutMs: number): Promise<string>;
  close(timeoutMs: number): Promise<void>;
}

export interface LaunchOptions {
  headless: boolean;
  timeoutMs: number;
}

/** Opens browser connections; one connection per observation run */
export interface BrowserDriver {
  open(options: LaunchOptions): Promise<BrowserConnection>;
}
