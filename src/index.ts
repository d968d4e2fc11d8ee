export { observeIspIp } from './router/observe.js';
export type { ObserveOptions } from './router/observe.js';
export { RouterSession, withRouterSession } from './router/session.js';
export type { SessionState } from './router/session.js';
export { playwrightDriver, playwrightConnection } from './router/playwright.js';
export type { BrowserConnection, BrowserDriver, LaunchOptions } from './router/connection.js';
export { synchronize } from './sync.js';
export { callProvider, classifyFault, describeFault } from './fault-boundary.js';
export { cloudflare } from './providers/cloudflare.js';
export type { CloudflareOptions } from './providers/cloudflare.js';
export type { DnsRecordClient } from './provider.js';
export { runDynDns } from './run.js';
export type { RunOptions, RunResult } from './run.js';
export { loadEnv, parseRouterConfig, parseDnsConfig, parseLogLevel } from './config.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export {
  ObservationError,
  WaitTimeoutError,
  DnsProviderError,
  ProviderUnreachableError,
  ProviderStatusError,
  ProviderRateLimitError,
  ConfigError,
} from './errors.js';
export type { ObservationErrorKind } from './errors.js';
export {
  LINKSYS_LOCATORS,
  DEFAULT_ROUTER_URL,
  DEFAULT_TIMEOUT_SECONDS,
  DEFAULT_SETTLE_DELAY_MS,
  DEFAULT_TAB_DELAY_MS,
} from './constants.js';
export type {
  DnsConfig,
  DnsRecord,
  DnsRecordUpdate,
  FaultKind,
  PageElementLocator,
  RemoteCallFault,
  RemoteCallResult,
  RouterConfig,
  RouterLocators,
  SyncOutcome,
} from './types.js';
