/** How a {@link PageElementLocator} finds its element */
export type LocatorStrategy = 'id' | 'css' | 'xpath' | 'text';

/** Identifies one element of the router console */
export interface PageElementLocator {
  readonly strategy: LocatorStrategy;
  readonly value: string;
  /** Human-readable name used in error context (e.g. "password field") */
  readonly label: string;
}

/** The five console elements the observer walks through */
export interface RouterLocators {
  passwordInput: PageElementLocator;
  submitButton: PageElementLocator;
  troubleshootingIcon: PageElementLocator;
  diagnosticsTab: PageElementLocator;
  ipAddress: PageElementLocator;
}

export type BrowserName = 'chromium' | 'firefox';

/** Everything the observer needs to reach and log into the router */
export interface RouterConfig {
  /** Base address of the console (e.g. http://192.168.1.1) */
  url: string;
  password: string;
  /** Wait budget in seconds for any single UI condition */
  timeoutSeconds: number;
  /** Pause after login while the console renders */
  settleDelayMs: number;
  /** Pause between opening Troubleshooting and clicking Diagnostics */
  tabDelayMs: number;
  browser: BrowserName;
  headless: boolean;
  /** Use a locally installed browser binary instead of a Playwright-managed one */
  executablePath?: string;
}

/** The A record kept in sync, and the credentials to reach it */
export interface DnsConfig {
  zoneId: string;
  recordId: string;
  recordName: string;
  apiEmail?: string;
  apiKey?: string;
  apiToken?: string;
}

/** A DNS record as held by the provider */
export interface DnsRecord {
  id: string;
  zoneId: string;
  name: string;
  type: string;
  content: string;
  proxied: boolean;
  ttl?: number;
}

/** Fields written on every corrective update */
export interface DnsRecordUpdate {
  type: 'A';
  proxied: boolean;
  content: string;
  name: string;
}

export type FaultKind = 'TransportUnreachable' | 'RateLimited' | 'ProviderRejected';

/** A classified provider failure */
export type RemoteCallFault =
  | { kind: 'TransportUnreachable'; cause?: string }
  | { kind: 'RateLimited'; statusCode: 429; body: string }
  | { kind: 'ProviderRejected'; statusCode: number; body: string };

/** Outcome of one wrapped provider call */
export type RemoteCallResult<T> = { kind: 'ok'; value: T } | RemoteCallFault;

/** Result of one synchronization pass */
export type SyncOutcome =
  | { status: 'unchanged'; ip: string }
  | { status: 'updated'; ip: string; record: DnsRecord }
  | { status: 'failed'; stage: 'get' | 'update'; fault: RemoteCallFault };
