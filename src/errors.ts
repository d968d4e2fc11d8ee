export type ObservationErrorKind =
  | 'ConnectionFailed'
  | 'ElementTimeout'
  | 'InteractionFailed'
  | 'InvalidAddress';

/**
 * Unrecoverable failure while reading the IP from the router console.
 *
 * By the time one of these reaches a caller, the browser session has
 * already been closed.
 */
export class ObservationError extends Error {
  readonly kind: ObservationErrorKind;
  readonly context: string;

  constructor(
    kind: ObservationErrorKind,
    context: string,
    options?: { cause?: unknown }
  ) {
    super(`${kind}: ${context}`, options);
    this.name = 'ObservationError';
    this.kind = kind;
    this.context = context;
  }
}

/** A bounded UI wait ran out of time */
export class WaitTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(what: string, timeoutMs: number, options?: { cause?: unknown }) {
    super(`Timed out after ${timeoutMs}ms waiting for ${what}`, options);
    this.name = 'WaitTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/** Base class for failures raised by a DNS provider client */
export class DnsProviderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DnsProviderError';
  }
}

/** The provider could not be reached at the network layer */
export class ProviderUnreachableError extends DnsProviderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProviderUnreachableError';
  }
}

/** The provider answered with a non-success status */
export class ProviderStatusError extends DnsProviderError {
  readonly status: number;
  readonly body: string;

  constructor(message: string, status: number, body: string) {
    super(message);
    this.name = 'ProviderStatusError';
    this.status = status;
    this.body = body;
  }
}

/** The provider answered 429 and wants the caller to back off */
export class ProviderRateLimitError extends ProviderStatusError {
  constructor(message: string, body: string) {
    super(message, 429, body);
    this.name = 'ProviderRateLimitError';
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** Render an unknown thrown value as a one-line message */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
