import {
  ProviderRateLimitError,
  ProviderStatusError,
  ProviderUnreachableError,
  describeError,
} from './errors.js';
import type { Logger } from './logger.js';
import type { RemoteCallFault, RemoteCallResult } from './types.js';

/**
 * Map a thrown value to exactly one fault kind.
 *
 * Anything that is not a provider status error counts as the provider
 * being unreachable: no response was classified, so no status exists.
 */
export function classifyFault(err: unknown): RemoteCallFault {
  if (err instanceof ProviderRateLimitError) {
    return { kind: 'RateLimited', statusCode: 429, body: err.body };
  }
  if (err instanceof ProviderStatusError) {
    if (err.status === 429) {
      return { kind: 'RateLimited', statusCode: 429, body: err.body };
    }
    return { kind: 'ProviderRejected', statusCode: err.status, body: err.body };
  }
  if (err instanceof ProviderUnreachableError) {
    const cause = err.cause === undefined ? err.message : describeError(err.cause);
    return { kind: 'TransportUnreachable', cause };
  }
  return { kind: 'TransportUnreachable', cause: describeError(err) };
}

export function describeFault(fault: RemoteCallFault): string {
  switch (fault.kind) {
    case 'TransportUnreachable':
      return `provider could not be reached${fault.cause ? ` (${fault.cause})` : ''}`;
    case 'RateLimited':
      return 'provider returned 429; back off before the next run';
    case 'ProviderRejected':
      return `provider returned status ${fault.statusCode}: ${fault.body}`;
  }
}

/**
 * Run a provider call and fold its outcome into a {@link RemoteCallResult}.
 *
 * Never rejects. Faults are logged under `label`; nothing is retried.
 */
export async function callProvider<T>(
  label: string,
  call: () => Promise<T>,
  logger: Logger
): Promise<RemoteCallResult<T>> {
  try {
    const value = await call();
    return { kind: 'ok', value };
  } catch (err) {
    const fault = classifyFault(err);
    logger.error(`${label} failed: ${describeFault(fault)}`);
    return fault;
  }
}
