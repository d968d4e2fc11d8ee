import { isIP } from 'node:net';
import { ObservationError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import type { DnsRecordClient } from './provider.js';
import { cloudflare } from './providers/cloudflare.js';
import { observeIspIp } from './router/observe.js';
import { synchronize } from './sync.js';
import type { DnsConfig, RouterConfig, SyncOutcome } from './types.js';

export interface RunOptions {
  router: RouterConfig;
  /** Leave out to only read and report the IP */
  dns?: DnsConfig;
  logger?: Logger;
  /** Defaults to {@link observeIspIp} */
  observe?: (config: RouterConfig, logger: Logger) => Promise<string>;
  /** Defaults to a Cloudflare client built from `dns` */
  client?: DnsRecordClient;
}

export interface RunResult {
  exitCode: number;
  ip?: string;
  outcome?: SyncOutcome;
  error?: ObservationError;
}

/**
 * One scheduled pass: read the ISP IP from the router, then reconcile the
 * DNS record with it.
 *
 * Observation failures, including console text that is not an IP address
 * when a DNS record is to be written, end the run with exit code 1. Provider failures
 * are logged and the run still exits 0; the next pass will try again.
 */
export async function runDynDns(options: RunOptions): Promise<RunResult> {
  const logger = options.logger ?? silentLogger;
  const observe =
    options.observe ?? ((config: RouterConfig, l: Logger) => observeIspIp(config, { logger: l }));

  let ip: string;
  try {
    ip = await observe(options.router, logger);
    // Print-only runs report whatever the console shows
    if (options.dns && isIP(ip) === 0) {
      throw new ObservationError('InvalidAddress', `router showed "${ip}"`);
    }
  } catch (err) {
    if (err instanceof ObservationError) {
      logger.error(`Could not read ISP IP from router: ${err.message}`);
      return { exitCode: 1, error: err };
    }
    throw err;
  }

  const { dns } = options;
  if (!dns) {
    return { exitCode: 0, ip };
  }

  const client =
    options.client ??
    cloudflare({ apiEmail: dns.apiEmail, apiKey: dns.apiKey, apiToken: dns.apiToken });

  const outcome = await synchronize(client, dns.zoneId, dns.recordId, dns.recordName, ip, {
    logger,
  });

  switch (outcome.status) {
    case 'unchanged':
      logger.info('Dynamic DNS is currently set to the correct IP');
      break;
    case 'updated':
      logger.info(`Dynamic DNS set to ${outcome.ip}`);
      break;
    case 'failed':
      logger.warn(`DNS record was not synchronized (${outcome.stage} step: ${outcome.fault.kind})`);
      break;
  }

  return { exitCode: 0, ip, outcome };
}
