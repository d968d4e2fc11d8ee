import { MANAGED_RECORD_TYPE } from './constants.js';
import { callProvider } from './fault-boundary.js';
import { silentLogger, type Logger } from './logger.js';
import type { DnsRecordClient } from './provider.js';
import type { SyncOutcome } from './types.js';

export interface SyncOptions {
  logger?: Logger;
}

/**
 * Bring one A record in line with the observed IP.
 *
 * 1. Fetches the record
 * 2. Leaves it alone if its content already equals `observedIp`
 * 3. Otherwise overwrites it as a proxied A record pointing at `observedIp`
 *
 * Provider failures come back as a `failed` outcome; this never rejects
 * because of them.
 */
export async function synchronize(
  client: DnsRecordClient,
  zoneId: string,
  recordId: string,
  recordName: string,
  observedIp: string,
  options: SyncOptions = {}
): Promise<SyncOutcome> {
  const logger = options.logger ?? silentLogger;

  const current = await callProvider(
    'Fetching DNS record',
    () => client.get(zoneId, recordId),
    logger
  );
  if (current.kind !== 'ok') {
    return { status: 'failed', stage: 'get', fault: current };
  }

  if (current.value.content === observedIp) {
    logger.info(`DNS record ${current.value.name} already points at ${observedIp}`);
    return { status: 'unchanged', ip: observedIp };
  }

  logger.info(
    `Updating DNS record ${recordName}: ${current.value.content} -> ${observedIp}`
  );
  const updated = await callProvider(
    'Updating DNS record',
    () =>
      client.update(zoneId, recordId, {
        type: MANAGED_RECORD_TYPE,
        proxied: true,
        content: observedIp,
        name: recordName,
      }),
    logger
  );
  if (updated.kind !== 'ok') {
    return { status: 'failed', stage: 'update', fault: updated };
  }

  return { status: 'updated', ip: observedIp, record: updated.value };
}
