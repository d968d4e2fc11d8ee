import type { DnsRecord, DnsRecordUpdate } from './types.js';

/**
 * Minimal interface for a DNS record client (read one record, overwrite it).
 *
 * Implementations throw a `DnsProviderError` subclass on failure so the
 * fault boundary can classify it.
 */
export interface DnsRecordClient {
  /** Fetch a single record by zone and record ID */
  get(zoneId: string, recordId: string): Promise<DnsRecord>;
  /** Overwrite a record and return what the provider stored */
  update(
    zoneId: string,
    recordId: string,
    fields: DnsRecordUpdate
  ): Promise<DnsRecord>;
}
