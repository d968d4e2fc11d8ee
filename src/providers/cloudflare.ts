import {
  ProviderRateLimitError,
  ProviderStatusError,
  ProviderUnreachableError,
  describeError,
} from '../errors.js';
import type { DnsRecordClient } from '../provider.js';
import type { DnsRecord, DnsRecordUpdate } from '../types.js';

export interface CloudflareOptions {
  /** Global API key auth: account email */
  apiEmail?: string;
  /** Global API key auth: the key itself */
  apiKey?: string;
  /** Or a scoped API token (Zone > DNS > Edit) */
  apiToken?: string;
  /** Per-request budget, default 30s */
  timeoutMs?: number;
}

interface CloudflareApiResponse<T> {
  success: boolean;
  errors: { code: number; message: string }[];
  result: T;
}

interface CloudflareDnsRecord {
  id: string;
  zone_id?: string;
  type: string;
  name: string;
  content: string;
  proxied?: boolean;
  ttl?: number;
}

const CF_API = 'https://api.cloudflare.com/client/v4';
const DEFAULT_TIMEOUT_MS = 30_000;

function toDnsRecord(zoneId: string, r: CloudflareDnsRecord): DnsRecord {
  return {
    id: r.id,
    zoneId: r.zone_id ?? zoneId,
    name: r.name,
    type: r.type,
    content: r.content,
    proxied: r.proxied ?? false,
    ttl: r.ttl,
  };
}

/**
 * Create a Cloudflare DNS record client.
 *
 * Uses Cloudflare API v4 with native `fetch`. Authenticate with either
 * `apiEmail` + `apiKey` or `apiToken`.
 */
export function cloudflare(options: CloudflareOptions): DnsRecordClient {
  const { apiEmail, apiKey, apiToken } = options;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  if (!apiToken && !(apiEmail && apiKey)) {
    throw new Error('Cloudflare: either apiToken or apiEmail + apiKey is required');
  }

  function authHeaders(headers: Headers): void {
    if (apiToken) {
      headers.set('Authorization', `Bearer ${apiToken}`);
    } else if (apiEmail && apiKey) {
      headers.set('X-Auth-Email', apiEmail);
      headers.set('X-Auth-Key', apiKey);
    }
  }

  async function cfFetch<T>(
    path: string,
    init?: RequestInit
  ): Promise<CloudflareApiResponse<T>> {
    const headers = new Headers(init?.headers);
    authHeaders(headers);
    headers.set('Content-Type', 'application/json');

    let res: Response;
    try {
      res = await fetch(`${CF_API}${path}`, {
        ...init,
        headers,
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      throw new ProviderUnreachableError(
        `Cloudflare API unreachable: ${describeError(err)}`,
        { cause: err }
      );
    }

    if (res.status === 429) {
      const text = await res.text();
      throw new ProviderRateLimitError('Cloudflare API rate limit (429)', text);
    }

    if (!res.ok) {
      const text = await res.text();
      throw new ProviderStatusError(
        `Cloudflare API error ${res.status}: ${text}`,
        res.status,
        text
      );
    }

    let data: CloudflareApiResponse<T>;
    try {
      data = (await res.json()) as CloudflareApiResponse<T>;
    } catch (err) {
      throw new ProviderStatusError(
        `Cloudflare API returned an unreadable body: ${describeError(err)}`,
        res.status,
        ''
      );
    }

    if (!data.success) {
      const errorDetails =
        data.errors?.map((e) => `${e.code}: ${e.message}`).join(', ') ||
        'unknown error';
      throw new ProviderStatusError(
        `Cloudflare API error: ${errorDetails}`,
        res.status,
        errorDetails
      );
    }

    return data;
  }

  return {
    async get(zoneId: string, recordId: string): Promise<DnsRecord> {
      const data = await cfFetch<CloudflareDnsRecord>(
        `/zones/${encodeURIComponent(zoneId)}/dns_records/${encodeURIComponent(recordId)}`
      );
      return toDnsRecord(zoneId, data.result);
    },

    async update(
      zoneId: string,
      recordId: string,
      fields: DnsRecordUpdate
    ): Promise<DnsRecord> {
      const data = await cfFetch<CloudflareDnsRecord>(
        `/zones/${encodeURIComponent(zoneId)}/dns_records/${encodeURIComponent(recordId)}`,
        {
          method: 'PUT',
          body: JSON.stringify({
            type: fields.type,
            name: fields.name,
            content: fields.content,
            proxied: fields.proxied,
          }),
        }
      );
      return toDnsRecord(zoneId, data.result);
    },
  };
}
