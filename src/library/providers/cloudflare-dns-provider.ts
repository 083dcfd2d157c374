import Debug from 'debug';
import * as x from 'x-value';

import {fetchJSON} from './@fetch.js';
import type {
  DNSProviderOptions,
  IDNSProvider,
  ProviderRecord,
} from './dns-provider.js';

const debug = Debug('updatedns:cloudflare');

export const CLOUDFLARE_API = 'https://api.cloudflare.com/client/v4';

const RECORDS_PER_PAGE = 100;

const CloudflareResponseEnvelope = x.object({
  success: x.boolean,
  errors: x
    .array(
      x.object({
        code: x.number,
        message: x.string,
      }),
    )
    .optional(),
});

const CloudflareZonesResponse = x.object({
  result: x.array(
    x.object({
      id: x.string,
      name: x.string,
    }),
  ),
});

const CloudflareDNSRecordsResponse = x.object({
  result: x.array(
    x.object({
      id: x.string,
      type: x.string,
      /**
       * Full name with domain, e.g.: "*.example.com".
       */
      name: x.string,
      content: x.string,
    }),
  ),
  result_info: x
    .object({
      page: x.number,
      total_pages: x.number,
    })
    .optional(),
});

/**
 * Cloudflare API v4 adapter, zones are looked up by domain name.
 */
export class CloudflareDNSProvider implements IDNSProvider {
  readonly name = 'cloudflare';

  private token: string;
  private timeout: number;

  private zoneIdMap = new Map<string, string>();

  constructor({token, timeout}: DNSProviderOptions) {
    this.token = token;
    this.timeout = timeout;
  }

  async listRecords(domain: string): Promise<ProviderRecord[]> {
    const zoneId = await this.getZoneId(domain);

    const records: ProviderRecord[] = [];

    let page = 1;

    while (true) {
      const query = `page=${page}&per_page=${RECORDS_PER_PAGE}`;

      const {result, result_info} = CloudflareDNSRecordsResponse.satisfies(
        await this.fetch(`/zones/${zoneId}/dns_records?${query}`, {
          method: 'GET',
        }),
      );

      for (const {id, type, name, content} of result) {
        records.push({id, type, name, data: content});
      }

      if (!result_info || page >= result_info.total_pages) {
        break;
      }

      page++;
    }

    return records;
  }

  async updateRecord(domain: string, id: string, data: string): Promise<void> {
    const zoneId = await this.getZoneId(domain);

    await this.fetch(`/zones/${zoneId}/dns_records/${encodeURIComponent(id)}`, {
      method: 'PATCH',
      body: JSON.stringify({content: data}),
    });
  }

  private async getZoneId(domain: string): Promise<string> {
    let zoneId = this.zoneIdMap.get(domain);

    if (zoneId !== undefined) {
      return zoneId;
    }

    const {result} = CloudflareZonesResponse.satisfies(
      await this.fetch(`/zones?name=${encodeURIComponent(domain)}`, {
        method: 'GET',
      }),
    );

    const zone = result.find(zone => zone.name === domain);

    if (!zone) {
      throw new Error(`Cloudflare: no zone found for domain "${domain}"`);
    }

    zoneId = zone.id;

    this.zoneIdMap.set(domain, zoneId);

    return zoneId;
  }

  private async fetch(path: string, init: RequestInit): Promise<unknown> {
    const url = `${CLOUDFLARE_API}${path}`;

    debug('%s %s', init.method, url);

    const body = await fetchJSON(url, init, {
      provider: 'Cloudflare',
      token: this.token,
      timeout: this.timeout,
    });

    const {success, errors = []} = CloudflareResponseEnvelope.satisfies(body);

    if (!success) {
      const details =
        errors.map(error => `${error.code}: ${error.message}`).join(', ') ||
        'unknown error';

      throw new Error(`Cloudflare API error: ${details}`);
    }

    return body;
  }
}
