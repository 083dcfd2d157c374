import Debug from 'debug';
import * as x from 'x-value';

import {fetchJSON} from './@fetch.js';
import type {
  DNSProviderOptions,
  IDNSProvider,
  ProviderRecord,
} from './dns-provider.js';

const debug = Debug('updatedns:digitalocean');

export const DIGITALOCEAN_API = 'https://api.digitalocean.com/v2';

const RECORDS_PER_PAGE = 200;

const DigitalOceanDomainRecord = x.object({
  id: x.number,
  type: x.string,
  /**
   * Relative to the domain, e.g. "www", "@" or "*".
   */
  name: x.string,
  data: x.string,
});

const DigitalOceanDomainRecordsResponse = x.object({
  domain_records: x.array(DigitalOceanDomainRecord),
  links: x
    .object({
      pages: x
        .object({
          next: x.string.optional(),
        })
        .optional(),
    })
    .optional(),
});

/**
 * DigitalOcean Domains API v2 adapter.
 */
export class DigitalOceanDNSProvider implements IDNSProvider {
  readonly name = 'digitalocean';

  private token: string;
  private timeout: number;

  constructor({token, timeout}: DNSProviderOptions) {
    this.token = token;
    this.timeout = timeout;
  }

  async listRecords(domain: string): Promise<ProviderRecord[]> {
    const records: ProviderRecord[] = [];

    let url: string | undefined =
      `${getRecordsURL(domain)}?per_page=${RECORDS_PER_PAGE}`;

    while (url !== undefined) {
      debug('GET %s', url);

      const {domain_records, links} =
        DigitalOceanDomainRecordsResponse.satisfies(
          await this.fetch(url, {method: 'GET'}),
        );

      for (const {id, type, name, data} of domain_records) {
        records.push({id: String(id), type, name, data});
      }

      url = links?.pages?.next;
    }

    return records;
  }

  async updateRecord(domain: string, id: string, data: string): Promise<void> {
    const url = `${getRecordsURL(domain)}/${encodeURIComponent(id)}`;

    debug('PUT %s', url);

    await this.fetch(url, {
      method: 'PUT',
      body: JSON.stringify({data}),
    });
  }

  private fetch(url: string, init: RequestInit): Promise<unknown> {
    return fetchJSON(url, init, {
      provider: 'DigitalOcean',
      token: this.token,
      timeout: this.timeout,
    });
  }
}

function getRecordsURL(domain: string): string {
  return `${DIGITALOCEAN_API}/domains/${encodeURIComponent(domain)}/records`;
}
