import * as x from 'x-value';

export const DNSProviderName = x.union([
  x.literal('digitalocean'),
  x.literal('cloudflare'),
]);

export type DNSProviderName = x.TypeOf<typeof DNSProviderName>;

/**
 * A DNS record as listed by a provider, `id` is whatever the provider uses to
 * address the record in update calls.
 */
export type ProviderRecord = {
  id: string;
  name: string;
  type: string;
  data: string;
};

export type DNSProviderOptions = {
  /**
   * Bearer token.
   */
  token: string;
  /**
   * Timeout of each HTTP request in milliseconds.
   */
  timeout: number;
};

export type IDNSProvider = {
  readonly name: DNSProviderName;

  listRecords(domain: string): Promise<ProviderRecord[]>;

  updateRecord(domain: string, id: string, data: string): Promise<void>;
};
