import {ERROR_LISTING_RECORDS, ERROR_UPDATING_RECORD} from '../@log/index.js';
import {ProviderUnavailableError, RecordNotFoundError} from '../errors.js';

import type {IDNSProvider, ProviderRecord} from './dns-provider.js';

/**
 * Resolves configured records to provider identifiers and updates them. Every
 * failure of the underlying provider surfaces as `ProviderUnavailableError`.
 */
export class DNSProviderClient {
  constructor(readonly provider: IDNSProvider) {}

  /**
   * Names and types are compared as exact strings, so "*.example.com" only
   * matches a record literally named "*.example.com".
   */
  async resolveRecordId(
    domain: string,
    name: string,
    type: string,
  ): Promise<string> {
    const provider = this.provider;

    let records: ProviderRecord[];

    try {
      records = await provider.listRecords(domain);
    } catch (error) {
      throw new ProviderUnavailableError(
        ERROR_LISTING_RECORDS(provider.name, domain, error),
        {cause: error},
      );
    }

    const record = records.find(
      record => record.name === name && record.type === type,
    );

    if (!record) {
      throw new RecordNotFoundError(domain, name, type);
    }

    return record.id;
  }

  async updateRecordAddress(
    domain: string,
    recordId: string,
    address: string,
  ): Promise<void> {
    const provider = this.provider;

    try {
      await provider.updateRecord(domain, recordId, address);
    } catch (error) {
      throw new ProviderUnavailableError(
        ERROR_UPDATING_RECORD(provider.name, domain, recordId, error),
        {cause: error},
      );
    }
  }
}
