import type {IPublicAddressDetector} from './address/index.js';
import type {IReporter} from './@log/index.js';
import {
  ALL_UPDATES_PERFORMED,
  LAST_PUBLIC_ADDRESS_WAS,
  NO_UPDATES_PERFORMED,
  PUBLIC_ADDRESS_IS,
  UPDATING_RECORD,
} from './@log/index.js';
import type {DomainConfig} from './config.js';
import type {DNSProviderClient} from './providers/index.js';
import type {StateLog} from './state/index.js';
import type {IPv4Address} from './x.js';

export type UpdatedRecord = {
  domain: string;
  name: string;
  type: string;
  id: string;
};

export type UpdateResult =
  | {
      status: 'unchanged';
      address: IPv4Address;
    }
  | {
      status: 'updated';
      address: IPv4Address;
      previousAddress: string | undefined;
      records: UpdatedRecord[];
      /**
       * The line appended to the state log.
       */
      entry: string;
    };

export type DNSUpdaterOptions = {
  detector: IPublicAddressDetector;
  stateLog: StateLog;
  client: DNSProviderClient;
  reporter: IReporter;
  domains: DomainConfig[];
};

/**
 * Brings the configured records in line with the public address of this
 * host.
 *
 * Records are updated in configuration order and the first failure rejects
 * the run, leaving later records untouched. The state log only gains an entry
 * once every record has been updated, so a failed run is retried in full next
 * time.
 */
export class DNSUpdater {
  private detector: IPublicAddressDetector;
  private stateLog: StateLog;
  private client: DNSProviderClient;
  private reporter: IReporter;
  private domains: DomainConfig[];

  constructor({
    detector,
    stateLog,
    client,
    reporter,
    domains,
  }: DNSUpdaterOptions) {
    this.detector = detector;
    this.stateLog = stateLog;
    this.client = client;
    this.reporter = reporter;
    this.domains = domains;
  }

  async run(): Promise<UpdateResult> {
    const reporter = this.reporter;

    const address = await this.detector.detect();

    reporter.info(PUBLIC_ADDRESS_IS(address));

    const previousAddress = await this.stateLog.readLastAddress();

    reporter.info(LAST_PUBLIC_ADDRESS_WAS(previousAddress));

    if (previousAddress === address) {
      reporter.info(NO_UPDATES_PERFORMED);

      return {status: 'unchanged', address};
    }

    const records = await this.updateRecords(address);

    const entry = await this.stateLog.appendEntry(address);

    reporter.debug('updater', 'appended %s', entry);

    reporter.info(ALL_UPDATES_PERFORMED);

    return {status: 'updated', address, previousAddress, records, entry};
  }

  private async updateRecords(address: IPv4Address): Promise<UpdatedRecord[]> {
    const client = this.client;
    const reporter = this.reporter;

    const updatedRecords: UpdatedRecord[] = [];

    for (const {domain, records} of this.domains) {
      for (const {name, type} of records) {
        const id = await client.resolveRecordId(domain, name, type);

        reporter.info(UPDATING_RECORD(domain, type, name, id));

        await client.updateRecordAddress(domain, id, address);

        updatedRecords.push({domain, name, type, id});
      }
    }

    return updatedRecords;
  }
}
