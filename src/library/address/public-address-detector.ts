import {Resolver} from 'dns/promises';

import Debug from 'debug';
import ms from 'ms';

import {
  ERROR_GETTING_PUBLIC_ADDRESS,
  ERROR_NO_PUBLIC_ADDRESS,
  INVALID_PUBLIC_ADDRESS,
} from '../@log/index.js';
import {DetectionError} from '../errors.js';
import {IPv4Address, isIPv4Address} from '../x.js';

const debug = Debug('updatedns:detector');

export const PUBLIC_ADDRESS_HOSTNAME_DEFAULT = 'myip.opendns.com';
export const PUBLIC_ADDRESS_RESOLVER_HOSTNAME_DEFAULT = 'resolver1.opendns.com';

const TIMEOUT_DEFAULT = ms('30s');

export type DNSResolverOptions = {
  timeout: number;
  tries: number;
};

/**
 * The part of `dns.promises.Resolver` the detector needs.
 */
export type DNSResolver = {
  setServers(servers: readonly string[]): void;
  resolve4(hostname: string): Promise<string[]>;
};

export type PublicAddressDetectorOptions = {
  /**
   * Hostname the echo resolver answers with the address of the asker.
   */
  hostname?: string;
  resolverHostname?: string;
  timeout?: number;
  createResolver?: (options: DNSResolverOptions) => DNSResolver;
};

export type IPublicAddressDetector = {
  detect(): Promise<IPv4Address>;
};

export class PublicAddressDetector implements IPublicAddressDetector {
  private hostname: string;
  private resolverHostname: string;
  private resolverOptions: DNSResolverOptions;
  private createResolver: (options: DNSResolverOptions) => DNSResolver;

  constructor({
    hostname = PUBLIC_ADDRESS_HOSTNAME_DEFAULT,
    resolverHostname = PUBLIC_ADDRESS_RESOLVER_HOSTNAME_DEFAULT,
    timeout = TIMEOUT_DEFAULT,
    createResolver = options => new Resolver(options),
  }: PublicAddressDetectorOptions = {}) {
    this.hostname = hostname;
    this.resolverHostname = resolverHostname;
    this.resolverOptions = {timeout, tries: 1};
    this.createResolver = createResolver;
  }

  async detect(): Promise<IPv4Address> {
    const hostname = this.hostname;
    const resolverHostname = this.resolverHostname;

    let answers: string[];

    try {
      const servers = await this.createResolver(this.resolverOptions).resolve4(
        resolverHostname,
      );

      debug('resolver %s at %o', resolverHostname, servers);

      const resolver = this.createResolver(this.resolverOptions);

      resolver.setServers(servers);

      answers = await resolver.resolve4(hostname);
    } catch (error) {
      throw new DetectionError(
        ERROR_GETTING_PUBLIC_ADDRESS(resolverHostname, error),
        {cause: error},
      );
    }

    debug('%s answered %o', hostname, answers);

    if (answers.length === 0) {
      throw new DetectionError(ERROR_NO_PUBLIC_ADDRESS(resolverHostname));
    }

    const address = answers[0].trim();

    if (!isIPv4Address(address)) {
      throw new DetectionError(INVALID_PUBLIC_ADDRESS(address));
    }

    return IPv4Address.nominalize(address);
  }
}
