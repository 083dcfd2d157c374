import ms from 'ms';

import type {IPublicAddressDetector} from './address/index.js';
import {PublicAddressDetector} from './address/index.js';
import type {IReporter} from './@log/index.js';
import type {Config} from './config.js';
import {readCredential} from './credential.js';
import type {
  DNSProviderName,
  DNSProviderOptions,
  IDNSProvider,
} from './providers/index.js';
import {DNSProviderClient, createDNSProvider} from './providers/index.js';
import {StateLog} from './state/index.js';
import {DNSUpdater} from './updater.js';

export const PROVIDER_DEFAULT = 'digitalocean';

export const TIMEOUT_DEFAULT = ms('30s');

export type SetupOptions = {
  reporter: IReporter;
  /**
   * Replaces the DNS based public address detector.
   */
  detector?: IPublicAddressDetector;
  createProvider?: (
    name: DNSProviderName,
    options: DNSProviderOptions,
  ) => IDNSProvider;
};

/**
 * Reads the access token and wires an updater for the configuration.
 */
export async function setup(
  {
    provider: providerName = PROVIDER_DEFAULT,
    personal_access_token_file: tokenPath,
    public_ip_address_log_file: stateLogPath,
    domains,
    timeout = TIMEOUT_DEFAULT,
  }: Config,
  {
    reporter,
    detector = new PublicAddressDetector({timeout}),
    createProvider = createDNSProvider,
  }: SetupOptions,
): Promise<DNSUpdater> {
  const token = await readCredential(tokenPath);

  const provider = createProvider(providerName, {token, timeout});

  return new DNSUpdater({
    detector,
    stateLog: new StateLog(stateLogPath),
    client: new DNSProviderClient(provider),
    reporter,
    domains,
  });
}
