import {CloudflareDNSProvider} from './cloudflare-dns-provider.js';
import {DigitalOceanDNSProvider} from './digitalocean-dns-provider.js';
import type {
  DNSProviderName,
  DNSProviderOptions,
  IDNSProvider,
} from './dns-provider.js';

export function createDNSProvider(
  name: DNSProviderName,
  options: DNSProviderOptions,
): IDNSProvider {
  switch (name) {
    case 'digitalocean':
      return new DigitalOceanDNSProvider(options);
    case 'cloudflare':
      return new CloudflareDNSProvider(options);
  }
}

export * from './cloudflare-dns-provider.js';
export * from './digitalocean-dns-provider.js';
export * from './dns-provider.js';
export * from './dns-provider-client.js';
