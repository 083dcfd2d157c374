import * as x from 'x-value';

export const IPV4_ADDRESS_OCTET_MAX = 255;

/**
 * Checks both the dotted-quad shape and the range of every octet, e.g.
 * "192.168.1.500" has the right shape but is rejected.
 */
export function isIPv4Address(value: string): boolean {
  const octets = value.split('.');

  if (octets.length !== 4) {
    return false;
  }

  return octets.every(
    octet =>
      /^\d{1,3}$/.test(octet) && Number(octet) <= IPV4_ADDRESS_OCTET_MAX,
  );
}

export const IPv4Address = x.string.refined<'ipv4 address'>(value => {
  if (!isIPv4Address(value)) {
    throw new TypeError(`Invalid IPv4 address: ${value}`);
  }

  return value;
});

export type IPv4Address = x.TypeOf<typeof IPv4Address>;

/**
 * Largest timeout the DNS resolver and timers accept.
 */
export const TIMEOUT_MAX = 2 ** 31 - 1;

export const Timeout = x.integerRange<'timeout'>({min: 1, max: TIMEOUT_MAX});

export type Timeout = x.TypeOf<typeof Timeout>;
