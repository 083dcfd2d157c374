import {extname} from 'path';

import type {PublicExplorer} from 'cosmiconfig';
import {cosmiconfig, defaultLoaders} from 'cosmiconfig';
import * as x from 'x-value';

import {
  ERROR_IN_CONFIGURATION_FILE,
  MISSING_CONFIGURATION_FILE,
} from './@log/index.js';
import {getErrorMessage, isErrorWithCode} from './@utils/index.js';
import {ConfigurationError} from './errors.js';
import {DNSProviderName} from './providers/index.js';
import {Timeout} from './x.js';

export const RecordConfig = x.object({
  /**
   * Record name exactly as the provider lists it, e.g. "www" or
   * "*.example.com".
   */
  name: x.string,
  type: x.string,
});

export type RecordConfig = x.TypeOf<typeof RecordConfig>;

export const DomainConfig = x.object({
  domain: x.string,
  records: x.array(RecordConfig),
});

export type DomainConfig = x.TypeOf<typeof DomainConfig>;

export const MessagesConfig = x.object({
  verbose: x.boolean.optional(),
  send_in_color: x.boolean.optional(),
  send_to_syslog: x.boolean.optional(),
});

export type MessagesConfig = x.TypeOf<typeof MessagesConfig>;

export const Config = x.object({
  provider: DNSProviderName.optional(),
  personal_access_token_file: x.string,
  public_ip_address_log_file: x.string,
  domains: x.array(DomainConfig),
  /**
   * Timeout of every network call in milliseconds.
   */
  timeout: Timeout.optional(),
  messages: MessagesConfig.optional(),
});

export type Config = x.TypeOf<typeof Config>;

export async function loadConfig(path: string): Promise<Config> {
  let raw: unknown;

  try {
    const result = await createConfigExplorer(path).load(path);

    if (!result || result.isEmpty) {
      throw new ConfigurationError(
        ERROR_IN_CONFIGURATION_FILE('configuration file is empty.'),
      );
    }

    raw = result.config;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw error;
    }

    if (isErrorWithCode(error, 'ENOENT') || isErrorWithCode(error, 'EISDIR')) {
      throw new ConfigurationError(MISSING_CONFIGURATION_FILE(path), {
        cause: error,
      });
    }

    throw new ConfigurationError(
      ERROR_IN_CONFIGURATION_FILE(getErrorMessage(error)),
      {cause: error},
    );
  }

  return parseConfig(raw);
}

export function parseConfig(raw: unknown): Config {
  let config: Config;

  try {
    config = Config.exact().satisfies(raw);
  } catch (error) {
    throw new ConfigurationError(
      ERROR_IN_CONFIGURATION_FILE(getErrorMessage(error)),
      {cause: error},
    );
  }

  if (config.domains.length === 0) {
    throw new ConfigurationError(
      ERROR_IN_CONFIGURATION_FILE('no domains configured.'),
    );
  }

  for (const {domain, records} of config.domains) {
    if (records.length === 0) {
      throw new ConfigurationError(
        ERROR_IN_CONFIGURATION_FILE(`no records configured for ${domain}.`),
      );
    }
  }

  return config;
}

/**
 * Files with an extension cosmiconfig has no loader for, e.g.
 * "updatedns.conf", are read as JSON.
 */
function createConfigExplorer(path: string): PublicExplorer {
  const extension = extname(path);

  if (extension === '' || extension in defaultLoaders) {
    return cosmiconfig('updatedns');
  }

  return cosmiconfig('updatedns', {
    loaders: {[extension]: defaultLoaders['.json']},
  });
}
