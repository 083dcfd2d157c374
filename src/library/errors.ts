export abstract class UpdateDNSError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Missing configuration file, unparseable content or invalid fields.
 */
export class ConfigurationError extends UpdateDNSError {
  readonly code = 'configuration';
}

/**
 * Missing, unreadable or empty personal access token file.
 */
export class CredentialError extends UpdateDNSError {
  readonly code = 'credential';
}

/**
 * Public address lookup failed or answered with an invalid address.
 */
export class DetectionError extends UpdateDNSError {
  readonly code = 'detection';
}

/**
 * A provider call failed, timed out or returned a malformed body.
 */
export class ProviderUnavailableError extends UpdateDNSError {
  readonly code = 'provider-unavailable';
}

export class RecordNotFoundError extends UpdateDNSError {
  readonly code = 'record-not-found';

  constructor(
    readonly domain: string,
    readonly recordName: string,
    readonly recordType: string,
  ) {
    super(`Missing DNS ${domain}, ${recordType} record ${recordName}.`);
  }
}

export class StateLogError extends UpdateDNSError {
  readonly code = 'state-log';
}
