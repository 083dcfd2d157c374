import {appendFile} from 'fs/promises';

import {
  ERROR_READING_STATE_LOG,
  ERROR_WRITING_STATE_LOG,
} from '../@log/index.js';
import {
  formatRFC3339,
  gentleReadFile,
  getLastNonBlankLine,
} from '../@utils/index.js';
import {StateLogError} from '../errors.js';

/**
 * Append-only history of successful updates, one "<timestamp> <address>" line
 * each. Only the address of the last line is ever read back.
 */
export class StateLog {
  constructor(readonly path: string) {}

  /**
   * Resolves `undefined` if the log does not exist or has no entries.
   */
  async readLastAddress(): Promise<string | undefined> {
    const path = this.path;

    let content: string | undefined;

    try {
      content = await gentleReadFile(path);
    } catch (error) {
      throw new StateLogError(ERROR_READING_STATE_LOG(path, error), {
        cause: error,
      });
    }

    if (content === undefined) {
      return undefined;
    }

    // Both "2024-01-02T03:04:05+00:00 1.2.3.4" and the space separated
    // "2024-01-02 03:04:05+00:00 1.2.3.4" end with the address.
    return getLastNonBlankLine(content)?.split(/\s+/).pop();
  }

  async appendEntry(address: string, date = new Date()): Promise<string> {
    const path = this.path;

    const line = `${formatRFC3339(date)} ${address}`;

    try {
      await appendFile(path, `${line}\n`, 'utf8');
    } catch (error) {
      throw new StateLogError(ERROR_WRITING_STATE_LOG(path, error), {
        cause: error,
      });
    }

    return line;
  }
}
