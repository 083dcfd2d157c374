import {
  EMPTY_ACCESS_TOKEN_FILE,
  ERROR_READING_ACCESS_TOKEN_FILE,
  MISSING_ACCESS_TOKEN_FILE,
} from './@log/index.js';
import {gentleReadFile, getLastNonBlankLine} from './@utils/index.js';
import {CredentialError} from './errors.js';

/**
 * Reads the bearer token, which is the last non-blank line of the file.
 */
export async function readCredential(path: string): Promise<string> {
  let content: string | undefined;

  try {
    content = await gentleReadFile(path);
  } catch (error) {
    throw new CredentialError(ERROR_READING_ACCESS_TOKEN_FILE(path, error), {
      cause: error,
    });
  }

  if (content === undefined) {
    throw new CredentialError(MISSING_ACCESS_TOKEN_FILE(path));
  }

  const token = getLastNonBlankLine(content);

  if (token === undefined) {
    throw new CredentialError(EMPTY_ACCESS_TOKEN_FILE(path));
  }

  return token;
}
