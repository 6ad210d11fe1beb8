/**
 * Username normalization for auth versions 0-2
 */

import { AppError, ErrorCode } from '../../errors/types';

/**
 * Clean the username, remove underscore, dashes, dots and lowercase.
 */
export function cleanUsername(name: string = ''): string {
  return name.replace(/[.\-_]/g, '').toLowerCase();
}

/**
 * Check that the username typed by the user matches the one the server
 * returned, using the comparison rules of the given auth version. Nothing
 * to compare when the server returned none.
 */
export function checkUsername(
  authVersion: number,
  username?: string,
  usernameApi?: string
): boolean {
  if (authVersion >= 3) {
    return true;
  }

  if (!username) {
    throw new AppError('Missing username', ErrorCode.VALIDATION_ERROR, { version: authVersion });
  }

  if (!usernameApi) {
    return true;
  }

  if (authVersion === 2) {
    return cleanUsername(username) === cleanUsername(usernameApi);
  }

  return username.toLowerCase() === usernameApi.toLowerCase();
}
