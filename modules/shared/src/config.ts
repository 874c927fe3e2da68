/**
 * OAuth Server - Error Response Configuration
 *
 * Runtime settings for error rendering, read from environment variables.
 *
 * Variables:
 * - OAUTH_REALM: realm advertised in WWW-Authenticate challenges (default: OAuth)
 * - OAUTH_ERROR_RESPONSE_MODE: `query` or `fragment` placement of redirect
 *   parameters (default: query)
 */

import { DEFAULT_REALM, ResponseModes } from './constants';
import type { ResponseMode } from './constants';

export interface ErrorResponseConfig {
    realm: string;
    responseMode: ResponseMode;
}

/** Quotes, backslashes and control characters would break the quoted realm */
const INVALID_REALM_PATTERN = /["\\\u0000-\u001f\u007f]/;

export function isResponseMode(value: string): value is ResponseMode {
    return value === ResponseModes.QUERY || value === ResponseModes.FRAGMENT;
}

/**
 * Load and validate error response configuration.
 *
 * @throws Error if a variable is set to an invalid value
 */
export function loadErrorResponseConfig(
    env: Record<string, string | undefined> = process.env
): ErrorResponseConfig {
    const realm = env.OAUTH_REALM ?? DEFAULT_REALM;
    const responseMode = env.OAUTH_ERROR_RESPONSE_MODE ?? ResponseModes.QUERY;

    if (realm.trim() === '') throw new Error('OAUTH_REALM must not be empty');
    if (INVALID_REALM_PATTERN.test(realm)) throw new Error('OAUTH_REALM must not contain quotes, backslashes or control characters');
    if (!isResponseMode(responseMode)) throw new Error('OAUTH_ERROR_RESPONSE_MODE must be "query" or "fragment"');

    return { realm, responseMode };
}
