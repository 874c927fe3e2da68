/**
 * OAuth Server - Client Authentication Scheme Detection
 *
 * RFC 6749 Section 5.2: if the client attempted to authenticate via the
 * Authorization request header field, an `invalid_client` response MUST
 * carry a WWW-Authenticate header matching the scheme the client used.
 *
 * Detection order:
 *   1. Basic credentials already decoded into the server parameters
 *   2. Prefix of the first Authorization header value (Bearer, MAC, Basic)
 *
 * @module shared/auth/auth-scheme
 * @see https://datatracker.ietf.org/doc/html/rfc6749#section-5.2
 */

import { AuthSchemes, DEFAULT_REALM } from '../constants';
import type { AuthScheme } from '../constants';
import { getRequestHeader } from '../http/server-request';
import type { ServerRequest } from '../http/server-request';

/** Authorization header prefixes, checked in this order */
const SCHEME_PREFIXES: readonly AuthScheme[] = [
    AuthSchemes.BEARER,
    AuthSchemes.MAC,
    AuthSchemes.BASIC,
];

/**
 * Determine which scheme the client authenticated with.
 *
 * @returns The scheme, or undefined if none can be determined
 */
export function detectAuthScheme(request: ServerRequest): AuthScheme | undefined {
    const authUser = request.serverParams?.authUser;
    if (authUser !== undefined && authUser !== null) {
        return AuthSchemes.BASIC;
    }

    const [authHeader] = getRequestHeader(request, 'authorization');
    if (authHeader === undefined) {
        return undefined;
    }

    return SCHEME_PREFIXES.find((scheme) => authHeader.startsWith(scheme));
}

/**
 * Format a WWW-Authenticate challenge.
 *
 * @example
 * ```typescript
 * buildChallenge('Bearer'); // 'Bearer realm="OAuth"'
 * ```
 */
export function buildChallenge(scheme: AuthScheme, realm: string = DEFAULT_REALM): string {
    return `${scheme} realm="${realm}"`;
}
