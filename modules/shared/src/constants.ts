/**
 * OAuth Server - Constants
 *
 * Protocol-level values used when rendering error responses.
 * Runtime configuration (realm, response mode) comes from environment
 * variables; see config.ts.
 *
 * @see RFC 6749 Section 5.2 - Error Response
 * @see RFC 9110 Section 11.6.1 - WWW-Authenticate
 */

// =============================================================================
// HTTP Headers
// =============================================================================

/**
 * Header names written by the error renderer.
 */
export const HeaderNames = {
    CONTENT_TYPE: 'Content-Type',
    WWW_AUTHENTICATE: 'WWW-Authenticate',
    LOCATION: 'Location',
} as const;

/**
 * Content type of every error body.
 */
export const JSON_CONTENT_TYPE = 'application/json';

// =============================================================================
// Authentication Schemes
// =============================================================================

/**
 * HTTP authentication schemes a client may present.
 *
 * @see RFC 7617 - Basic
 * @see RFC 6750 - Bearer
 * @see draft-ietf-oauth-v2-http-mac - MAC
 */
export const AuthSchemes = {
    BASIC: 'Basic',
    BEARER: 'Bearer',
    MAC: 'MAC',
} as const;

export type AuthScheme = typeof AuthSchemes[keyof typeof AuthSchemes];

/**
 * Realm advertised in WWW-Authenticate challenges unless configured.
 */
export const DEFAULT_REALM = 'OAuth';

// =============================================================================
// Response Modes
// =============================================================================

/**
 * Where redirect-delivered error parameters are placed.
 * `fragment` keeps them out of the query seen by the redirect target server.
 */
export const ResponseModes = {
    QUERY: 'query',
    FRAGMENT: 'fragment',
} as const;

export type ResponseMode = typeof ResponseModes[keyof typeof ResponseModes];
