/**
 * OAuth Server - OAuth 2.0 Error Types and Codes
 *
 * The closed set of error identifiers this server puts on the wire, and the
 * stable numeric codes that tell the individual failure scenarios apart.
 *
 * @see RFC 6749 Section 4.1.2.1 - Authorization Error Response
 * @see RFC 6749 Section 5.2 - Error Response
 */

// =============================================================================
// Wire Error Types
// =============================================================================

/**
 * Values of the `error` field in an error response.
 *
 * `invalid_credentials` is not defined by RFC 6749; it reports a failed
 * resource owner password check.
 */
export const ProtocolErrorTypes = {
    /** The authorization grant is invalid, expired, revoked, or mismatched */
    INVALID_GRANT: 'invalid_grant',

    /** The grant type is not supported by the authorization server */
    UNSUPPORTED_GRANT_TYPE: 'unsupported_grant_type',

    /** The request is missing a required parameter or is otherwise malformed */
    INVALID_REQUEST: 'invalid_request',

    /** Client authentication failed */
    INVALID_CLIENT: 'invalid_client',

    /** The requested scope is invalid, unknown, or malformed */
    INVALID_SCOPE: 'invalid_scope',

    /** The resource owner credentials were incorrect */
    INVALID_CREDENTIALS: 'invalid_credentials',

    /** The authorization server encountered an unexpected condition */
    SERVER_ERROR: 'server_error',

    /** The resource owner or authorization server denied the request */
    ACCESS_DENIED: 'access_denied',
} as const;

export type ProtocolErrorType = typeof ProtocolErrorTypes[keyof typeof ProtocolErrorTypes];

// =============================================================================
// Scenario Codes
// =============================================================================

/**
 * Stable identifiers for each failure scenario.
 *
 * Not wire-visible. Callers may dispatch on these, so a new scenario takes
 * the next unused number and existing numbers never change.
 */
export const ProtocolErrorCodes = {
    INVALID_GRANT: 1,
    UNSUPPORTED_GRANT_TYPE: 2,
    INVALID_REQUEST: 3,
    INVALID_CLIENT: 4,
    INVALID_SCOPE: 5,
    INVALID_CREDENTIALS: 6,
    SERVER_ERROR: 7,
    INVALID_REFRESH_TOKEN: 8,
    ACCESS_DENIED: 9,
} as const;

export type ProtocolErrorCode = typeof ProtocolErrorCodes[keyof typeof ProtocolErrorCodes];
