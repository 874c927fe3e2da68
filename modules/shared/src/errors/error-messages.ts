/**
 * OAuth Server - Error Messages
 *
 * Canonical human-readable descriptions, sent in the `message` field.
 */

export const ErrorMessages = {
    // -------------------------------------------------------------------------
    // Token Endpoint Errors
    // -------------------------------------------------------------------------

    /** Authorization grant rejected */
    INVALID_GRANT:
        'The provided authorization grant is invalid, expired, revoked, does not match ' +
        'the redirection URI used in the authorization request, or was issued to another client.',

    /** Grant type not supported */
    UNSUPPORTED_GRANT_TYPE: 'The authorization grant type is not supported by the authorization server.',

    /** Refresh token rejected */
    INVALID_REFRESH_TOKEN: 'The refresh token is invalid.',

    // -------------------------------------------------------------------------
    // Request Errors
    // -------------------------------------------------------------------------

    /** Missing, repeated or malformed parameter */
    INVALID_REQUEST:
        'The request is missing a required parameter, includes an invalid parameter value, ' +
        'includes a parameter more than once, or is otherwise malformed.',

    /** Scope validation failed */
    INVALID_SCOPE: 'The requested scope is invalid, unknown, or malformed',

    // -------------------------------------------------------------------------
    // Authentication Errors
    // -------------------------------------------------------------------------

    /** Client authentication failed */
    INVALID_CLIENT: 'Client authentication failed',

    /** Resource owner password check failed */
    INVALID_CREDENTIALS: 'The user credentials were incorrect.',

    /** Access denied by resource owner or authorization server */
    ACCESS_DENIED: 'The resource owner or authorization server denied the request.',

    // -------------------------------------------------------------------------
    // General Errors
    // -------------------------------------------------------------------------

    /** Prefix of the server error message; the hint is appended */
    SERVER_ERROR_PREFIX:
        'The authorization server encountered an unexpected condition which prevented it from fulfilling' +
        ' the request: ',

    /** Hint used when an unclassified exception is converted to a server error */
    UNEXPECTED_FAILURE: 'unexpected internal failure',
} as const;
