/**
 * OAuth Server - HTTP Status Codes
 *
 * Status codes an error response can carry.
 *
 * @see RFC 9110 - HTTP Semantics
 * @see RFC 6749 Section 5.2 - Error Response
 */

export const HttpStatus = {
    /** Malformed request syntax or invalid parameters */
    BAD_REQUEST: 400,
    /** Authentication required or credentials invalid */
    UNAUTHORIZED: 401,
    /** Unexpected server error */
    INTERNAL_SERVER_ERROR: 500,
} as const;

/** Type representing valid error status code values */
export type HttpStatusCode = typeof HttpStatus[keyof typeof HttpStatus];
