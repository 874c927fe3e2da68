/**
 * OAuth Server - Protocol Error Factories
 *
 * One named constructor per failure scenario. Each fixes the scenario code,
 * wire error type, HTTP status and canonical message.
 *
 * Usage:
 * ```typescript
 * import { invalidRequest, generateHttpResponse } from 'oauth-error-responder';
 *
 * return generateHttpResponse(invalidRequest('code_verifier'));
 * ```
 *
 * @see RFC 6749 Section 5.2 - Error Response
 */

import { ErrorMessages } from './error-messages';
import { HttpStatus } from './http-status';
import { ProtocolErrorCodes, ProtocolErrorTypes } from './oauth-error-codes';
import { createProtocolError } from './protocol-error';
import type { ProtocolError } from './protocol-error';

// =============================================================================
// Option Types
// =============================================================================

export interface HintOptions {
    /** Replaces the synthesized hint */
    hint?: string | null;
}

export interface RedirectOptions {
    /** Deliver the error to this URI as well */
    redirectUri?: string | null;
}

export type AccessDeniedOptions = HintOptions & RedirectOptions;

const GRANT_TYPE_HINT = 'Check the `grant_type` parameter';

// =============================================================================
// Token Endpoint Errors
// =============================================================================

/**
 * 400 - The authorization grant was rejected.
 */
export function invalidGrant(): ProtocolError {
    return createProtocolError(
        ProtocolErrorCodes.INVALID_GRANT,
        ProtocolErrorTypes.INVALID_GRANT,
        HttpStatus.BAD_REQUEST,
        ErrorMessages.INVALID_GRANT,
        { hint: GRANT_TYPE_HINT }
    );
}

/**
 * 400 - The grant type is not supported.
 */
export function unsupportedGrantType(): ProtocolError {
    return createProtocolError(
        ProtocolErrorCodes.UNSUPPORTED_GRANT_TYPE,
        ProtocolErrorTypes.UNSUPPORTED_GRANT_TYPE,
        HttpStatus.BAD_REQUEST,
        ErrorMessages.UNSUPPORTED_GRANT_TYPE,
        { hint: GRANT_TYPE_HINT }
    );
}

/**
 * 400 - The refresh token was rejected. Reported as `invalid_request`.
 */
export function invalidRefreshToken(options: HintOptions = {}): ProtocolError {
    return createProtocolError(
        ProtocolErrorCodes.INVALID_REFRESH_TOKEN,
        ProtocolErrorTypes.INVALID_REQUEST,
        HttpStatus.BAD_REQUEST,
        ErrorMessages.INVALID_REFRESH_TOKEN,
        { hint: options.hint }
    );
}

// =============================================================================
// Request Errors
// =============================================================================

/**
 * 400 - A request parameter is missing or malformed.
 *
 * @param parameter - Name of the offending parameter, used in the default hint
 */
export function invalidRequest(parameter: string, options: HintOptions = {}): ProtocolError {
    const hint = options.hint ?? `Check the \`${parameter}\` parameter`;

    return createProtocolError(
        ProtocolErrorCodes.INVALID_REQUEST,
        ProtocolErrorTypes.INVALID_REQUEST,
        HttpStatus.BAD_REQUEST,
        ErrorMessages.INVALID_REQUEST,
        { hint }
    );
}

/**
 * 400 - A requested scope is invalid.
 *
 * @param scope - The rejected scope, used in the hint
 */
export function invalidScope(scope: string, options: RedirectOptions = {}): ProtocolError {
    return createProtocolError(
        ProtocolErrorCodes.INVALID_SCOPE,
        ProtocolErrorTypes.INVALID_SCOPE,
        HttpStatus.BAD_REQUEST,
        ErrorMessages.INVALID_SCOPE,
        { hint: `Check the \`${scope}\` scope`, redirectUri: options.redirectUri }
    );
}

// =============================================================================
// Authentication Errors
// =============================================================================

/**
 * 401 - Client authentication failed.
 * Rendering adds a WWW-Authenticate challenge when the client's scheme is known.
 */
export function invalidClient(): ProtocolError {
    return createProtocolError(
        ProtocolErrorCodes.INVALID_CLIENT,
        ProtocolErrorTypes.INVALID_CLIENT,
        HttpStatus.UNAUTHORIZED,
        ErrorMessages.INVALID_CLIENT
    );
}

/**
 * 401 - The resource owner credentials were incorrect.
 */
export function invalidCredentials(): ProtocolError {
    return createProtocolError(
        ProtocolErrorCodes.INVALID_CREDENTIALS,
        ProtocolErrorTypes.INVALID_CREDENTIALS,
        HttpStatus.UNAUTHORIZED,
        ErrorMessages.INVALID_CREDENTIALS
    );
}

/**
 * 401 - The resource owner or authorization server denied the request.
 */
export function accessDenied(options: AccessDeniedOptions = {}): ProtocolError {
    return createProtocolError(
        ProtocolErrorCodes.ACCESS_DENIED,
        ProtocolErrorTypes.ACCESS_DENIED,
        HttpStatus.UNAUTHORIZED,
        ErrorMessages.ACCESS_DENIED,
        { hint: options.hint, redirectUri: options.redirectUri }
    );
}

// =============================================================================
// General Errors
// =============================================================================

/**
 * 500 - Unexpected internal condition.
 *
 * The hint becomes part of the message; the `hint` field stays empty.
 * It is sent to the client, so it must not carry secrets.
 */
export function serverError(hint: string): ProtocolError {
    return createProtocolError(
        ProtocolErrorCodes.SERVER_ERROR,
        ProtocolErrorTypes.SERVER_ERROR,
        HttpStatus.INTERNAL_SERVER_ERROR,
        ErrorMessages.SERVER_ERROR_PREFIX + hint
    );
}
