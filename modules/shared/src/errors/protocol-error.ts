/**
 * OAuth Server - Protocol Error Value
 *
 * One classified OAuth 2.0 failure. Every scenario shares this shape; the
 * scenario is identified by `code` and `errorType`, never by a subclass.
 */

import type { HttpStatusCode } from './http-status';
import type { ProtocolErrorCode, ProtocolErrorType } from './oauth-error-codes';

// =============================================================================
// Types
// =============================================================================

export interface ProtocolError {
    /** Stable scenario identifier (not sent on the wire) */
    readonly code: ProtocolErrorCode;
    /** Sent as the `error` field */
    readonly errorType: ProtocolErrorType;
    /** Status of the rendered response */
    readonly httpStatusCode: HttpStatusCode;
    /** Sent as the `message` field; never empty */
    readonly message: string;
    /** Sent as the `hint` field when not null */
    readonly hint: string | null;
    /** When set, the error is also delivered by redirecting to this URI */
    readonly redirectUri: string | null;
}

/**
 * Optional parts of a protocol error.
 */
export interface ProtocolErrorOptions {
    hint?: string | null;
    redirectUri?: string | null;
}

// =============================================================================
// Construction
// =============================================================================

/**
 * Build a frozen ProtocolError. Missing options become `null`.
 *
 * @throws Error if the message is empty
 */
export function createProtocolError(
    code: ProtocolErrorCode,
    errorType: ProtocolErrorType,
    httpStatusCode: HttpStatusCode,
    message: string,
    options: ProtocolErrorOptions = {}
): ProtocolError {
    if (message.length === 0) {
        throw new Error(`Protocol error ${code} (${errorType}) requires a message`);
    }

    return Object.freeze({
        code,
        errorType,
        httpStatusCode,
        message,
        hint: options.hint ?? null,
        redirectUri: options.redirectUri ?? null,
    });
}
