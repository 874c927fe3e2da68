/**
 * OAuth Server - Type Guards
 *
 * Runtime narrowing for protocol error values that cross an `unknown`
 * boundary (a caught exception, a value handed over by another module).
 *
 * Usage:
 * ```typescript
 * catch (err) {
 *   if (isProtocolError(err)) {
 *     // TypeScript knows err is ProtocolError here
 *     console.log(err.errorType);
 *   }
 * }
 * ```
 *
 * @see https://www.typescriptlang.org/docs/handbook/2/narrowing.html#using-type-predicates
 */

import { HttpStatus } from './errors/http-status';
import type { HttpStatusCode } from './errors/http-status';
import { ProtocolErrorCodes, ProtocolErrorTypes } from './errors/oauth-error-codes';
import type { ProtocolErrorCode, ProtocolErrorType } from './errors/oauth-error-codes';
import type { ProtocolError } from './errors/protocol-error';

const ERROR_TYPES: readonly string[] = Object.values(ProtocolErrorTypes);
const ERROR_CODES: readonly number[] = Object.values(ProtocolErrorCodes);
const STATUS_CODES: readonly number[] = Object.values(HttpStatus);

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if a string is one of the wire error types.
 */
export function isProtocolErrorType(value: string): value is ProtocolErrorType {
    return ERROR_TYPES.includes(value);
}

/**
 * Check if a number is an allocated scenario code.
 */
export function isProtocolErrorCode(value: number): value is ProtocolErrorCode {
    return ERROR_CODES.includes(value);
}

/**
 * Check if a number is a status an error response can carry.
 */
export function isErrorStatusCode(value: number): value is HttpStatusCode {
    return STATUS_CODES.includes(value);
}

/**
 * Check if a value has the full shape of a ProtocolError.
 */
export function isProtocolError(value: unknown): value is ProtocolError {
    if (typeof value !== 'object' || value === null) {
        return false;
    }

    const candidate: Record<string, unknown> = Object.fromEntries(Object.entries(value));
    return (
        typeof candidate.code === 'number' &&
        isProtocolErrorCode(candidate.code) &&
        typeof candidate.errorType === 'string' &&
        isProtocolErrorType(candidate.errorType) &&
        typeof candidate.httpStatusCode === 'number' &&
        isErrorStatusCode(candidate.httpStatusCode) &&
        typeof candidate.message === 'string' &&
        candidate.message.length > 0 &&
        (candidate.hint === null || typeof candidate.hint === 'string') &&
        (candidate.redirectUri === null || typeof candidate.redirectUri === 'string')
    );
}
