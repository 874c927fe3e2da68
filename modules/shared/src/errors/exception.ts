/**
 * OAuth Server - Protocol Error Exception
 *
 * Lets request handlers `throw` a classified failure. The exception only
 * carries a ProtocolError; it adds no state of its own.
 */

import { ErrorMessages } from './error-messages';
import { serverError } from './factories';
import type { ProtocolError } from './protocol-error';
import { isProtocolError } from '../type-guards';

export class ProtocolErrorException extends Error {
    readonly protocolError: ProtocolError;

    constructor(protocolError: ProtocolError) {
        super(protocolError.message);
        this.name = 'ProtocolErrorException';
        this.protocolError = protocolError;
    }
}

/**
 * Throw a classified failure.
 *
 * @example
 * ```typescript
 * if (!params.get('grant_type')) {
 *   raise(invalidRequest('grant_type'));
 * }
 * ```
 */
export function raise(protocolError: ProtocolError): never {
    throw new ProtocolErrorException(protocolError);
}

/**
 * Classify a caught value.
 *
 * Anything that is not already a protocol error becomes a server error with
 * a fixed hint; its own message never reaches the client.
 */
export function toProtocolError(err: unknown): ProtocolError {
    if (err instanceof ProtocolErrorException) {
        return err.protocolError;
    }
    if (isProtocolError(err)) {
        return err;
    }
    return serverError(ErrorMessages.UNEXPECTED_FAILURE);
}
