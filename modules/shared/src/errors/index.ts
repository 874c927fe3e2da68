/**
 * OAuth Server - Protocol Errors Module
 *
 * Error types, scenario codes, messages and the ProtocolError factories.
 *
 * @module errors
 */

export {
    ProtocolErrorTypes,
    ProtocolErrorCodes,
} from './oauth-error-codes';

export type {
    ProtocolErrorType,
    ProtocolErrorCode,
} from './oauth-error-codes';

export { HttpStatus } from './http-status';

export type { HttpStatusCode } from './http-status';

export { ErrorMessages } from './error-messages';

export { createProtocolError } from './protocol-error';

export type { ProtocolError, ProtocolErrorOptions } from './protocol-error';

export {
    invalidGrant,
    unsupportedGrantType,
    invalidRequest,
    invalidClient,
    invalidScope,
    invalidCredentials,
    serverError,
    invalidRefreshToken,
    accessDenied,
} from './factories';

export type { HintOptions, RedirectOptions, AccessDeniedOptions } from './factories';

export { ProtocolErrorException, raise, toProtocolError } from './exception';
