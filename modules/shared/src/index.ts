/**
 * OAuth Server - Error Responder
 *
 * Central export for the error classification and rendering layer used by
 * the Lambda functions of an OAuth 2.0 authorization server.
 *
 * Modules:
 * - Errors: ProtocolError value, scenario codes and the factories
 * - Response: rendering a ProtocolError as an HTTP response
 * - Auth: WWW-Authenticate scheme detection for client auth failures
 * - HTTP: immutable response values and the inbound request context
 * - Handler: Lambda wrapper that renders thrown failures
 * - Logger / Config: failure logging and environment settings
 *
 * @see RFC 6749 - OAuth 2.0 Authorization Framework
 */

// =============================================================================
// Protocol Errors
// =============================================================================

export {
    ProtocolErrorTypes,
    ProtocolErrorCodes,
    HttpStatus,
    ErrorMessages,
    createProtocolError,
    invalidGrant,
    unsupportedGrantType,
    invalidRequest,
    invalidClient,
    invalidScope,
    invalidCredentials,
    serverError,
    invalidRefreshToken,
    accessDenied,
    ProtocolErrorException,
    raise,
    toProtocolError,
} from './errors';

export type {
    ProtocolError,
    ProtocolErrorOptions,
    ProtocolErrorType,
    ProtocolErrorCode,
    HttpStatusCode,
    HintOptions,
    RedirectOptions,
    AccessDeniedOptions,
} from './errors';

// =============================================================================
// Error Response Rendering
// =============================================================================

export {
    generateHttpResponse,
    getHttpHeaders,
    buildErrorPayload,
    mergeRedirectUri,
} from './response';

export type { ErrorPayload, HeaderOptions, RenderOptions } from './response';

// =============================================================================
// Authentication Scheme Detection
// =============================================================================

export { detectAuthScheme, buildChallenge } from './auth';

// =============================================================================
// HTTP Messages
// =============================================================================

export {
    createResponse,
    toHttpResponse,
    withHeader,
    withStatus,
    appendBody,
    getHeader,
    getRequestHeader,
    decodeBasicCredentials,
    fromApiGatewayEvent,
} from './http';

export type {
    HttpResponse,
    ServerRequest,
    ServerAuthParams,
    HeaderValue,
} from './http';

// =============================================================================
// Lambda Integration
// =============================================================================

export { withProtocolErrors, responseModeFromQuery } from './handler';

export type { LambdaHandler, ProtocolErrorHandlerOptions, ResponseModeResolver } from './handler';

export { ErrorLogger, createErrorLogger, levelFor } from './logger';

export type { LogLevel, LogEntry, FailureDetails } from './logger';

export { loadErrorResponseConfig, isResponseMode } from './config';

export type { ErrorResponseConfig } from './config';

// =============================================================================
// Constants
// =============================================================================

export {
    HeaderNames,
    JSON_CONTENT_TYPE,
    AuthSchemes,
    DEFAULT_REALM,
    ResponseModes,
} from './constants';

export type { AuthScheme, ResponseMode } from './constants';

// =============================================================================
// Type Guards
// =============================================================================

export {
    isProtocolErrorType,
    isProtocolErrorCode,
    isErrorStatusCode,
    isProtocolError,
} from './type-guards';
