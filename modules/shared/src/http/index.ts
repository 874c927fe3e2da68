/**
 * OAuth Server - HTTP Message Helpers
 *
 * @module shared/http
 */

export {
    createResponse,
    toHttpResponse,
    withHeader,
    withStatus,
    appendBody,
    getHeader,
} from './response-value';

export type { HttpResponse } from './response-value';

export {
    getRequestHeader,
    decodeBasicCredentials,
    fromApiGatewayEvent,
} from './server-request';

export type {
    ServerRequest,
    ServerAuthParams,
    HeaderValue,
} from './server-request';
