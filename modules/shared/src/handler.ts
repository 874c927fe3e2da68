/**
 * OAuth Server - Protocol Error Handling for Lambda Handlers
 *
 * Wraps a handler so that any failure it throws ends the request with a
 * rendered error response:
 * - ProtocolErrorException: its ProtocolError is rendered
 * - anything else: rendered as server_error with a fixed hint; the original
 *   message is only logged
 *
 * The inbound event is passed to the renderer, so `invalid_client` failures
 * get the WWW-Authenticate challenge the client's scheme calls for.
 *
 * Settings are resolved when the handler is wrapped, so an invalid
 * environment fails at cold start rather than on the first error.
 *
 * @example
 * ```typescript
 * export const handler = withProtocolErrors(async (event) => {
 *   if (!params.get('grant_type')) raise(invalidRequest('grant_type'));
 *   ...
 * }, { resolveResponseMode: responseModeFromQuery });
 * ```
 */

import type { APIGatewayProxyEventV2, APIGatewayProxyResultV2, Context } from 'aws-lambda';
import { isResponseMode, loadErrorResponseConfig } from './config';
import type { ErrorResponseConfig } from './config';
import { ResponseModes } from './constants';
import type { ResponseMode } from './constants';
import { toProtocolError } from './errors/exception';
import { fromApiGatewayEvent } from './http/server-request';
import { createErrorLogger } from './logger';
import { generateHttpResponse } from './response';

export type LambdaHandler = (
    event: APIGatewayProxyEventV2,
    context?: Context
) => Promise<APIGatewayProxyResultV2>;

/** Picks the response mode for one request; `undefined` keeps the configured one */
export type ResponseModeResolver = (event: APIGatewayProxyEventV2) => ResponseMode | undefined;

export interface ProtocolErrorHandlerOptions {
    /** Rendering settings; read from the environment when omitted */
    config?: ErrorResponseConfig;
    resolveResponseMode?: ResponseModeResolver;
}

/**
 * Response mode from the `response_mode` query parameter, if it names one
 * this layer delivers.
 */
export function responseModeFromQuery(event: APIGatewayProxyEventV2): ResponseMode | undefined {
    const requested = event.queryStringParameters?.response_mode;
    return requested !== undefined && isResponseMode(requested) ? requested : undefined;
}

/**
 * Wrap a handler with protocol error rendering.
 *
 * @throws Error if no config is given and the environment holds invalid settings
 */
export function withProtocolErrors(
    handler: LambdaHandler,
    options: ProtocolErrorHandlerOptions = {}
): LambdaHandler {
    const settings = options.config ?? loadErrorResponseConfig();
    const resolveResponseMode = options.resolveResponseMode;

    return async (event, context) => {
        try {
            return await handler(event, context);
        } catch (err) {
            const protocolError = toProtocolError(err);
            const responseMode = resolveResponseMode?.(event) ?? settings.responseMode;

            createErrorLogger(event, context).failure(protocolError, err);

            return generateHttpResponse(protocolError, {
                request: fromApiGatewayEvent(event),
                useFragment: responseMode === ResponseModes.FRAGMENT,
                realm: settings.realm,
            });
        }
    };
}
