/**
 * OAuth Server - Error Response Rendering
 *
 * Turns a ProtocolError into the HTTP response sent to the client.
 *
 * Key Requirements:
 * - Error responses MUST use application/json content type
 * - `invalid_client` responses carry a WWW-Authenticate challenge matching
 *   the scheme the client authenticated with (RFC 6749 Section 5.2)
 * - Errors with a redirect URI also set Location, with the error parameters
 *   merged into the URI's query (or fragment) over any existing parameters
 * - The JSON body is written in both cases
 *
 * Rendering is synchronous and keeps no state. A redirect URI the URL parser
 * rejects raises a TypeError to the caller; no partial response is returned.
 * Relative URIs are rejected: a redirection endpoint must be absolute
 * (RFC 6749 Section 3.1.2).
 *
 * @see RFC 6749 Section 4.1.2.1 - Authorization Error Response
 * @see RFC 6749 Section 5.2 - Error Response
 */

import type { APIGatewayProxyStructuredResultV2 } from 'aws-lambda';
import { buildChallenge, detectAuthScheme } from './auth/auth-scheme';
import { DEFAULT_REALM, HeaderNames, JSON_CONTENT_TYPE } from './constants';
import { ProtocolErrorTypes } from './errors/oauth-error-codes';
import type { ProtocolError } from './errors/protocol-error';
import { appendBody, toHttpResponse, withHeader, withStatus } from './http/response-value';
import type { HttpResponse } from './http/response-value';
import type { ServerRequest } from './http/server-request';

// =============================================================================
// Types
// =============================================================================

/**
 * Error response body.
 */
export interface ErrorPayload {
    error: string;
    message: string;
    hint?: string;
}

export interface HeaderOptions {
    /** The inbound request; only read for `invalid_client` */
    request?: ServerRequest;
    /** Challenge realm (default: "OAuth") */
    realm?: string;
}

export interface RenderOptions extends HeaderOptions {
    /** Response to build on; a fresh 200 response is used when omitted */
    response?: APIGatewayProxyStructuredResultV2;
    /** Put redirect parameters in the fragment instead of the query */
    useFragment?: boolean;
}

// =============================================================================
// Headers
// =============================================================================

/**
 * Headers every rendering of `error` carries (Location excluded).
 *
 * @example
 * ```typescript
 * getHttpHeaders(invalidClient(), { request: fromApiGatewayEvent(event) });
 * // { 'Content-Type': 'application/json', 'WWW-Authenticate': 'Basic realm="OAuth"' }
 * ```
 */
export function getHttpHeaders(error: ProtocolError, options: HeaderOptions = {}): Record<string, string> {
    const headers: Record<string, string> = {
        [HeaderNames.CONTENT_TYPE]: JSON_CONTENT_TYPE,
    };

    if (error.errorType === ProtocolErrorTypes.INVALID_CLIENT && options.request) {
        const scheme = detectAuthScheme(options.request);
        if (scheme) {
            headers[HeaderNames.WWW_AUTHENTICATE] = buildChallenge(scheme, options.realm ?? DEFAULT_REALM);
        }
    }

    return headers;
}

// =============================================================================
// Body
// =============================================================================

/**
 * The wire payload: `error`, `message`, and `hint` when present.
 */
export function buildErrorPayload(error: ProtocolError): ErrorPayload {
    const payload: ErrorPayload = {
        error: error.errorType,
        message: error.message,
    };

    if (error.hint !== null) {
        payload.hint = error.hint;
    }

    return payload;
}

// =============================================================================
// Redirect Delivery
// =============================================================================

/**
 * Merge the payload into the redirect URI's existing query parameters.
 *
 * Payload keys overwrite same-named query parameters. The merged set is
 * written back to the query, or to the fragment when `useFragment` is set,
 * in which case the query itself is left unchanged.
 *
 * @throws TypeError if the URI cannot be parsed or is relative
 */
export function mergeRedirectUri(redirectUri: string, payload: ErrorPayload, useFragment = false): string {
    const url = new URL(redirectUri);

    const merged = new Map<string, string>();
    for (const [key, value] of url.searchParams) {
        merged.set(key, value);
    }
    for (const [key, value] of Object.entries(payload)) {
        merged.set(key, value);
    }

    const encoded = new URLSearchParams([...merged]).toString();
    if (useFragment) {
        url.hash = encoded;
    } else {
        url.search = encoded;
    }

    return url.toString();
}

// =============================================================================
// Rendering
// =============================================================================

/**
 * Render `error` as an HTTP response.
 *
 * A supplied response keeps its other headers and body; error headers
 * replace same-named ones and the JSON payload is appended to the body.
 *
 * @example
 * ```typescript
 * return generateHttpResponse(invalidScope('email', { redirectUri }), { useFragment: true });
 * ```
 */
export function generateHttpResponse(error: ProtocolError, options: RenderOptions = {}): HttpResponse {
    const headers = getHttpHeaders(error, options);
    const payload = buildErrorPayload(error);

    if (error.redirectUri !== null) {
        headers[HeaderNames.LOCATION] = mergeRedirectUri(error.redirectUri, payload, options.useFragment);
    }

    let response = toHttpResponse(options.response);
    for (const [name, value] of Object.entries(headers)) {
        response = withHeader(response, name, value);
    }
    response = appendBody(response, JSON.stringify(payload));

    return withStatus(response, error.httpStatusCode);
}
