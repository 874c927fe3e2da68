/**
 * OAuth Server - Server Request Context
 *
 * The parts of an inbound request the error renderer may inspect: its
 * headers and the HTTP Basic credentials decoded by the front end.
 */

import type { APIGatewayProxyEventV2 } from 'aws-lambda';

// =============================================================================
// Types
// =============================================================================

/**
 * Credentials taken from an HTTP Basic Authorization header.
 */
export interface ServerAuthParams {
    readonly authUser?: string | null;
    readonly authPassword?: string | null;
}

export type HeaderValue = string | readonly string[] | undefined;

export interface ServerRequest {
    /** Request headers; names are matched case-insensitively */
    readonly headers: Readonly<Record<string, HeaderValue>>;
    readonly serverParams?: ServerAuthParams;
}

// =============================================================================
// Header Access
// =============================================================================

/**
 * All values of a header, in the order received. Empty if absent.
 */
export function getRequestHeader(request: ServerRequest, name: string): string[] {
    const lower = name.toLowerCase();
    const values: string[] = [];

    for (const [existing, value] of Object.entries(request.headers)) {
        if (existing.toLowerCase() !== lower || value === undefined) {
            continue;
        }
        if (typeof value === 'string') {
            values.push(value);
        } else {
            values.push(...value);
        }
    }
    return values;
}

// =============================================================================
// Basic Credentials
// =============================================================================

/**
 * Decode an `Authorization: Basic` header value.
 *
 * Per RFC 7617, the user-id cannot contain a colon but the password can,
 * so the decoded pair is split on the first colon only.
 *
 * @returns The credentials, or undefined if the header is not Basic or not well-formed
 */
export function decodeBasicCredentials(authHeader: string | undefined): ServerAuthParams | undefined {
    if (!authHeader?.startsWith('Basic ')) {
        return undefined;
    }

    const decoded = Buffer.from(authHeader.slice(6).trim(), 'base64').toString('utf8');
    const colonIndex = decoded.indexOf(':');
    if (colonIndex < 0) {
        return undefined;
    }

    return {
        authUser: decoded.substring(0, colonIndex),
        authPassword: decoded.substring(colonIndex + 1),
    };
}

// =============================================================================
// Lambda Adapter
// =============================================================================

/**
 * Build a ServerRequest from an API Gateway HTTP API v2 event.
 * Basic credentials in the Authorization header fill `serverParams`.
 */
export function fromApiGatewayEvent(event: APIGatewayProxyEventV2): ServerRequest {
    const headers = event.headers ?? {};
    const request: ServerRequest = { headers };
    const [authHeader] = getRequestHeader(request, 'authorization');
    const serverParams = decodeBasicCredentials(authHeader);

    return serverParams ? { headers, serverParams } : request;
}
