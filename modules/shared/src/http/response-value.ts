/**
 * OAuth Server - Response Values
 *
 * An immutable view of an API Gateway HTTP API v2 structured result. Each
 * helper returns the next version of the response and leaves its input as
 * it was, so a response can be built through a chain of small steps.
 *
 * Header names are matched case-insensitively; setting a header replaces
 * any existing header that differs only in case.
 */

import type { APIGatewayProxyStructuredResultV2 } from 'aws-lambda';

// =============================================================================
// Types
// =============================================================================

/**
 * Structured result with every field the error renderer writes.
 * Assignable to APIGatewayProxyResultV2, so handlers can return it directly.
 */
export interface HttpResponse extends APIGatewayProxyStructuredResultV2 {
    readonly statusCode: number;
    readonly headers: Readonly<Record<string, string>>;
    readonly body: string;
}

/** Status of a freshly created response */
const DEFAULT_STATUS = 200;

// =============================================================================
// Construction
// =============================================================================

/**
 * Create an empty 200 response.
 */
export function createResponse(): HttpResponse {
    return Object.freeze({
        statusCode: DEFAULT_STATUS,
        headers: Object.freeze({}),
        body: '',
    });
}

/**
 * Normalize a caller-supplied structured result.
 * Missing fields take the defaults of createResponse(); header values are
 * converted to strings.
 */
export function toHttpResponse(result?: APIGatewayProxyStructuredResultV2): HttpResponse {
    if (!result) {
        return createResponse();
    }

    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(result.headers ?? {})) {
        headers[name] = String(value);
    }

    return Object.freeze({
        ...result,
        statusCode: result.statusCode ?? DEFAULT_STATUS,
        headers: Object.freeze(headers),
        body: result.body ?? '',
    });
}

// =============================================================================
// Transformations
// =============================================================================

/**
 * Return a copy with `name` set to `value`.
 */
export function withHeader(response: HttpResponse, name: string, value: string): HttpResponse {
    const lower = name.toLowerCase();
    const headers: Record<string, string> = {};

    for (const [existing, existingValue] of Object.entries(response.headers)) {
        if (existing.toLowerCase() !== lower) {
            headers[existing] = existingValue;
        }
    }
    headers[name] = value;

    return Object.freeze({ ...response, headers: Object.freeze(headers) });
}

/**
 * Return a copy with the given status code.
 */
export function withStatus(response: HttpResponse, statusCode: number): HttpResponse {
    return Object.freeze({ ...response, statusCode });
}

/**
 * Return a copy with `chunk` appended to the body.
 */
export function appendBody(response: HttpResponse, chunk: string): HttpResponse {
    return Object.freeze({ ...response, body: response.body + chunk });
}

// =============================================================================
// Accessors
// =============================================================================

/**
 * Read a header by case-insensitive name.
 */
export function getHeader(response: HttpResponse, name: string): string | undefined {
    const lower = name.toLowerCase();
    for (const [existing, value] of Object.entries(response.headers)) {
        if (existing.toLowerCase() === lower) {
            return value;
        }
    }
    return undefined;
}
