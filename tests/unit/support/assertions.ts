/**
 * Assertion Helpers
 *
 * Checks shared by the error rendering specs.
 */

import type { APIGatewayProxyResultV2 } from 'aws-lambda';
import { getHeader, toHttpResponse } from '../../../modules/shared/src';
import type { HttpResponse } from '../../../modules/shared/src';

export interface ErrorBody {
  error: string;
  message: string;
  hint?: string;
}

/**
 * Narrow a handler result to its structured form.
 */
export function asStructured(result: APIGatewayProxyResultV2): HttpResponse {
  if (typeof result === 'string') {
    throw new Error(`Expected a structured result, got string "${result}"`);
  }
  return toHttpResponse(result);
}

/**
 * Assert that a response carries the expected OAuth error, and return its body.
 */
export function assertOAuthError(
  response: HttpResponse,
  expectedError: string,
  options: { expectedStatus?: number } = {}
): ErrorBody {
  const { expectedStatus = 400 } = options;

  if (response.statusCode !== expectedStatus) {
    throw new Error(`Expected status ${expectedStatus}, got ${response.statusCode}. Body: ${response.body}`);
  }

  if (getHeader(response, 'content-type') !== 'application/json') {
    throw new Error(`Expected JSON content type, got "${getHeader(response, 'content-type')}"`);
  }

  const data: ErrorBody = JSON.parse(response.body);
  if (data.error !== expectedError) {
    throw new Error(`Expected error "${expectedError}", got "${data.error}". Message: ${data.message}`);
  }

  return data;
}

/**
 * Parse the Location header into its URL.
 */
export function parseLocation(response: HttpResponse): URL {
  const location = getHeader(response, 'location');
  if (!location) {
    throw new Error('Response missing Location header');
  }
  return new URL(location);
}
