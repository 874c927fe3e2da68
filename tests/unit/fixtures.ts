/**
 * Test Fixtures
 */

import type { APIGatewayProxyEventV2 } from 'aws-lambda';

export const TEST_CLIENT = {
  client_id: 'test-app',
  client_secret: 'test-secret',
  redirect_uri: 'https://client.example/cb',
};

/**
 * Authorization header value for `Basic` client authentication; the secret
 * defaults to the test client's.
 */
export function basicAuthorization(clientId = TEST_CLIENT.client_id, secret = TEST_CLIENT.client_secret): string {
  return `Basic ${Buffer.from(`${clientId}:${secret}`).toString('base64')}`;
}

/** Form-encoded message of invalid_scope */
export const INVALID_SCOPE_MESSAGE_ENCODED = 'The+requested+scope+is+invalid%2C+unknown%2C+or+malformed';

/** Form-encoded message of access_denied */
export const ACCESS_DENIED_MESSAGE_ENCODED = 'The+resource+owner+or+authorization+server+denied+the+request.';

export const SERVER_ERROR_PREFIX =
  'The authorization server encountered an unexpected condition which prevented it from fulfilling the request: ';

/**
 * API Gateway HTTP API v2 event for POST /token with the given headers.
 */
export function createTokenEvent(headers: Record<string, string> = {}): APIGatewayProxyEventV2 {
  return {
    version: '2.0',
    routeKey: 'POST /token',
    rawPath: '/token',
    rawQueryString: '',
    headers,
    requestContext: {
      accountId: '123456789012',
      apiId: 'test-api',
      domainName: 'auth.example.com',
      domainPrefix: 'auth',
      http: {
        method: 'POST',
        path: '/token',
        protocol: 'HTTP/1.1',
        sourceIp: '203.0.113.10',
        userAgent: 'vitest',
      },
      requestId: 'req-test-001',
      routeKey: 'POST /token',
      stage: '$default',
      time: '18/Oct/2026:12:00:00 +0000',
      timeEpoch: 1792324800000,
    },
    isBase64Encoded: false,
  };
}
