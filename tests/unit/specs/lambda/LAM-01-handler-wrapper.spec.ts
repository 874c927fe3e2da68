/**
 * LAM-01: Handler Wrapper
 *
 * Validates that failures thrown by a Lambda handler end the request
 * with a rendered error response and a structured log line.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  accessDenied,
  invalidClient,
  invalidScope,
  raise,
  responseModeFromQuery,
  withProtocolErrors,
} from '../../../../modules/shared/src';
import type { ProtocolErrorHandlerOptions } from '../../../../modules/shared/src';
import { asStructured, assertOAuthError } from '../../support/assertions';
import {
  ACCESS_DENIED_MESSAGE_ENCODED,
  basicAuthorization,
  createTokenEvent,
  SERVER_ERROR_PREFIX,
  TEST_CLIENT,
} from '../../fixtures';

const QUERY_CONFIG: ProtocolErrorHandlerOptions = { config: { realm: 'OAuth', responseMode: 'query' } };

function captureLogs() {
  const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  return () => spy.mock.calls.map(([line]) => JSON.parse(String(line)));
}

describe('LAM-01: Handler Wrapper', () => {
  it('should pass successful results through', async () => {
    const handler = withProtocolErrors(async () => ({ statusCode: 204 }), QUERY_CONFIG);

    await expect(handler(createTokenEvent())).resolves.toEqual({ statusCode: 204 });
  });

  it('should render a raised invalid_client with the client scheme', async () => {
    const logs = captureLogs();
    const handler = withProtocolErrors(async () => raise(invalidClient()), QUERY_CONFIG);
    const event = createTokenEvent({
      authorization: basicAuthorization(TEST_CLIENT.client_id, 'wrong-secret'),
    });

    const response = asStructured(await handler(event));

    assertOAuthError(response, 'invalid_client', { expectedStatus: 401 });
    expect(response.headers['WWW-Authenticate']).toBe('Basic realm="OAuth"');
    expect(logs()).toEqual([
      expect.objectContaining({
        level: 'WARN',
        requestId: 'req-test-001',
        message: 'Request rejected',
        data: { code: 4, errorType: 'invalid_client', httpStatusCode: 401 },
      }),
    ]);
  });

  it('should render unclassified failures as server_error without leaking their message', async () => {
    const logs = captureLogs();
    const handler = withProtocolErrors(async () => {
      throw new Error('connection refused: password=test-secret');
    }, QUERY_CONFIG);

    const response = asStructured(await handler(createTokenEvent()));

    const body = assertOAuthError(response, 'server_error', { expectedStatus: 500 });
    expect(body).toEqual({
      error: 'server_error',
      message: `${SERVER_ERROR_PREFIX}unexpected internal failure`,
    });
    expect(logs()).toEqual([
      expect.objectContaining({
        level: 'ERROR',
        message: 'Request failed with server error',
        data: {
          code: 7,
          errorType: 'server_error',
          httpStatusCode: 500,
          cause: 'connection refused: password=test-secret',
        },
      }),
    ]);
  });

  it('should render a thrown bare protocol error', async () => {
    captureLogs();
    const handler = withProtocolErrors(async () => {
      throw invalidScope('email');
    }, QUERY_CONFIG);

    const response = asStructured(await handler(createTokenEvent()));

    assertOAuthError(response, 'invalid_scope');
  });

  it('should deliver redirect errors in the fragment when configured', async () => {
    captureLogs();
    const handler = withProtocolErrors(
      async () => raise(accessDenied({ redirectUri: 'https://client.example/cb' })),
      { config: { realm: 'OAuth', responseMode: 'fragment' } }
    );

    const response = asStructured(await handler(createTokenEvent()));

    expect(response.headers.Location).toBe(
      `https://client.example/cb#error=access_denied&message=${ACCESS_DENIED_MESSAGE_ENCODED}`
    );
  });

  it('should read the response mode from the environment when no config is given', async () => {
    captureLogs();
    vi.stubEnv('OAUTH_ERROR_RESPONSE_MODE', 'fragment');
    vi.stubEnv('OAUTH_REALM', 'token-endpoint');
    const handler = withProtocolErrors(async () => raise(invalidClient()));

    const response = asStructured(await handler(createTokenEvent({ authorization: 'Bearer abc123' })));

    expect(response.headers['WWW-Authenticate']).toBe('Bearer realm="token-endpoint"');
  });

  it('should fail when wrapping under an invalid environment', () => {
    vi.stubEnv('OAUTH_ERROR_RESPONSE_MODE', 'form_post');
    const inner = vi.fn(async () => raise(invalidClient()));

    expect(() => withProtocolErrors(inner)).toThrow('OAUTH_ERROR_RESPONSE_MODE must be "query" or "fragment"');
    expect(inner).not.toHaveBeenCalled();
  });

  it('should let the request choose fragment delivery over the configured mode', async () => {
    captureLogs();
    const handler = withProtocolErrors(async () => raise(accessDenied({ redirectUri: TEST_CLIENT.redirect_uri })), {
      ...QUERY_CONFIG,
      resolveResponseMode: responseModeFromQuery,
    });

    const implicit = asStructured(
      await handler({ ...createTokenEvent(), queryStringParameters: { response_mode: 'fragment' } })
    );
    const code = asStructured(await handler(createTokenEvent()));

    expect(implicit.headers.Location).toBe(
      `https://client.example/cb#error=access_denied&message=${ACCESS_DENIED_MESSAGE_ENCODED}`
    );
    expect(code.headers.Location).toBe(
      `https://client.example/cb?error=access_denied&message=${ACCESS_DENIED_MESSAGE_ENCODED}`
    );
  });

  it('should keep the configured mode for response modes it does not deliver', async () => {
    captureLogs();
    const handler = withProtocolErrors(async () => raise(accessDenied({ redirectUri: TEST_CLIENT.redirect_uri })), {
      config: { realm: 'OAuth', responseMode: 'fragment' },
      resolveResponseMode: responseModeFromQuery,
    });

    const response = asStructured(
      await handler({ ...createTokenEvent(), queryStringParameters: { response_mode: 'form_post' } })
    );

    expect(response.headers.Location).toBe(
      `https://client.example/cb#error=access_denied&message=${ACCESS_DENIED_MESSAGE_ENCODED}`
    );
  });

  it('should pass the event to a custom response mode resolver', async () => {
    captureLogs();
    const resolveResponseMode = vi.fn(() => 'fragment' as const);
    const handler = withProtocolErrors(
      async () => raise(invalidScope('email', { redirectUri: TEST_CLIENT.redirect_uri })),
      { ...QUERY_CONFIG, resolveResponseMode }
    );
    const event = createTokenEvent();

    const response = asStructured(await handler(event));

    expect(resolveResponseMode).toHaveBeenCalledWith(event);
    expect(response.headers.Location).toMatch(/^https:\/\/client\.example\/cb#error=invalid_scope&/);
  });

  it('should propagate failures raised while rendering', async () => {
    captureLogs();
    const handler = withProtocolErrors(
      async () => raise(invalidScope('email', { redirectUri: 'not a uri' })),
      QUERY_CONFIG
    );

    await expect(handler(createTokenEvent())).rejects.toThrow(TypeError);
  });
});
