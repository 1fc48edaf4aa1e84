import { describe, it, expect, beforeEach } from 'vitest';
import { createSilentLogger } from '../../logger.js';
import { RequestLogger } from '../request-logger.js';
import { StatusAggregator, toApiRequestView } from '../status.js';
import { TokenManager } from '../token.js';
import { createFakeSource, credential, type FakeCredentialSource } from '../../__tests__/test-utils.js';
import type { ProxyRequest } from '../../types.js';

const START = Date.UTC(2024, 4, 1, 12, 0, 0);

const request: ProxyRequest = {
  id: 3,
  receivedAt: new Date(START),
  model: 'gpt-4-internal',
  messageCount: 2,
  maxTokens: 256,
  stream: false,
  lastMessage: 'hello',
  rawBody: Buffer.from('{}'),
};

describe('toApiRequestView', () => {
  const base = {
    id: 3,
    timestamp: '2024-05-01T12:00:00.000Z',
    model: 'gpt-4-internal',
    messages_count: 2,
    max_tokens: 256,
  };

  it('shows a request without an outcome as pending', () => {
    expect(toApiRequestView({ request })).toEqual({ ...base, status: 'pending' });
  });

  it('maps a completed response', () => {
    const view = toApiRequestView({
      request,
      outcome: {
        kind: 'success',
        finishReason: 'stop',
        totalTokens: 42,
        promptTokens: 30,
        completionTokens: 12,
        elapsedMs: 1500,
      },
    });

    expect(view).toEqual({ ...base, status: 'success', finish_reason: 'stop', tokens_used: 42, elapsed_time: 1.5 });
  });

  it('marks a truncated response as a warning', () => {
    const view = toApiRequestView({
      request,
      outcome: {
        kind: 'success',
        finishReason: 'length',
        totalTokens: 4096,
        promptTokens: 10,
        completionTokens: 4086,
        elapsedMs: 200,
      },
    });

    expect(view.status).toBe('warning');
  });

  it('maps each error kind to its status code', () => {
    expect(
      toApiRequestView({ request, outcome: { kind: 'upstream_error', statusCode: 429, message: 'HTTP 429: slow down' } }),
    ).toMatchObject({ status: 'error', status_code: 429, error: 'HTTP 429: slow down' });
    expect(
      toApiRequestView({
        request,
        outcome: { kind: 'transport_error', message: 'Request timed out after 120 seconds', timedOut: true },
      }),
    ).toMatchObject({ status: 'error', status_code: 504 });
    expect(
      toApiRequestView({ request, outcome: { kind: 'transport_error', message: 'Request failed: reset', timedOut: false } }),
    ).toMatchObject({ status: 'error', status_code: 500 });
    expect(
      toApiRequestView({ request, outcome: { kind: 'auth_error', message: 'No OAuth token: denied' } }),
    ).toMatchObject({ status: 'error', status_code: 401, error: 'No OAuth token: denied' });
  });
});

describe('StatusAggregator', () => {
  let clock: number;
  let source: FakeCredentialSource;
  let requestLogger: RequestLogger;
  let tokenManager: TokenManager;
  let status: StatusAggregator;

  beforeEach(() => {
    clock = START;
    source = createFakeSource();
    requestLogger = new RequestLogger({ now: () => clock });
    tokenManager = new TokenManager({
      source,
      events: requestLogger,
      logger: createSilentLogger(),
      now: () => clock,
    });
    status = new StatusAggregator({
      tokenManager,
      requestLogger,
      startedAt: new Date(START),
      logFile: '/tmp/logs/proxy_requests_20240501_120000.log',
      envVars: { MOCK_MODE: 'false', OAUTH_CLIENT_ID: 'test-client' },
      now: () => clock,
    });
  });

  it('describes a fresh relay', () => {
    expect(status.snapshot()).toEqual({
      uptime: 0,
      started_at: '2024-05-01T12:00:00.000Z',
      mock_mode: false,
      oauth_token_status: 'not_initialized',
      token_refresh_count: 0,
      last_token_refresh: null,
      token_expires_at: null,
      last_token_error: null,
      api_request_count: 0,
      api_response_count: 0,
      api_error_count: 0,
      last_request_time: null,
      last_response_time: null,
      api_requests: [],
      events: [],
      env_vars: { MOCK_MODE: 'false', OAUTH_CLIENT_ID: 'test-client' },
      log_file: '/tmp/logs/proxy_requests_20240501_120000.log',
    });
  });

  it('combines token state, counters and history', async () => {
    source.fetchCredential.mockResolvedValue(credential('token-a', START));
    await tokenManager.refresh('startup');

    clock = START + 61_500;
    const pending = requestLogger.beginRequest({
      model: 'gpt-4-internal',
      messageCount: 1,
      maxTokens: null,
      stream: false,
      lastMessage: 'hi',
      rawBody: Buffer.from('{}'),
    });

    const snapshot = status.snapshot();

    expect(snapshot).toMatchObject({
      uptime: 61,
      oauth_token_status: 'active',
      token_refresh_count: 1,
      last_token_refresh: '2024-05-01T12:00:00.000Z',
      token_expires_at: '2024-05-01T13:00:00.000Z',
      api_request_count: 1,
      last_request_time: '2024-05-01T12:01:01.500Z',
    });
    expect(snapshot.api_requests).toEqual([
      {
        id: pending.id,
        timestamp: '2024-05-01T12:01:01.500Z',
        model: 'gpt-4-internal',
        messages_count: 1,
        max_tokens: null,
        status: 'pending',
      },
    ]);
    expect(snapshot.events).toEqual([
      {
        timestamp: '2024-05-01T12:00:00.000Z',
        type: 'success',
        message: 'OAuth token refreshed',
        details: 'Expires: 2024-05-01T13:00:00.000Z',
      },
    ]);
  });

  it('returns copies that later activity does not change', () => {
    const first = status.snapshot();
    requestLogger.append('info', 'later');
    first.env_vars.MOCK_MODE = 'changed';

    expect(first.events).toEqual([]);
    expect(status.snapshot().env_vars.MOCK_MODE).toBe('false');
  });
});
