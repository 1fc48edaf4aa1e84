import { describe, it, expect } from 'vitest';
import { RequestLogger, type NewProxyRequest } from '../request-logger.js';

const NOW = Date.UTC(2024, 4, 1, 12, 0, 0);

function requestFields(overrides: Partial<NewProxyRequest> = {}): NewProxyRequest {
  return {
    model: 'gpt-4-internal',
    messageCount: 1,
    maxTokens: 256,
    stream: false,
    lastMessage: 'hello',
    rawBody: Buffer.from('{}'),
    ...overrides,
  };
}

describe('RequestLogger events', () => {
  it('returns entries most recent first', () => {
    const logger = new RequestLogger({ now: () => NOW });
    logger.append('info', 'first');
    logger.append('success', 'second', 'details');

    expect(logger.snapshot()).toEqual([
      { timestamp: new Date(NOW), severity: 'success', message: 'second', details: 'details' },
      { timestamp: new Date(NOW), severity: 'info', message: 'first' },
    ]);
  });

  it('keeps only the last hundred events', () => {
    const logger = new RequestLogger();
    for (let i = 1; i <= 150; i++) {
      logger.append('info', `event ${i}`);
    }

    const events = logger.snapshot();
    expect(events).toHaveLength(100);
    expect(events[0].message).toBe('event 150');
    expect(events[99].message).toBe('event 51');
  });

  it('hands out snapshots that later appends do not change', () => {
    const logger = new RequestLogger();
    logger.append('info', 'before');
    const snapshot = logger.snapshot();

    logger.append('info', 'after');

    expect(snapshot.map((entry) => entry.message)).toEqual(['before']);
    expect(Object.isFrozen(snapshot[0])).toBe(true);
  });
});

describe('RequestLogger requests', () => {
  it('numbers requests from one and counts them', () => {
    const logger = new RequestLogger({ now: () => NOW });

    const first = logger.beginRequest(requestFields());
    const second = logger.beginRequest(requestFields({ model: 'other-model' }));

    expect(first.id).toBe(1);
    expect(second.id).toBe(2);
    expect(second.receivedAt).toEqual(new Date(NOW));
    expect(logger.getCounters()).toEqual({
      requestCount: 2,
      responseCount: 0,
      errorCount: 0,
      lastRequestAt: new Date(NOW),
      lastResponseAt: null,
    });
  });

  it('assigns unique contiguous ids to concurrent requests', async () => {
    const logger = new RequestLogger();

    const ids = await Promise.all(
      Array.from({ length: 100 }, async (_, i) => {
        await new Promise((resolve) => setTimeout(resolve, i % 5));
        return logger.beginRequest(requestFields()).id;
      }),
    );

    const sorted = [...ids].sort((a, b) => a - b);
    expect(sorted).toEqual(Array.from({ length: 100 }, (_, i) => i + 1));
    expect(logger.getCounters().requestCount).toBe(100);
  });

  it('records a success and an error in the counters', () => {
    const logger = new RequestLogger({ now: () => NOW });
    const ok = logger.beginRequest(requestFields());
    const failed = logger.beginRequest(requestFields());

    logger.settle(ok, {
      kind: 'success',
      finishReason: 'stop',
      totalTokens: 5,
      promptTokens: 2,
      completionTokens: 3,
      elapsedMs: 40,
    });
    logger.settle(failed, { kind: 'upstream_error', statusCode: 429, message: 'HTTP 429: slow down' });

    const counters = logger.getCounters();
    expect(counters.responseCount).toBe(1);
    expect(counters.errorCount).toBe(1);
    expect(counters.lastResponseAt).toEqual(new Date(NOW));

    const [latest, earliest] = logger.requestsSnapshot();
    expect(latest.request.id).toBe(2);
    expect(latest.outcome).toEqual({ kind: 'upstream_error', statusCode: 429, message: 'HTTP 429: slow down' });
    expect(earliest.outcome?.kind).toBe('success');
  });

  it('settles a request only once', () => {
    const logger = new RequestLogger();
    const request = logger.beginRequest(requestFields());

    expect(logger.settle(request, { kind: 'auth_error', message: 'No OAuth token: denied' })).toBe(true);
    expect(
      logger.settle(request, {
        kind: 'success',
        finishReason: 'stop',
        totalTokens: 1,
        promptTokens: 0,
        completionTokens: 1,
        elapsedMs: 1,
      }),
    ).toBe(false);

    expect(logger.getCounters()).toMatchObject({ responseCount: 0, errorCount: 1 });
    expect(logger.requestsSnapshot()[0].outcome?.kind).toBe('auth_error');
  });

  it('evicts old requests but keeps counting', () => {
    const logger = new RequestLogger({ requestCapacity: 3 });
    const requests = Array.from({ length: 5 }, () => logger.beginRequest(requestFields()));

    expect(logger.requestsSnapshot().map((record) => record.request.id)).toEqual([5, 4, 3]);

    // an evicted request still settles and still counts
    expect(logger.settle(requests[0], { kind: 'auth_error', message: 'late' })).toBe(true);
    expect(logger.getCounters()).toMatchObject({ requestCount: 5, errorCount: 1 });
    expect(logger.requestsSnapshot().every((record) => record.outcome === undefined)).toBe(true);
  });
});
