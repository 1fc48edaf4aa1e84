import { RingBuffer } from '../utils/ring-buffer.js';
import type {
  LogEntry,
  LogSeverity,
  ProxyOutcome,
  ProxyRequest,
  ProxyRequestRecord,
  RequestCounters,
} from '../types.js';

export const DEFAULT_EVENT_CAPACITY = 100;
export const DEFAULT_REQUEST_CAPACITY = 50;

export interface RequestLoggerOptions {
  eventCapacity?: number;
  requestCapacity?: number;
  now?: () => number;
}

export type NewProxyRequest = Omit<ProxyRequest, 'id' | 'receivedAt'>;

/**
 * In-memory event stream and recent request history shared by the proxy,
 * the token manager and the status endpoint.
 *
 * Every mutation runs synchronously, so an id assignment and its counter
 * increment, or an outcome and its counter update, are never interleaved
 * with another handler.
 */
export class RequestLogger {
  private readonly events: RingBuffer<LogEntry>;
  private readonly requests: RingBuffer<ProxyRequestRecord>;
  private readonly now: () => number;
  private nextId = 1;
  private counters: RequestCounters = {
    requestCount: 0,
    responseCount: 0,
    errorCount: 0,
    lastRequestAt: null,
    lastResponseAt: null,
  };
  // requests that already have an outcome; outlives ring eviction
  private readonly settled = new WeakSet<ProxyRequest>();

  constructor(options: RequestLoggerOptions = {}) {
    this.events = new RingBuffer(options.eventCapacity ?? DEFAULT_EVENT_CAPACITY);
    this.requests = new RingBuffer(options.requestCapacity ?? DEFAULT_REQUEST_CAPACITY);
    this.now = options.now ?? (() => Date.now());
  }

  append(severity: LogSeverity, message: string, details?: string): LogEntry {
    const entry: LogEntry = Object.freeze({
      timestamp: new Date(this.now()),
      severity,
      message,
      ...(details !== undefined ? { details } : {}),
    });
    this.events.push(entry);
    return entry;
  }

  /**
   * Point-in-time copy, most recent first
   */
  snapshot(): LogEntry[] {
    return this.events.toReversedArray();
  }

  beginRequest(fields: NewProxyRequest): ProxyRequest {
    const receivedAt = new Date(this.now());
    const request: ProxyRequest = Object.freeze({
      ...fields,
      id: this.nextId++,
      receivedAt,
    });

    this.counters.requestCount++;
    this.counters.lastRequestAt = receivedAt;
    this.requests.push(Object.freeze({ request }));
    return request;
  }

  /**
   * Attach the outcome of a request. Returns false, changing nothing, when
   * the request already has one.
   */
  settle(request: ProxyRequest, outcome: ProxyOutcome): boolean {
    if (this.settled.has(request)) {
      return false;
    }
    this.settled.add(request);

    if (outcome.kind === 'success') {
      this.counters.responseCount++;
      this.counters.lastResponseAt = new Date(this.now());
    } else {
      this.counters.errorCount++;
    }

    const record: ProxyRequestRecord = Object.freeze({
      request,
      outcome: Object.freeze({ ...outcome }),
    });
    this.requests.replaceLast((existing) => existing.request.id === request.id, record);
    return true;
  }

  /**
   * Recent requests, most recent first
   */
  requestsSnapshot(): ProxyRequestRecord[] {
    return this.requests.toReversedArray();
  }

  getCounters(): RequestCounters {
    return { ...this.counters };
  }
}
