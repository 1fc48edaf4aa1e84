import type {
  ApiRequestView,
  EventView,
  LogEntry,
  ProxyRequestRecord,
  StatusSnapshot,
} from '../types.js';
import type { RequestLogger } from './request-logger.js';
import type { TokenManager } from './token.js';

export interface StatusAggregatorOptions {
  tokenManager: TokenManager;
  requestLogger: RequestLogger;
  startedAt: Date;
  logFile: string;
  envVars: Record<string, string>;
  now?: () => number;
}

function iso(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

export function toApiRequestView(record: ProxyRequestRecord): ApiRequestView {
  const { request, outcome } = record;
  const view: ApiRequestView = {
    id: request.id,
    timestamp: request.receivedAt.toISOString(),
    model: request.model,
    messages_count: request.messageCount,
    max_tokens: request.maxTokens,
    status: 'pending',
  };

  if (!outcome) {
    return view;
  }

  switch (outcome.kind) {
    case 'success':
      view.status = outcome.finishReason === 'stop' ? 'success' : 'warning';
      view.finish_reason = outcome.finishReason;
      view.tokens_used = outcome.totalTokens;
      view.elapsed_time = outcome.elapsedMs / 1000;
      break;
    case 'upstream_error':
      view.status = 'error';
      view.status_code = outcome.statusCode;
      view.error = outcome.message;
      break;
    case 'transport_error':
      view.status = 'error';
      view.status_code = outcome.timedOut ? 504 : 500;
      view.error = outcome.message;
      break;
    case 'auth_error':
      view.status = 'error';
      view.status_code = 401;
      view.error = outcome.message;
      break;
  }
  return view;
}

export function toEventView(entry: LogEntry): EventView {
  return {
    timestamp: entry.timestamp.toISOString(),
    type: entry.severity,
    message: entry.message,
    details: entry.details ?? null,
  };
}

/**
 * Read-only view over token and request state for the dashboard.
 * Each snapshot is assembled from copies taken from the owning services.
 */
export class StatusAggregator {
  private readonly options: StatusAggregatorOptions;
  private readonly now: () => number;

  constructor(options: StatusAggregatorOptions) {
    this.options = options;
    this.now = options.now ?? (() => Date.now());
  }

  snapshot(): StatusSnapshot {
    const { tokenManager, requestLogger, startedAt } = this.options;

    const token = tokenManager.getStatus();
    const counters = requestLogger.getCounters();
    const requests = requestLogger.requestsSnapshot();
    const events = requestLogger.snapshot();

    return {
      uptime: Math.max(0, Math.floor((this.now() - startedAt.getTime()) / 1000)),
      started_at: startedAt.toISOString(),
      mock_mode: tokenManager.mockMode,
      oauth_token_status: token.state,
      token_refresh_count: token.refreshCount,
      last_token_refresh: iso(token.lastRefreshAt),
      token_expires_at: iso(token.expiresAt),
      last_token_error: token.lastError,
      api_request_count: counters.requestCount,
      api_response_count: counters.responseCount,
      api_error_count: counters.errorCount,
      last_request_time: iso(counters.lastRequestAt),
      last_response_time: iso(counters.lastResponseAt),
      api_requests: requests.map(toApiRequestView),
      events: events.map(toEventView),
      env_vars: { ...this.options.envVars },
      log_file: this.options.logFile,
    };
  }
}
