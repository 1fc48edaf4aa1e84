export interface Credential {
  readonly token: string;
  readonly obtainedAt: Date;
  readonly expiresAt: Date;
}

export interface OAuthConfig {
  readonly endpoint: string;
  readonly clientId: string;
  readonly clientSecret: string;
  readonly mockMode: boolean;
}

export type TokenState = 'not_initialized' | 'active' | 'expiring' | 'expired' | 'mock';

export interface TokenStatus {
  state: TokenState;
  refreshCount: number;
  lastRefreshAt: Date | null;
  expiresAt: Date | null;
  lastError: string | null;
}

export type LogSeverity = 'info' | 'success' | 'warning' | 'error';

export interface LogEntry {
  readonly timestamp: Date;
  readonly severity: LogSeverity;
  readonly message: string;
  readonly details?: string;
}

export interface ProxyRequest {
  readonly id: number;
  readonly receivedAt: Date;
  readonly model: string;
  readonly messageCount: number;
  readonly maxTokens: number | null;
  readonly stream: boolean;
  readonly lastMessage: string;
  readonly rawBody: Buffer;
}

export type ProxyOutcome =
  | {
      readonly kind: 'success';
      readonly finishReason: string;
      readonly totalTokens: number;
      readonly promptTokens: number;
      readonly completionTokens: number;
      readonly elapsedMs: number;
    }
  | { readonly kind: 'upstream_error'; readonly statusCode: number; readonly message: string }
  | { readonly kind: 'transport_error'; readonly message: string; readonly timedOut: boolean }
  | { readonly kind: 'auth_error'; readonly message: string };

export interface ProxyRequestRecord {
  readonly request: ProxyRequest;
  readonly outcome?: ProxyOutcome;
}

export interface RequestCounters {
  requestCount: number;
  responseCount: number;
  errorCount: number;
  lastRequestAt: Date | null;
  lastResponseAt: Date | null;
}

export interface CompletionSummary {
  finishReason: string;
  contentLength: number;
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export type ApiRequestStatus = 'pending' | 'success' | 'warning' | 'error';

export interface ApiRequestView {
  id: number;
  timestamp: string;
  model: string;
  messages_count: number;
  max_tokens: number | null;
  status: ApiRequestStatus;
  finish_reason?: string;
  tokens_used?: number;
  elapsed_time?: number;
  status_code?: number;
  error?: string;
}

export interface EventView {
  timestamp: string;
  type: LogSeverity;
  message: string;
  details: string | null;
}

export interface StatusSnapshot {
  uptime: number;
  started_at: string;
  mock_mode: boolean;
  oauth_token_status: TokenState;
  token_refresh_count: number;
  last_token_refresh: string | null;
  token_expires_at: string | null;
  last_token_error: string | null;
  api_request_count: number;
  api_response_count: number;
  api_error_count: number;
  last_request_time: string | null;
  last_response_time: string | null;
  api_requests: ApiRequestView[];
  events: EventView[];
  env_vars: Record<string, string>;
  log_file: string;
}
