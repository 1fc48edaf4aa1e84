import { request as undiciRequest, type Dispatcher } from 'undici';
import type { FastifyBaseLogger, FastifyReply, FastifyRequest } from 'fastify';
import {
  AuthFailure,
  ConfigError,
  RelayError,
  TransportError,
  UpstreamError,
  errorMessage,
} from '../errors.js';
import { isRecord, isTimeoutError, joinUrl, truncate } from '../utils/http.js';
import type { ProxyOutcome, ProxyRequest } from '../types.js';
import type { RequestLogger } from './request-logger.js';
import type { TokenManager } from './token.js';
import {
  formatErrorBlock,
  formatRequestBlock,
  formatResponseBlock,
  formatTruncationWarning,
  type TranscriptWriter,
} from './transcript.js';
import { extractCompletionSummary, extractRequestFields } from './usage.js';

export const COMPLETIONS_PATH = 'chat/completions';
export const UPSTREAM_TIMEOUT_MS = 120_000;
export const REQUEST_ID_HEADER = 'x-proxy-request-id';
const ERROR_BODY_PREFIX_LENGTH = 500;
const EVENT_DETAILS_LENGTH = 200;

export interface CompletionProxyOptions {
  baseUrl: string;
  tokenManager: TokenManager;
  requestLogger: RequestLogger;
  transcript: TranscriptWriter;
  dispatcher?: Dispatcher;
  timeoutMs?: number;
  now?: () => number;
}

interface UpstreamResponse {
  statusCode: number;
  body: Buffer;
}

/**
 * Parse an inbound completion payload
 * @throws {ConfigError} when the body is not a JSON object
 */
export function parseCompletionBody(rawBody: Buffer): Record<string, unknown> {
  if (rawBody.length === 0) {
    throw new ConfigError('Request body is empty');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(rawBody.toString('utf8'));
  } catch {
    throw new ConfigError('Invalid JSON');
  }

  if (!isRecord(parsed)) {
    throw new ConfigError('Request body must be a JSON object');
  }
  return parsed;
}

/**
 * Relays chat-completion requests to the upstream endpoint with a bearer
 * token from the token manager, recording each exchange.
 */
export class CompletionProxy {
  readonly upstreamUrl: string;
  private readonly tokenManager: TokenManager;
  private readonly requestLogger: RequestLogger;
  private readonly transcript: TranscriptWriter;
  private readonly dispatcher?: Dispatcher;
  private readonly timeoutMs: number;
  private readonly now: () => number;

  constructor(options: CompletionProxyOptions) {
    this.upstreamUrl = joinUrl(options.baseUrl, COMPLETIONS_PATH);
    this.tokenManager = options.tokenManager;
    this.requestLogger = options.requestLogger;
    this.transcript = options.transcript;
    this.dispatcher = options.dispatcher;
    this.timeoutMs = options.timeoutMs ?? UPSTREAM_TIMEOUT_MS;
    this.now = options.now ?? (() => Date.now());
  }

  async proxyRequest(request: FastifyRequest, reply: FastifyReply): Promise<void> {
    const rawBody = Buffer.isBuffer(request.body) ? request.body : Buffer.alloc(0);

    let payload: Record<string, unknown>;
    try {
      payload = parseCompletionBody(rawBody);
    } catch (error) {
      const rejection = error instanceof ConfigError ? error : new ConfigError(errorMessage(error));
      request.log.warn({ error: rejection.message }, 'Rejected completion request');
      this.requestLogger.append('error', 'Rejected request', rejection.message);
      this.transcript.write(formatErrorBlock(null, new Date(this.now()), rejection.message));
      this.sendText(reply, rejection.statusCode, rejection.message);
      return;
    }

    const proxyRequest = this.requestLogger.beginRequest({
      ...extractRequestFields(payload),
      rawBody,
    });
    this.recordRequest(proxyRequest, request.log);
    reply.header(REQUEST_ID_HEADER, String(proxyRequest.id));

    let token: string;
    try {
      token = (await this.tokenManager.getToken()).token;
    } catch (error) {
      const failure =
        error instanceof AuthFailure ? error : new AuthFailure(errorMessage(error), 'invalid_response', error);
      const message = `No OAuth token: ${failure.message}`;
      this.fail(proxyRequest, { kind: 'auth_error', message }, request.log);
      this.sendText(reply, failure.statusCode, message);
      return;
    }

    const startedAt = this.now();
    request.log.info({ proxyRequestId: proxyRequest.id, upstreamUrl: this.upstreamUrl }, 'Forwarding completion request');

    try {
      const upstream = await this.forward(rawBody, token);
      const elapsedMs = this.now() - startedAt;

      if (upstream.statusCode !== 200) {
        const text = upstream.body.toString('utf8');
        throw new UpstreamError(
          upstream.statusCode,
          `HTTP ${upstream.statusCode}: ${truncate(text, ERROR_BODY_PREFIX_LENGTH)}`,
        );
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(upstream.body.toString('utf8'));
      } catch (error) {
        throw new TransportError(
          `Invalid JSON response: ${truncate(upstream.body.toString('utf8'), ERROR_BODY_PREFIX_LENGTH)}`,
          false,
          error,
        );
      }

      this.recordResponse(proxyRequest, parsed, upstream.body, elapsedMs, request.log);
      reply.code(200).header('content-type', 'application/json').send(upstream.body);
    } catch (error) {
      const relayError = this.toRelayError(error);
      const outcome: ProxyOutcome =
        relayError instanceof TransportError
          ? { kind: 'transport_error', message: relayError.message, timedOut: relayError.timedOut }
          : { kind: 'upstream_error', statusCode: relayError.statusCode, message: relayError.message };
      this.fail(proxyRequest, outcome, request.log);
      this.sendText(reply, relayError.statusCode, relayError.message);
    }
  }

  private async forward(rawBody: Buffer, token: string): Promise<UpstreamResponse> {
    try {
      const response = await undiciRequest(this.upstreamUrl, {
        method: 'POST',
        headers: {
          authorization: `Bearer ${token}`,
          'content-type': 'application/json',
        },
        body: rawBody,
        headersTimeout: this.timeoutMs,
        bodyTimeout: this.timeoutMs,
        signal: AbortSignal.timeout(this.timeoutMs),
        dispatcher: this.dispatcher,
      });
      const body = Buffer.from(await response.body.arrayBuffer());
      return { statusCode: response.statusCode, body };
    } catch (error) {
      if (isTimeoutError(error)) {
        throw new TransportError(`Request timed out after ${this.timeoutMs / 1000} seconds`, true, error);
      }
      throw new TransportError(`Request failed: ${errorMessage(error)}`, false, error);
    }
  }

  private toRelayError(error: unknown): UpstreamError | TransportError {
    if (error instanceof UpstreamError || error instanceof TransportError) {
      return error;
    }
    const message = error instanceof RelayError ? error.message : `Request failed: ${errorMessage(error)}`;
    return new TransportError(message, false, error);
  }

  private recordRequest(proxyRequest: ProxyRequest, log: FastifyBaseLogger): void {
    log.info(
      {
        proxyRequestId: proxyRequest.id,
        model: proxyRequest.model,
        messages: proxyRequest.messageCount,
        maxTokens: proxyRequest.maxTokens,
        stream: proxyRequest.stream,
      },
      'Completion request received',
    );
    this.requestLogger.append(
      'info',
      `API Request #${proxyRequest.id}`,
      `Model: ${proxyRequest.model}, Tokens: ${proxyRequest.maxTokens ?? 'not set'}`,
    );
    this.transcript.write(formatRequestBlock(proxyRequest));
  }

  private recordResponse(
    proxyRequest: ProxyRequest,
    parsed: unknown,
    rawBody: Buffer,
    elapsedMs: number,
    log: FastifyBaseLogger,
  ): void {
    const summary = extractCompletionSummary(parsed);
    const { id } = proxyRequest;

    this.requestLogger.settle(proxyRequest, {
      kind: 'success',
      finishReason: summary.finishReason,
      totalTokens: summary.totalTokens,
      promptTokens: summary.promptTokens,
      completionTokens: summary.completionTokens,
      elapsedMs,
    });

    log.info(
      { proxyRequestId: id, finishReason: summary.finishReason, totalTokens: summary.totalTokens, elapsedMs },
      'Completion response relayed',
    );
    this.requestLogger.append(
      summary.finishReason === 'stop' ? 'success' : 'warning',
      `API Response #${id} (${(elapsedMs / 1000).toFixed(1)}s)`,
      `Finish: ${summary.finishReason}, Tokens: ${summary.totalTokens}`,
    );
    this.transcript.write(formatResponseBlock(id, new Date(this.now()), elapsedMs, summary, rawBody));

    if (summary.finishReason === 'length') {
      log.warn({ proxyRequestId: id }, 'Completion response was truncated');
      this.requestLogger.append('warning', `Response #${id} was cut off`, 'finish_reason=length');
      this.transcript.write(formatTruncationWarning(id));
    }
  }

  private fail(
    proxyRequest: ProxyRequest,
    outcome: Exclude<ProxyOutcome, { kind: 'success' }>,
    log: FastifyBaseLogger,
  ): void {
    const { id } = proxyRequest;
    this.requestLogger.settle(proxyRequest, outcome);
    log.error({ proxyRequestId: id, kind: outcome.kind, error: outcome.message }, 'Completion request failed');
    this.requestLogger.append('error', `API Error #${id}`, truncate(outcome.message, EVENT_DETAILS_LENGTH));
    this.transcript.write(formatErrorBlock(id, new Date(this.now()), outcome.message));
  }

  private sendText(reply: FastifyReply, statusCode: number, message: string): void {
    reply.code(statusCode).type('text/plain; charset=utf-8').send(message);
  }
}
