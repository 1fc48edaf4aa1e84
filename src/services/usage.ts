import { isRecord } from '../utils/http.js';
import type { CompletionSummary } from '../types.js';

function toCount(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0 ? value : 0;
}

/**
 * Pull finish reason and token usage out of a chat-completion response.
 * Missing fields fall back to `unknown` and zero.
 */
export function extractCompletionSummary(responseBody: unknown): CompletionSummary {
  const summary: CompletionSummary = {
    finishReason: 'unknown',
    contentLength: 0,
    promptTokens: 0,
    completionTokens: 0,
    totalTokens: 0,
  };

  if (!isRecord(responseBody)) {
    return summary;
  }

  const choices = responseBody.choices;
  if (Array.isArray(choices) && choices.length > 0) {
    const first: unknown = choices[0];
    if (isRecord(first)) {
      if (typeof first.finish_reason === 'string') {
        summary.finishReason = first.finish_reason;
      }
      const message = first.message;
      if (isRecord(message) && typeof message.content === 'string') {
        summary.contentLength = message.content.length;
      }
    }
  }

  const usage = responseBody.usage;
  if (isRecord(usage)) {
    summary.promptTokens = toCount(usage.prompt_tokens);
    summary.completionTokens = toCount(usage.completion_tokens);
    summary.totalTokens =
      typeof usage.total_tokens === 'number'
        ? toCount(usage.total_tokens)
        : summary.promptTokens + summary.completionTokens;
  }

  return summary;
}

/**
 * Fields of an inbound completion request that get logged
 */
export interface CompletionRequestFields {
  model: string;
  messageCount: number;
  maxTokens: number | null;
  stream: boolean;
  lastMessage: string;
}

const LAST_MESSAGE_PREVIEW_LENGTH = 100;

export function extractRequestFields(body: Record<string, unknown>): CompletionRequestFields {
  const messages = Array.isArray(body.messages) ? body.messages : [];

  let lastMessage = '';
  const last: unknown = messages[messages.length - 1];
  if (isRecord(last) && typeof last.content === 'string') {
    lastMessage = last.content.substring(0, LAST_MESSAGE_PREVIEW_LENGTH);
  }

  return {
    model: typeof body.model === 'string' ? body.model : 'unknown',
    messageCount: messages.length,
    maxTokens: typeof body.max_tokens === 'number' ? body.max_tokens : null,
    stream: body.stream === true,
    lastMessage,
  };
}
