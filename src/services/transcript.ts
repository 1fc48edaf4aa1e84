import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from '../logger.js';
import type { CompletionSummary, ProxyRequest } from '../types.js';

const RULE = '='.repeat(80);
const RESPONSE_PREVIEW_LENGTH = 2000;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatClock(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * `proxy_requests_YYYYMMDD_HHMMSS.log`, one file per process start
 */
export function transcriptFileName(startedAt: Date): string {
  const day = `${startedAt.getFullYear()}${pad(startedAt.getMonth() + 1)}${pad(startedAt.getDate())}`;
  const time = `${pad(startedAt.getHours())}${pad(startedAt.getMinutes())}${pad(startedAt.getSeconds())}`;
  return `proxy_requests_${day}_${time}.log`;
}

function prettyJson(raw: Buffer | string): string {
  const text = raw.toString();
  try {
    return JSON.stringify(JSON.parse(text), null, 2);
  } catch {
    return text;
  }
}

export function formatRequestBlock(request: ProxyRequest): string {
  return [
    '',
    RULE,
    `REQUEST #${request.id} at ${formatClock(request.receivedAt)}`,
    RULE,
    `Model: ${request.model}`,
    `Max Tokens: ${request.maxTokens ?? 'not set'}`,
    `Streaming: ${request.stream}`,
    `Messages: ${request.messageCount}`,
    `Last Message: ${request.lastMessage}...`,
    '',
    'Full Request:',
    prettyJson(request.rawBody),
    '',
  ].join('\n');
}

export function formatResponseBlock(
  id: number,
  at: Date,
  elapsedMs: number,
  summary: CompletionSummary,
  rawBody: Buffer,
): string {
  return [
    '',
    `RESPONSE #${id} at ${formatClock(at)} (took ${(elapsedMs / 1000).toFixed(2)}s)`,
    RULE,
    `Finish Reason: ${summary.finishReason}`,
    `Content Length: ${summary.contentLength} characters`,
    `Prompt Tokens: ${summary.promptTokens}`,
    `Completion Tokens: ${summary.completionTokens}`,
    `Total Tokens: ${summary.totalTokens}`,
    '',
    'Full Response:',
    prettyJson(rawBody).substring(0, RESPONSE_PREVIEW_LENGTH),
    '...',
    '',
  ].join('\n');
}

export function formatErrorBlock(id: number | null, at: Date, message: string): string {
  const label = id === null ? 'ERROR' : `ERROR #${id}`;
  return ['', `${label} at ${formatClock(at)}`, RULE, message, ''].join('\n');
}

export function formatTruncationWarning(id: number): string {
  return `\nWARNING: Response #${id} was cut off! (finish_reason=length)\n`;
}

/**
 * Append-only human-readable record of every exchange. Writes are queued so
 * blocks land in the file in the order they were emitted.
 */
export class TranscriptWriter {
  readonly filePath: string;
  private queue: Promise<void> = Promise.resolve();
  private dirReady?: Promise<void>;

  constructor(
    private readonly logDir: string,
    startedAt: Date,
    private readonly logger: Logger,
  ) {
    this.filePath = path.join(logDir, transcriptFileName(startedAt));
  }

  write(block: string): void {
    this.queue = this.queue
      .then(() => this.ensureDir())
      .then(() => appendFile(this.filePath, block + '\n', 'utf8'))
      .catch((error: unknown) => {
        this.logger.warn({ err: error, filePath: this.filePath }, 'Failed to write transcript');
      });
  }

  /**
   * Resolves once every queued block has been written
   */
  flush(): Promise<void> {
    return this.queue;
  }

  private ensureDir(): Promise<void> {
    if (!this.dirReady) {
      this.dirReady = mkdir(this.logDir, { recursive: true }).then(
        () => undefined,
        (error: unknown) => {
          this.dirReady = undefined;
          throw error;
        },
      );
    }
    return this.dirReady;
  }
}
