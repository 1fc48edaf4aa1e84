import type { Dispatcher } from 'undici';
import { describeConfig, type Config } from './config.js';
import type { Logger } from './logger.js';
import { createCredentialSource, type CredentialSource } from './services/credential-source.js';
import { CompletionProxy } from './services/proxy.js';
import { RequestLogger } from './services/request-logger.js';
import { StatusAggregator } from './services/status.js';
import { TokenManager } from './services/token.js';
import { TranscriptWriter } from './services/transcript.js';
import type { Credential } from './types.js';

/**
 * Shared state handed to routes and background tasks
 */
export interface RelayContext {
  config: Config;
  logger: Logger;
  tokenManager: TokenManager;
  requestLogger: RequestLogger;
  transcript: TranscriptWriter;
  proxy: CompletionProxy;
  status: StatusAggregator;
}

export interface RelayContextOverrides {
  /** Outbound HTTP dispatcher for both OAuth and upstream calls */
  dispatcher?: Dispatcher;
  source?: CredentialSource;
  publish?: (credential: Credential) => void;
  startedAt?: Date;
  now?: () => number;
}

export function createRelayContext(
  config: Config,
  logger: Logger,
  overrides: RelayContextOverrides = {},
): RelayContext {
  const now = overrides.now ?? (() => Date.now());
  const startedAt = overrides.startedAt ?? new Date(now());

  const requestLogger = new RequestLogger({ now });
  const transcript = new TranscriptWriter(config.logDir, startedAt, logger);
  const tokenManager = new TokenManager({
    source: overrides.source ?? createCredentialSource(config.oauth, { dispatcher: overrides.dispatcher, now }),
    events: requestLogger,
    logger,
    now,
    publish: overrides.publish,
  });
  const proxy = new CompletionProxy({
    baseUrl: config.baseUrl,
    tokenManager,
    requestLogger,
    transcript,
    dispatcher: overrides.dispatcher,
    now,
  });
  const status = new StatusAggregator({
    tokenManager,
    requestLogger,
    startedAt,
    logFile: transcript.filePath,
    envVars: describeConfig(config),
    now,
  });

  return { config, logger, tokenManager, requestLogger, transcript, proxy, status };
}
