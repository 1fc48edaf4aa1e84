import os from 'node:os';
import path from 'node:path';
import dotenv from 'dotenv';
import type { OAuthConfig } from './types.js';

dotenv.config();

export interface Config {
  port: number;
  host: string;
  baseUrl: string;
  modelName: string;
  maxTokens: number;
  oauth: OAuthConfig;
  refreshIntervalSeconds: number;
  logDir: string;
  logLevel: string;
  prettyLogs: boolean;
  maxPayloadSize: number;
  corsOrigins: string[];
  shutdownGraceMs: number;
}

type Env = Record<string, string | undefined>;

const MOCK_BASE_URL = 'https://api.example.com';
// Longest delay setInterval accepts; larger values fire every millisecond
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

function parseInteger(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function parseFlag(env: Env, name: string): boolean {
  return (env[name] ?? 'false').trim().toLowerCase() === 'true';
}

/**
 * Build the relay configuration from environment variables.
 * OAuth settings and the upstream URL are required unless MOCK_MODE is on.
 */
export function loadConfig(env: Env = process.env): Config {
  const mockMode = parseFlag(env, 'MOCK_MODE');

  const config: Config = {
    port: parseInteger(env, 'PROXY_PORT', 8889),
    // Use 127.0.0.1 instead of localhost to avoid IPv6 (::1) connection issues
    host: env.HOST || '127.0.0.1',
    baseUrl: env.LLM_API_BASE_URL || (mockMode ? MOCK_BASE_URL : ''),
    modelName: env.LLM_MODEL_NAME || 'gpt-4-internal',
    maxTokens: parseInteger(env, 'MAX_TOKENS', 4096),
    oauth: {
      endpoint: env.OAUTH_ENDPOINT || '',
      clientId: env.OAUTH_CLIENT_ID || '',
      clientSecret: env.OAUTH_CLIENT_SECRET || '',
      mockMode,
    },
    refreshIntervalSeconds: parseInteger(env, 'TOKEN_REFRESH_INTERVAL', 900), // 15 minutes
    logDir: env.PROXY_LOG_DIR || path.join(os.homedir(), '.codex', 'logs'),
    logLevel: env.LOG_LEVEL || 'info',
    prettyLogs: env.NODE_ENV === 'development',
    maxPayloadSize: parseInteger(env, 'MAX_PAYLOAD_SIZE', 10 * 1024 * 1024), // 10MB
    corsOrigins: (env.CORS_ORIGINS || '*').split(',').map((origin) => origin.trim()),
    shutdownGraceMs: parseInteger(env, 'SHUTDOWN_GRACE_MS', 10_000),
  };

  const missing: string[] = [];
  if (!config.baseUrl) missing.push('LLM_API_BASE_URL');
  if (!mockMode) {
    if (!config.oauth.endpoint) missing.push('OAUTH_ENDPOINT');
    if (!config.oauth.clientId) missing.push('OAUTH_CLIENT_ID');
    if (!config.oauth.clientSecret) missing.push('OAUTH_CLIENT_SECRET');
  }
  if (missing.length > 0) {
    throw new Error(`Missing required configuration: ${missing.join(', ')} (or set MOCK_MODE=true)`);
  }

  for (const [name, value] of [
    ['LLM_API_BASE_URL', config.baseUrl],
    ['OAUTH_ENDPOINT', config.oauth.endpoint],
  ] as const) {
    if (value && !URL.canParse(value)) {
      throw new Error(`${name} is not a valid URL: "${value}"`);
    }
  }

  if (config.refreshIntervalSeconds === 0) {
    throw new Error('TOKEN_REFRESH_INTERVAL must be greater than zero');
  }
  if (config.refreshIntervalSeconds * 1000 > MAX_TIMER_DELAY_MS) {
    throw new Error(
      `TOKEN_REFRESH_INTERVAL must be at most ${Math.floor(MAX_TIMER_DELAY_MS / 1000)} seconds, got ${config.refreshIntervalSeconds}`,
    );
  }

  return config;
}

/**
 * Settings shown on the dashboard. The client secret is never included.
 */
export function describeConfig(config: Config): Record<string, string> {
  return {
    MOCK_MODE: String(config.oauth.mockMode),
    LLM_API_BASE_URL: config.baseUrl,
    LLM_MODEL_NAME: config.modelName,
    MAX_TOKENS: String(config.maxTokens),
    TOKEN_REFRESH_INTERVAL: `${config.refreshIntervalSeconds}s`,
    OAUTH_ENDPOINT: config.oauth.endpoint || 'Not set',
    OAUTH_CLIENT_ID: config.oauth.clientId || 'Not set',
  };
}
