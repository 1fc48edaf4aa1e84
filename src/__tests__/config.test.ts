import os from 'node:os';
import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { describeConfig, loadConfig } from '../config.js';

const oauthEnv = {
  LLM_API_BASE_URL: 'https://llm.example.com/v1',
  OAUTH_ENDPOINT: 'https://auth.example.com/oauth/token',
  OAUTH_CLIENT_ID: 'test-client',
  OAUTH_CLIENT_SECRET: 'test-secret',
};

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig(oauthEnv);

    expect(config).toMatchObject({
      port: 8889,
      host: '127.0.0.1',
      baseUrl: 'https://llm.example.com/v1',
      modelName: 'gpt-4-internal',
      maxTokens: 4096,
      refreshIntervalSeconds: 900,
      logDir: path.join(os.homedir(), '.codex', 'logs'),
      logLevel: 'info',
      maxPayloadSize: 10 * 1024 * 1024,
      corsOrigins: ['*'],
      shutdownGraceMs: 10_000,
      oauth: {
        endpoint: 'https://auth.example.com/oauth/token',
        clientId: 'test-client',
        clientSecret: 'test-secret',
        mockMode: false,
      },
    });
  });

  it('reads overrides', () => {
    const config = loadConfig({
      ...oauthEnv,
      PROXY_PORT: '9000',
      TOKEN_REFRESH_INTERVAL: '60',
      CORS_ORIGINS: 'http://localhost:3000, http://localhost:5173',
      LLM_MODEL_NAME: 'custom-model',
    });

    expect(config.port).toBe(9000);
    expect(config.refreshIntervalSeconds).toBe(60);
    expect(config.corsOrigins).toEqual(['http://localhost:3000', 'http://localhost:5173']);
    expect(config.modelName).toBe('custom-model');
  });

  it('lists every missing required setting', () => {
    expect(() => loadConfig({ LLM_API_BASE_URL: 'https://llm.example.com/v1' })).toThrow(
      'Missing required configuration: OAUTH_ENDPOINT, OAUTH_CLIENT_ID, OAUTH_CLIENT_SECRET (or set MOCK_MODE=true)',
    );
  });

  it('needs nothing in mock mode', () => {
    const config = loadConfig({ MOCK_MODE: 'TRUE' });

    expect(config.oauth.mockMode).toBe(true);
    expect(config.baseUrl).toBe('https://api.example.com');
  });

  it('rejects malformed numbers and URLs', () => {
    expect(() => loadConfig({ ...oauthEnv, MAX_TOKENS: 'lots' })).toThrow(
      'MAX_TOKENS must be a non-negative integer, got "lots"',
    );
    expect(() => loadConfig({ ...oauthEnv, OAUTH_ENDPOINT: 'not a url' })).toThrow(
      'OAUTH_ENDPOINT is not a valid URL: "not a url"',
    );
    expect(() => loadConfig({ ...oauthEnv, TOKEN_REFRESH_INTERVAL: '0' })).toThrow(
      'TOKEN_REFRESH_INTERVAL must be greater than zero',
    );
  });

  it('rejects a refresh interval longer than a timer can wait', () => {
    expect(() => loadConfig({ MOCK_MODE: 'true', TOKEN_REFRESH_INTERVAL: '2200000' })).toThrow(
      'TOKEN_REFRESH_INTERVAL must be at most 2147483 seconds, got 2200000',
    );
    expect(loadConfig({ MOCK_MODE: 'true', TOKEN_REFRESH_INTERVAL: '2147483' }).refreshIntervalSeconds).toBe(
      2_147_483,
    );
  });
});

describe('describeConfig', () => {
  it('never exposes the client secret', () => {
    const described = describeConfig(loadConfig(oauthEnv));

    expect(described).toEqual({
      MOCK_MODE: 'false',
      LLM_API_BASE_URL: 'https://llm.example.com/v1',
      LLM_MODEL_NAME: 'gpt-4-internal',
      MAX_TOKENS: '4096',
      TOKEN_REFRESH_INTERVAL: '900s',
      OAUTH_ENDPOINT: 'https://auth.example.com/oauth/token',
      OAUTH_CLIENT_ID: 'test-client',
    });
    expect(Object.values(described)).not.toContain('test-secret');
  });

  it('marks unset OAuth settings', () => {
    expect(describeConfig(loadConfig({ MOCK_MODE: 'true' })).OAUTH_ENDPOINT).toBe('Not set');
  });
});
