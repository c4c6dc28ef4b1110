/**
 * Settings Tests
 */

import { describe, it, expect } from 'vitest';

import { AuthConfigError, loadSettings } from '../../index.js';

const BASE_ENV = {
  METABASE_URL: 'https://metabase.test/',
  METABASE_API_KEY: 'test-key',
};

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the call to throw');
}

describe('loadSettings', () => {
  it('should apply defaults and strip the trailing slash', () => {
    const settings = loadSettings(BASE_ENV);

    expect(settings).toEqual({
      metabaseUrl: 'https://metabase.test',
      auth: { method: 'api_key', apiKey: 'test-key' },
      host: '0.0.0.0',
      port: 8080,
      logLevel: 'INFO',
      serverName: 'metabase-mcp',
      transport: 'streamable-http',
      http: { connectTimeout: 10, readTimeout: 30, enableHttp2: false },
    });
  });

  it('should coerce numeric and boolean values', () => {
    const settings = loadSettings({
      ...BASE_ENV,
      PORT: '9000',
      HTTP_CONNECT_TIMEOUT: '2.5',
      HTTP_READ_TIMEOUT: '120',
      HTTP_ENABLE_HTTP2: 'yes',
      MCP_TRANSPORT: 'stdio',
      LOG_LEVEL: 'DEBUG',
    });

    expect(settings.port).toBe(9000);
    expect(settings.http).toEqual({ connectTimeout: 2.5, readTimeout: 120, enableHttp2: true });
    expect(settings.transport).toBe('stdio');
    expect(settings.logLevel).toBe('DEBUG');
  });

  it('should prefer the API key when session credentials are also set', () => {
    const settings = loadSettings({
      ...BASE_ENV,
      METABASE_USER_EMAIL: 'analyst@example.com',
      METABASE_PASSWORD: 'test-password',
    });

    expect(settings.auth).toEqual({ method: 'api_key', apiKey: 'test-key' });
  });

  it('should fall back to session authentication', () => {
    const settings = loadSettings({
      METABASE_URL: 'https://metabase.test',
      METABASE_USER_EMAIL: 'analyst@example.com',
      METABASE_PASSWORD: 'test-password',
    });

    expect(settings.auth).toEqual({
      method: 'session',
      email: 'analyst@example.com',
      password: 'test-password',
    });
  });

  it('should reject a configuration without usable credentials', () => {
    const error = captureError(() =>
      loadSettings({ METABASE_URL: 'https://metabase.test', METABASE_USER_EMAIL: 'analyst@example.com' })
    );

    expect(error).toBeInstanceOf(AuthConfigError);
    expect(error).toMatchObject({
      message:
        'METABASE_URL is required, and either METABASE_API_KEY or both METABASE_USER_EMAIL and METABASE_PASSWORD must be provided',
    });
  });

  it('should treat blank credentials as missing', () => {
    expect(() => loadSettings({ METABASE_URL: 'https://metabase.test', METABASE_API_KEY: '  ' })).toThrow(
      AuthConfigError
    );
  });

  it('should reject out-of-range timeouts', () => {
    const error = captureError(() => loadSettings({ ...BASE_ENV, HTTP_CONNECT_TIMEOUT: '0.5' }));

    expect(error).toBeInstanceOf(AuthConfigError);
    expect(error).toMatchObject({ issues: [expect.stringMatching(/^HTTP_CONNECT_TIMEOUT: /)] });
  });

  it('should require METABASE_URL', () => {
    const error = captureError(() => loadSettings({ METABASE_API_KEY: 'test-key' }));

    expect(error).toMatchObject({ issues: ['METABASE_URL: METABASE_URL is required'] });
  });
});
