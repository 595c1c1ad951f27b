import {describe, expect, it} from 'vitest'

import {hasClientCredentials, loadConfig} from '../config'

describe('share-api config', () => {
  it('loads defaults from minimal env input', () => {
    const config = loadConfig({
      NODE_ENV: 'test'
    })

    expect(config).toMatchObject({
      nodeEnv: 'test',
      host: '0.0.0.0',
      port: 8000,
      maxBodyBytes: 1024 * 1024,
      serviceVersion: '0.1.0',
      corsAllowedOrigins: []
    })
    expect(config.logging).toEqual({
      level: 'silent',
      redactExtraKeys: []
    })
    expect(config.auth).toEqual({
      scope: 'all-apis',
      refreshBufferSeconds: 300,
      requestTimeoutMs: 10_000
    })
    expect(config.endpointGuard).toEqual({
      allowedHostSuffixes: ['.azuredatabricks.net', '.cloud.databricks.com', '.gcp.databricks.com'],
      dnsTimeoutMs: 2_000,
      probeTimeoutMs: 5_000
    })
    expect(config.upstream).toEqual({timeoutMs: 30_000})
    expect(hasClientCredentials(config.auth)).toBe(false)
  })

  it('parses explicit overrides and ignores unrelated env vars', () => {
    const config = loadConfig({
      NODE_ENV: 'development',
      SHARE_API_HOST: '127.0.0.1',
      SHARE_API_PORT: '9100',
      SHARE_API_MAX_BODY_BYTES: '2048',
      SHARE_API_ACCOUNT_ID: 'acct-1',
      SHARE_API_CLIENT_ID: 'client-1',
      SHARE_API_CLIENT_SECRET: 'test-secret',
      SHARE_API_TOKEN_ENDPOINT: 'https://login.example.test/token',
      SHARE_API_TOKEN_REFRESH_BUFFER_SECONDS: '120',
      SHARE_API_ALLOWED_HOST_SUFFIXES: '.example.test, .internal.test',
      SHARE_API_CORS_ALLOWED_ORIGINS: 'http://localhost:5173',
      SHARE_API_LOG_LEVEL: 'debug',
      SHARE_API_LOG_REDACT_EXTRA_KEYS: 'workspace_label',
      UNRELATED: 'value'
    })

    expect(config).toMatchObject({
      nodeEnv: 'development',
      host: '127.0.0.1',
      port: 9100,
      maxBodyBytes: 2048,
      corsAllowedOrigins: ['http://localhost:5173'],
      logging: {level: 'debug', redactExtraKeys: ['workspace_label']},
      auth: {
        accountId: 'acct-1',
        clientId: 'client-1',
        clientSecret: 'test-secret',
        tokenEndpoint: 'https://login.example.test/token',
        refreshBufferSeconds: 120
      },
      endpointGuard: {allowedHostSuffixes: ['.example.test', '.internal.test']}
    })
    expect(hasClientCredentials(config.auth)).toBe(true)
  })

  it('defaults the log level to info outside tests', () => {
    expect(loadConfig({NODE_ENV: 'development'}).logging.level).toBe('info')
  })

  it('requires client credentials in production', () => {
    expect(() => loadConfig({NODE_ENV: 'production', SHARE_API_CLIENT_ID: 'client-1'})).toThrow(
      'Production requires SHARE_API_ACCOUNT_ID, SHARE_API_CLIENT_ID and SHARE_API_CLIENT_SECRET'
    )
  })

  it('rejects invalid numbers and CORS origins', () => {
    expect(() => loadConfig({NODE_ENV: 'test', SHARE_API_PORT: 'abc'})).toThrow()
    expect(() => loadConfig({NODE_ENV: 'test', SHARE_API_CORS_ALLOWED_ORIGINS: 'ftp://example.test'})).toThrow(
      'SHARE_API_CORS_ALLOWED_ORIGINS contains an unsupported origin protocol: ftp://example.test'
    )
  })

  it('rejects timeouts outside their bounds', () => {
    expect(() => loadConfig({NODE_ENV: 'test', SHARE_API_DNS_TIMEOUT_MS: '50'})).toThrow()
    expect(() => loadConfig({NODE_ENV: 'test', SHARE_API_PROBE_TIMEOUT_MS: '30001'})).toThrow()
    expect(() => loadConfig({NODE_ENV: 'test', SHARE_API_TOKEN_REQUEST_TIMEOUT_MS: '600000'})).toThrow()
    expect(() => loadConfig({NODE_ENV: 'test', SHARE_API_UPSTREAM_TIMEOUT_MS: '0'})).toThrow()
    expect(() => loadConfig({NODE_ENV: 'test', SHARE_API_PORT: '70000'})).toThrow()
  })

  it('accepts timeouts at their bounds', () => {
    const config = loadConfig({
      NODE_ENV: 'test',
      SHARE_API_DNS_TIMEOUT_MS: '100',
      SHARE_API_PROBE_TIMEOUT_MS: '30000',
      SHARE_API_TOKEN_REQUEST_TIMEOUT_MS: '60000'
    })

    expect(config.auth.requestTimeoutMs).toBe(60_000)
  })
})
