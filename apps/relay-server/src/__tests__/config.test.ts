import {describe, expect, it} from 'vitest'

import {loadConfig, parseProxyRules} from '../config'

describe('relay-server config', () => {
  it('loads defaults from minimal env input', () => {
    const config = loadConfig({
      NODE_ENV: 'test'
    })

    expect(config).toEqual({
      nodeEnv: 'test',
      host: '0.0.0.0',
      port: 8080,
      maxBodyBytes: 1024 * 1024,
      logLevel: 'silent',
      logRedactKeys: [],
      errorEncoding: 'structured',
      proxyRules: []
    })
  })

  it('defaults to info logging outside tests', () => {
    expect(loadConfig({NODE_ENV: 'production'}).logLevel).toBe('info')
    expect(loadConfig({}).nodeEnv).toBe('development')
  })

  it('parses explicit overrides and ignores unrelated env vars', () => {
    const config = loadConfig({
      NODE_ENV: 'development',
      RELAY_SERVER_HOST: '127.0.0.1',
      RELAY_SERVER_PORT: '9100',
      RELAY_SERVER_MAX_BODY_BYTES: '2048',
      RELAY_SERVER_LOG_LEVEL: 'trace',
      RELAY_SERVER_LOG_REDACT_KEYS: 'x-api-key, session_id ,',
      RELAY_SERVER_ERROR_ENCODING: 'plain',
      RELAY_SERVER_PROXY_RULES_JSON: JSON.stringify([
        {path: '/proxy', remote_origin: 'http://upstream.internal:9000'},
        {
          pattern: '/api/v\\d+',
          flags: 'i',
          remote_origin: 'https://api.internal/base/',
          transport: {total_timeout_ms: 2_000, follow_redirects: true, headers: {'x-relay-key': 'test-secret'}}
        }
      ]),
      UNRELATED_VARIABLE: 'ignored'
    })

    expect(config).toMatchObject({
      host: '127.0.0.1',
      port: 9100,
      maxBodyBytes: 2048,
      logLevel: 'trace',
      logRedactKeys: ['x-api-key', 'session_id'],
      errorEncoding: 'plain'
    })
    expect(config.proxyRules).toHaveLength(2)
    expect(config.proxyRules[0]).toEqual({matcher: '/proxy', remoteOrigin: 'http://upstream.internal:9000'})

    const patternRule = config.proxyRules[1]
    expect(patternRule?.matcher).toBeInstanceOf(RegExp)
    expect(String(patternRule?.matcher)).toBe('/\\/api\\/v\\d+/i')
    expect(patternRule?.remoteOrigin).toBe('https://api.internal/base/')
    expect(patternRule?.transport).toEqual({
      total_timeout_ms: 2_000,
      follow_redirects: true,
      max_response_bytes: 10 * 1024 * 1024,
      headers: {'x-relay-key': 'test-secret'}
    })
  })

  it('rejects invalid numbers, booleans and encodings', () => {
    expect(() => loadConfig({RELAY_SERVER_PORT: 'eighty'})).toThrow()
    expect(() => loadConfig({RELAY_SERVER_PORT: '70000'})).toThrow()
    expect(() => loadConfig({RELAY_SERVER_MAX_BODY_BYTES: '0'})).toThrow()
    expect(() => loadConfig({RELAY_SERVER_TLS_ENABLED: 'maybe'})).toThrow()
    expect(() => loadConfig({RELAY_SERVER_ERROR_ENCODING: 'xml'})).toThrow()
    expect(() => loadConfig({RELAY_SERVER_LOG_LEVEL: 'verbose'})).toThrow()
  })

  it('rejects malformed proxy rules', () => {
    expect(() => loadConfig({RELAY_SERVER_PROXY_RULES_JSON: '[{'})).toThrow(
      'RELAY_SERVER_PROXY_RULES_JSON must be valid JSON'
    )
    expect(() => loadConfig({RELAY_SERVER_PROXY_RULES_JSON: '{"path":"/proxy"}'})).toThrow(
      'RELAY_SERVER_PROXY_RULES_JSON is invalid'
    )
    expect(() =>
      loadConfig({RELAY_SERVER_PROXY_RULES_JSON: '[{"path":"/a","pattern":"/b","remote_origin":"http://x"}]'})
    ).toThrow('RELAY_SERVER_PROXY_RULES_JSON is invalid')
    expect(() =>
      loadConfig({RELAY_SERVER_PROXY_RULES_JSON: '[{"path":"/a","remote_origin":"ftp://files.internal"}]'})
    ).toThrow('RELAY_SERVER_PROXY_RULES_JSON is invalid')
  })

  it('reports invalid patterns', () => {
    expect(() =>
      parseProxyRules({raw: [{pattern: '(unclosed', remote_origin: 'http://x.internal'}], envVarName: 'RULES'})
    ).toThrow('RULES contains an invalid pattern')
  })

  it('requires key and certificate paths when TLS is enabled', () => {
    expect(() => loadConfig({RELAY_SERVER_TLS_ENABLED: 'true'})).toThrow(
      'RELAY_SERVER_TLS_KEY_PATH and RELAY_SERVER_TLS_CERT_PATH are required when TLS is enabled'
    )
    expect(() =>
      loadConfig({
        RELAY_SERVER_TLS_ENABLED: 'true',
        RELAY_SERVER_TLS_KEY_PATH: '/etc/relay/key.pem',
        RELAY_SERVER_TLS_CERT_PATH: '/etc/relay/cert.pem',
        RELAY_SERVER_TLS_REJECT_UNAUTHORIZED_CLIENT_CERT: 'true'
      })
    ).toThrow('RELAY_SERVER_TLS_CLIENT_CA_PATH is required')
  })

  it('loads TLS settings', () => {
    const config = loadConfig({
      RELAY_SERVER_TLS_ENABLED: '1',
      RELAY_SERVER_TLS_KEY_PATH: '/etc/relay/key.pem',
      RELAY_SERVER_TLS_CERT_PATH: '/etc/relay/cert.pem',
      RELAY_SERVER_TLS_CLIENT_CA_PATH: '/etc/relay/ca.pem',
      RELAY_SERVER_TLS_REJECT_UNAUTHORIZED_CLIENT_CERT: 'true'
    })

    expect(config.tls).toEqual({
      enabled: true,
      keyPath: '/etc/relay/key.pem',
      certPath: '/etc/relay/cert.pem',
      clientCaPath: '/etc/relay/ca.pem',
      requestClientCert: true,
      rejectUnauthorizedClientCert: true
    })
  })
})
