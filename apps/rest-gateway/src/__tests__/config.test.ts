import {describe, expect, it} from 'vitest'

import {loadConfig} from '../config'

describe('rest-gateway config', () => {
  it('loads defaults from minimal env input', () => {
    expect(loadConfig({NODE_ENV: 'test'})).toEqual({
      nodeEnv: 'test',
      host: '0.0.0.0',
      port: 8080,
      maxBodyBytes: 1024 * 1024,
      hkpEnabled: true,
      logging: {
        level: 'silent',
        redactExtraKeys: []
      }
    })
  })

  it('defaults to info logging outside of tests', () => {
    expect(loadConfig({}).logging.level).toBe('info')
    expect(loadConfig({}).nodeEnv).toBe('development')
  })

  it('parses explicit overrides and ignores unrelated env vars', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      KEYSERVER_REST_HOST: '127.0.0.1',
      KEYSERVER_REST_PORT: '9100',
      KEYSERVER_REST_MAX_BODY_BYTES: '2048',
      KEYSERVER_REST_LOG_LEVEL: 'DEBUG',
      KEYSERVER_REST_LOG_REDACT_EXTRA_KEYS: 'search, user_id,,',
      KEYSERVER_REST_HKP_ENABLED: 'false',
      UNRELATED_SETTING: 'ignored'
    })

    expect(config).toEqual({
      nodeEnv: 'production',
      host: '127.0.0.1',
      port: 9100,
      maxBodyBytes: 2048,
      hkpEnabled: false,
      logging: {
        level: 'debug',
        redactExtraKeys: ['search', 'user_id']
      }
    })
  })

  it('rejects invalid values', () => {
    expect(() => loadConfig({KEYSERVER_REST_PORT: 'eighty'})).toThrow()
    expect(() => loadConfig({KEYSERVER_REST_PORT: '70000'})).toThrow()
    expect(() => loadConfig({KEYSERVER_REST_MAX_BODY_BYTES: '0'})).toThrow()
    expect(() => loadConfig({KEYSERVER_REST_LOG_LEVEL: 'verbose'})).toThrow()
    expect(() => loadConfig({KEYSERVER_REST_HKP_ENABLED: 'maybe'})).toThrow()
    expect(() => loadConfig({NODE_ENV: 'staging'})).toThrow()
  })
})
