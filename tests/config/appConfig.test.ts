import { afterEach, describe, expect, test } from 'vitest'
import {
  getAppConfig,
  initAppConfig,
  isAppConfigInitialized,
  loadAppConfig,
  resetAppConfig
} from '../../src/config/appConfig.js'
import { InvalidArgumentError, NotFoundError } from '../../src/core/errors.js'

describe('loadAppConfig', () => {
  test('falls back to defaults for an empty environment', () => {
    expect(loadAppConfig({})).toEqual({
      defaultRoute: 'road',
      detachPolicy: 'throw',
      serializerFormat: 'json',
      mediaBackend: 'vlc',
      serviceUrl: 'https://localhost:4999',
      userName: 'demo'
    })
  })

  test('reads every PATTERNS_ variable', () => {
    const config = loadAppConfig({
      PATTERNS_DEFAULT_ROUTE: 'walk',
      PATTERNS_DETACH_POLICY: 'ignore',
      PATTERNS_SERIALIZER_FORMAT: 'xml',
      PATTERNS_MEDIA_BACKEND: 'mp3',
      PATTERNS_SERVICE_URL: 'http://example.test:8080',
      PATTERNS_USER_NAME: 'tester'
    })

    expect(config).toEqual({
      defaultRoute: 'walk',
      detachPolicy: 'ignore',
      serializerFormat: 'xml',
      mediaBackend: 'mp3',
      serviceUrl: 'http://example.test:8080',
      userName: 'tester'
    })
  })

  test('ignores unrelated and empty variables', () => {
    const config = loadAppConfig({ HOME: '/home/tester', PATTERNS_DEFAULT_ROUTE: '', PATTERNS_USER_NAME: undefined })

    expect(config.defaultRoute).toBe('road')
    expect(config.userName).toBe('demo')
  })

  test('rejects invalid values naming the variable', () => {
    expect(() => loadAppConfig({ PATTERNS_DEFAULT_ROUTE: 'bike' })).toThrow(InvalidArgumentError)
    expect(() => loadAppConfig({ PATTERNS_DETACH_POLICY: 'maybe' })).toThrow(
      /^Invalid configuration for PATTERNS_DETACH_POLICY: /
    )
    expect(() => loadAppConfig({ PATTERNS_SERVICE_URL: 'not a url' })).toThrow(
      /^Invalid configuration for PATTERNS_SERVICE_URL: /
    )
  })
})

describe('process-wide app config', () => {
  afterEach(() => {
    resetAppConfig()
  })

  test('initializes once and returns the same instance afterwards', () => {
    const first = initAppConfig({ PATTERNS_USER_NAME: 'first' })
    const second = initAppConfig({ PATTERNS_USER_NAME: 'second' })

    expect(second).toBe(first)
    expect(second.userName).toBe('first')
    expect(getAppConfig()).toBe(first)
  })

  test('the instance is frozen', () => {
    expect(Object.isFrozen(initAppConfig({}))).toBe(true)
  })

  test('accessing before initialization throws NotFoundError', () => {
    expect(isAppConfigInitialized()).toBe(false)
    expect(() => getAppConfig()).toThrow(NotFoundError)
  })

  test('reset allows re-initialization', () => {
    const first = initAppConfig({})

    resetAppConfig()
    const second = initAppConfig({ PATTERNS_DEFAULT_ROUTE: 'walk' })

    expect(second).not.toBe(first)
    expect(second.defaultRoute).toBe('walk')
  })
})
