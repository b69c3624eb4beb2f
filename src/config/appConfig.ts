import { z } from 'zod'
import { InvalidArgumentError, NotFoundError } from '../core/errors.js'
import { DETACH_POLICIES, type DetachPolicy } from '../core/ports/observer.js'
import { MEDIA_BACKENDS, type MediaBackend } from '../core/ports/mediaPlayer.js'
import { ROUTE_STRATEGY_KINDS, type RouteStrategyKind } from '../core/ports/routeStrategy.js'

const AppConfigEnvSchema = z.object({
  PATTERNS_DEFAULT_ROUTE: z.enum(ROUTE_STRATEGY_KINDS).default('road'),
  PATTERNS_DETACH_POLICY: z.enum(DETACH_POLICIES).default('throw'),
  PATTERNS_SERIALIZER_FORMAT: z.string().trim().min(1).default('json'),
  PATTERNS_MEDIA_BACKEND: z.enum(MEDIA_BACKENDS).default('vlc'),
  PATTERNS_SERVICE_URL: z.string().url().default('https://localhost:4999'),
  PATTERNS_USER_NAME: z.string().trim().min(1).default('demo'),
})

export type AppConfig = {
  defaultRoute: RouteStrategyKind
  detachPolicy: DetachPolicy
  serializerFormat: string
  mediaBackend: MediaBackend
  serviceUrl: string
  userName: string
}

export type Env = Record<string, string | undefined>

/**
 * Parse pattern-kit settings out of an environment map.
 *
 * Empty strings count as unset so that `FOO=` in a .env file falls back to the
 * default.
 */
export function loadAppConfig(env: Env): AppConfig {
  const relevant = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('PATTERNS_') && value !== undefined && value !== '')
  )
  const parsed = AppConfigEnvSchema.safeParse(relevant)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const variable = issue ? issue.path.join('.') : 'environment'
    const reason = issue ? issue.message : parsed.error.message
    throw new InvalidArgumentError(`Invalid configuration for ${variable}: ${reason}`)
  }

  const data = parsed.data
  return {
    defaultRoute: data.PATTERNS_DEFAULT_ROUTE,
    detachPolicy: data.PATTERNS_DETACH_POLICY,
    serializerFormat: data.PATTERNS_SERIALIZER_FORMAT,
    mediaBackend: data.PATTERNS_MEDIA_BACKEND,
    serviceUrl: data.PATTERNS_SERVICE_URL,
    userName: data.PATTERNS_USER_NAME,
  }
}

// ============================================================================
// Process-wide instance
// ============================================================================

let instance: Readonly<AppConfig> | undefined

/**
 * Initialize the process-wide config on first call; later calls return the
 * same frozen object and do not read `env` again.
 */
export function initAppConfig(env: Env): Readonly<AppConfig> {
  if (!instance) {
    instance = Object.freeze(loadAppConfig(env))
  }
  return instance
}

export function getAppConfig(): Readonly<AppConfig> {
  if (!instance) {
    throw new NotFoundError('App config has not been initialized; call initAppConfig() first')
  }
  return instance
}

export function isAppConfigInitialized(): boolean {
  return instance !== undefined
}

/** Drop the process-wide instance. Intended for tests. */
export function resetAppConfig(): void {
  instance = undefined
}
