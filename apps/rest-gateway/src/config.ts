import {LogLevelSchema, type LogLevel} from '@keyserver-rest/logging'
import {z} from 'zod'

const numberFromEnv = z.preprocess(value => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return value
  }

  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) ? value : parsed
}, z.number().int().positive())

const portFromEnv = z.preprocess(value => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return value
  }

  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) ? value : parsed
}, z.number().int().gte(0).lte(65_535))

const booleanFromEnv = z.preprocess(value => {
  if (typeof value !== 'string') {
    return value
  }

  const normalized = value.trim().toLowerCase()
  if (normalized === 'true' || normalized === '1') {
    return true
  }
  if (normalized === 'false' || normalized === '0') {
    return false
  }

  return value
}, z.boolean())

const optionalString = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined
  }

  const trimmed = value.trim()
  return trimmed.length === 0 ? undefined : trimmed
}, z.string().optional())

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    KEYSERVER_REST_HOST: z.string().default('0.0.0.0'),
    KEYSERVER_REST_PORT: portFromEnv.default(8080),
    KEYSERVER_REST_MAX_BODY_BYTES: numberFromEnv.default(1024 * 1024),
    KEYSERVER_REST_LOG_LEVEL: z.preprocess(
      value => (typeof value === 'string' && value.trim().length > 0 ? value.trim().toLowerCase() : undefined),
      LogLevelSchema.optional()
    ),
    KEYSERVER_REST_LOG_REDACT_EXTRA_KEYS: optionalString,
    KEYSERVER_REST_HKP_ENABLED: booleanFromEnv.default(true)
  })
  .strict()

export type ServiceConfig = {
  nodeEnv: 'development' | 'test' | 'production'
  host: string
  port: number
  maxBodyBytes: number
  hkpEnabled: boolean
  logging: {
    level: LogLevel
    redactExtraKeys: string[]
  }
}

const toEnvInput = (env: NodeJS.ProcessEnv) => ({
  NODE_ENV: env.NODE_ENV,
  KEYSERVER_REST_HOST: env.KEYSERVER_REST_HOST,
  KEYSERVER_REST_PORT: env.KEYSERVER_REST_PORT,
  KEYSERVER_REST_MAX_BODY_BYTES: env.KEYSERVER_REST_MAX_BODY_BYTES,
  KEYSERVER_REST_LOG_LEVEL: env.KEYSERVER_REST_LOG_LEVEL,
  KEYSERVER_REST_LOG_REDACT_EXTRA_KEYS: env.KEYSERVER_REST_LOG_REDACT_EXTRA_KEYS,
  KEYSERVER_REST_HKP_ENABLED: env.KEYSERVER_REST_HKP_ENABLED
})

const parseRedactExtraKeys = (raw: string | undefined) => {
  if (!raw) {
    return []
  }

  return raw
    .split(',')
    .map(value => value.trim())
    .filter(value => value.length > 0)
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServiceConfig => {
  const parsed = envSchema.parse(toEnvInput(env))

  return {
    nodeEnv: parsed.NODE_ENV,
    host: parsed.KEYSERVER_REST_HOST,
    port: parsed.KEYSERVER_REST_PORT,
    maxBodyBytes: parsed.KEYSERVER_REST_MAX_BODY_BYTES,
    hkpEnabled: parsed.KEYSERVER_REST_HKP_ENABLED,
    logging: {
      level: parsed.KEYSERVER_REST_LOG_LEVEL ?? (parsed.NODE_ENV === 'test' ? 'silent' : 'info'),
      redactExtraKeys: parseRedactExtraKeys(parsed.KEYSERVER_REST_LOG_REDACT_EXTRA_KEYS)
    }
  }
}
