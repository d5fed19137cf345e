/**
 * Configuration Management
 */

import path from 'path'
import dotenv from 'dotenv'
import { z } from 'zod'

dotenv.config()

const PROJECT_ROOT = path.resolve(__dirname, '..')

export class ConfigurationError extends Error {
  public readonly details?: {
    key?: string
    issues?: string[]
  }

  constructor(message: string, details?: ConfigurationError['details']) {
    super(message)
    this.name = 'ConfigurationError'
    this.details = details
  }
}

// z.coerce.boolean() turns the string "false" into true
const envBoolean = z.preprocess(
  (value) => (typeof value === 'string' ? ['true', '1', 'yes'].includes(value.trim().toLowerCase()) : value),
  z.boolean()
)

const ConfigSchema = z.object({
  env: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  port: z.coerce.number().int().min(0).max(65535).default(8000),
  host: z.string().default('0.0.0.0'),

  seedFile: z.string().default(path.join(PROJECT_ROOT, 'data', 'activities.json')),
  staticDir: z.string().default(path.join(PROJECT_ROOT, 'static')),

  rateLimit: z.object({
    windowMs: z.coerce.number().int().positive().default(60000),
    maxRequests: z.coerce.number().int().positive().default(1000)
  }),

  metrics: z.object({
    enabled: envBoolean.default(false),
    port: z.coerce.number().int().min(0).max(65535).default(9090)
  }),

  logging: z.object({
    level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
    format: z.enum(['json', 'text']).default('json')
  }),

  cors: z.object({
    origin: z.string().default('*'),
    credentials: envBoolean.default(false)
  })
})

export type Config = z.infer<typeof ConfigSchema>

/**
 * Build and validate configuration from an environment map.
 * Empty strings count as unset so `.env` placeholders fall back to defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const read = (key: string): string | undefined => {
    const value = env[key]
    return value === undefined || value.trim() === '' ? undefined : value
  }

  const result = ConfigSchema.safeParse({
    env: read('NODE_ENV'),
    port: read('PORT'),
    host: read('HOST'),

    seedFile: read('ACTIVITIES_SEED_FILE'),
    staticDir: read('STATIC_DIR'),

    rateLimit: {
      windowMs: read('RATE_LIMIT_WINDOW_MS'),
      maxRequests: read('RATE_LIMIT_MAX_REQUESTS')
    },

    metrics: {
      enabled: read('METRICS_ENABLED'),
      port: read('METRICS_PORT')
    },

    logging: {
      level: read('LOG_LEVEL'),
      format: read('LOG_FORMAT')
    },

    cors: {
      origin: read('CORS_ORIGIN'),
      credentials: read('CORS_CREDENTIALS')
    }
  })

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new ConfigurationError(`Invalid configuration (${issues.join('; ')})`, { issues })
  }

  return result.data
}

export const config: Config = loadConfig()
