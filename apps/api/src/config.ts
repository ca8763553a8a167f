import { z } from 'zod'

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(5010),
  HOST: z.string().min(1).default('0.0.0.0'),
  CORS_ORIGIN: z.string().min(1).default('*'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
})

export type ApiConfig = z.infer<typeof envSchema>

/**
 * Parse API settings from the environment (after `dotenv/config` ran).
 *
 * `DATABASE_URL` is validated by `@pairup/db` when the pool is created.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ApiConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new Error(`Invalid API configuration: ${issues.join('; ')}`)
  }
  return parsed.data
}
