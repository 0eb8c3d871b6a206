import { appConfigSchema } from './app-config.schema'

export type AppConfig = {
  port: number
  corsOrigin: string
  database: { url: string; sslNoVerify: boolean } | null
  planContent:
    | { provider: 'none' }
    | { provider: 'openai'; apiKey: string; model: string; maxOutputTokens: number }
}

export const APP_CONFIG = Symbol('APP_CONFIG')

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = appConfigSchema.safeParse(env)
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new Error(`Invalid environment configuration: ${details}`)
  }

  const e = parsed.data
  return {
    port: e.PORT,
    corsOrigin: e.CORS_ORIGIN,
    database: e.DATABASE_URL ? { url: e.DATABASE_URL, sslNoVerify: e.DATABASE_SSL_NO_VERIFY } : null,
    planContent:
      e.PLAN_CONTENT_PROVIDER === 'openai' && e.OPENAI_API_KEY
        ? {
            provider: 'openai',
            apiKey: e.OPENAI_API_KEY,
            model: e.PLAN_CONTENT_MODEL,
            maxOutputTokens: e.PLAN_CONTENT_MAX_OUTPUT_TOKENS,
          }
        : { provider: 'none' },
  }
}
