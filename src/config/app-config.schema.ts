import { z } from 'zod'

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((v) => v === 'true')

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback)

export const appConfigSchema = z
  .object({
    PORT: positiveInt(3000),
    CORS_ORIGIN: z.string().min(1).default('http://localhost:5173'),
    DATABASE_URL: z.string().url().optional(),
    DATABASE_SSL_NO_VERIFY: booleanFlag,
    PLAN_CONTENT_PROVIDER: z.enum(['openai', 'none']).default('none'),
    OPENAI_API_KEY: z
      .string()
      .optional()
      .transform((v) => (v && v.trim().length > 0 ? v.trim() : undefined)),
    PLAN_CONTENT_MODEL: z.string().min(1).default('gpt-4o-mini'),
    PLAN_CONTENT_MAX_OUTPUT_TOKENS: positiveInt(4000),
  })
  .refine((env) => env.PLAN_CONTENT_PROVIDER !== 'openai' || env.OPENAI_API_KEY !== undefined, {
    message: 'OPENAI_API_KEY is required when PLAN_CONTENT_PROVIDER=openai',
    path: ['OPENAI_API_KEY'],
  })
