import os from 'node:os'
import { config as loadDotenv } from 'dotenv'
import { z } from 'zod'
import { ConfigurationError } from '../modules/customizer/errors'
import type { CustomizerConfig } from '../modules/customizer/customizer.types'

export const DEFAULT_BASE_URL = 'https://openrouter.ai/api/v1'
export const DEFAULT_MODEL = 'openai/gpt-5-mini'
export const DEFAULT_TEMPERATURE = 0.2
export const DEFAULT_RENDER_COMMAND = 'rendercv'

const EnvSchema = z.object({
  // Left optional here: the orchestrator resolves it and fails closed with setup guidance
  OPENROUTER_API_KEY: z.string().optional(),
  OPENROUTER_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  OPENROUTER_MODEL: z.string().min(1).default(DEFAULT_MODEL),
  RENDERCV_COMMAND: z.string().min(1).default(DEFAULT_RENDER_COMMAND),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional()
})

export type Env = z.infer<typeof EnvSchema>

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = EnvSchema.safeParse(source)
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new ConfigurationError(detail, result.error)
  }
  return result.data
}

/** Load `.env` (if present) into the process environment, then validate it. */
export function loadEnv(): Env {
  loadDotenv()
  return parseEnv(process.env)
}

export function toCustomizerConfig(env: Env, stagingDir: string = os.tmpdir()): CustomizerConfig {
  return {
    apiKey: env.OPENROUTER_API_KEY,
    baseUrl: env.OPENROUTER_BASE_URL,
    model: env.OPENROUTER_MODEL,
    temperature: DEFAULT_TEMPERATURE,
    renderCommand: env.RENDERCV_COMMAND,
    stagingDir
  }
}
