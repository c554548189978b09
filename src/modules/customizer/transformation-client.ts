/**
 * OpenRouter chat-completions client for the resume transformation call.
 *
 * Performs exactly one request per `transform()` and returns the first
 * choice's text with any markdown code fence removed. There is no retry,
 * streaming or timeout override: the transport default applies.
 */

import type { Logger } from 'pino'
import { z } from 'zod'
import { logger } from '../../logger'
import { stripCodeFence } from './code-fence'
import { RemoteCallError } from './errors'
import type { TransformationClient } from './customizer.types'

// ── Types ───────────────────────────────────────────────────────────────────

export interface OpenRouterClientOptions {
  apiKey: string
  baseUrl: string
  model: string
  temperature: number
}

const ChatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable().optional()
      })
    })
  ),
  usage: z
    .object({
      total_tokens: z.number().optional()
    })
    .optional()
})

const ErrorBodySchema = z.object({
  error: z.object({
    message: z.string()
  })
})

export const CLIENT_TITLE = 'Resume Customizer CLI'

// ── Helpers ─────────────────────────────────────────────────────────────────

function extractErrorMessage(body: string): string {
  try {
    const parsed = ErrorBodySchema.safeParse(JSON.parse(body))
    if (parsed.success) return parsed.data.error.message
  } catch {
    // Not JSON; fall back to the raw body
  }
  return body.slice(0, 200)
}

function classifyHttpFailure(status: number, body: string): RemoteCallError {
  const message = extractErrorMessage(body)
  const suffix = message ? `: ${message}` : ''

  if (status === 401 || status === 403) {
    return new RemoteCallError('auth', `authentication failed (HTTP ${status})${suffix}`, { status })
  }
  if (status === 429) {
    return new RemoteCallError('rate_limit', `rate limit exceeded (HTTP 429)${suffix}`, { status })
  }
  return new RemoteCallError('http', `HTTP ${status}${suffix}`, { status })
}

// ── Client ──────────────────────────────────────────────────────────────────

export class OpenRouterClient implements TransformationClient {
  private readonly url: string

  constructor(
    private readonly options: OpenRouterClientOptions,
    private readonly log: Logger = logger
  ) {
    this.url = `${options.baseUrl.replace(/\/+$/, '')}/chat/completions`
  }

  async transform(request: string): Promise<string> {
    const { model, temperature } = this.options

    let response: Response
    try {
      response = await fetch(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.options.apiKey}`,
          'X-Title': CLIENT_TITLE
        },
        body: JSON.stringify({
          model,
          messages: [{ role: 'user', content: request }],
          temperature
        })
      })
    } catch (err) {
      const msg = err instanceof Error ? err.message : 'Unknown error'
      this.log.error({ err, model }, 'OpenRouter request failed')
      throw new RemoteCallError('network', msg, { cause: err })
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '')
      const error = classifyHttpFailure(response.status, body)
      this.log.warn({ model, status: response.status, reason: error.reason }, 'OpenRouter returned an error status')
      throw error
    }

    let payload: unknown
    try {
      payload = await response.json()
    } catch (err) {
      throw new RemoteCallError('malformed_response', 'response body is not valid JSON', { cause: err })
    }

    const parsed = ChatCompletionSchema.safeParse(payload)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      const where = issue?.path.length ? ` at ${issue.path.join('.')}` : ''
      throw new RemoteCallError(
        'malformed_response',
        `unexpected response shape${where}: ${issue?.message ?? 'unknown issue'}`,
        { cause: parsed.error }
      )
    }

    const content = parsed.data.choices[0]?.message.content?.trim()
    if (!content) {
      throw new RemoteCallError('empty_completion', 'the model returned no completion text')
    }

    this.log.info(
      { model: parsed.data.model ?? model, tokens: parsed.data.usage?.total_tokens },
      'OpenRouter call succeeded'
    )

    return stripCodeFence(content)
  }
}
