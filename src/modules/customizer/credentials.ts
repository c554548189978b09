import { MissingCredentialError } from './errors'
import type { CustomizerConfig } from './customizer.types'

/** Return the configured API key, or fail closed before any file or network work starts. */
export function resolveCredential(config: Pick<CustomizerConfig, 'apiKey'>): string {
  const apiKey = config.apiKey?.trim()
  if (!apiKey) {
    throw new MissingCredentialError()
  }
  return apiKey
}
