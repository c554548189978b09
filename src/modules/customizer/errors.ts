import type { StructuredTextPhase } from './customizer.types'

export type CustomizerErrorKind =
  | 'file_read'
  | 'structured_text'
  | 'missing_credential'
  | 'configuration'
  | 'remote_call'
  | 'staging'
  | 'render'
  | 'render_tool_missing'
  | 'unexpected'

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message
  if (typeof cause === 'string') return cause
  return 'Unknown error'
}

/**
 * Base class for every failure the customization pipeline reports.
 * All kinds are fatal to the run; the CLI turns them into one message and a non-zero exit.
 */
export class CustomizerError extends Error {
  readonly kind: CustomizerErrorKind

  constructor(kind: CustomizerErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'CustomizerError'
    this.kind = kind
  }
}

export type FileReadFailure = 'not_found' | 'permission_denied' | 'is_directory' | 'invalid_encoding' | 'other'

const FILE_READ_DESCRIPTIONS: Record<Exclude<FileReadFailure, 'other'>, string> = {
  not_found: 'file not found',
  permission_denied: 'permission denied',
  is_directory: 'path is a directory',
  invalid_encoding: 'file is not valid UTF-8 text'
}

export class FileReadError extends CustomizerError {
  constructor(
    readonly path: string,
    readonly reason: FileReadFailure,
    cause?: unknown
  ) {
    const description = reason === 'other' ? describeCause(cause) : FILE_READ_DESCRIPTIONS[reason]
    super('file_read', `Error reading ${path}: ${description}`, { cause })
    this.name = 'FileReadError'
  }
}

export interface TextPosition {
  line: number
  column: number
}

export class StructuredTextError extends CustomizerError {
  constructor(
    readonly phase: StructuredTextPhase,
    readonly detail: string,
    readonly position?: TextPosition,
    cause?: unknown
  ) {
    const prefix = phase === 'input' ? 'Invalid YAML format in resume file' : 'AI returned invalid YAML'
    super('structured_text', `${prefix}: ${detail}`, { cause })
    this.name = 'StructuredTextError'
  }
}

export const MISSING_CREDENTIAL_MESSAGE = [
  'OpenRouter API key not found. Please set OPENROUTER_API_KEY in your environment or .env file.',
  'Example .env file:',
  'OPENROUTER_API_KEY=your-key-here'
].join('\n')

export class MissingCredentialError extends CustomizerError {
  constructor() {
    super('missing_credential', MISSING_CREDENTIAL_MESSAGE)
    this.name = 'MissingCredentialError'
  }
}

export class ConfigurationError extends CustomizerError {
  constructor(detail: string, cause?: unknown) {
    super('configuration', `Invalid configuration: ${detail}`, { cause })
    this.name = 'ConfigurationError'
  }
}

export type RemoteCallFailure = 'network' | 'auth' | 'rate_limit' | 'http' | 'malformed_response' | 'empty_completion'

export class RemoteCallError extends CustomizerError {
  readonly status?: number

  constructor(
    readonly reason: RemoteCallFailure,
    detail: string,
    options?: { status?: number; cause?: unknown }
  ) {
    super('remote_call', `API request failed: ${detail}`, { cause: options?.cause })
    this.name = 'RemoteCallError'
    this.status = options?.status
  }
}

export class StagingError extends CustomizerError {
  constructor(
    readonly path: string,
    cause: unknown
  ) {
    super('staging', `Failed to write staging file ${path}: ${describeCause(cause)}`, { cause })
    this.name = 'StagingError'
  }
}

export class RenderError extends CustomizerError {
  constructor(
    readonly stderr: string,
    readonly exitCode: number | null,
    readonly stagingPath: string,
    cause?: unknown
  ) {
    const detail = stderr.trim() || `renderer exited with code ${exitCode ?? 'unknown'}`
    super('render', `Failed to render resume: ${detail}`, { cause })
    this.name = 'RenderError'
  }
}

export class RenderToolMissingError extends CustomizerError {
  constructor(
    readonly command: string,
    readonly stagingPath: string
  ) {
    super('render_tool_missing', `${command} command not found. Please ensure renderCV is installed.`)
    this.name = 'RenderToolMissingError'
  }
}

export class UnexpectedError extends CustomizerError {
  constructor(cause: unknown) {
    super('unexpected', describeCause(cause), { cause })
    this.name = 'UnexpectedError'
  }
}

export function toCustomizerError(err: unknown): CustomizerError {
  if (err instanceof CustomizerError) return err
  return new UnexpectedError(err)
}
