import { parseDocument } from 'yaml'
import { StructuredTextError } from './errors'
import type { StructuredTextPhase } from './customizer.types'

/**
 * Check that `text` is a single well-formed YAML document.
 *
 * Runs on the resume before the remote call and on the model's reply before
 * rendering. Only syntax is checked; the renderer owns the schema.
 */
export function validateStructuredText(text: string, phase: StructuredTextPhase): void {
  const doc = parseDocument(text, { prettyErrors: true, uniqueKeys: true })
  const [first] = doc.errors
  if (!first) return

  const start = first.linePos?.[0]
  throw new StructuredTextError(
    phase,
    first.message,
    start ? { line: start.line, column: start.col } : undefined,
    first
  )
}
