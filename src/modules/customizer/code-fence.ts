// Opening fence line: ``` optionally tagged yaml/yml, then the end of that line
const OPENING_FENCE = /^\s*```(?:yaml|yml)?[ \t]*(?:\r?\n|$)/i
const CLOSING_FENCE = /```\s*$/

/**
 * Remove one markdown code fence the model may have wrapped its reply in.
 * The closing fence is only removed when an opening fence was. Unfenced text
 * comes back unchanged.
 */
export function stripCodeFence(text: string): string {
  const body = text.replace(OPENING_FENCE, '')
  if (body === text) {
    return text
  }
  return body.replace(CLOSING_FENCE, '')
}
