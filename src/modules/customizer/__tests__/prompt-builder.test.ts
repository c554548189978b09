import { describe, it, expect } from 'vitest'
import { buildTransformationRequest } from '../prompt-builder'

const RESUME = 'cv:\n  name: Jane Doe\n'
const POSTING = 'Looking for a Python engineer'

describe('buildTransformationRequest', () => {
  it('is deterministic for identical inputs', () => {
    expect(buildTransformationRequest(RESUME, POSTING)).toBe(buildTransformationRequest(RESUME, POSTING))
  })

  it('opens with the role-setting preamble', () => {
    const request = buildTransformationRequest(RESUME, POSTING)
    expect(request.startsWith('You are an expert resume writer and ATS optimization specialist.')).toBe(true)
  })

  it('embeds the job posting and resume verbatim, posting first', () => {
    const request = buildTransformationRequest(RESUME, POSTING)
    expect(request).toContain(`JOB POSTING:\n${POSTING}\n`)
    expect(request).toContain(`CURRENT RESUME (YAML format):\n${RESUME}\n`)
    expect(request.indexOf(POSTING)).toBeLessThan(request.indexOf(RESUME))
  })

  it('lists the narrow edit contract after the inputs', () => {
    const request = buildTransformationRequest(RESUME, POSTING)
    const instructions = request.indexOf('INSTRUCTIONS:')
    expect(instructions).toBeGreaterThan(request.indexOf(RESUME))
    expect(request).toContain('1. EXPERIENCE SECTION HIGHLIGHTS:')
    expect(request).toContain('2. TECHNOLOGIES SECTION:')
    expect(request).toContain('3. IMPORTANT RESTRICTIONS:')
    expect(request).toContain('Only modify the "details" field within each technology category')
  })

  it('asks for raw YAML without code fences', () => {
    const request = buildTransformationRequest(RESUME, POSTING)
    expect(request).toContain('CRITICAL: Return ONLY the raw YAML content. Do not wrap it in code blocks')
  })

  it('uses the same instructions for different inputs', () => {
    const a = buildTransformationRequest('a: 1', 'posting A')
    const b = buildTransformationRequest('b: 2', 'posting B')
    expect(a.slice(a.indexOf('INSTRUCTIONS:'))).toBe(b.slice(b.indexOf('INSTRUCTIONS:')))
  })
})
