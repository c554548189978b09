import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest'
import { ResumeCustomizer, type TransformationClientFactory } from '../customizer.service'
import { buildTransformationRequest } from '../prompt-builder'
import { RenderCvRenderer } from '../renderer'
import {
  FileReadError,
  MissingCredentialError,
  RemoteCallError,
  RenderToolMissingError,
  StructuredTextError
} from '../errors'
import type { CustomizerConfig, Notifier, Renderer, TransformationClient } from '../customizer.types'

const RESUME = 'name: Jane Doe\nsections: {}'
const POSTING = 'Looking for a Python engineer'

// Whether the model kept its edits to highlights and Technologies details is not
// checked here: the pipeline only verifies that its reply is valid YAML.

describe('ResumeCustomizer', () => {
  let dir: string
  let stagingDir: string
  let resumeFile: string
  let postingFile: string
  let config: CustomizerConfig
  let originalFetch: typeof global.fetch

  let transform: Mock<TransformationClient['transform']>
  let createClient: Mock<TransformationClientFactory>
  let renderer: { run: Mock<Renderer['run']> }
  let notifier: { notify: Mock<Notifier['notify']> }
  let progress: Mock<(message: string) => void>

  function writeInputs(resume: string, posting: string = POSTING): void {
    fs.writeFileSync(resumeFile, resume, 'utf8')
    fs.writeFileSync(postingFile, posting, 'utf8')
  }

  function createCustomizer(overrides: Partial<CustomizerConfig> = {}, deps: { renderer?: Renderer } = {}) {
    return new ResumeCustomizer(
      { ...config, ...overrides },
      {
        createClient,
        renderer: deps.renderer ?? renderer,
        notifier,
        reporter: { progress }
      }
    )
  }

  function stagedFiles(): string[] {
    return fs.existsSync(stagingDir) ? fs.readdirSync(stagingDir) : []
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'customizer-test-'))
    stagingDir = path.join(dir, 'staging')
    resumeFile = path.join(dir, 'resume.yml')
    postingFile = path.join(dir, 'posting.txt')
    config = {
      apiKey: 'test-secret',
      baseUrl: 'https://openrouter.test/api/v1',
      model: 'openai/gpt-5-mini',
      temperature: 0.2,
      renderCommand: 'rendercv',
      stagingDir
    }

    transform = vi.fn<TransformationClient['transform']>().mockResolvedValue(RESUME)
    createClient = vi.fn<TransformationClientFactory>(() => ({ transform }))
    renderer = {
      run: vi.fn<Renderer['run']>((_inputPath, outputBaseName) =>
        Promise.resolve({ artifactName: `${outputBaseName}.pdf`, diagnostics: 'Rendered\n', stdout: '' })
      )
    }
    notifier = { notify: vi.fn<Notifier['notify']>() }
    progress = vi.fn<(message: string) => void>()

    originalFetch = global.fetch
    global.fetch = vi.fn().mockRejectedValue(new Error('network access is not expected in this test'))
  })

  afterEach(() => {
    global.fetch = originalFetch
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('customizes, stages and renders an unfenced reply', async () => {
    writeInputs(RESUME)

    const result = await createCustomizer().customize({ resumeFile, jobPostingFile: postingFile, outputName: 'tempresume' })

    expect(createClient).toHaveBeenCalledWith('test-secret', expect.objectContaining({ model: 'openai/gpt-5-mini' }))
    expect(transform).toHaveBeenCalledTimes(1)
    expect(transform).toHaveBeenCalledWith(buildTransformationRequest(RESUME, POSTING))

    expect(result.artifactName).toBe('tempresume.pdf')
    expect(result.renderDiagnostics).toBe('Rendered\n')
    expect(path.dirname(result.stagingPath)).toBe(path.resolve(stagingDir))
    expect(fs.readFileSync(result.stagingPath, 'utf8')).toBe(RESUME)

    expect(renderer.run).toHaveBeenCalledWith(result.stagingPath, 'tempresume')
    expect(notifier.notify).toHaveBeenCalledWith(
      'Resume Customization Complete',
      "Resume has been successfully customized and saved as 'tempresume.pdf'"
    )
    expect(progress).toHaveBeenCalledWith('Customizing resume with AI...')
  })

  it('de-fences a fenced reply from the default OpenRouter client before staging', async () => {
    writeInputs('name: X\n')
    global.fetch = vi.fn().mockResolvedValue({
      ok: true,
      status: 200,
      json: () => Promise.resolve({ choices: [{ message: { content: '```yaml\nname: X\n```' } }] })
    })
    const customizer = new ResumeCustomizer(config, { renderer, notifier })

    const result = await customizer.customize({ resumeFile, jobPostingFile: postingFile, outputName: 'tempresume' })

    expect(global.fetch).toHaveBeenCalledTimes(1)
    expect(fs.readFileSync(result.stagingPath, 'utf8')).toBe('name: X\n')
    expect(renderer.run).toHaveBeenCalledTimes(1)
  })

  it('halts on a missing credential before reading any file or calling the service', async () => {
    const missing = path.join(dir, 'does-not-exist.yml')

    const promise = createCustomizer({ apiKey: undefined }).customize({
      resumeFile: missing,
      jobPostingFile: missing,
      outputName: 'tempresume'
    })

    await expect(promise).rejects.toBeInstanceOf(MissingCredentialError)
    expect(createClient).not.toHaveBeenCalled()
    expect(global.fetch).not.toHaveBeenCalled()
    expect(stagedFiles()).toEqual([])
  })

  it('halts on a malformed resume before the remote call', async () => {
    writeInputs('sections: [')

    const promise = createCustomizer().customize({ resumeFile, jobPostingFile: postingFile, outputName: 'tempresume' })

    await expect(promise).rejects.toBeInstanceOf(StructuredTextError)
    await expect(promise).rejects.toMatchObject({ phase: 'input' })
    expect(createClient).not.toHaveBeenCalled()
    expect(transform).not.toHaveBeenCalled()
    expect(renderer.run).not.toHaveBeenCalled()
  })

  it('halts on an unreadable job posting before the remote call', async () => {
    fs.writeFileSync(resumeFile, RESUME, 'utf8')

    const promise = createCustomizer().customize({ resumeFile, jobPostingFile: postingFile, outputName: 'tempresume' })

    await expect(promise).rejects.toBeInstanceOf(FileReadError)
    await expect(promise).rejects.toMatchObject({ path: postingFile, reason: 'not_found' })
    expect(transform).not.toHaveBeenCalled()
  })

  it('halts on an invalid reply before staging or rendering', async () => {
    writeInputs(RESUME)
    transform.mockResolvedValue('sections: [')

    const promise = createCustomizer().customize({ resumeFile, jobPostingFile: postingFile, outputName: 'tempresume' })

    await expect(promise).rejects.toMatchObject({ kind: 'structured_text', phase: 'output' })
    expect(stagedFiles()).toEqual([])
    expect(renderer.run).not.toHaveBeenCalled()
    expect(notifier.notify).not.toHaveBeenCalled()
  })

  it('propagates a remote failure unchanged', async () => {
    writeInputs(RESUME)
    const failure = new RemoteCallError('auth', 'authentication failed (HTTP 401)', { status: 401 })
    transform.mockRejectedValue(failure)

    await expect(
      createCustomizer().customize({ resumeFile, jobPostingFile: postingFile, outputName: 'tempresume' })
    ).rejects.toBe(failure)
    expect(renderer.run).not.toHaveBeenCalled()
  })

  it('keeps the staging file when the renderer executable is missing', async () => {
    writeInputs(RESUME)
    const missingRenderer = new RenderCvRenderer('resume-customizer-test-missing-renderer')

    const promise = createCustomizer({}, { renderer: missingRenderer }).customize({
      resumeFile,
      jobPostingFile: postingFile,
      outputName: 'tempresume'
    })

    await expect(promise).rejects.toBeInstanceOf(RenderToolMissingError)
    const error = await promise.catch((err: unknown) => err)
    if (!(error instanceof RenderToolMissingError)) throw new Error('expected RenderToolMissingError')
    expect(error.message).toBe(
      'resume-customizer-test-missing-renderer command not found. Please ensure renderCV is installed.'
    )
    expect(fs.readFileSync(error.stagingPath, 'utf8')).toBe(RESUME)
    expect(notifier.notify).not.toHaveBeenCalled()
  })
})
