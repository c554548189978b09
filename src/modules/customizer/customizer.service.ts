import type { Logger } from 'pino'
import { logger } from '../../logger'
import { resolveCredential } from './credentials'
import { readTextFile } from './input-loader'
import { NoopNotifier } from './notifier'
import { buildTransformationRequest } from './prompt-builder'
import { RenderCvRenderer } from './renderer'
import { stageTransformationResult } from './staging'
import { validateStructuredText } from './structured-text'
import { OpenRouterClient } from './transformation-client'
import type {
  CustomizeRequest,
  CustomizeResult,
  CustomizerConfig,
  Notifier,
  ProgressReporter,
  Renderer,
  TransformationClient
} from './customizer.types'

export type TransformationClientFactory = (apiKey: string, config: CustomizerConfig) => TransformationClient

export interface ResumeCustomizerDeps {
  createClient?: TransformationClientFactory
  renderer?: Renderer
  notifier?: Notifier
  reporter?: ProgressReporter
  log?: Logger
}

const createOpenRouterClient: TransformationClientFactory = (apiKey, config) =>
  new OpenRouterClient({
    apiKey,
    baseUrl: config.baseUrl,
    model: config.model,
    temperature: config.temperature
  })

const silentReporter: ProgressReporter = {
  progress: () => undefined
}

/**
 * Runs the customization pipeline for one resume/job-posting pair:
 * credential → read → validate → remote transform → validate → stage → render → notify.
 *
 * Every step depends on the previous one and any failure stops the run. Nothing is
 * retried, and the staged YAML is kept on disk whether or not rendering succeeds.
 */
export class ResumeCustomizer {
  private readonly createClient: TransformationClientFactory
  private readonly renderer: Renderer
  private readonly notifier: Notifier
  private readonly reporter: ProgressReporter
  private readonly log: Logger

  constructor(
    private readonly config: CustomizerConfig,
    deps: ResumeCustomizerDeps = {}
  ) {
    this.createClient = deps.createClient ?? createOpenRouterClient
    this.renderer = deps.renderer ?? new RenderCvRenderer(config.renderCommand)
    this.notifier = deps.notifier ?? new NoopNotifier()
    this.reporter = deps.reporter ?? silentReporter
    this.log = deps.log ?? logger
  }

  async customize(request: CustomizeRequest): Promise<CustomizeResult> {
    const apiKey = resolveCredential(this.config)

    const resume = await readTextFile(request.resumeFile)
    const jobPosting = await readTextFile(request.jobPostingFile)

    // Fail fast on a broken resume before spending a remote call
    validateStructuredText(resume, 'input')

    this.reporter.progress('Customizing resume with AI...')
    const client = this.createClient(apiKey, this.config)
    const transformed = await client.transform(buildTransformationRequest(resume, jobPosting))

    validateStructuredText(transformed, 'output')

    const stagingPath = await stageTransformationResult(transformed, this.config.stagingDir)
    this.log.debug({ stagingPath, bytes: Buffer.byteLength(transformed) }, 'Staged customized resume')

    const outcome = await this.renderer.run(stagingPath, request.outputName)
    this.log.info({ artifactName: outcome.artifactName, stagingPath }, 'Resume rendered')

    this.notifier.notify(
      'Resume Customization Complete',
      `Resume has been successfully customized and saved as '${outcome.artifactName}'`
    )

    return {
      artifactName: outcome.artifactName,
      stagingPath,
      renderDiagnostics: outcome.diagnostics
    }
  }
}
