/** Which validation pass rejected the YAML: the resume as read, or the model's reply. */
export type StructuredTextPhase = 'input' | 'output'

export interface CustomizerConfig {
  /** OpenRouter API key; absent when the environment does not set one. */
  apiKey?: string
  baseUrl: string
  model: string
  temperature: number
  renderCommand: string
  /** Directory the transformed YAML is staged in. Staged files are never deleted. */
  stagingDir: string
}

export interface CustomizeRequest {
  resumeFile: string
  jobPostingFile: string
  /** Base name of the rendered document, without extension. */
  outputName: string
}

export interface CustomizeResult {
  artifactName: string
  stagingPath: string
  renderDiagnostics: string
}

export interface RenderOutcome {
  artifactName: string
  /** Renderer stderr, echoed to the operator as-is. */
  diagnostics: string
  stdout: string
}

export interface Renderer {
  run(inputPath: string, outputBaseName: string): Promise<RenderOutcome>
}

export interface TransformationClient {
  /** Send one request and return the de-fenced completion text. */
  transform(request: string): Promise<string>
}

/** Fire-and-forget side channel. Implementations must never throw. */
export interface Notifier {
  notify(title: string, message: string): void
}

export interface ProgressReporter {
  progress(message: string): void
}
