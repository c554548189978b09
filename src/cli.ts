import { loadEnv, toCustomizerConfig } from './config/env'
import { logger, setLogLevel } from './logger'
import { ResumeCustomizer } from './modules/customizer/customizer.service'
import {
  RenderError,
  RenderToolMissingError,
  toCustomizerError,
  type CustomizerError
} from './modules/customizer/errors'
import { DesktopNotifier, NoopNotifier } from './modules/customizer/notifier'
import type { CustomizeRequest, CustomizeResult } from './modules/customizer/customizer.types'

export const DEFAULT_OUTPUT_NAME = 'tempresume'

export const USAGE = `Usage: resume-customizer customize <resume-file> <job-posting-file> [options]

Customize a resume based on a job posting.

Arguments:
  resume-file          renderCV resume in YAML format
  job-posting-file     job posting as plain text

Options:
  -o, --output <name>  Output filename without extension (default: "${DEFAULT_OUTPUT_NAME}")
  -v, --verbose        Enable verbose output
      --no-notify      Skip the desktop notification
  -h, --help           Show this message`

export type CliCommand =
  | { kind: 'help' }
  | {
      kind: 'customize'
      resumeFile: string
      jobPostingFile: string
      output: string
      verbose: boolean
      notify: boolean
    }

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CliUsageError'
  }
}

function isHelpFlag(arg: string): boolean {
  return arg === '-h' || arg === '--help'
}

export function parseCliArgs(argv: string[]): CliCommand {
  const [command, ...rest] = argv
  if (command === undefined || isHelpFlag(command)) {
    return { kind: 'help' }
  }
  if (command !== 'customize') {
    throw new CliUsageError(`Unknown command '${command}'`)
  }

  const positionals: string[] = []
  let output = DEFAULT_OUTPUT_NAME
  let verbose = false
  let notify = true
  let optionsEnded = false

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i]

    if (optionsEnded || arg === '-' || !arg.startsWith('-')) {
      positionals.push(arg)
      continue
    }

    if (isHelpFlag(arg)) {
      return { kind: 'help' }
    } else if (arg === '--') {
      optionsEnded = true
    } else if (arg === '-o' || arg === '--output') {
      const value = rest[i + 1]
      if (value === undefined) {
        throw new CliUsageError(`Option '${arg}' requires a value`)
      }
      output = value
      i++
    } else if (arg.startsWith('--output=')) {
      output = arg.slice('--output='.length)
    } else if (arg === '-v' || arg === '--verbose') {
      verbose = true
    } else if (arg === '--no-notify') {
      notify = false
    } else {
      throw new CliUsageError(`Unknown option '${arg}'`)
    }
  }

  if (positionals.length !== 2) {
    throw new CliUsageError(
      `Expected 2 arguments (resume file and job posting file), got ${positionals.length}`
    )
  }
  if (!output.trim()) {
    throw new CliUsageError('Output name must not be empty')
  }

  const [resumeFile, jobPostingFile] = positionals
  return { kind: 'customize', resumeFile, jobPostingFile, output, verbose, notify }
}

// ── Wiring ──────────────────────────────────────────────────────────────────

export interface CliIO {
  out(line: string): void
  err(line: string): void
}

export interface Customizer {
  customize(request: CustomizeRequest): Promise<CustomizeResult>
}

export interface CliDeps {
  io: CliIO
  createCustomizer: (options: { notify: boolean; io: CliIO }) => Customizer
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line)
}

function createDefaultCustomizer(options: { notify: boolean; io: CliIO }): Customizer {
  const env = loadEnv()
  if (env.LOG_LEVEL) setLogLevel(env.LOG_LEVEL)

  return new ResumeCustomizer(toCustomizerConfig(env), {
    notifier: options.notify ? new DesktopNotifier() : new NoopNotifier(),
    reporter: { progress: (message) => options.io.out(message) }
  })
}

const defaultDeps: CliDeps = {
  io: consoleIO,
  createCustomizer: createDefaultCustomizer
}

export function formatError(error: CustomizerError): string {
  if (error.kind === 'unexpected') {
    return `❌ Unexpected error: ${error.message}`
  }
  return `❌ Error: ${error.message}`
}

function reportSuccess(io: CliIO, result: CustomizeResult): void {
  io.out(`Resume rendered successfully as '${result.artifactName}'`)
  if (result.renderDiagnostics.trim()) {
    io.err('RenderCV output:')
    io.err(result.renderDiagnostics)
  }
  io.out(`Temporary YAML file saved as: ${result.stagingPath}`)
  io.out('You can inspect the modified resume YAML file before deleting it.')
  io.out('✅ Resume customization completed successfully!')
}

/** Run the CLI and resolve with the process exit code. */
export async function runCli(argv: string[], deps: CliDeps = defaultDeps): Promise<number> {
  const { io } = deps

  let command: CliCommand
  try {
    command = parseCliArgs(argv)
  } catch (err) {
    if (!(err instanceof CliUsageError)) throw err
    io.err(`❌ Error: ${err.message}`)
    io.err(USAGE)
    return 2
  }

  if (command.kind === 'help') {
    io.out(USAGE)
    return 0
  }

  if (command.verbose) {
    io.out(`Processing resume: ${command.resumeFile}`)
    io.out(`Job posting: ${command.jobPostingFile}`)
    io.out(`Output: ${command.output}`)
  }

  try {
    const customizer = deps.createCustomizer({ notify: command.notify, io })
    const result = await customizer.customize({
      resumeFile: command.resumeFile,
      jobPostingFile: command.jobPostingFile,
      outputName: command.output
    })
    reportSuccess(io, result)
    return 0
  } catch (err) {
    const error = toCustomizerError(err)
    logger.debug({ err: error, kind: error.kind }, 'Resume customization failed')
    if (error instanceof RenderError || error instanceof RenderToolMissingError) {
      io.out(`Temporary YAML file saved as: ${error.stagingPath}`)
    }
    io.err(formatError(error))
    return 1
  }
}
