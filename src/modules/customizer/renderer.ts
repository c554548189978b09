import { spawn, type ChildProcess } from 'node:child_process'
import type { Logger } from 'pino'
import { logger } from '../../logger'
import { RenderError, RenderToolMissingError } from './errors'
import type { RenderOutcome, Renderer } from './customizer.types'

export const RENDERED_EXTENSION = 'pdf'

/**
 * Runs `rendercv render <file>` and reports the expected artifact name.
 *
 * The exit code is the only success signal; stderr is kept verbatim as
 * operator-facing diagnostics.
 */
export class RenderCvRenderer implements Renderer {
  constructor(
    private readonly command: string = 'rendercv',
    private readonly log: Logger = logger
  ) {}

  run(inputPath: string, outputBaseName: string): Promise<RenderOutcome> {
    const args = ['render', inputPath]

    return new Promise((resolve, reject) => {
      this.log.debug({ cmd: this.command, args }, 'Executing renderer')

      const child: ChildProcess = spawn(this.command, args, {
        env: process.env,
        shell: false,
        stdio: ['ignore', 'pipe', 'pipe']
      })

      let stdout = ''
      let stderr = ''
      let settled = false

      child.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString()
      })

      child.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString()
      })

      child.on('error', (error: NodeJS.ErrnoException) => {
        if (settled) return
        settled = true
        if (error.code === 'ENOENT') {
          this.log.error({ cmd: this.command }, 'Renderer executable not found')
          reject(new RenderToolMissingError(this.command, inputPath))
          return
        }
        this.log.warn({ cmd: this.command, error }, 'Renderer process error')
        reject(new RenderError(stderr || error.message, null, inputPath, error))
      })

      child.on('close', (code: number | null) => {
        if (settled) return
        settled = true
        if (code === 0) {
          resolve({
            artifactName: `${outputBaseName}.${RENDERED_EXTENSION}`,
            diagnostics: stderr,
            stdout
          })
          return
        }
        this.log.warn({ cmd: this.command, code }, 'Renderer exited with a failure status')
        reject(new RenderError(stderr, code, inputPath))
      })
    })
  }
}
