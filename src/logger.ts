import pino, { type Level, type Logger } from 'pino'

const isDev = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test'

// Unknown values fall back to warn here; the env schema reports them
function initialLevel(): string {
  const requested = process.env.LOG_LEVEL
  if (requested === 'silent' || (requested !== undefined && Object.hasOwn(pino.levels.values, requested))) {
    return requested
  }
  return 'warn'
}

const baseOptions = {
  name: 'resume-customizer',
  level: initialLevel()
}

// stdout carries the user-facing CLI lines, so diagnostics always go to stderr
export const logger: Logger = isDev
  ? pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, destination: 2 }
      }
    })
  : pino(baseOptions, pino.destination(2))

export function setLogLevel(level: Level | 'silent'): void {
  logger.level = level
}
