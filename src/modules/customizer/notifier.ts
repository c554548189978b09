import notifier from 'node-notifier'
import type { Logger } from 'pino'
import { logger } from '../../logger'
import type { Notifier } from './customizer.types'

/** Desktop notification via node-notifier. Failures are logged at debug level and dropped. */
export class DesktopNotifier implements Notifier {
  constructor(private readonly log: Logger = logger) {}

  notify(title: string, message: string): void {
    try {
      notifier.notify({ title, message }, (err) => {
        if (err) this.log.debug({ err }, 'Desktop notification failed')
      })
    } catch (err) {
      this.log.debug({ err }, 'Desktop notification failed')
    }
  }
}

export class NoopNotifier implements Notifier {
  notify(): void {
    // disabled with --no-notify
  }
}
