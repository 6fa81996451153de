import { spawnSync } from 'child_process'
import { describeError } from '../errors'
import { createLogger } from '../utils/logger'

const logger = createLogger('Notifier')

export const APP_NAME = 'Random Wallpaper'
export const EXPIRE_TIME_MS = 3000
export const WARNING_ICON = 'dialog-warning'

export interface NotificationRequest {
  body: string
  icon: string
  /** Stays on screen until dismissed. */
  sticky?: boolean
}

export interface Notifier {
  notify(request: NotificationRequest): void
}

export function buildNotifySendArgs(request: NotificationRequest): string[] {
  const args = [
    '--app-name', APP_NAME,
    '--icon', request.icon,
    '--expire-time', String(request.sticky ? 0 : EXPIRE_TIME_MS),
  ]
  if (request.sticky) {
    args.push('--hint', 'boolean:resident:true')
  }
  args.push(APP_NAME, request.body)
  return args
}

/**
 * Desktop notifications through `notify-send`.
 * Failures are logged and never fail the run.
 */
export class DesktopNotifier implements Notifier {
  constructor(private readonly command: string = 'notify-send') { }

  notify(request: NotificationRequest): void {
    const result = spawnSync(this.command, buildNotifySendArgs(request), { stdio: 'ignore' })

    if (result.error) {
      logger.error('Failed to send notification.', describeError(result.error))
    } else if (result.status !== 0) {
      logger.error(`Failed to send notification. ${this.command} exited with code ${result.status}`)
    }
  }
}

export class NullNotifier implements Notifier {
  notify(): void { }
}
