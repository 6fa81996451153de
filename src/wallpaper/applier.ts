import { spawnSync } from 'child_process'
import * as path from 'path'
import type { ChangerStyle } from '../config'
import { ApplyCommandError } from '../errors'
import { createLogger } from '../utils/logger'

const logger = createLogger('Applier')

const SWWW_TRANSITION = {
  type: 'any',
  step: '30',
  duration: '3',
  fps: '165',
} as const

export interface WallpaperApplier {
  /** Set `imagePath` as the wallpaper; throws ApplyCommandError on failure. */
  apply(imagePath: string): void
}

// awww is swww's newer name; both take the same arguments.
const SWWW_COMMANDS = new Set(['swww', 'awww'])

export function inferChangerStyle(command: string): ChangerStyle {
  return SWWW_COMMANDS.has(path.basename(command)) ? 'swww' : 'plain'
}

/**
 * Arguments for the changer. The swww style gets the `img` subcommand and
 * transition flags; the plain style receives the image path as its only argument.
 * Without an explicit style the command name decides.
 */
export function buildChangerArgs(command: string, imagePath: string, style: ChangerStyle | null = null): string[] {
  if ((style ?? inferChangerStyle(command)) === 'plain') {
    return [imagePath]
  }

  return [
    'img',
    '--transition-type', SWWW_TRANSITION.type,
    '--transition-step', SWWW_TRANSITION.step,
    '--transition-duration', SWWW_TRANSITION.duration,
    '--transition-fps', SWWW_TRANSITION.fps,
    imagePath,
  ]
}

export class CommandWallpaperApplier implements WallpaperApplier {
  constructor(private readonly command: string, private readonly style: ChangerStyle | null = null) { }

  apply(imagePath: string): void {
    const args = buildChangerArgs(this.command, path.resolve(imagePath), this.style)
    logger.debug('Running:', this.command, args.join(' '))

    // Array args, no shell: file names are passed through literally.
    const result = spawnSync(this.command, args, { stdio: 'inherit' })

    if (result.error) {
      throw new ApplyCommandError(this.command, null, null, { cause: result.error })
    }
    if (result.status !== 0) {
      throw new ApplyCommandError(this.command, result.status, result.signal)
    }
  }
}
