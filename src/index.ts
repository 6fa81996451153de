#!/usr/bin/env node
import * as os from 'os'
import { resolveConfig } from './config'
import { NoCandidatesError, WallpaperError, describeError } from './errors'
import { createLogger } from './utils/logger'
import { CommandWallpaperApplier } from './wallpaper/applier'
import { DesktopNotifier, NullNotifier, WARNING_ICON } from './wallpaper/notifier'
import { rotateWallpaper, type RotationDependencies } from './wallpaper/rotate'
import { systemRandom } from './wallpaper/selector'

const logger = createLogger('Main')

export const EXIT_SUCCESS = 0
export const EXIT_FAILURE = 1

/**
 * Run one wallpaper change and return the process exit code.
 */
export function runCli(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<RotationDependencies> = {},
  homeDir: string = os.homedir()
): number {
  const config = resolveConfig(env, homeDir)
  logger.debug('Resolved configuration', config)

  const deps: RotationDependencies = {
    applier: overrides.applier
      ?? new CommandWallpaperApplier(config.wallpaperChangerCommand, config.wallpaperChangerStyle),
    random: overrides.random ?? systemRandom,
    notifier: overrides.notifier ?? (config.notificationsEnabled ? new DesktopNotifier() : new NullNotifier()),
    cache: overrides.cache,
  }

  try {
    rotateWallpaper(config, deps)
    return EXIT_SUCCESS
  } catch (error) {
    if (error instanceof NoCandidatesError) {
      logger.warn(error.message)
      deps.notifier.notify({ body: error.message, icon: WARNING_ICON, sticky: true })
      return EXIT_FAILURE
    }
    if (error instanceof WallpaperError) {
      logger.error(`[${error.stage}] ${describeError(error)}`)
      return EXIT_FAILURE
    }
    logger.error('Unexpected failure', error)
    return EXIT_FAILURE
  }
}

if (require.main === module) {
  process.exitCode = runCli()
}
