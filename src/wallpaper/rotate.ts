import * as path from 'path'
import type { WallpaperConfig } from '../config'
import { CacheWriteError, describeError } from '../errors'
import { createLogger } from '../utils/logger'
import type { WallpaperApplier } from './applier'
import type { Notifier } from './notifier'
import { FileRecentSelectionStore, type RecentSelectionStore } from './recent-selection-cache'
import { scanWallpaperFolder } from './scanner'
import { selectWallpaper, type RandomSource } from './selector'

const logger = createLogger('Rotation')

export interface RotationDependencies {
  applier: WallpaperApplier
  random: RandomSource
  notifier: Notifier
  /** Defaults to the cache file named in the config. */
  cache?: RecentSelectionStore
}

export interface RotationResult {
  selection: string
  previousSelection: string | null
  candidateCount: number
  /** False when the wallpaper changed but recording it in the cache failed. */
  cacheUpdated: boolean
}

/**
 * One run: scan, read cache, pick, apply, record, notify.
 * Fatal errors propagate; the cache is written only after a successful apply.
 */
export function rotateWallpaper(config: WallpaperConfig, deps: RotationDependencies): RotationResult {
  const cache = deps.cache ?? new FileRecentSelectionStore(config.cacheFilePath)
  const candidates = scanWallpaperFolder(config.wallpaperFolderPath)
  logger.info(`${candidates.length} wallpapers available in ${config.wallpaperFolderPath}`)
  const previousSelection = cache.read()
  const selection = selectWallpaper(candidates, previousSelection, deps.random)

  logger.debug(`Picked ${selection}`)
  deps.applier.apply(selection)

  let cacheUpdated = true
  try {
    cache.write(selection)
  } catch (error) {
    if (!(error instanceof CacheWriteError)) throw error
    cacheUpdated = false
    logger.warn(`${describeError(error)}; the wallpaper was still changed`)
  }

  deps.notifier.notify({ body: path.basename(selection), icon: selection })
  logger.info(`Wallpaper successfully changed to ${selection}`)

  return { selection, previousSelection, candidateCount: candidates.length, cacheUpdated }
}
