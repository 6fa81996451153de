import * as os from 'os'
import { expandHomePath } from './utils/path-expansion'

export const ENV_CACHE_FILE = 'RB_CACHE_FILE'
export const ENV_WALLPAPER_FOLDER = 'RB_WALLPAPER_FOLDER'
export const ENV_WALLPAPER_CHANGER = 'RB_WALLPAPER_CHANGER'
export const ENV_WALLPAPER_CHANGER_STYLE = 'RB_WALLPAPER_CHANGER_STYLE'
export const ENV_NOTIFICATIONS = 'RB_NOTIFICATIONS'

export const DEFAULT_CACHE_FILE = '~/.wallpaper'
export const DEFAULT_WALLPAPER_FOLDER = '~/Pictures/wallpapers'
export const DEFAULT_WALLPAPER_CHANGER = 'swww'

const DISABLED_VALUES = new Set(['0', 'false', 'off', 'no'])

/**
 * How the changer is invoked: `swww` passes `img` and transition flags before
 * the path, `plain` passes the path alone.
 */
export type ChangerStyle = 'swww' | 'plain'

function parseChangerStyle(value: string | undefined): ChangerStyle | null {
  const style = value?.trim().toLowerCase()
  return style === 'swww' || style === 'plain' ? style : null
}

export interface WallpaperConfig {
  readonly cacheFilePath: string
  readonly wallpaperFolderPath: string
  readonly wallpaperChangerCommand: string
  /** Null lets the command name decide. */
  readonly wallpaperChangerStyle: ChangerStyle | null
  readonly notificationsEnabled: boolean
}

type Environment = Readonly<Record<string, string | undefined>>

function readSetting(env: Environment, name: string, fallback: string): string {
  const value = env[name]?.trim()
  return value ? value : fallback
}

/**
 * Resolve the run configuration from environment variables.
 * Unset or blank variables fall back to the defaults; nothing is checked on disk here.
 */
export function resolveConfig(env: Environment = process.env, homeDir: string = os.homedir()): WallpaperConfig {
  const notifications = env[ENV_NOTIFICATIONS]?.trim().toLowerCase() ?? ''

  return Object.freeze({
    cacheFilePath: expandHomePath(readSetting(env, ENV_CACHE_FILE, DEFAULT_CACHE_FILE), homeDir),
    wallpaperFolderPath: expandHomePath(readSetting(env, ENV_WALLPAPER_FOLDER, DEFAULT_WALLPAPER_FOLDER), homeDir),
    wallpaperChangerCommand: readSetting(env, ENV_WALLPAPER_CHANGER, DEFAULT_WALLPAPER_CHANGER),
    wallpaperChangerStyle: parseChangerStyle(env[ENV_WALLPAPER_CHANGER_STYLE]),
    notificationsEnabled: !DISABLED_VALUES.has(notifications),
  })
}
