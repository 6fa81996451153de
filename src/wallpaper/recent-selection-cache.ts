import * as fs from 'fs'
import * as path from 'path'
import { CacheReadError, CacheWriteError, isErrnoException } from '../errors'
import { createLogger } from '../utils/logger'

const logger = createLogger('Cache')

function isMissingFile(error: unknown): boolean {
  return isErrnoException(error) && error.code === 'ENOENT'
}

/**
 * Read the path applied by the previous run.
 * Returns null on a first run (no cache file) or when the file is blank.
 */
export function readRecentSelection(cacheFilePath: string): string | null {
  let content: string
  try {
    content = fs.readFileSync(cacheFilePath, 'utf8')
  } catch (error) {
    if (isMissingFile(error)) {
      logger.debug(`No cache at ${cacheFilePath}, first run`)
      return null
    }
    throw new CacheReadError(cacheFilePath, { cause: error })
  }

  const previous = content.trim()
  if (!previous) return null

  logger.info(`Previously used wallpaper: ${previous}`)
  return previous
}

/**
 * Replace the cache content with `selection`.
 * Writes a sibling temp file and renames it over the cache so an interrupted
 * run leaves either the old or the new path, never a partial one.
 */
export function writeRecentSelection(cacheFilePath: string, selection: string): void {
  const tempPath = `${cacheFilePath}.${process.pid}.tmp`

  try {
    fs.mkdirSync(path.dirname(cacheFilePath), { recursive: true })

    const fd = fs.openSync(tempPath, 'w')
    try {
      fs.writeSync(fd, selection)
      fs.fsyncSync(fd)
    } finally {
      fs.closeSync(fd)
    }

    fs.renameSync(tempPath, cacheFilePath)
  } catch (error) {
    if (fs.existsSync(tempPath)) {
      fs.rmSync(tempPath, { force: true })
    }
    throw new CacheWriteError(cacheFilePath, { cause: error })
  }

  logger.debug(`Cache ${cacheFilePath} now points at ${selection}`)
}

export interface RecentSelectionStore {
  read(): string | null
  write(selection: string): void
}

export class FileRecentSelectionStore implements RecentSelectionStore {
  constructor(private readonly cacheFilePath: string) { }

  read(): string | null {
    return readRecentSelection(this.cacheFilePath)
  }

  write(selection: string): void {
    writeRecentSelection(this.cacheFilePath, selection)
  }
}
