import * as fs from 'fs'
import * as path from 'path'
import { DirectoryNotFoundError, DirectoryReadError, isErrnoException, NoCandidatesError } from '../errors'
import { createLogger } from '../utils/logger'

const logger = createLogger('Scanner')

export const SUPPORTED_EXTENSIONS: ReadonlySet<string> = new Set(['.jpg', '.jpeg', '.png', '.gif', '.bmp'])

export function isSupportedImage(fileName: string): boolean {
  return SUPPORTED_EXTENSIONS.has(path.extname(fileName).toLowerCase())
}

/**
 * Decode a raw directory entry name. Returns null for names that are not valid
 * UTF-8, since the decoded string would point at a different (missing) file.
 */
export function decodeEntryName(raw: Buffer): string | null {
  const name = raw.toString('utf8')
  return Buffer.from(name, 'utf8').equals(raw) ? name : null
}

// Follows symlinks; dangling links are not files.
function isRegularFile(fullPath: string): boolean {
  try {
    return fs.statSync(fullPath).isFile()
  } catch {
    logger.debug('Skipping unreadable entry', fullPath)
    return false
  }
}

// Names are read as bytes so undecodable ones can be told apart.
function readEntryNames(root: string) {
  try {
    return fs.readdirSync(root, { encoding: 'buffer' })
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      throw new DirectoryNotFoundError(root, { cause: error })
    }
    throw new DirectoryReadError(root, { cause: error })
  }
}

/**
 * List the wallpapers directly inside `folderPath`.
 * Returns absolute paths sorted by file name.
 */
export function scanWallpaperFolder(folderPath: string): string[] {
  const root = path.resolve(folderPath)

  const rawNames = readEntryNames(root)

  const names: string[] = []
  for (const raw of rawNames) {
    const name = decodeEntryName(raw)
    if (name === null) {
      logger.warn(`Skipping entry with a non-UTF-8 name in ${root}`)
      continue
    }
    names.push(name)
  }

  const candidates = names
    .filter(isSupportedImage)
    .map(name => path.join(root, name))
    .filter(isRegularFile)
    .sort((a, b) => path.basename(a).localeCompare(path.basename(b)))

  logger.debug(`Found ${candidates.length} of ${rawNames.length} entries usable in ${root}`)

  if (candidates.length === 0) {
    throw new NoCandidatesError(root)
  }
  return candidates
}
