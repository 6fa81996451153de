import * as path from 'path'

/**
 * Expand a leading `~` to the given home directory.
 * `~user/...` forms are left untouched.
 */
export function expandHomePath(inputPath: string, homeDir: string): string {
  if (inputPath === '~') {
    return homeDir
  }
  if (inputPath.startsWith('~/') || inputPath.startsWith(`~${path.sep}`)) {
    return path.join(homeDir, inputPath.slice(2))
  }
  return inputPath
}
