/**
 * Error taxonomy for a wallpaper rotation run.
 * Every failure carries the stage it happened in so the CLI can report it.
 */

export type RotationStage = 'scan' | 'select' | 'cache-read' | 'apply' | 'cache-write'

export class WallpaperError extends Error {
  readonly stage: RotationStage

  constructor(stage: RotationStage, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.stage = stage
  }
}

export class DirectoryNotFoundError extends WallpaperError {
  constructor(readonly folderPath: string, options?: { cause?: unknown }) {
    super('scan', `Wallpaper folder ${folderPath} does not exist or is not a directory`, options)
  }
}

export class DirectoryReadError extends WallpaperError {
  constructor(readonly folderPath: string, options?: { cause?: unknown }) {
    super('scan', `Failed to read wallpaper folder ${folderPath}`, options)
  }
}

export class NoCandidatesError extends WallpaperError {
  constructor(readonly folderPath: string | null, stage: 'scan' | 'select' = 'scan') {
    super(stage, folderPath ? `No images found in ${folderPath}` : 'No wallpaper candidates to choose from')
  }
}

export class CacheReadError extends WallpaperError {
  constructor(readonly cacheFilePath: string, options?: { cause?: unknown }) {
    super('cache-read', `Failed to read cache file ${cacheFilePath}`, options)
  }
}

export class CacheWriteError extends WallpaperError {
  constructor(readonly cacheFilePath: string, options?: { cause?: unknown }) {
    super('cache-write', `Failed to update cache in ${cacheFilePath}`, options)
  }
}

export class ApplyCommandError extends WallpaperError {
  constructor(
    readonly command: string,
    readonly exitCode: number | null,
    readonly signal: NodeJS.Signals | null,
    options?: { cause?: unknown }
  ) {
    super('apply', describeApplyFailure(command, exitCode, signal, options?.cause), options)
  }
}

// Errors raised by Node's own modules can come from another realm (Jest's
// sandbox, vm contexts), so these checks look at shape, not `instanceof Error`.
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error
}

function messageOf(value: unknown): string | null {
  if (typeof value === 'object' && value !== null && 'message' in value && typeof value.message === 'string') {
    return value.message
  }
  return null
}

function describeApplyFailure(
  command: string,
  exitCode: number | null,
  signal: NodeJS.Signals | null,
  cause: unknown
): string {
  const causeMessage = messageOf(cause)
  if (causeMessage !== null) {
    return `Failed to execute ${command}: ${causeMessage}`
  }
  if (signal) {
    return `${command} was terminated by ${signal}`
  }
  return `${command} exited with code ${exitCode}`
}

/** Format an unknown error for a log line. */
export function describeError(error: unknown): string {
  const message = messageOf(error)
  if (message === null) {
    return String(error)
  }

  const causeMessage = typeof error === 'object' && error !== null && 'cause' in error
    ? messageOf(error.cause)
    : null
  return causeMessage !== null && !message.includes(causeMessage)
    ? `${message} (${causeMessage})`
    : message
}
