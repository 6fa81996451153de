import * as fs from 'fs'
import * as path from 'path'
import { spawnSync } from 'child_process'
import { CacheWriteError } from '../../src/errors'
import { EXIT_FAILURE, EXIT_SUCCESS, runCli } from '../../src/index'
import { buildChangerArgs } from '../../src/wallpaper/applier'
import { buildNotifySendArgs } from '../../src/wallpaper/notifier'
import { spawnResult } from '../helpers/spawn-result'
import {
  fixedRandom,
  makeTempDir,
  RecordingApplier,
  RecordingNotifier,
  removeDir,
  touchFiles,
} from '../helpers/wallpaper-fixtures'

jest.mock('child_process', () => ({
  spawnSync: jest.fn()
}))

const spawnSyncMock = jest.mocked(spawnSync)

describe('runCli', () => {
  let home: string
  let folder: string
  let cacheFile: string
  let env: NodeJS.ProcessEnv
  const spies: jest.SpyInstance[] = []

  beforeEach(() => {
    home = makeTempDir()
    folder = path.join(home, 'Pictures', 'wallpapers')
    fs.mkdirSync(folder, { recursive: true })
    cacheFile = path.join(home, '.wallpaper')
    env = { RB_NOTIFICATIONS: 'off' }

    spawnSyncMock.mockReset()
    spawnSyncMock.mockReturnValue(spawnResult())
    spies.push(
      jest.spyOn(console, 'info').mockImplementation(() => undefined),
      jest.spyOn(console, 'warn').mockImplementation(() => undefined),
      jest.spyOn(console, 'error').mockImplementation(() => undefined),
    )
  })

  afterEach(() => {
    spies.splice(0).forEach(spy => spy.mockRestore())
    removeDir(home)
  })

  it('uses the home directory defaults and exits 0', () => {
    touchFiles(folder, ['only.png'])
    const applier = new RecordingApplier()

    const code = runCli(env, { applier, random: fixedRandom(0) }, home)

    expect(code).toBe(EXIT_SUCCESS)
    expect(applier.applied).toEqual([path.join(folder, 'only.png')])
    expect(fs.readFileSync(cacheFile, 'utf8')).toBe(path.join(folder, 'only.png'))
  })

  it('does not notify when notifications are off', () => {
    touchFiles(folder, ['a.png'])

    runCli(env, { applier: new RecordingApplier(), random: fixedRandom(0) }, home)

    expect(spawnSyncMock).not.toHaveBeenCalled()
  })

  it('posts a desktop notification by default', () => {
    touchFiles(folder, ['a.png'])
    const selected = path.join(folder, 'a.png')

    runCli({}, { applier: new RecordingApplier(), random: fixedRandom(0) }, home)

    expect(spawnSyncMock).toHaveBeenCalledWith(
      'notify-send',
      buildNotifySendArgs({ body: 'a.png', icon: selected }),
      { stdio: 'ignore' }
    )
  })

  it('runs the configured changer when no applier is injected', () => {
    touchFiles(folder, ['a.png'])

    const code = runCli({ ...env, RB_WALLPAPER_CHANGER: 'set-wallpaper' }, { random: fixedRandom(0) }, home)

    expect(code).toBe(EXIT_SUCCESS)
    expect(spawnSyncMock).toHaveBeenCalledWith('set-wallpaper', [path.join(folder, 'a.png')], { stdio: 'inherit' })
  })

  it('uses an injected cache store and exits 0 when only its write fails', () => {
    touchFiles(folder, ['a.png'])
    const writes: string[] = []
    const cache = {
      read: () => null,
      write: (selection: string): void => {
        writes.push(selection)
        throw new CacheWriteError(cacheFile)
      },
    }

    const code = runCli(env, { applier: new RecordingApplier(), random: fixedRandom(0), cache }, home)

    expect(code).toBe(EXIT_SUCCESS)
    expect(writes).toEqual([path.join(folder, 'a.png')])
    expect(fs.existsSync(cacheFile)).toBe(false)
  })

  it('passes the configured changer style to the default applier', () => {
    touchFiles(folder, ['a.png'])

    runCli(
      { ...env, RB_WALLPAPER_CHANGER: 'wall-wrapper', RB_WALLPAPER_CHANGER_STYLE: 'swww' },
      { random: fixedRandom(0) },
      home
    )

    expect(spawnSyncMock).toHaveBeenCalledWith(
      'wall-wrapper',
      buildChangerArgs('wall-wrapper', path.join(folder, 'a.png'), 'swww'),
      { stdio: 'inherit' }
    )
  })

  it('exits 1 and keeps the cache when the changer fails', () => {
    touchFiles(folder, ['a.png', 'b.jpg'])
    fs.writeFileSync(cacheFile, '/walls/previous.png')

    const code = runCli(env, { applier: new RecordingApplier(1), random: fixedRandom(0) }, home)

    expect(code).toBe(EXIT_FAILURE)
    expect(fs.readFileSync(cacheFile, 'utf8')).toBe('/walls/previous.png')
    expect(console.error).toHaveBeenCalledWith('[ERROR]', '[Main]', '[apply] swww exited with code 1')
  })

  it('exits 1 with a sticky warning when the folder has no images', () => {
    touchFiles(folder, ['readme.txt'])
    const notifier = new RecordingNotifier()

    const code = runCli(env, { applier: new RecordingApplier(), random: fixedRandom(0), notifier }, home)

    expect(code).toBe(EXIT_FAILURE)
    expect(notifier.sent).toEqual([
      { body: `No images found in ${folder}`, icon: 'dialog-warning', sticky: true },
    ])
    expect(fs.existsSync(cacheFile)).toBe(false)
  })

  it('exits 1 when the folder does not exist', () => {
    const missing = path.join(home, 'nowhere')

    const code = runCli({ ...env, RB_WALLPAPER_FOLDER: missing }, { applier: new RecordingApplier() }, home)

    expect(code).toBe(EXIT_FAILURE)
    expect(console.error).toHaveBeenCalledWith(
      '[ERROR]',
      '[Main]',
      expect.stringMatching(/^\[scan\] Wallpaper folder .*nowhere does not exist or is not a directory/)
    )
  })
})
