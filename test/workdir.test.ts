import { afterEach, expect, test, vi } from 'vitest'
import { existsSync, readdirSync, writeFileSync } from 'fs'
import { join } from 'path'
import { createWorkDir, withWorkDir } from '../ts/workdir'
import { cleanupTmp, tmp } from './fake'

afterEach(() => {
  vi.restoreAllMocks()
  cleanupTmp()
})

test('createWorkDir', () => {
  const parent = tmp()
  const sigint = process.listenerCount('SIGINT')
  const workDir = createWorkDir(parent)
  expect(existsSync(workDir.path)).toEqual(true)
  expect(workDir.path.startsWith(join(parent, 'zig-master-install-'))).toEqual(true)
  expect(process.listenerCount('SIGINT')).toEqual(sigint + 1)

  writeFileSync(join(workDir.path, 'index.json'), '{}')
  workDir.dispose()
  workDir.dispose()
  expect(existsSync(workDir.path)).toEqual(false)
  expect(process.listenerCount('SIGINT')).toEqual(sigint)
})

test('withWorkDir', async () => {
  const parent = tmp()
  const exit = process.listenerCount('exit')
  const seen = await withWorkDir(async (dir) => {
    writeFileSync(join(dir, 'zig.tar.xz'), '')
    return dir
  }, parent)
  expect(existsSync(seen)).toEqual(false)
  expect(readdirSync(parent)).toEqual([])
  expect(process.listenerCount('exit')).toEqual(exit)
})

test('withWorkDir on error', async () => {
  const parent = tmp()
  let seen = ''
  await expect(withWorkDir(async (dir) => {
    seen = dir
    throw new Error('boom')
  }, parent)).rejects.toThrow('boom')
  expect(seen.length > 0).toEqual(true)
  expect(existsSync(seen)).toEqual(false)
  expect(readdirSync(parent)).toEqual([])
})

test('createWorkDir on interrupt', () => {
  for (
    const [signal, code] of [
      ['SIGINT', 130],
      ['SIGTERM', 143],
    ] as const
  ) {
    const exit = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit')
    })
    const parent = tmp()
    const before = process.listenerCount(signal)
    const workDir = createWorkDir(parent)
    writeFileSync(join(workDir.path, 'zig.tar.xz'), '')

    expect(() => process.emit(signal, signal)).toThrow('process.exit')
    expect(exit).toHaveBeenCalledWith(code)
    expect(existsSync(workDir.path)).toEqual(false)
    expect(readdirSync(parent)).toEqual([])
    expect(process.listenerCount(signal)).toEqual(before)
    exit.mockRestore()
  }
})
