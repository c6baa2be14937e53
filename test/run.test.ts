import { afterEach, beforeEach, expect, test, vi } from 'vitest'
import { readdirSync, readlinkSync, writeFileSync, mkdirSync } from 'fs'
import { join } from 'path'
import { run } from '../ts/run'
import { Config } from '../ts/env'
import { FsInstaller } from '../ts/install/system'
import {
  ArtifactNotFound,
  MissingPrerequisite,
  PayloadNotFound,
  UnsupportedPlatform,
} from '../ts/error'
import {
  Call,
  cleanupTmp,
  createFetch,
  createRunner,
  fail,
  fixture,
  Handler,
  INDEX_URL,
  makeIndex,
  missing,
  ok,
  TARBALL_URL,
  tmp,
} from './fake'

const host = { machine: 'x86_64', type: 'Linux' }

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined)
})

afterEach(() => {
  vi.restoreAllMocks()
  cleanupTmp()
})

function setup(
  handler: Handler,
  index = makeIndex(),
  archive = fixture('zig-x86_64-linux-0.1.0'),
) {
  const root = tmp()
  const parent = tmp()
  const config: Config = {
    indexUrl: INDEX_URL,
    installRoot: root,
    binDir: join(root, 'bin'),
    sudo: false,
    skipZls: false,
  }
  const fetch = createFetch({ [INDEX_URL]: index, [TARBALL_URL]: archive })
  const runner = createRunner(handler)
  const deps = {
    host,
    fetch: fetch.fetcher,
    runner: runner.runner,
    installer: new FsInstaller(),
    tmpDir: parent,
  }
  return { config, deps, parent, root, fetchCalls: fetch.calls, calls: runner.calls }
}

function toolchain(): Handler {
  return (call: Call) => {
    if (call.args[0] === 'version') return ok('0.1.0\n')
    if (call.args[0] === 'build' && call.cwd) {
      mkdirSync(join(call.cwd, 'zig-out', 'bin'), { recursive: true })
      writeFileSync(join(call.cwd, 'zig-out', 'bin', 'zls'), '')
    }
    return undefined
  }
}

test('run', async () => {
  const { config, deps, parent, root } = setup(toolchain())
  const summary = await run(config, deps)
  expect(summary.platform).toEqual({ arch: 'x86_64', os: 'linux' })
  expect(summary.zigVersion).toEqual('0.1.0')
  expect(summary.archive.version).toEqual('0.1.0')
  expect(readlinkSync(join(root, 'bin', 'zig'))).toEqual(
    join(root, 'zig-x86_64-linux-0.1.0', 'zig'),
  )
  expect(summary.zls).toEqual({
    kind: 'installed',
    path: join(root, 'bin', 'zls'),
    version: undefined,
  })
  expect(readdirSync(parent)).toEqual([])
})

test('run skipZls', async () => {
  const { config, deps, calls } = setup(toolchain())
  const summary = await run({ ...config, skipZls: true }, deps)
  expect(summary.zls).toEqual(undefined)
  expect(calls.some((i) => i.cmd === 'git')).toEqual(false)
})

test('run keeps zig when ZLS fails', async () => {
  const zig = toolchain()
  const { config, deps, parent, root } = setup((call) =>
    call.args[0] === 'build' ? fail('error: build failed') : zig(call)
  )
  const summary = await run(config, deps)
  expect(summary.zls?.kind).toEqual('failed')
  expect(readlinkSync(join(root, 'bin', 'zig'))).toEqual(
    join(root, 'zig-x86_64-linux-0.1.0', 'zig'),
  )
  expect(readdirSync(parent)).toEqual([])
})

test('run unsupported platform', async () => {
  const { config, deps, parent, fetchCalls, calls } = setup(toolchain())
  await expect(
    run(config, { ...deps, host: { machine: 'mips', type: 'Linux' } }),
  ).rejects.toThrow(UnsupportedPlatform)
  expect(fetchCalls).toEqual([])
  expect(calls).toEqual([])
  expect(readdirSync(parent)).toEqual([])
})

test('run without sudo', async () => {
  const { config, deps, fetchCalls } = setup(({ cmd }) =>
    cmd === 'sudo' ? missing('sudo') : undefined
  )
  const e = await run({ ...config, sudo: true }, deps).catch((e: unknown) => e)
  expect(e).toBeInstanceOf(MissingPrerequisite)
  expect(e instanceof MissingPrerequisite && e.hint).toEqual(
    'Run as root or pass --no-sudo',
  )
  expect(fetchCalls).toEqual([])
})

test('run on a host without which', async () => {
  const { config, deps, calls, root } = setup((call) =>
    call.cmd === 'which' ? missing('which') : toolchain()(call)
  )
  const summary = await run({ ...config, sudo: true }, deps)
  expect(summary.zls?.kind).toEqual('installed')
  expect(readlinkSync(join(root, 'bin', 'zig'))).toEqual(
    join(root, 'zig-x86_64-linux-0.1.0', 'zig'),
  )
  expect(calls.slice(0, 1).map(({ cmd, args }) => [cmd, ...args].join(' ')))
    .toEqual(['sudo --version'])
  expect(calls.some((i) => i.cmd === 'which')).toEqual(false)
})

test('run cleans up after failures', async () => {
  const notFound = setup(toolchain(), makeIndex(null))
  await expect(run(notFound.config, notFound.deps)).rejects.toThrow(
    ArtifactNotFound,
  )
  expect(readdirSync(notFound.parent)).toEqual([])

  const noPayload = setup(
    toolchain(),
    makeIndex(),
    fixture('zig-aarch64-linux-0.1.0'),
  )
  await expect(run(noPayload.config, noPayload.deps)).rejects.toThrow(
    PayloadNotFound,
  )
  expect(readdirSync(noPayload.parent)).toEqual([])
  expect(readdirSync(noPayload.root)).toEqual([])
})
