import { existsSync, readdirSync } from 'fs'
import { join } from 'path'
import {
  ZLS_BIN,
  ZLS_HOME,
  ZLS_OPTIMIZE,
  ZLS_OUT_DIR,
  ZLS_REPO,
} from '../const'
import { errorMessage } from '../error'
import { firstLine, hasCommand, spawnRunner, succeeded } from '../tool'
import { CompanionResult, RunResult, Runner } from '../type'
import { SystemInstaller } from './system'

const MANUAL_HINT = `You may need to build ZLS manually from: ${ZLS_HOME}`

export type ZlsOptions = {
  zig: string
  workDir: string
  binDir: string
  installer: SystemInstaller
  runner?: Runner
}

function describe(step: string, ret: RunResult): string {
  const detail = firstLine(ret.stderr) || `exit code ${ret.exitCode}`
  return `${step} failed: ${detail}`
}

export function findBinary(dir: string, name: string): string | undefined {
  if (!existsSync(dir)) return
  const entries = readdirSync(dir, { withFileTypes: true })
    .sort((a, b) => a.name.localeCompare(b.name))
  for (const i of entries) {
    const p = join(dir, i.name)
    if (i.isFile() && i.name === name) {
      return p
    }
    if (i.isDirectory()) {
      const found = findBinary(p, name)
      if (found) return found
    }
  }
}

function build(
  { zig, workDir, binDir, installer, runner = spawnRunner }: ZlsOptions,
): CompanionResult {
  if (!hasCommand('git', runner)) {
    return {
      kind: 'skipped',
      warning: 'git is required to build ZLS, skipping ZLS installation',
    }
  }

  console.log('Cloning ZLS repository...')
  const srcDir = join(workDir, 'zls')
  const clone = runner('git', ['clone', '--depth', '1', ZLS_REPO, srcDir])
  if (!succeeded(clone)) {
    return { kind: 'failed', warning: describe('git clone', clone), hint: MANUAL_HINT }
  }

  console.log('Building ZLS with newly installed Zig...')
  const built = runner(zig, ['build', `-Doptimize=${ZLS_OPTIMIZE}`], { cwd: srcDir })
  if (!succeeded(built)) {
    return { kind: 'failed', warning: describe('zig build', built), hint: MANUAL_HINT }
  }

  const bin = findBinary(join(srcDir, ZLS_OUT_DIR), ZLS_BIN)
  if (!bin) {
    return {
      kind: 'failed',
      warning: 'Could not find ZLS binary after build',
      hint: MANUAL_HINT,
    }
  }

  console.log(`Installing ZLS to ${binDir}...`)
  const path = join(binDir, ZLS_BIN)
  installer.copyFile(bin, path)

  const ret = runner(path, ['--version'])
  const version = succeeded(ret) ? firstLine(ret.stdout) : ''
  if (!version) {
    console.log('ZLS installed (version info not available)')
    return { kind: 'installed', path }
  }
  console.log('ZLS built and installed successfully!')
  return { kind: 'installed', path, version }
}

/**
 * Clone and build ZLS against the freshly installed zig. Never throws: every
 * failure comes back as a `skipped` or `failed` result.
 */
export function buildZls(options: ZlsOptions): CompanionResult {
  try {
    return build(options)
  } catch (e) {
    return { kind: 'failed', warning: errorMessage(e), hint: MANUAL_HINT }
  }
}
