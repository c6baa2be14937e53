import {
  chmodSync,
  copyFileSync,
  cpSync,
  existsSync,
  mkdirSync,
  rmSync,
  symlinkSync,
} from 'fs'
import { basename, dirname, join } from 'path'
import { DefaultMode } from '../const'
import { errorMessage, InstallError, PermissionDenied } from '../error'
import { spawnRunner, succeeded } from '../tool'
import { Runner } from '../type'

/**
 * Every write outside the scratch directory goes through this interface.
 */
export interface SystemInstaller {
  /** Copy `src` into `destRoot`, returning the copied directory. */
  copyDir(src: string, destRoot: string): string
  copyFile(src: string, dest: string, mode?: number): void
  /** Create or replace `linkPath` so it points at `target`. */
  link(target: string, linkPath: string): void
}

const PERMISSION_CODES = ['EACCES', 'EPERM', 'EROFS']

function isPermissionError(e: unknown): boolean {
  return e instanceof Error && 'code' in e &&
    typeof e.code === 'string' && PERMISSION_CODES.includes(e.code)
}

function wrap<T>(path: string, action: string, fn: () => T): T {
  try {
    return fn()
  } catch (e) {
    if (isPermissionError(e)) {
      throw new PermissionDenied(path, errorMessage(e))
    }
    throw new InstallError(`Failed to ${action} ${path}: ${errorMessage(e)}`)
  }
}

function ensureDir(dir: string) {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true })
  }
}

export class FsInstaller implements SystemInstaller {
  copyDir(src: string, destRoot: string): string {
    const dest = join(destRoot, basename(src))
    return wrap(dest, 'copy', () => {
      ensureDir(destRoot)
      cpSync(src, dest, { recursive: true, force: true, verbatimSymlinks: true })
      return dest
    })
  }

  copyFile(src: string, dest: string, mode: number = DefaultMode) {
    wrap(dest, 'copy', () => {
      ensureDir(dirname(dest))
      copyFileSync(src, dest)
      chmodSync(dest, mode)
    })
  }

  link(target: string, linkPath: string) {
    wrap(linkPath, 'link', () => {
      ensureDir(dirname(linkPath))
      rmSync(linkPath, { force: true })
      symlinkSync(target, linkPath)
    })
  }
}

const SUDO_DENIED =
  /permission denied|not permitted|read-only file system|password is required|not in the sudoers/i

export class SudoInstaller implements SystemInstaller {
  constructor(private runner: Runner = spawnRunner) {}

  private sudo(path: string, args: string[]) {
    const ret = this.runner('sudo', args)
    if (succeeded(ret)) return
    const detail = ret.stderr.trim()
    if (ret.exitCode === null || SUDO_DENIED.test(detail)) {
      throw new PermissionDenied(path, detail || undefined)
    }
    throw new InstallError(
      `sudo ${args.join(' ')} failed with exit code ${ret.exitCode}${
        detail ? `: ${detail}` : ''
      }`,
    )
  }

  copyDir(src: string, destRoot: string): string {
    const dest = join(destRoot, basename(src))
    this.sudo(destRoot, ['mkdir', '-p', destRoot])
    this.sudo(dest, ['cp', '-r', src, `${destRoot}/`])
    return dest
  }

  copyFile(src: string, dest: string, mode: number = DefaultMode) {
    this.sudo(dirname(dest), ['mkdir', '-p', dirname(dest)])
    this.sudo(dest, ['cp', src, dest])
    this.sudo(dest, ['chmod', mode.toString(8), dest])
  }

  link(target: string, linkPath: string) {
    this.sudo(dirname(linkPath), ['mkdir', '-p', dirname(linkPath)])
    this.sudo(linkPath, ['ln', '-sf', target, linkPath])
  }
}

export function createInstaller(
  sudo: boolean,
  runner: Runner = spawnRunner,
): SystemInstaller {
  return sudo ? new SudoInstaller(runner) : new FsInstaller()
}
