import { spawnSync } from 'child_process'
import { ArchiveFmtList } from './const'
import { RunResult, Runner } from './type'

export function isUrl(s: string): boolean {
  return ['https://', 'http://'].some((i) => s.startsWith(i))
}

export function isArchiveFile(s: string): boolean {
  return ArchiveFmtList.some((i) => s.toLowerCase().endsWith(i.toLowerCase()))
}

export function getFilename(url: string): string {
  const i = url.lastIndexOf('/')
  return i === -1 ? url : url.slice(i + 1)
}

export function getUrlFilename(url: string): string {
  try {
    return getFilename(decodeURIComponent(new URL(url).pathname))
  } catch {
    return getFilename(url)
  }
}

export const spawnRunner: Runner = (cmd, args, options = {}) => {
  const ret = spawnSync(cmd, args, { cwd: options.cwd, encoding: 'utf8' })
  if (ret.error) {
    return { exitCode: null, stdout: '', stderr: ret.error.message }
  }
  return {
    exitCode: ret.status,
    stdout: ret.stdout ?? '',
    stderr: ret.stderr ?? '',
  }
}

export function succeeded(ret: RunResult): boolean {
  return ret.exitCode === 0
}

/**
 * Whether `cmd` can be started at all. A non-zero exit still counts: only a
 * spawn failure (ENOENT) means the command is missing.
 */
export function hasCommand(cmd: string, runner: Runner = spawnRunner): boolean {
  return runner(cmd, ['--version']).exitCode !== null
}

export function firstLine(s: string): string {
  return s.trim().split('\n')[0] ?? ''
}
