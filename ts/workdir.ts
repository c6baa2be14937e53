import { mkdtempSync, rmSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { NAME } from './const'

export type WorkDir = {
  path: string
  dispose: () => void
}

const SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']

export function createWorkDir(parent: string = tmpdir()): WorkDir {
  const path = mkdtempSync(join(parent, `${NAME}-`))
  let disposed = false

  const onExit = () => dispose()
  const onSignal = (signal: NodeJS.Signals) => {
    dispose()
    process.exit(128 + (signal === 'SIGTERM' ? 15 : 2))
  }

  function dispose() {
    if (disposed) return
    disposed = true
    process.removeListener('exit', onExit)
    for (const s of SIGNALS) {
      process.removeListener(s, onSignal)
    }
    rmSync(path, { recursive: true, force: true })
  }

  process.once('exit', onExit)
  for (const s of SIGNALS) {
    process.once(s, onSignal)
  }
  return { path, dispose }
}

/**
 * Run `fn` with a fresh scratch directory that is removed however the
 * scope ends: return, throw, process exit or an interrupt.
 */
export async function withWorkDir<T>(
  fn: (dir: string) => Promise<T>,
  parent?: string,
): Promise<T> {
  const workDir = createWorkDir(parent)
  try {
    return await fn(workDir.path)
  } finally {
    workDir.dispose()
  }
}
