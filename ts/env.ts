import { join } from 'path'
import { INDEX_URL, INSTALL_ROOT } from './const'

export type Config = {
  indexUrl: string
  installRoot: string
  binDir: string
  sudo: boolean
  skipZls: boolean
}

function isTruthy(v: string | undefined): boolean {
  return !!v && !['0', 'false', 'no', ''].includes(v.toLowerCase())
}

export function isRoot(): boolean {
  return typeof process.getuid === 'function' && process.getuid() === 0
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const installRoot = env.ZIG_INSTALL_ROOT || INSTALL_ROOT
  return {
    indexUrl: env.ZIG_INDEX_URL || INDEX_URL,
    installRoot,
    binDir: env.ZIG_BIN_DIR || join(installRoot, 'bin'),
    sudo: !isTruthy(env.ZIG_NO_SUDO) && !isRoot(),
    skipZls: isTruthy(env.ZIG_SKIP_ZLS),
  }
}
