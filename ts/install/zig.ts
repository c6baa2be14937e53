import { decode, guess } from '@easy-install/easy-archive'
import { chmodSync, mkdirSync, readdirSync, readFileSync, writeFileSync } from 'fs'
import { dirname, join, relative, sep } from 'path'
import { INSTALL_ROOT, PAYLOAD_PREFIX, ZIG_BIN } from '../const'
import { errorMessage, InstallError, PayloadNotFound } from '../error'
import { payloadPattern } from '../platform'
import { getFilename, isArchiveFile } from '../tool'
import { InstalledZig, PlatformKey } from '../type'
import { SystemInstaller } from './system'

/**
 * Decode `archive` in memory and write its entries under `workDir`, keeping
 * file modes. Returns the number of files written.
 */
export function extractArchive(archive: string, workDir: string): number {
  const name = getFilename(archive)
  const fmt = isArchiveFile(archive) ? guess(archive) : undefined
  if (fmt === undefined || fmt === null) {
    throw new InstallError(`Unknown archive type for ${name}`)
  }
  let files: ReturnType<typeof decode>
  try {
    files = decode(fmt, new Uint8Array(readFileSync(archive)))
  } catch (e) {
    throw new InstallError(`Failed to extract ${name}: ${errorMessage(e)}`)
  }
  if (!files) {
    throw new InstallError(`Failed to extract ${name}`)
  }
  let count = 0
  for (const { isDir, mode = 0, path, buffer } of files) {
    const dst = join(workDir, path)
    const rel = relative(workDir, dst)
    if (rel === '' || rel.split(sep)[0] === '..') {
      if (isDir) continue
      throw new InstallError(`Refusing to extract ${path} outside ${workDir}`)
    }
    if (isDir) {
      mkdirSync(dst, { recursive: true })
      continue
    }
    mkdirSync(dirname(dst), { recursive: true })
    writeFileSync(dst, buffer)
    if (mode) {
      chmodSync(dst, mode)
    }
    count++
  }
  return count
}

export function comparePayloadNames(a: string, b: string): number {
  return a.localeCompare(b, 'en', { numeric: true })
}

/**
 * Find the extracted `zig-<arch>-<os>-<version>` directory. When more than
 * one matches, the greatest name wins (numeric runs compared as numbers).
 */
export function findPayloadDir(
  workDir: string,
  key: PlatformKey,
  prefix: string = PAYLOAD_PREFIX,
): string {
  const head = `${prefix}-${key.arch}-${key.os}-`
  const list = readdirSync(workDir, { withFileTypes: true })
    .filter((i) => i.isDirectory() && i.name.startsWith(head))
    .map((i) => i.name)
    .sort(comparePayloadNames)
  const name = list.at(-1)
  if (!name) {
    throw new PayloadNotFound(payloadPattern(key, prefix), workDir)
  }
  return join(workDir, name)
}

export type ZigInstallOptions = {
  workDir: string
  installer: SystemInstaller
  installRoot?: string
  binDir?: string
}

export function installZig(
  archive: string,
  key: PlatformKey,
  {
    workDir,
    installer,
    installRoot = INSTALL_ROOT,
    binDir = join(installRoot, 'bin'),
  }: ZigInstallOptions,
): InstalledZig {
  console.log('Extracting Zig...')
  extractArchive(archive, workDir)
  const payloadDir = findPayloadDir(workDir, key)

  console.log(`Installing Zig to ${binDir}...`)
  const installDir = installer.copyDir(payloadDir, installRoot)
  const binPath = join(installDir, ZIG_BIN)
  const linkPath = join(binDir, ZIG_BIN)
  installer.link(binPath, linkPath)
  console.log(`${linkPath} -> ${binPath}`)

  return { payloadDir, installDir, binPath, linkPath }
}
