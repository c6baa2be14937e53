import os from 'os'
import { UnsupportedPlatform } from './error'
import { Arch, Host, PlatformKey } from './type'

const ARCH_MAP: Record<string, Arch> = {
  x86_64: 'x86_64',
  aarch64: 'aarch64',
  arm64: 'aarch64',
  armv7l: 'armv7a',
}

export function getHost(): Host {
  return { machine: os.machine(), type: os.type() }
}

export function mapArch(raw: string): Arch {
  const arch = Object.hasOwn(ARCH_MAP, raw) ? ARCH_MAP[raw] : undefined
  if (!arch) {
    throw new UnsupportedPlatform(raw)
  }
  return arch
}

/**
 * Map the host's `uname -m` / `uname -s` pair to a release index key.
 */
export function resolvePlatform(host: Host = getHost()): PlatformKey {
  return {
    arch: mapArch(host.machine),
    os: host.type.toLowerCase(),
  }
}

export function platformKeyToString(key: PlatformKey): string {
  return `${key.arch}-${key.os}`
}

export function payloadPattern(key: PlatformKey, prefix: string): string {
  return `${prefix}-${key.arch}-${key.os}-*`
}
