export type Arch = 'x86_64' | 'aarch64' | 'armv7a'

export type PlatformKey = {
  arch: Arch
  os: string
}

export type Host = {
  machine: string
  type: string
}

export type ArtifactDescriptor = {
  url: string
  filename: string
  size?: number
}

export type LocalArchive = {
  path: string
  size: number
  url: string
  version?: string
}

export type InstalledZig = {
  payloadDir: string
  installDir: string
  binPath: string
  linkPath: string
}

export type RunResult = {
  exitCode: number | null
  stdout: string
  stderr: string
}

export type Runner = (
  cmd: string,
  args: string[],
  options?: { cwd?: string },
) => RunResult

export type CompanionResult =
  | { kind: 'installed'; path: string; version?: string }
  | { kind: 'skipped'; warning: string; hint?: string }
  | { kind: 'failed'; warning: string; hint: string }

export type InstallSummary = {
  platform: PlatformKey
  archive: LocalArchive
  zig: InstalledZig
  zigVersion?: string
  zls?: CompanionResult
}
