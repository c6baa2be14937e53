export type ErrorKind =
  | 'UnsupportedPlatform'
  | 'MissingPrerequisite'
  | 'DownloadError'
  | 'MalformedIndex'
  | 'ArtifactNotFound'
  | 'PayloadNotFound'
  | 'PermissionDenied'
  | 'InstallError'

export class InstallerError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    public readonly hint?: string,
  ) {
    super(message)
    this.name = kind
  }
}

export class UnsupportedPlatform extends InstallerError {
  constructor(public readonly machine: string) {
    super('UnsupportedPlatform', `Unsupported architecture: ${machine}`)
  }
}

export class MissingPrerequisite extends InstallerError {
  constructor(public readonly command: string, hint?: string) {
    super(
      'MissingPrerequisite',
      `${command} is required but not installed`,
      hint,
    )
  }
}

export class DownloadError extends InstallerError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly statusCode?: number,
  ) {
    super('DownloadError', message)
  }
}

export class MalformedIndex extends InstallerError {
  constructor(message: string) {
    super('MalformedIndex', `Malformed release index: ${message}`)
  }
}

export class ArtifactNotFound extends InstallerError {
  constructor(public readonly platform: string) {
    super(
      'ArtifactNotFound',
      `Could not find Zig master build for ${platform}`,
    )
  }
}

export class PayloadNotFound extends InstallerError {
  constructor(public readonly pattern: string, dir: string) {
    super(
      'PayloadNotFound',
      `Could not find extracted Zig directory matching ${pattern} in ${dir}`,
    )
  }
}

export class PermissionDenied extends InstallerError {
  constructor(public readonly path: string, detail?: string) {
    super(
      'PermissionDenied',
      `Permission denied writing ${path}${detail ? `: ${detail}` : ''}`,
      'Re-run with sudo available, or pass --prefix to install somewhere writable',
    )
  }
}

export class InstallError extends InstallerError {
  constructor(message: string) {
    super('InstallError', message)
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}
