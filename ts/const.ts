import { extensions, Fmt } from '@easy-install/easy-archive'

export const NAME = 'zig-master-install'
export const VERSION = '0.1.0'

export const INDEX_URL = 'https://ziglang.org/download/index.json'
export const MASTER_CHANNEL = 'master'
export const PAYLOAD_PREFIX = 'zig'

export const INSTALL_ROOT = '/usr/local'
export const ZIG_BIN = 'zig'

export const ZLS_REPO = 'https://github.com/zigtools/zls.git'
export const ZLS_HOME = 'https://github.com/zigtools/zls'
export const ZLS_BIN = 'zls'
export const ZLS_OUT_DIR = 'zig-out/bin'
export const ZLS_OPTIMIZE = 'ReleaseSafe'

export const DefaultMode = 0o755

export const ArchiveFmtList = [
  Fmt.Tar,
  Fmt.TarBz,
  Fmt.TarGz,
  Fmt.TarXz,
  Fmt.TarZstd,
].map((i) => extensions(i)).flat()
