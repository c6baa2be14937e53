import { hasPath } from 'crud-path'
import { join } from 'path'
import { NAME, VERSION } from './const'
import { Config, getConfig } from './env'
import { errorMessage, InstallerError } from './error'
import { run } from './run'
import { isUrl } from './tool'
import { InstallSummary } from './type'

export const USAGE = `usage:
${NAME} [options]

Install the latest Zig master build and build ZLS from source.

options:
  --prefix <dir>      install root (default /usr/local)
  --bin-dir <dir>     directory for the zig and zls links (default <prefix>/bin)
  --index-url <url>   release index to read
  --no-sudo           write directly instead of through sudo
  --skip-zls          do not build ZLS
  -v, --version       print version
  -h, --help          print this help`

export type ParsedArgs =
  | { kind: 'run'; config: Config }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'error'; message: string }

export function parseArgs(
  args: string[],
  env: NodeJS.ProcessEnv = process.env,
): ParsedArgs {
  const config = getConfig(env)
  let binDir: string | undefined
  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    switch (arg) {
      case '-h':
      case '--help':
        return { kind: 'help' }
      case '-v':
      case '--version':
        return { kind: 'version' }
      case '--no-sudo':
        config.sudo = false
        break
      case '--skip-zls':
        config.skipZls = true
        break
      case '--prefix':
      case '--bin-dir':
      case '--index-url': {
        const value = args[++i]
        if (!value || value.startsWith('-')) {
          return { kind: 'error', message: `missing value for ${arg}` }
        }
        if (arg === '--prefix') {
          config.installRoot = value
        } else if (arg === '--bin-dir') {
          binDir = value
        } else if (isUrl(value)) {
          config.indexUrl = value
        } else {
          return { kind: 'error', message: `not a URL: ${value}` }
        }
        break
      }
      default:
        return { kind: 'error', message: `unknown option: ${arg}` }
    }
  }
  if (binDir) {
    config.binDir = binDir
  } else if (!env.ZIG_BIN_DIR) {
    config.binDir = join(config.installRoot, 'bin')
  }
  return { kind: 'run', config }
}

export function formatSummary(summary: InstallSummary, binDir: string): string[] {
  const lines = [
    '',
    '=== Installation complete! ===',
    `Zig: ${summary.zigVersion ?? summary.zig.linkPath}`,
  ]
  const zls = summary.zls
  if (zls?.kind === 'installed') {
    lines.push(`ZLS: ${zls.path}${zls.version ? ` (${zls.version})` : ''}`)
  } else if (zls) {
    lines.push('ZLS: not installed')
  }
  if (!hasPath(binDir)) {
    lines.push(`You need to add ${binDir} to your $PATH`)
  }
  if (zls?.kind === 'installed') {
    lines.push('', 'Note: You may need to restart your editor/IDE to use the new ZLS.')
  }
  return lines
}

export async function main(args = process.argv.slice(2)): Promise<number> {
  const parsed = parseArgs(args)
  switch (parsed.kind) {
    case 'help':
      console.log(USAGE)
      return 0
    case 'version':
      console.log(VERSION)
      return 0
    case 'error':
      console.error(`${parsed.message}\n${USAGE}`)
      return 2
  }

  console.log('=== Installing Zig and ZLS master builds ===')
  try {
    const summary = await run(parsed.config)
    const zls = summary.zls
    if (zls && zls.kind !== 'installed') {
      console.error(`Warning: ${zls.warning}`)
      if (zls.hint) {
        console.error(zls.hint)
      }
    }
    for (const line of formatSummary(summary, parsed.config.binDir)) {
      console.log(line)
    }
    return 0
  } catch (e) {
    console.error(`Error: ${errorMessage(e)}`)
    if (e instanceof InstallerError && e.hint) {
      console.error(e.hint)
    }
    return 1
  }
}
