import { Fetch } from './download'
import { Config, getConfig } from './env'
import { MissingPrerequisite } from './error'
import { createInstaller, SystemInstaller } from './install/system'
import { installZig } from './install/zig'
import { buildZls } from './install/zls'
import { platformKeyToString, resolvePlatform } from './platform'
import { fetchArtifact } from './release'
import { firstLine, hasCommand, spawnRunner, succeeded } from './tool'
import { Host, InstallSummary, Runner } from './type'
import { withWorkDir } from './workdir'

export type RunDeps = {
  host?: Host
  fetch?: Fetch
  runner?: Runner
  installer?: SystemInstaller
  tmpDir?: string
}

export function checkPrerequisites(config: Config, runner: Runner = spawnRunner) {
  if (config.sudo && !hasCommand('sudo', runner)) {
    throw new MissingPrerequisite('sudo', 'Run as root or pass --no-sudo')
  }
}

export async function run(
  config: Config = getConfig(),
  { host, fetch, runner = spawnRunner, installer, tmpDir }: RunDeps = {},
): Promise<InstallSummary> {
  const platform = resolvePlatform(host)
  console.log(`Detected: ${platform.os}-${platform.arch}`)

  checkPrerequisites(config, runner)
  const system = installer ?? createInstaller(config.sudo, runner)

  return withWorkDir(async (workDir) => {
    console.log('')
    console.log(`=== Downloading Zig master build for ${platformKeyToString(platform)} ===`)
    const archive = await fetchArtifact(platform, workDir, {
      indexUrl: config.indexUrl,
      fetch,
    })

    const zig = installZig(archive.path, platform, {
      workDir,
      installer: system,
      installRoot: config.installRoot,
      binDir: config.binDir,
    })
    const ret = runner(zig.linkPath, ['version'])
    const zigVersion = succeeded(ret) ? firstLine(ret.stdout) : undefined
    console.log('Zig installed successfully!')
    if (zigVersion) {
      console.log(zigVersion)
    }

    const summary: InstallSummary = { platform, archive, zig, zigVersion }
    if (config.skipZls) {
      return summary
    }

    console.log('')
    console.log('=== Building ZLS from source ===')
    summary.zls = buildZls({
      zig: zig.linkPath,
      workDir,
      binDir: config.binDir,
      installer: system,
      runner,
    })
    return summary
  }, tmpDir)
}
