import { humanSize } from '@easy-install/easy-archive'
import { join } from 'path'
import { z } from 'zod'
import { INDEX_URL, MASTER_CHANNEL } from './const'
import { downloadText, downloadToFile, Fetch } from './download'
import { ArtifactNotFound, DownloadError, MalformedIndex } from './error'
import { platformKeyToString } from './platform'
import { getUrlFilename } from './tool'
import { ArtifactDescriptor, LocalArchive, PlatformKey } from './type'

export const ReleaseIndexSchema = z.record(z.string(), z.unknown())
const ChannelSchema = z.record(z.string(), z.unknown())
const DescriptorSchema = z.object({
  tarball: z.string().nullish(),
  size: z.union([z.string(), z.number()]).nullish(),
})

export type ReleaseIndex = z.infer<typeof ReleaseIndexSchema>

export function parseReleaseIndex(text: string): ReleaseIndex {
  let json: unknown
  try {
    json = JSON.parse(text)
  } catch (e) {
    throw new MalformedIndex(e instanceof Error ? e.message : String(e))
  }
  const ret = ReleaseIndexSchema.safeParse(json)
  if (!ret.success) {
    throw new MalformedIndex('expected an object keyed by channel')
  }
  return ret.data
}

function getChannel(index: ReleaseIndex): Record<string, unknown> | undefined {
  if (!Object.hasOwn(index, MASTER_CHANNEL)) return
  const ret = ChannelSchema.safeParse(index[MASTER_CHANNEL])
  return ret.success ? ret.data : undefined
}

export function getMasterVersion(index: ReleaseIndex): string | undefined {
  const version = getChannel(index)?.version
  return typeof version === 'string' ? version : undefined
}

function parseSize(size: string | number | null | undefined) {
  const n = Number(size)
  return size !== null && size !== undefined && Number.isFinite(n) && n > 0
    ? n
    : undefined
}

export function getArtifact(
  index: ReleaseIndex,
  key: PlatformKey,
): ArtifactDescriptor {
  const name = platformKeyToString(key)
  const channel = getChannel(index)
  if (!channel || !Object.hasOwn(channel, name)) {
    throw new ArtifactNotFound(name)
  }
  const desc = DescriptorSchema.safeParse(channel[name])
  const url = desc.success ? desc.data.tarball?.trim() : undefined
  if (!desc.success || !url || url === 'null') {
    throw new ArtifactNotFound(name)
  }
  const filename = getUrlFilename(url)
  if (!filename) {
    throw new ArtifactNotFound(name)
  }
  return { url, filename, size: parseSize(desc.data.size) }
}

export type FetchOptions = {
  indexUrl?: string
  fetch?: Fetch
}

export async function fetchArtifact(
  key: PlatformKey,
  workDir: string,
  { indexUrl = INDEX_URL, fetch: fetcher = fetch }: FetchOptions = {},
): Promise<LocalArchive> {
  console.log('Fetching latest build information...')
  const index = parseReleaseIndex(await downloadText(indexUrl, fetcher))
  const version = getMasterVersion(index)
  const { url, filename, size: expected } = getArtifact(index, key)

  console.log(`Downloading from: ${url}`)
  const { path, size } = await downloadToFile(
    url,
    join(workDir, filename),
    fetcher,
  )
  if (expected !== undefined && expected !== size) {
    throw new DownloadError(
      `Incomplete download of ${filename}: expected ${expected} bytes, got ${size}`,
      url,
    )
  }
  console.log(
    `Downloaded ${filename} (${humanSize(size)})${
      version ? ` for ${version}` : ''
    }`,
  )
  return { path, size, url, version }
}
