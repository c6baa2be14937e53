import { dirname } from 'path'
import { existsSync, mkdirSync, writeFileSync } from 'fs'
import { NAME, VERSION } from './const'
import { DownloadError, errorMessage } from './error'

export type Fetch = typeof fetch

export function getFetchOption(): RequestInit {
  return {
    headers: {
      'User-Agent': `${NAME}/${VERSION}`,
      Connection: 'close',
    },
  }
}

async function request(url: string, fetcher: Fetch): Promise<Response> {
  let response: Response
  try {
    response = await fetcher(url, getFetchOption())
  } catch (e) {
    throw new DownloadError(`Network error: ${errorMessage(e)}`, url)
  }
  if (!response.ok) {
    throw new DownloadError(
      `Failed to download ${url}: ${response.status} ${response.statusText}`,
      url,
      response.status,
    )
  }
  return response
}

export async function downloadText(
  url: string,
  fetcher: Fetch = fetch,
): Promise<string> {
  const response = await request(url, fetcher)
  return await response.text()
}

export async function downloadToFile(
  url: string,
  outputPath: string,
  fetcher: Fetch = fetch,
): Promise<{ path: string; size: number }> {
  const response = await request(url, fetcher)
  let buf: ArrayBuffer
  try {
    buf = await response.arrayBuffer()
  } catch (e) {
    throw new DownloadError(
      `Failed to read response from ${url}: ${errorMessage(e)}`,
      url,
    )
  }
  const dir = dirname(outputPath)
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true })
  }
  writeFileSync(outputPath, Buffer.from(buf))
  return { path: outputPath, size: buf.byteLength }
}
