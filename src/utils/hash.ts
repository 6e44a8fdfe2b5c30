import { createHash } from 'crypto'
import { createReadStream } from 'fs'
import { pipeline } from 'stream/promises'

/**
 * SHA-256 digest of a file, streamed so large uploads are never buffered whole
 */
export async function hashFile(filePath: string): Promise<string> {
  const hash = createHash('sha256')
  await pipeline(createReadStream(filePath), hash)
  return hash.digest('hex')
}

const UNITS = ['B', 'KB', 'MB', 'GB', 'TB']

/**
 * Human-readable byte count: 1536 -> "1.5 KB"
 */
export function formatBytes(bytes: number): string {
  let value = bytes
  let unit = 0
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024
    unit++
  }
  return unit === 0 ? `${value} ${UNITS[unit]}` : `${Number(value.toFixed(2))} ${UNITS[unit]}`
}
