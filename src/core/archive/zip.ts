import { inflateRawSync } from 'zlib'
import { MalformedArchiveError, type ArchiveEntry } from './types.js'

const EOCD_SIGNATURE = 0x06054b50
const ZIP64_LOCATOR_SIGNATURE = 0x07064b50
const ZIP64_EOCD_SIGNATURE = 0x06064b50
const CENTRAL_SIGNATURE = 0x02014b50
const LOCAL_SIGNATURE = 0x04034b50

const EOCD_LENGTH = 22
const ZIP64_LOCATOR_LENGTH = 20
const ZIP64_EOCD_LENGTH = 56
const CENTRAL_HEADER_LENGTH = 46
const LOCAL_HEADER_LENGTH = 30
const MAX_COMMENT_LENGTH = 0xffff

const ZIP64_EXTRA_ID = 0x0001
const U16_SENTINEL = 0xffff
const U32_SENTINEL = 0xffffffff

const FLAG_ENCRYPTED = 0x0001
const FLAG_UTF8 = 0x0800

const METHOD_STORED = 0
const METHOD_DEFLATED = 8

export interface ZipEntry extends ArchiveEntry {
  method: number
  encrypted: boolean
  localHeaderOffset: number
}

/**
 * Location of the central directory, from the end records
 */
export interface ZipDirectory {
  /** Entry count the end record declares */
  declaredCount: number
  offset: number
  size: number
}

function readU64(buffer: Buffer, offset: number): number {
  return Number(buffer.readBigUInt64LE(offset))
}

function findEndRecord(content: Buffer): number {
  const lowest = Math.max(0, content.length - EOCD_LENGTH - MAX_COMMENT_LENGTH)
  for (let at = content.length - EOCD_LENGTH; at >= lowest; at--) {
    if (content.readUInt32LE(at) === EOCD_SIGNATURE) {
      return at
    }
  }
  throw new MalformedArchiveError('End of central directory not found')
}

/**
 * Read the end-of-central-directory record, following the ZIP64 locator when
 * a field is saturated
 */
export function readZipDirectory(content: Buffer): ZipDirectory {
  const end = findEndRecord(content)
  const directory: ZipDirectory = {
    declaredCount: content.readUInt16LE(end + 10),
    size: content.readUInt32LE(end + 12),
    offset: content.readUInt32LE(end + 16)
  }

  const saturated = directory.declaredCount === U16_SENTINEL ||
    directory.size === U32_SENTINEL ||
    directory.offset === U32_SENTINEL
  const locator = end - ZIP64_LOCATOR_LENGTH
  if (saturated && locator >= 0 && content.readUInt32LE(locator) === ZIP64_LOCATOR_SIGNATURE) {
    const record = readU64(content, locator + 8)
    if (record + ZIP64_EOCD_LENGTH > content.length || content.readUInt32LE(record) !== ZIP64_EOCD_SIGNATURE) {
      throw new MalformedArchiveError('Invalid ZIP64 end of central directory')
    }
    directory.declaredCount = readU64(content, record + 32)
    directory.size = readU64(content, record + 40)
    directory.offset = readU64(content, record + 48)
  }

  if (directory.offset + directory.size > content.length) {
    throw new MalformedArchiveError('Central directory lies outside the archive')
  }
  return directory
}

interface EntrySizes {
  uncompressedSize: number
  compressedSize: number
  localHeaderOffset: number
}

/**
 * Replace saturated 32-bit fields with their ZIP64 extra field values, which
 * appear in this order and only for saturated fields
 */
function applyZip64Extra(extra: Buffer, sizes: EntrySizes): EntrySizes {
  let pos = 0
  while (pos + 4 <= extra.length) {
    const id = extra.readUInt16LE(pos)
    const length = extra.readUInt16LE(pos + 2)
    const end = Math.min(pos + 4 + length, extra.length)
    if (id === ZIP64_EXTRA_ID) {
      const result = { ...sizes }
      let field = pos + 4
      for (const key of ['uncompressedSize', 'compressedSize', 'localHeaderOffset'] as const) {
        if (sizes[key] === U32_SENTINEL && field + 8 <= end) {
          result[key] = readU64(extra, field)
          field += 8
        }
      }
      return result
    }
    pos = end
  }
  return sizes
}

/**
 * Entries of the central directory, in stored order
 */
export function* readZipEntries(content: Buffer, directory: ZipDirectory): Generator<ZipEntry> {
  const records = content.subarray(directory.offset, directory.offset + directory.size)
  let pos = 0

  while (pos + CENTRAL_HEADER_LENGTH <= records.length) {
    if (records.readUInt32LE(pos) !== CENTRAL_SIGNATURE) {
      throw new MalformedArchiveError('Invalid central directory header')
    }
    const flags = records.readUInt16LE(pos + 8)
    const nameEnd = pos + CENTRAL_HEADER_LENGTH + records.readUInt16LE(pos + 28)
    const extraEnd = nameEnd + records.readUInt16LE(pos + 30)
    const next = extraEnd + records.readUInt16LE(pos + 32)
    if (next > records.length) {
      throw new MalformedArchiveError('Truncated central directory entry')
    }

    const name = records.toString((flags & FLAG_UTF8) !== 0 ? 'utf-8' : 'latin1', pos + CENTRAL_HEADER_LENGTH, nameEnd)
    const sizes = applyZip64Extra(records.subarray(nameEnd, extraEnd), {
      compressedSize: records.readUInt32LE(pos + 20),
      uncompressedSize: records.readUInt32LE(pos + 24),
      localHeaderOffset: records.readUInt32LE(pos + 42)
    })

    yield {
      name,
      directory: name.endsWith('/') || name.endsWith('\\'),
      method: records.readUInt16LE(pos + 10),
      encrypted: (flags & FLAG_ENCRYPTED) !== 0,
      ...sizes
    }
    pos = next
  }
}

/**
 * Decompressed bytes of one member, refusing output beyond `limit`
 */
export function readZipMember(content: Buffer, entry: ZipEntry, limit: number): Buffer {
  const header = entry.localHeaderOffset
  if (header + LOCAL_HEADER_LENGTH > content.length || content.readUInt32LE(header) !== LOCAL_SIGNATURE) {
    throw new MalformedArchiveError(`Invalid local header for ${entry.name}`)
  }
  if (entry.encrypted) {
    throw new MalformedArchiveError(`Encrypted member ${entry.name}`)
  }

  const start = header + LOCAL_HEADER_LENGTH + content.readUInt16LE(header + 26) + content.readUInt16LE(header + 28)
  const data = content.subarray(start, start + entry.compressedSize)
  if (data.length < entry.compressedSize) {
    throw new MalformedArchiveError(`Truncated member ${entry.name}`)
  }

  switch (entry.method) {
    case METHOD_STORED:
      if (data.length > limit) {
        throw new MalformedArchiveError(`Member ${entry.name} exceeds ${limit} bytes`)
      }
      return data
    case METHOD_DEFLATED:
      return inflateRawSync(data, { maxOutputLength: limit })
    default:
      throw new MalformedArchiveError(`Unsupported compression method ${entry.method} for ${entry.name}`)
  }
}
