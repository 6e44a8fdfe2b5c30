import { inflateSync } from 'zlib'
import { decodeText, parseExif, parseTiff, type ExifData, type MetadataField } from './exif.js'

export type ImageFormat = 'jpeg' | 'png' | 'gif' | 'tiff' | 'webp'

/**
 * Metadata and layout of an image container
 */
export interface ImageStructure {
  format: ImageFormat
  fields: MetadataField[]
  /** GPS tags present in any EXIF block */
  gpsTags: string[]
  /** Offset just past the end marker; undefined when none was reached */
  endOffset?: number
  /** Keywords of compressed text chunks that failed to inflate */
  undecodable: string[]
}

export const JPEG_MARKERS = {
  SOS: 0xda,
  EOI: 0xd9,
  APP0: 0xe0,
  APP1: 0xe1,
  APP14: 0xee,
  COM: 0xfe
} as const

/** Largest decompressed text chunk */
const MAX_TEXT_LENGTH = 1024 * 1024

const EXIF_HEADER = 'Exif\0\0'

function emptyStructure(format: ImageFormat): ImageStructure {
  return { format, fields: [], gpsTags: [], undecodable: [] }
}

function addExif(structure: ImageStructure, exif: ExifData): void {
  structure.fields.push(...exif.fields)
  structure.gpsTags.push(...exif.gpsTags)
}

/**
 * Markers without a length field: TEM and RST0-7
 */
export function isStandaloneMarker(marker: number): boolean {
  return marker === 0x01 || (marker >= 0xd0 && marker <= 0xd7)
}

/**
 * Offset of the first marker after entropy-coded data, skipping stuffed
 * zero bytes, restart markers and fill bytes
 */
function skipEntropyData(bytes: Buffer, from: number): number | undefined {
  for (let i = from; i + 1 < bytes.length; i++) {
    if (bytes[i] !== 0xff) {
      continue
    }
    const next = bytes[i + 1]
    if (next === 0x00 || next === 0xff || isStandaloneMarker(next)) {
      continue
    }
    return i
  }
  return undefined
}

function walkJpeg(bytes: Buffer): ImageStructure {
  const structure = emptyStructure('jpeg')
  let pos = 2

  while (pos + 1 < bytes.length && bytes[pos] === 0xff) {
    const marker = bytes[pos + 1]
    if (marker === 0xff) {
      pos++
      continue
    }
    if (marker === JPEG_MARKERS.EOI) {
      structure.endOffset = pos + 2
      break
    }
    if (isStandaloneMarker(marker)) {
      pos += 2
      continue
    }
    if (pos + 4 > bytes.length) {
      break
    }

    const end = pos + 2 + bytes.readUInt16BE(pos + 2)
    if (end > bytes.length || end < pos + 4) {
      break
    }
    const data = bytes.subarray(pos + 4, end)

    if (marker === JPEG_MARKERS.APP1 && data.toString('latin1', 0, EXIF_HEADER.length) === EXIF_HEADER) {
      addExif(structure, parseExif(data))
    } else if (marker === JPEG_MARKERS.COM) {
      structure.fields.push({ name: 'Comment', value: decodeText(data) })
    }

    if (marker === JPEG_MARKERS.SOS) {
      const next = skipEntropyData(bytes, end)
      if (next === undefined) {
        break
      }
      pos = next
      continue
    }
    pos = end
  }

  return structure
}

function inflateText(data: Buffer): Buffer {
  return inflateSync(data, { maxOutputLength: MAX_TEXT_LENGTH })
}

function walkPng(bytes: Buffer): ImageStructure {
  const structure = emptyStructure('png')
  let pos = 8

  while (pos + 12 <= bytes.length) {
    const length = bytes.readUInt32BE(pos)
    const type = bytes.toString('latin1', pos + 4, pos + 8)
    const dataEnd = pos + 8 + length
    if (dataEnd + 4 > bytes.length) {
      break
    }
    const data = bytes.subarray(pos + 8, dataEnd)

    if (type === 'IEND') {
      structure.endOffset = dataEnd + 4
      break
    }
    if (type === 'eXIf') {
      addExif(structure, parseExif(data))
    } else if (type === 'tEXt' || type === 'zTXt' || type === 'iTXt') {
      const field = readTextChunk(type, data)
      if (field === undefined) {
        structure.undecodable.push(type)
      } else if ('failed' in field) {
        structure.undecodable.push(field.failed)
      } else {
        structure.fields.push(field)
      }
    }
    pos = dataEnd + 4
  }

  return structure
}

/**
 * Keyword and text of a PNG text chunk. A compressed chunk that fails to
 * inflate is reported by keyword.
 */
function readTextChunk(type: 'tEXt' | 'zTXt' | 'iTXt', data: Buffer): MetadataField | { failed: string } | undefined {
  const separator = data.indexOf(0)
  if (separator <= 0) {
    return undefined
  }
  const name = data.toString('latin1', 0, separator)

  try {
    switch (type) {
      case 'tEXt':
        return { name, value: decodeText(data.subarray(separator + 1)) }
      case 'zTXt':
        return { name, value: decodeText(inflateText(data.subarray(separator + 2))) }
      case 'iTXt': {
        const compressed = data[separator + 1] === 1
        const languageEnd = data.indexOf(0, separator + 3)
        const translatedEnd = languageEnd < 0 ? -1 : data.indexOf(0, languageEnd + 1)
        if (translatedEnd < 0) {
          return undefined
        }
        const text = data.subarray(translatedEnd + 1)
        return { name, value: (compressed ? inflateText(text) : text).toString('utf-8').replace(/\0/g, '').trim() }
      }
    }
  } catch {
    return { failed: name }
  }
}

/**
 * Skip GIF data sub-blocks, returning the offset after the terminator and the
 * concatenated block data
 */
function readSubBlocks(bytes: Buffer, from: number): { next: number; data: Buffer } | undefined {
  const chunks: Buffer[] = []
  let pos = from
  while (pos < bytes.length) {
    const size = bytes[pos]
    if (size === 0) {
      return { next: pos + 1, data: Buffer.concat(chunks) }
    }
    if (pos + 1 + size > bytes.length) {
      return undefined
    }
    chunks.push(bytes.subarray(pos + 1, pos + 1 + size))
    pos += 1 + size
  }
  return undefined
}

function colorTableSize(packed: number): number {
  return (packed & 0x80) !== 0 ? 3 * 2 ** ((packed & 0x07) + 1) : 0
}

function walkGif(bytes: Buffer): ImageStructure {
  const structure = emptyStructure('gif')
  if (bytes.length < 13) {
    return structure
  }
  let pos = 13 + colorTableSize(bytes[10])

  while (pos < bytes.length) {
    const introducer = bytes[pos]
    if (introducer === 0x3b) {
      structure.endOffset = pos + 1
      break
    }

    if (introducer === 0x21) {
      const label = bytes[pos + 1]
      const blocks = readSubBlocks(bytes, pos + 2)
      if (blocks === undefined) {
        break
      }
      if (label === 0xfe) {
        structure.fields.push({ name: 'Comment', value: decodeText(blocks.data) })
      }
      pos = blocks.next
      continue
    }

    if (introducer === 0x2c) {
      if (pos + 10 > bytes.length) {
        break
      }
      // Descriptor, local colour table, LZW code size, then image data
      const dataStart = pos + 10 + colorTableSize(bytes[pos + 9]) + 1
      const blocks = readSubBlocks(bytes, dataStart)
      if (blocks === undefined) {
        break
      }
      pos = blocks.next
      continue
    }

    break
  }

  return structure
}

function walkWebp(bytes: Buffer): ImageStructure {
  const structure = emptyStructure('webp')
  if (bytes.length < 12) {
    return structure
  }
  const riffEnd = 8 + bytes.readUInt32LE(4)
  if (riffEnd <= bytes.length) {
    structure.endOffset = riffEnd
  }

  const limit = Math.min(riffEnd, bytes.length)
  let pos = 12
  while (pos + 8 <= limit) {
    const fourcc = bytes.toString('latin1', pos, pos + 4)
    const size = bytes.readUInt32LE(pos + 4)
    const dataEnd = pos + 8 + size
    if (dataEnd > limit) {
      break
    }
    if (fourcc === 'EXIF') {
      addExif(structure, parseExif(bytes.subarray(pos + 8, dataEnd)))
    }
    pos = dataEnd + (size % 2)
  }

  return structure
}

function walkTiff(bytes: Buffer): ImageStructure {
  const structure = emptyStructure('tiff')
  addExif(structure, parseTiff(bytes))
  return structure
}

const WALKERS: Readonly<Record<string, (bytes: Buffer) => ImageStructure>> = {
  'image/jpeg': walkJpeg,
  'image/png': walkPng,
  'image/apng': walkPng,
  'image/gif': walkGif,
  'image/webp': walkWebp,
  'image/tiff': walkTiff
}

/**
 * Walk the container of a supported image type; undefined for other types
 */
export function readImageStructure(bytes: Buffer, mediaType: string): ImageStructure | undefined {
  const walk = WALKERS[mediaType]
  return walk === undefined ? undefined : walk(bytes)
}
