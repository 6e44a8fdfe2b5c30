/**
 * Minimal image builders for tests. The files are structurally valid for the
 * metadata walkers; pixel data and checksums are placeholders.
 */

const EXIF_POINTER = 0x8769
const GPS_POINTER = 0x8825

interface TiffEntry {
  tag: number
  type: number
  count: number
  value: Buffer
}

function asciiEntry(tag: number, text: string): TiffEntry {
  return { tag, type: 2, count: text.length + 1, value: Buffer.from(`${text}\0`, 'latin1') }
}

function ifdSize(entries: readonly TiffEntry[]): number {
  return 2 + entries.length * 12 + 4
}

/**
 * Little-endian TIFF block with ASCII tags in IFD0 and the Exif IFD, and
 * placeholder values for the given GPS tags
 */
export function buildTiff(options: {
  ifd0?: Record<number, string>
  exif?: Record<number, string>
  gps?: number[]
}): Buffer {
  const ifd0 = Object.entries(options.ifd0 ?? {}).map(([tag, text]) => asciiEntry(Number(tag), text))
  const exif = options.exif
    ? Object.entries(options.exif).map(([tag, text]) => asciiEntry(Number(tag), text))
    : undefined
  const gps = options.gps?.map(tag => asciiEntry(tag, 'N'))

  const pointers = (exif ? 1 : 0) + (gps ? 1 : 0)
  let cursor = 8 + 2 + (ifd0.length + pointers) * 12 + 4
  const exifOffset = cursor
  cursor += exif ? ifdSize(exif) : 0
  const gpsOffset = cursor
  cursor += gps ? ifdSize(gps) : 0

  const pointer = (tag: number, offset: number): TiffEntry => {
    const value = Buffer.alloc(4)
    value.writeUInt32LE(offset)
    return { tag, type: 4, count: 1, value }
  }
  if (exif) {
    ifd0.push(pointer(EXIF_POINTER, exifOffset))
  }
  if (gps) {
    ifd0.push(pointer(GPS_POINTER, gpsOffset))
  }

  const values: Buffer[] = []
  const encode = (entries: readonly TiffEntry[]): Buffer => {
    const block = Buffer.alloc(ifdSize(entries))
    block.writeUInt16LE(entries.length, 0)
    entries.forEach((entry, index) => {
      const at = 2 + index * 12
      block.writeUInt16LE(entry.tag, at)
      block.writeUInt16LE(entry.type, at + 2)
      block.writeUInt32LE(entry.count, at + 4)
      if (entry.value.length <= 4) {
        entry.value.copy(block, at + 8)
      } else {
        block.writeUInt32LE(cursor, at + 8)
        values.push(entry.value)
        cursor += entry.value.length
      }
    })
    return block
  }

  const blocks = [encode(ifd0)]
  if (exif) {
    blocks.push(encode(exif))
  }
  if (gps) {
    blocks.push(encode(gps))
  }
  const header = Buffer.from([0x49, 0x49, 0x2a, 0x00, 0x08, 0x00, 0x00, 0x00])
  return Buffer.concat([header, ...blocks, ...values])
}

/**
 * Marker segment with its length field
 */
export function jpegSegment(marker: number, payload: Buffer): Buffer {
  const header = Buffer.from([0xff, marker, 0, 0])
  header.writeUInt16BE(payload.length + 2, 2)
  return Buffer.concat([header, payload])
}

export const JFIF_SEGMENT = jpegSegment(
  0xe0,
  Buffer.from([0x4a, 0x46, 0x49, 0x46, 0x00, 0x01, 0x01, 0x00, 0x00, 0x01, 0x00, 0x01, 0x00, 0x00])
)

/** Scan header for one component */
const SOS_SEGMENT = jpegSegment(0xda, Buffer.from([0x01, 0x01, 0x00, 0x00, 0x3f, 0x00]))

/** Entropy-coded bytes with a stuffed 0xFF and a restart marker */
const ENTROPY = Buffer.from([0x12, 0x34, 0xff, 0x00, 0x56, 0xff, 0xd0, 0x78])

export function buildJpeg(options: { segments?: Buffer[]; trailing?: Buffer } = {}): Buffer {
  return Buffer.concat([
    Buffer.from([0xff, 0xd8]),
    JFIF_SEGMENT,
    ...(options.segments ?? []),
    SOS_SEGMENT,
    ENTROPY,
    Buffer.from([0xff, 0xd9]),
    options.trailing ?? Buffer.alloc(0)
  ])
}

export function exifSegment(tiff: Buffer): Buffer {
  return jpegSegment(0xe1, Buffer.concat([Buffer.from('Exif\0\0', 'latin1'), tiff]))
}

export function commentSegment(text: string): Buffer {
  return jpegSegment(0xfe, Buffer.from(text, 'latin1'))
}

export const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])

/**
 * Chunk with a zero checksum
 */
export function pngChunk(type: string, data: Buffer): Buffer {
  const header = Buffer.alloc(8)
  header.writeUInt32BE(data.length, 0)
  header.write(type, 4, 'latin1')
  return Buffer.concat([header, data, Buffer.alloc(4)])
}

export function textChunk(keyword: string, text: string): Buffer {
  return pngChunk('tEXt', Buffer.from(`${keyword}\0${text}`, 'latin1'))
}

export function buildPng(options: { chunks?: Buffer[]; trailing?: Buffer } = {}): Buffer {
  const ihdr = Buffer.alloc(13)
  ihdr.writeUInt32BE(1, 0)
  ihdr.writeUInt32BE(1, 4)
  ihdr[8] = 8
  ihdr[9] = 2
  return Buffer.concat([
    PNG_SIGNATURE,
    pngChunk('IHDR', ihdr),
    ...(options.chunks ?? []),
    pngChunk('IDAT', Buffer.from([0x78, 0x9c, 0x63, 0x00, 0x00])),
    pngChunk('IEND', Buffer.alloc(0)),
    options.trailing ?? Buffer.alloc(0)
  ])
}

export function buildGif(options: { comment?: string; trailing?: Buffer } = {}): Buffer {
  const parts: Buffer[] = [
    Buffer.from('GIF89a', 'latin1'),
    // 1x1 screen, two-entry global colour table
    Buffer.from([0x01, 0x00, 0x01, 0x00, 0x80, 0x00, 0x00]),
    Buffer.from([0x00, 0x00, 0x00, 0xff, 0xff, 0xff])
  ]
  if (options.comment !== undefined) {
    const text = Buffer.from(options.comment, 'latin1')
    parts.push(Buffer.from([0x21, 0xfe, text.length]), text, Buffer.from([0x00]))
  }
  parts.push(
    Buffer.from([0x2c, 0x00, 0x00, 0x00, 0x00, 0x01, 0x00, 0x01, 0x00, 0x00]),
    Buffer.from([0x02, 0x02, 0x44, 0x01, 0x00]),
    Buffer.from([0x3b]),
    options.trailing ?? Buffer.alloc(0)
  )
  return Buffer.concat(parts)
}
