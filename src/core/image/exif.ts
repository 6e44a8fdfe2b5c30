/**
 * Minimal TIFF/EXIF reader: walks IFD0, the Exif IFD and the GPS IFD and
 * returns the text-bearing tags. Numeric values are not decoded.
 */

/**
 * One decoded metadata value
 */
export interface MetadataField {
  name: string
  value: string
}

export interface ExifData {
  fields: MetadataField[]
  /** Names of GPS tags present */
  gpsTags: string[]
}

const IFD0_TAGS: Readonly<Record<number, string>> = {
  0x000b: 'ProcessingSoftware',
  0x010d: 'DocumentName',
  0x010e: 'ImageDescription',
  0x010f: 'Make',
  0x0110: 'Model',
  0x0131: 'Software',
  0x0132: 'DateTime',
  0x013b: 'Artist',
  0x013c: 'HostComputer',
  0x8298: 'Copyright',
  0x9c9b: 'XPTitle',
  0x9c9c: 'XPComment',
  0x9c9d: 'XPAuthor',
  0x9c9e: 'XPKeywords',
  0x9c9f: 'XPSubject'
}

const EXIF_TAGS: Readonly<Record<number, string>> = {
  0x9003: 'DateTimeOriginal',
  0x9286: 'UserComment',
  0xa430: 'CameraOwnerName',
  0xa431: 'BodySerialNumber'
}

const GPS_TAGS: Readonly<Record<number, string>> = {
  0x0001: 'GPSLatitudeRef',
  0x0002: 'GPSLatitude',
  0x0003: 'GPSLongitudeRef',
  0x0004: 'GPSLongitude',
  0x0005: 'GPSAltitudeRef',
  0x0006: 'GPSAltitude',
  0x0007: 'GPSTimeStamp',
  0x001d: 'GPSDateStamp'
}

const EXIF_POINTER = 0x8769
const GPS_POINTER = 0x8825

/** Bytes per value of each TIFF field type */
const TYPE_SIZES: Readonly<Record<number, number>> = {
  1: 1, 2: 1, 3: 2, 4: 4, 5: 8, 6: 1, 7: 1, 8: 2, 9: 4, 10: 8, 11: 4, 12: 8
}

const TEXT_TYPES = new Set([1, 2, 7])

/** Upper bound on entries read from one directory */
const MAX_ENTRIES = 512

const EXIF_HEADER = Buffer.from('Exif\0\0', 'latin1')

interface IfdEntry {
  tag: number
  type: number
  count: number
  /** Offset of the value, inline or out of line */
  valueOffset: number
}

class TiffReader {
  constructor(
    private readonly bytes: Buffer,
    private readonly littleEndian: boolean
  ) {}

  u16(offset: number): number | undefined {
    if (offset < 0 || offset + 2 > this.bytes.length) {
      return undefined
    }
    return this.littleEndian ? this.bytes.readUInt16LE(offset) : this.bytes.readUInt16BE(offset)
  }

  u32(offset: number): number | undefined {
    if (offset < 0 || offset + 4 > this.bytes.length) {
      return undefined
    }
    return this.littleEndian ? this.bytes.readUInt32LE(offset) : this.bytes.readUInt32BE(offset)
  }

  entries(ifdOffset: number): IfdEntry[] {
    const count = this.u16(ifdOffset)
    if (count === undefined) {
      return []
    }

    const entries: IfdEntry[] = []
    for (let i = 0; i < Math.min(count, MAX_ENTRIES); i++) {
      const at = ifdOffset + 2 + i * 12
      const tag = this.u16(at)
      const type = this.u16(at + 2)
      const valueCount = this.u32(at + 4)
      if (tag === undefined || type === undefined || valueCount === undefined) {
        break
      }
      const size = (TYPE_SIZES[type] ?? 1) * valueCount
      const valueOffset = size <= 4 ? at + 8 : this.u32(at + 8)
      if (valueOffset === undefined) {
        break
      }
      entries.push({ tag, type, count: valueCount, valueOffset })
    }
    return entries
  }

  text(entry: IfdEntry): string | undefined {
    if (!TEXT_TYPES.has(entry.type)) {
      return undefined
    }
    const end = Math.min(entry.valueOffset + entry.count, this.bytes.length)
    if (entry.valueOffset >= end) {
      return undefined
    }
    return decodeText(this.bytes.subarray(entry.valueOffset, end))
  }
}

/**
 * Byte string as text: latin1 with NULs removed, so UCS-2 and charset-prefixed
 * values still expose their ASCII content
 */
export function decodeText(bytes: Buffer): string {
  return bytes.toString('latin1').replace(/\0/g, '').trim()
}

/**
 * Read a TIFF structure (as found in EXIF segments and TIFF files). Malformed
 * input yields whatever was readable before the fault.
 */
export function parseTiff(bytes: Buffer): ExifData {
  const data: ExifData = { fields: [], gpsTags: [] }
  if (bytes.length < 8) {
    return data
  }

  const order = bytes.toString('latin1', 0, 2)
  if (order !== 'II' && order !== 'MM') {
    return data
  }
  const reader = new TiffReader(bytes, order === 'II')
  if (reader.u16(2) !== 42) {
    return data
  }

  const visited = new Set<number>()
  const walk = (offset: number | undefined, names: Readonly<Record<number, string>>, gps: boolean): void => {
    if (offset === undefined || offset === 0 || visited.has(offset)) {
      return
    }
    visited.add(offset)

    for (const entry of reader.entries(offset)) {
      if (entry.tag === EXIF_POINTER && !gps) {
        walk(reader.u32(entry.valueOffset), EXIF_TAGS, false)
        continue
      }
      if (entry.tag === GPS_POINTER && !gps) {
        walk(reader.u32(entry.valueOffset), GPS_TAGS, true)
        continue
      }

      const name = names[entry.tag]
      if (name === undefined) {
        continue
      }
      if (gps) {
        data.gpsTags.push(name)
        continue
      }
      const value = reader.text(entry)
      if (value !== undefined && value.length > 0) {
        data.fields.push({ name, value })
      }
    }
  }

  walk(reader.u32(4), IFD0_TAGS, false)
  return data
}

/**
 * Parse an EXIF payload, with or without its "Exif\0\0" header
 */
export function parseExif(payload: Buffer): ExifData {
  const body = payload.subarray(0, EXIF_HEADER.length).equals(EXIF_HEADER)
    ? payload.subarray(EXIF_HEADER.length)
    : payload
  return parseTiff(body)
}
