import { JPEG_MARKERS, isStandaloneMarker, readImageStructure } from './structure.js'

/** PNG chunks carrying text, EXIF or timestamps */
const PNG_METADATA_CHUNKS = new Set(['tEXt', 'iTXt', 'zTXt', 'eXIf', 'tIME'])

/**
 * APPn segments other than the JFIF and Adobe headers decoders rely on, and
 * comments
 */
function isMetadataSegment(marker: number, data: Buffer): boolean {
  if (marker === JPEG_MARKERS.COM) {
    return true
  }
  if (marker < JPEG_MARKERS.APP0 || marker > 0xef) {
    return false
  }
  if (marker === JPEG_MARKERS.APP0 && data.toString('latin1', 0, 5) === 'JFIF\0') {
    return false
  }
  return !(marker === JPEG_MARKERS.APP14 && data.toString('latin1', 0, 5) === 'Adobe')
}

function stripJpeg(bytes: Buffer): Buffer | undefined {
  const end = readImageStructure(bytes, 'image/jpeg')?.endOffset
  if (end === undefined) {
    return undefined
  }

  const kept: Buffer[] = [bytes.subarray(0, 2)]
  let pos = 2
  while (pos + 1 < end && bytes[pos] === 0xff) {
    const marker = bytes[pos + 1]
    if (marker === 0xff) {
      pos++
      continue
    }
    if (marker === JPEG_MARKERS.SOS) {
      // Scan data and everything after it is copied through the end marker
      kept.push(bytes.subarray(pos, end))
      return Buffer.concat(kept)
    }
    if (isStandaloneMarker(marker)) {
      kept.push(bytes.subarray(pos, pos + 2))
      pos += 2
      continue
    }
    const segmentEnd = pos + 2 + bytes.readUInt16BE(pos + 2)
    if (!isMetadataSegment(marker, bytes.subarray(pos + 4, segmentEnd))) {
      kept.push(bytes.subarray(pos, segmentEnd))
    }
    pos = segmentEnd
  }
  return undefined
}

function stripPng(bytes: Buffer): Buffer | undefined {
  const end = readImageStructure(bytes, 'image/png')?.endOffset
  if (end === undefined) {
    return undefined
  }

  const kept: Buffer[] = [bytes.subarray(0, 8)]
  let pos = 8
  while (pos < end) {
    const chunkEnd = pos + 12 + bytes.readUInt32BE(pos)
    const type = bytes.toString('latin1', pos + 4, pos + 8)
    if (!PNG_METADATA_CHUNKS.has(type)) {
      kept.push(bytes.subarray(pos, chunkEnd))
    }
    pos = chunkEnd
  }
  return Buffer.concat(kept)
}

/**
 * Copy of a JPEG or PNG without its descriptive metadata and without anything
 * after the end marker. Undefined for other types and unreadable structures.
 */
export function stripMetadata(bytes: Buffer, mediaType: string): Buffer | undefined {
  switch (mediaType) {
    case 'image/jpeg':
      return stripJpeg(bytes)
    case 'image/png':
      return stripPng(bytes)
    default:
      return undefined
  }
}
