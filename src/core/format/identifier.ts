import { open } from 'fs/promises'
import { fileTypeFromBuffer } from 'file-type'
import type { ScanPolicy } from '../../types/policy.js'
import { createLogger, type Logger } from '../../utils/logger.js'
import { errorMessage } from '../../utils/errors.js'
import {
  BUILTIN_SIGNATURES,
  PREFIX_LENGTH,
  matchesSignature,
  orderSignatures,
  toSignatureEntry,
  type SignatureEntry
} from './signatures.js'

export const UNKNOWN_MEDIA_TYPE = 'unknown'

export const OFFICE_MEDIA_TYPES = {
  word: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  spreadsheet: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  presentation: 'application/vnd.openxmlformats-officedocument.presentationml.presentation'
} as const

const RIFF_FORMS: Readonly<Record<string, string>> = {
  'WEBP': 'image/webp',
  'AVI ': 'video/x-msvideo',
  'WAVE': 'audio/wav'
}

const FTYP_BRANDS: Readonly<Record<string, string>> = {
  'isom': 'video/mp4',
  'iso2': 'video/mp4',
  'mp41': 'video/mp4',
  'mp42': 'video/mp4',
  'avc1': 'video/mp4',
  'qt  ': 'video/quicktime',
  'M4A ': 'audio/mp4',
  'M4B ': 'audio/mp4',
  'M4V ': 'video/x-m4v',
  'avif': 'image/avif',
  'avis': 'image/avif',
  'heic': 'image/heic',
  'heix': 'image/heic',
  'hevc': 'image/heic',
  'mif1': 'image/heif',
  'msf1': 'image/heif',
  '3gp4': 'video/3gpp',
  '3gp5': 'video/3gpp',
  '3gp6': 'video/3gpp'
}

/** Local header (30 bytes) + the eight-byte name "mimetype" */
const ZIP_MIMETYPE_ENTRY = 38

const PACKAGE_MEDIA_TYPE = /^(?:application\/vnd\.oasis\.opendocument\.[a-z.-]+|application\/epub\+zip)$/

export interface FormatIdentifierOptions {
  /** Replaces the built-in table */
  signatures?: readonly SignatureEntry[]
  logger?: Logger
}

/**
 * Classifies content by its magic bytes, never by its name.
 *
 * Policy signatures are tried before the table; container formats that share
 * a signature (ZIP, RIFF, ISO-BMFF, XML) are refined from the same prefix.
 */
export class FormatIdentifier {
  private readonly signatures: readonly SignatureEntry[]
  private readonly logger: Logger

  constructor(options: FormatIdentifierOptions = {}) {
    this.signatures = options.signatures ? orderSignatures(options.signatures) : BUILTIN_SIGNATURES
    this.logger = options.logger ?? createLogger('format')
  }

  /**
   * Media type of a content prefix, or "unknown". Never throws.
   */
  async identify(prefix: Uint8Array, policy?: ScanPolicy): Promise<string> {
    const bytes = Buffer.from(prefix.buffer, prefix.byteOffset, prefix.byteLength)

    for (const entry of this.candidates(policy)) {
      if (matchesSignature(bytes, entry)) {
        return this.refine(bytes, entry)
      }
    }

    return markupMediaType(bytes) ?? this.sniff(bytes)
  }

  /**
   * Read the leading bytes of a file and identify them
   */
  async identifyFile(path: string, policy?: ScanPolicy): Promise<string> {
    return this.identify(await readPrefix(path), policy)
  }

  private candidates(policy?: ScanPolicy): readonly SignatureEntry[] {
    const custom = policy?.mime.custom_signatures ?? []
    if (custom.length === 0) {
      return this.signatures
    }
    return [
      ...custom.map(sig => toSignatureEntry(sig.signature, sig.media_type, sig.offset)),
      ...this.signatures
    ]
  }

  private refine(bytes: Buffer, entry: SignatureEntry): string {
    switch (entry.refine) {
      case 'zip':
        return refineZip(bytes) ?? entry.mediaType
      case 'riff':
        return RIFF_FORMS[bytes.toString('latin1', 8, 12)] ?? entry.mediaType
      case 'ftyp':
        return FTYP_BRANDS[bytes.toString('latin1', 8, 12)] ?? entry.mediaType
      case 'xml':
        return bytes.includes('<svg') ? 'image/svg+xml' : entry.mediaType
      case 'text':
        return markupMediaType(bytes) ?? entry.mediaType
      default:
        return entry.mediaType
    }
  }

  private async sniff(bytes: Buffer): Promise<string> {
    try {
      const result = await fileTypeFromBuffer(bytes)
      return result?.mime ?? UNKNOWN_MEDIA_TYPE
    } catch (error) {
      this.logger.debug(`Content sniffing failed: ${errorMessage(error)}`)
      return UNKNOWN_MEDIA_TYPE
    }
  }
}

const SVG_TAG = /<svg[\s>/]/i

/**
 * Whether markup content opens an `<svg` element anywhere in the window
 */
export function containsSvgRoot(bytes: Uint8Array): boolean {
  return SVG_TAG.test(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1'))
}

/**
 * SVG whose prolog does not start with `<?xml` or `<svg`: a byte order mark,
 * whitespace, comments, processing instructions or a DOCTYPE may come first
 */
export function markupMediaType(bytes: Uint8Array): string | undefined {
  const text = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('utf-8')
  let offset = text.charCodeAt(0) === 0xfeff ? 1 : 0

  for (;;) {
    while (offset < text.length && /\s/.test(text.charAt(offset))) {
      offset++
    }

    if (text.startsWith('<!--', offset)) {
      const end = text.indexOf('-->', offset + 4)
      if (end < 0) {
        return undefined
      }
      offset = end + 3
    } else if (text.startsWith('<?', offset)) {
      const end = text.indexOf('?>', offset + 2)
      if (end < 0) {
        return undefined
      }
      offset = end + 2
    } else {
      break
    }
  }

  const rest = text.slice(offset)
  if (/^<svg[\s>/]/i.test(rest) || /^<!DOCTYPE\s+svg\b/i.test(rest)) {
    return 'image/svg+xml'
  }
  // Any other DOCTYPE: the root element may follow its internal subset
  if (/^<!DOCTYPE\s/i.test(rest) && SVG_TAG.test(rest)) {
    return 'image/svg+xml'
  }
  return undefined
}

/**
 * Identify the document type stored in a ZIP from the entry names visible in
 * its first bytes
 */
function refineZip(bytes: Buffer): string | undefined {
  const packaged = readPackageMimetype(bytes)
  if (packaged !== undefined) {
    return packaged
  }

  const window = bytes.toString('latin1')

  if (window.includes('[Content_Types].xml')) {
    if (window.includes('word/')) {
      return OFFICE_MEDIA_TYPES.word
    }
    if (window.includes('xl/')) {
      return OFFICE_MEDIA_TYPES.spreadsheet
    }
    if (window.includes('ppt/')) {
      return OFFICE_MEDIA_TYPES.presentation
    }
  }

  if (window.includes('META-INF/MANIFEST.MF')) {
    return 'application/java-archive'
  }

  return undefined
}

/**
 * OpenDocument and EPUB packages store their media type uncompressed as the
 * first entry, named "mimetype"
 */
function readPackageMimetype(bytes: Buffer): string | undefined {
  if (bytes.length < ZIP_MIMETYPE_ENTRY || bytes.toString('latin1', 30, 38) !== 'mimetype') {
    return undefined
  }

  const size = bytes.readUInt32LE(18)
  const start = ZIP_MIMETYPE_ENTRY + bytes.readUInt16LE(28)
  const declared = bytes.toString('latin1', start, Math.min(start + size, bytes.length))

  return PACKAGE_MEDIA_TYPE.test(declared) ? declared : undefined
}

/**
 * Read up to PREFIX_LENGTH bytes; the handle is closed on every path
 */
export async function readPrefix(path: string, length = PREFIX_LENGTH): Promise<Buffer> {
  const handle = await open(path, 'r')
  try {
    const buffer = Buffer.alloc(length)
    const { bytesRead } = await handle.read(buffer, 0, length, 0)
    return buffer.subarray(0, bytesRead)
  } finally {
    await handle.close()
  }
}
