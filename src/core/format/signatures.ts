import { z } from 'zod'
import { loadDataFile } from '../../utils/data.js'

/**
 * Refinement applied when a signature names an ambiguous container
 */
export type RefinementRule = 'zip' | 'riff' | 'ftyp' | 'xml' | 'text'

export interface SignatureEntry {
  /** Lower-case hex of the magic bytes */
  readonly signature: string
  readonly mediaType: string
  /** Byte offset at which the signature starts */
  readonly offset: number
  readonly refine?: RefinementRule
  /** Decoded magic bytes */
  readonly bytes: Buffer
}

const SignatureFileSchema = z.array(z.object({
  signature: z.string().regex(/^(?:[0-9a-f]{2})+$/),
  mediaType: z.string().min(1),
  offset: z.number().int().min(0).default(0),
  refine: z.enum(['zip', 'riff', 'ftyp', 'xml', 'text']).optional()
}))

export function toSignatureEntry(
  signature: string,
  mediaType: string,
  offset = 0,
  refine?: RefinementRule
): SignatureEntry {
  return Object.freeze({
    signature,
    mediaType,
    offset,
    refine,
    bytes: Buffer.from(signature, 'hex')
  })
}

/**
 * Longest pattern first; entries of equal length keep their file order, so
 * a specific prefix (DOS MZ header) wins over a generic one (MZ).
 */
export function orderSignatures(entries: readonly SignatureEntry[]): SignatureEntry[] {
  return entries
    .map((entry, index) => ({ entry, index }))
    .sort((a, b) => b.entry.bytes.length - a.entry.bytes.length || a.index - b.index)
    .map(({ entry }) => entry)
}

/**
 * Built-in signature table, ordered for matching
 */
export const BUILTIN_SIGNATURES: readonly SignatureEntry[] = Object.freeze(
  orderSignatures(
    loadDataFile('signatures.json', SignatureFileSchema).map(raw =>
      toSignatureEntry(raw.signature, raw.mediaType, raw.offset, raw.refine)
    )
  )
)

/**
 * Number of leading bytes the identifier reads
 */
export const PREFIX_LENGTH = 4096

/**
 * True when the signature bytes sit at their offset inside `prefix`
 */
export function matchesSignature(prefix: Uint8Array, entry: SignatureEntry): boolean {
  const end = entry.offset + entry.bytes.length
  if (prefix.length < end) {
    return false
  }
  return Buffer.from(prefix.buffer, prefix.byteOffset + entry.offset, entry.bytes.length)
    .equals(entry.bytes)
}
