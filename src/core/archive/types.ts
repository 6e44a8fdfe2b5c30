/**
 * Container formats the inspector recognises
 */
export type ArchiveFormat = 'zip' | 'tar' | 'gzip' | 'bzip2' | 'rar' | '7z'

/**
 * Member of an archive as described by its metadata
 */
export interface ArchiveEntry {
  name: string
  compressedSize: number
  uncompressedSize: number
  directory: boolean
  /** Target of a symbolic or hard link member */
  linkTarget?: string
}

/**
 * Structural fault in archive bytes. Reported as a finding, never escapes the
 * inspector.
 */
export class MalformedArchiveError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'MalformedArchiveError'
  }
}

/**
 * Number of leading bytes archive detection looks at
 */
export const DETECTION_LENGTH = 512

interface ArchiveMagic {
  format: ArchiveFormat
  bytes: Buffer
  offset: number
}

const ARCHIVE_MAGIC: readonly ArchiveMagic[] = [
  { format: 'zip', bytes: Buffer.from('504b0304', 'hex'), offset: 0 },
  { format: 'zip', bytes: Buffer.from('504b0506', 'hex'), offset: 0 },
  { format: 'gzip', bytes: Buffer.from('1f8b', 'hex'), offset: 0 },
  { format: 'bzip2', bytes: Buffer.from('BZh', 'latin1'), offset: 0 },
  { format: 'rar', bytes: Buffer.from('526172211a07', 'hex'), offset: 0 },
  { format: '7z', bytes: Buffer.from('377abcaf271c', 'hex'), offset: 0 },
  { format: 'tar', bytes: Buffer.from('ustar', 'latin1'), offset: 257 }
]

export const FORMAT_LABELS: Readonly<Record<ArchiveFormat, string>> = {
  zip: 'ZIP',
  tar: 'TAR',
  gzip: 'GZIP',
  bzip2: 'BZIP2',
  rar: 'RAR',
  '7z': '7-Zip'
}

/**
 * Container format from the first bytes of an archive
 */
export function detectArchive(content: Buffer): ArchiveFormat | undefined {
  const prefix = content.subarray(0, DETECTION_LENGTH)
  const match = ARCHIVE_MAGIC.find(magic =>
    prefix.subarray(magic.offset, magic.offset + magic.bytes.length).equals(magic.bytes)
  )
  return match?.format
}
