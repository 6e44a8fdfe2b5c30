import { MalformedArchiveError, type ArchiveEntry } from './types.js'

export const TAR_BLOCK = 512

/** Cap on GNU long names and pax headers held in memory */
const MAX_EXTENDED_HEADER = 1024 * 1024

/** Member types whose header size counts payload bytes */
const DATA_TYPES = new Set(['0', '\0', '7'])

/** Hard link and symbolic link */
const LINK_TYPES = new Set(['1', '2'])

/**
 * What the parser does with the member whose header it just read
 */
export type TarAction = 'skip' | 'capture' | 'stop'

export interface CapturedMember {
  entry: ArchiveEntry
  payload: Buffer
}

type BodyKind = 'member' | 'long-name' | 'long-link' | 'pax' | 'ignored'

interface Body {
  kind: BodyKind
  entry?: ArchiveEntry
  size: number
  /** Payload plus padding to the block boundary */
  padded: number
  consumed: number
  chunks?: Buffer[]
}

const EXTENDED_KINDS: Readonly<Record<'L' | 'K' | 'x', BodyKind>> = {
  L: 'long-name',
  K: 'long-link',
  x: 'pax'
}

function cString(block: Buffer, start: number, length: number): string {
  const field = block.subarray(start, start + length)
  const end = field.indexOf(0)
  return field.toString('utf-8', 0, end < 0 ? field.length : end)
}

function parseOctal(block: Buffer, start: number, length: number): number {
  const text = block.toString('latin1', start, start + length).replace(/\0[\s\S]*$/, '').trim()
  if (text.length === 0) {
    return 0
  }
  if (!/^[0-7]+$/.test(text)) {
    throw new MalformedArchiveError('Invalid numeric field in tar header')
  }
  return Number.parseInt(text, 8)
}

/**
 * Size field, octal or GNU base-256
 */
function parseSize(block: Buffer): number {
  if ((block[124] & 0x80) === 0) {
    return parseOctal(block, 124, 12)
  }
  let size = block[124] & 0x7f
  for (let i = 125; i < 136; i++) {
    size = size * 256 + block[i]
  }
  return size
}

function hasValidChecksum(block: Buffer): boolean {
  let sum = 0
  for (let i = 0; i < TAR_BLOCK; i++) {
    sum += i >= 148 && i < 156 ? 0x20 : block[i]
  }
  try {
    return parseOctal(block, 148, 8) === sum
  } catch (error) {
    if (error instanceof MalformedArchiveError) {
      return false
    }
    throw error
  }
}

function isZeroBlock(block: Buffer): boolean {
  return block.every(byte => byte === 0)
}

/**
 * True when a 512-byte block is a tar header with a valid checksum
 */
export function looksLikeTar(block: Buffer): boolean {
  return block.length >= TAR_BLOCK && !isZeroBlock(block.subarray(0, TAR_BLOCK)) &&
    hasValidChecksum(block.subarray(0, TAR_BLOCK))
}

function headerName(block: Buffer): string {
  const name = cString(block, 0, 100)
  if (block.toString('latin1', 257, 262) !== 'ustar') {
    return name
  }
  const prefix = cString(block, 345, 155)
  return prefix.length > 0 ? `${prefix}/${name}` : name
}

/**
 * Records of a pax extended header ("<length> <key>=<value>\n")
 */
function parsePax(data: Buffer): Map<string, string> {
  const records = new Map<string, string>()
  let pos = 0
  while (pos < data.length) {
    const space = data.indexOf(0x20, pos)
    if (space < 0) {
      break
    }
    const length = Number.parseInt(data.toString('latin1', pos, space), 10)
    if (!Number.isSafeInteger(length) || length <= space - pos || pos + length > data.length) {
      break
    }
    const record = data.toString('utf-8', space + 1, pos + length - 1)
    const separator = record.indexOf('=')
    if (separator > 0) {
      records.set(record.slice(0, separator), record.slice(separator + 1))
    }
    pos += length
  }
  return records
}

/**
 * Push parser for tar streams. Headers are decoded as bytes arrive; payloads
 * are skipped unless the entry callback asks for them, in which case they are
 * collected for `takeCaptured`.
 */
export class TarParser {
  private pending: Buffer = Buffer.alloc(0)
  private body?: Body
  private longName?: string
  private longLink?: string
  private pax = new Map<string, string>()
  private finished = false
  private captured: CapturedMember[] = []

  constructor(private readonly onEntry: (entry: ArchiveEntry) => TarAction) {}

  /**
   * End of archive reached, or the callback stopped the walk
   */
  get done(): boolean {
    return this.finished
  }

  write(chunk: Buffer): void {
    const data = this.pending.length > 0 ? Buffer.concat([this.pending, chunk]) : chunk
    let pos = 0

    while (!this.finished) {
      const body = this.body
      if (body !== undefined) {
        const take = Math.min(body.padded - body.consumed, data.length - pos)
        if (take === 0) {
          break
        }
        const payload = Math.max(0, Math.min(take, body.size - body.consumed))
        if (body.chunks !== undefined && payload > 0) {
          body.chunks.push(data.subarray(pos, pos + payload))
        }
        body.consumed += take
        pos += take
        if (body.consumed === body.padded) {
          this.finishBody(body)
        }
        continue
      }

      if (data.length - pos < TAR_BLOCK) {
        break
      }
      this.readHeader(data.subarray(pos, pos + TAR_BLOCK))
      pos += TAR_BLOCK
    }

    this.pending = Buffer.from(data.subarray(pos))
  }

  /**
   * Members collected since the last call
   */
  takeCaptured(): CapturedMember[] {
    const members = this.captured
    this.captured = []
    return members
  }

  private readHeader(block: Buffer): void {
    if (isZeroBlock(block)) {
      this.finished = true
      return
    }
    if (!hasValidChecksum(block)) {
      throw new MalformedArchiveError('Invalid tar header checksum')
    }

    const type = String.fromCharCode(block[156])
    const size = parseSize(block)

    switch (type) {
      case 'L':
      case 'K':
      case 'x':
        if (size > MAX_EXTENDED_HEADER) {
          throw new MalformedArchiveError('Extended tar header too large')
        }
        this.startBody({ kind: EXTENDED_KINDS[type], size, chunks: [] })
        return
      case 'g':
        this.startBody({ kind: 'ignored', size })
        return
    }

    const paxSize = Number(this.pax.get('size'))
    const carriesData = DATA_TYPES.has(type)
    const dataSize = carriesData && Number.isSafeInteger(paxSize) ? paxSize : size
    const entry: ArchiveEntry = {
      name: this.longName ?? this.pax.get('path') ?? headerName(block),
      compressedSize: carriesData ? dataSize : 0,
      uncompressedSize: carriesData ? dataSize : 0,
      directory: type === '5'
    }
    if (LINK_TYPES.has(type)) {
      entry.linkTarget = this.longLink ?? this.pax.get('linkpath') ?? cString(block, 157, 100)
    }
    this.longName = undefined
    this.longLink = undefined
    this.pax = new Map()

    const action = this.onEntry(entry)
    if (action === 'stop') {
      this.finished = true
      return
    }
    this.startBody({ kind: 'member', entry, size: dataSize, chunks: action === 'capture' ? [] : undefined })
  }

  private startBody(body: Omit<Body, 'padded' | 'consumed'>): void {
    const started: Body = {
      ...body,
      padded: Math.ceil(body.size / TAR_BLOCK) * TAR_BLOCK,
      consumed: 0
    }
    if (started.padded === 0) {
      this.finishBody(started)
      return
    }
    this.body = started
  }

  private finishBody(body: Body): void {
    this.body = undefined
    const data = body.chunks === undefined ? undefined : Buffer.concat(body.chunks)
    if (data === undefined) {
      return
    }

    switch (body.kind) {
      case 'long-name':
        this.longName = cString(data, 0, data.length)
        return
      case 'long-link':
        this.longLink = cString(data, 0, data.length)
        return
      case 'pax':
        this.pax = parsePax(data)
        return
      case 'member':
        if (body.entry !== undefined) {
          this.captured.push({ entry: body.entry, payload: data })
        }
        return
      case 'ignored':
        return
    }
  }
}

/**
 * Original file name stored in a gzip header (FNAME), if any
 */
export function gzipMemberName(content: Buffer): string | undefined {
  if (content.length < 10 || content[0] !== 0x1f || content[1] !== 0x8b) {
    return undefined
  }
  const flags = content[3]
  let pos = 10
  if ((flags & 0x04) !== 0) {
    if (pos + 2 > content.length) {
      return undefined
    }
    pos += 2 + content.readUInt16LE(pos)
  }
  if ((flags & 0x08) === 0) {
    return undefined
  }
  const end = content.indexOf(0, pos)
  return end < 0 ? undefined : content.toString('latin1', pos, end)
}
