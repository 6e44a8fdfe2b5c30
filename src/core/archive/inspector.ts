import { Readable } from 'stream'
import { createGunzip } from 'zlib'
import type { ScanResult, ThreatCategory } from '../../types/finding.js'
import type { ScanPolicy } from '../../types/policy.js'
import { createLogger, type Logger } from '../../utils/logger.js'
import { errorCode, errorMessage } from '../../utils/errors.js'
import {
  BaseScanner,
  ThreatCollector,
  buildResult,
  type InspectionContext,
  type ScannerDependencies
} from '../scanner/base.js'
import { baseName } from '../scanner/utils.js'
import {
  blockedExtensions,
  extensionThreats,
  isNestedArchive,
  linkThreats,
  printableName,
  traversalThreats
} from './entry-checks.js'
import { TAR_BLOCK, TarParser, gzipMemberName, looksLikeTar, type TarAction } from './tar.js'
import {
  FORMAT_LABELS,
  MalformedArchiveError,
  detectArchive,
  type ArchiveEntry,
  type ArchiveFormat
} from './types.js'
import { readZipDirectory, readZipEntries, readZipMember } from './zip.js'

export interface ArchiveFlags {
  format: ArchiveFormat | 'unknown'
  /** Entries enumerated before the walk ended */
  entryCount: number
  /** Running total of declared (or streamed) uncompressed bytes */
  uncompressedSize: number
  /** False when the format has no inspection backend */
  inspected: boolean
}

/** Formats recognised but not enumerable here */
const BACKENDLESS = new Set<ArchiveFormat>(['bzip2', 'rar', '7z'])

/** Compressed bytes handed to the decompressor per write */
const INPUT_SLICE = 16 * 1024

function* slices(content: Buffer, size: number): Generator<Buffer> {
  for (let offset = 0; offset < content.length; offset += size) {
    yield content.subarray(offset, offset + size)
  }
}

async function* binaryChunks(stream: Readable): AsyncGenerator<Buffer> {
  const iterable: AsyncIterable<unknown> = stream
  for await (const chunk of iterable) {
    if (!Buffer.isBuffer(chunk)) {
      throw new TypeError('Expected binary stream data')
    }
    yield chunk
  }
}

/**
 * Bookkeeping for one archive level: limits, running totals and per-entry
 * checks. Every check that ends the walk returns false.
 */
class ArchiveWalk {
  private readonly blocked: ReadonlySet<string>

  constructor(
    private readonly inspector: ArchiveInspector,
    private readonly content: Buffer,
    private readonly policy: ScanPolicy,
    private readonly depth: number,
    private readonly threats: ThreatCollector,
    private readonly flags: ArchiveFlags,
    private readonly logger: Logger
  ) {
    this.blocked = blockedExtensions(policy)
  }

  /**
   * Count, size and name checks for one entry
   */
  admit(entry: ArchiveEntry): boolean {
    const limits = this.policy.archive
    this.flags.entryCount++
    if (this.flags.entryCount > limits.max_files_count) {
      this.tooManyFiles(this.flags.entryCount)
      return false
    }
    if (!this.grow(entry.uncompressedSize)) {
      return false
    }

    for (const threat of traversalThreats(entry.name)) {
      this.threats.add(threat)
    }
    if (entry.linkTarget !== undefined) {
      for (const threat of linkThreats(entry.name, entry.linkTarget)) {
        this.threats.add(threat)
      }
    }
    if (!entry.directory) {
      for (const threat of extensionThreats(entry.name, this.blocked)) {
        this.threats.add(threat)
      }
    }
    return true
  }

  /**
   * Add uncompressed bytes, checking the ratio before the size cap
   */
  grow(bytes: number): boolean {
    const limits = this.policy.archive
    this.flags.uncompressedSize += bytes

    if (this.content.length > 0) {
      const ratio = this.flags.uncompressedSize / this.content.length
      if (ratio > limits.max_compression_ratio) {
        this.threats.add(`Potential zip bomb detected: compression ratio ${ratio.toFixed(1)}:1`, 'decompression-bomb')
        return false
      }
    }
    if (this.flags.uncompressedSize > limits.max_uncompressed_size) {
      this.threats.add('Archive uncompressed size exceeds limit', 'decompression-bomb')
      return false
    }
    return true
  }

  tooManyFiles(count: number): void {
    this.threats.add(
      `Archive contains too many files (${count} > ${this.policy.archive.max_files_count})`,
      'decompression-bomb'
    )
  }

  /**
   * Whether a member's payload should be read for recursive inspection
   */
  wantsPayload(entry: ArchiveEntry): boolean {
    if (entry.directory || !isNestedArchive(entry.name, this.policy)) {
      return false
    }
    const shown = printableName(entry.name)
    if (!this.policy.archive.inspect_nested) {
      this.threats.add(`Nested archive detected: ${shown}`)
      return false
    }
    if (entry.uncompressedSize > this.policy.archive.max_nested_archive_size) {
      this.threats.add(`Nested archive too large to inspect: ${shown}`)
      return false
    }
    return true
  }

  visit(entry: ArchiveEntry): TarAction {
    if (!this.admit(entry)) {
      return 'stop'
    }
    return this.wantsPayload(entry) ? 'capture' : 'skip'
  }

  async inspectNested(name: string, payload: Buffer): Promise<void> {
    const nested = await this.inspector.inspectContent(payload, this.policy, this.depth + 1, name)
    this.threats.merge(nested.findings, `${printableName(name)}: `)
  }

  nestedUnreadable(name: string, error: unknown): void {
    this.threats.add(`Nested archive could not be read: ${printableName(name)}`)
    this.logger.debug(`Nested member ${printableName(name)} not inspected: ${errorMessage(error)}`)
  }
}

/**
 * Enumerates archive members from metadata and checks them against the
 * archive policy, recursing into nested archives up to the nesting limit.
 *
 * ZIP is read from its central directory; TAR and gzip are streamed with
 * payloads skipped. Nested members are the only payloads read, and only up to
 * `archive.max_nested_archive_size`.
 */
export class ArchiveInspector extends BaseScanner<ArchiveFlags> {
  readonly type = 'archive' as const
  readonly name = 'Archive Inspector'
  protected readonly category: ThreatCategory = 'archive-threat'
  private readonly logger: Logger

  constructor(deps: ScannerDependencies, logger: Logger = createLogger('archive')) {
    super(deps)
    this.logger = logger
  }

  protected initialFlags(): ArchiveFlags {
    return { format: 'unknown', entryCount: 0, uncompressedSize: 0, inspected: false }
  }

  protected async inspect({ content, policy, target, threats, flags }: InspectionContext<ArchiveFlags>): Promise<void> {
    await this.walk(content, policy, 0, baseName(target.declaredName ?? target.path), threats, flags)
  }

  /**
   * Inspect archive bytes already in memory. `depth` is the nesting level of
   * these bytes; the walk refuses to start once it reaches the policy limit.
   */
  async inspectContent(
    content: Buffer,
    policy: ScanPolicy,
    depth = 0,
    name = 'archive'
  ): Promise<ScanResult<ArchiveFlags>> {
    const threats = new ThreatCollector(this.type, this.category)
    const flags = this.initialFlags()
    await this.walk(content, policy, depth, name, threats, flags)
    return buildResult(threats.findings(), flags)
  }

  private async walk(
    content: Buffer,
    policy: ScanPolicy,
    depth: number,
    name: string,
    threats: ThreatCollector,
    flags: ArchiveFlags
  ): Promise<void> {
    if (depth >= policy.archive.max_nesting_depth) {
      threats.add('Archive nesting depth exceeds limit')
      return
    }

    const format = detectArchive(content)
    if (format === undefined) {
      threats.add('Unsupported archive format')
      return
    }
    flags.format = format
    const label = FORMAT_LABELS[format]

    if (BACKENDLESS.has(format)) {
      if (policy.archive.unavailable_backend === 'fail-open') {
        this.logger.warn(`${label} archive accepted without inspection: no backend available`)
        return
      }
      threats.add(`${label} archive inspection requires an unavailable backend`)
      return
    }

    const walk = new ArchiveWalk(this, content, policy, depth, threats, flags, this.logger)
    flags.inspected = true
    try {
      switch (format) {
        case 'zip':
          await this.walkZip(content, walk, policy)
          return
        case 'tar':
          if (!looksLikeTar(content)) {
            throw new MalformedArchiveError('Invalid tar header checksum')
          }
          await this.walkStream(Readable.from(slices(content, INPUT_SLICE), { objectMode: false }), walk, content, name)
          return
        default:
          await this.walkGzip(content, walk, name)
          return
      }
    } catch (error) {
      if (!(error instanceof MalformedArchiveError)) {
        throw error
      }
      this.logger.debug(`Malformed ${label} archive ${printableName(name)}: ${error.message}`)
      threats.add(`Failed to open ${label} archive: ${error.message}`)
    }
  }

  private async walkZip(content: Buffer, walk: ArchiveWalk, policy: ScanPolicy): Promise<void> {
    const directory = readZipDirectory(content)
    if (directory.declaredCount > policy.archive.max_files_count) {
      walk.tooManyFiles(directory.declaredCount)
      return
    }

    for (const entry of readZipEntries(content, directory)) {
      if (!walk.admit(entry)) {
        return
      }
      if (!walk.wantsPayload(entry)) {
        continue
      }

      let payload: Buffer
      try {
        payload = readZipMember(content, entry, policy.archive.max_nested_archive_size)
      } catch (error) {
        walk.nestedUnreadable(entry.name, error)
        continue
      }
      await walk.inspectNested(entry.name, payload)
    }
  }

  private async walkGzip(content: Buffer, walk: ArchiveWalk, name: string): Promise<void> {
    const gunzip = createGunzip()
    const input = Readable.from(slices(content, INPUT_SLICE), { objectMode: false })
    input.pipe(gunzip)
    try {
      await this.walkStream(gunzip, walk, content, name)
    } catch (error) {
      if (errorCode(error)?.startsWith('Z_')) {
        throw new MalformedArchiveError(errorMessage(error))
      }
      throw error
    } finally {
      input.unpipe(gunzip)
      input.destroy()
    }
  }

  /**
   * Walk decompressed bytes: a tar stream when the first block is a tar
   * header, otherwise a single member sized by streaming
   */
  private async walkStream(stream: Readable, walk: ArchiveWalk, content: Buffer, name: string): Promise<void> {
    let consume: ((bytes: Buffer) => Promise<boolean>) | undefined
    let head = Buffer.alloc(0)

    try {
      for await (const chunk of binaryChunks(stream)) {
        let bytes = chunk
        if (consume === undefined) {
          head = Buffer.concat([head, chunk])
          if (head.length < TAR_BLOCK) {
            continue
          }
          consume = this.consumer(head, walk, content, name)
          bytes = head
        }
        if (!(await consume(bytes))) {
          return
        }
      }
      if (consume === undefined) {
        await this.consumer(head, walk, content, name)(head)
      }
    } finally {
      stream.destroy()
    }
  }

  private consumer(
    head: Buffer,
    walk: ArchiveWalk,
    content: Buffer,
    name: string
  ): (bytes: Buffer) => Promise<boolean> {
    if (looksLikeTar(head)) {
      const parser = new TarParser(entry => walk.visit(entry))
      return async bytes => {
        parser.write(bytes)
        for (const member of parser.takeCaptured()) {
          await walk.inspectNested(member.entry.name, member.payload)
        }
        return !parser.done
      }
    }

    const entry: ArchiveEntry = {
      name: gzipMemberName(content) ?? name.replace(/\.t?gz$/i, match => match.toLowerCase() === '.tgz' ? '.tar' : ''),
      compressedSize: content.length,
      uncompressedSize: 0,
      directory: false
    }
    let admitted = false
    return async bytes => {
      if (!admitted) {
        admitted = true
        if (!walk.admit(entry)) {
          return false
        }
      }
      return walk.grow(bytes.length)
    }
  }
}
