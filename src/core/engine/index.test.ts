import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdir, mkdtemp, readFile, realpath, rm, symlink, writeFile } from 'fs/promises'
import { createHash } from 'crypto'
import { tmpdir } from 'os'
import { join } from 'path'
import { ScanEngine, type FileScanResult } from './index.js'
import { MemoryEventSink, type SecurityEvent } from '../events/index.js'
import { DEFAULT_POLICY, createPolicy } from '../policy/loader.js'
import { buildJpeg, buildTiff, commentSegment, exifSegment } from '../../testing/images.js'
import { buildZip } from '../../testing/archives.js'
import { formatBytes } from '../../utils/hash.js'

const HOSTILE_SVG =
  '<svg xmlns="http://www.w3.org/2000/svg" onload="alert(1)"><script>alert(2)</script></svg>'

const SCRIPTED_PDF = [
  '%PDF-1.7',
  '1 0 obj',
  '<< /Type /Catalog /OpenAction << /S /JavaScript /JS (app.alert(1)) >> >>',
  'endobj',
  '%%EOF'
].join('\n')

/** Result without run timings */
function outcome(result: FileScanResult): object {
  return {
    ...result,
    reports: result.reports.map(report => ({ scanner: report.scanner, result: report.result }))
  }
}

const PLAIN_PDF = [
  '%PDF-1.7',
  '1 0 obj',
  '<< /Type /Catalog /Pages 2 0 R >>',
  'endobj',
  '%%EOF'
].join('\n')

describe('ScanEngine', () => {
  let engine: ScanEngine
  let sink: MemoryEventSink
  let testDir: string

  beforeEach(async () => {
    sink = new MemoryEventSink()
    engine = new ScanEngine({ sink })
    testDir = await mkdtemp(join(tmpdir(), 'filesentry-engine-'))
  })

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true })
  })

  async function upload(name: string, content: Buffer | string): Promise<string> {
    const filePath = join(testDir, name)
    await writeFile(filePath, content)
    return filePath
  }

  describe('dispatch', () => {
    it('should accept a clean JPEG', async () => {
      const filePath = await upload('photo.jpg', buildJpeg())

      const result = await engine.scanFile(filePath, 'photo.jpg', DEFAULT_POLICY)

      expect(result.safe).toBe(true)
      expect(result.mediaType).toBe('image/jpeg')
      expect(result.path).toBe(filePath)
      expect(result.flags).toEqual({ metadataStripped: false, unrestricted: false })
      expect(result.reports.map(report => report.scanner)).toEqual(['code-injection', 'metadata'])
      expect(sink.events).toEqual([])
    })

    it('should route SVG to the markup scanner', () => {
      expect(engine.scannersFor('image/svg+xml', DEFAULT_POLICY)).toEqual(['code-injection', 'markup-injection'])
      expect(engine.scannersFor('application/zip', DEFAULT_POLICY)).toEqual(['code-injection', 'archive'])
    })

    it.each([
      ['a DOCTYPE', '<!DOCTYPE svg>\n'],
      ['leading whitespace', '\n\n  '],
      ['a comment', '<!-- exported logo -->\n'],
      ['a byte order mark', '\ufeff']
    ])('should send SVG that starts with %s to the markup scanner', async (_lead, lead) => {
      const filePath = await upload('logo.svg', lead + HOSTILE_SVG)

      const result = await engine.scanFile(filePath, 'logo.svg', DEFAULT_POLICY)

      expect(result.mediaType).toBe('image/svg+xml')
      expect(result.safe).toBe(false)
      expect(result.reports.map(report => report.scanner)).toContain('markup-injection')
      expect(result.threats).toContain('Dangerous tag detected: <script>')
      expect(result.threats).toContain('Event handler detected: onload')
    })

    it('should send unidentified text holding an svg element to the markup scanner', async () => {
      const filePath = await upload('logo.svg', 'exported by hand\n' + HOSTILE_SVG)

      const result = await engine.scanFile(filePath, 'logo.svg', DEFAULT_POLICY)

      expect(result.mediaType).toBe('unknown')
      expect(result.reports.map(report => report.scanner)).toEqual(['code-injection', 'markup-injection'])
      expect(result.threats).toContain('Event handler detected: onload')
    })

    it('should skip scanners disabled by policy', async () => {
      const policy = createPolicy({ scanners: { archive: false } })
      const filePath = await upload('bundle.zip', buildZip([{ name: 'shell.php', data: '<?php' }]))

      const result = await engine.scanFile(filePath, 'bundle.zip', policy)

      expect(result.safe).toBe(true)
      expect(result.reports.map(report => report.scanner)).toEqual(['code-injection'])
    })

    it('should report archive findings', async () => {
      const filePath = await upload('bundle.zip', buildZip([{ name: 'shell.php', data: '<?php' }]))

      const result = await engine.scanFile(filePath, 'bundle.zip', DEFAULT_POLICY)

      expect(result.mediaType).toBe('application/zip')
      expect(result.threats).toEqual(['Dangerous file detected in archive: shell.php'])
    })

    it('should scan unidentified text for code', async () => {
      const filePath = await upload('notes.txt', 'hello\n<?php system($_GET["c"]); ?>')

      const result = await engine.scanFile(filePath, 'notes.txt', DEFAULT_POLICY)

      expect(result.mediaType).toBe('unknown')
      expect(result.safe).toBe(false)
      expect(result.threats).toContain('Dangerous function detected: system()')
      expect(result.reports.map(report => report.scanner)).toEqual(['code-injection'])
    })

    it('should default the declared name to the file name', async () => {
      const filePath = await upload('photo.jpg', buildJpeg())

      const result = await engine.scanFile(filePath, undefined, DEFAULT_POLICY)

      expect(result.declaredName).toBe('photo.jpg')
    })
  })

  describe('determinism', () => {
    it.each([
      ['bundle.zip', buildZip([{ name: 'shell.php', data: '<?php' }, { name: '../escape.txt', data: 'x' }])],
      ['report.pdf', SCRIPTED_PDF],
      ['logo.svg', HOSTILE_SVG]
    ] as const)('should give the same result for %s on every scan', async (name, content) => {
      const filePath = await upload(name, content)

      const first = await engine.scanFile(filePath, name, DEFAULT_POLICY)
      const second = await engine.scanFile(filePath, name, DEFAULT_POLICY)

      expect(first.safe).toBe(false)
      expect(second.threats).toEqual(first.threats)
      expect(outcome(second)).toEqual(outcome(first))
    })
  })

  describe('media type policy', () => {
    it('should reject an extension that disagrees with the content', async () => {
      const filePath = await upload('upload.bin', PLAIN_PDF)

      const result = await engine.scanFile(filePath, 'report.jpg', DEFAULT_POLICY)

      expect(result.threats).toEqual(['File extension .jpg does not match detected type application/pdf'])
      expect(result.findings[0]).toEqual({
        scanner: 'format',
        category: 'mime-mismatch',
        severity: 'high',
        message: 'File extension .jpg does not match detected type application/pdf'
      })
    })

    it('should not compare extensions when strict matching is off', async () => {
      const policy = createPolicy({ mime: { strict_extension_match: false } })
      const filePath = await upload('upload.bin', PLAIN_PDF)

      const result = await engine.scanFile(filePath, 'report.jpg', policy)

      expect(result.safe).toBe(true)
    })

    it('should stop at a dangerous type', async () => {
      const filePath = await upload('avatar.png', '<?php echo 1; ?>')

      const result = await engine.scanFile(filePath, 'avatar.png', DEFAULT_POLICY)

      expect(result.mediaType).toBe('application/x-php')
      expect(result.threats).toEqual(['Dangerous file type detected: application/x-php'])
      expect(result.findings[0]?.category).toBe('dangerous-file')
      expect(result.reports).toEqual([])
    })

    it('should enforce the allow-list with wildcards', async () => {
      const policy = createPolicy({ mime: { allowed_types: ['image/*'] } })
      const pdf = await upload('doc.pdf', PLAIN_PDF)
      const jpeg = await upload('photo.jpg', buildJpeg())

      expect((await engine.scanFile(pdf, 'doc.pdf', policy)).threats)
        .toEqual(['File type application/pdf is not allowed'])
      expect((await engine.scanFile(jpeg, 'photo.jpg', policy)).safe).toBe(true)
    })

    it('should reject unknown types when configured', async () => {
      const policy = createPolicy({ mime: { allow_unknown: false } })
      const filePath = await upload('notes.txt', 'just text')

      const result = await engine.scanFile(filePath, 'notes.txt', policy)

      expect(result.threats).toEqual(['File type could not be determined'])
    })
  })

  describe('access', () => {
    it('should reject a symbolic link before reading it', async () => {
      const target = await upload('photo.jpg', buildJpeg())
      const link = join(testDir, 'link.jpg')
      await symlink(target, link)

      const result = await engine.scanFile(link, 'link.jpg', DEFAULT_POLICY)

      expect(result.threats).toEqual(['Symbolic link detected'])
      expect(result.mediaType).toBe('unknown')
      expect(result.reports).toEqual([])
      expect(sink.events).toHaveLength(1)
      expect(sink.events[0]?.type).toBe('symlink-detected')
      expect(sink.events[0]?.severity).toBe('critical')
      expect(sink.events[0]?.context.file.size).toBe(0)
    })

    it('should mark decisions made without a root restriction', async () => {
      const policy = createPolicy({ access: { allowed_roots: [] } })
      const filePath = await upload('photo.jpg', buildJpeg())

      const result = await engine.scanFile(filePath, 'photo.jpg', policy)

      expect(result.flags.unrestricted).toBe(true)
    })

    it('should fail closed when the file cannot be read', async () => {
      const dirPath = join(testDir, 'folder.jpg')
      await mkdir(dirPath)

      const result = await engine.scanFile(dirPath, 'folder.jpg', DEFAULT_POLICY)

      expect(result.safe).toBe(false)
      expect(result.threats).toHaveLength(1)
      expect(result.threats[0]?.startsWith('Scan failed: ')).toBe(true)
    })
  })

  describe('security events', () => {
    it('should publish one event per finding with the file context', async () => {
      const content = Buffer.from(PLAIN_PDF)
      const filePath = await upload('upload.bin', content)

      await engine.scanFile(filePath, 'report.jpg', DEFAULT_POLICY)

      const expected: SecurityEvent = {
        type: 'mime-mismatch',
        severity: 'high',
        message: 'File extension .jpg does not match detected type application/pdf',
        context: {
          file: {
            declaredName: 'report.jpg',
            path: await realpath(filePath),
            size: content.length,
            humanSize: formatBytes(content.length),
            sha256: createHash('sha256').update(content).digest('hex')
          },
          findings: ['File extension .jpg does not match detected type application/pdf']
        }
      }
      expect(sink.events).toEqual([expected])
    })

    it('should leave out the digest when hashing is disabled', async () => {
      const policy = createPolicy({ events: { include_hash: false } })
      const filePath = await upload('upload.bin', PLAIN_PDF)

      await engine.scanFile(filePath, 'report.jpg', policy)

      expect(sink.events[0]?.context.file.sha256).toBeUndefined()
    })

    it('should publish nothing when events are disabled', async () => {
      const policy = createPolicy({ events: { enabled: false } })
      const filePath = await upload('upload.bin', PLAIN_PDF)

      await engine.scanFile(filePath, 'report.jpg', policy)

      expect(sink.events).toEqual([])
    })

    it('should publish tolerated GPS data as a low event', async () => {
      const jpeg = buildJpeg({ segments: [exifSegment(buildTiff({ gps: [1, 2, 3, 4] }))] })
      const filePath = await upload('photo.jpg', jpeg)

      const result = await engine.scanFile(filePath, 'photo.jpg', DEFAULT_POLICY)

      expect(result.safe).toBe(true)
      expect(sink.events.map(event => [event.type, event.severity, event.message])).toEqual([
        ['gps-detected', 'low', 'GPS location data found in image metadata']
      ])
    })

    it('should not let a failing sink break the scan', async () => {
      const failing = new ScanEngine({
        sink: {
          record: () => {
            throw new Error('sink offline')
          }
        }
      })
      const filePath = await upload('upload.bin', PLAIN_PDF)

      const result = await failing.scanFile(filePath, 'report.jpg', DEFAULT_POLICY)

      expect(result.threats).toEqual(['File extension .jpg does not match detected type application/pdf'])
    })
  })

  describe('metadata stripping', () => {
    it('should rewrite a clean JPEG without its metadata', async () => {
      const policy = createPolicy({ metadata: { strip_metadata: true } })
      const filePath = await upload('photo.jpg', buildJpeg({ segments: [commentSegment('holiday')] }))

      const result = await engine.scanFile(filePath, 'photo.jpg', policy)

      expect(result.flags.metadataStripped).toBe(true)
      expect(await readFile(filePath)).toEqual(buildJpeg())
    })

    it('should leave an image without metadata untouched', async () => {
      const policy = createPolicy({ metadata: { strip_metadata: true } })
      const filePath = await upload('photo.jpg', buildJpeg())

      const result = await engine.scanFile(filePath, 'photo.jpg', policy)

      expect(result.flags.metadataStripped).toBe(false)
    })

    it('should not rewrite a file with findings', async () => {
      const policy = createPolicy({ metadata: { strip_metadata: true } })
      const original = buildJpeg({ segments: [commentSegment('run bash -i')] })
      const filePath = await upload('photo.jpg', original)

      const result = await engine.scanFile(filePath, 'photo.jpg', policy)

      expect(result.safe).toBe(false)
      expect(result.flags.metadataStripped).toBe(false)
      expect(await readFile(filePath)).toEqual(original)
    })
  })
})
