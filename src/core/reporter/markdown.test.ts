import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdir, writeFile } from 'node:fs/promises'
import { MarkdownReporter, createMarkdownReporter } from './markdown.js'
import { createMockFile, createMockFinding, createMockReport } from '../../testing/reports.js'

vi.mock('node:fs/promises', () => ({
  mkdir: vi.fn(),
  writeFile: vi.fn()
}))

const mockMkdir = vi.mocked(mkdir)
const mockWriteFile = vi.mocked(writeFile)

describe('MarkdownReporter', () => {
  let reporter: MarkdownReporter

  beforeEach(() => {
    reporter = new MarkdownReporter()
    mockWriteFile.mockClear()
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  function lines(markdown: string): string[] {
    return markdown.split('\n')
  }

  describe('generate', () => {
    it('should start with the title and decision', () => {
      const markdown = lines(reporter.generate(createMockReport()))

      expect(markdown[0]).toBe('# filesentry Scan Report')
      expect(markdown).toContain('**Decision:** ✅ **ALLOW**')
    })

    it('should show a block decision', () => {
      const markdown = lines(reporter.generate(createMockReport({ decision: 'block' })))

      expect(markdown).toContain('**Decision:** 🚫 **BLOCK**')
    })

    it('should summarise files and duration', () => {
      const report = createMockReport({
        files: [createMockFile(), createMockFile({ safe: false, findings: [createMockFinding()] })],
        duration: 1500
      })

      const markdown = lines(reporter.generate(report))

      expect(markdown).toContain('| Files | 2 |')
      expect(markdown).toContain('| Unsafe files | 1 |')
      expect(markdown).toContain('| Duration | 1.50s |')
    })

    it('should render each file with masked paths', () => {
      const markdown = lines(reporter.generate(createMockReport()))

      expect(markdown).toContain('### ✅ bundle.zip')
      expect(markdown).toContain('| Path | `/home/[REDACTED]/uploads/bundle.zip` |')
      expect(markdown).toContain('| Media type | application/zip |')
      expect(markdown).toContain('| Scanners | code-injection, archive |')
    })

    it('should keep paths when masking is off', () => {
      const markdown = lines(reporter.generate(createMockReport(), { maskPaths: false }))

      expect(markdown).toContain('| Path | `/home/alice/uploads/bundle.zip` |')
    })

    it('should list findings most severe first', () => {
      const file = createMockFile({
        safe: false,
        findings: [
          createMockFinding(),
          createMockFinding({
            category: 'decompression-bomb',
            severity: 'critical',
            message: 'Archive uncompressed size exceeds limit'
          })
        ]
      })

      const markdown = lines(reporter.generate(createMockReport({ files: [file] })))
      const start = markdown.indexOf('### ❌ bundle.zip')

      expect(markdown.slice(start + 8, start + 10)).toEqual([
        '- 🔴 **critical** Archive uncompressed size exceeds limit _(decompression-bomb)_',
        '- 🟠 **high** Path traversal detected: ../etc/passwd _(archive-threat)_'
      ])
    })

    it('should escape pipes in table cells', () => {
      const file = createMockFile({ path: '/srv/a|b.zip' })

      const markdown = lines(reporter.generate(createMockReport({ files: [file] })))

      expect(markdown).toContain('| Path | `/srv/a\\|b.zip` |')
    })

    it('should note an empty scan', () => {
      const markdown = reporter.generate(createMockReport({ files: [] }))

      expect(markdown).toContain('## Files\n\nNo files were scanned.\n')
    })

    it('should list errors', () => {
      const markdown = lines(reporter.generate(createMockReport({ errors: ['missing.jpg: ENOENT'] })))

      expect(markdown).toContain('## Errors')
      expect(markdown).toContain('- missing.jpg: ENOENT')
    })

    it('should omit the errors section when there are none', () => {
      expect(reporter.generate(createMockReport())).not.toContain('## Errors')
    })
  })

  describe('write', () => {
    it('should create the parent directory of the output file', async () => {
      await reporter.write(createMockReport(), { output: '/tmp/reports/report.md' })

      expect(mockMkdir).toHaveBeenCalledWith('/tmp/reports', { recursive: true })
    })

    it('should write to file when output is specified', async () => {
      await reporter.write(createMockReport(), { output: '/tmp/report.md' })

      expect(mockWriteFile).toHaveBeenCalledWith('/tmp/report.md', expect.any(String), 'utf-8')
    })

    it('should write to stdout when no output specified', async () => {
      const stdoutWriteSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
      await reporter.write(createMockReport())

      expect(String(stdoutWriteSpy.mock.calls[0]?.[0]).startsWith('# filesentry Scan Report')).toBe(true)
    })

    it('should not write to stdout when quiet is true', async () => {
      const stdoutWriteSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
      await reporter.write(createMockReport(), { quiet: true })

      expect(stdoutWriteSpy).not.toHaveBeenCalled()
    })
  })

  describe('createMarkdownReporter', () => {
    it('should create a MarkdownReporter instance', () => {
      expect(createMarkdownReporter()).toBeInstanceOf(MarkdownReporter)
    })
  })
})
