/**
 * Tests for scan command
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest'
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import { executeScan, summarize } from './scan.js'
import { ExitCode } from '../options.js'
import { buildJpeg } from '../../testing/images.js'
import { buildZip } from '../../testing/archives.js'
import { createMockFile, createMockFinding } from '../../testing/reports.js'

describe('scan command', () => {
  describe('summarize', () => {
    it('should count findings of every file by severity', () => {
      const files = [
        createMockFile({ findings: [createMockFinding(), createMockFinding({ severity: 'critical' })] }),
        createMockFile({ findings: [createMockFinding({ severity: 'low' })] })
      ]

      expect(summarize(files)).toEqual({ critical: 1, high: 1, medium: 0, low: 1, info: 0 })
    })
  })

  describe('executeScan', () => {
    let tempDir: string
    let stdout: MockInstance<typeof process.stdout.write>

    beforeEach(async () => {
      tempDir = await mkdtemp(join(tmpdir(), 'filesentry-scan-'))
      stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
      vi.spyOn(console, 'log').mockImplementation(() => {})
      vi.spyOn(console, 'info').mockImplementation(() => {})
      vi.spyOn(console, 'warn').mockImplementation(() => {})
      vi.spyOn(console, 'error').mockImplementation(() => {})
    })

    afterEach(async () => {
      vi.restoreAllMocks()
      await rm(tempDir, { recursive: true, force: true })
    })

    function printedReport(): { decision: string; files: { declaredName: string; mediaType: string; scanners: string[] }[] } {
      return JSON.parse(String(stdout.mock.calls[0]?.[0]))
    }

    it('should return ALLOW (0) for a clean image', async () => {
      const filePath = join(tempDir, 'photo.jpg')
      await writeFile(filePath, buildJpeg())

      const exitCode = await executeScan([filePath], {}, {})

      expect(exitCode).toBe(ExitCode.ALLOW)
      const report = printedReport()
      expect(report.decision).toBe('allow')
      expect(report.files[0]?.mediaType).toBe('image/jpeg')
      expect(report.files[0]?.scanners).toEqual(['code-injection', 'metadata'])
    })

    it('should print findings and the decision when the report goes to a file', async () => {
      const filePath = join(tempDir, 'bundle.zip')
      await writeFile(filePath, buildZip([{ name: 'shell.php', data: '<?php' }]))

      await executeScan([filePath], { output: join(tempDir, 'report.json') }, {})

      expect(console.log).toHaveBeenCalledWith(
        expect.stringContaining('Dangerous file detected in archive: shell.php')
      )
      expect(console.warn).toHaveBeenCalledWith(expect.stringContaining('BLOCKED: 1 of 1 file(s) unsafe'))
    })

    it('should return BLOCK (1) for an archive with a script', async () => {
      const filePath = join(tempDir, 'bundle.zip')
      await writeFile(filePath, buildZip([{ name: 'shell.php', data: '<?php' }]))

      const exitCode = await executeScan([filePath], {}, {})

      expect(exitCode).toBe(ExitCode.BLOCK)
      expect(printedReport().decision).toBe('block')
    })

    it('should block when any of several files is unsafe', async () => {
      const clean = join(tempDir, 'photo.jpg')
      const bundle = join(tempDir, 'bundle.zip')
      await writeFile(clean, buildJpeg())
      await writeFile(bundle, buildZip([{ name: 'run.exe', data: 'MZ' }]))

      const exitCode = await executeScan([clean, bundle], {}, {})

      expect(exitCode).toBe(ExitCode.BLOCK)
      expect(printedReport().files).toHaveLength(2)
    })

    it('should block a file that does not exist', async () => {
      const exitCode = await executeScan([join(tempDir, 'missing.jpg')], {}, {})

      expect(exitCode).toBe(ExitCode.BLOCK)
    })

    it('should check the declared name against the content', async () => {
      const filePath = join(tempDir, 'upload')
      await writeFile(filePath, buildJpeg())

      const exitCode = await executeScan([filePath], { name: 'avatar.png' }, {})

      expect(exitCode).toBe(ExitCode.BLOCK)
      expect(printedReport().files[0]?.declaredName).toBe('avatar.png')
    })

    it('should return ERROR (2) when --name is used with several files', async () => {
      const exitCode = await executeScan(['a.jpg', 'b.jpg'], { name: 'x.jpg' }, {})

      expect(exitCode).toBe(ExitCode.ERROR)
      expect(stdout).not.toHaveBeenCalled()
    })

    it('should return ERROR (2) when the policy cannot be loaded', async () => {
      const filePath = join(tempDir, 'photo.jpg')
      await writeFile(filePath, buildJpeg())

      const exitCode = await executeScan([filePath], {}, { config: join(tempDir, 'missing.yaml') })

      expect(exitCode).toBe(ExitCode.ERROR)
    })

    it('should apply the policy given with --config', async () => {
      const filePath = join(tempDir, 'photo.jpg')
      const policyPath = join(tempDir, 'policy.yaml')
      await writeFile(filePath, buildJpeg())
      await writeFile(policyPath, 'version: "1.0"\nname: pdf-only\nmime:\n  allowed_types: [application/pdf]\n')

      const exitCode = await executeScan([filePath], {}, { config: policyPath })

      expect(exitCode).toBe(ExitCode.BLOCK)
    })

    it('should write the report to a file', async () => {
      const filePath = join(tempDir, 'photo.jpg')
      const outputPath = join(tempDir, 'report.json')
      await writeFile(filePath, buildJpeg())

      const exitCode = await executeScan([filePath], { output: outputPath }, {})

      expect(exitCode).toBe(ExitCode.ALLOW)
      expect(stdout).not.toHaveBeenCalled()
      const report = JSON.parse(await readFile(outputPath, 'utf-8'))
      expect(report.decision).toBe('allow')
      expect(report.policyName).toBe('default')
      expect(console.log).toHaveBeenCalledWith(
        expect.stringContaining('ALLOWED: 1 file(s) scanned, no threats found')
      )
    })

    it('should write a markdown report', async () => {
      const filePath = join(tempDir, 'photo.jpg')
      const outputPath = join(tempDir, 'report.md')
      await writeFile(filePath, buildJpeg())

      await executeScan([filePath], { output: outputPath, format: 'markdown' }, {})

      const markdown = await readFile(outputPath, 'utf-8')
      expect(markdown.startsWith('# filesentry Scan Report\n')).toBe(true)
    })

    it('should print nothing in quiet mode', async () => {
      const filePath = join(tempDir, 'photo.jpg')
      await writeFile(filePath, buildJpeg())

      const exitCode = await executeScan([filePath], {}, { quiet: true })

      expect(exitCode).toBe(ExitCode.ALLOW)
      expect(stdout).not.toHaveBeenCalled()
      expect(console.log).not.toHaveBeenCalled()
    })
  })
})
