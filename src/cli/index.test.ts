import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { join } from 'path'
import { existsSync } from 'fs'
import { mkdtemp, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { CommanderError } from 'commander'
import { createProgram, ExitCode, VERSION } from './index.js'
import { buildJpeg } from '../testing/images.js'

const fixturesPath = join(import.meta.dirname, '../core/policy/__fixtures__')

class ExitCalled extends Error {
  constructor(readonly code: string | number | null | undefined) {
    super(`process.exit(${String(code)})`)
  }
}

describe('CLI Framework', () => {
  beforeEach(() => {
    vi.spyOn(process, 'exit').mockImplementation(code => {
      throw new ExitCalled(code)
    })
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
    vi.spyOn(console, 'info').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  async function runCli(...args: string[]): Promise<void> {
    await createProgram()
      .parseAsync(['node', 'filesentry', ...args])
      .catch((error: unknown) => {
        if (!(error instanceof ExitCalled)) {
          throw error
        }
      })
  }

  describe('ExitCode', () => {
    it('should have correct exit codes', () => {
      expect(ExitCode).toEqual({ ALLOW: 0, BLOCK: 1, ERROR: 2 })
    })
  })

  describe('createProgram', () => {
    it('should create a program with correct name and version', () => {
      const program = createProgram()

      expect(program.name()).toBe('filesentry')
      expect(program.version()).toBe(VERSION)
    })

    it('should have global options', () => {
      const optionNames = createProgram().options.map(opt => opt.long)

      expect(optionNames).toEqual(['--version', '--verbose', '--quiet', '--config'])
    })

    it('should register every command', () => {
      const commands = createProgram().commands.map(cmd => cmd.name())

      expect(commands).toEqual(['scan', 'identify', 'init', 'validate'])
    })

    it('scan command should have output, format and name options', () => {
      const scanCmd = createProgram().commands.find(cmd => cmd.name() === 'scan')

      expect(scanCmd?.options.map(opt => opt.long)).toEqual(['--output', '--format', '--name'])
    })

    it('should reject an unknown report format', async () => {
      const program = createProgram().exitOverride()
      program.commands.forEach(cmd => cmd.exitOverride())

      const error: unknown = await program
        .parseAsync(['node', 'filesentry', 'scan', 'x.jpg', '--format', 'xml'])
        .catch((caught: unknown) => caught)

      expect(error).toBeInstanceOf(CommanderError)
      if (error instanceof CommanderError) {
        expect(error.code).toBe('commander.invalidArgument')
      }
    })
  })

  describe('scan command', () => {
    let tempDir: string

    beforeEach(async () => {
      tempDir = await mkdtemp(join(tmpdir(), 'filesentry-cli-'))
    })

    afterEach(async () => {
      await rm(tempDir, { recursive: true, force: true })
    })

    it('should exit with ALLOW (0) for a clean file', async () => {
      const filePath = join(tempDir, 'photo.jpg')
      await writeFile(filePath, buildJpeg())

      await runCli('scan', filePath)

      expect(process.exit).toHaveBeenCalledWith(ExitCode.ALLOW)
    })

    it('should exit with BLOCK (1) for a mismatched extension', async () => {
      const filePath = join(tempDir, 'photo.jpg')
      await writeFile(filePath, buildJpeg())

      await runCli('scan', filePath, '--name', 'photo.gif')

      expect(process.exit).toHaveBeenCalledWith(ExitCode.BLOCK)
    })
  })

  describe('identify command', () => {
    it('should exit with ERROR (2) for a missing file', async () => {
      await runCli('identify', join(tmpdir(), 'filesentry-missing-file.bin'))

      expect(process.exit).toHaveBeenCalledWith(ExitCode.ERROR)
    })
  })

  describe('validate command', () => {
    it('should exit with ALLOW (0) for valid policy file', async () => {
      await runCli('validate', join(fixturesPath, 'valid-policy.yaml'))

      expect(process.exit).toHaveBeenCalledWith(ExitCode.ALLOW)
      expect(console.info).toHaveBeenCalledWith(expect.stringContaining('Policy file is valid'))
    })

    it('should exit with ERROR (2) and list errors for invalid policy file', async () => {
      await runCli('validate', join(fixturesPath, 'invalid-policy.yaml'))

      expect(process.exit).toHaveBeenCalledWith(ExitCode.ERROR)
      expect(console.error).toHaveBeenCalledWith(expect.stringContaining('version: Version must be semver format'))
    })

    it('should exit with ERROR (2) for non-existent policy file', async () => {
      await runCli('validate', '/non-existent/policy.yaml')

      expect(process.exit).toHaveBeenCalledWith(ExitCode.ERROR)
    })

    it('should suppress info output in quiet mode', async () => {
      await runCli('-q', 'validate', join(fixturesPath, 'valid-policy.yaml'))

      expect(process.exit).toHaveBeenCalledWith(ExitCode.ALLOW)
      expect(console.info).not.toHaveBeenCalled()
    })
  })

  describe('init command', () => {
    let tempDir: string

    beforeEach(async () => {
      tempDir = await mkdtemp(join(tmpdir(), 'filesentry-cli-'))
    })

    afterEach(async () => {
      await rm(tempDir, { recursive: true, force: true })
    })

    it('should exit with ALLOW (0) when creating new policy file', async () => {
      const outputPath = join(tempDir, 'new-policy.yaml')

      await runCli('init', '-o', outputPath)

      expect(process.exit).toHaveBeenCalledWith(ExitCode.ALLOW)
      expect(existsSync(outputPath)).toBe(true)
      expect(console.info).toHaveBeenCalledWith(expect.stringContaining('Created policy file'))
    })

    it('should exit with ERROR (2) when file exists without force', async () => {
      const outputPath = join(tempDir, 'existing-policy.yaml')
      await writeFile(outputPath, 'name: mine\n')

      await runCli('init', '-o', outputPath)

      expect(process.exit).toHaveBeenCalledWith(ExitCode.ERROR)
    })

    it('should exit with ALLOW (0) when file exists with force flag', async () => {
      const outputPath = join(tempDir, 'existing-policy.yaml')
      await writeFile(outputPath, 'name: mine\n')

      await runCli('init', '-o', outputPath, '--force')

      expect(process.exit).toHaveBeenCalledWith(ExitCode.ALLOW)
    })
  })
})
