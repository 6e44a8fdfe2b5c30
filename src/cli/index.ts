#!/usr/bin/env node
/**
 * filesentry CLI entry point
 *
 * Content-security scanner for uploaded files
 */

import { Command } from 'commander'
import { realpathSync } from 'fs'
import { pathToFileURL } from 'url'
import { configureLogger, createLogger } from '../utils/logger.js'
import { errorMessage } from '../utils/errors.js'
import { createPolicyLoader } from '../core/policy/loader.js'
import { initCommand, DEFAULT_OUTPUT_FILENAME } from './commands/init.js'
import { registerScanCommand } from './commands/scan.js'
import { executeIdentify } from './commands/identify.js'
import { ExitCode, type GlobalOptions } from './options.js'

export { ExitCode, type ExitCodeType, type GlobalOptions } from './options.js'

const logger = createLogger('cli')

export const VERSION = '1.0.0'

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()

  program
    .name('filesentry')
    .description('Content-security scanner for uploaded files')
    .version(VERSION)
    .option('-v, --verbose', 'Enable verbose output')
    .option('-q, --quiet', 'Suppress output except errors')
    .option('-c, --config <path>', 'Path to policy configuration file')
    .hook('preAction', () => {
      const { verbose, quiet } = program.opts<GlobalOptions>()
      configureLogger({ level: verbose ? 'debug' : 'info', quiet: quiet ?? false })
    })

  registerScanCommand(program)

  program
    .command('identify <files...>')
    .description('Print the detected media type of each file')
    .action(async (files: string[]) => {
      process.exit(await executeIdentify(files, program.opts<GlobalOptions>()))
    })

  program
    .command('init')
    .description('Generate a default policy configuration file')
    .option('-o, --output <file>', 'Output file path', DEFAULT_OUTPUT_FILENAME)
    .option('--force', 'Overwrite existing file')
    .action(async (options: { output?: string; force?: boolean }) => {
      const { quiet } = program.opts<GlobalOptions>()
      const result = await initCommand(options)

      if (result.success) {
        if (!quiet) {
          logger.info(`Created policy file: ${result.outputPath}`)
        }
        process.exit(ExitCode.ALLOW)
      }
      logger.error(`Failed to create policy file: ${result.error ?? 'unknown error'}`)
      process.exit(ExitCode.ERROR)
    })

  program
    .command('validate <policy>')
    .description('Validate a policy configuration file')
    .action(async (policy: string) => {
      const { quiet } = program.opts<GlobalOptions>()
      const result = await createPolicyLoader().validate(policy)

      if (result.valid) {
        if (!quiet) {
          logger.info(`✓ Policy file is valid: ${policy}`)
        }
        process.exit(ExitCode.ALLOW)
      }
      logger.error(`✗ Policy file is invalid: ${policy}`)
      for (const error of result.errors) {
        logger.error(`  - ${error}`)
      }
      process.exit(ExitCode.ERROR)
    })

  return program
}

/**
 * Run the CLI
 */
export async function run(args: string[] = process.argv): Promise<void> {
  const program = createProgram()

  try {
    await program.parseAsync(args)
  } catch (error) {
    logger.error(`CLI error: ${errorMessage(error)}`)
    process.exit(ExitCode.ERROR)
  }
}

/**
 * True when this module is the process entry, including through the npm bin symlink
 */
function isMainModule(): boolean {
  const entry = process.argv[1]
  if (entry === undefined) {
    return false
  }
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href
  } catch {
    return false
  }
}

if (isMainModule()) {
  await run()
}
