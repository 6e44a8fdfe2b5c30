/**
 * Scan command implementation
 *
 * Policy → ScanEngine (one file at a time) → ScanReport → Reporter
 */

import { InvalidArgumentError, type Command } from 'commander'
import { ExitCode, createCliEngine, loadPolicy, type GlobalOptions } from '../options.js'
import { createLogger, finding, success } from '../../utils/logger.js'
import { errorMessage } from '../../utils/errors.js'
import type { FileScanResult, ScanEngine } from '../../core/engine/index.js'
import { JsonReporter } from '../../core/reporter/json.js'
import { MarkdownReporter } from '../../core/reporter/markdown.js'
import type { FileReport, FindingSummary, ScanReport } from '../../types/index.js'

const logger = createLogger('scan')

export const REPORT_VERSION = '1.0.0'

/**
 * Scan command options
 */
export interface ScanOptions {
  output?: string
  format?: 'json' | 'markdown'
  /** Name the uploader gave the file; single file only */
  name?: string
}

/**
 * Report entry of one engine result
 */
export function buildFileReport(result: FileScanResult): FileReport {
  const flags: Record<string, object> = { engine: result.flags }
  for (const report of result.reports) {
    flags[report.scanner] = report.result.flags
  }

  return {
    path: result.path,
    declaredName: result.declaredName,
    mediaType: result.mediaType,
    safe: result.safe,
    findings: [...result.findings],
    scanners: result.reports.map(report => report.scanner),
    flags
  }
}

/**
 * Count findings of every file by severity
 */
export function summarize(files: readonly FileReport[]): FindingSummary {
  const summary: FindingSummary = { critical: 0, high: 0, medium: 0, low: 0, info: 0 }
  for (const file of files) {
    for (const finding of file.findings) {
      summary[finding.severity]++
    }
  }
  return summary
}

export function buildReport(
  results: readonly FileScanResult[],
  policyName: string,
  duration: number
): ScanReport {
  const files = results.map(buildFileReport)
  return {
    version: REPORT_VERSION,
    timestamp: new Date().toISOString(),
    decision: files.every(file => file.safe) ? 'allow' : 'block',
    files,
    summary: summarize(files),
    duration,
    policyName,
    errors: []
  }
}

/**
 * Execute scan command
 */
export async function executeScan(
  files: string[],
  options: ScanOptions,
  globalOptions: GlobalOptions,
  engine: ScanEngine = createCliEngine()
): Promise<number> {
  const startTime = Date.now()

  if (options.name !== undefined && files.length !== 1) {
    if (!globalOptions.quiet) {
      logger.error('--name can only be used with a single file')
    }
    return ExitCode.ERROR
  }

  try {
    const policy = await loadPolicy(globalOptions)

    const results: FileScanResult[] = []
    for (const file of files) {
      if (globalOptions.verbose) {
        logger.info(`Scanning ${file}`)
      }
      results.push(await engine.scanFile(file, options.name, policy))
    }

    const report = buildReport(results, policy.name, Date.now() - startTime)

    const reporter = options.format === 'markdown'
      ? new MarkdownReporter()
      : new JsonReporter()
    await reporter.write(report, {
      output: options.output,
      quiet: globalOptions.quiet
    })

    // The report itself went to stdout unless written to a file
    if (!globalOptions.quiet && options.output) {
      printSummary(report)
    }

    return report.decision === 'allow' ? ExitCode.ALLOW : ExitCode.BLOCK
  } catch (error) {
    if (!globalOptions.quiet) {
      logger.error(`Scan failed: ${errorMessage(error)}`)
    }
    return ExitCode.ERROR
  }
}

function printSummary(report: ScanReport): void {
  for (const file of report.files) {
    for (const item of file.findings) {
      finding(item, file.declaredName)
    }
  }

  const unsafe = report.files.filter(file => !file.safe).length
  if (report.decision === 'allow') {
    success(`ALLOWED: ${report.files.length} file(s) scanned, no threats found`)
  } else {
    logger.warn(`BLOCKED: ${unsafe} of ${report.files.length} file(s) unsafe`)
  }
}

function parseFormat(value: string): 'json' | 'markdown' {
  if (value !== 'json' && value !== 'markdown') {
    throw new InvalidArgumentError('Expected json or markdown.')
  }
  return value
}

/**
 * Register scan command on the program
 */
export function registerScanCommand(program: Command): void {
  program
    .command('scan <files...>')
    .description('Scan uploaded files for security threats')
    .option('-o, --output <file>', 'Output file path')
    .option('-f, --format <format>', 'Output format (json|markdown)', parseFormat, 'json')
    .option('-n, --name <name>', 'Declared (client-supplied) file name')
    .action(async (files: string[], options: ScanOptions) => {
      const exitCode = await executeScan(files, options, program.opts<GlobalOptions>())
      process.exit(exitCode)
    })
}
