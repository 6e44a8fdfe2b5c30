import { mkdir, writeFile } from 'node:fs/promises'
import { dirname } from 'path'
import type { ScanReport, ReportOptions } from '../../types/index.js'

/**
 * Renders a scan report for people or machines
 */
export interface Reporter {
  generate(report: ScanReport, options?: Partial<ReportOptions>): string

  /**
   * Write the rendered report to `output`, or to stdout unless quiet
   */
  write(report: ScanReport, options?: Partial<ReportOptions>): Promise<void>
}

/**
 * Report options shared by the bundled reporters
 */
export interface FileReportOptions extends ReportOptions {
  /** Pretty print JSON with indentation */
  pretty?: boolean
  /** Redact user directories and control characters in file names */
  maskPaths?: boolean
}

/**
 * Send rendered report text where the options point. Missing parent
 * directories of `output` are created.
 */
export async function deliverReport(content: string, options: Partial<ReportOptions>): Promise<void> {
  if (options.output) {
    await mkdir(dirname(options.output), { recursive: true })
    await writeFile(options.output, content, 'utf-8')
  } else if (!options.quiet) {
    process.stdout.write(content + '\n')
  }
}
