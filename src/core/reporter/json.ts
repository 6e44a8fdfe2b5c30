import type { FileReport, ScanReport } from '../../types/index.js'
import { maskFileName, maskPath } from '../../utils/mask.js'
import { deliverReport, type Reporter, type FileReportOptions } from './base.js'

/**
 * Redact user directories and unprintable name characters
 */
export function maskFileReport(file: FileReport): FileReport {
  return {
    ...file,
    path: maskPath(file.path),
    declaredName: maskFileName(file.declaredName)
  }
}

/**
 * Mask file locations in a scan report
 */
export function maskReport(report: ScanReport): ScanReport {
  return {
    ...report,
    files: report.files.map(maskFileReport)
  }
}

/**
 * JSON Reporter for scan results
 *
 * Outputs scan reports in JSON format for machine consumption.
 * File paths are masked unless `maskPaths` is turned off.
 */
export class JsonReporter implements Reporter {
  private readonly defaultOptions: FileReportOptions = {
    format: 'json',
    pretty: true,
    maskPaths: true
  }

  /**
   * Generate JSON string from scan report
   */
  generate(report: ScanReport, options?: Partial<FileReportOptions>): string {
    const opts = { ...this.defaultOptions, ...options }

    const outputReport = opts.maskPaths ? maskReport(report) : report

    if (opts.pretty) {
      return JSON.stringify(outputReport, null, 2)
    }

    return JSON.stringify(outputReport)
  }

  /**
   * Write report to file or stdout
   */
  async write(report: ScanReport, options?: Partial<FileReportOptions>): Promise<void> {
    const opts = { ...this.defaultOptions, ...options }
    await deliverReport(this.generate(report, opts), opts)
  }
}

/**
 * Create a new JSON reporter instance
 */
export function createJsonReporter(): JsonReporter {
  return new JsonReporter()
}
