import type { Decision, FileReport, Finding, ScanReport, Severity } from '../../types/index.js'
import { deliverReport, type Reporter, type FileReportOptions } from './base.js'
import { maskFileReport } from './json.js'

/**
 * Extended report options for Markdown reporter
 */
export type MarkdownReportOptions = FileReportOptions

const SEVERITY_ORDER: readonly Severity[] = ['critical', 'high', 'medium', 'low', 'info']

/**
 * Get decision emoji and label
 */
function getDecisionBadge(decision: Decision): { emoji: string; label: string } {
  const badges: Record<Decision, { emoji: string; label: string }> = {
    allow: { emoji: '✅', label: 'ALLOW' },
    block: { emoji: '🚫', label: 'BLOCK' }
  }
  return badges[decision]
}

/**
 * Get severity emoji
 */
function getSeverityEmoji(severity: Severity): string {
  const emojis: Record<Severity, string> = {
    critical: '🔴',
    high: '🟠',
    medium: '🟡',
    low: '🔵',
    info: 'ℹ️'
  }
  return emojis[severity]
}

/**
 * Format duration in seconds
 */
function formatDuration(ms: number): string {
  return (ms / 1000).toFixed(2)
}

/**
 * Pipes would end a table cell
 */
function cell(text: string): string {
  return text.replace(/\|/g, '\\|')
}

/**
 * Most severe finding first, scan order otherwise
 */
function sortBySeverity(findings: readonly Finding[]): Finding[] {
  return [...findings].sort((a, b) => SEVERITY_ORDER.indexOf(a.severity) - SEVERITY_ORDER.indexOf(b.severity))
}

/**
 * Generate summary section
 */
function generateSummarySection(report: ScanReport): string {
  const blocked = report.files.filter(file => !file.safe).length
  const lines: string[] = [
    '## Summary',
    '',
    '| Metric | Value |',
    '|--------|-------|',
    `| Files | ${report.files.length} |`,
    `| Unsafe files | ${blocked} |`,
    `| Policy | ${cell(report.policyName)} |`,
    `| Duration | ${formatDuration(report.duration)}s |`,
    '',
    '### Findings by Severity',
    '',
    '| Severity | Count |',
    '|----------|-------|',
    `| 🔴 Critical | ${report.summary.critical} |`,
    `| 🟠 High | ${report.summary.high} |`,
    `| 🟡 Medium | ${report.summary.medium} |`,
    `| 🔵 Low | ${report.summary.low} |`,
    `| ℹ️ Info | ${report.summary.info} |`,
    ''
  ]

  return lines.join('\n')
}

/**
 * Generate one file section
 */
function generateFileSection(file: FileReport): string {
  const lines: string[] = [
    `### ${file.safe ? '✅' : '❌'} ${file.declaredName}`,
    '',
    '| Property | Value |',
    '|----------|-------|',
    `| Path | \`${cell(file.path)}\` |`,
    `| Media type | ${cell(file.mediaType)} |`,
    `| Scanners | ${file.scanners.length > 0 ? file.scanners.join(', ') : 'none'} |`,
    ''
  ]

  for (const finding of sortBySeverity(file.findings)) {
    lines.push(`- ${getSeverityEmoji(finding.severity)} **${finding.severity}** ${finding.message} _(${finding.category})_`)
  }
  if (file.findings.length > 0) {
    lines.push('')
  }

  return lines.join('\n')
}

/**
 * Generate files section
 */
function generateFilesSection(files: readonly FileReport[]): string {
  if (files.length === 0) {
    return '## Files\n\nNo files were scanned.\n'
  }

  return ['## Files', '', ...files.map(generateFileSection)].join('\n')
}

/**
 * Generate errors section
 */
function generateErrorsSection(errors: readonly string[]): string {
  if (errors.length === 0) {
    return ''
  }

  const lines: string[] = [
    '## Errors',
    '',
    'The following errors occurred during scanning:',
    ''
  ]

  for (const error of errors) {
    lines.push(`- ${error}`)
  }

  lines.push('')

  return lines.join('\n')
}

/**
 * Markdown Reporter for scan results
 *
 * Outputs scan reports in Markdown format for human consumption.
 */
export class MarkdownReporter implements Reporter {
  private readonly defaultOptions: MarkdownReportOptions = {
    format: 'markdown',
    maskPaths: true
  }

  /**
   * Generate Markdown string from scan report
   */
  generate(report: ScanReport, options?: Partial<MarkdownReportOptions>): string {
    const opts = { ...this.defaultOptions, ...options }
    const { emoji, label } = getDecisionBadge(report.decision)
    const files = opts.maskPaths ? report.files.map(maskFileReport) : report.files

    const sections: string[] = [
      '# filesentry Scan Report',
      '',
      `**Decision:** ${emoji} **${label}**`,
      '',
      `*Generated: ${report.timestamp}*`,
      `*Version: ${report.version}*`,
      '',
      '---',
      '',
      generateSummarySection(report),
      generateFilesSection(files),
      generateErrorsSection(report.errors),
      '---',
      '',
      '*Report generated by filesentry*'
    ]

    return sections.filter(Boolean).join('\n')
  }

  /**
   * Write report to file or stdout
   */
  async write(report: ScanReport, options?: Partial<MarkdownReportOptions>): Promise<void> {
    const opts = { ...this.defaultOptions, ...options }
    await deliverReport(this.generate(report, opts), opts)
  }
}

/**
 * Create a new Markdown reporter instance
 */
export function createMarkdownReporter(): MarkdownReporter {
  return new MarkdownReporter()
}
