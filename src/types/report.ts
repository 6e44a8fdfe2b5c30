import type { Finding, FindingSummary, ScannerType } from './finding.js'

/**
 * Decision for a batch of files
 */
export type Decision = 'allow' | 'block'

/**
 * Per-file entry of a report
 */
export interface FileReport {
  path: string
  declaredName: string
  mediaType: string
  safe: boolean
  findings: Finding[]
  /** Scanners that ran, in dispatch order */
  scanners: ScannerType[]
  /** Flag records keyed by component ("engine" or a scanner type) */
  flags: Record<string, object>
}

/**
 * Complete scan report
 */
export interface ScanReport {
  /** Report version */
  version: string

  /** Timestamp of the scan */
  timestamp: string

  /** Final decision: block when any file is unsafe */
  decision: Decision

  /** Scanned files */
  files: FileReport[]

  /** Summary of findings by severity */
  summary: FindingSummary

  /** Scan duration in milliseconds */
  duration: number

  /** Policy used for evaluation */
  policyName: string

  /** Any errors encountered */
  errors: string[]
}

/**
 * Options for report generation
 */
export interface ReportOptions {
  format: 'json' | 'markdown'
  output?: string
  quiet?: boolean
}
