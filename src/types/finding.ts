/**
 * Severity levels for security findings
 */
export type Severity = 'critical' | 'high' | 'medium' | 'low' | 'info'

/**
 * Components that can produce findings
 */
export type ScannerType =
  | 'access'
  | 'format'
  | 'code-injection'
  | 'markup-injection'
  | 'document-action'
  | 'macro'
  | 'metadata'
  | 'archive'

/**
 * Fixed taxonomy of security events. Every finding belongs to exactly one.
 */
export type ThreatCategory =
  | 'mime-mismatch'
  | 'dangerous-file'
  | 'code-injection'
  | 'markup-injection'
  | 'metadata-threat'
  | 'document-threat'
  | 'gps-detected'
  | 'entity-attack'
  | 'archive-threat'
  | 'macro-detected'
  | 'symlink-detected'
  | 'decompression-bomb'

export const THREAT_CATEGORIES: readonly ThreatCategory[] = [
  'mime-mismatch',
  'dangerous-file',
  'code-injection',
  'markup-injection',
  'metadata-threat',
  'document-threat',
  'gps-detected',
  'entity-attack',
  'archive-threat',
  'macro-detected',
  'symlink-detected',
  'decompression-bomb'
]

/**
 * Severity tier of each category
 */
export const CATEGORY_SEVERITY: Readonly<Record<ThreatCategory, Severity>> = {
  'mime-mismatch': 'high',
  'dangerous-file': 'critical',
  'code-injection': 'critical',
  'markup-injection': 'high',
  'metadata-threat': 'high',
  'document-threat': 'high',
  'gps-detected': 'low',
  'entity-attack': 'critical',
  'archive-threat': 'high',
  'macro-detected': 'high',
  'symlink-detected': 'critical',
  'decompression-bomb': 'critical'
}

/**
 * A single security finding
 */
export interface Finding {
  /** Component that detected this finding */
  readonly scanner: ScannerType

  /** Event category */
  readonly category: ThreatCategory

  /** Severity level */
  readonly severity: Severity

  /** Human-readable description, also the threat string */
  readonly message: string
}

/**
 * Outcome of one scan. `threats` mirrors the messages of `findings`.
 */
export interface ScanResult<F extends object = object> {
  readonly safe: boolean
  readonly threats: readonly string[]
  readonly findings: readonly Finding[]
  readonly flags: Readonly<F>
}

/**
 * Summary of findings by severity
 */
export interface FindingSummary {
  critical: number
  high: number
  medium: number
  low: number
  info: number
}

/**
 * Result from a single scanner run, with timing
 */
export interface ScannerReport<F extends object = object> {
  scanner: ScannerType
  result: ScanResult<F>
  duration: number
}
