import { stat } from 'fs/promises'
import type { Finding, Severity, ThreatCategory } from '../../types/finding.js'
import type { ScanPolicy } from '../../types/policy.js'
import { SEVERITY_LOG_LEVEL, createLogger, type Logger } from '../../utils/logger.js'
import { formatBytes, hashFile } from '../../utils/hash.js'
import { maskFileName, maskPath } from '../../utils/mask.js'

/**
 * Descriptor of the scanned file attached to every event
 */
export interface FileSummary {
  declaredName: string
  /** Path with the user directory redacted */
  path: string
  size: number
  humanSize: string
  sha256?: string
}

export interface SecurityEventContext {
  file: FileSummary
  /** Every threat message of the scan, not only this event's */
  findings: readonly string[]
}

/**
 * One finding as published to a sink
 */
export interface SecurityEvent {
  type: ThreatCategory
  severity: Severity
  message: string
  context: SecurityEventContext
}

/**
 * Destination for security events. Formatting and persistence are up to the sink.
 */
export interface SecurityEventSink {
  record(event: SecurityEvent): void | Promise<void>
}

/**
 * Default sink: one log line per event, at a level derived from its severity
 */
export class LoggerEventSink implements SecurityEventSink {
  constructor(private readonly logger: Logger = createLogger('events')) {}

  record(event: SecurityEvent): void {
    const { file } = event.context
    const digest = file.sha256 ? ` sha256=${file.sha256}` : ''
    this.logger[SEVERITY_LOG_LEVEL[event.severity]](
      `${event.type}: ${event.message} (file=${file.declaredName} path=${file.path} size=${file.humanSize}${digest})`
    )
  }
}

/**
 * Keeps events in memory, for callers that inspect them after a scan
 */
export class MemoryEventSink implements SecurityEventSink {
  readonly events: SecurityEvent[] = []

  record(event: SecurityEvent): void {
    this.events.push(event)
  }

  clear(): void {
    this.events.length = 0
  }
}

/**
 * Describe a file for event context. The digest is computed only when
 * `events.include_hash` is set.
 */
export async function describeFile(path: string, declaredName: string, policy: ScanPolicy): Promise<FileSummary> {
  const { size } = await stat(path)
  const summary: FileSummary = {
    declaredName: maskFileName(declaredName),
    path: maskPath(path),
    size,
    humanSize: formatBytes(size)
  }
  if (policy.events.include_hash) {
    summary.sha256 = await hashFile(path)
  }
  return summary
}

/**
 * Summary of a file that was refused before it could be read
 */
export function describeUnreadable(path: string, declaredName: string): FileSummary {
  return {
    declaredName: maskFileName(declaredName),
    path: maskPath(path),
    size: 0,
    humanSize: formatBytes(0)
  }
}

/**
 * One event per finding, sharing the file context
 */
export function toEvents(findings: readonly Finding[], file: FileSummary): SecurityEvent[] {
  const messages = findings.map(item => item.message)
  return findings.map(item => ({
    type: item.category,
    severity: item.severity,
    message: item.message,
    context: { file, findings: messages }
  }))
}
