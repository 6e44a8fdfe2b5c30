/**
 * filesentry - content-security scanning for uploaded files
 *
 * @example
 * const engine = createScanEngine()
 * const result = await engine.scanFile('/tmp/upload-4f2a', 'avatar.png', DEFAULT_POLICY)
 * if (!result.safe) reject(result.threats)
 */

export {
  ScanEngine,
  createScanEngine,
  scanFile,
  type ContentScanner,
  type EngineFlags,
  type FileScanResult,
  type ScanEngineOptions
} from './core/engine/index.js'
export { checkMediaType, expectedMediaTypes, type MediaTypeViolation } from './core/engine/media-policy.js'
export { AccessValidator, type AccessDecision, type AccessFault, type AccessValidatorOptions } from './core/access/validator.js'
export { FormatIdentifier, UNKNOWN_MEDIA_TYPE, type FormatIdentifierOptions } from './core/format/identifier.js'
export * from './core/scanner/index.js'
export { ArchiveInspector, type ArchiveFlags } from './core/archive/inspector.js'
export {
  DEFAULT_POLICY,
  PolicyLoader,
  PolicyLoadError,
  createPolicy,
  createPolicyLoader
} from './core/policy/loader.js'
export {
  LoggerEventSink,
  MemoryEventSink,
  type FileSummary,
  type SecurityEvent,
  type SecurityEventContext,
  type SecurityEventSink
} from './core/events/index.js'
export { configureLogger, createLogger, type Logger } from './utils/logger.js'
export * from './types/index.js'
