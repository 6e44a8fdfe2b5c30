import type { Finding, ScannerReport, ScannerType, ScanResult } from '../../types/finding.js'
import type { ScanPolicy } from '../../types/policy.js'
import { createLogger, type Logger } from '../../utils/logger.js'
import { errorMessage } from '../../utils/errors.js'
import { AccessValidator } from '../access/validator.js'
import { ArchiveInspector } from '../archive/inspector.js'
import {
  LoggerEventSink,
  describeFile,
  describeUnreadable,
  toEvents,
  type SecurityEvent,
  type SecurityEventSink
} from '../events/index.js'
import {
  FormatIdentifier,
  OFFICE_MEDIA_TYPES,
  UNKNOWN_MEDIA_TYPE,
  containsSvgRoot,
  readPrefix
} from '../format/identifier.js'
import { stripMetadata } from '../image/strip.js'
import {
  ThreatCollector,
  accessCategory,
  buildResult,
  readContent,
  writeContent,
  type ScanInput,
  type ScannerDependencies
} from '../scanner/base.js'
import { CodeInjectionScanner } from '../scanner/code-injection.js'
import { DocumentActionScanner } from '../scanner/document-action.js'
import { MacroScanner } from '../scanner/macro.js'
import { MarkupInjectionScanner } from '../scanner/markup-injection.js'
import { MetadataScanner } from '../scanner/metadata.js'
import { baseName } from '../scanner/utils.js'
import { checkMediaType } from './media-policy.js'

export interface EngineFlags {
  /** Metadata was removed from the stored file */
  metadataStripped: boolean
  /** Access was granted without a root restriction */
  unrestricted: boolean
}

/**
 * Aggregate outcome of one upload
 */
export interface FileScanResult extends ScanResult<EngineFlags> {
  readonly path: string
  readonly declaredName: string
  readonly mediaType: string
  /** Reports of the scanners that ran, in dispatch order */
  readonly reports: readonly ScannerReport[]
}

/**
 * Anything the engine can dispatch to
 */
export interface ContentScanner {
  readonly type: ScannerType
  execute(input: ScanInput, policy: ScanPolicy): Promise<ScannerReport>
}

type ScannerToggle = keyof ScanPolicy['scanners']

interface Route {
  toggle: ScannerToggle
  scanner: ContentScanner
  /** `prefix` holds the leading bytes the media type was read from */
  accepts: (mediaType: string, prefix: Uint8Array) => boolean
}

const MACRO_MEDIA_TYPES = new Set<string>([
  ...Object.values(OFFICE_MEDIA_TYPES),
  'application/msword',
  'application/vnd.ms-excel',
  'application/vnd.ms-powerpoint'
])

const IMAGE_MEDIA_TYPES = new Set(['image/jpeg', 'image/png', 'image/gif', 'image/tiff', 'image/webp'])

const ARCHIVE_MEDIA_TYPES = new Set([
  'application/zip',
  'application/gzip',
  'application/x-tar',
  'application/x-bzip2',
  'application/x-rar-compressed',
  'application/x-7z-compressed'
])

/**
 * SVG, or markup the identifier could not name that still opens an `<svg`
 * element
 */
function acceptsMarkup(mediaType: string, prefix: Uint8Array): boolean {
  if (mediaType === 'image/svg+xml') {
    return true
  }
  const untyped = mediaType === UNKNOWN_MEDIA_TYPE || mediaType.startsWith('text/')
  return untyped && containsSvgRoot(prefix)
}

const STRIPPABLE_MEDIA_TYPES = new Set(['image/jpeg', 'image/png'])

export interface ScanEngineOptions {
  accessValidator?: AccessValidator
  formatIdentifier?: FormatIdentifier
  sink?: SecurityEventSink
  logger?: Logger
}

function hasGpsFlag(flags: object): boolean {
  return 'hasGps' in flags && flags.hasGps === true
}

/**
 * Entry point for one uploaded file: access check, identification, media-type
 * policy, dispatch to the content scanners, aggregation and security events.
 *
 * Every scanner shares the engine's AccessValidator and FormatIdentifier.
 */
export class ScanEngine {
  private readonly deps: ScannerDependencies
  private readonly routes: readonly Route[]
  private readonly sink: SecurityEventSink
  private readonly logger: Logger

  constructor(options: ScanEngineOptions = {}) {
    this.deps = {
      accessValidator: options.accessValidator ?? new AccessValidator(),
      formatIdentifier: options.formatIdentifier ?? new FormatIdentifier()
    }
    this.sink = options.sink ?? new LoggerEventSink()
    this.logger = options.logger ?? createLogger('engine')

    this.routes = [
      { toggle: 'code_injection', scanner: new CodeInjectionScanner(this.deps), accepts: () => true },
      {
        toggle: 'markup_injection',
        scanner: new MarkupInjectionScanner(this.deps),
        accepts: acceptsMarkup
      },
      {
        toggle: 'document_action',
        scanner: new DocumentActionScanner(this.deps),
        accepts: mediaType => mediaType === 'application/pdf'
      },
      { toggle: 'macro', scanner: new MacroScanner(this.deps), accepts: mediaType => MACRO_MEDIA_TYPES.has(mediaType) },
      {
        toggle: 'metadata',
        scanner: new MetadataScanner(this.deps),
        accepts: mediaType => IMAGE_MEDIA_TYPES.has(mediaType)
      },
      {
        toggle: 'archive',
        scanner: new ArchiveInspector(this.deps),
        accepts: mediaType => ARCHIVE_MEDIA_TYPES.has(mediaType)
      }
    ]
  }

  /**
   * Scanners that would run for a media type under a policy
   */
  scannersFor(mediaType: string, policy: ScanPolicy, prefix: Uint8Array = new Uint8Array()): ScannerType[] {
    return this.routes
      .filter(route => policy.scanners[route.toggle] && route.accepts(mediaType, prefix))
      .map(route => route.scanner.type)
  }

  async scanFile(path: string, declaredName: string | undefined, policy: ScanPolicy): Promise<FileScanResult> {
    const name = declaredName ?? baseName(path)
    const flags: EngineFlags = { metadataStripped: false, unrestricted: false }

    const decision = await this.deps.accessValidator.validate(path, policy)
    if (!decision.allowed) {
      const threats = new ThreatCollector('access', accessCategory(decision))
      threats.add(decision.reason ?? 'File access denied')
      this.logger.debug(`Access denied for ${name}: ${decision.reason ?? decision.fault ?? 'unknown'}`)
      return this.finish(path, name, UNKNOWN_MEDIA_TYPE, threats.findings(), flags, [], policy, undefined)
    }

    const resolvedPath = decision.resolvedPath ?? path
    flags.unrestricted = decision.unrestricted === true
    const threats = new ThreatCollector('format', 'mime-mismatch')

    let mediaType = UNKNOWN_MEDIA_TYPE
    let reports: ScannerReport[] = []
    try {
      const prefix = await readPrefix(resolvedPath)
      mediaType = await this.deps.formatIdentifier.identify(prefix, policy)
      this.logger.debug(`Identified ${name} as ${mediaType}`)

      const violations = checkMediaType(mediaType, name, policy)
      for (const violation of violations) {
        threats.add(violation.message, violation.category)
      }

      if (!violations.some(violation => violation.final)) {
        reports = await this.dispatch(resolvedPath, name, mediaType, prefix, policy)
        for (const report of reports) {
          threats.merge(report.result.findings)
        }

        if (threats.size === 0) {
          flags.metadataStripped = await this.strip(resolvedPath, mediaType, policy)
        }
      }
    } catch (error) {
      this.logger.error(`Scan of ${name} failed: ${errorMessage(error)}`)
      threats.add(`Scan failed: ${errorMessage(error)}`, 'dangerous-file')
    }

    return this.finish(path, name, mediaType, threats.findings(), flags, reports, policy, resolvedPath)
  }

  private async dispatch(
    path: string,
    declaredName: string,
    mediaType: string,
    prefix: Uint8Array,
    policy: ScanPolicy
  ): Promise<ScannerReport[]> {
    const routes = this.routes.filter(route => policy.scanners[route.toggle] && route.accepts(mediaType, prefix))
    return Promise.all(routes.map(route => route.scanner.execute({ path, declaredName }, policy)))
  }

  /**
   * Rewrite a clean JPEG or PNG without its metadata. True when bytes changed.
   */
  private async strip(path: string, mediaType: string, policy: ScanPolicy): Promise<boolean> {
    if (!policy.metadata.strip_metadata || !STRIPPABLE_MEDIA_TYPES.has(mediaType)) {
      return false
    }
    const noFollow = policy.access.check_symlinks
    const content = await readContent(path, noFollow)
    const stripped = stripMetadata(content, mediaType)
    if (stripped === undefined || stripped.equals(content)) {
      return false
    }
    await writeContent(path, stripped, noFollow)
    this.logger.info(`Stripped ${content.length - stripped.length} bytes of metadata from ${baseName(path)}`)
    return true
  }

  private async finish(
    path: string,
    declaredName: string,
    mediaType: string,
    findings: readonly Finding[],
    flags: EngineFlags,
    reports: readonly ScannerReport[],
    policy: ScanPolicy,
    resolvedPath: string | undefined
  ): Promise<FileScanResult> {
    const result = buildResult(findings, flags)

    if (policy.events.enabled) {
      await this.emit(path, resolvedPath, declaredName, findings, reports, policy)
    }

    return Object.freeze({
      ...result,
      path,
      declaredName,
      mediaType,
      reports: Object.freeze([...reports])
    })
  }

  /**
   * One event per finding; GPS data that the policy tolerates still produces
   * a low-severity event
   */
  private async emit(
    path: string,
    resolvedPath: string | undefined,
    declaredName: string,
    findings: readonly Finding[],
    reports: readonly ScannerReport[],
    policy: ScanPolicy
  ): Promise<void> {
    const tolerated: Finding[] = []
    const gpsReported = findings.some(item => item.category === 'gps-detected')
    if (!gpsReported && reports.some(report => hasGpsFlag(report.result.flags))) {
      tolerated.push({
        scanner: 'metadata',
        category: 'gps-detected',
        severity: 'low',
        message: 'GPS location data found in image metadata'
      })
    }

    const published = [...findings, ...tolerated]
    if (published.length === 0) {
      return
    }

    let file = describeUnreadable(path, declaredName)
    if (resolvedPath !== undefined) {
      try {
        file = await describeFile(resolvedPath, declaredName, policy)
      } catch (error) {
        this.logger.warn(`Could not describe ${declaredName} for security events: ${errorMessage(error)}`)
      }
    }

    for (const event of toEvents(published, file)) {
      await this.record(event)
    }
  }

  private async record(event: SecurityEvent): Promise<void> {
    try {
      await this.sink.record(event)
    } catch (error) {
      this.logger.error(`Security event sink failed for ${event.type}: ${errorMessage(error)}`)
    }
  }
}

/**
 * Engine with the default collaborators
 */
export function createScanEngine(options?: ScanEngineOptions): ScanEngine {
  return new ScanEngine(options)
}

/**
 * Scan one file with a default engine
 */
export async function scanFile(path: string, declaredName: string | undefined, policy: ScanPolicy): Promise<FileScanResult> {
  return createScanEngine().scanFile(path, declaredName, policy)
}
