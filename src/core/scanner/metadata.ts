import type { ThreatCategory } from '../../types/finding.js'
import { createLogger, type Logger } from '../../utils/logger.js'
import { readImageStructure } from '../image/structure.js'
import { BaseScanner, type InspectionContext, type ScannerDependencies } from './base.js'

export interface MetadataFlags {
  /** GPS coordinates are embedded */
  hasGps: boolean
  /** Bytes follow the image end marker */
  hasTrailingData: boolean
}

const FIELD_CHECKS: ReadonlyArray<{ pattern: RegExp; label: string }> = [
  { pattern: /<\?php|<\?=|\beval\s*\(|\bexec\s*\(/i, label: 'Suspicious PHP code' },
  { pattern: /\bbash\b|\bsh\s+-c\b|cmd\.exe/i, label: 'Suspicious shell command' },
  { pattern: /javascript:|data:text\/html|vbscript:/i, label: 'Suspicious URL protocol' }
]

const TRAILING_SCRIPT = /<\?php|<\?=|\b(?:eval|exec|system|shell_exec|passthru|base64_decode)\s*\(/i

/**
 * Checks raster images for script hidden in metadata fields or appended
 * after the end marker, and reports embedded GPS coordinates
 */
export class MetadataScanner extends BaseScanner<MetadataFlags> {
  readonly type = 'metadata' as const
  readonly name = 'Metadata Scanner'
  protected readonly category: ThreatCategory = 'metadata-threat'
  private readonly logger: Logger

  constructor(deps: ScannerDependencies, logger: Logger = createLogger('metadata')) {
    super(deps)
    this.logger = logger
  }

  protected initialFlags(): MetadataFlags {
    return { hasGps: false, hasTrailingData: false }
  }

  protected inspect({ content, mediaType, policy, threats, flags }: InspectionContext<MetadataFlags>): void {
    if (!mediaType.startsWith('image/') || mediaType === 'image/svg+xml') {
      threats.add('Not a valid image file')
      return
    }

    const raw = content.toString('latin1')
    if (/<\?php/i.test(raw)) {
      threats.add('PHP opening tag (<?php) found in image data')
    }

    const structure = readImageStructure(content, mediaType)
    if (structure === undefined) {
      return
    }
    if (structure.undecodable.length > 0) {
      this.logger.debug(`Could not inflate text chunks: ${structure.undecodable.join(', ')}`)
    }

    const scanned = new Set(policy.metadata.scanned_fields.map(field => field.toLowerCase()))
    for (const field of structure.fields) {
      if (!scanned.has(field.name.toLowerCase())) {
        continue
      }
      for (const check of FIELD_CHECKS) {
        if (check.pattern.test(field.value)) {
          threats.add(`${check.label} found in metadata field: ${field.name}`)
        }
      }
    }

    if (structure.gpsTags.length > 0) {
      flags.hasGps = true
      if (policy.metadata.block_gps) {
        threats.add('GPS location data found in image metadata', 'gps-detected')
      }
    }

    if (structure.endOffset !== undefined && structure.endOffset < content.length) {
      flags.hasTrailingData = true
      const trailing = content.subarray(structure.endOffset)
      if (trailing.length > policy.metadata.trailing_data_threshold) {
        threats.add('Suspicious trailing data found after image end marker')
      }
      if (TRAILING_SCRIPT.test(trailing.toString('latin1'))) {
        threats.add('Script code detected in trailing bytes')
      }
    }
  }
}
