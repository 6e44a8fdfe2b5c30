import { lookup } from 'mime-types'
import { z } from 'zod'
import type { ThreatCategory } from '../../types/finding.js'
import type { ScanPolicy } from '../../types/policy.js'
import { loadDataFile } from '../../utils/data.js'
import { UNKNOWN_MEDIA_TYPE } from '../format/identifier.js'
import { getExtension } from '../scanner/utils.js'

const EXTENSION_MAP: Readonly<Record<string, readonly string[]>> = Object.freeze(
  loadDataFile('extension-map.json', z.record(z.array(z.string().min(1))))
)

export interface MediaTypeViolation {
  category: ThreatCategory
  message: string
  /** No content scanner runs after this violation */
  final: boolean
}

/**
 * Media types a declared extension may legitimately carry, or undefined when
 * the extension is unknown to both the bundled map and the mime-types database
 */
export function expectedMediaTypes(extension: string): readonly string[] | undefined {
  const mapped = EXTENSION_MAP[extension]
  if (mapped !== undefined) {
    return mapped
  }
  const registered = lookup(extension)
  return registered === false ? undefined : [registered]
}

/**
 * Exact match, or a `type/*` wildcard
 */
export function matchesMediaType(mediaType: string, pattern: string): boolean {
  if (pattern.endsWith('/*')) {
    return mediaType.startsWith(pattern.slice(0, -1))
  }
  return mediaType === pattern
}

/**
 * Checks of the detected type against the `mime` policy section, in order:
 * allow-list, dangerous types, unknown types, declared extension
 */
export function checkMediaType(mediaType: string, declaredName: string, policy: ScanPolicy): MediaTypeViolation[] {
  const { mime } = policy
  const violations: MediaTypeViolation[] = []

  if (mime.allowed_types.length > 0 && !mime.allowed_types.some(pattern => matchesMediaType(mediaType, pattern))) {
    violations.push({ category: 'mime-mismatch', message: `File type ${mediaType} is not allowed`, final: false })
  }

  if (mime.block_dangerous && mime.dangerous_types.includes(mediaType)) {
    violations.push({ category: 'dangerous-file', message: `Dangerous file type detected: ${mediaType}`, final: true })
    return violations
  }

  if (mediaType === UNKNOWN_MEDIA_TYPE) {
    if (!mime.allow_unknown) {
      violations.push({ category: 'mime-mismatch', message: 'File type could not be determined', final: false })
    }
    return violations
  }

  const extension = getExtension(declaredName)
  if (mime.strict_extension_match && extension.length > 0) {
    const expected = expectedMediaTypes(extension)
    if (expected !== undefined && !expected.includes(mediaType)) {
      violations.push({
        category: 'mime-mismatch',
        message: `File extension .${extension} does not match detected type ${mediaType}`,
        final: false
      })
    }
  }

  return violations
}
