import type { ScanPolicy } from '../../types/policy.js'
import { getExtension, innerExtensions, resolveList } from '../scanner/utils.js'

const TRAVERSAL = /(?:^|[\\/])\.\.(?:[\\/]|$)/
const ABSOLUTE = /^(?:[\\/]|[A-Za-z]:)/
const ENCODED_TRAVERSAL = /%2e%2e(?:%2f|%5c|[\\/])/i

/**
 * Entry name safe to place in a message: control characters are escaped
 */
export function printableName(name: string): string {
  return name.replace(/[\x00-\x1f\x7f]/g, char => `\\x${char.charCodeAt(0).toString(16).padStart(2, '0')}`)
}

/**
 * Names that would escape the extraction directory
 */
export function traversalThreats(name: string): string[] {
  const shown = printableName(name)
  const threats: string[] = []

  if (TRAVERSAL.test(name)) {
    threats.push(`Path traversal detected: ${shown}`)
  }
  if (ABSOLUTE.test(name)) {
    threats.push(`Absolute path detected in archive: ${shown}`)
  }
  if (ENCODED_TRAVERSAL.test(name)) {
    threats.push(`URL-encoded path traversal detected: ${shown}`)
  }
  if (name.includes('\0')) {
    threats.push(`Null byte in filename detected: ${shown}`)
  }
  return threats
}

/**
 * Link members whose target would escape the extraction directory
 */
export function linkThreats(name: string, target: string): string[] {
  const shown = printableName(name)
  return traversalThreats(target).map(threat => `${threat} (link ${shown})`)
}

/**
 * Blocked extensions after policy additions and exclusions
 */
export function blockedExtensions(policy: ScanPolicy): Set<string> {
  const { blocked_extensions, additional_blocked_extensions, exclude_extensions } = policy.archive
  return new Set(resolveList(blocked_extensions, additional_blocked_extensions, exclude_extensions)
    .map(ext => ext.toLowerCase()))
}

/**
 * Executable and server-side script members, including ones hidden behind a
 * second extension ("shell.php.jpg")
 */
export function extensionThreats(name: string, blocked: ReadonlySet<string>): string[] {
  const shown = printableName(name)
  const threats: string[] = []

  if (blocked.has(getExtension(name))) {
    threats.push(`Dangerous file detected in archive: ${shown}`)
  }
  if (innerExtensions(name).some(ext => blocked.has(ext))) {
    threats.push(`Hidden dangerous extension detected: ${shown}`)
  }
  return threats
}

/**
 * True when the member's own extension names an archive format
 */
export function isNestedArchive(name: string, policy: ScanPolicy): boolean {
  const extension = getExtension(name)
  return extension.length > 0 && policy.archive.archive_extensions.includes(extension)
}
