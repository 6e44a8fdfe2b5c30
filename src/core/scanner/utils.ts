import type { ScanTarget } from './base.js'

/**
 * Last path segment, splitting on both separator conventions
 */
export function baseName(filePath: string): string {
  const segments = filePath.split(/[\\/]/)
  return segments[segments.length - 1] ?? ''
}

/**
 * Lower-case extension without the dot, or '' (hidden files like .htaccess
 * have none)
 */
export function getExtension(filePath: string): string {
  const name = baseName(filePath)
  const dot = name.lastIndexOf('.')
  if (dot <= 0 || dot === name.length - 1) {
    return ''
  }
  return name.slice(dot + 1).toLowerCase()
}

/**
 * Extensions hidden before the final one: "shell.php.jpg" -> ["php"]
 */
export function innerExtensions(filePath: string): string[] {
  const parts = baseName(filePath).toLowerCase().split('.')
  return parts.slice(1, -1).filter(part => part.length > 0)
}

/**
 * Extension the uploader claimed, falling back to the stored file name
 */
export function declaredExtension(target: ScanTarget): string {
  return getExtension(target.declaredName ?? target.path)
}

/**
 * Escape a literal for use inside a RegExp
 */
export function escapeRegExp(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&')
}

/**
 * Number of matches of a global pattern
 */
export function countMatches(content: string, pattern: RegExp): number {
  const flags = pattern.flags.includes('g') ? pattern.flags : pattern.flags + 'g'
  return content.match(new RegExp(pattern.source, flags))?.length ?? 0
}

/**
 * Built-in list with caller additions, minus exclusions (case-insensitive),
 * keeping first-seen order
 */
export function resolveList(
  builtIn: readonly string[],
  additional: readonly string[],
  exclude: readonly string[]
): string[] {
  const excluded = new Set(exclude.map(item => item.toLowerCase()))
  const result: string[] = []
  const seen = new Set<string>()
  for (const item of [...builtIn, ...additional]) {
    const key = item.toLowerCase()
    if (!excluded.has(key) && !seen.has(key)) {
      seen.add(key)
      result.push(item)
    }
  }
  return result
}

const BINARY_MEDIA_PREFIXES = [
  'image/',
  'video/',
  'audio/',
  'font/',
  'application/vnd.openxmlformats-officedocument.',
  'application/vnd.oasis.opendocument.'
]

const BINARY_CONTAINERS = new Set([
  'application/pdf',
  'application/msword',
  'application/epub+zip',
  'application/zip',
  'application/gzip',
  'application/x-tar',
  'application/x-bzip2',
  'application/x-xz',
  'application/x-7z-compressed',
  'application/x-rar-compressed',
  'application/x-compress',
  'application/x-lzh'
])

/**
 * Binary media that cannot host interpretable script text. SVG is markup.
 */
export function isBinaryMedia(mediaType: string): boolean {
  if (mediaType === 'image/svg+xml') {
    return false
  }
  return BINARY_CONTAINERS.has(mediaType) ||
    BINARY_MEDIA_PREFIXES.some(prefix => mediaType.startsWith(prefix))
}
