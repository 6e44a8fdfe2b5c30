import type { ThreatCategory } from '../../types/finding.js'
import type { ScanPolicy } from '../../types/policy.js'
import { MalformedArchiveError } from '../archive/types.js'
import { readZipDirectory, readZipEntries, readZipMember, type ZipEntry } from '../archive/zip.js'
import { BaseScanner, type ThreatCollector, type InspectionContext } from './base.js'
import { declaredExtension } from './utils.js'

export interface MacroFlags {
  hasMacros: boolean
  /** ActiveX controls or embedded OLE objects */
  hasActiveX: boolean
  /** Binary (OLE compound) Office file */
  legacyFormat: boolean
}

export const OLE_HEADER = Buffer.from('d0cf11e0a1b11ae1', 'hex')

const VBA_LOCATIONS = [
  'word/vbaProject.bin',
  'xl/vbaProject.bin',
  'ppt/vbaProject.bin',
  'vbaProject.bin'
] as const

export const MACRO_CONTENT_TYPES: readonly string[] = [
  'application/vnd.ms-office.vbaProject',
  'application/vnd.ms-word.document.macroEnabled',
  'application/vnd.ms-excel.sheet.macroEnabled',
  'application/vnd.ms-powerpoint.presentation.macroEnabled',
  'application/vnd.ms-excel.sheet.macroEnabled.main+xml',
  'application/vnd.ms-word.document.macroEnabled.main+xml',
  'application/vnd.ms-powerpoint.presentation.macroEnabled.main+xml'
]

const CONTENT_TYPES_PART = '[Content_Types].xml'
const PACKAGE_ROOTS = ['word/', 'xl/', 'ppt/'] as const
/** Largest `[Content_Types].xml` the scanner inflates */
export const MAX_MANIFEST_SIZE = 1024 * 1024

const CONTROL_PART = /(?:activex[/\\]activex\d*\.(?:xml|bin)|embeddings[/\\]oleObject\d*\.bin)$/i

export function isLegacyOffice(content: Buffer): boolean {
  return content.subarray(0, OLE_HEADER.length).equals(OLE_HEADER)
}

/**
 * Central directory of the package, or undefined when the bytes are not a
 * ZIP. Enumeration stops once `maxEntries` is passed, whatever the end
 * record declares.
 */
function readPackage(content: Buffer, maxEntries: number): ZipEntry[] | undefined {
  try {
    const entries: ZipEntry[] = []
    for (const entry of readZipEntries(content, readZipDirectory(content))) {
      entries.push(entry)
      if (entries.length > maxEntries) {
        break
      }
    }
    return entries
  } catch (error) {
    if (error instanceof MalformedArchiveError) {
      return undefined
    }
    throw error
  }
}

function findManifest(entries: readonly ZipEntry[]): ZipEntry | undefined {
  return entries.find(entry => !entry.directory && entry.name === CONTENT_TYPES_PART)
}

/**
 * A manifest plus at least one document root (directory entries included)
 */
function isOfficePackage(entries: readonly ZipEntry[]): boolean {
  return findManifest(entries) !== undefined &&
    entries.some(entry => PACKAGE_ROOTS.some(root => entry.name.startsWith(root)))
}

/**
 * Where the VBA project is stored, if anywhere
 */
function findVbaProject(names: readonly string[]): string | undefined {
  return VBA_LOCATIONS.find(location => names.includes(location)) ??
    names.find(name => name.toLowerCase().endsWith('vbaproject.bin'))
}

/**
 * Macro content types named by the manifest. An oversized manifest is
 * reported instead of inflated.
 */
function findMacroContentTypes(content: Buffer, manifest: ZipEntry, threats: ThreatCollector): string[] {
  if (manifest.uncompressedSize > MAX_MANIFEST_SIZE) {
    threats.add('Office manifest exceeds size limit', 'decompression-bomb')
    return []
  }
  const lower = readZipMember(content, manifest, MAX_MANIFEST_SIZE).toString('utf-8').toLowerCase()
  return MACRO_CONTENT_TYPES.filter(type => lower.includes(type.toLowerCase()))
}

/**
 * Extensions whose users expect a macro-free document
 */
function macroFreeExtensions(policy: ScanPolicy): Set<string> {
  const allowed = new Set(policy.macro.allowed_macro_extensions)
  return new Set(policy.macro.non_macro_extensions.filter(ext => !allowed.has(ext)))
}

/**
 * Finds VBA projects, macro content types and legacy controls in Office Open
 * XML packages, and macro-enabled documents renamed to a macro-free extension
 */
export class MacroScanner extends BaseScanner<MacroFlags> {
  readonly type = 'macro' as const
  readonly name = 'Macro Scanner'
  protected readonly category: ThreatCategory = 'macro-detected'

  protected initialFlags(): MacroFlags {
    return { hasMacros: false, hasActiveX: false, legacyFormat: false }
  }

  protected inspect({ content, target, policy, threats, flags }: InspectionContext<MacroFlags>): void {
    const options = policy.macro

    if (isLegacyOffice(content)) {
      flags.legacyFormat = true
      if (options.block_legacy_format) {
        threats.add('Legacy Office format cannot be verified as macro-free')
      }
      return
    }

    const maxEntries = policy.archive.max_files_count
    const entries = readPackage(content, maxEntries)
    if (entries !== undefined && entries.length > maxEntries) {
      threats.add(`Archive contains too many files (${entries.length} > ${maxEntries})`, 'decompression-bomb')
      return
    }
    if (entries === undefined || !isOfficePackage(entries)) {
      threats.add('File is not a valid Office document')
      return
    }
    const names = entries.filter(entry => !entry.directory).map(entry => entry.name)

    const vbaLocation = findVbaProject(names)
    if (vbaLocation !== undefined) {
      flags.hasMacros = true
      if (options.block_macros) {
        threats.add(`VBA macro detected: ${vbaLocation}`)
      }
    }

    const manifest = findManifest(entries)
    const macroTypes = manifest === undefined ? [] : findMacroContentTypes(content, manifest, threats)
    if (macroTypes.length > 0) {
      flags.hasMacros = true
      if (options.block_macros) {
        for (const type of macroTypes) {
          threats.add(`Macro content type detected: ${type}`)
        }
      }
    }

    const controls = names.filter(name => CONTROL_PART.test(name)).length
    if (controls > 0) {
      flags.hasActiveX = true
      if (options.block_legacy_controls) {
        threats.add(`ActiveX control detected: ${controls} control(s)`)
      }
    }

    const extension = declaredExtension(target)
    if (flags.hasMacros && macroFreeExtensions(policy).has(extension)) {
      threats.add(`Macro-enabled document disguised as .${extension}`)
    }
  }
}
