import type { ThreatCategory } from '../../types/finding.js'
import type { ScanPolicy } from '../../types/policy.js'
import { BaseScanner, toTarget, type InspectionContext, type ScanInput } from './base.js'
import { countMatches, escapeRegExp, resolveList } from './utils.js'

export interface DocumentActionFlags {
  hasJavaScript: boolean
  hasExternalLinks: boolean
}

/**
 * Document properties read from the info dictionary
 */
export interface PdfMetadata {
  version?: string
  title?: string
  author?: string
  creator?: string
  producer?: string
}

export const DANGEROUS_ACTIONS: readonly string[] = [
  '/Launch',
  '/JavaScript',
  '/JS',
  '/URI',
  '/SubmitForm',
  '/ImportData',
  '/GoToR',
  '/GoToE',
  '/Sound',
  '/Movie',
  '/RichMedia',
  '/EmbeddedFile',
  '/FileAttachment'
]

const SCRIPT_ACTIONS = new Set(['/javascript', '/js'])
const LINK_ACTIONS = new Set(['/uri', '/submitform', '/gotor'])

const SCRIPT_FUNCTIONS = [
  'app.alert',
  'app.launchURL',
  'app.openDoc',
  'app.execMenuItem',
  'util.printf',
  'getURL',
  'submitForm',
  'importDataObject',
  'exportDataObject',
  'this.exportDataObject',
  'this.submitForm',
  'eval(',
  'unescape(',
  'String.fromCharCode'
] as const

const DANGEROUS_PROTOCOLS = ['javascript:', 'file://', 'vbscript:', 'data:'] as const

const SCRIPT_MARKER = /\/JavaScript|\/JS\s*<<|\/JS\s*\[/i

const PDF_HEADER = '%PDF-'

function isPdf(content: Buffer): boolean {
  return content.toString('latin1', 0, PDF_HEADER.length) === PDF_HEADER
}

type ActionClass = 'script' | 'link' | 'other'

function classifyAction(action: string): ActionClass {
  const key = action.toLowerCase()
  if (SCRIPT_ACTIONS.has(key)) {
    return 'script'
  }
  return LINK_ACTIONS.has(key) ? 'link' : 'other'
}

/**
 * A name token, not a prefix of a longer one: /JS matches "/JS " but not "/JSON"
 */
function actionPattern(action: string): RegExp {
  return new RegExp(`${escapeRegExp(action)}(?![A-Za-z0-9])`, 'i')
}

function resolveActions(policy: ScanPolicy): string[] {
  const options = policy.document_action
  return resolveList(DANGEROUS_ACTIONS, options.additional_actions, options.exclude_actions)
}

/**
 * Version and info-dictionary strings of a PDF
 */
export function extractPdfMetadata(content: Buffer): PdfMetadata {
  const text = content.toString('latin1')
  const metadata: PdfMetadata = {}

  const version = /%PDF-([\d.]+)/.exec(text)
  if (version) {
    metadata.version = version[1]
  }

  const fields = [
    ['title', 'Title'],
    ['author', 'Author'],
    ['creator', 'Creator'],
    ['producer', 'Producer']
  ] as const
  for (const [key, name] of fields) {
    const match = new RegExp(`/${name}\\s*\\(([\\s\\S]*?)\\)`).exec(text)
    if (match) {
      metadata[key] = match[1].trim()
    }
  }

  return metadata
}

/**
 * Page count from page objects, falling back to the page tree's /Count
 */
export function countPdfPages(content: Buffer): number {
  const text = content.toString('latin1')

  const pages = countMatches(text, /\/Type\s*\/Page(?![a-zA-Z])/i)
  if (pages > 0) {
    return pages
  }

  const tree = /\/Type\s*\/Pages[\s\S]*?\/Count\s+(\d+)/i.exec(text)
  return tree ? Number.parseInt(tree[1], 10) : 0
}

/**
 * Scans PDF documents for actions that run script, launch programs, reach
 * external targets or carry attachments.
 *
 * Script and link detections always set their flags; whether they count as
 * threats is decided by `block_javascript` and `block_external_links`.
 */
export class DocumentActionScanner extends BaseScanner<DocumentActionFlags> {
  readonly type = 'document-action' as const
  readonly name = 'Document Action Scanner'
  protected readonly category: ThreatCategory = 'document-threat'

  protected initialFlags(): DocumentActionFlags {
    return { hasJavaScript: false, hasExternalLinks: false }
  }

  protected inspect({ content, policy, threats, flags }: InspectionContext<DocumentActionFlags>): void {
    if (!isPdf(content)) {
      threats.add('Not a valid PDF file')
      return
    }

    const text = content.toString('latin1')
    const lower = text.toLowerCase()
    const options = policy.document_action
    const report = (cls: ActionClass, message: string): void => {
      if (cls === 'script' && !options.block_javascript) {
        return
      }
      if (cls === 'link' && !options.block_external_links) {
        return
      }
      threats.add(message)
    }

    // Actions
    for (const action of resolveActions(policy)) {
      if (actionPattern(action).test(text)) {
        report(classifyAction(action), `Dangerous PDF action detected: ${action.slice(1)}`)
      }
    }

    // Script
    if (SCRIPT_MARKER.test(text)) {
      flags.hasJavaScript = true
      report('script', 'JavaScript code detected in PDF')

      for (const fn of SCRIPT_FUNCTIONS) {
        if (lower.includes(fn.toLowerCase())) {
          report('script', `Suspicious JavaScript function detected: ${fn}`)
        }
      }
    }

    // External references
    const links: string[] = []
    for (const protocol of DANGEROUS_PROTOCOLS) {
      if (lower.includes(protocol)) {
        links.push(`Dangerous URL protocol detected: ${protocol}`)
      }
    }
    if (/\/URI\s*\(/i.test(text)) {
      links.push('External URL link detected in PDF')
    }
    if (/\/SubmitForm[\s\S]*?http/i.test(text)) {
      links.push('Form submission to external URL detected')
    }
    if (links.length > 0) {
      flags.hasExternalLinks = true
      for (const message of links) {
        report('link', message)
      }
    }

    // Obfuscation
    const streams = countMatches(text, /\/Filter\s*\/FlateDecode/i)
    if (streams > options.max_compressed_streams) {
      threats.add(`Suspicious amount of compressed streams detected (${streams})`)
    }
    const hexRuns = text.match(/<[0-9a-fA-F\s]+>/g) ?? []
    if (hexRuns.some(run => run.length > options.max_hex_run_length)) {
      threats.add('Suspicious hex-encoded content detected')
    }
    if (countMatches(text, /\/Encrypt/i) > 1) {
      threats.add('Multiple encryption layers detected')
    }

    // Attachments
    if (/\/EmbeddedFile/i.test(text)) {
      threats.add('Embedded file detected in PDF')
      if (/\.(?:exe|bat|cmd|scr|vbs)\b/i.test(text)) {
        threats.add('Suspicious executable file embedded in PDF')
      }
    }
    if (/\/FileAttachment/i.test(text)) {
      threats.add('File attachment detected in PDF')
    }
  }

  /**
   * Info-dictionary metadata, or an empty record when access is refused
   */
  async extractMetadata(input: ScanInput, policy: ScanPolicy): Promise<PdfMetadata> {
    const content = await this.readAllowed(toTarget(input), policy)
    return content === undefined ? {} : extractPdfMetadata(content)
  }

  /**
   * Page count, or undefined when access is refused or the file is not a PDF
   */
  async countPages(input: ScanInput, policy: ScanPolicy): Promise<number | undefined> {
    const content = await this.readAllowed(toTarget(input), policy)
    if (content === undefined || !isPdf(content)) {
      return undefined
    }
    return countPdfPages(content)
  }
}
