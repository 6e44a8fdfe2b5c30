import type { ThreatCategory } from '../../types/finding.js'
import type { ScanPolicy } from '../../types/policy.js'
import { BaseScanner, type InspectionContext } from './base.js'
import { escapeRegExp, resolveList } from './utils.js'

export interface MarkupInjectionFlags {
  /** The document type declaration defines entities */
  hasEntityDeclaration: boolean
}

export const DANGEROUS_TAGS: readonly string[] = [
  'script',
  'iframe',
  'embed',
  'object',
  'use',
  'foreignObject',
  'animate',
  'animateTransform',
  'set'
]

export const EVENT_HANDLERS: readonly string[] = [
  'onload',
  'onclick',
  'onmouseover',
  'onmouseout',
  'onmousemove',
  'onmouseenter',
  'onmouseleave',
  'onfocus',
  'onblur',
  'onchange',
  'oninput',
  'onsubmit',
  'onkeydown',
  'onkeyup',
  'onkeypress',
  'onerror',
  'onabort',
  'onresize',
  'onscroll',
  'onbegin',
  'onend',
  'onrepeat'
]

const DANGEROUS_PROTOCOLS = ['javascript:', 'data:text/html', 'vbscript:'] as const

const OBFUSCATION_MARKERS: ReadonlyArray<{ pattern: RegExp; message: string }> = [
  {
    pattern: /data:image\/svg\+xml;base64,/i,
    message: 'Base64 encoded SVG content detected'
  },
  {
    pattern: /%6F%6E|%3Cscript/i,
    message: 'URL encoded suspicious content detected'
  },
  {
    pattern: /&#x?[0-9a-f]+;[^\n]*script/i,
    message: 'HTML entity obfuscation detected'
  },
  {
    pattern: /<!\[CDATA\[(?:(?!\]\]>)[\s\S])*script/i,
    message: 'CDATA section with script detected'
  }
]

const SVG_ROOT = /<svg[^>]*>/i

/** DOCTYPE naming an external DTD */
const EXTERNAL_DOCTYPE = /<!DOCTYPE\s+[^\s[>]+\s+(?:SYSTEM|PUBLIC)\b/i

/** ENTITY whose definition is an external identifier, with or without `%` */
const EXTERNAL_ENTITY = /<!ENTITY\s+(?:%\s+)?[^\s>]+\s+(?:SYSTEM|PUBLIC)\b/i

const PARAMETER_ENTITY = /<!ENTITY\s+%/i

/**
 * Reasons to reject the declarations of a document. Every DOCTYPE and ENTITY
 * in the text counts, including ones in comments or after a `]` inside an
 * entity value, whether or not anything references them.
 */
export function entityThreats(text: string): string[] {
  const threats: string[] = []
  if (EXTERNAL_DOCTYPE.test(text) || EXTERNAL_ENTITY.test(text)) {
    threats.push('External entity declaration detected in DOCTYPE')
  }
  if (PARAMETER_ENTITY.test(text)) {
    threats.push('Parameter entity declaration detected in DOCTYPE')
  }
  return threats
}

function resolveTags(policy: ScanPolicy): string[] {
  const options = policy.markup_injection
  return resolveList(DANGEROUS_TAGS, options.additional_tags, options.exclude_tags)
}

function resolveAttributes(policy: ScanPolicy): string[] {
  const options = policy.markup_injection
  return resolveList(EVENT_HANDLERS, options.additional_attributes, options.exclude_attributes)
}

/**
 * Scans SVG markup for script, event handlers, script URLs, obfuscation and
 * entity declarations
 */
export class MarkupInjectionScanner extends BaseScanner<MarkupInjectionFlags> {
  readonly type = 'markup-injection' as const
  readonly name = 'Markup Injection Scanner'
  protected readonly category: ThreatCategory = 'markup-injection'

  protected initialFlags(): MarkupInjectionFlags {
    return { hasEntityDeclaration: false }
  }

  protected inspect({ content, policy, threats, flags }: InspectionContext<MarkupInjectionFlags>): void {
    const text = content.toString('utf-8')

    if (!SVG_ROOT.test(text)) {
      threats.add('Not a valid SVG file')
      return
    }

    // Entity declarations are refused before anything else looks at the markup
    flags.hasEntityDeclaration = /<!ENTITY/i.test(text)
    const rejected = entityThreats(text)
    if (rejected.length > 0) {
      for (const message of rejected) {
        threats.add(message, 'entity-attack')
      }
      return
    }

    for (const tag of resolveTags(policy)) {
      if (new RegExp(`<${escapeRegExp(tag)}[\\s>/]`, 'i').test(text)) {
        threats.add(`Dangerous tag detected: <${tag}>`)
      }
    }

    for (const attribute of resolveAttributes(policy)) {
      if (new RegExp(`(?<![\\w:-])${escapeRegExp(attribute)}\\s*=\\s*["'][^"']*["']`, 'i').test(text)) {
        threats.add(`Event handler detected: ${attribute}`)
      }
    }

    for (const protocol of DANGEROUS_PROTOCOLS) {
      if (new RegExp(`(?:href|xlink:href)\\s*=\\s*["']\\s*${escapeRegExp(protocol)}`, 'i').test(text)) {
        threats.add(`Dangerous protocol detected: ${protocol}`)
      }
    }

    for (const marker of OBFUSCATION_MARKERS) {
      if (marker.pattern.test(text)) {
        threats.add(marker.message)
      }
    }
  }
}
