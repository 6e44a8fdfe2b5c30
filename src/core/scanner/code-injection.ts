import { z } from 'zod'
import type { ThreatCategory } from '../../types/finding.js'
import type { ScanPolicy } from '../../types/policy.js'
import { loadDataFile } from '../../utils/data.js'
import { BaseScanner, type InspectionContext } from './base.js'
import { escapeRegExp, isBinaryMedia, resolveList } from './utils.js'

export interface CodeInjectionFlags {
  /** The content was binary media and was not inspected */
  skipped: boolean
}

/**
 * Pattern definition for code injection detection
 */
interface InjectionPattern {
  readonly name: string
  readonly pattern: RegExp
  readonly message: string
}

const FUNCTION_TABLE = loadDataFile('dangerous-functions.json', z.object({
  default: z.array(z.string().min(1)),
  strict: z.array(z.string().min(1))
}))

export const DEFAULT_DANGEROUS_FUNCTIONS: readonly string[] = Object.freeze(FUNCTION_TABLE.default)
export const STRICT_DANGEROUS_FUNCTIONS: readonly string[] = Object.freeze(FUNCTION_TABLE.strict)

/**
 * Opening tags. Each requires a following whitespace or identifier character,
 * so a stray "<?" in prose or an XML declaration does not match.
 */
const OPENING_TAGS: readonly InjectionPattern[] = [
  {
    name: 'open_tag',
    pattern: /<\?php\s/i,
    message: 'PHP opening tag (<?php) detected'
  },
  {
    name: 'short_echo_tag',
    pattern: /<\?=\s*[a-zA-Z$_]/,
    message: 'PHP short echo tag (<?=) detected'
  },
  {
    name: 'short_open_tag',
    pattern: /<\?(?!xml[\s?])\s+[a-zA-Z$_]/i,
    message: 'PHP short tag (<?) detected'
  }
] as const

/**
 * High-confidence composite patterns and web shell names
 */
const SUSPICIOUS_PATTERNS: readonly InjectionPattern[] = [
  {
    name: 'script_language_php',
    pattern: /<script[^>]*language\s*=\s*["']?php["']?[^>]*>/i,
    message: 'Script tag with server-side language detected'
  },
  {
    name: 'asp_style_block',
    pattern: /<%[\s\S]*?%>/,
    message: 'ASP-style code block detected'
  },
  {
    name: 'eval_base64',
    pattern: /\b(?:eval|assert)\s*\(\s*base64_decode/i,
    message: 'Evaluation of base64-decoded data detected'
  },
  {
    name: 'eval_gzinflate',
    pattern: /\b(?:eval|assert)\s*\(\s*gz(?:inflate|uncompress)/i,
    message: 'Evaluation of compressed data detected'
  },
  {
    name: 'preg_replace_eval',
    pattern: /preg_replace\s*\([^)]*\/[a-z]*e[a-z]*["')]/i,
    message: 'preg_replace with /e modifier detected'
  },
  {
    name: 'escaped_open_tag',
    pattern: /\\x3c\\x3f/i,
    message: 'Hex-escaped opening tag detected'
  },
  {
    name: 'webshell_c99',
    pattern: /\bc99\s*shell\b/i,
    message: 'Known web shell signature detected: c99'
  },
  {
    name: 'webshell_r57',
    pattern: /\br57\s*shell\b/i,
    message: 'Known web shell signature detected: r57'
  },
  {
    name: 'webshell_b374k',
    pattern: /\bb374k\b/i,
    message: 'Known web shell signature detected: b374k'
  },
  {
    name: 'webshell_wso',
    pattern: /\bwso\s*shell\b/i,
    message: 'Known web shell signature detected: WSO'
  },
  {
    name: 'webshell_filesman',
    pattern: /\bFilesMan\b/i,
    message: 'Known web shell signature detected: FilesMan'
  },
  {
    name: 'webshell_safe0ver',
    pattern: /\bSafe0ver\b/i,
    message: 'Known web shell signature detected: Safe0ver'
  },
  {
    name: 'webshell_tryag',
    pattern: /\bTryag\s+File\s+Manager\b/i,
    message: 'Known web shell signature detected: Tryag File Manager'
  },
  {
    name: 'webshell_angel',
    pattern: /\bAngel\s+Shell\b/i,
    message: 'Known web shell signature detected: Angel Shell'
  }
] as const

/**
 * Function list for the configured mode
 */
export function resolveFunctions(policy: ScanPolicy): string[] {
  const options = policy.code_injection
  switch (options.mode) {
    case 'strict':
      return resolveList(STRICT_DANGEROUS_FUNCTIONS, [], options.exclude_functions)
    case 'custom':
      return resolveList(options.functions, [], options.exclude_functions)
    case 'default':
      return resolveList(
        DEFAULT_DANGEROUS_FUNCTIONS,
        options.additional_functions,
        options.exclude_functions
      )
  }
}

/**
 * Built-in patterns minus exclusions (by name), plus caller patterns
 */
function resolvePatterns(policy: ScanPolicy): InjectionPattern[] {
  const excluded = new Set(policy.code_injection.exclude_patterns)
  const builtIn = SUSPICIOUS_PATTERNS.filter(p => !excluded.has(p.name))
  const custom = policy.code_injection.additional_patterns.map((source, index) => ({
    name: `custom_${index}`,
    pattern: new RegExp(source, 'i'),
    message: `Custom code pattern matched: /${source}/`
  }))
  return [...builtIn, ...custom]
}

/**
 * Detects server-side script embedded in uploads: opening tags, calls to
 * dangerous functions, obfuscated evaluation and known web shells.
 */
export class CodeInjectionScanner extends BaseScanner<CodeInjectionFlags> {
  readonly type = 'code-injection' as const
  readonly name = 'Code Injection Scanner'
  protected readonly category: ThreatCategory = 'code-injection'

  protected initialFlags(): CodeInjectionFlags {
    return { skipped: false }
  }

  protected inspect({ content, mediaType, policy, threats, flags }: InspectionContext<CodeInjectionFlags>): void {
    if (isBinaryMedia(mediaType)) {
      flags.skipped = true
      return
    }

    const text = content.toString('utf-8')

    for (const tag of OPENING_TAGS) {
      if (tag.pattern.test(text)) {
        threats.add(tag.message)
      }
    }

    for (const fn of resolveFunctions(policy)) {
      if (new RegExp(`\\b${escapeRegExp(fn)}\\s*\\(`, 'i').test(text)) {
        threats.add(`Dangerous function detected: ${fn}()`)
      }
    }

    for (const suspicious of resolvePatterns(policy)) {
      if (suspicious.pattern.test(text)) {
        threats.add(suspicious.message)
      }
    }
  }
}
