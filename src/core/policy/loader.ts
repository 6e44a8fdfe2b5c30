import { readFileSync } from 'fs'
import { readFile } from 'fs/promises'
import { join, dirname, resolve } from 'path'
import { fileURLToPath } from 'url'
import yaml from 'js-yaml'
import { validatePolicySafe, formatValidationErrors } from './schema.js'
import type { ScanPolicy, PolicyOverrides } from '../../types/policy.js'
import { errorCode } from '../../utils/errors.js'

/**
 * Custom error for policy loading failures
 */
export class PolicyLoadError extends Error {
  constructor(
    message: string,
    public readonly policyPath: string,
    public readonly validationErrors: string[]
  ) {
    super(message)
    this.name = 'PolicyLoadError'
  }
}

/**
 * Location of the bundled default policy (same depth from src/ and dist/)
 */
export const DEFAULT_POLICY_PATH = fileURLToPath(
  new URL('../../../policies/default.yaml', import.meta.url)
)

type PolicyDocument = Record<string, unknown>

function isPolicyDocument(value: unknown): value is PolicyDocument {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Merge two raw policy documents. Mappings merge key by key, everything else
 * (lists included) is replaced by the override.
 */
export function mergePolicyDocuments(base: unknown, override: unknown): unknown {
  if (override === undefined) {
    return base
  }
  if (!isPolicyDocument(base) || !isPolicyDocument(override)) {
    return override
  }

  const merged: PolicyDocument = { ...base }
  for (const [key, value] of Object.entries(override)) {
    merged[key] = mergePolicyDocuments(base[key], value)
  }
  return merged
}

function freezeDeep<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      freezeDeep(child)
    }
    Object.freeze(value)
  }
  return value
}

function parseDocument(content: string, source: string): PolicyDocument {
  let raw: unknown
  try {
    raw = yaml.load(content)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new PolicyLoadError(`Invalid YAML in policy: ${source}`, source, [message])
  }

  if (raw === undefined || raw === null) {
    return {}
  }
  if (!isPolicyDocument(raw)) {
    throw new PolicyLoadError(
      `Policy must be a mapping: ${source}`,
      source,
      ['(root): Expected a mapping']
    )
  }
  return raw
}

/**
 * Validate a merged document and freeze the result
 */
function toPolicy(document: unknown, source: string): ScanPolicy {
  const validation = validatePolicySafe(document)
  if (!validation.success) {
    const errors = formatValidationErrors(validation.errors)
    throw new PolicyLoadError(
      `Invalid policy file: ${source}\n${errors.join('\n')}`,
      source,
      errors
    )
  }
  const policy: ScanPolicy = freezeDeep(validation.data)
  return policy
}

const DEFAULT_DOCUMENT = freezeDeep(
  parseDocument(readFileSync(DEFAULT_POLICY_PATH, 'utf-8'), DEFAULT_POLICY_PATH)
)

/**
 * Bundled default policy, loaded once
 */
export const DEFAULT_POLICY: ScanPolicy = toPolicy(DEFAULT_DOCUMENT, DEFAULT_POLICY_PATH)

/**
 * Build a policy from in-code overrides merged over the defaults
 */
export function createPolicy(overrides: PolicyOverrides = {}): ScanPolicy {
  return toPolicy(mergePolicyDocuments(DEFAULT_DOCUMENT, overrides), '<inline>')
}

export interface LoaderOptions {
  basePath?: string
  allowExtends?: boolean
}

export class PolicyLoader {
  private cache = new Map<string, ScanPolicy>()
  private basePath: string
  private allowExtends: boolean

  constructor(options: LoaderOptions = {}) {
    this.basePath = options.basePath || process.cwd()
    this.allowExtends = options.allowExtends ?? true
  }

  /**
   * Load policy from file path
   */
  async load(policyPath: string): Promise<ScanPolicy> {
    const absolutePath = resolve(this.basePath, policyPath)

    const cached = this.cache.get(absolutePath)
    if (cached) {
      return cached
    }

    const document = await this.resolveDocument(absolutePath, [])
    const policy = toPolicy(mergePolicyDocuments(DEFAULT_DOCUMENT, document), policyPath)

    this.cache.set(absolutePath, policy)
    return policy
  }

  /**
   * The bundled default policy
   */
  async loadDefault(): Promise<ScanPolicy> {
    return DEFAULT_POLICY
  }

  /**
   * Load policy from string content. `extends` is not followed.
   */
  loadFromString(content: string): ScanPolicy {
    const document = parseDocument(content, '<string>')
    return toPolicy(mergePolicyDocuments(DEFAULT_DOCUMENT, document), '<string>')
  }

  /**
   * Validate policy file without caching it
   */
  async validate(policyPath: string): Promise<{
    valid: boolean
    errors: string[]
  }> {
    try {
      const absolutePath = resolve(this.basePath, policyPath)
      const document = await this.resolveDocument(absolutePath, [])
      const validation = validatePolicySafe(mergePolicyDocuments(DEFAULT_DOCUMENT, document))

      if (validation.success) {
        return { valid: true, errors: [] }
      }

      return {
        valid: false,
        errors: formatValidationErrors(validation.errors)
      }
    } catch (error) {
      if (error instanceof PolicyLoadError) {
        return { valid: false, errors: error.validationErrors }
      }
      return {
        valid: false,
        errors: [error instanceof Error ? error.message : String(error)]
      }
    }
  }

  /**
   * Clear the policy cache
   */
  clearCache(): void {
    this.cache.clear()
  }

  /**
   * Read a document and fold in its `extends` chain, base first
   */
  private async resolveDocument(absolutePath: string, chain: string[]): Promise<PolicyDocument> {
    if (chain.includes(absolutePath)) {
      throw new PolicyLoadError(
        `Circular policy extends: ${[...chain, absolutePath].join(' -> ')}`,
        absolutePath,
        ['extends: Circular reference']
      )
    }

    const document = parseDocument(await this.readPolicyFile(absolutePath), absolutePath)
    const parent = document.extends

    if (typeof parent !== 'string' || !this.allowExtends) {
      return document
    }

    const base = await this.resolveDocument(
      join(dirname(absolutePath), parent),
      [...chain, absolutePath]
    )
    const merged = mergePolicyDocuments(base, document)
    return isPolicyDocument(merged) ? merged : document
  }

  private async readPolicyFile(absolutePath: string): Promise<string> {
    try {
      return await readFile(absolutePath, 'utf-8')
    } catch (error) {
      throw new PolicyLoadError(
        `Failed to read policy file: ${absolutePath}`,
        absolutePath,
        [errorCode(error) ?? 'UNKNOWN']
      )
    }
  }
}

/**
 * Create a default loader instance
 */
export function createPolicyLoader(options?: LoaderOptions): PolicyLoader {
  return new PolicyLoader(options)
}
