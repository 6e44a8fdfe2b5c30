import { open } from 'fs/promises'
import { constants } from 'fs'
import type {
  Finding,
  ScannerReport,
  ScannerType,
  ScanResult,
  ThreatCategory
} from '../../types/finding.js'
import { CATEGORY_SEVERITY } from '../../types/finding.js'
import type { ScanPolicy } from '../../types/policy.js'
import type { AccessDecision, AccessValidator } from '../access/validator.js'
import type { FormatIdentifier } from '../format/identifier.js'
import { PREFIX_LENGTH } from '../format/signatures.js'
import { errorMessage } from '../../utils/errors.js'

/**
 * Collaborators every scanner is constructed with
 */
export interface ScannerDependencies {
  accessValidator: AccessValidator
  formatIdentifier: FormatIdentifier
}

/**
 * File to scan plus the name the uploader gave it
 */
export interface ScanTarget {
  path: string
  declaredName?: string
}

export type ScanInput = string | ScanTarget

export function toTarget(input: ScanInput): ScanTarget {
  return typeof input === 'string' ? { path: input } : input
}

/**
 * Ordered, de-duplicated findings of one scan
 */
export class ThreatCollector {
  private readonly items: Finding[] = []
  private readonly seen = new Set<string>()

  constructor(
    private readonly scanner: ScannerType,
    private readonly defaultCategory: ThreatCategory
  ) {}

  add(message: string, category: ThreatCategory = this.defaultCategory): void {
    if (this.seen.has(message)) {
      return
    }
    this.seen.add(message)
    this.items.push({
      scanner: this.scanner,
      category,
      severity: CATEGORY_SEVERITY[category],
      message
    })
  }

  /**
   * Copy findings produced elsewhere (nested scans, other scanners)
   */
  merge(findings: readonly Finding[], prefix = ''): void {
    for (const item of findings) {
      const message = prefix + item.message
      if (!this.seen.has(message)) {
        this.seen.add(message)
        this.items.push({ ...item, message })
      }
    }
  }

  get size(): number {
    return this.items.length
  }

  findings(): readonly Finding[] {
    return [...this.items]
  }
}

/**
 * Freeze a result; `safe` iff nothing was found
 */
export function buildResult<F extends object>(findings: readonly Finding[], flags: F): ScanResult<F> {
  return Object.freeze({
    safe: findings.length === 0,
    threats: Object.freeze(findings.map(item => item.message)),
    findings: Object.freeze([...findings]),
    flags: Object.freeze({ ...flags })
  })
}

/**
 * Single-finding result for access faults and scanner failures
 */
export function failedResult<F extends object>(
  scanner: ScannerType,
  category: ThreatCategory,
  message: string,
  flags: F
): ScanResult<F> {
  const collector = new ThreatCollector(scanner, category)
  collector.add(message)
  return buildResult(collector.findings(), flags)
}

/**
 * Category of an access rejection
 */
export function accessCategory(decision: AccessDecision): ThreatCategory {
  return decision.fault === 'symlink' ? 'symlink-detected' : 'dangerous-file'
}

/**
 * Read a whole file through a handle that is closed on every path. With
 * `noFollow`, a path swapped for a symlink after validation fails to open.
 */
export async function readContent(path: string, noFollow: boolean): Promise<Buffer> {
  const flags = noFollow ? constants.O_RDONLY | (constants.O_NOFOLLOW ?? 0) : constants.O_RDONLY
  const handle = await open(path, flags)
  try {
    return await handle.readFile()
  } finally {
    await handle.close()
  }
}

/**
 * Replace a file's content through the same kind of handle
 */
export async function writeContent(path: string, content: Buffer, noFollow: boolean): Promise<void> {
  const base = constants.O_WRONLY | constants.O_TRUNC
  const handle = await open(path, noFollow ? base | (constants.O_NOFOLLOW ?? 0) : base)
  try {
    await handle.writeFile(content)
  } finally {
    await handle.close()
  }
}

/**
 * What a detection pass sees
 */
export interface InspectionContext<F extends object> {
  content: Buffer
  mediaType: string
  target: ScanTarget
  policy: ScanPolicy
  threats: ThreatCollector
  flags: F
}

/**
 * Base class for content scanners.
 *
 * `scan` validates access, reads the file, identifies it and hands the bytes
 * to `inspect`. Anything thrown on the way becomes an unsafe result, so a
 * file that could not be inspected is never reported as safe.
 */
export abstract class BaseScanner<F extends object> {
  abstract readonly type: ScannerType
  abstract readonly name: string
  protected abstract readonly category: ThreatCategory

  constructor(protected readonly deps: ScannerDependencies) {}

  /**
   * Flag record of a fresh scan
   */
  protected abstract initialFlags(): F

  /**
   * Run the detection passes, in order, recording into `context.threats`
   */
  protected abstract inspect(context: InspectionContext<F>): Promise<void> | void

  async scan(input: ScanInput, policy: ScanPolicy): Promise<ScanResult<F>> {
    const target = toTarget(input)
    return this.guarded(target, policy, path => this.scanPath(path, target, policy))
  }

  /**
   * Scan with timing, for reports
   */
  async execute(input: ScanInput, policy: ScanPolicy): Promise<ScannerReport<F>> {
    const start = Date.now()
    const result = await this.scan(input, policy)
    return { scanner: this.type, result, duration: Date.now() - start }
  }

  /**
   * Access check and failure boundary shared by every scan entry point
   */
  protected async guarded(
    target: ScanTarget,
    policy: ScanPolicy,
    run: (path: string) => Promise<ScanResult<F>>
  ): Promise<ScanResult<F>> {
    const decision = await this.deps.accessValidator.validate(target.path, policy)
    if (!decision.allowed) {
      return failedResult(
        this.type,
        accessCategory(decision),
        decision.reason ?? 'File access denied',
        this.initialFlags()
      )
    }

    try {
      return await run(decision.resolvedPath ?? target.path)
    } catch (error) {
      return failedResult(
        this.type,
        this.category,
        `Scan failed: ${errorMessage(error)}`,
        this.initialFlags()
      )
    }
  }

  /**
   * Content of a target that passes the access check, or undefined
   */
  protected async readAllowed(target: ScanTarget, policy: ScanPolicy): Promise<Buffer | undefined> {
    const decision = await this.deps.accessValidator.validate(target.path, policy)
    if (!decision.allowed) {
      return undefined
    }
    return readContent(decision.resolvedPath ?? target.path, policy.access.check_symlinks)
  }

  private async scanPath(path: string, target: ScanTarget, policy: ScanPolicy): Promise<ScanResult<F>> {
    const content = await readContent(path, policy.access.check_symlinks)
    const mediaType = await this.deps.formatIdentifier.identify(
      content.subarray(0, PREFIX_LENGTH),
      policy
    )
    const context: InspectionContext<F> = {
      content,
      mediaType,
      target,
      policy,
      threats: new ThreatCollector(this.type, this.category),
      flags: this.initialFlags()
    }

    await this.inspect(context)
    return buildResult(context.threats.findings(), context.flags)
  }
}
