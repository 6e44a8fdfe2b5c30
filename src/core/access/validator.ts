import { lstat, realpath } from 'fs/promises'
import { tmpdir } from 'os'
import { sep } from 'path'
import type { ScanPolicy } from '../../types/policy.js'
import { createLogger, type Logger } from '../../utils/logger.js'
import { errorCode } from '../../utils/errors.js'

/**
 * Why a path was refused
 */
export type AccessFault = 'symlink' | 'null-byte' | 'unresolved' | 'outside-roots'

/**
 * Outcome of an access check, produced before any content is read
 */
export interface AccessDecision {
  readonly allowed: boolean
  readonly reason?: string
  readonly fault?: AccessFault
  /** Canonical path that passed the check */
  readonly resolvedPath?: string
  /** Set when no root restriction applied to this decision */
  readonly unrestricted?: boolean
}

export const ACCESS_REASONS: Readonly<Record<AccessFault, string>> = {
  'symlink': 'Symbolic link detected',
  'null-byte': 'Invalid path: null byte detected',
  'unresolved': 'Unable to resolve file path',
  'outside-roots': 'File path outside allowed directories'
}

export interface AccessValidatorOptions {
  /** Roots used when the policy leaves `allowed_roots` null. Defaults to the OS temp dir. */
  defaultRoots?: readonly string[]
  logger?: Logger
}

function deny(fault: AccessFault): AccessDecision {
  return { allowed: false, fault, reason: ACCESS_REASONS[fault] }
}

/**
 * Decides whether a path may be opened: no symlinks, no NUL bytes, and a
 * canonical location inside one of the allowed roots.
 */
export class AccessValidator {
  private readonly defaultRoots: readonly string[]
  private readonly logger: Logger

  constructor(options: AccessValidatorOptions = {}) {
    this.defaultRoots = options.defaultRoots ?? [tmpdir()]
    this.logger = options.logger ?? createLogger('access')
  }

  async validate(path: string, policy: ScanPolicy): Promise<AccessDecision> {
    if (path.includes('\0')) {
      return deny('null-byte')
    }

    if (policy.access.check_symlinks) {
      try {
        const stats = await lstat(path)
        if (stats.isSymbolicLink()) {
          return deny('symlink')
        }
      } catch (error) {
        this.logger.debug(`lstat failed for ${path}: ${errorCode(error) ?? 'UNKNOWN'}`)
        return deny('unresolved')
      }
    }

    let resolvedPath: string
    try {
      resolvedPath = await realpath(path)
    } catch (error) {
      this.logger.debug(`realpath failed for ${path}: ${errorCode(error) ?? 'UNKNOWN'}`)
      return deny('unresolved')
    }

    const roots = this.rootsFor(policy)
    if (roots.length === 0) {
      this.logger.warn(
        `No allowed roots configured; accepting ${resolvedPath} without a directory restriction`
      )
      return { allowed: true, resolvedPath, unrestricted: true }
    }

    for (const root of roots) {
      const resolvedRoot = await this.resolveRoot(root)
      if (resolvedRoot !== undefined && isDescendant(resolvedPath, resolvedRoot)) {
        return { allowed: true, resolvedPath }
      }
    }

    return deny('outside-roots')
  }

  private rootsFor(policy: ScanPolicy): readonly string[] {
    const configured = policy.access.allowed_roots
    if (configured !== null) {
      return configured
    }

    const storageRoot = policy.access.storage_root
    return storageRoot === undefined ? this.defaultRoots : [...this.defaultRoots, storageRoot]
  }

  private async resolveRoot(root: string): Promise<string | undefined> {
    try {
      return await realpath(root)
    } catch (error) {
      this.logger.debug(`Skipping allowed root ${root}: ${errorCode(error) ?? 'UNKNOWN'}`)
      return undefined
    }
  }
}

/**
 * True when `path` lies strictly below `root`; a shared string prefix
 * ("/tmp/up" vs "/tmp/uploads") does not count.
 */
export function isDescendant(path: string, root: string): boolean {
  const prefix = root.endsWith(sep) ? root : root + sep
  return path.startsWith(prefix)
}
