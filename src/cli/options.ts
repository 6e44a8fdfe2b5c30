import { tmpdir } from 'os'
import { AccessValidator } from '../core/access/validator.js'
import { createScanEngine, type ScanEngine } from '../core/engine/index.js'
import { DEFAULT_POLICY, PolicyLoader } from '../core/policy/loader.js'
import type { ScanPolicy } from '../types/policy.js'

/**
 * Exit codes for the CLI
 * - 0: allow (every file is safe)
 * - 1: block (at least one file is unsafe)
 * - 2: error (the scan could not run)
 */
export const ExitCode = {
  ALLOW: 0,
  BLOCK: 1,
  ERROR: 2
} as const

export type ExitCodeType = (typeof ExitCode)[keyof typeof ExitCode]

/**
 * Global CLI options
 */
export interface GlobalOptions {
  verbose?: boolean
  quiet?: boolean
  config?: string
}

/**
 * Policy named by `--config`, or the bundled default
 */
export async function loadPolicy(globalOptions: GlobalOptions): Promise<ScanPolicy> {
  if (!globalOptions.config) {
    return DEFAULT_POLICY
  }
  return new PolicyLoader().load(globalOptions.config)
}

/**
 * Files under the working directory are accepted alongside the temp
 * directory when the policy sets no roots
 */
export function createCliAccessValidator(): AccessValidator {
  return new AccessValidator({ defaultRoots: [process.cwd(), tmpdir()] })
}

export function createCliEngine(): ScanEngine {
  return createScanEngine({ accessValidator: createCliAccessValidator() })
}
