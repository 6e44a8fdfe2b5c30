/**
 * init command - write the bundled policy to a file for editing
 */

import { existsSync } from 'fs'
import { copyFile, mkdir } from 'fs/promises'
import { dirname, resolve } from 'path'
import { DEFAULT_POLICY_PATH } from '../../core/policy/loader.js'
import { errorMessage } from '../../utils/errors.js'

export const DEFAULT_OUTPUT_FILENAME = 'filesentry.policy.yaml'

export interface InitOptions {
  output?: string
  force?: boolean
}

export interface InitResult {
  success: boolean
  outputPath: string
  error?: string
}

export async function initCommand(options: InitOptions): Promise<InitResult> {
  const outputPath = resolve(process.cwd(), options.output ?? DEFAULT_OUTPUT_FILENAME)

  if (existsSync(outputPath) && !options.force) {
    return {
      success: false,
      outputPath,
      error: `File already exists: ${outputPath}. Use --force to overwrite.`
    }
  }

  try {
    await mkdir(dirname(outputPath), { recursive: true })
    await copyFile(DEFAULT_POLICY_PATH, outputPath)
    return { success: true, outputPath }
  } catch (error) {
    return { success: false, outputPath, error: errorMessage(error) }
  }
}
