/**
 * identify command - print the detected media type of each file
 */

import { ExitCode, createCliAccessValidator, loadPolicy, type GlobalOptions } from '../options.js'
import { createLogger } from '../../utils/logger.js'
import { errorMessage } from '../../utils/errors.js'
import { FormatIdentifier } from '../../core/format/identifier.js'
import { DocumentActionScanner } from '../../core/scanner/document-action.js'
import type { ScanPolicy } from '../../types/policy.js'

const logger = createLogger('identify')

export interface IdentifyResult {
  file: string
  mediaType: string
  /** PDF header version */
  pdfVersion?: string
  pages?: number
}

/**
 * Identify one file; PDFs also get their version and page count
 */
export async function identifyFile(
  file: string,
  policy: ScanPolicy,
  identifier: FormatIdentifier = new FormatIdentifier()
): Promise<IdentifyResult> {
  const mediaType = await identifier.identifyFile(file, policy)
  if (mediaType !== 'application/pdf') {
    return { file, mediaType }
  }

  const documents = new DocumentActionScanner({
    accessValidator: createCliAccessValidator(),
    formatIdentifier: identifier
  })
  const metadata = await documents.extractMetadata(file, policy)
  const pages = await documents.countPages(file, policy)
  return { file, mediaType, pdfVersion: metadata.version, pages }
}

export function formatIdentifyResult(result: IdentifyResult): string {
  const details: string[] = []
  if (result.pdfVersion !== undefined) {
    details.push(`PDF ${result.pdfVersion}`)
  }
  if (result.pages !== undefined) {
    details.push(`${result.pages} page${result.pages === 1 ? '' : 's'}`)
  }
  return details.length > 0
    ? `${result.file}: ${result.mediaType} (${details.join(', ')})`
    : `${result.file}: ${result.mediaType}`
}

/**
 * Execute the identify command
 */
export async function executeIdentify(files: string[], globalOptions: GlobalOptions): Promise<number> {
  try {
    const policy = await loadPolicy(globalOptions)
    for (const file of files) {
      const result = await identifyFile(file, policy)
      process.stdout.write(formatIdentifyResult(result) + '\n')
    }
    return ExitCode.ALLOW
  } catch (error) {
    if (!globalOptions.quiet) {
      logger.error(`Identification failed: ${errorMessage(error)}`)
    }
    return ExitCode.ERROR
  }
}
