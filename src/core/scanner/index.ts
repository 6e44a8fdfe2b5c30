export {
  BaseScanner,
  ThreatCollector,
  buildResult,
  failedResult,
  type InspectionContext,
  type ScanInput,
  type ScanTarget,
  type ScannerDependencies
} from './base.js'
export { CodeInjectionScanner, resolveFunctions, type CodeInjectionFlags } from './code-injection.js'
export { MarkupInjectionScanner, type MarkupInjectionFlags } from './markup-injection.js'
export {
  DocumentActionScanner,
  countPdfPages,
  extractPdfMetadata,
  type DocumentActionFlags,
  type PdfMetadata
} from './document-action.js'
export { MacroScanner, isLegacyOffice, type MacroFlags } from './macro.js'
export { MetadataScanner, type MetadataFlags } from './metadata.js'
